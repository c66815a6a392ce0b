import {
  DateInferenceEngine,
  findExplicitDate,
  inferYear,
  mentionsNextClass,
  monthFromToken,
} from '../dateInference';
import { ScheduleIndex } from '../scheduleIndex';
import { LoggerLike } from '../../utils/logger';

function fakeLogger(): jest.Mocked<LoggerLike> {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

// Mid-November 2024, local time
const NOVEMBER = () => new Date(2024, 10, 15, 12, 0);

const POSTED = '2024-01-03T15:30:00Z'; // a Wednesday
const COURSE = 'CS 363-001 Fall 2024';

function createEngine(log: LoggerLike = fakeLogger()) {
  return new DateInferenceEngine({
    schedule: new ScheduleIndex({ 'CS 363': [1, 3] }),
    logger: log,
    now: NOVEMBER,
  });
}

describe('DateInferenceEngine', () => {
  describe('fallback', () => {
    it('should return the posted date when there is no text', () => {
      const engine = createEngine();
      expect(engine.resolve('', POSTED, COURSE)).toEqual({ year: 2024, month: 1, day: 3 });
      expect(engine.resolve(undefined, '2024-01-03', COURSE)).toEqual({ year: 2024, month: 1, day: 3 });
      expect(engine.resolve(null, POSTED)).toEqual({ year: 2024, month: 1, day: 3 });
    });

    it('should return the posted date when nothing in the text is a date', () => {
      const engine = createEngine();
      expect(engine.explain('Reminder: bring your laptops', POSTED, COURSE)).toEqual({
        date: { year: 2024, month: 1, day: 3 },
        outcome: 'FALLBACK',
      });
    });

    it('should return the posted date when the day does not exist in the month', () => {
      const engine = createEngine();
      expect(engine.explain('Due 31 Apr 2024', POSTED, COURSE)).toEqual({
        date: { year: 2024, month: 1, day: 3 },
        outcome: 'FALLBACK',
      });
      expect(engine.resolve('Due Feb 30', POSTED, COURSE)).toEqual({ year: 2024, month: 1, day: 3 });
      expect(engine.resolve('Room 0 Jan 2024', POSTED, COURSE)).toEqual({ year: 2024, month: 1, day: 3 });
    });

    it('should use today when the posted value is not a date', () => {
      const log = fakeLogger();
      const engine = createEngine(log);

      expect(engine.resolve('hello', 'yesterday', COURSE)).toEqual({ year: 2024, month: 11, day: 15 });
      expect(log.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('explicit dates', () => {
    it('should read day before month with an explicit year', () => {
      const engine = createEngine();
      expect(engine.explain('Due 3rd Oct, 2024', POSTED, COURSE)).toEqual({
        date: { year: 2024, month: 10, day: 3 },
        outcome: 'EXPLICIT_DATE',
      });
    });

    it('should read month before day with an explicit year', () => {
      const engine = createEngine();
      expect(engine.resolve('Due Oct 3rd 2024', POSTED, COURSE)).toEqual({ year: 2024, month: 10, day: 3 });
    });

    it('should accept full month names in any case', () => {
      const engine = createEngine();
      expect(engine.resolve('Submit by DECEMBER 12', POSTED, COURSE)).toEqual({ year: 2024, month: 12, day: 12 });
      expect(engine.resolve('Lab on Tuesday, 14th may', POSTED, COURSE)).toEqual({ year: 2024, month: 5, day: 14 });
    });

    it('should prefer day-before-month when both orders appear', () => {
      const engine = createEngine();
      expect(engine.resolve('Moved from Oct 5th to 9 Nov 2024', POSTED, COURSE)).toEqual({ year: 2024, month: 11, day: 9 });
    });

    it('should ignore the posted year when the text names one', () => {
      const engine = createEngine();
      expect(engine.resolve('Due 3rd Oct, 2024', '2019-06-01', COURSE)).toEqual({ year: 2024, month: 10, day: 3 });
    });
  });

  describe('year inference', () => {
    it('should move an early month more than six months back into next year', () => {
      const engine = createEngine();
      expect(engine.resolve('Meet on 2 Mar', POSTED, COURSE)).toEqual({ year: 2025, month: 3, day: 2 });
      expect(engine.resolve('Meet on 4 Apr', POSTED, COURSE)).toEqual({ year: 2025, month: 4, day: 4 });
    });

    it('should keep the current year for recent months', () => {
      const engine = createEngine();
      expect(engine.resolve('Meet on 2 Sep', POSTED, COURSE)).toEqual({ year: 2024, month: 9, day: 2 });
      // exactly six months back stays in the current year
      expect(engine.resolve('Meet on 5 May', POSTED, COURSE)).toEqual({ year: 2024, month: 5, day: 5 });
    });
  });

  describe('next class', () => {
    it('should resolve "next class" through the schedule', () => {
      const log = fakeLogger();
      const engine = createEngine(log);

      expect(engine.explain('Quiz is moved to the next class', POSTED, COURSE)).toEqual({
        date: { year: 2024, month: 1, day: 4 },
        outcome: 'NEXT_CLASS',
      });
      expect(log.info).toHaveBeenCalledTimes(1);
    });

    it('should win over an explicit date in the same text', () => {
      const engine = createEngine();
      expect(engine.resolve('Quiz on 12 Feb 2024 moved to next lecture', POSTED, COURSE)).toEqual({ year: 2024, month: 1, day: 4 });
    });

    it('should fall through to explicit dates when the course has no schedule', () => {
      const engine = createEngine();
      expect(engine.explain('See you next session, due 9 Feb 2024', POSTED, 'PHYS 101')).toEqual({
        date: { year: 2024, month: 2, day: 9 },
        outcome: 'EXPLICIT_DATE',
      });
    });

    it('should fall back to the posted date without a schedule', () => {
      const engine = new DateInferenceEngine({ logger: fakeLogger(), now: NOVEMBER });
      expect(engine.resolve('Bring it to the next class', POSTED, COURSE)).toEqual({ year: 2024, month: 1, day: 3 });
    });

    it('should only match whole words', () => {
      const engine = createEngine();
      expect(engine.explain('Both next classes are on 9 Feb 2024', POSTED, COURSE).outcome).toBe('EXPLICIT_DATE');
      expect(engine.explain('nextclass', POSTED, COURSE).outcome).toBe('FALLBACK');
    });
  });

  it('should return a valid date for any text', () => {
    const engine = createEngine();
    const inputs = [
      '\u0000￿\ud83d',
      '🎉🎉🎉',
      '99 Jan',
      'Jan 99, 99999',
      '31st Feb',
      '<p>Due&nbsp;3 Oct</p>',
      'x'.repeat(10_000),
    ];

    for (const text of inputs) {
      const date = engine.resolve(text, POSTED, COURSE);
      expect(Number.isInteger(date.year)).toBe(true);
      expect(date.month).toBeGreaterThanOrEqual(1);
      expect(date.month).toBeLessThanOrEqual(12);
      expect(date.day).toBeGreaterThanOrEqual(1);
      expect(date.day).toBeLessThanOrEqual(31);
    }
  });

  it('should give the same answer for the same input', () => {
    const engine = createEngine();
    const text = 'Quiz moved to the next class, not 3 Oct';
    expect(engine.resolve(text, POSTED, COURSE)).toEqual(engine.resolve(text, POSTED, COURSE));
  });
});

describe('findExplicitDate', () => {
  it('should tag which pattern matched', () => {
    expect(findExplicitDate('due 3rd Oct, 2024')).toEqual({ pattern: 'DAY_MONTH', day: 3, monthToken: 'Oct', year: 2024 });
    expect(findExplicitDate('due October 3')).toEqual({ pattern: 'MONTH_DAY', day: 3, monthToken: 'Oct', year: undefined });
    expect(findExplicitDate('no dates here')).toBeNull();
  });
});

describe('monthFromToken', () => {
  it('should use the first three letters', () => {
    expect(monthFromToken('September')).toBe(9);
    expect(monthFromToken('jan')).toBe(1);
    expect(monthFromToken('Foo')).toBeNull();
  });
});

describe('inferYear', () => {
  it('should only roll over when the gap is more than six months', () => {
    const november = new Date(2024, 10, 1);
    expect(inferYear(4, november)).toBe(2025);
    expect(inferYear(5, november)).toBe(2024);
    expect(inferYear(12, november)).toBe(2024);
  });
});

describe('mentionsNextClass', () => {
  it('should recognise class, lecture and session', () => {
    expect(mentionsNextClass('Next   Lecture')).toBe(true);
    expect(mentionsNextClass('in the next session')).toBe(true);
    expect(mentionsNextClass('next week')).toBe(false);
  });
});
