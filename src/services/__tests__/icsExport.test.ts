import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { renderIcs, toEventAttributes, writeIcsFile } from '../icsExport';
import { SyncEvent } from '../../types';

const announcement: SyncEvent = {
  kind: 'announcement',
  title: 'Quiz moved (CS 363)',
  start: { year: 2024, month: 1, day: 4 },
  description: 'Originally Posted: 2024-01-03',
};

const assignment: SyncEvent = {
  kind: 'assignment',
  title: 'Homework 1 (CS 363)',
  start: new Date(Date.UTC(2024, 1, 1, 23, 59)),
  description: 'https://canvas.test/as/10',
};

describe('icsExport', () => {
  describe('toEventAttributes', () => {
    it('should make a calendar date an all-day event', () => {
      expect(toEventAttributes(announcement)).toEqual({
        title: 'Quiz moved (CS 363)',
        start: [2024, 1, 4],
        duration: { days: 1 },
        description: 'Originally Posted: 2024-01-03',
      });
    });

    it('should make a timestamp a one hour UTC event', () => {
      expect(toEventAttributes(assignment)).toEqual({
        title: 'Homework 1 (CS 363)',
        start: [2024, 2, 1, 23, 59],
        startInputType: 'utc',
        startOutputType: 'utc',
        duration: { hours: 1 },
        description: 'https://canvas.test/as/10',
      });
    });
  });

  describe('renderIcs', () => {
    it('should write one VEVENT per entry', () => {
      const document = renderIcs([announcement, assignment]);

      expect(document.match(/BEGIN:VEVENT/g)).toHaveLength(2);
      expect(document).toContain('DTSTART;VALUE=DATE:20240104');
      expect(document).toContain('DTSTART:20240201T235900Z');
      expect(document).toContain('SUMMARY:Quiz moved (CS 363)');
    });
  });

  describe('writeIcsFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'ics-export-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write the calendar to disk', async () => {
      const outputPath = join(dir, 'my_schedule.ics');
      await writeIcsFile(outputPath, [announcement]);

      const written = await readFile(outputPath, 'utf-8');
      expect(written.startsWith('BEGIN:VCALENDAR')).toBe(true);
      expect(written).toContain('DTSTART;VALUE=DATE:20240104');
    });
  });
});
