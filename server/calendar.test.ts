import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CalendarUnavailableError } from '../shared/errors';
import { TomlCalendarSource } from './calendar';

// Offset datetimes built from local wall-clock times keep the day filter
// independent of the machine's time zone.
function at(day: number, hour: number, minute = 0): string {
  return new Date(2026, 9, day, hour, minute).toISOString();
}

async function writeEvents(text: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hourbook-calendar-'));
  const file = path.join(dir, 'calendar.toml');
  await fs.writeFile(file, text, 'utf-8');
  return file;
}

test('fetchEvents returns the day\'s events in start order', async () => {
  const file = await writeEvents(`
[[events]]
start = ${at(19, 13)}
end = ${at(19, 14, 30)}
subject = "Design review"
categories = "Meetings, Deep Work"

[[events]]
start = ${at(19, 9)}
end = ${at(19, 9, 30)}
subject = "Standup"

[[events]]
start = ${at(20, 9)}
end = ${at(20, 10)}
subject = "Tomorrow"

[[events]]
start = ${at(18, 23)}
end = ${at(19, 1)}
subject = "Overnight"

[[events]]
start = ${at(19, 0)}
end = ${at(20, 0)}
subject = "Offsite"
all_day = true
out_of_office = true
`);
  const blocks = await new TomlCalendarSource(file).fetchEvents('2026-10-19');
  assert.deepEqual(blocks, [
    {
      start: new Date(2026, 9, 19, 0),
      end: new Date(2026, 9, 20, 0),
      subject: 'Offsite',
      suggestedCategory: undefined,
      allDay: true,
      outOfOffice: true,
    },
    {
      start: new Date(2026, 9, 19, 9),
      end: new Date(2026, 9, 19, 9, 30),
      subject: 'Standup',
      suggestedCategory: undefined,
      allDay: false,
      outOfOffice: false,
    },
    {
      start: new Date(2026, 9, 19, 13),
      end: new Date(2026, 9, 19, 14, 30),
      subject: 'Design review',
      suggestedCategory: 'Meetings, Deep Work',
      allDay: false,
      outOfOffice: false,
    },
  ]);
});

test('an empty file has no events', async () => {
  const file = await writeEvents('');
  assert.deepEqual(await new TomlCalendarSource(file).fetchEvents('2026-10-19'), []);
});

test('an unconfigured or unreadable calendar is unavailable', async () => {
  await assert.rejects(new TomlCalendarSource(undefined).fetchEvents('2026-10-19'), CalendarUnavailableError);
  await assert.rejects(
    new TomlCalendarSource(path.join(os.tmpdir(), 'hourbook-missing', 'calendar.toml')).fetchEvents('2026-10-19'),
    CalendarUnavailableError
  );
});

test('malformed events make the calendar unavailable', async () => {
  const file = await writeEvents('[[events]]\nstart = "not a date"\nend = "never"\n');
  await assert.rejects(new TomlCalendarSource(file).fetchEvents('2026-10-19'), /Invalid calendar file/);
});
