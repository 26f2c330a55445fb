import fs from 'fs/promises';
import toml from '@iarna/toml';
import { z } from 'zod';
import type { CalendarBlock } from '../types';
import { addDaysToKey, parseDateKeyLocal } from '../shared/dateKey';
import { CalendarUnavailableError, errorMessage } from '../shared/errors';

export interface CalendarSource {
  fetchEvents(date: string): Promise<CalendarBlock[]>;
}

const EventSchema = z.object({
  start: z.coerce.date(),
  end: z.coerce.date(),
  subject: z.string().default(''),
  categories: z.string().optional(),
  all_day: z.boolean().default(false),
  out_of_office: z.boolean().default(false),
});

const EventsFileSchema = z.object({
  events: z.array(EventSchema).default([]),
});

/**
 * Reads busy-time blocks from a TOML file of `[[events]]` tables, the way a
 * calendar export or sync job would leave them on disk.
 */
export class TomlCalendarSource implements CalendarSource {
  constructor(private readonly filePath: string | undefined) {}

  async fetchEvents(date: string): Promise<CalendarBlock[]> {
    if (!this.filePath) {
      throw new CalendarUnavailableError('No calendar configured. Set [calendar].events_file in config.toml.');
    }

    let rawText: string;
    try {
      rawText = await fs.readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      throw new CalendarUnavailableError(`Cannot read calendar file ${this.filePath}: ${errorMessage(err)}`);
    }

    let parsed: unknown;
    try {
      parsed = toml.parse(rawText);
    } catch (err: unknown) {
      throw new CalendarUnavailableError(`Failed to parse calendar file ${this.filePath}: ${errorMessage(err)}`);
    }

    const result = EventsFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CalendarUnavailableError(`Invalid calendar file ${this.filePath}: ${result.error.message}`);
    }

    const dayStart = parseDateKeyLocal(date).getTime();
    const dayEnd = parseDateKeyLocal(addDaysToKey(date, 1)).getTime();
    return result.data.events
      .filter((e) => e.start.getTime() >= dayStart && e.end.getTime() <= dayEnd)
      .map((e) => ({
        start: e.start,
        end: e.end,
        subject: e.subject,
        suggestedCategory: e.categories,
        allDay: e.all_day,
        outOfOffice: e.out_of_office,
      }))
      .sort((a, b) => a.start.getTime() - b.start.getTime());
  }
}
