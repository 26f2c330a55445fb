export interface TimeEntry {
  date: string; // ISO Date String YYYY-MM-DD
  duration: number; // hours
  category: number;
  account: string; // single lower-case character
  comment: string;
  startTs?: string; // set when the entry came from a calendar block
  endTs?: string;
}

export interface StoredTimeEntry extends TimeEntry {
  id: string;
  sessionId: string;
  categoryName: string;
  accountName: string;
}

export interface Registries {
  categories: ReadonlyMap<number, string>;
  accounts: ReadonlyMap<string, string>;
}

export interface SessionState {
  activeDate: string;
  defaultCategory: number;
  defaultAccount: string;
  entries: TimeEntry[];
}

export interface CalendarBlock {
  start: Date;
  end: Date;
  subject: string;
  suggestedCategory?: string;
  allDay: boolean;
  outOfOffice: boolean;
}

export interface DateRange {
  start?: string; // inclusive, YYYY-MM-DD
  end?: string;
}

export type DefaultKind = 'category' | 'account';

export type EditableField = 'duration' | 'category' | 'account' | 'comment';

// A timed activity that has been started but not yet stopped.
export interface PendingTimer {
  startTs: string;
  category?: number;
  account?: string;
  comment: string;
}

export interface OpenTimer extends PendingTimer {
  id: string;
}
