import fs from 'fs/promises';
import path from 'path';
import type { CalendarBlock, Registries, SessionState } from '../types';
import type { CalendarSource } from './calendar';
import type { TimeLogStore } from './db';
import { weekBounds } from '../shared/dateKey';
import {
  CalendarUnavailableError,
  SessionError,
  StorageError,
  InputError,
  errorMessage,
} from '../shared/errors';
import { ledgerToCsv } from '../shared/exportCsv';
import { renderTsv } from '../shared/exportTsv';
import {
  formatDeepWork,
  formatEntry,
  formatHours,
  formatPreview,
  formatRegistries,
  formatTimecard,
} from '../shared/format';
import { reconcile, type ReconcileOptions } from '../shared/reconcile';
import { summarizeDeepWork, summarizeWeek } from '../shared/reports';
import { parseScaleTarget, scaleEntries } from '../shared/scale';
import {
  addEntry,
  clearEntries,
  commit,
  editEntry,
  isEditableField,
  preview,
  removeEntry,
  setDate,
  setDefault,
  totalDuration,
  undoLast,
} from '../shared/session';
import { isNumberToken, splitTokens } from '../shared/tokenizer';

export type ConsoleIO = {
  print(text: string): void;
  /** Resolves to null once input has ended. */
  prompt(question: string): Promise<string | null>;
};

export type ConsoleSettings = {
  maxDuration: number;
  incidentalAccounts: string[];
  deepWorkCategory: string;
  deepWorkGoal: number;
  calendar: ReconcileOptions;
};

export type ConsoleContext = {
  state: SessionState;
  registries: Registries;
  settings: ConsoleSettings;
  store: TimeLogStore;
  calendar: CalendarSource;
  io: ConsoleIO;
  today: () => string;
};

export type Command = {
  name: string;
  aliases: string[];
  usage: string;
  summary: string;
  run(ctx: ConsoleContext, args: string[]): Promise<void> | void;
};

export type LineResult = 'continue' | 'quit';

function parseIndex(value: string | undefined): number {
  if (!value || !/^\d+$/.test(value)) {
    throw new InputError(`Expected an entry number, got "${value ?? ''}".`);
  }
  return Number(value);
}

async function runReconcile(ctx: ConsoleContext): Promise<void> {
  let blocks: CalendarBlock[];
  try {
    blocks = await ctx.calendar.fetchEvents(ctx.state.activeDate);
  } catch (err: unknown) {
    if (err instanceof CalendarUnavailableError) {
      ctx.io.print(`Calendar unavailable: ${err.message}`);
      ctx.io.print(`No calendar blocks found for ${ctx.state.activeDate}.`);
      return;
    }
    throw err;
  }

  const pass = reconcile(ctx.state, blocks, {
    registries: ctx.registries,
    maxDuration: ctx.settings.maxDuration,
    ...ctx.settings.calendar,
  });
  let step = pass.next('');
  if (step.done) {
    ctx.io.print(`No calendar blocks found for ${ctx.state.activeDate}.`);
    return;
  }

  ctx.io.print(`Found ${step.value.pending} events for ${ctx.state.activeDate}. Enter to accept, 0 to skip, q to stop.`);
  while (!step.done) {
    const { candidate, state, error, position, pending } = step.value;
    if (error) ctx.io.print(`Error: ${error.message}`);
    const categoryName = ctx.registries.categories.get(candidate.category) ?? String(candidate.category);
    const answer = await ctx.io.prompt(
      `[${position}/${pending}] ${candidate.comment}\n${categoryName} - ${formatHours(candidate.duration)} hr > `
    );
    if (answer === null || ['q', 'quit'].includes(answer.trim().toLowerCase())) {
      ctx.state = state;
      ctx.io.print('Calendar pass stopped.');
      return;
    }
    step = pass.next(answer);
  }
  ctx.state = step.value;
  const { entries, total } = preview(ctx.state);
  ctx.io.print(formatPreview(entries, total, ctx.registries));
}

export const COMMANDS: Command[] = [
  {
    name: 'help',
    aliases: ['h'],
    usage: 'help [command]',
    summary: 'Show commands, or details for one command.',
    run(ctx, args) {
      const [name] = args;
      if (name) {
        const cmd = findCommand(name);
        if (!cmd) throw new InputError(`Unknown command "${name}".`);
        ctx.io.print(`${cmd.usage}\n  ${cmd.summary}`);
        return;
      }
      ctx.io.print('Enter time as: <hours> [category] [account] [comment...]');
      for (const cmd of COMMANDS) {
        ctx.io.print(`  ${[cmd.name, ...cmd.aliases].join(', ').padEnd(22)}${cmd.summary}`);
      }
    },
  },
  {
    name: 'list',
    aliases: ['ls'],
    usage: 'list',
    summary: 'Show category and account codes.',
    run(ctx) {
      ctx.io.print(formatRegistries(ctx.registries));
    },
  },
  {
    name: 'date',
    aliases: ['d'],
    usage: 'date [-<days> | YYYY-MM-DD]',
    summary: 'Set the date for new entries (no argument: today).',
    run(ctx, args) {
      ctx.state = setDate(ctx.state, args.join(' '), ctx.today());
      ctx.io.print(`Date set to ${ctx.state.activeDate}`);
    },
  },
  {
    name: 'default',
    aliases: ['def'],
    usage: 'default <category|account> <key>',
    summary: 'Change the default category or account.',
    run(ctx, args) {
      const [kind, value = ''] = args;
      if (kind !== 'category' && kind !== 'account') {
        throw new InputError('Usage: default <category|account> <key>');
      }
      ctx.state = setDefault(ctx.state, kind, value, ctx.registries);
      ctx.io.print(
        kind === 'category'
          ? `Default category set to ${ctx.registries.categories.get(ctx.state.defaultCategory)}`
          : `Default account set to ${ctx.registries.accounts.get(ctx.state.defaultAccount)}`
      );
    },
  },
  {
    name: 'preview',
    aliases: ['p'],
    usage: 'preview',
    summary: 'Show the entries entered so far.',
    run(ctx) {
      const { entries, total } = preview(ctx.state);
      ctx.io.print(formatPreview(entries, total, ctx.registries));
    },
  },
  {
    name: 'remove',
    aliases: ['rm'],
    usage: 'remove <n>',
    summary: 'Remove entry n (as numbered in preview).',
    run(ctx, args) {
      ctx.state = removeEntry(ctx.state, parseIndex(args[0]));
    },
  },
  {
    name: 'edit',
    aliases: ['e'],
    usage: 'edit <n> <duration|category|account|comment> <value...>',
    summary: 'Change one field of entry n.',
    run(ctx, args) {
      const [index, field = '', ...value] = args;
      if (!isEditableField(field)) {
        throw new InputError(`Cannot edit "${field}"; choose duration, category, account or comment.`);
      }
      const i = parseIndex(index);
      ctx.state = editEntry(ctx.state, i, field, value.join(' '), {
        registries: ctx.registries,
        maxDuration: ctx.settings.maxDuration,
      });
      ctx.io.print(formatEntry(ctx.state.entries[i - 1], ctx.registries));
    },
  },
  {
    name: 'undo',
    aliases: ['u', 'z'],
    usage: 'undo',
    summary: 'Remove the last entry.',
    run(ctx) {
      ctx.state = undoLast(ctx.state);
    },
  },
  {
    name: 'clear',
    aliases: [],
    usage: 'clear',
    summary: 'Delete every uncommitted entry.',
    run(ctx) {
      ctx.state = clearEntries(ctx.state);
    },
  },
  {
    name: 'scale',
    aliases: ['s'],
    usage: 'scale <hours>',
    summary: 'Scale all entries so they total <hours>.',
    run(ctx, args) {
      const target = parseScaleTarget(args[0]);
      const before = totalDuration(ctx.state.entries);
      ctx.state = scaleEntries(ctx.state, target);
      ctx.io.print(`Scaled from ${formatHours(before)} hours to ${formatHours(target)} hours.`);
    },
  },
  {
    name: 'reconcile',
    aliases: ['cal', 'o'],
    usage: 'reconcile',
    summary: 'Walk through calendar events for the active date.',
    run: runReconcile,
  },
  {
    name: 'commit',
    aliases: ['c', 'write'],
    usage: 'commit',
    summary: 'Save entries to the database and clear them.',
    async run(ctx) {
      const count = ctx.state.entries.length;
      ctx.state = await commit(ctx.state, ctx.store, ctx.registries);
      ctx.io.print(`Committed ${count} entries.`);
    },
  },
  {
    name: 'tsv',
    aliases: ['copy'],
    usage: 'tsv',
    summary: 'Print entries as tab-separated values.',
    run(ctx) {
      if (ctx.state.entries.length === 0) {
        ctx.io.print('No time has been entered.');
        return;
      }
      ctx.io.print(renderTsv(ctx.state.entries, ctx.registries).trimEnd());
    },
  },
  {
    name: 'timecard',
    aliases: ['tc'],
    usage: 'timecard',
    summary: 'Show totals by account for the week of the active date.',
    async run(ctx) {
      const week = weekBounds(ctx.state.activeDate);
      const stored = await ctx.store.query(week);
      if (stored.length === 0) {
        ctx.io.print('No time entered for this week.');
        return;
      }
      ctx.io.print(`Week of ${week.start} to ${week.end}`);
      ctx.io.print(formatTimecard(summarizeWeek(stored, ctx.settings.incidentalAccounts)));
    },
  },
  {
    name: 'deepwork',
    aliases: ['dw'],
    usage: 'deepwork',
    summary: 'Show deep work hours against the goal.',
    async run(ctx) {
      const stored = await ctx.store.query({});
      const summary = summarizeDeepWork(stored, {
        categoryName: ctx.settings.deepWorkCategory,
        today: ctx.today(),
        goal: ctx.settings.deepWorkGoal,
      });
      ctx.io.print(formatDeepWork(summary));
    },
  },
  {
    name: 'export',
    aliases: [],
    usage: 'export [file.csv]',
    summary: 'Write every stored entry to a CSV file.',
    async run(ctx, args) {
      const target = path.resolve(args[0] ?? 'hourbook_export.csv');
      const stored = await ctx.store.query({});
      if (stored.length === 0) {
        ctx.io.print('No data to export.');
        return;
      }
      try {
        await fs.writeFile(target, `${ledgerToCsv(stored)}\n`, 'utf-8');
      } catch (err: unknown) {
        throw new StorageError(`Cannot write ${target}: ${errorMessage(err)}`, err);
      }
      ctx.io.print(`Exported ${stored.length} rows to ${target}.`);
    },
  },
  {
    name: 'quit',
    aliases: ['q'],
    usage: 'quit',
    summary: 'Exit; uncommitted entries are discarded.',
    run() {
      // handled by handleLine
    },
  },
];

export function findCommand(name: string): Command | undefined {
  return COMMANDS.find((cmd) => cmd.name === name || cmd.aliases.includes(name));
}

/**
 * Runs one line of input. Lines starting with a number are time entries;
 * anything else is a command. Recoverable errors are printed and leave the
 * session as it was.
 */
export async function handleLine(ctx: ConsoleContext, line: string): Promise<LineResult> {
  const [head, ...args] = splitTokens(line);
  if (head === undefined) return 'continue';

  try {
    if (isNumberToken(head)) {
      const before = ctx.state.entries.length;
      ctx.state = addEntry(ctx.state, line, { registries: ctx.registries, maxDuration: ctx.settings.maxDuration });
      if (ctx.state.entries.length > before) {
        ctx.io.print(formatEntry(ctx.state.entries[ctx.state.entries.length - 1], ctx.registries));
      }
      return 'continue';
    }

    const cmd = findCommand(head);
    if (!cmd) {
      ctx.io.print("Command not recognized. Type 'help' for help or 'quit' to quit.");
      return 'continue';
    }
    if (cmd.name === 'quit') {
      if (ctx.state.entries.length > 0) {
        ctx.io.print(`Discarding ${ctx.state.entries.length} uncommitted entries.`);
      }
      return 'quit';
    }
    await cmd.run(ctx, args);
  } catch (err: unknown) {
    if (err instanceof SessionError || err instanceof StorageError || err instanceof CalendarUnavailableError) {
      ctx.io.print(`Error: ${errorMessage(err)}`);
      return 'continue';
    }
    throw err;
  }
  return 'continue';
}

export async function runConsole(ctx: ConsoleContext): Promise<void> {
  for (;;) {
    const line = await ctx.io.prompt('>> ');
    if (line === null) return;
    if ((await handleLine(ctx, line)) === 'quit') return;
  }
}
