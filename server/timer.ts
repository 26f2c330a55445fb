import type { Registries } from '../types';
import type { TimeLogStore } from './db';
import type { ConsoleIO } from './commands';
import { formatEntry } from '../shared/format';
import { finishTimer, startTimer } from '../shared/timer';

export type TimerContext = {
  store: TimeLogStore;
  registries: Registries;
  defaultCategory: number;
  defaultAccount: string;
  io: ConsoleIO;
  now: () => Date;
};

export async function runTimerStart(ctx: TimerContext, line: string): Promise<void> {
  const timer = await ctx.store.startTimer(startTimer(line, { registries: ctx.registries }, ctx.now()));
  const category = timer.category === undefined ? undefined : ctx.registries.categories.get(timer.category);
  const account = timer.account === undefined ? undefined : ctx.registries.accounts.get(timer.account);
  ctx.io.print(`Started timer at ${new Date(timer.startTs).toLocaleString()}`);
  ctx.io.print(
    `Category: ${category ?? 'default'}. Account: ${account ?? 'default'}. Comment: ${timer.comment}`
  );
}

/**
 * Stops the latest running timer. The entry is shown first and only saved
 * once confirmed; `delete` drops the timer, anything else leaves it running.
 */
export async function runTimerStop(ctx: TimerContext, line: string): Promise<void> {
  const timer = await ctx.store.openTimer();
  if (!timer) {
    ctx.io.print('No timer is running. Use --start to start one.');
    return;
  }

  const entry = finishTimer(
    timer,
    line,
    {
      registries: ctx.registries,
      defaultCategory: ctx.defaultCategory,
      defaultAccount: ctx.defaultAccount,
    },
    ctx.now()
  );
  ctx.io.print('The following entry will be saved:');
  ctx.io.print(formatEntry(entry, ctx.registries));

  const answer = (await ctx.io.prompt("Enter 'y' to confirm, 'delete' to discard the timer, anything else to keep it running: "))
    ?.trim()
    .toLowerCase();
  if (answer === 'y') {
    await ctx.store.closeTimer(timer.id, entry, ctx.registries);
    ctx.io.print('Saved.');
  } else if (answer === 'delete') {
    await ctx.store.discardTimer(timer.id);
    ctx.io.print('Timer discarded.');
  } else {
    ctx.io.print('Timer left running.');
  }
}
