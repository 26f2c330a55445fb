import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { createPool, PgTimeLogStore } from '../server/db';
import { loadConfig } from '../server/config';
import { parseIsoDateKey } from '../shared/dateKey';
import type { DateRange } from '../types';

function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function readRange(): DateRange {
  const range: DateRange = {};
  for (const [flag, key] of [['--from', 'start'], ['--to', 'end']] as const) {
    const value = argValue(flag);
    if (value === undefined) continue;
    const date = parseIsoDateKey(value);
    if (!date) throw new Error(`${flag} expects a YYYY-MM-DD date, got "${value}".`);
    range[key] = date;
  }
  return range;
}

function describeRange(range: DateRange): string {
  if (range.start && range.end) return `from ${range.start} to ${range.end}`;
  if (range.start) return `from ${range.start} onwards`;
  if (range.end) return `up to ${range.end}`;
  return 'for ALL dates';
}

async function main() {
  const yes = process.argv.includes('--yes') || process.argv.includes('-y');
  const range = readRange();

  if (!yes) {
    const rl = readline.createInterface({ input, output });
    const answer = await rl.question(
      `This will DELETE time log entries ${describeRange(range)}. Type "DELETE" to continue: `
    );
    rl.close();
    if (answer.trim() !== 'DELETE') {
      console.log('Aborted.');
      process.exit(0);
    }
  }

  const config = await loadConfig(argValue('--config'));
  const pool = createPool(config);
  try {
    const store = new PgTimeLogStore(pool, { appVersion: 'script', inputType: 'script' });
    const deleted = await store.deleteRange(range);
    console.log(`Deleted ${deleted} time log entries ${describeRange(range)}.`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
