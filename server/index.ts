import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { loadConfig, defaultConfigPath, resolveEventsFile, resolveSessionSettings } from './config';
import { createPool, initSchema, PgTimeLogStore } from './db';
import { TomlCalendarSource } from './calendar';
import { runConsole, type ConsoleContext, type ConsoleIO } from './commands';
import { runTimerStart, runTimerStop } from './timer';
import { formatDateKeyLocal } from '../shared/dateKey';
import { createSession, setDate } from '../shared/session';
import { SessionError, StorageError } from '../shared/errors';

const APP_VERSION = '0.1.0';

function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

// Everything after --start or --end is the timer's entry line.
function argsAfter(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv.slice(i + 1).join(' ') : undefined;
}

function createTerminalIO(rl: readline.Interface, signal: AbortSignal): ConsoleIO {
  return {
    print: (text) => console.log(text),
    async prompt(question) {
      if (signal.aborted) return null;
      try {
        return await rl.question(question, { signal });
      } catch (err: unknown) {
        if (signal.aborted) return null;
        throw err;
      }
    },
  };
}

async function main() {
  const config = await loadConfig(argValue('--config') ?? defaultConfigPath());
  const settings = resolveSessionSettings(config);

  const pool = createPool(config);
  try {
    await initSchema(pool);
  } catch (err: unknown) {
    await pool.end();
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === '3D000') {
      throw new Error(
        `Postgres database "${config.postgres.database}" does not exist. Create it (e.g. createdb -h ${config.postgres.host} -p ${config.postgres.port} -U ${config.postgres.user} ${config.postgres.database}) or update [postgres].database in config.toml to an existing database.`
      );
    }
    throw err;
  }

  const rl = readline.createInterface({ input, output });
  const closed = new AbortController();
  rl.on('close', () => closed.abort());
  const io = createTerminalIO(rl, closed.signal);
  const store = new PgTimeLogStore(pool, { appVersion: APP_VERSION });

  try {
    const timerStart = argsAfter('--start');
    const timerEnd = argsAfter('--end');
    if (timerStart !== undefined || timerEnd !== undefined) {
      const timerCtx = { store, io, now: () => new Date(), ...settings };
      try {
        if (timerStart !== undefined) await runTimerStart(timerCtx, timerStart);
        else await runTimerStop(timerCtx, timerEnd ?? '');
      } catch (err: unknown) {
        if (!(err instanceof SessionError || err instanceof StorageError)) throw err;
        console.error(`Error: ${err.message}`);
        process.exitCode = 1;
      }
      return;
    }

    const today = () => formatDateKeyLocal(new Date());
    let state = createSession({ today: today(), ...settings });
    const dateArg = argValue('--date');
    if (dateArg) state = setDate(state, dateArg, today());

    const ctx: ConsoleContext = {
      state,
      registries: settings.registries,
      settings: {
        maxDuration: config.general.max_entry_duration,
        incidentalAccounts: config.incidental.accounts,
        deepWorkCategory: config.general.deep_work_category,
        deepWorkGoal: config.general.deep_work_goal,
        calendar: {
          includeAllDay: config.calendar.include_all_day,
          includeOutOfOffice: config.calendar.include_out_of_office,
          skipEventNames: config.calendar.skip_event_names,
        },
      },
      store,
      calendar: new TomlCalendarSource(resolveEventsFile(config)),
      io,
      today,
    };

    console.log(`Welcome to hourbook ${APP_VERSION}. Date is ${state.activeDate}. Type 'help' for commands.`);
    await runConsole(ctx);
  } finally {
    rl.close();
    await pool.end();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
