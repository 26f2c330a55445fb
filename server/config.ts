import fs from 'fs/promises';
import path from 'path';
import toml from '@iarna/toml';
import { z } from 'zod';
import type { Registries } from '../types';

const ConfigSchema = z
  .object({
    general: z.object({
      default_category: z.coerce.number().int().nonnegative(),
      default_account: z.string().min(1),
      max_entry_duration: z.coerce.number().positive().default(9),
      deep_work_category: z.string().min(1).default('Deep Work'),
      deep_work_goal: z.coerce.number().nonnegative().default(300),
    }),
    categories: z.record(z.string()),
    accounts: z.record(z.string()),
    incidental: z
      .object({
        accounts: z.array(z.string().length(1)).default([]),
      })
      .default({}),
    calendar: z
      .object({
        events_file: z.string().min(1).optional(),
        include_all_day: z.boolean().default(false),
        include_out_of_office: z.boolean().default(false),
        skip_event_names: z.array(z.string()).default([]),
      })
      .default({}),
    postgres: z.object({
      host: z.string().min(1),
      port: z.coerce.number().int().positive().default(5432),
      user: z.string().min(1),
      password: z.string().default(''),
      database: z.string().min(1),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (Object.keys(cfg.categories).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'at least one category is required',
        path: ['categories'],
      });
    }
    if (Object.keys(cfg.accounts).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'at least one account is required',
        path: ['accounts'],
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema> & { sourceFile: string };

export type SessionSettings = {
  registries: Registries;
  defaultCategory: number;
  defaultAccount: string;
};

export function defaultConfigPath(): string {
  return process.env.HOURBOOK_CONFIG || path.join(process.cwd(), 'config.toml');
}

function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export async function loadConfig(configPath = defaultConfigPath()): Promise<AppConfig> {
  let rawText: string;
  try {
    rawText = await fs.readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new Error(
        `Failed to read config file at ${configPath}: file not found. Please copy config.toml.example to config.toml and edit the values.`
      );
    }
    throw new Error(`Failed to read config file at ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(rawText);
  } catch (err: unknown) {
    throw new Error(`Failed to parse TOML config at ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config file ${configPath}: ${result.error.message}`);
  }

  return { ...result.data, sourceFile: configPath };
}

/**
 * Builds the category and account registries, skipping keys that could not be
 * typed on an entry line, and checks the defaults against them.
 */
export function resolveSessionSettings(
  config: AppConfig,
  warn: (message: string) => void = console.warn
): SessionSettings {
  const categories = new Map<number, string>();
  for (const [key, name] of Object.entries(config.categories)) {
    if (!/^\d+$/.test(key)) {
      warn(`Warning: Skipped category key ${key} in ${config.sourceFile}: not an integer.`);
      continue;
    }
    categories.set(Number(key), name);
  }

  const accounts = new Map<string, string>();
  for (const [key, name] of Object.entries(config.accounts)) {
    if (key.length !== 1) {
      warn(`Warning: Skipped account key ${key} in ${config.sourceFile}: len > 1.`);
      continue;
    }
    if (/\d/.test(key)) {
      warn(`Warning: Skipped account key ${key} in ${config.sourceFile}: digit.`);
      continue;
    }
    accounts.set(key.toLowerCase(), name);
  }

  const [firstCategory] = categories.keys();
  const [firstAccount] = accounts.keys();
  if (firstCategory === undefined || firstAccount === undefined) {
    throw new Error(`Config file ${config.sourceFile} has no usable categories or accounts.`);
  }

  let defaultCategory = config.general.default_category;
  if (!categories.has(defaultCategory)) {
    warn(`Warning: Default category ${defaultCategory} not found in ${config.sourceFile}; using ${firstCategory}.`);
    defaultCategory = firstCategory;
  }

  let defaultAccount = config.general.default_account.toLowerCase();
  if (!accounts.has(defaultAccount)) {
    warn(`Warning: Default account '${defaultAccount}' not found in ${config.sourceFile}; using '${firstAccount}'.`);
    defaultAccount = firstAccount;
  }

  return { registries: { categories, accounts }, defaultCategory, defaultAccount };
}

export function resolveEventsFile(config: AppConfig): string | undefined {
  const file = config.calendar.events_file;
  if (!file) return undefined;
  return path.resolve(path.dirname(config.sourceFile), file);
}
