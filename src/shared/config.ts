import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getListwatchDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { DEFAULT_TIME_ZONE, isValidTimeZone } from '../scan/freshness.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  scan: z
    .object({
      quick_check_interval_sec: z.number().positive().default(60),
      min_interval_sec: z.number().positive().default(180),
      max_interval_sec: z.number().positive().default(900),
      backoff_factor: z.number().gt(1).default(1.5),
      max_age_minutes: z.number().positive().default(60),
      very_fresh_minutes: z.number().nonnegative().default(10),
      skip_first_n: z.number().int().nonnegative().default(2),
      max_items_per_scan: z.number().int().positive().default(13),
      max_parallel_sources: z.number().int().positive().default(2),
      page_timeout_ms: z.number().int().positive().default(45000),
      consecutive_stale_threshold: z.number().int().positive().default(3),
      max_pages: z.number().int().positive().default(1),
      timezone: z
        .string()
        .default(DEFAULT_TIME_ZONE)
        .refine(isValidTimeZone, { message: 'timezone must be an IANA zone name' }),
    })
    .default({})
    .refine((s) => s.quick_check_interval_sec <= s.max_interval_sec, {
      message: 'quick_check_interval_sec must not exceed max_interval_sec',
      path: ['quick_check_interval_sec'],
    })
    .refine((s) => s.min_interval_sec <= s.max_interval_sec, {
      message: 'min_interval_sec must not exceed max_interval_sec',
      path: ['min_interval_sec'],
    })
    .refine((s) => s.very_fresh_minutes <= s.max_age_minutes, {
      message: 'very_fresh_minutes must not exceed max_age_minutes',
      path: ['very_fresh_minutes'],
    }),

  fetch: z
    .object({
      user_agent: z
        .string()
        .default('Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) listwatch/0.1'),
      accept_language: z.string().default('pl-PL,pl;q=0.9,en;q=0.8'),
      detail_pages: z.boolean().default(false),
      detail_timeout_ms: z.number().int().positive().default(15000),
    })
    .default({}),

  store: z
    .object({
      retention_hours: z.number().positive().default(48),
      sweep_every_cycles: z.number().int().positive().default(20),
    })
    .default({}),

  delivery: z
    .object({
      send_delay_ms: z.number().int().nonnegative().default(2000),
      log: z
        .object({
          enabled: z.boolean().default(true),
        })
        .default({}),
      telegram: z
        .object({
          enabled: z.boolean().default(false),
          bot_token: z.string().default(''),
          chat_ids: z.array(z.string()).default([]),
          api_base: z.string().default('https://api.telegram.org'),
        })
        .default({}),
      email: z
        .object({
          enabled: z.boolean().default(false),
          smtp_host: z.string().default(''),
          smtp_port: z.number().default(587),
          smtp_user: z.string().default(''),
          smtp_pass: z.string().default(''),
          from: z.string().default('listwatch@localhost'),
          to: z.array(z.string()).default([]),
        })
        .default({}),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.listwatch/listwatch.db'),
    })
    .default({}),

  sources: z
    .array(
      z.object({
        url: z.string().url(),
        hashtag: z.string().optional(),
        title: z.string().optional(),
      }),
    )
    .default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScanConfig = Config['scan'];
export type DeliveryConfig = Config['delivery'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

/**
 * Apply LISTWATCH_* environment overrides on top of the raw file config.
 * Chat ids are comma-separated; blank entries are dropped.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const envToken = env['LISTWATCH_TELEGRAM_TOKEN'];
  const envChatIds = env['LISTWATCH_CHAT_IDS'];
  const envDbPath = env['LISTWATCH_DB'];

  if (envToken || envChatIds) {
    const delivery = asRecord(rawConfig['delivery']);
    const telegram = asRecord(delivery['telegram']);
    if (envToken) {
      telegram['bot_token'] = envToken;
      telegram['enabled'] = true;
    }
    if (envChatIds) {
      telegram['chat_ids'] = envChatIds
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0);
    }
    delivery['telegram'] = telegram;
    rawConfig['delivery'] = delivery;
  }

  if (envDbPath) {
    const db = asRecord(rawConfig['db']);
    db['path'] = envDbPath;
    rawConfig['db'] = db;
  }

  return rawConfig;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...(value as Record<string, unknown>) };
  }
  return {};
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('listwatch', {
    searchPlaces: [
      'listwatch.config.yaml',
      'listwatch.config.yml',
      '.listwatchrc.yaml',
      '.listwatchrc.yml',
    ],
  });

  const envConfigPath = process.env['LISTWATCH_CONFIG'];
  const defaultConfigPath = path.join(getListwatchDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const local = await explorer.search();
    if (local) {
      rawConfig = asRecord(local.config);
      logger.debug({ path: local.filepath }, 'Using project config');
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = asRecord(result?.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
