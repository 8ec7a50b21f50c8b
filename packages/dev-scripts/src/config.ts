/**
 * Configuration schema and loading.
 *
 * Sources, lowest precedence first: schema defaults, environment variables,
 * command-line `--key=value` options.
 */

import { z } from 'zod';
import { SIGNAL_KINDS } from '@monowedge/signals';
import type { Logger } from '@monowedge/logger';

export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  run: z
    .object({
      samples: z.coerce.number().int().positive().default(1000),
      window: z.coerce.number().positive().finite().default(20),
      seed: z.coerce.number().int().nonnegative().default(1),
      signal: z.enum(SIGNAL_KINDS).default('white'),
      direction: z.enum(['min', 'max']).default('max'),
      keys: z.enum(['dense', 'sparse']).default('dense'),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type RunConfig = Config['run'];

type ConfigPath = `${keyof Config}.${string}`;

/**
 * Environment variable to config path.
 */
export const envMapping: Record<string, ConfigPath> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  WEDGE_SAMPLES: 'run.samples',
  WEDGE_WINDOW: 'run.window',
  WEDGE_SEED: 'run.seed',
  WEDGE_SIGNAL: 'run.signal',
  WEDGE_DIRECTION: 'run.direction',
  WEDGE_KEYS: 'run.keys',
};

/**
 * Command-line option name to config path.
 */
export const optionMapping: Record<string, ConfigPath> = {
  'log-level': 'logging.level',
  'log-format': 'logging.format',
  'log-file': 'logging.filePath',
  samples: 'run.samples',
  window: 'run.window',
  seed: 'run.seed',
  signal: 'run.signal',
  direction: 'run.direction',
  keys: 'run.keys',
};

/**
 * Invalid configuration. `issues` lists every failing path.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface LoadConfigOptions {
  /** @default process.env */
  env?: Record<string, string | undefined>;
  /** Parsed `--key=value` options */
  options?: Record<string, string>;
  /** Options this command reads on top of the config, e.g. `windows` */
  extraOptions?: readonly string[];
  logger?: Logger;
}

type RawConfig = Record<string, Record<string, string>>;

function setPath(raw: RawConfig, path: ConfigPath, value: string): void {
  const [section, field] = path.split('.');
  if (section === undefined || field === undefined) {
    return;
  }
  const target = raw[section] ?? {};
  target[field] = value;
  raw[section] = target;
}

/**
 * Load configuration from environment, options and defaults.
 *
 * @throws ConfigError if an option is unknown or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, options: cliOptions = {}, extraOptions = [], logger } = options;
  const raw: RawConfig = {};
  const issues: string[] = [];

  for (const [envKey, path] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setPath(raw, path, value);
    }
  }

  for (const [name, value] of Object.entries(cliOptions)) {
    const path = optionMapping[name];
    if (path !== undefined) {
      setPath(raw, path, value);
    } else if (!extraOptions.includes(name)) {
      issues.push(`--${name}: Unknown option`);
    }
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    issues.push(...result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  if (!result.success || issues.length > 0) {
    throw new ConfigError(issues);
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    run: { ...config.run },
  };
}
