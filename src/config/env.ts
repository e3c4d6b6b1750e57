import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';

dotenv.config();

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const probabilitySchema = z.number().min(0).max(1);

const configSchema = z.object({
  defaultLeague: z.string().min(1),
  logLevel: logLevelSchema.default('info'),
  defaultDivineRate: z.number().positive().default(200),
  paths: z
    .object({
      cacheDir: z.string().default('cache'),
      databaseFile: z.string().default('data/historical_trades.db'),
    })
    .default({}),
  api: z.object({
    baseUrl: z.string().url(),
    tradeUrlBase: z.string().url().default('https://www.pathofexile.com/trade/exchange/'),
    itemBlacklist: z.array(z.string()).default([]),
    minimumListings: z.number().int().min(0).default(0),
    cacheTtlMinutes: z.number().positive().default(15),
    requestTimeoutMs: z.number().int().positive().default(15000),
  }),
  analysis: z
    .object({
      flipsPerHour: z.number().positive().default(120),
      riskThresholds: z.record(z.string(), z.number().min(0)).default({
        Low: 15,
        Medium: 50,
        High: 150,
        Extreme: 500,
      }),
      shoppingListToleranceChaos: z.number().min(0).default(2),
      jackpotsToDisplay: z.number().int().positive().default(5),
    })
    .default({}),
  strategies: z
    .object({
      gemCorruption: z
        .object({
          probabilities: z
            .object({
              levelUp: probabilitySchema.default(0.125),
              levelDown: probabilitySchema.default(0.125),
              qualityUp: probabilitySchema.default(0.25),
              noChange: probabilitySchema.default(0.25),
            })
            .refine(
              (p) => p.levelUp + p.levelDown + p.qualityUp + p.noChange <= 1 + 1e-9,
              'corruption outcome probabilities must not sum above 1',
            )
            .default({}),
          minProfit: z.number().default(10),
          maxResults: z.number().int().positive().default(15),
          excludedPrefixes: z.array(z.string()).default(['Awakened ']),
        })
        .default({}),
    })
    .default({}),
  alerts: z
    .object({
      discordWebhookUrl: z.string().default(''),
      dryRun: z.boolean().default(false),
      topResults: z.number().int().positive().default(5),
    })
    .default({}),
  scheduler: z
    .object({
      intervalMinutes: z.number().positive().default(60),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type AnalysisSettings = Config['analysis'];
export type GemCorruptionSettings = Config['strategies']['gemCorruption'];

type Env = Record<string, string | undefined>;

const isMapping = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const section = (doc: Record<string, unknown>, key: string): Record<string, unknown> => {
  const value = doc[key];
  return isMapping(value) ? { ...value } : {};
};

const applyEnvOverrides = (doc: Record<string, unknown>, env: Env): Record<string, unknown> => {
  const merged = { ...doc };
  if (env.POE_LEAGUE) merged.defaultLeague = env.POE_LEAGUE;
  if (env.LOG_LEVEL) merged.logLevel = env.LOG_LEVEL;

  if (env.CACHE_DIR || env.DATABASE_FILE) {
    const paths = section(doc, 'paths');
    if (env.CACHE_DIR) paths.cacheDir = env.CACHE_DIR;
    if (env.DATABASE_FILE) paths.databaseFile = env.DATABASE_FILE;
    merged.paths = paths;
  }

  if (env.DISCORD_WEBHOOK_URL !== undefined || env.DRY_RUN !== undefined) {
    const alerts = section(doc, 'alerts');
    if (env.DISCORD_WEBHOOK_URL !== undefined) alerts.discordWebhookUrl = env.DISCORD_WEBHOOK_URL;
    if (env.DRY_RUN !== undefined) alerts.dryRun = env.DRY_RUN === 'true';
    merged.alerts = alerts;
  }
  return merged;
};

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');

/** Parses an already-loaded document; exported for callers that build config in memory. */
export const parseConfig = (doc: unknown, env: Env = {}): Config => {
  if (!isMapping(doc)) {
    throw new ConfigError('Configuration file must contain a YAML mapping');
  }
  const result = configSchema.safeParse(applyEnvOverrides(doc, env));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
};

export const loadConfig = (
  configPath = process.env.CONFIG_PATH || path.join(process.cwd(), 'config.yaml'),
  env: Env = process.env,
): Config => {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(
        `Configuration file not found at '${configPath}'. Ensure config.yaml is in the project root.`,
        { cause: error },
      );
    }
    throw new ConfigError(`Could not read configuration file '${configPath}'`, { cause: error });
  }

  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in configuration file '${configPath}'`, { cause: error });
  }
  return parseConfig(doc, env);
};
