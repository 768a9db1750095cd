/**
 * Crawler configuration: zod schema, defaults, and file loading
 */
import { z } from 'zod';
import { readFileSync } from 'fs';
import {
  DEFAULT_ROOT_URL,
  DEFAULT_ALLOWED_DOMAINS,
  DEFAULT_SKIP_EXTENSIONS,
  DEFAULT_SEED_PATHS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BACKOFF_UNIT_MS,
  DEFAULT_POLITENESS_DELAY_MS,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MIN_CONTENT_LENGTH,
  DEFAULT_CHECKPOINT_EVERY,
  DEFAULT_MAX_PAGES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_STATE_FILE,
  DEFAULT_USER_AGENT,
} from './constants.js';

// --- Zod validation schema ---

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL');

const extension = z
  .string()
  .regex(/^\.[a-z0-9]+$/i, 'must look like ".ext"')
  .transform((value) => value.toLowerCase());

export const CrawlerConfigSchema = z
  .object({
    rootUrl: httpUrl.default(DEFAULT_ROOT_URL),
    allowedDomains: z
      .array(z.string().min(1).transform((value) => value.toLowerCase()))
      .min(1)
      .default(DEFAULT_ALLOWED_DOMAINS),
    skipExtensions: z.array(extension).default(DEFAULT_SKIP_EXTENSIONS),
    excludePaths: z.array(z.string().min(1)).default([]),
    seedPaths: z.array(z.string().startsWith('/')).default(DEFAULT_SEED_PATHS),
    maxAttempts: z.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
    backoffUnitMs: z.number().int().nonnegative().default(DEFAULT_BACKOFF_UNIT_MS),
    politenessDelayMs: z.number().int().nonnegative().default(DEFAULT_POLITENESS_DELAY_MS),
    fetchTimeoutMs: z.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
    minContentLength: z.number().int().nonnegative().default(DEFAULT_MIN_CONTENT_LENGTH),
    checkpointEvery: z.number().int().positive().default(DEFAULT_CHECKPOINT_EVERY),
    maxPages: z.number().int().positive().default(DEFAULT_MAX_PAGES),
    outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    stateFile: z.string().min(1).default(DEFAULT_STATE_FILE),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  })
  .strict();

export type CrawlerConfig = z.output<typeof CrawlerConfigSchema>;
export type CrawlerConfigInput = z.input<typeof CrawlerConfigSchema>;

// --- Resolution ---

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/** Drop keys whose value is undefined so they do not mask lower-priority sources. */
function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Build a validated config from defaults and any number of override layers,
 * later layers winning. Throws listing every schema issue.
 */
export function resolveConfig(...layers: Array<Record<string, unknown>>): CrawlerConfig {
  const merged: Record<string, unknown> = Object.assign({}, ...layers.map(definedOnly));
  const result = CrawlerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid crawler config:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read a JSON config file. The file must hold a single object; its keys are
 * validated later by resolveConfig.
 */
export function readConfigFile(path: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Invalid crawler config:\n${path}: ${String(error)}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid crawler config:\n${path}: expected a JSON object`);
  }
  return { ...raw };
}

/**
 * Resolve the effective config: defaults, then the optional JSON file, then
 * explicit overrides (CLI flags).
 */
export function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): CrawlerConfig {
  const fileValues = configPath ? readConfigFile(configPath) : {};
  return resolveConfig(fileValues, overrides);
}

export const DEFAULT_CONFIG: CrawlerConfig = resolveConfig();
