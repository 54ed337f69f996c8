import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { formatZodIssues } from '@fieldport/core';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface EnvExpansionOptions {
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/** `${NAME}` or `${NAME:-fallback}` */
const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Substitute environment placeholders in every string of a parsed config.
 * Unresolved variables are reported together, each with the key that uses it.
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  const missing: string[] = [];
  const expanded = substitute(value, options?.env ?? process.env, [], missing);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing environment variables:\n${missing.map((entry) => `- ${entry}`).join('\n')}`
    );
  }
  return expanded;
}

function substitute(
  value: unknown,
  env: NodeJS.ProcessEnv,
  path: readonly string[],
  missing: string[]
): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (placeholder: string, name: string, fallback?: string) => {
      const fromEnv = env[name];
      if (fromEnv !== undefined && fromEnv !== '') return fromEnv;
      if (fallback !== undefined) return fallback;
      missing.push(`${name} (${path.length ? path.join('.') : 'top level'})`);
      return placeholder;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => substitute(item, env, [...path, String(index)], missing));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substitute(item, env, [...path, key], missing)])
    );
  }
  return value;
}

const orgSchema = z
  .object({
    orgId: z.string().min(1),
    accessToken: z.string().min(1),
    baseUrl: z.string().url().optional(),
  })
  .strict();

export const retriesSchema = z
  .object({
    attempts: z.number().int().min(1).max(10).optional(),
    baseDelayMs: z.number().int().min(0).optional(),
    maxDelayMs: z.number().int().min(0).optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    environment: z.enum(['dev', 'qa', 'prod']).default('prod'),
    source: orgSchema,
    target: orgSchema,
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
    retries: retriesSchema.optional(),
    dryRun: z.boolean().default(false),
    rebuildSources: z.boolean().default(false),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  return formatZodIssues('Invalid config file', err);
}

/**
 * Validate an already parsed config value
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized) as unknown;
  } catch (err) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseConfig(parsed, options);
}
