import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SEVERITIES, isRuleId, type RuleId } from '@mapcheck/core';
import type { AnalyzerOptions, SeveritySetting } from '@mapcheck/analyzer';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const severitySchema = z.enum(SEVERITIES);

const severitySettingSchema = z.union([severitySchema, z.literal('off')]);

const patternListSchema = z.array(z.string().min(1));

export const analyzerSchema = z
  .object({
    rules: z
      .record(z.string(), severitySettingSchema)
      .superRefine((rules, ctx) => {
        for (const key of Object.keys(rules)) {
          if (!isRuleId(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `Unknown rule id: ${key}`,
              path: [key],
            });
          }
        }
      })
      .optional(),
    performanceWarnings: z.boolean().optional(),
    nullableWarnings: z.boolean().optional(),
    nonDeterministicSeverity: severitySchema.optional(),
    dependencyPatterns: z
      .object({
        dataAccess: patternListSchema.optional(),
        remote: patternListSchema.optional(),
        fileSystem: patternListSchema.optional(),
        service: patternListSchema.optional(),
      })
      .strict()
      .optional(),
    fuzzyMatch: z
      .object({
        maxDistance: z.number().int().min(0).max(10).optional(),
        maxLengthDifference: z.number().int().min(0).max(10).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .optional();

export type AnalyzerConfig = z.infer<typeof analyzerSchema>;

export const serverSchema = z
  .object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .optional();

export const unitEntrySchema = z
  .object({
    path: z.string().min(1),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    server: serverSchema,
    analyzer: analyzerSchema,
    units: z.array(unitEntrySchema).min(1),
  })
  .strict()
  .superRefine((value, ctx) => {
    const paths = new Set<string>();
    value.units.forEach((entry, i) => {
      if (paths.has(entry.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate unit path: ${entry.path}`,
          path: ['units', i, 'path'],
        });
      }
      paths.add(entry.path);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadedConfig {
  config: ConfigFile;
  /** Absolute path of the config file; unit paths resolve against its directory */
  path: string;
}

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid mapcheck config:\n${issues}`;
}

/**
 * Validate an already parsed config value
 */
export function parseConfig(input: unknown): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(input));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${reason}`);
  }

  return { config: parseConfig(parsed), path: absolutePath };
}

/**
 * Analyzer options from the validated `analyzer` section
 */
export function toAnalyzerOptions(config: AnalyzerConfig): AnalyzerOptions {
  if (!config) return {};

  const rules: Partial<Record<RuleId, SeveritySetting>> = {};
  for (const [key, setting] of Object.entries(config.rules ?? {})) {
    if (isRuleId(key)) rules[key] = setting;
  }

  return {
    rules,
    ...(config.performanceWarnings !== undefined ? { performanceWarnings: config.performanceWarnings } : {}),
    ...(config.nullableWarnings !== undefined ? { nullableWarnings: config.nullableWarnings } : {}),
    ...(config.nonDeterministicSeverity ? { nonDeterministicSeverity: config.nonDeterministicSeverity } : {}),
    ...(config.dependencyPatterns ? { dependencyPatterns: config.dependencyPatterns } : {}),
    ...(config.fuzzyMatch ? { fuzzyMatch: config.fuzzyMatch } : {}),
  };
}
