import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConnectorError, recordSchemaSchema, type RecordSchema } from '@cqlsink/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
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

    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Missing required environment variable: ${name}`,
      suggestion: `Export ${name} or write \${${name}:-default} in the config file.`,
    });
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON value
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

/** Setting values may be written as JSON numbers or booleans; the sink reads strings */
const settingValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict()
  .optional();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    topics: z
      .array(z.string().regex(/^[a-zA-Z0-9._-]+$/, 'Topic names may only contain letters, digits, ".", "_" and "-"'))
      .min(1),
    settings: z.record(settingValueSchema),
    /** Column types per `keyspace.table`, enabling field type checks */
    columns: z.record(z.record(z.string().min(1))).optional(),
    logging: loggingSchema,
  })
  .strict()
  .superRefine((value, ctx) => {
    const topics = new Set<string>();
    for (let i = 0; i < value.topics.length; i++) {
      const topic = value.topics[i];
      if (topic === undefined) continue;
      if (topics.has(topic)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate topic: ${topic}`,
          path: ['topics', i],
        });
      }
      topics.add(topic);
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const absolutePath = resolve(process.cwd(), filePath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  try {
    return JSON.parse(sanitized) as unknown;
  } catch (error) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export function parseConfigFile(raw: unknown, label = 'Invalid config file'): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw));
  if (!result.success) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodError(label, result.error),
    });
  }
  return result.data;
}

export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  return parseConfigFile(await readJsonFile(configPath), `Invalid config file ${configPath}`);
}

export async function loadRecordSchema(schemaPath: string): Promise<RecordSchema> {
  const result = recordSchemaSchema.safeParse(await readJsonFile(schemaPath));
  if (!result.success) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodError(`Invalid record schema ${schemaPath}`, result.error),
    });
  }
  return result.data;
}
