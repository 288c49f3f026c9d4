import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { CatalogUnavailableError } from '@core/errors/index.js';
import {
  HTTP_METHODS,
  RULE_FORMATS,
  RULE_TYPES,
  type FieldRule,
  type JsonValue,
} from '@core/interfaces/index.js';
import { logger } from '@utils/logger.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

function isValidRegExp(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const FieldRuleSchema = z
  .object({
    type: z.enum(RULE_TYPES).optional(),
    format: z.enum(RULE_FORMATS).optional(),
    pattern: z.string().refine(isValidRegExp, 'invalid regular expression').optional(),
    min_length: z.number().int().nonnegative().optional(),
    max_length: z.number().int().nonnegative().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    allowed_values: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    required: z.boolean().optional(),
  })
  .transform(
    (r): FieldRule => ({
      type: r.type,
      format: r.format,
      pattern: r.pattern,
      minLength: r.min_length,
      maxLength: r.max_length,
      min: r.min,
      max: r.max,
      allowedValues: r.allowed_values,
      required: r.required,
    }),
  );

const TemplateMetadataSchema = z.object({
  name: z.string().min(1).optional(),
  version: z
    .string()
    .regex(/^\d+(?:\.\d+)*$/, 'version must be dot-separated numbers')
    .default('1.0'),
  category: z.string().min(1).default('general'),
  description: z.string().default(''),
  required_entities: z.array(z.string().min(1)).default([]),
  optional_entities: z.array(z.string().min(1)).default([]),
  api_endpoint: z.string().min(1).optional(),
  http_method: z.enum(HTTP_METHODS).default('POST'),
  tags: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
});

export const TemplateFileSchema = z.object({
  template_metadata: TemplateMetadataSchema.default({}),
  template: JsonValueSchema,
  validation_rules: z.record(FieldRuleSchema).default({}),
});

export type TemplateFile = z.infer<typeof TemplateFileSchema>;

export interface LoadedTemplateFile {
  sourcePath: string;
  /** File name without extension; the template name when metadata omits one. */
  stem: string;
  raw: string;
  file: TemplateFile;
}

export interface TemplateLoadReport {
  loaded: LoadedTemplateFile[];
  rejected: { sourcePath: string; reason: string }[];
}

async function discover(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.') || entry.name.startsWith('_')) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await discover(full)));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(full);
    }
  }
  return files.sort();
}

export function parseTemplateFile(raw: string): TemplateFile {
  return TemplateFileSchema.parse(JSON.parse(raw));
}

/**
 * Reads every template definition below `dir`. Files that fail to parse are
 * reported and skipped; an unreadable directory is fatal.
 */
export async function loadTemplateFiles(dir: string): Promise<TemplateLoadReport> {
  const root = path.resolve(dir);
  let files: string[];
  try {
    files = await discover(root);
  } catch (err) {
    throw new CatalogUnavailableError(`Cannot read template directory ${root}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const report: TemplateLoadReport = { loaded: [], rejected: [] };
  for (const sourcePath of files) {
    try {
      const raw = await readFile(sourcePath, 'utf8');
      report.loaded.push({
        sourcePath,
        stem: path.basename(sourcePath, '.json'),
        raw,
        file: parseTemplateFile(raw),
      });
    } catch (err) {
      const reason =
        err instanceof z.ZodError
          ? err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
          : err instanceof Error
            ? err.message
            : String(err);
      logger.warn({ sourcePath, reason }, '[catalog] template file rejected');
      report.rejected.push({ sourcePath, reason });
    }
  }
  return report;
}
