import { z } from 'zod';

import { ValidationError } from '@core/errors/index.js';

const Text = z.string().trim().min(1, 'text required');

export const ProcessRequestSchema = z.object({
  text: Text,
  strictMode: z.boolean().optional(),
  failOnWarnings: z.boolean().optional(),
});

export const TextRequestSchema = z.object({ text: Text });

export const GenerateRequestSchema = z.object({
  text: Text,
  useFallbackValues: z.boolean().optional(),
  transformValues: z.boolean().optional(),
  strictMode: z.boolean().optional(),
});

export const TemplateListQuerySchema = z.object({
  category: z.string().min(1).optional(),
  q: z.string().min(1).optional(),
  tag: z.string().min(1).optional(),
});

/** Parses `input` or throws a 422 carrying the zod issues. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid request body',
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}
