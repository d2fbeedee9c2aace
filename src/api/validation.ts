import { z } from 'zod';
import type { Context } from 'hono';
import { ValidationError } from '../utils/errors.js';

function requiredInteger(message: string) {
  return z.number({
    errorMap: (issue, ctx) => {
      if (issue.code === 'invalid_type' && (issue.received === 'undefined' || issue.received === 'null')) {
        return { message };
      }
      return { message: ctx.defaultError };
    },
  }).int().safe();
}

// Body keys whose absence is reported with their own headline message
const IDENTIFIER_KEYS: ReadonlySet<string> = new Set(['user_id', 'content_id']);

const optionalText = z.string().nullable().optional();

// POST /api/users
export const UserUpsertRequestSchema = z.object({
  user_id: requiredInteger('User ID is required'),
  display_name: optionalText,
  name: z.string().optional(),
  bio: optionalText,
  location: optionalText,
  profile_pic_url: optionalText,
});

// POST /api/ais
export const AIUpsertRequestSchema = z.object({
  content_id: requiredInteger('Content ID is required'),
  profile_pic_url: optionalText,
});

export type UserUpsertRequest = z.infer<typeof UserUpsertRequestSchema>;
export type AIUpsertRequest = z.infer<typeof AIUpsertRequestSchema>;

function isMissing(issue: z.ZodIssue): boolean {
  return issue.code === 'invalid_type'
    && issue.path.length === 1
    && IDENTIFIER_KEYS.has(String(issue.path[0]))
    && (issue.received === 'undefined' || issue.received === 'null');
}

/**
 * Validate the JSON request body against a Zod schema.
 * Throws ValidationError; a missing required identifier becomes the headline message.
 */
export async function validateBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Invalid JSON body');
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const missing = result.error.issues.find(isMissing);
    throw new ValidationError(
      missing ? missing.message : 'Validation failed',
      result.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    );
  }
  return result.data;
}
