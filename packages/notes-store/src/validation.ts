import { MAX_NOTE_BODY_LENGTH, ValidationError, type ValidationReason } from '@notekeep/shared';
import { z } from 'zod';

import type { NoteInput } from './types';

export function codePointLength(value: string): number {
  return Array.from(value).length;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * SQLite stops counting characters at a NUL, and an unpaired surrogate cannot
 * be encoded as UTF-8, so neither would be stored as written.
 */
export function isStorableText(value: string): boolean {
  return !value.includes('\u0000') && !LONE_SURROGATE.test(value);
}

function unstorableText(field: string) {
  return {
    message: `${field} contains a NUL character or an unpaired surrogate`,
    params: { reason: 'invalid_text' },
  };
}

const NoteInputSchema = z.object({
  title: z
    .string()
    .trim()
    .min(1, 'title must not be empty')
    .refine(isStorableText, unstorableText('title')),
  body: z
    .string()
    .trim()
    .min(1, 'body must not be empty')
    .refine(isStorableText, unstorableText('body'))
    .refine((body) => codePointLength(body) <= MAX_NOTE_BODY_LENGTH, {
      message: `body must be at most ${MAX_NOTE_BODY_LENGTH} characters`,
      params: { reason: 'too_long' },
    }),
});

function reasonFor(issue: z.ZodIssue | undefined): ValidationReason {
  if (issue?.code !== z.ZodIssueCode.custom) {
    return 'empty';
  }
  return issue.params?.reason === 'invalid_text' ? 'invalid_text' : 'too_long';
}

/**
 * Trims both fields and enforces the note invariants. Throws
 * `ValidationError` naming the first offending field.
 */
export function normalizeNoteInput(input: { title: unknown; body: unknown }): NoteInput {
  const result = NoteInputSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = typeof issue?.path[0] === 'string' ? issue.path[0] : 'note';
  throw new ValidationError(field, reasonFor(issue), issue?.message ?? 'invalid note', {
    cause: result.error,
  });
}

export function isNoteId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}
