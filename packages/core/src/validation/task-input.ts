/**
 * Request-body validation shared by create and update.
 */

import { z, type ZodError } from 'zod';
import type { TaskDraft } from '../types/task.js';
import type { FieldError } from '../types/results.js';

export const TITLE_MIN_LENGTH = 3;
export const TITLE_MAX_LENGTH = 120;
export const DESCRIPTION_MAX_LENGTH = 2000;

export const TITLE_REQUIRED = 'Title is required';
export const TITLE_NOT_TEXT = 'Title must be text';
export const TITLE_LENGTH = `Title must be between ${TITLE_MIN_LENGTH} and ${TITLE_MAX_LENGTH} characters`;
export const DESCRIPTION_NOT_TEXT = 'Description must be text';
export const DESCRIPTION_TOO_LONG = `Description must not exceed ${DESCRIPTION_MAX_LENGTH} characters`;
export const COMPLETED_NOT_BOOLEAN = 'Completed must be true or false';

const titleSchema = z
  .string({ required_error: TITLE_REQUIRED, invalid_type_error: TITLE_NOT_TEXT })
  .superRefine((title, ctx) => {
    if (title.trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: TITLE_REQUIRED });
    } else if (title.length < TITLE_MIN_LENGTH || title.length > TITLE_MAX_LENGTH) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: TITLE_LENGTH });
    }
  });

export const taskDraftSchema = z.object({
  title: titleSchema,
  description: z
    .string({ invalid_type_error: DESCRIPTION_NOT_TEXT })
    .max(DESCRIPTION_MAX_LENGTH, DESCRIPTION_TOO_LONG)
    .nullish(),
  completed: z.boolean({ invalid_type_error: COMPLETED_NOT_BOOLEAN }).nullish(),
});

export type ValidationOutcome =
  | { readonly ok: true; readonly value: TaskDraft }
  | { readonly ok: false; readonly errors: readonly FieldError[] };

/** Convert zod issues to field errors, keeping only the first issue per field */
export function toFieldErrors(error: ZodError): FieldError[] {
  const seen = new Set<string>();
  const errors: FieldError[] = [];
  for (const issue of error.issues) {
    const field = issue.path.join('.') || 'body';
    if (seen.has(field)) continue;
    seen.add(field);
    errors.push({ field, message: issue.message });
  }
  return errors;
}

export function validateTaskDraft(input: unknown): ValidationOutcome {
  const parsed = taskDraftSchema.safeParse(input);
  if (!parsed.success) return { ok: false, errors: toFieldErrors(parsed.error) };
  return { ok: true, value: parsed.data };
}
