import { FeedbackField } from './types';

export interface FeedbackInput {
  name?: unknown;
  email?: unknown;
  message?: unknown;
}

export interface TrimmedSubmission {
  name: string;
  email: string;
  message: string;
}

export type ValidationResult =
  | { valid: true; submission: TrimmedSubmission }
  | { valid: false; missingFields: FeedbackField[] };

const REQUIRED_FIELDS: FeedbackField[] = ['name', 'email', 'message'];

function trimField(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Trims the three contact form fields and reports any that are empty.
 * The email is only checked for presence, not format.
 */
export function validateSubmission(input: FeedbackInput): ValidationResult {
  const submission: TrimmedSubmission = {
    name: trimField(input.name),
    email: trimField(input.email),
    message: trimField(input.message)
  };

  const missingFields = REQUIRED_FIELDS.filter(field => submission[field] === '');
  if (missingFields.length > 0) {
    return { valid: false, missingFields };
  }

  return { valid: true, submission };
}
