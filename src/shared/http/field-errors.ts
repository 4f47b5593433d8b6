/**
 * src/shared/http/field-errors.ts
 *
 * WHY:
 * - Validation failures are returned to clients as a flat list of
 *   { propertyName, errorMessage } pairs, whatever produced them
 *   (body shape, route params, query, or business rules).
 */

import type { ZodIssue } from 'zod';

export type FieldError = {
  propertyName: string;
  errorMessage: string;
};

// Root-level issues (e.g. body is not an object) have an empty path.
const ROOT_PROPERTY = 'body';

export function issuesToFieldErrors(issues: readonly ZodIssue[]): FieldError[] {
  return issues.map((issue) => ({
    propertyName: issue.path.length > 0 ? issue.path.join('.') : ROOT_PROPERTY,
    errorMessage: issue.message,
  }));
}
