/**
 * src/modules/users/user.validator.ts
 *
 * WHY:
 * - Field-level rules for a user, applied on create and replace only.
 * - Returns errors as data; the service decides what a failure means.
 */

import type { FieldError } from '../../shared/http/field-errors';
import { issuesToFieldErrors } from '../../shared/http/field-errors';
import { userRulesSchema } from './user.schemas';
import type { User } from './user.types';

export function validateUser(user: User): FieldError[] {
  const parsed = userRulesSchema.safeParse({ name: user.name, email: user.email });
  if (parsed.success) return [];
  return issuesToFieldErrors(parsed.error.issues);
}
