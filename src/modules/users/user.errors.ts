/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its failure semantics.
 * - The service returns these as values (UserOutcome); nothing here is thrown.
 *
 * RULES:
 * - Keep shapes aligned with UserFailure in user.types.ts.
 */

import type { FieldError } from '../../shared/http/field-errors';
import type { UserFailure, UserId, UserOutcome } from './user.types';

export const UserErrors = {
  notFound(id: UserId): UserFailure {
    return { kind: 'NOT_FOUND', id };
  },

  invalid(errors: FieldError[]): UserFailure {
    return { kind: 'INVALID', errors };
  },

  duplicateId(id: UserId): UserFailure {
    return { kind: 'DUPLICATE_ID', id };
  },

  idMismatch(routeId: UserId, bodyId: UserId): UserFailure {
    return {
      kind: 'INVALID',
      errors: [
        {
          propertyName: 'id',
          errorMessage: `Id ${bodyId} does not match route id ${routeId}`,
        },
      ],
    };
  },
} as const;

export function ok<T>(value: T): UserOutcome<T> {
  return { ok: true, value };
}

export function fail(failure: UserFailure): UserOutcome<never> {
  return { ok: false, failure };
}
