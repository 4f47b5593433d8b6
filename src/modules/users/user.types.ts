/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are plain value records; the store never hands out its own references.
 *
 * RULES:
 * - Ids are client-supplied integers.
 * - Replacement is wholesale (PUT); there is no partial update.
 */

import type { FieldError } from '../../shared/http/field-errors';

export type UserId = number;

export type User = {
  readonly id: UserId;
  readonly name: string;
  readonly email: string;
};

export type UserPage = {
  page: number;
  pageSize: number;
};

// ── Service outcomes ──────────────────────────────────────────

export type UserFailure =
  | { kind: 'NOT_FOUND'; id: UserId }
  | { kind: 'INVALID'; errors: FieldError[] }
  | { kind: 'DUPLICATE_ID'; id: UserId };

export type UserOutcome<T> = { ok: true; value: T } | { ok: false; failure: UserFailure };
