/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Two layers:
 *   - request shape (this file's *Shape/*Params/*Query schemas): types only
 *   - field rules (userRulesSchema): what makes a user valid, used by user.validator.ts
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Page/pageSize are only checked as 32-bit integers; the store slices whatever it gets.
 */

import { z } from 'zod';

// Ids and paging values are 32-bit signed integers.
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function int32(label: string) {
  const rangeMessage = `${label} must be between ${INT32_MIN} and ${INT32_MAX}`;
  return z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be an integer` })
    .int(`${label} must be an integer`)
    .min(INT32_MIN, rangeMessage)
    .max(INT32_MAX, rangeMessage);
}

// Route/query values arrive as strings; only plain decimal digits are accepted
// (no hex, exponent, or surrounding whitespace).
const INTEGER_STRING = /^-?\d+$/;

function int32String(label: string) {
  return z
    .string({ invalid_type_error: `${label} must be an integer` })
    .regex(INTEGER_STRING, `${label} must be an integer`)
    .pipe(z.coerce.number().pipe(int32(label)));
}

// Surrounding whitespace is stripped here, so the store only ever sees trimmed values.
export const userBodySchema = z.object({
  id: int32('Id'),
  name: z
    .string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
    .trim(),
  email: z
    .string({
      required_error: 'Email is required',
      invalid_type_error: 'Email must be a string',
    })
    .trim(),
});

export type UserBodyInput = z.infer<typeof userBodySchema>;

export const userIdParamsSchema = z.object({
  id: int32String('Id'),
});

export type UserIdParams = z.infer<typeof userIdParamsSchema>;

export function buildListUsersQuerySchema(defaultPageSize: number) {
  return z.object({
    page: int32String('Page').default('1'),
    pageSize: int32String('PageSize').default(String(defaultPageSize)),
  });
}

export type ListUsersQuery = z.infer<ReturnType<typeof buildListUsersQuerySchema>>;

// Only one email error is reported: the format check runs only when the value is non-empty.
// Email is checked as given; request bodies are trimmed before they get here.
export const userRulesSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  email: z
    .string()
    .min(1, 'Email is required')
    .pipe(z.string().email('Email must be a valid email address')),
});
