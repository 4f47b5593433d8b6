/**
 * src/shared/http/problem.ts
 *
 * WHY:
 * - One shape for every error body the service emits that is not a field-error list.
 * - Mirrors RFC 7807 "problem details" (title/status/detail).
 *
 * RULES:
 * - This file MUST stay small.
 * - Module-specific problems are built by the module controller (e.g. users/user.controller.ts).
 */

import type { FastifyReply } from 'fastify';

export const PROBLEM_CONTENT_TYPE = 'application/problem+json; charset=utf-8';

export type ProblemDetails = {
  title: string;
  status: number;
  detail: string;
};

const DEFAULT_TITLES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  500: 'An error occurred while processing your request.',
};

export function buildProblem(status: number, detail: string, title?: string): ProblemDetails {
  return {
    title: title ?? DEFAULT_TITLES[status] ?? 'Error',
    status,
    detail,
  };
}

export function sendProblem(reply: FastifyReply, problem: ProblemDetails) {
  return reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
}
