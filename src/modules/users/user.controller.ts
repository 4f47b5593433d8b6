/**
 * src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the /users endpoints.
 * - Parses params/query/body with Zod and maps service outcomes to responses.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - Expected failures never throw: 400 field errors, 404 empty, 409 problem.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { issuesToFieldErrors } from '../../shared/http/field-errors';
import { buildProblem, sendProblem } from '../../shared/http/problem';
import type { UserService } from './user.service';
import type { UserFailure } from './user.types';
import { buildListUsersQuerySchema, userBodySchema, userIdParamsSchema } from './user.schemas';

export function userLocation(id: number): string {
  return `/users/${id}`;
}

function sendFailure(reply: FastifyReply, failure: UserFailure) {
  switch (failure.kind) {
    case 'NOT_FOUND':
      return reply.status(404).send();
    case 'INVALID':
      return reply.status(400).send(failure.errors);
    case 'DUPLICATE_ID':
      return sendProblem(
        reply,
        buildProblem(409, `A user with id ${failure.id} already exists`),
      );
  }
}

export class UserController {
  private readonly listQuerySchema: ReturnType<typeof buildListUsersQuerySchema>;

  constructor(
    private readonly userService: UserService,
    opts: { defaultPageSize: number },
  ) {
    this.listQuerySchema = buildListUsersQuerySchema(opts.defaultPageSize);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const parsed = this.listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.status(400).send(issuesToFieldErrors(parsed.error.issues));
    }

    const users = await this.userService.listUsers(parsed.data);
    return reply.status(200).send(users);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(issuesToFieldErrors(params.error.issues));
    }

    const result = await this.userService.getUser(params.data.id);
    if (!result.ok) return sendFailure(reply, result.failure);

    return reply.status(200).send(result.value);
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const body = userBodySchema.safeParse(req.body);
    if (!body.success) {
      return reply.status(400).send(issuesToFieldErrors(body.error.issues));
    }

    const result = await this.userService.createUser(body.data);
    if (!result.ok) return sendFailure(reply, result.failure);

    return reply.status(201).header('location', userLocation(result.value.id)).send(result.value);
  }

  async replace(req: FastifyRequest, reply: FastifyReply) {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(issuesToFieldErrors(params.error.issues));
    }

    const body = userBodySchema.safeParse(req.body);
    if (!body.success) {
      return reply.status(400).send(issuesToFieldErrors(body.error.issues));
    }

    const result = await this.userService.replaceUser(params.data.id, body.data);
    if (!result.ok) return sendFailure(reply, result.failure);

    return reply.status(204).send();
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(issuesToFieldErrors(params.error.issues));
    }

    const result = await this.userService.deleteUser(params.data.id);
    if (!result.ok) return sendFailure(reply, result.failure);

    return reply.status(204).send();
  }
}
