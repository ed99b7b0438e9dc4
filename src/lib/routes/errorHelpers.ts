import type { FastifyReply } from 'fastify';
import type { SummaryErrorResponse } from './summaryErrorMap.js';

export const sendError = (reply: FastifyReply, { status, code, message }: SummaryErrorResponse) =>
  reply.status(status).send({
    error: {
      code,
      message,
    },
  });
