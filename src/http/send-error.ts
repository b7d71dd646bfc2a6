import { FastifyReply } from 'fastify';
import pino from 'pino';
import { ClassifierError } from '../errors';

/** Reply with a typed error's status and public message; anything else is a 500. */
export function sendError(reply: FastifyReply, err: unknown, log: pino.Logger): FastifyReply {
  if (err instanceof ClassifierError) {
    if (err.statusCode >= 500) {
      log.error({ err }, err.message);
    } else {
      log.warn({ reason: err.message }, 'Request rejected');
    }
    return reply.status(err.statusCode).send({ error: err.message });
  }

  log.error({ err }, 'Unhandled route error');
  return reply.status(500).send({ error: 'Internal server error' });
}
