import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { PromptStore } from './prompt-store';
import { DEFAULT_PROMPT } from './default-prompt';
import { ValidationError } from '../errors';
import { childLogger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { sendError } from '../http/send-error';

function readPromptField(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'prompt' in body && typeof body.prompt === 'string') {
    return body.prompt;
  }
  throw new ValidationError('prompt must be a non-empty string');
}

export function registerPromptRoutes(app: FastifyInstance, store: PromptStore): void {
  /** Current prompt (saved value, or the built-in default) */
  app.get('/prompt', async (_req, reply) => {
    return reply.send({ prompt: store.getPrompt(), isDefault: store.isDefault() });
  });

  /** Built-in default, for review before a reset */
  app.get('/prompt/default', async (_req, reply) => {
    return reply.send({ prompt: DEFAULT_PROMPT });
  });

  /** Replace and persist the prompt */
  app.put('/prompt', async (req: FastifyRequest, reply: FastifyReply) => {
    const log = childLogger(createTraceContext().requestId, { route: 'PUT /prompt' });

    try {
      const saved = store.setPrompt(readPromptField(req.body));
      return reply.send({ prompt: saved });
    } catch (err) {
      return sendError(reply, err, log);
    }
  });

  /** Restore and persist the built-in default */
  app.post('/prompt/reset', async (_req, reply) => {
    const log = childLogger(createTraceContext().requestId, { route: 'POST /prompt/reset' });

    try {
      return reply.send({ prompt: store.resetPrompt() });
    } catch (err) {
      return sendError(reply, err, log);
    }
  });
}
