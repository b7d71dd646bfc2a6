import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import Ajv, { ErrorObject, JSONSchemaType } from 'ajv';
import { HybridClassifier } from './hybrid-classifier';
import { childLogger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { sendError } from '../http/send-error';

interface ClassifyBody {
  bios: string[];
  /** Per-request prompt override, never persisted */
  prompt?: string;
}

const ajv = new Ajv({ allErrors: true });

const classifyBodySchema: JSONSchemaType<ClassifyBody> = {
  type: 'object',
  properties: {
    bios: { type: 'array', items: { type: 'string' }, minItems: 1 },
    prompt: { type: 'string', pattern: '\\S', nullable: true },
  },
  required: ['bios'],
  additionalProperties: true,
};

const validateClassifyBody = ajv.compile(classifyBodySchema);

function describeInvalidBody(errors: ErrorObject[] | null | undefined): string {
  const promptErrors = (errors ?? []).filter((e) => e.instancePath.startsWith('/prompt'));
  if (promptErrors.length > 0 && promptErrors.length === (errors ?? []).length) {
    return 'prompt must be a non-empty string';
  }
  return 'bios must be a non-empty array of strings';
}

export function registerClassifyRoutes(app: FastifyInstance, classifier: HybridClassifier): void {
  /** Classify a batch of bios; always one "yes"/"no" per bio, in order */
  app.post('/classify', async (req: FastifyRequest, reply: FastifyReply) => {
    const trace = createTraceContext();
    const log = childLogger(trace.requestId, { route: '/classify' });

    const body: unknown = req.body;
    if (!validateClassifyBody(body)) {
      const error = describeInvalidBody(validateClassifyBody.errors);
      log.warn({ reason: ajv.errorsText(validateClassifyBody.errors) }, 'Invalid classify request');
      return reply.status(400).send({ error });
    }

    try {
      const results = await classifier.classify(body.bios, {
        prompt: body.prompt ?? undefined,
        requestId: trace.requestId,
      });
      log.info({
        bios: body.bios.length,
        yes: results.filter((r) => r === 'yes').length,
        promptOverride: body.prompt != null,
      }, 'Classified bios');
      return reply.send({ results });
    } catch (err) {
      return sendError(reply, err, log);
    }
  });
}
