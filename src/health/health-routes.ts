import { FastifyInstance } from 'fastify';
import { LLMProvider } from '../llm/types';
import { PromptStore } from '../prompt/prompt-store';

type CheckStatus = 'ok' | 'error' | 'skipped';

export function registerHealthRoutes(app: FastifyInstance, store: PromptStore, provider?: LLMProvider): void {
  /** Liveness probe — always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Readiness probe. The LLM is reported but never gates readiness:
   * without it uncertain bios are labelled "no" and /classify keeps working.
   */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: CheckStatus; latencyMs?: number }> = {};

    checks.prompt = { status: store.getPrompt().trim() ? 'ok' : 'error' };

    if (provider) {
      const start = Date.now();
      const healthy = await provider.healthCheck();
      checks[`llm_${provider.name}`] = { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start };
    } else {
      checks.llm = { status: 'skipped' };
    }

    const ready = checks.prompt.status === 'ok';
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
