import * as path from 'path';
import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env';
import { logger } from './observability/logger';
import { ClassifierError, ValidationError } from './errors';
import { PromptStore } from './prompt/prompt-store';
import { registerPromptRoutes } from './prompt/prompt-routes';
import { HybridClassifier } from './classification/hybrid-classifier';
import { UncertainResolver } from './classification/types';
import { registerClassifyRoutes } from './classification/classify-routes';
import { buildProvider } from './llm/provider-factory';
import { LLMProvider } from './llm/types';
import { LLMUncertainResolver } from './llm/uncertain-resolver';
import { registerHealthRoutes } from './health/health-routes';

export interface BuildAppOptions {
  /** Defaults to the prompt file under DATA_DIR */
  promptStore?: PromptStore;
  /** Defaults to the OpenAI provider when OPENAI_API_KEY is set */
  provider?: LLMProvider;
  /** Replaces the LLM resolver entirely (the provider is then only health-checked) */
  resolver?: UncertainResolver;
}

export interface AppContext {
  app: FastifyInstance;
  promptStore: PromptStore;
  classifier: HybridClassifier;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  // Register CORS
  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT'],
  });

  // JSON bodies; an empty body is treated as absent rather than a parse error
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    const text = typeof body === 'string' ? body : body.toString('utf-8');
    if (!text.trim()) {
      done(null, undefined);
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch (err) {
      done(new ValidationError('Request body is not valid JSON', { cause: err }), undefined);
    }
  });

  // Framework-level failures (parsing, body limit) in the same shape as route errors
  app.setErrorHandler((err, req, reply) => {
    const statusCode = err instanceof ClassifierError ? err.statusCode : err.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err, method: req.method, url: req.url }, 'Request failed');
      return reply.status(500).send({ error: 'Internal server error' });
    }
    logger.warn({ method: req.method, url: req.url, reason: err.message }, 'Request rejected');
    return reply.status(statusCode).send({ error: err instanceof ClassifierError ? err.message : 'Invalid request' });
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    logger.debug({
      method: req.method,
      route: req.routeOptions?.url ?? req.url,
      statusCode: reply.statusCode,
      elapsedMs: Math.round(reply.elapsedTime),
    }, 'Request completed');
    done();
  });

  // ───── Prompt store ─────
  const promptStore = options.promptStore
    ?? PromptStore.open(path.join(env.storage.dataDir, env.storage.promptFile));

  // ───── LLM fallback ─────
  const provider = options.provider ?? (options.resolver ? undefined : buildProvider(env));
  const resolver = options.resolver ?? new LLMUncertainResolver(provider, {
    temperature: env.openai.temperature,
    maxTokens: env.openai.maxTokens,
  });

  const classifier = new HybridClassifier(promptStore, resolver);

  // ───── Routes ─────
  registerHealthRoutes(app, promptStore, provider);
  registerClassifyRoutes(app, classifier);
  registerPromptRoutes(app, promptStore);

  logger.info({
    promptFile: promptStore.filePath,
    llmProvider: provider?.name ?? 'none',
    llmModel: provider?.model,
  }, 'Bio classifier initialized');

  return { app, promptStore, classifier };
}
