import pino from 'pino';
import { quickCheck } from './keyword-classifier';
import { ClassifyOptions, Label, UncertainResolver } from './types';
import { PromptSource } from '../prompt/types';
import { ValidationError } from '../errors';
import { logger } from '../observability/logger';
import { TraceContext, createTraceContext, endSpan, startSpan } from '../observability/trace';

/**
 * Two-stage bio classifier.
 *
 * 1. Keyword stage on every bio (pure, no I/O).
 * 2. Bios left `uncertain` go to the LLM in a single batch. Any failure of
 *    that stage, or a bio the reply does not label, resolves to "no".
 *
 * Output is always one label per input bio, in input order.
 */
export class HybridClassifier {
  private log = logger.child({ component: 'hybrid-classifier' });

  constructor(
    private readonly prompts: PromptSource,
    private readonly resolver: UncertainResolver,
  ) {}

  async classify(bios: readonly string[], options: ClassifyOptions = {}): Promise<Label[]> {
    if (!Array.isArray(bios) || bios.length === 0) {
      throw new ValidationError('bios must be a non-empty array of strings');
    }
    if (bios.some((bio) => typeof bio !== 'string')) {
      throw new ValidationError('bios must be a non-empty array of strings');
    }

    const trace = createTraceContext({ requestId: options.requestId });
    const log = this.log.child({ requestId: trace.requestId });

    const keywordSpan = startSpan(trace, 'keyword_stage', { bios: bios.length });
    const verdicts = bios.map((bio) => quickCheck(bio));
    endSpan(keywordSpan);

    const labels = verdicts.map((v): Label => (v === 'uncertain' ? 'no' : v));
    const uncertain: number[] = [];
    verdicts.forEach((v, i) => {
      if (v === 'uncertain') uncertain.push(i);
    });

    if (uncertain.length === 0) {
      log.debug({ bios: bios.length }, 'All bios decided by keywords');
      return labels;
    }

    log.info({
      decided: bios.length - uncertain.length,
      uncertain: uncertain.length,
    }, 'Sending uncertain bios to LLM');

    // Read once: a concurrent prompt update does not affect this call
    const prompt = options.prompt?.trim() || this.prompts.getPrompt();
    const resolved = await this.resolveOrDefault(uncertain.map((i) => bios[i]), prompt, trace, log);

    uncertain.forEach((index, i) => {
      labels[index] = resolved[i] ?? 'no';
    });
    return labels;
  }

  private async resolveOrDefault(
    bios: string[],
    prompt: string,
    trace: TraceContext,
    log: pino.Logger,
  ): Promise<Array<Label | null>> {
    const span = startSpan(trace, 'llm_stage', { bios: bios.length });
    const unresolved = (): Array<Label | null> => new Array<Label | null>(bios.length).fill(null);

    let result: Array<Label | null>;
    try {
      result = await this.resolver.resolveUncertain(bios, prompt, trace.requestId);
    } catch (err) {
      const durationMs = endSpan(span, 'error');
      log.warn({ err, durationMs, uncertain: bios.length }, 'LLM stage failed; labelling uncertain bios "no"');
      return unresolved();
    }

    if (result.length !== bios.length) {
      const durationMs = endSpan(span, 'error');
      log.warn({ expected: bios.length, received: result.length, durationMs }, 'LLM label count mismatch; labelling uncertain bios "no"');
      return unresolved();
    }

    const durationMs = endSpan(span);
    const missing = result.filter((label) => label === null).length;
    if (missing > 0) {
      log.warn({ missing, durationMs }, 'LLM reply left bios unlabelled; defaulting them to "no"');
    } else {
      log.info({ durationMs }, 'LLM stage resolved all uncertain bios');
    }
    return result;
  }
}
