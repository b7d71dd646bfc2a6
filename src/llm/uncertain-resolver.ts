import { LLMCompletionResponse, LLMProvider } from './types';
import { Label, UncertainResolver } from '../classification/types';
import { parseNumberedLabels } from '../classification/response-parser';
import { ANSWER_FORMAT, BIOS_PLACEHOLDER } from '../prompt/default-prompt';
import { AIServiceError } from '../errors';
import { logger } from '../observability/logger';

export interface ResolverOptions {
  temperature: number;
  maxTokens: number;
}

/** "1) first bio\n2) second bio", one bio per line */
export function formatBioList(bios: readonly string[]): string {
  return bios.map((bio, i) => `${i + 1}) ${bio.replace(/\s+/g, ' ').trim()}`).join('\n');
}

/**
 * Insert the numbered list at the `{{bios}}` placeholder, or append it after
 * a blank line when the prompt has none. The answer format always closes the
 * request.
 */
export function renderClassificationRequest(prompt: string, bios: readonly string[]): string {
  const list = formatBioList(bios);
  const body = prompt.includes(BIOS_PLACEHOLDER)
    ? prompt.split(BIOS_PLACEHOLDER).join(list)
    : `${prompt}\n\n${list}`;
  return `${body}\n\n${ANSWER_FORMAT}`;
}

/**
 * LLM fallback for bios the keyword stage could not decide: one completion
 * per batch, reply parsed by number.
 */
export class LLMUncertainResolver implements UncertainResolver {
  private log = logger.child({ component: 'uncertain-resolver' });

  constructor(
    private readonly provider: LLMProvider | undefined,
    private readonly options: ResolverOptions,
  ) {}

  async resolveUncertain(bios: readonly string[], prompt: string, requestId?: string): Promise<Array<Label | null>> {
    if (!this.provider) {
      throw new AIServiceError('No LLM provider configured');
    }

    let response: LLMCompletionResponse;
    try {
      response = await this.provider.complete({
        messages: [{ role: 'user', content: renderClassificationRequest(prompt, bios) }],
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new AIServiceError(`LLM request failed: ${reason}`, { cause: err });
    }

    this.log.info({
      requestId,
      provider: response.provider,
      model: response.model,
      latencyMs: response.latencyMs,
      totalTokens: response.usage.totalTokens,
      bios: bios.length,
    }, 'LLM classification completed');

    return parseNumberedLabels(response.content, bios.length);
  }
}
