// ─── Messages ─────────────────────────────────────────────────────
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai';

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Raw text from the model */
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  /** Which provider served the request */
  provider: LLMProviderName;
  /** Token usage for cost tracking */
  usage: LLMTokenUsage;
  /** Wall-clock latency in milliseconds */
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations must map our generic message format to provider-specific APIs.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /**
   * Lightweight connectivity check.
   * Returns true if the provider is reachable, false otherwise.
   */
  healthCheck(): Promise<boolean>;
}
