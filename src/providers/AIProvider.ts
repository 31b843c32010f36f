/**
 * AIProvider - provider abstraction for the collaborator transport
 *
 * Every collaborator (code generation, debugging, fix advice, setup plans) is
 * one system prompt + one user prompt in, one text completion out.
 */

// ==================== TYPES ====================

export type ProviderName = 'anthropic';

export interface ModelInfo {
  id: string;
  name: string;
  maxOutputTokens: number;
}

export interface QueryOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

export interface Message {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionResult {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length';
  latencyMs: number;
}

export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  timeout?: number;
  maxRetries?: number;
}

// ==================== ABSTRACT PROVIDER ====================

export abstract class AIProvider {
  abstract readonly name: ProviderName;
  abstract readonly models: ModelInfo[];

  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = {
      timeout: 120000,
      maxRetries: 3,
      ...config,
    };
  }

  /**
   * Complete a prompt (non-streaming)
   */
  abstract complete(messages: Message[], options?: QueryOptions): Promise<CompletionResult>;

  /**
   * Output-token ceiling for a model; unknown models get the smallest known one
   */
  maxOutputTokens(modelId: string): number {
    const known = this.models.find((m) => m.id === modelId);
    return known ? known.maxOutputTokens : Math.min(...this.models.map((m) => m.maxOutputTokens));
  }
}

// ==================== MODEL DEFINITIONS ====================

export const ANTHROPIC_MODELS: ModelInfo[] = [
  { id: 'claude-sonnet-4-20250514', name: 'Claude Sonnet 4', maxOutputTokens: 16000 },
  { id: 'claude-3-5-haiku-20241022', name: 'Claude 3.5 Haiku', maxOutputTokens: 8192 },
];
