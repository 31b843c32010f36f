/**
 * LLMClient - JSON-in-free-text transport used by every collaborator
 *
 * One system prompt + one user prompt → one parsed JSON value.
 * Returns null when no provider is configured; collaborators treat that the
 * same way as a malformed response and take their fallback.
 */

import { AIProvider, createAnthropicProvider } from '../../providers';
import { AppConfig } from '../../config/AppConfig';
import { JSONExtractor } from '../../utils/JSONExtractor';
import { LLMError, getErrorMessage } from '../../utils/errorUtils';
import { Logger } from '../../utils/logger';

/**
 * Shape every collaborator depends on
 */
export type JsonCollaborator = (systemPrompt: string, userPrompt: string) => Promise<unknown | null>;

export interface LLMClientOptions {
  provider?: AIProvider | null;
  model?: string;
  maxTokens?: number;
}

export class LLMClient {
  private readonly provider: AIProvider | null;
  private readonly model: string;
  private readonly maxTokens: number | undefined;

  constructor(options: LLMClientOptions = {}) {
    this.provider = options.provider !== undefined ? options.provider : LLMClient.defaultProvider();
    this.model = options.model ?? AppConfig.anthropic.model;
    this.maxTokens = options.maxTokens;
  }

  private static defaultProvider(): AIProvider | null {
    if (!AppConfig.anthropic.isConfigured) {
      return null;
    }
    return createAnthropicProvider({
      apiKey: AppConfig.anthropic.apiKey,
      defaultModel: AppConfig.anthropic.model,
    });
  }

  get isConfigured(): boolean {
    return this.provider !== null;
  }

  /**
   * @throws LLMError on transport failure or when the reply holds no JSON
   */
  async generateJson(systemPrompt: string, userPrompt: string): Promise<unknown | null> {
    if (!this.provider) {
      Logger.debug('[LLMClient] No provider configured, skipping request');
      return null;
    }

    let content: string;
    try {
      const result = await this.provider.complete([{ role: 'user', content: userPrompt }], {
        systemPrompt,
        model: this.model,
        ...(this.maxTokens !== undefined ? { maxTokens: this.maxTokens } : {}),
      });
      content = result.content;
      Logger.debug('[LLMClient] Completion received', {
        model: result.model,
        tokens: result.usage.totalTokens,
        latencyMs: result.latencyMs,
      });
    } catch (error) {
      throw new LLMError(getErrorMessage(error));
    }

    const extraction = JSONExtractor.extract(content);
    if (!extraction.success) {
      throw new LLMError(extraction.error, content);
    }
    return extraction.data;
  }

  /**
   * Bound `generateJson` for injection into collaborators
   */
  asCollaborator(): JsonCollaborator {
    return (systemPrompt, userPrompt) => this.generateJson(systemPrompt, userPrompt);
  }
}
