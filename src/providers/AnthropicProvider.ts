/**
 * AnthropicProvider - Claude API implementation of the collaborator transport
 */

import Anthropic from '@anthropic-ai/sdk';
import { AIProvider, ProviderConfig, Message, QueryOptions, CompletionResult, ANTHROPIC_MODELS } from './AIProvider';
import { getErrorMessage } from '../utils/errorUtils';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

export class AnthropicProvider extends AIProvider {
  readonly name = 'anthropic' as const;
  readonly models = ANTHROPIC_MODELS;

  private client: Anthropic;

  constructor(config: ProviderConfig = {}) {
    super({
      defaultModel: DEFAULT_MODEL,
      ...config,
    });

    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: this.config.timeout,
      maxRetries: this.config.maxRetries,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  async complete(messages: Message[], options: QueryOptions = {}): Promise<CompletionResult> {
    const startTime = Date.now();
    const model = options.model || this.config.defaultModel || DEFAULT_MODEL;

    try {
      const response = await this.client.messages.create({
        model,
        max_tokens: options.maxTokens || this.maxOutputTokens(model),
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      });

      let content = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          content += block.text;
        }
      }

      const inputTokens = response.usage.input_tokens;
      const outputTokens = response.usage.output_tokens;

      return {
        content,
        model,
        usage: {
          inputTokens,
          outputTokens,
          totalTokens: inputTokens + outputTokens,
        },
        finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      throw new Error(`Anthropic API error: ${getErrorMessage(error)}`);
    }
  }
}

export function createAnthropicProvider(config?: ProviderConfig): AnthropicProvider {
  return new AnthropicProvider(config);
}
