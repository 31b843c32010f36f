/**
 * LLMClient Tests
 */

import { AIProvider, ANTHROPIC_MODELS, CompletionResult, Message, QueryOptions } from '../../providers/AIProvider';
import { LLMError } from '../../utils/errorUtils';
import { LLMClient } from './LLMClient';

class FakeProvider extends AIProvider {
  readonly name = 'anthropic' as const;
  readonly models = ANTHROPIC_MODELS;
  readonly requests: Array<{ messages: Message[]; options?: QueryOptions }> = [];

  constructor(private readonly reply: string | Error) {
    super();
  }

  async complete(messages: Message[], options?: QueryOptions): Promise<CompletionResult> {
    this.requests.push({ messages, options });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return {
      content: this.reply,
      model: options?.model ?? 'fake',
      usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
      finishReason: 'stop',
      latencyMs: 1,
    };
  }
}

describe('LLMClient', () => {
  it('should return null when no provider is configured', async () => {
    const client = new LLMClient({ provider: null });
    expect(client.isConfigured).toBe(false);
    await expect(client.generateJson('system', 'user')).resolves.toBeNull();
  });

  it('should send the system prompt separately and extract JSON from the reply', async () => {
    const provider = new FakeProvider('Here you go:\n```json\n{"setup_commands": ["npm install"]}\n```');
    const client = new LLMClient({ provider, model: 'test-model' });

    await expect(client.generateJson('be precise', 'plan setup')).resolves.toEqual({ setup_commands: ['npm install'] });
    expect(provider.requests[0].messages).toEqual([{ role: 'user', content: 'plan setup' }]);
    expect(provider.requests[0].options).toEqual({ systemPrompt: 'be precise', model: 'test-model' });
  });

  it('should throw LLMError with the raw output when no JSON is found', async () => {
    const client = new LLMClient({ provider: new FakeProvider('I cannot help with that') });

    await expect(client.generateJson('s', 'u')).rejects.toMatchObject({
      name: 'LLMError',
      message: 'No JSON found in response',
      rawOutput: 'I cannot help with that',
    });
  });

  it('should wrap transport failures in LLMError', async () => {
    const client = new LLMClient({ provider: new FakeProvider(new Error('Anthropic API error: overloaded')) });

    await expect(client.generateJson('s', 'u')).rejects.toBeInstanceOf(LLMError);
  });

  it('should expose generateJson as a collaborator function', async () => {
    const collaborator = new LLMClient({ provider: new FakeProvider('{"a": 1}') }).asCollaborator();
    await expect(collaborator('s', 'u')).resolves.toEqual({ a: 1 });
  });
});

describe('AIProvider.maxOutputTokens', () => {
  it('should use the model ceiling and fall back to the smallest one', () => {
    const provider = new FakeProvider('{}');
    expect(provider.maxOutputTokens('claude-sonnet-4-20250514')).toBe(16000);
    expect(provider.maxOutputTokens('unknown-model')).toBe(8192);
  });
});
