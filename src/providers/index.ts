/**
 * Providers Module - collaborator transport
 */

export { AIProvider, ANTHROPIC_MODELS } from './AIProvider';
export type { ProviderName, ModelInfo, QueryOptions, Message, CompletionResult, ProviderConfig } from './AIProvider';

export { AnthropicProvider, createAnthropicProvider } from './AnthropicProvider';
