/**
 * Error Utilities
 *
 * Narrowing helpers for values caught from `catch (error)`.
 */

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Transport failure or a response with no usable JSON
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly rawOutput?: string
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

/**
 * architecture.json / majortasks.json missing or invalid
 */
export class ArtifactLoadError extends Error {
  constructor(
    public readonly artifactPath: string,
    public readonly reason: string
  ) {
    super(`Could not load ${artifactPath}: ${reason}`);
    this.name = 'ArtifactLoadError';
  }
}

/**
 * Operator input ended (EOF or closed stdin) while a prompt was waiting
 */
export class InputClosedError extends Error {
  constructor(public readonly prompt: string) {
    super(`Input closed while waiting for an answer to: ${prompt}`);
    this.name = 'InputClosedError';
  }
}
