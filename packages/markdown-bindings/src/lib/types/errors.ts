/**
 * Error Types
 *
 * Every failure raised by this package is one of the classes below, each with a
 * fixed `name` and the context needed to report it:
 * - UnboundNodeKindError: a binding was requested for a kind nobody registered
 * - BindingTableFrozenError: a binding was replaced after rendering started
 * - NodeRenderError: a binding threw while producing its template
 * - InvalidConfigurationError: a configuration value the library cannot use
 */

export class UnboundNodeKindError extends Error {
  constructor(public readonly kind: string) {
    super(`No binding registered for node kind "${kind}"`);
    this.name = 'UnboundNodeKindError';
  }
}

export class BindingTableFrozenError extends Error {
  constructor(public readonly kind: string) {
    super(`Cannot register a binding for "${kind}": the binding table is frozen`);
    this.name = 'BindingTableFrozenError';
  }
}

/**
 * Wraps whatever a binding threw. The render pass is abandoned and no partial
 * output is returned.
 */
export class NodeRenderError extends Error {
  constructor(
    public readonly kind: string,
    public readonly cause: Error
  ) {
    super(`Binding for node kind "${kind}" failed: ${cause.message}`);
    this.name = 'NodeRenderError';
  }
}

export class InvalidConfigurationError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Invalid configuration for "${field}": ${message}`);
    this.name = 'InvalidConfigurationError';
  }
}

export type MarkdownBindingsError =
  | UnboundNodeKindError
  | BindingTableFrozenError
  | NodeRenderError
  | InvalidConfigurationError;

export function isMarkdownBindingsError(error: unknown): error is MarkdownBindingsError {
  return (
    error instanceof UnboundNodeKindError ||
    error instanceof BindingTableFrozenError ||
    error instanceof NodeRenderError ||
    error instanceof InvalidConfigurationError
  );
}

/**
 * Convert an unknown thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return new Error(message);
    }
  }

  return new Error('Unknown error occurred');
}
