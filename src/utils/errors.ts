/**
 * Base error class for the watcher
 * Maintains context data that can be passed through the error chain
 */
export class WatcherError extends Error {
  public context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WatcherError';
    this.context = context;
  }

  /**
   * Enrich the error with additional context
   */
  public enrich(additionalContext: Record<string, unknown>): this {
    this.context = {
      ...this.context,
      ...additionalContext,
    };
    return this;
  }
}

export type NetworkFailureReason = 'timeout' | 'status' | 'connection' | 'empty-body';

export interface NetworkErrorContext extends Record<string, unknown> {
  url: string;
  reason: NetworkFailureReason;
  status?: number;
}

/**
 * Fatal failure while fetching the watched page
 */
export class NetworkError extends WatcherError {
  public readonly url: string;
  public readonly reason: NetworkFailureReason;
  public readonly status?: number;

  constructor(message: string, context: NetworkErrorContext, options?: ErrorOptions) {
    super(message, context, options);
    this.name = 'NetworkError';
    this.url = context.url;
    this.reason = context.reason;
    this.status = context.status;
  }
}

/**
 * Invalid environment or command-line configuration
 */
export class ConfigError extends WatcherError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'ConfigError';
  }
}

/**
 * Convert any error to a WatcherError
 */
export function toWatcherError(error: unknown, context: Record<string, unknown> = {}): WatcherError {
  if (error instanceof WatcherError) {
    return error.enrich(context);
  }

  return new WatcherError(
    error instanceof Error ? error.message : String(error),
    context,
    { cause: error }
  );
}
