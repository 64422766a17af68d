/**
 * Structured error type for the unpublish pipeline.
 *
 * Callers branch on `kind`, never on the message text:
 * - TransportFault:     network or credential failure talking to the registry (aborts the registry phase)
 * - ConfigurationError: invalid settings or operation value (raised before any side effect)
 *
 * Soft failures are not thrown. A missing dataset or version is a logged warning, and a registry
 * rejection of one target comes back as `{ ok: false, message }` from the transport.
 */

export type UnpublishErrorKind = 'TransportFault' | 'ConfigurationError';

export class UnpublishError extends Error {
  readonly kind: UnpublishErrorKind;
  readonly originalMessage: string;
  readonly context: Record<string, unknown>;

  constructor(
    kind: UnpublishErrorKind,
    message: string,
    options: { originalMessage?: string; context?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UnpublishError';
    this.kind = kind;
    this.originalMessage = options.originalMessage ?? message;
    this.context = options.context ?? {};
  }
}

export function isUnpublishError(error: unknown, kind?: UnpublishErrorKind): error is UnpublishError {
  return error instanceof UnpublishError && (kind === undefined || error.kind === kind);
}

/**
 * Keep only the first `count` lines of a (possibly multi-line) remote message.
 */
export function firstLines(message: string, count = 2): string {
  return message.split('\n').slice(0, count).join('\n');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
