/**
 * Error Handling Module
 *
 * Typed failures for the relay pipeline. Pipeline stages return a `Result`
 * instead of throwing so the dispatcher can turn every failure into a notice.
 */

export enum RelayErrorType {
  CREDENTIAL_MISSING = 'credential_missing',
  SOURCE_UNAVAILABLE = 'source_unavailable',
  TRANSLATION_UNAVAILABLE = 'translation_unavailable',
  DESTINATION_UNRESOLVABLE = 'destination_unresolvable',
  PERSISTENCE_FAILURE = 'persistence_failure',
  CONFIGURATION_ERROR = 'configuration_error',
  PUBLISH_FAILED = 'publish_failed'
}

export interface RelayErrorOptions {
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class RelayError extends Error {
  public readonly type: RelayErrorType;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, type: RelayErrorType, options: RelayErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'RelayError';
    this.type = type;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  static credentialMissing(guildId: string): RelayError {
    return new RelayError(
      `No translation API key configured for guild ${guildId}`,
      RelayErrorType.CREDENTIAL_MISSING,
      { details: { guildId } }
    );
  }

  static sourceUnavailable(message: string, cause?: unknown): RelayError {
    return new RelayError(message, RelayErrorType.SOURCE_UNAVAILABLE, { retryable: true, cause });
  }

  static translationUnavailable(
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ): RelayError {
    return new RelayError(message, RelayErrorType.TRANSLATION_UNAVAILABLE, {
      retryable: true,
      details,
      cause
    });
  }

  static destinationUnresolvable(guildId: string, channelId?: string | null): RelayError {
    return new RelayError(
      channelId
        ? `Channel ${channelId} for guild ${guildId} could not be resolved`
        : `No channel configured for guild ${guildId}`,
      RelayErrorType.DESTINATION_UNRESOLVABLE,
      { details: { guildId, channelId: channelId ?? null } }
    );
  }

  static persistenceFailure(message: string, cause?: unknown): RelayError {
    return new RelayError(message, RelayErrorType.PERSISTENCE_FAILURE, { cause });
  }

  static configuration(message: string, details?: Record<string, unknown>): RelayError {
    return new RelayError(message, RelayErrorType.CONFIGURATION_ERROR, { details });
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RelayError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: RelayError): Result<T> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize anything thrown into a RelayError of the given type
 */
export function toRelayError(error: unknown, fallbackType: RelayErrorType): RelayError {
  if (error instanceof RelayError) {
    return error;
  }
  return new RelayError(errorMessage(error), fallbackType, { cause: error });
}

/**
 * Text shown in the guild channel when a dispatch fails
 */
export function describeFailure(error: RelayError): string {
  switch (error.type) {
    case RelayErrorType.CREDENTIAL_MISSING:
      return '❌ No translation API key is configured for this server.';
    case RelayErrorType.SOURCE_UNAVAILABLE:
      return "❌ Today's ranking could not be loaded from the source.";
    case RelayErrorType.TRANSLATION_UNAVAILABLE:
      return "❌ Today's ranking could not be translated. Please try again later.";
    case RelayErrorType.DESTINATION_UNRESOLVABLE:
      return '❌ The configured channel could not be found.';
    case RelayErrorType.PERSISTENCE_FAILURE:
      return '❌ Settings could not be saved.';
    default:
      return "❌ Something went wrong while posting today's ranking.";
  }
}
