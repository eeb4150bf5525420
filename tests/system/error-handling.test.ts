import {
  RelayError,
  RelayErrorType,
  describeFailure,
  errorMessage,
  fail,
  ok,
  toRelayError
} from '../../src/system/error-handling';

describe('RelayError', () => {
  it('should build a credential error for a guild', () => {
    const error = RelayError.credentialMissing('100');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RelayError');
    expect(error.type).toBe(RelayErrorType.CREDENTIAL_MISSING);
    expect(error.message).toBe('No translation API key configured for guild 100');
    expect(error.retryable).toBe(false);
    expect(error.details).toEqual({ guildId: '100' });
  });

  it('should mark upstream failures as retryable', () => {
    expect(RelayError.sourceUnavailable('feed down').retryable).toBe(true);
    expect(RelayError.translationUnavailable('quota').retryable).toBe(true);
    expect(RelayError.persistenceFailure('disk full').retryable).toBe(false);
  });

  it('should describe a missing or unresolvable channel', () => {
    expect(RelayError.destinationUnresolvable('100').message).toBe('No channel configured for guild 100');
    expect(RelayError.destinationUnresolvable('100', '555').message).toBe(
      'Channel 555 for guild 100 could not be resolved'
    );
  });

  it('should keep the cause', () => {
    const cause = new Error('EACCES');
    const error = RelayError.persistenceFailure('Could not save', cause);

    expect(error.cause).toBe(cause);
  });
});

describe('toRelayError', () => {
  it('should pass relay errors through unchanged', () => {
    const original = RelayError.credentialMissing('100');

    expect(toRelayError(original, RelayErrorType.PUBLISH_FAILED)).toBe(original);
  });

  it('should wrap anything else with the fallback type', () => {
    const wrapped = toRelayError('boom', RelayErrorType.SOURCE_UNAVAILABLE);

    expect(wrapped.type).toBe(RelayErrorType.SOURCE_UNAVAILABLE);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe('boom');
  });
});

describe('errorMessage', () => {
  it('should read the message of errors and stringify the rest', () => {
    expect(errorMessage(new Error('broken'))).toBe('broken');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('Result helpers', () => {
  it('should build success and failure values', () => {
    const error = RelayError.configuration('bad');

    expect(ok([1, 2])).toEqual({ ok: true, value: [1, 2] });
    expect(fail(error)).toEqual({ ok: false, error });
  });
});

describe('describeFailure', () => {
  it('should give a channel notice for each failure type', () => {
    expect(describeFailure(RelayError.credentialMissing('100'))).toBe(
      '❌ No translation API key is configured for this server.'
    );
    expect(describeFailure(RelayError.sourceUnavailable('down'))).toBe(
      "❌ Today's ranking could not be loaded from the source."
    );
    expect(describeFailure(RelayError.translationUnavailable('quota'))).toBe(
      "❌ Today's ranking could not be translated. Please try again later."
    );
    expect(describeFailure(new RelayError('rejected', RelayErrorType.PUBLISH_FAILED))).toBe(
      "❌ Something went wrong while posting today's ranking."
    );
  });
});
