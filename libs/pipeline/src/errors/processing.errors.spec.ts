import {
  PermanentProcessingError,
  StageFailure,
  TransientProcessingError,
  describeStageFailure,
  isTransientError,
} from './processing.errors';

describe('processing errors', () => {
  it('should flag only transient errors as retryable', () => {
    const transient = new TransientProcessingError('timeout', 'timed out');
    const permanent = new PermanentProcessingError('corrupt_file', 'bad');

    expect(transient.retryable).toBe(true);
    expect(permanent.retryable).toBe(false);
    expect(isTransientError(transient)).toBe(true);
    expect(isTransientError(permanent)).toBe(false);
    expect(isTransientError(new Error('boom'))).toBe(false);
  });

  it('should collapse a stage failure into one error string', () => {
    const cause = new PermanentProcessingError(
      'unsupported_format',
      'Unsupported file type: pdf',
    );
    const failure = new StageFailure('parse', cause);

    expect(failure.stage).toBe('parse');
    expect(failure.cause).toBe(cause);
    expect(failure.message).toBe(
      'parse stage failed: PermanentProcessingError(unsupported_format): Unsupported file type: pdf',
    );
  });

  it('should describe errors outside the taxonomy without a code', () => {
    const typeError = new TypeError('x is undefined');

    expect(describeStageFailure('validate', typeError)).toBe(
      'validate stage failed: TypeError: x is undefined',
    );
    expect(describeStageFailure('extract', 'plain string')).toBe(
      'extract stage failed: plain string',
    );
  });
});
