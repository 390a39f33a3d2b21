import { Readable } from 'stream';
import { isMissingObjectError, readStream } from './minio-object-store';

describe('isMissingObjectError', () => {
  it('should recognise S3 missing-key codes', () => {
    const missingKey = {
      code: 'NoSuchKey',
      message: 'The specified key does not exist.',
    };

    expect(isMissingObjectError(missingKey)).toBe(true);
    expect(isMissingObjectError({ code: 'NotFound' })).toBe(true);
  });

  it('should treat other failures as IO errors', () => {
    expect(isMissingObjectError({ code: 'AccessDenied' })).toBe(false);
    expect(isMissingObjectError(new Error('socket hang up'))).toBe(false);
    expect(isMissingObjectError('NoSuchKey')).toBe(false);
    expect(isMissingObjectError(null)).toBe(false);
  });
});

describe('readStream', () => {
  it('should concatenate buffer and string chunks', async () => {
    const stream = Readable.from([Buffer.from('Invoice,'), 'INV-7'], {
      objectMode: true,
    });

    const bytes = await readStream(stream);

    expect(bytes.toString('utf8')).toBe('Invoice,INV-7');
  });
});
