import {
  parseAutoClaimReply,
  parseReadGroupReply,
  parseStreamEntries,
} from './stream-reply.parser';

describe('stream reply parsers', () => {
  describe('parseStreamEntries', () => {
    it('should turn flat field arrays into records', () => {
      const enqueuedAt = '2026-01-01T00:00:00.000Z';
      const entries = parseStreamEntries([
        ['1700000000000-0', ['jobId', 'job-1', 'enqueuedAt', enqueuedAt]],
        ['1700000000001-0', ['jobId', 'job-2']],
      ]);

      expect(entries).toEqual([
        {
          id: '1700000000000-0',
          fields: { jobId: 'job-1', enqueuedAt },
        },
        { id: '1700000000001-0', fields: { jobId: 'job-2' } },
      ]);
    });

    it('should skip entries deleted while pending', () => {
      const entries = parseStreamEntries([
        ['1-0', null],
        ['2-0', ['jobId', 'job-2']],
      ]);

      expect(entries).toEqual([{ id: '2-0', fields: { jobId: 'job-2' } }]);
    });

    it('should ignore a dangling key without value', () => {
      const entries = parseStreamEntries([
        ['3-0', ['jobId', 'job-3', 'orphan']],
      ]);

      expect(entries).toEqual([{ id: '3-0', fields: { jobId: 'job-3' } }]);
    });

    it('should return an empty list for non-array input', () => {
      expect(parseStreamEntries(null)).toEqual([]);
      expect(parseStreamEntries('OK')).toEqual([]);
    });
  });

  describe('parseReadGroupReply', () => {
    it('should return an empty list on a blocking read timeout', () => {
      expect(parseReadGroupReply(null)).toEqual([]);
    });

    it('should flatten entries of every stream in the reply', () => {
      const reply = [['jobs', [['5-0', ['jobId', 'job-5']]]]];

      expect(parseReadGroupReply(reply)).toEqual([
        { id: '5-0', fields: { jobId: 'job-5' } },
      ]);
    });
  });

  describe('parseAutoClaimReply', () => {
    it('should read the claimed entries from the second element', () => {
      const reply = ['0-0', [['7-0', ['jobId', 'job-7']]], []];

      expect(parseAutoClaimReply(reply)).toEqual([
        { id: '7-0', fields: { jobId: 'job-7' } },
      ]);
    });

    it('should return an empty list when nothing was idle long enough', () => {
      expect(parseAutoClaimReply(['0-0', [], []])).toEqual([]);
    });
  });
});
