/**
 * Parsers for raw Redis Streams replies.
 *
 * ioredis returns stream replies as nested arrays typed `unknown`; these
 * helpers narrow them without trusting the shape.
 */

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

/**
 * Parses `[[id, [k1, v1, k2, v2, ...]], ...]`.
 * Entries deleted while pending come back as `[id, null]` and are skipped.
 */
export function parseStreamEntries(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];

  const entries: StreamEntry[] = [];
  for (const item of raw) {
    if (!Array.isArray(item) || item.length < 2) continue;
    const [id, fields] = item;
    if (typeof id !== 'string' || !Array.isArray(fields)) continue;
    entries.push({ id, fields: parseFields(fields) });
  }
  return entries;
}

/** XREADGROUP reply: `[[streamName, entries], ...]` or null on timeout. */
export function parseReadGroupReply(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];

  const entries: StreamEntry[] = [];
  for (const stream of raw) {
    if (!Array.isArray(stream) || stream.length < 2) continue;
    entries.push(...parseStreamEntries(stream[1]));
  }
  return entries;
}

/** XAUTOCLAIM reply: `[nextCursor, entries, deletedIds?]`. */
export function parseAutoClaimReply(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw) || raw.length < 2) return [];
  return parseStreamEntries(raw[1]);
}

function parseFields(fields: unknown[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (typeof key === 'string' && typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}
