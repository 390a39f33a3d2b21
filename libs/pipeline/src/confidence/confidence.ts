/**
 * Multi-unit confidence aggregation and payload merging.
 *
 * Policy: field-count-weighted mean. Each unit's confidence is weighted by
 * the number of non-empty leaf values in its payload, so a sheet that
 * yielded twenty fields counts for more than a cover sheet that yielded
 * one. When no unit produced a field the plain mean is used; no units at
 * all gives 0. The result is clamped to [0, 1] and rounded to 4 decimals.
 */

export interface WeightedConfidence {
  confidence: number;
  fieldCount: number;
}

/** Counts non-empty leaf values; empty strings, null and undefined are absent. */
export function countFields(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'string') return value.trim() === '' ? 0 : 1;
  if (Array.isArray(value)) {
    return value.reduce<number>((sum, item) => sum + countFields(item), 0);
  }
  if (isPlainObject(value)) {
    return countFields(Object.values(value));
  }
  return 1;
}

export function aggregateConfidence(
  units: readonly WeightedConfidence[],
): number {
  if (units.length === 0) return 0;

  const weight = (unit: WeightedConfidence) => Math.max(0, unit.fieldCount);
  const totalWeight = units.reduce((sum, unit) => sum + weight(unit), 0);

  const mean =
    totalWeight === 0
      ? units.reduce((sum, unit) => sum + clamp(unit.confidence), 0) /
        units.length
      : units.reduce(
          (sum, unit) => sum + clamp(unit.confidence) * weight(unit),
          0,
        ) / totalWeight;

  return round4(clamp(mean));
}

/**
 * Deterministic merge of unit payloads in unit order: the first non-empty
 * scalar wins, arrays are concatenated, nested objects are merged
 * recursively.
 */
export function mergeUnitPayloads(
  payloads: readonly Record<string, unknown>[],
): Record<string, unknown> {
  return payloads.reduce<Record<string, unknown>>(
    (merged, payload) => mergeInto(merged, payload),
    {},
  );
}

function mergeInto(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, incoming] of Object.entries(source)) {
    const existing = result[key];

    if (isEmpty(existing)) {
      result[key] = incoming;
    } else if (Array.isArray(existing) && Array.isArray(incoming)) {
      result[key] = [...existing, ...incoming];
    } else if (isPlainObject(existing) && isPlainObject(incoming)) {
      result[key] = mergeInto(existing, incoming);
    }
  }

  return result;
}

function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clamp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
