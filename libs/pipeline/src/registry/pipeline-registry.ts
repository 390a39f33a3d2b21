import { Extractor, Parser, Validator } from '../stages/stage.interfaces';

/** Injection token for the startup-built registry */
export const PIPELINE_REGISTRY = 'PIPELINE_REGISTRY';

export interface PipelineEntry {
  parser: Parser;
  extractor: Extractor;
  validator: Validator;
}

/**
 * PipelineRegistry — immutable map from document subtype to its
 * parser/extractor/validator triple.
 */
export class PipelineRegistry {
  private readonly entries: ReadonlyMap<string, PipelineEntry>;

  constructor(entries: Map<string, PipelineEntry>) {
    this.entries = new Map(entries);
  }

  resolve(subtype: string): PipelineEntry | null {
    return this.entries.get(normalizeSubtype(subtype)) ?? null;
  }

  subtypes(): string[] {
    return [...this.entries.keys()].sort();
  }
}

/**
 * Collects registrations at startup. New subtypes are added here without
 * touching the executor.
 */
export class PipelineRegistryBuilder {
  private readonly entries = new Map<string, PipelineEntry>();

  register(subtype: string, entry: PipelineEntry): this {
    const key = normalizeSubtype(subtype);
    if (!key) {
      throw new Error('Pipeline subtype must not be empty');
    }
    if (this.entries.has(key)) {
      throw new Error(`Pipeline for subtype "${key}" is already registered`);
    }
    this.entries.set(key, entry);
    return this;
  }

  build(): PipelineRegistry {
    return new PipelineRegistry(this.entries);
  }
}

function normalizeSubtype(subtype: string): string {
  return subtype.trim().toLowerCase();
}
