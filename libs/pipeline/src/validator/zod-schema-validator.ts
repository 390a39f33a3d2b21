import { ZodType } from 'zod';
import {
  ValidationIssue,
  ValidationOutcome,
  Validator,
} from '../stages/stage.interfaces';

export interface ZodSchemaValidatorOptions {
  schemaType: string;
  schema: ZodType;
  /** Applied before the schema check; the result is what gets stored */
  normalize?: (data: Record<string, unknown>) => Record<string, unknown>;
  /** Checks that do not invalidate the data */
  warnings?: (data: Record<string, unknown>) => ValidationIssue[];
}

/**
 * Validates extracted data against a zod schema. Schema violations become
 * errors keyed by dotted path; `root` for issues on the object itself.
 */
export class ZodSchemaValidator implements Validator {
  constructor(private readonly options: ZodSchemaValidatorOptions) {}

  async validate(data: Record<string, unknown>): Promise<ValidationOutcome> {
    const { schema, normalize, warnings: collectWarnings } = this.options;
    const normalizedData = normalize ? normalize(data) : { ...data };
    const parsed = schema.safeParse(normalizedData);

    const errors: ValidationIssue[] = parsed.success
      ? []
      : parsed.error.issues.map((issue) => ({
          path: issue.path.length > 0 ? issue.path.join('.') : 'root',
          message: issue.message,
        }));
    const warnings = collectWarnings ? collectWarnings(normalizedData) : [];
    const valid = errors.length === 0;

    return {
      valid,
      results: { valid, schemaType: this.options.schemaType, errors, warnings },
      normalizedData,
    };
  }
}
