import {
  InferenceCapability,
  InferenceContext,
  InferenceError,
  InferenceErrorKind,
  InferenceResult,
} from '@sheetwise/pipeline';

export type InferenceScript = (
  context: InferenceContext,
  call: number,
) => InferenceResult | Promise<InferenceResult>;

/**
 * ScriptedInference — InferenceCapability whose answers are given by the
 * test. Records every call.
 */
export class ScriptedInference implements InferenceCapability {
  readonly calls: InferenceContext[] = [];

  constructor(private readonly script: InferenceScript) {}

  /** Answers per sheet name; unknown sheets get an invalid_response error */
  static bySheet(results: Record<string, InferenceResult>): ScriptedInference {
    return new ScriptedInference((context) => {
      const result = results[context.unitName];
      if (!result) {
        throw new InferenceError(
          'invalid_response',
          `No scripted answer for "${context.unitName}"`,
        );
      }
      return result;
    });
  }

  static failing(
    kind: InferenceErrorKind,
    message = `simulated ${kind}`,
  ): ScriptedInference {
    return new ScriptedInference(() => {
      throw new InferenceError(kind, message);
    });
  }

  /** Never answers; exercises the per-call timeout */
  static hanging(): ScriptedInference {
    return new ScriptedInference(
      () => new Promise<InferenceResult>(() => undefined),
    );
  }

  async infer(context: InferenceContext): Promise<InferenceResult> {
    this.calls.push(context);
    return this.script(context, this.calls.length);
  }
}
