import { ScriptedInference } from '@sheetwise/testing';
import { SheetExtractor } from './sheet-extractor';
import {
  ExtractionContext,
  ParsedWorkbook,
} from '../stages/stage.interfaces';
import {
  JobCanceledSignal,
  TransientProcessingError,
} from '../errors/processing.errors';
import { InferenceError } from '../stages/inference.errors';

function workbook(...names: string[]): ParsedWorkbook {
  return {
    filename: 'invoice.xlsx',
    fileType: 'xlsx',
    sheets: names.map((name) => ({ name, rows: [[name, 1]], empty: false })),
  };
}

function answering(payload: Record<string, unknown>, confidence: number) {
  return new ScriptedInference(() => ({ payload, confidence }));
}

function context(
  overrides: Partial<ExtractionContext> = {},
): ExtractionContext {
  return {
    jobId: 'job-1',
    subtype: 'invoice',
    checkpoint: jest.fn().mockResolvedValue(undefined),
    reportUnitDone: jest.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

describe('SheetExtractor', () => {
  const options = {
    concurrency: 2,
    maxAttempts: 3,
    baseDelayMs: 1,
    callTimeoutMs: 1_000,
  };

  it('should call the AI once per non-empty sheet and merge in sheet order', async () => {
    const extractor = new SheetExtractor(options);
    const ai = ScriptedInference.bySheet({
      Summary: {
        payload: { invoice_number: 'INV-1', total_amount: 30 },
        confidence: 0.9,
      },
      Items: {
        payload: { line_items: [{ description: 'A', amount: 30 }] },
        confidence: 0.6,
      },
    });
    const parsed = workbook('Summary', 'Items');
    parsed.sheets.push({ name: 'Empty', rows: [], empty: true });

    const result = await extractor.extract(parsed, ai, context());

    expect(ai.calls.map((call) => call.unitName).sort()).toEqual([
      'Items',
      'Summary',
    ]);
    expect(result.data).toEqual({
      invoice_number: 'INV-1',
      total_amount: 30,
      line_items: [{ description: 'A', amount: 30 }],
    });
    // (0.9 × 2 + 0.6 × 2) / 4
    expect(result.confidence).toBe(0.75);
    expect(result.units.map((unit) => unit.fieldCount)).toEqual([2, 2]);
  });

  it('should report progress once per finished unit', async () => {
    const extractor = new SheetExtractor(options);
    const ctx = context();
    const ai = answering({ value: 'x' }, 1);

    await extractor.extract(workbook('A', 'B', 'C'), ai, ctx);

    expect(ctx.reportUnitDone).toHaveBeenNthCalledWith(1, 1, 3);
    expect(ctx.reportUnitDone).toHaveBeenNthCalledWith(2, 2, 3);
    expect(ctx.reportUnitDone).toHaveBeenNthCalledWith(3, 3, 3);
  });

  it('should check for cancellation before each unit and stop early', async () => {
    const extractor = new SheetExtractor({ ...options, concurrency: 1 });
    const checkpoint = jest
      .fn<Promise<void>, []>()
      .mockResolvedValueOnce(undefined)
      .mockRejectedValue(new JobCanceledSignal('job-1'));
    const ai = answering({ value: 'x' }, 1);

    await expect(
      extractor.extract(workbook('A', 'B', 'C'), ai, context({ checkpoint })),
    ).rejects.toBeInstanceOf(JobCanceledSignal);
    expect(ai.calls).toHaveLength(1);
  });

  it('should retry a rate-limited call and then succeed', async () => {
    const extractor = new SheetExtractor(options);
    const ai = new ScriptedInference((_context, call) => {
      if (call === 1) {
        throw new InferenceError('rate_limited', '429 Too Many Requests');
      }
      return { payload: { invoice_number: 'INV-2' }, confidence: 0.8 };
    });

    const result = await extractor.extract(workbook('Summary'), ai, context());

    expect(ai.calls).toHaveLength(2);
    expect(result.data).toEqual({ invoice_number: 'INV-2' });
  });

  it('should give up after maxAttempts timed-out calls', async () => {
    const extractor = new SheetExtractor({ ...options, callTimeoutMs: 5 });
    const ai = ScriptedInference.hanging();

    const failure = extractor.extract(workbook('Summary'), ai, context());

    await expect(failure).rejects.toBeInstanceOf(TransientProcessingError);
    await expect(failure).rejects.toMatchObject({
      code: 'timeout',
      message:
        'AI call for sheet "Summary" timed out after 5ms ' +
        '(gave up after 3 attempts)',
    });
    expect(ai.calls).toHaveLength(3);
  });

  it('should clamp a confidence outside [0, 1]', async () => {
    const extractor = new SheetExtractor(options);
    const ai = answering({ a: 1 }, 3);

    const result = await extractor.extract(workbook('A'), ai, context());

    expect(result.units[0].confidence).toBe(1);
    expect(result.confidence).toBe(1);
  });

  it('should fail with empty_document when no sheet has data', async () => {
    const extractor = new SheetExtractor(options);
    const parsed: ParsedWorkbook = {
      filename: 'blank.xlsx',
      fileType: 'xlsx',
      sheets: [{ name: 'Sheet1', rows: [], empty: true }],
    };

    await expect(
      extractor.extract(parsed, answering({}, 0), context()),
    ).rejects.toMatchObject({ code: 'empty_document' });
  });
});
