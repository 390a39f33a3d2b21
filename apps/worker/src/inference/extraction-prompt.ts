import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import {
  CellValue,
  InferenceContext,
  InferenceError,
  InferenceResult,
} from '@sheetwise/pipeline';

/** Fields the model is asked for, per subtype; keys match the validator schemas */
const SUBTYPE_FIELDS: Readonly<Record<string, string>> = {
  invoice:
    'invoice_number, date, due_date, total_amount (number), currency, ' +
    'vendor {name, address, tax_id}, customer {name, address}, ' +
    'line_items [{description, quantity, unit_price, amount}]',
  report:
    'title, date, author, sections [{heading, content}], ' +
    'data (object of named figures)',
  form:
    'form_type, submission_date, ' +
    'fields (object mapping each field label to its value)',
};

const replySchema = z.object({
  data: z.record(z.unknown()),
  confidence: z.number().min(0).max(1),
});

export function buildExtractionMessages(
  context: InferenceContext,
): ChatCompletionMessageParam[] {
  const fields =
    SUBTYPE_FIELDS[context.subtype] ?? 'every labelled value you can identify';
  const position = `Sheet ${context.unitIndex + 1} of ${context.unitCount}`;

  const system = [
    `You extract structured data from one sheet of a ${context.subtype} spreadsheet.`,
    `Fields: ${fields}.`,
    'Only report values present in the sheet; omit fields the sheet does not contain.',
    'Dates as YYYY-MM-DD. Amounts as plain numbers without currency symbols.',
    'Respond with JSON in this exact format:',
    '{"data": {...extracted fields...}, "confidence": <number between 0 and 1>}',
  ].join('\n');

  const user = [
    `File: ${context.filename}`,
    `${position}: "${context.unitName}"`,
    '',
    renderRows(context.rows),
  ].join('\n');

  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}

/** One line per row, cells separated by " | ", blank cells left empty. */
export function renderRows(rows: CellValue[][]): string {
  return rows
    .map((row) =>
      row.map((cell) => (cell === null ? '' : String(cell))).join(' | '),
    )
    .join('\n');
}

export function parseInferenceReply(
  content: string | null | undefined,
): InferenceResult {
  if (!content || content.trim() === '') {
    throw new InferenceError(
      'invalid_response',
      'Model returned an empty reply',
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new InferenceError(
      'invalid_response',
      'Model reply is not valid JSON',
    );
  }

  const parsed = replySchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new InferenceError(
      'invalid_response',
      `Model reply has an unexpected shape (${issues})`,
    );
  }

  return { payload: parsed.data.data, confidence: parsed.data.confidence };
}
