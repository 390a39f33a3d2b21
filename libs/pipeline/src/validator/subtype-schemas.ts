import { z } from 'zod';
import { ValidationIssue } from '../stages/stage.interfaces';
import { isPlainObject } from '../confidence/confidence';
import { ZodSchemaValidator } from './zod-schema-validator';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const EU_DATE = /^(\d{2})\.(\d{2})\.(\d{4})$/;

const DATE_FORMATS = [ISO_DATE, US_DATE, EU_DATE];

const dateString = z
  .string()
  .refine((value) => DATE_FORMATS.some((format) => format.test(value)), {
    message: 'Expected a date as YYYY-MM-DD, MM/DD/YYYY or DD.MM.YYYY',
  });

// ── Invoice ────────────────────────────────────────────────

export const invoiceSchema = z.object({
  invoice_number: z.string().min(1),
  date: dateString,
  due_date: dateString.nullish(),
  total_amount: z.number(),
  currency: z.string().nullish(),
  vendor: z
    .object({
      name: z.string(),
      address: z.string().nullish(),
      tax_id: z.string().nullish(),
    })
    .nullish(),
  customer: z
    .object({
      name: z.string(),
      address: z.string().nullish(),
    })
    .nullish(),
  line_items: z
    .array(
      z.object({
        description: z.string(),
        quantity: z.number().nullish(),
        unit_price: z.number().nullish(),
        amount: z.number(),
      }),
    )
    .nullish(),
});

/** Line item sums may differ from the total by rounding */
const AMOUNT_TOLERANCE = 0.01;

export function normalizeInvoice(
  data: Record<string, unknown>,
): Record<string, unknown> {
  const normalized: Record<string, unknown> = { ...data };

  const amount = toAmount(normalized['total_amount']);
  if (amount !== null) {
    normalized['total_amount'] = amount;
  }

  const date = normalized['date'];
  if (typeof date === 'string') {
    normalized['date'] = toIsoDate(date);
  }

  return normalized;
}

export function invoiceWarnings(
  data: Record<string, unknown>,
): ValidationIssue[] {
  const warnings: ValidationIssue[] = [];
  const lineItems = data['line_items'];

  if (!Array.isArray(lineItems) || lineItems.length === 0) {
    warnings.push({
      path: 'line_items',
      message: 'No line items were extracted',
    });
    return warnings;
  }

  const total = data['total_amount'];
  const amounts = lineItems.map((item) =>
    isPlainObject(item) ? item['amount'] : undefined,
  );
  if (
    typeof total === 'number' &&
    amounts.every((value): value is number => typeof value === 'number')
  ) {
    const sum = amounts.reduce((acc, value) => acc + value, 0);
    if (Math.abs(sum - total) > AMOUNT_TOLERANCE) {
      warnings.push({
        path: 'line_items',
        message:
          `Line item amounts sum to ${roundCents(sum)} ` +
          `but total_amount is ${total}`,
      });
    }
  }

  return warnings;
}

// ── Report ─────────────────────────────────────────────────

export const reportSchema = z.object({
  title: z.string().min(1),
  date: dateString,
  author: z.string().nullish(),
  sections: z
    .array(
      z.object({
        heading: z.string(),
        content: z.string().nullish(),
      }),
    )
    .nullish(),
  data: z.record(z.unknown()).nullish(),
});

function reportWarnings(data: Record<string, unknown>): ValidationIssue[] {
  const sections = data['sections'];
  return Array.isArray(sections) && sections.length > 0
    ? []
    : [{ path: 'sections', message: 'No sections were extracted' }];
}

// ── Form ───────────────────────────────────────────────────

export const formSchema = z.object({
  form_type: z.string().min(1),
  submission_date: dateString.nullish(),
  fields: z.record(z.unknown()),
});

function formWarnings(data: Record<string, unknown>): ValidationIssue[] {
  const fields = data['fields'];
  return isPlainObject(fields) && Object.keys(fields).length === 0
    ? [{ path: 'fields', message: 'Form has no fields' }]
    : [];
}

// ── Validators ─────────────────────────────────────────────

export function createInvoiceValidator(): ZodSchemaValidator {
  return new ZodSchemaValidator({
    schemaType: 'invoice',
    schema: invoiceSchema,
    normalize: normalizeInvoice,
    warnings: invoiceWarnings,
  });
}

export function createReportValidator(): ZodSchemaValidator {
  return new ZodSchemaValidator({
    schemaType: 'report',
    schema: reportSchema,
    warnings: reportWarnings,
  });
}

export function createFormValidator(): ZodSchemaValidator {
  return new ZodSchemaValidator({
    schemaType: 'form',
    schema: formSchema,
    warnings: formWarnings,
  });
}

// ── Helpers ────────────────────────────────────────────────

/** Strips currency symbols and thousands separators: "$1,234.50" → 1234.5 */
function toAmount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/[^\d.-]/g, '');
  if (cleaned === '') return null;
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
}

/** MM/DD/YYYY and DD.MM.YYYY become YYYY-MM-DD; anything else is kept. */
function toIsoDate(value: string): string {
  const us = US_DATE.exec(value);
  if (us) return `${us[3]}-${us[1]}-${us[2]}`;
  const eu = EU_DATE.exec(value);
  if (eu) return `${eu[3]}-${eu[2]}-${eu[1]}`;
  return value;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}
