import * as XLSX from 'xlsx';
import { Logger } from '@nestjs/common';
import { PermanentProcessingError } from '../errors/processing.errors';
import {
  CellValue,
  DocumentDescriptor,
  ParsedSheet,
  ParsedWorkbook,
  Parser,
} from '../stages/stage.interfaces';

export const SUPPORTED_SPREADSHEET_TYPES = ['xlsx', 'xls', 'csv'] as const;
export type SpreadsheetType = (typeof SUPPORTED_SPREADSHEET_TYPES)[number];

/** Sheet name given to the single sheet of a CSV file */
export const CSV_SHEET_NAME = 'Sheet1';

/** xlsx is a ZIP container; xls is an OLE2 compound file */
const MAGIC_BYTES: Partial<Record<SpreadsheetType, readonly number[]>> = {
  xlsx: [0x50, 0x4b, 0x03, 0x04],
  xls: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1],
};

/**
 * SpreadsheetParser — reads xlsx, xls and csv into sheets of typed cells.
 *
 * Failure codes:
 *   - unsupported_format: declared type is not a spreadsheet type
 *   - corrupt_file:       signature mismatch or the reader rejects the bytes
 *   - empty_document:     no sheet holds a single value
 */
export class SpreadsheetParser implements Parser {
  private readonly logger = new Logger(SpreadsheetParser.name);

  async parse(
    bytes: Buffer,
    descriptor: DocumentDescriptor,
  ): Promise<ParsedWorkbook> {
    const fileType = normalizeFileType(descriptor.fileType);
    if (!isSpreadsheetType(fileType)) {
      throw new PermanentProcessingError(
        'unsupported_format',
        `Unsupported file type: ${descriptor.fileType || '(none)'}`,
      );
    }

    assertSignature(bytes, fileType, descriptor.filename);

    const workbook = readWorkbook(bytes, fileType, descriptor.filename);
    const sheets = workbook.SheetNames.map((name, index) =>
      toParsedSheet(
        fileType === 'csv' && index === 0 ? CSV_SHEET_NAME : name,
        workbook.Sheets[name],
      ),
    );

    if (sheets.every((sheet) => sheet.empty)) {
      throw new PermanentProcessingError(
        'empty_document',
        `"${descriptor.filename}" contains no data`,
      );
    }

    this.logger.debug(
      `Parsed ${descriptor.filename}: ${sheets.length} sheet(s), ` +
        `${sheets.filter((sheet) => !sheet.empty).length} with data`,
    );

    return { filename: descriptor.filename, fileType, sheets };
  }
}

export function isSpreadsheetType(
  fileType: string,
): fileType is SpreadsheetType {
  return SUPPORTED_SPREADSHEET_TYPES.some((type) => type === fileType);
}

function normalizeFileType(fileType: string): string {
  return fileType.trim().toLowerCase().replace(/^\./, '');
}

function assertSignature(
  bytes: Buffer,
  fileType: SpreadsheetType,
  filename: string,
): void {
  const signature = MAGIC_BYTES[fileType];
  if (!signature) return;

  const matches =
    bytes.length >= signature.length &&
    signature.every((byte, index) => bytes[index] === byte);
  if (!matches) {
    throw new PermanentProcessingError(
      'corrupt_file',
      `"${filename}" does not have a valid ${fileType} signature`,
    );
  }
}

function readWorkbook(
  bytes: Buffer,
  fileType: SpreadsheetType,
  filename: string,
): XLSX.WorkBook {
  try {
    return fileType === 'csv'
      ? XLSX.read(bytes.toString('utf8'), { type: 'string', cellDates: true })
      : XLSX.read(bytes, { type: 'buffer', cellDates: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PermanentProcessingError(
      'corrupt_file',
      `Cannot read "${filename}": ${message}`,
      { cause: error },
    );
  }
}

function toParsedSheet(
  name: string,
  worksheet: XLSX.WorkSheet | undefined,
): ParsedSheet {
  if (!worksheet) {
    return { name, rows: [], empty: true };
  }

  const raw = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  const rows = raw.map((row) => row.map(toCellValue));
  const empty = rows.every((row) => row.every((cell) => cell === null));

  return { name, rows: empty ? [] : rows, empty };
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
