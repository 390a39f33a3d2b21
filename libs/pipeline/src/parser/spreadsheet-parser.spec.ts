import { buildCsv, buildXlsx } from '@sheetwise/testing';
import { SpreadsheetParser } from './spreadsheet-parser';
import { DocumentDescriptor } from '../stages/stage.interfaces';

function descriptor(
  fileType: string,
  filename = `upload.${fileType}`,
): DocumentDescriptor {
  return { documentId: 'doc-1', filename, fileType, subtype: 'invoice' };
}

describe('SpreadsheetParser', () => {
  const parser = new SpreadsheetParser();
  const oneCell = () => buildXlsx({ Data: [['a']] });

  it('should read every sheet of an xlsx workbook with typed cells', async () => {
    const bytes = buildXlsx({
      Summary: [
        ['Invoice Number', 'INV-001'],
        ['Total', 150.5],
      ],
      Notes: [['  ']],
    });

    const parsed = await parser.parse(bytes, descriptor('xlsx'));

    expect(parsed.fileType).toBe('xlsx');
    expect(parsed.sheets).toEqual([
      {
        name: 'Summary',
        rows: [
          ['Invoice Number', 'INV-001'],
          ['Total', 150.5],
        ],
        empty: false,
      },
      { name: 'Notes', rows: [], empty: true },
    ]);
  });

  it('should expose a csv file as a single sheet named Sheet1', async () => {
    const parsed = await parser.parse(
      buildCsv([
        ['Vendor', 'Acme'],
        ['Currency', 'EUR'],
      ]),
      descriptor('csv'),
    );

    expect(parsed.sheets.map((sheet) => sheet.name)).toEqual(['Sheet1']);
    expect(parsed.sheets[0].rows).toEqual([
      ['Vendor', 'Acme'],
      ['Currency', 'EUR'],
    ]);
  });

  it('should accept a declared type with a leading dot and any case', async () => {
    const parsed = await parser.parse(oneCell(), descriptor('.XLSX'));

    expect(parsed.fileType).toBe('xlsx');
  });

  it('should reject types that are not spreadsheets as unsupported_format', async () => {
    const parsing = parser.parse(Buffer.from('%PDF-1.7'), descriptor('pdf'));

    await expect(parsing).rejects.toMatchObject({
      name: 'PermanentProcessingError',
      code: 'unsupported_format',
      message: 'Unsupported file type: pdf',
    });
  });

  it('should reject bytes without the xlsx signature as corrupt_file', async () => {
    const parsing = parser.parse(
      Buffer.from('not a zip'),
      descriptor('xlsx', 'q1.xlsx'),
    );

    await expect(parsing).rejects.toMatchObject({
      code: 'corrupt_file',
      message: '"q1.xlsx" does not have a valid xlsx signature',
    });
  });

  it('should reject an xls declaration carrying xlsx bytes', async () => {
    await expect(
      parser.parse(oneCell(), descriptor('xls')),
    ).rejects.toMatchObject({ code: 'corrupt_file' });
  });

  it('should reject a workbook without any value as empty_document', async () => {
    await expect(
      parser.parse(
        buildXlsx({ Blank: [['   ']] }),
        descriptor('xlsx', 'blank.xlsx'),
      ),
    ).rejects.toMatchObject({
      code: 'empty_document',
      message: '"blank.xlsx" contains no data',
    });
  });
});
