import { PipelineRegistry, PipelineRegistryBuilder } from './pipeline-registry';
import { SpreadsheetParser } from '../parser/spreadsheet-parser';
import {
  SheetExtractor,
  SheetExtractorOptions,
} from '../extractor/sheet-extractor';
import {
  createFormValidator,
  createInvoiceValidator,
  createReportValidator,
} from '../validator/subtype-schemas';

/**
 * Builds the registry for the spreadsheet subtypes shipped with the worker.
 * All subtypes share the parser and extractor; only validation differs.
 */
export function createDefaultRegistry(
  extraction: SheetExtractorOptions,
): PipelineRegistry {
  const shared = {
    parser: new SpreadsheetParser(),
    extractor: new SheetExtractor(extraction),
  };

  return new PipelineRegistryBuilder()
    .register('invoice', { ...shared, validator: createInvoiceValidator() })
    .register('report', { ...shared, validator: createReportValidator() })
    .register('form', { ...shared, validator: createFormValidator() })
    .build();
}
