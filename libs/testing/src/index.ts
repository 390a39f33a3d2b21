/**
 * @sheetwise/testing
 *
 * In-process stand-ins for the store, queue, object store, AI capability
 * and event sink. Test code only.
 */
export { InMemoryJobStore } from './in-memory-job-store';
export type { NewDocument } from './in-memory-job-store';
export { InMemoryWorkQueue } from './in-memory-work-queue';
export { InMemoryObjectStore } from './in-memory-object-store';
export { ScriptedInference } from './scripted-inference';
export type { InferenceScript } from './scripted-inference';
export { RecordingEventSink } from './recording-event-sink';
export { buildXlsx, buildCsv, buildInvoiceWorkbook } from './workbook.builder';
