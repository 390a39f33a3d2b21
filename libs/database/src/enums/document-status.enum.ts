/**
 * Lifecycle status of an uploaded document. Mirrors the outcome of the
 * document's most recent job.
 *
 * Transitions:
 *   UPLOADED → PROCESSING → PROCESSED
 *                         → ERROR
 *            PROCESSING → UPLOADED   (job canceled)
 */
export enum DocumentStatus {
  /** Document stored, no job has run to completion */
  UPLOADED = 'uploaded',

  /** A worker holds a claim on a job for this document */
  PROCESSING = 'processing',

  /** Latest job completed and produced an extraction */
  PROCESSED = 'processed',

  /** Latest job failed (see Document.errorMessage) */
  ERROR = 'error',
}
