import { PipelineStage } from '../enums/pipeline-stage.enum';

/**
 * Base class for failures that stop the document pipeline.
 *
 * `stage` names the stage whose work failed; for cancellation it is the
 * last stage completed.
 */
export abstract class DocumentProcessingError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Input rejected before any I/O (unsupported extension, empty file, bad name).
 */
export class DocumentValidationError extends DocumentProcessingError {
  readonly stage = PipelineStage.RECEIVED;
}

export class ExtractionError extends DocumentProcessingError {
  readonly stage = PipelineStage.EXTRACTED;
}

export class StorageError extends DocumentProcessingError {
  readonly stage = PipelineStage.STORED;
}

/**
 * The caller went away. Stages already completed are not rolled back.
 */
export class ProcessingCancelledError extends DocumentProcessingError {
  constructor(readonly stage: PipelineStage) {
    super(`Processing cancelled after stage ${stage}`);
  }
}
