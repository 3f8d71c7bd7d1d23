import { ClassificationResult } from '../../classification/domain/classification.types';
import { PipelineStage } from './enums/pipeline-stage.enum';

export interface ProcessDocumentCommand {
  fileBuffer: Buffer;
  fileName: string;
  mimeType?: string;
  patientId: string;
}

export interface ProcessingResult {
  patientId: string;
  classification: ClassificationResult;
  storageLocation: string;
  status: 'processed';
  /** Milliseconds spent reaching each stage; logged, not returned to clients */
  timings: Partial<Record<PipelineStage, number>>;
}
