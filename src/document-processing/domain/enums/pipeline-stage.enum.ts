export enum PipelineStage {
  RECEIVED = 'RECEIVED', // Upload accepted, nothing read yet
  EXTRACTED = 'EXTRACTED', // OCR text available
  CLASSIFIED = 'CLASSIFIED', // Label decided (possibly the fallback)
  STORED = 'STORED', // Original bytes written to the object store
  DONE = 'DONE', // Result returned to the caller
  FAILED = 'FAILED',
}
