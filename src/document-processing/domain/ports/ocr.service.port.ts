export interface OcrServicePort {
  /**
   * Extract plain text from a PDF or image.
   * Rejects with ExtractionError when the document cannot be read.
   *
   * Takes no cancellation signal: a call already started runs to
   * completion after the client disconnects, and the pipeline checks
   * for cancellation once it returns.
   */
  extractText(fileBuffer: Buffer, fileName: string): Promise<string>;
}
