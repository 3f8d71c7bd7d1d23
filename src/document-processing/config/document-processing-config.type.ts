export type DocumentProcessingConfig = {
  maxFileSizeMb: number;
  allowedExtensions: readonly string[]; // lowercased, with leading dot
  storage: {
    bucket: string;
    projectId?: string;
    apiEndpoint?: string; // Emulator or interoperable endpoint
    keyPrefix: string;
  };
  ocr: {
    timeoutMs: number;
    maxPdfPages: number;
  };
};
