import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ImageAnnotatorClient } from '@google-cloud/vision';
import { GcpVisionAiAdapter } from './gcp-vision-ai.adapter';
import { ExtractionError } from '../../domain/errors/document-processing.error';

const mockBatchAnnotateImages = jest.fn();
const mockBatchAnnotateFiles = jest.fn();

jest.mock('@google-cloud/vision', () => ({
  ImageAnnotatorClient: jest.fn().mockImplementation(() => ({
    batchAnnotateImages: mockBatchAnnotateImages,
    batchAnnotateFiles: mockBatchAnnotateFiles,
  })),
}));

describe('GcpVisionAiAdapter', () => {
  const fileBuffer = Buffer.from('image-bytes');

  const createAdapter = async (
    values: Record<string, unknown> = {},
  ): Promise<GcpVisionAiAdapter> => {
    const config: Record<string, unknown> = {
      'documentProcessing.storage.projectId': 'test-project',
      'documentProcessing.ocr.timeoutMs': 60000,
      'documentProcessing.ocr.maxPdfPages': 5,
      ...values,
    };
    const mockConfig = {
      get: jest.fn((key: string) => config[key]),
      getOrThrow: jest.fn((key: string) => config[key]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GcpVisionAiAdapter,
        { provide: ConfigService, useValue: mockConfig },
      ],
    }).compile();

    return module.get<GcpVisionAiAdapter>(GcpVisionAiAdapter);
  };

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should create the client for the configured project', async () => {
    await createAdapter();

    expect(ImageAnnotatorClient).toHaveBeenCalledWith({
      projectId: 'test-project',
    });
  });

  describe('extractText', () => {
    it('should run document text detection on images', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateImages.mockResolvedValue([
        { responses: [{ fullTextAnnotation: { text: 'Glucose 90 mg/dL' } }] },
      ]);

      const text = await adapter.extractText(fileBuffer, 'lab.png');

      expect(text).toBe('Glucose 90 mg/dL');
      expect(mockBatchAnnotateImages).toHaveBeenCalledWith(
        {
          requests: [
            {
              image: { content: fileBuffer },
              features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
            },
          ],
        },
        { timeout: 60000 },
      );
      expect(mockBatchAnnotateFiles).not.toHaveBeenCalled();
    });

    it('should return an empty string when no text was detected', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateImages.mockResolvedValue([{ responses: [{}] }]);

      await expect(adapter.extractText(fileBuffer, 'blank.jpg')).resolves.toBe(
        '',
      );
    });

    it('should join PDF pages with a newline', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateFiles.mockResolvedValue([
        {
          responses: [
            {
              responses: [
                { fullTextAnnotation: { text: 'Page one' } },
                { fullTextAnnotation: { text: 'Page two' } },
              ],
            },
          ],
        },
      ]);

      const text = await adapter.extractText(fileBuffer, 'report.PDF');

      expect(text).toBe('Page one\nPage two');
      expect(mockBatchAnnotateFiles).toHaveBeenCalledWith(
        {
          requests: [
            {
              inputConfig: { content: fileBuffer, mimeType: 'application/pdf' },
              features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
              pages: [],
            },
          ],
        },
        { timeout: 60000 },
      );
    });

    it('should request only the first pages when the page limit is lower', async () => {
      const adapter = await createAdapter({
        'documentProcessing.ocr.maxPdfPages': 2,
      });
      mockBatchAnnotateFiles.mockResolvedValue([
        { responses: [{ responses: [] }] },
      ]);

      await adapter.extractText(fileBuffer, 'report.pdf');

      expect(mockBatchAnnotateFiles).toHaveBeenCalledWith(
        {
          requests: [expect.objectContaining({ pages: [1, 2] })],
        },
        { timeout: 60000 },
      );
    });

    it('should throw an ExtractionError when a page carries an error', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateImages.mockResolvedValue([
        { responses: [{ error: { code: 3, message: 'Bad image data' } }] },
      ]);

      const failure = adapter.extractText(fileBuffer, 'lab.png');

      await expect(failure).rejects.toThrow(ExtractionError);
      await expect(failure).rejects.toThrow(
        'Vision AI could not read the document',
      );
    });

    it('should wrap client failures in an ExtractionError', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateImages.mockRejectedValue(
        new Error('DEADLINE_EXCEEDED'),
      );

      await expect(adapter.extractText(fileBuffer, 'lab.png')).rejects.toThrow(
        'Vision AI OCR processing failed',
      );
    });

    it('should fail when the file result carries an error', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateFiles.mockResolvedValue([
        { responses: [{ error: { message: 'Invalid PDF' } }] },
      ]);

      await expect(
        adapter.extractText(fileBuffer, 'report.pdf'),
      ).rejects.toThrow(ExtractionError);
    });

    it('should fail when Vision returns no response', async () => {
      const adapter = await createAdapter();
      mockBatchAnnotateImages.mockResolvedValue([{ responses: [] }]);

      await expect(adapter.extractText(fileBuffer, 'lab.png')).rejects.toThrow(
        'Vision AI OCR processing failed',
      );
    });
  });
});
