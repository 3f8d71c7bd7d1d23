import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import {
  CLASSIFIER_URL,
  TEST_BUCKET,
  TEST_PATIENT_ID,
} from '../utils/constants';
import {
  FetchSpy,
  TestAdapters,
  createTestAdapters,
  createTestApp,
  jsonResponse,
} from '../utils/test-helpers';

describe('POST /classify (E2E)', () => {
  let app: INestApplication;
  let adapters: TestAdapters;
  let fetchSpy: FetchSpy;
  let infoSpy: jest.SpyInstance;

  const pdfBytes = Buffer.from('%PDF-1.4 test document');

  beforeAll(async () => {
    adapters = createTestAdapters();
    app = await createTestApp(adapters);
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    adapters.ocr.extractText.mockResolvedValue('Hemoglobin 13.5 g/dL');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
    infoSpy.mockRestore();
    adapters.ocr.extractText.mockReset();
    adapters.storage.put.mockClear();
  });

  const upload = (fileName: string, bytes: Buffer = pdfBytes) =>
    request(app.getHttpServer())
      .post('/classify')
      .field('patientId', TEST_PATIENT_ID)
      .attach('file', bytes, fileName);

  it('should classify a lab report and store it under its category', async () => {
    fetchSpy.mockImplementation(async () =>
      jsonResponse({
        labels: [
          'urine analysis',
          'blood test results',
          'ultrasound report',
          'prenatal screening',
        ],
        scores: [0.05, 0.91, 0.03, 0.01],
      }),
    );

    const response = await upload('lab.pdf');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      patientId: TEST_PATIENT_ID,
      classification: {
        label: 'blood test results',
        confidence: 0.91,
        status: 'success',
      },
      storageLocation: `gs://${TEST_BUCKET}/patients/P123/blood_test_results/lab.pdf`,
      status: 'processed',
    });
    expect(adapters.storage.put).toHaveBeenCalledWith(
      'patients/P123/blood_test_results/lab.pdf',
      pdfBytes,
      'application/pdf',
    );

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(CLASSIFIER_URL);
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: 'Hemoglobin 13.5 g/dL',
      parameters: {
        candidate_labels: [
          'ultrasound report',
          'blood test results',
          'urine analysis',
          'prenatal screening',
        ],
      },
    });
  });

  it('should keep a non-ASCII filename intact in the storage key', async () => {
    fetchSpy.mockImplementation(async () =>
      jsonResponse({ labels: ['ultrasound report'], scores: [0.88] }),
    );

    const response = await upload('\u00e9chographie.pdf');

    expect(response.status).toBe(200);
    expect(adapters.storage.put).toHaveBeenCalledWith(
      'patients/P123/ultrasound_report/\u00e9chographie.pdf',
      pdfBytes,
      'application/pdf',
    );
    expect(response.body.storageLocation).toBe(
      `gs://${TEST_BUCKET}/patients/P123/ultrasound_report/\u00e9chographie.pdf`,
    );
  });

  it('should store under the fallback category when the classifier is unavailable', async () => {
    fetchSpy.mockImplementation(async () =>
      jsonResponse({ error: 'Model is currently loading' }, 503),
    );

    const response = await upload('lab.pdf');

    expect(response.status).toBe(200);
    expect(response.body.classification).toEqual({
      label: 'unclassified document',
      confidence: 0,
      status: 'fallback_used',
    });
    expect(response.body.storageLocation).toBe(
      `gs://${TEST_BUCKET}/patients/P123/unclassified_document/lab.pdf`,
    );
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should retry transient failures before falling back', async () => {
    fetchSpy.mockImplementation(async () =>
      jsonResponse({ error: 'Internal error' }, 500),
    );

    const response = await upload('lab.pdf');

    expect(response.status).toBe(200);
    expect(response.body.classification.status).toBe('fallback_used');
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it('should report a parse error for an empty classifier response', async () => {
    fetchSpy.mockImplementation(async () =>
      jsonResponse({ labels: [], scores: [] }),
    );

    const response = await upload('scan.png');

    expect(response.status).toBe(200);
    expect(response.body.classification).toEqual({
      label: 'unclassified document',
      confidence: 0,
      status: 'parse_error',
    });
    expect(adapters.storage.put).toHaveBeenCalledWith(
      'patients/P123/unclassified_document/scan.png',
      pdfBytes,
      'image/png',
    );
  });

  it('should reject an unsupported file type without any processing', async () => {
    const response = await upload('notes.docx');

    expect(response.status).toBe(400);
    expect(response.body.message).toBe(
      'Invalid file type. Allowed extensions: .pdf, .png, .jpg, .jpeg',
    );
    expect(adapters.ocr.extractText).not.toHaveBeenCalled();
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(adapters.storage.put).not.toHaveBeenCalled();
  });

  it('should require a file', async () => {
    const response = await request(app.getHttpServer())
      .post('/classify')
      .field('patientId', TEST_PATIENT_ID);

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('File is required');
  });

  it('should reject a patientId that is not a single path segment', async () => {
    const response = await request(app.getHttpServer())
      .post('/classify')
      .field('patientId', '../P123')
      .attach('file', pdfBytes, 'lab.pdf');

    expect(response.status).toBe(400);
    expect(response.body.errors.patientId).toBe(
      'patientId may only contain letters, digits, "_" and "-"',
    );
    expect(adapters.ocr.extractText).not.toHaveBeenCalled();
  });

  it('should reject files over the size limit', async () => {
    const response = await upload('large.pdf', Buffer.alloc(1024 * 1024 + 1));

    expect(response.status).toBe(413);
    expect(adapters.ocr.extractText).not.toHaveBeenCalled();
  });

  it('should return a generic 500 when extraction fails', async () => {
    adapters.ocr.extractText.mockRejectedValue(new Error('quota exceeded'));

    const response = await upload('lab.pdf');

    expect(response.status).toBe(500);
    expect(response.body.message).toBe('Document processing failed');
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(adapters.storage.put).not.toHaveBeenCalled();
  });

  it('should return a generic 500 when storage fails', async () => {
    fetchSpy.mockImplementation(async () =>
      jsonResponse({ labels: ['urine analysis'], scores: [0.7] }),
    );
    adapters.storage.put.mockRejectedValueOnce(new Error('connection reset'));

    const response = await upload('lab.pdf');

    expect(response.status).toBe(500);
    expect(response.body.message).toBe('Document processing failed');
  });
});
