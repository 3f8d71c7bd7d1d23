import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RemoteClassifierClient } from './remote-classifier.client';
import { ClassifierErrorKind } from '../domain/enums/classifier-error-kind.enum';
import { MalformedResponseError } from '../domain/errors/classifier-error';
import { DEFAULT_LABELS } from '../domain/label-set';
import { ClassificationRequest } from '../domain/classification.types';

describe('RemoteClassifierClient', () => {
  let fetchMock: jest.SpyInstance<
    ReturnType<typeof fetch>,
    Parameters<typeof fetch>
  >;

  const request: ClassificationRequest = {
    text: 'Hemoglobin 12.1 g/dL',
    labelSet: DEFAULT_LABELS,
  };

  const createClient = async (
    overrides: Record<string, unknown> = {},
  ): Promise<RemoteClassifierClient> => {
    const values: Record<string, unknown> = {
      'classification.apiUrl': 'http://classifier.test/models/zero-shot',
      'classification.apiToken': 'test-secret',
      'classification.timeoutMs': 30000,
      'classification.labelsFormat': 'array',
      'classification.labelsDelimiter': ',',
      ...overrides,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RemoteClassifierClient,
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: jest.fn((key: string) => values[key]),
          },
        },
      ],
    }).compile();

    return module.get<RemoteClassifierClient>(RemoteClassifierClient);
  };

  const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('call', () => {
    it('should POST the text and candidate labels with credentials', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ labels: ['blood test results'], scores: [0.9] }),
      );
      const client = await createClient();

      await client.call(request);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://classifier.test/models/zero-shot');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual(
        expect.objectContaining({
          Authorization: 'Bearer test-secret',
          'Content-Type': 'application/json',
          'X-Request-Id': expect.any(String),
        }),
      );
      expect(JSON.parse(String(init?.body))).toEqual({
        inputs: 'Hemoglobin 12.1 g/dL',
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

    it('should return the decoded response', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          labels: ['blood test results', 'urine analysis'],
          scores: [0.91, 0.09],
        }),
      );
      const client = await createClient();

      const result = await client.call(request);

      expect(result).toEqual({
        ok: true,
        value: {
          labels: ['blood test results', 'urine analysis'],
          scores: [0.91, 0.09],
        },
      });
    });

    it('should return an unavailable error for 503', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ error: 'Model is currently loading' }, 503),
      );
      const client = await createClient();

      const result = await client.call(request);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(ClassifierErrorKind.UNAVAILABLE);
      expect(result.error.status).toBe(503);
    });

    it('should return a transient error for 500', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: 'boom' }, 500));
      const client = await createClient();

      const result = await client.call(request);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(ClassifierErrorKind.TRANSIENT);
    });

    it('should return a transient error when the request fails', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const client = await createClient();

      const result = await client.call(request);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(ClassifierErrorKind.TRANSIENT);
      expect(result.error.message).toBe('Network error: fetch failed');
    });

    it('should return a transient error when the attempt times out', async () => {
      // Settles only when the per-attempt timeout aborts the signal
      fetchMock.mockImplementation((_input, init) => {
        const signal = init?.signal;
        return new Promise<Response>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(signal?.reason));
        });
      });
      const client = await createClient({ 'classification.timeoutMs': 10 });

      const result = await client.call(request);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(ClassifierErrorKind.TRANSIENT);
      expect(result.error.message).toBe('Network error: request timed out');
    });

    it('should return a malformed error for a non-JSON body', async () => {
      fetchMock.mockResolvedValue(new Response('<html>oops</html>'));
      const client = await createClient();

      const result = await client.call(request);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(ClassifierErrorKind.MALFORMED_RESPONSE);
      expect(result.error.message).toBe('Response body is not valid JSON');
    });

    it('should keep partial data of a malformed body', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ labels: ['urine analysis'], scores: 'n/a' }),
      );
      const client = await createClient();

      const result = await client.call(request);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(MalformedResponseError);
      if (!(result.error instanceof MalformedResponseError)) return;
      expect(result.error.partial).toEqual({ labels: ['urine analysis'] });
    });

    it('should pass an already aborted caller signal to fetch', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ labels: [], scores: [] }));
      const client = await createClient();
      const controller = new AbortController();
      controller.abort();

      await client.call(request, controller.signal);

      const [, init] = fetchMock.mock.calls[0];
      expect(init?.signal?.aborted).toBe(true);
    });
  });

  describe('buildRequestBody', () => {
    it('should join labels in delimited mode', async () => {
      const client = await createClient({
        'classification.labelsFormat': 'delimited',
        'classification.labelsDelimiter': '|',
      });

      expect(client.buildRequestBody(request)).toEqual({
        inputs: 'Hemoglobin 12.1 g/dL',
        parameters: {
          candidate_labels:
            'ultrasound report|blood test results|urine analysis|prenatal screening',
        },
      });
    });
  });
});
