import { ClassifierErrorKind } from '../enums/classifier-error-kind.enum';
import {
  RetriesExhaustedError,
  TransientClassifierError,
  UnavailableClassifierError,
  classifierErrorFromNetwork,
  classifierErrorFromResponse,
} from './classifier-error';

describe('ClassifierError', () => {
  describe('classifierErrorFromResponse', () => {
    it('should map 503 to an unavailable error with the upstream detail', async () => {
      const response = new Response(
        JSON.stringify({ error: 'Model is currently loading' }),
        { status: 503 },
      );

      const error = await classifierErrorFromResponse(response, 'req-1');

      expect(error).toBeInstanceOf(UnavailableClassifierError);
      expect(error.kind).toBe(ClassifierErrorKind.UNAVAILABLE);
      expect(error.status).toBe(503);
      expect(error.requestId).toBe('req-1');
      expect(error.message).toBe(
        'Classifier error 503: Model is currently loading',
      );
    });

    it('should map 429 to an unavailable error when the body is not JSON', async () => {
      const response = new Response('slow down', {
        status: 429,
        statusText: 'Too Many Requests',
      });

      const error = await classifierErrorFromResponse(response, 'req-2');

      expect(error.kind).toBe(ClassifierErrorKind.UNAVAILABLE);
      expect(error.message).toBe('Classifier error: 429 Too Many Requests');
    });

    it('should map other statuses to a transient error', async () => {
      const response = new Response(JSON.stringify({ message: 'boom' }), {
        status: 500,
      });

      const error = await classifierErrorFromResponse(response, 'req-3');

      expect(error).toBeInstanceOf(TransientClassifierError);
      expect(error.kind).toBe(ClassifierErrorKind.TRANSIENT);
      expect(error.message).toBe('Classifier error 500: boom');
    });

    it('should fall back to the status when the JSON body has no detail', async () => {
      const response = new Response(JSON.stringify({}), { status: 502 });

      const error = await classifierErrorFromResponse(response, 'req-4');

      expect(error.message).toBe('Classifier error: 502');
    });

    it('should truncate long upstream detail to 200 characters', async () => {
      const response = new Response(
        JSON.stringify({ error: 'x'.repeat(300) }),
        { status: 500 },
      );

      const error = await classifierErrorFromResponse(response, 'req-5');

      expect(error.message).toBe(`Classifier error 500: ${'x'.repeat(200)}`);
    });
  });

  describe('classifierErrorFromNetwork', () => {
    it('should describe timeouts', () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';

      const error = classifierErrorFromNetwork(timeout, 'req-6');

      expect(error.kind).toBe(ClassifierErrorKind.TRANSIENT);
      expect(error.message).toBe('Network error: request timed out');
      expect(error.status).toBeNull();
      expect(error.cause).toBe(timeout);
    });

    it('should describe aborts', () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';

      expect(classifierErrorFromNetwork(abort, 'req-7').message).toBe(
        'Network error: request aborted',
      );
    });

    it('should keep the message of other errors', () => {
      expect(
        classifierErrorFromNetwork(new TypeError('fetch failed'), 'req-8')
          .message,
      ).toBe('Network error: fetch failed');
    });

    it('should handle non-Error values', () => {
      expect(classifierErrorFromNetwork('socket closed', 'req-9').message).toBe(
        'Network error: socket closed',
      );
    });
  });

  describe('RetriesExhaustedError', () => {
    it('should carry the last error and attempt history', () => {
      const lastError = new TransientClassifierError('Classifier error: 500', {
        status: 500,
        requestId: 'req-10',
      });
      const history = [
        {
          attempt: 1,
          waitedMs: 0,
          durationMs: 12,
          outcome: ClassifierErrorKind.TRANSIENT,
        },
        {
          attempt: 2,
          waitedMs: 4000,
          durationMs: 9,
          outcome: ClassifierErrorKind.TRANSIENT,
        },
      ];

      const error = new RetriesExhaustedError(lastError, history);

      expect(error.kind).toBe(ClassifierErrorKind.RETRIES_EXHAUSTED);
      expect(error.attempts).toBe(2);
      expect(error.lastError).toBe(lastError);
      expect(error.status).toBe(500);
      expect(error.message).toBe(
        'Classifier retries exhausted after 2 attempts: Classifier error: 500',
      );
      expect(error.toJSON()).toMatchObject({
        error: 'RetriesExhaustedError',
        kind: ClassifierErrorKind.RETRIES_EXHAUSTED,
        attempts: 2,
        lastError: {
          error: 'TransientClassifierError',
          status: 500,
          requestId: 'req-10',
        },
      });
    });
  });
});
