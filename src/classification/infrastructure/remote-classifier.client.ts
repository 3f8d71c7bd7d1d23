import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../config/config.type';
import { err, ok } from '../../utils/types/result.type';
import { sanitizeErrorMessage } from '../../audit/utils/phi-sanitizer.util';
import { ClassificationRequest } from '../domain/classification.types';
import {
  ClassifierCallResult,
  ClassifierClientPort,
} from '../domain/ports/classifier-client.port';
import {
  MalformedResponseError,
  classifierErrorFromNetwork,
  classifierErrorFromResponse,
} from '../domain/errors/classifier-error';
import { ClassifierErrorKind } from '../domain/enums/classifier-error-kind.enum';
import { CandidateLabelsFormat } from '../config/classification-config.type';
import { decodeClassifierResponse } from './classifier-response.decoder';

export interface ClassifierRequestBody {
  inputs: string;
  parameters: {
    candidate_labels: string[] | string;
  };
}

/**
 * HTTP client for the remote zero-shot classification endpoint.
 *
 * One call is one attempt: retry policy lives in RetryGovernor. Failures are
 * returned as values, never thrown.
 *
 * HIPAA Compliance: never logs document text, the bearer token or response
 * bodies beyond a sanitized error summary.
 */
@Injectable()
export class RemoteClassifierClient implements ClassifierClientPort {
  private readonly logger = new Logger(RemoteClassifierClient.name);
  private readonly apiUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly labelsFormat: CandidateLabelsFormat;
  private readonly labelsDelimiter: string;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.apiUrl = this.configService.getOrThrow('classification.apiUrl', {
      infer: true,
    });
    this.apiToken = this.configService.getOrThrow('classification.apiToken', {
      infer: true,
    });
    this.timeoutMs = this.configService.getOrThrow('classification.timeoutMs', {
      infer: true,
    });
    this.labelsFormat = this.configService.getOrThrow(
      'classification.labelsFormat',
      { infer: true },
    );
    this.labelsDelimiter = this.configService.getOrThrow(
      'classification.labelsDelimiter',
      { infer: true },
    );
  }

  async call(
    request: ClassificationRequest,
    signal?: AbortSignal,
  ): Promise<ClassifierCallResult> {
    const requestId = randomUUID();
    const startTime = Date.now();

    this.logger.debug(
      `[CLASSIFIER] POST | Labels: ${request.labelSet.length} | Text length: ${request.text.length} | RequestId: ${requestId}`,
    );

    let response: Response;
    let rawBody: string;
    try {
      response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          'Content-Type': 'application/json',
          'X-Request-Id': requestId,
          'X-Client-Service': 'medical-document-classifier',
        },
        body: JSON.stringify(this.buildRequestBody(request)),
        signal: this.buildSignal(signal),
      });

      if (!response.ok) {
        const failure = await classifierErrorFromResponse(response, requestId);
        const duration = Date.now() - startTime;
        const line = `[CLASSIFIER] Status: ${response.status} | Kind: ${failure.kind} | Duration: ${duration}ms | RequestId: ${requestId} | Error: ${sanitizeErrorMessage(failure.message)}`;
        if (failure.kind === ClassifierErrorKind.UNAVAILABLE) {
          this.logger.warn(line);
        } else {
          this.logger.error(line);
        }
        return err(failure);
      }

      rawBody = await response.text();
    } catch (error) {
      const failure = classifierErrorFromNetwork(error, requestId);
      this.logger.error(
        `[CLASSIFIER] Request failed | Duration: ${Date.now() - startTime}ms | RequestId: ${requestId} | Error: ${sanitizeErrorMessage(failure.message)}`,
      );
      return err(failure);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      this.logger.error(
        `[CLASSIFIER] Response body is not JSON | Status: ${response.status} | RequestId: ${requestId}`,
      );
      return err(
        new MalformedResponseError('Response body is not valid JSON', {
          status: response.status,
          requestId,
        }),
      );
    }

    const decoded = decodeClassifierResponse(payload, request.labelSet);
    if (!decoded.ok) {
      this.logger.error(
        `[CLASSIFIER] Malformed response | Status: ${response.status} | RequestId: ${requestId} | Error: ${decoded.error.message}`,
      );
      return err(
        new MalformedResponseError(decoded.error.message, {
          status: response.status,
          requestId,
          partial: decoded.error.partial,
        }),
      );
    }

    this.logger.debug(
      `[CLASSIFIER] Status: ${response.status} | Labels returned: ${decoded.value.labels.length} | Duration: ${Date.now() - startTime}ms | RequestId: ${requestId}`,
    );
    return ok(decoded.value);
  }

  /**
   * Wire body; `candidate_labels` is an array or one delimited string
   * depending on the endpoint version configured.
   */
  buildRequestBody(request: ClassificationRequest): ClassifierRequestBody {
    return {
      inputs: request.text,
      parameters: {
        candidate_labels:
          this.labelsFormat === 'delimited'
            ? request.labelSet.join(this.labelsDelimiter)
            : [...request.labelSet],
      },
    };
  }

  /**
   * Per-attempt timeout, also aborted when the caller aborts.
   */
  private buildSignal(callerSignal?: AbortSignal): AbortSignal {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    if (!callerSignal) {
      return timeoutSignal;
    }

    const controller = new AbortController();
    const forward = (source: AbortSignal) => () =>
      controller.abort(source.reason);

    if (callerSignal.aborted) {
      controller.abort(callerSignal.reason);
      return controller.signal;
    }
    timeoutSignal.addEventListener('abort', forward(timeoutSignal), {
      once: true,
    });
    callerSignal.addEventListener('abort', forward(callerSignal), {
      once: true,
    });
    return controller.signal;
  }
}
