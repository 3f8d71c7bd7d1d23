import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../config/config.type';
import { sanitizeErrorMessage } from '../../audit/utils/phi-sanitizer.util';
import {
  ClassificationRequest,
  ClassificationResult,
  RemoteClassifierResponse,
} from '../domain/classification.types';
import { ClassificationStatus } from '../domain/enums/classification-status.enum';
import { ClassifierErrorKind } from '../domain/enums/classifier-error-kind.enum';
import { LabelSet, createLabelSet } from '../domain/label-set';
import { ClassifierClientPort } from '../domain/ports/classifier-client.port';
import { TruncationUnit } from '../config/classification-config.type';
import { truncateText } from '../domain/utils/text-truncation.util';
import {
  roundConfidence,
  selectTopLabel,
} from '../domain/utils/label-selection.util';
import { GovernedError, RetryGovernor } from './retry-governor';

/**
 * Classification Orchestrator
 *
 * Turns extracted text into a ClassificationResult. Classification is an
 * enrichment of the archival workflow, so `classify` never rejects: every
 * failure of the remote call becomes a degraded result.
 *
 * | Outcome                           | status        | confidence          |
 * |-----------------------------------|---------------|---------------------|
 * | well-formed, non-empty            | success       | top score, 4 dp     |
 * | well-formed, empty                | parse_error   | 0                   |
 * | unavailable / retries exhausted   | fallback_used | 0                   |
 * | malformed                         | parse_error   | best recoverable, 0 |
 */
@Injectable()
export class ClassificationService {
  private readonly logger = new Logger(ClassificationService.name);
  private readonly labelSet: LabelSet;
  private readonly fallbackLabel: string;
  private readonly maxTextLength: number;
  private readonly truncationUnit: TruncationUnit;

  constructor(
    @Inject('ClassifierClientPort')
    private readonly classifierClient: ClassifierClientPort,
    private readonly retryGovernor: RetryGovernor,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.fallbackLabel = this.configService.getOrThrow(
      'classification.fallbackLabel',
      { infer: true },
    );
    this.labelSet = createLabelSet(
      this.configService.getOrThrow('classification.labels', { infer: true }),
      this.fallbackLabel,
    );
    this.maxTextLength = this.configService.getOrThrow(
      'classification.maxTextLength',
      { infer: true },
    );
    this.truncationUnit = this.configService.getOrThrow(
      'classification.truncationUnit',
      { infer: true },
    );

    this.logger.log(
      `Classification initialized - Labels: ${this.labelSet.length}, Max text length: ${this.maxTextLength} ${this.truncationUnit}`,
    );
  }

  getLabelSet(): LabelSet {
    return this.labelSet;
  }

  getFallbackLabel(): string {
    return this.fallbackLabel;
  }

  buildRequest(text: string): ClassificationRequest {
    return {
      text: truncateText(text, this.maxTextLength, this.truncationUnit),
      labelSet: this.labelSet,
    };
  }

  async classify(
    text: string,
    signal?: AbortSignal,
  ): Promise<ClassificationResult> {
    try {
      const request = this.buildRequest(text);
      if (request.text.length < text.length) {
        this.logger.debug(
          `[CLASSIFICATION] Input truncated from ${text.length} to ${request.text.length} UTF-16 units`,
        );
      }

      const outcome = await this.retryGovernor.execute(
        () => this.classifierClient.call(request, signal),
        signal,
      );

      return outcome.ok
        ? this.fromResponse(outcome.value)
        : this.fromFailure(outcome.error);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[CLASSIFICATION] Unexpected failure, using fallback: ${sanitizeErrorMessage(reason)}`,
      );
      return this.degraded(ClassificationStatus.FALLBACK_USED, 0);
    }
  }

  private fromResponse(response: RemoteClassifierResponse): ClassificationResult {
    const top = selectTopLabel(response);
    if (!top) {
      this.logger.warn(
        '[CLASSIFICATION] Classifier returned no labels; marking as parse error',
      );
      return this.degraded(ClassificationStatus.PARSE_ERROR, 0);
    }

    const result: ClassificationResult = {
      label: top.label,
      confidence: roundConfidence(top.score),
      status: ClassificationStatus.SUCCESS,
    };
    this.logger.log(
      `[CLASSIFICATION] Classified as "${result.label}" | Confidence: ${result.confidence}`,
    );
    return result;
  }

  private fromFailure(error: GovernedError): ClassificationResult {
    switch (error.kind) {
      case ClassifierErrorKind.MALFORMED_RESPONSE: {
        const scores = error.partial.scores ?? [];
        const recovered = scores.length > 0 ? Math.max(...scores) : 0;
        this.logger.warn(
          `[CLASSIFICATION] Malformed classifier response, using fallback label | Recovered score: ${roundConfidence(recovered)}`,
        );
        return this.degraded(
          ClassificationStatus.PARSE_ERROR,
          roundConfidence(recovered),
        );
      }
      case ClassifierErrorKind.UNAVAILABLE:
      case ClassifierErrorKind.RETRIES_EXHAUSTED:
      case ClassifierErrorKind.TRANSIENT:
        this.logger.warn(
          `[CLASSIFICATION] Classifier failed with ${error.kind}, using fallback label`,
        );
        return this.degraded(ClassificationStatus.FALLBACK_USED, 0);
    }
  }

  private degraded(
    status: ClassificationStatus,
    confidence: number,
  ): ClassificationResult {
    return { label: this.fallbackLabel, confidence, status };
  }
}
