/**
 * Document Processor
 *
 * Runs recognition, entity extraction and field mapping for one document
 * and returns the record the case aggregator consumes.
 */

import { createDefaultRegistry, extractEntities, type ExtractorRegistry } from '../extractors';
import { mapFields } from '../fields';
import { logger } from '../logger';
import {
  assistFallbacksCounter,
  documentsRecognizedCounter,
  fieldsNeedingReviewHistogram,
  recognitionConfidenceHistogram,
} from '../metrics';
import { recognize, type AssistGuess } from '../recognition';
import type { CaseDocument } from '../types';
import type { ClassificationAssist } from './assist';

export interface DocumentInput {
  document_id: string;
  filename: string;
  text: string;
  /** Day deadlines are measured from; defaults to now */
  referenceDate?: Date;
}

export interface DocumentProcessorOptions {
  registry?: ExtractorRegistry;
  assist?: ClassificationAssist | null;
  answerDeadlineOffsetDays?: number;
}

type ProcessingMode = 'rules' | 'assisted';

export class DocumentProcessor {
  private readonly registry: ExtractorRegistry;
  private readonly assist: ClassificationAssist | null;
  private readonly answerDeadlineOffsetDays: number | undefined;

  constructor(options: DocumentProcessorOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.assist = options.assist ?? null;
    this.answerDeadlineOffsetDays = options.answerDeadlineOffsetDays;
  }

  get hasAssist(): boolean {
    return this.assist !== null;
  }

  processRuleBased(input: DocumentInput): CaseDocument {
    return this.build(input, null, 'rules');
  }

  /**
   * Consults the assist when one is configured. Assist failures are logged
   * and the document is processed rule-based.
   */
  async process(input: DocumentInput): Promise<CaseDocument> {
    if (!this.assist || input.text.trim().length === 0) {
      return this.processRuleBased(input);
    }
    const guess = await this.consultAssist(this.assist, input);
    return this.build(input, guess, guess ? 'assisted' : 'rules');
  }

  private async consultAssist(assist: ClassificationAssist, input: DocumentInput): Promise<AssistGuess | null> {
    try {
      const guess = await assist.classify(input.text, input.filename);
      if (!guess) {
        assistFallbacksCounter.inc({ reason: 'no_guess' });
        logger.warn('Assist gave no usable guess, continuing rule-based', {
          assist: assist.name,
          document_id: input.document_id,
        });
      }
      return guess;
    } catch (err) {
      assistFallbacksCounter.inc({ reason: 'error' });
      logger.warn('Assist failed, continuing rule-based', {
        assist: assist.name,
        document_id: input.document_id,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private build(input: DocumentInput, guess: AssistGuess | null, mode: ProcessingMode): CaseDocument {
    const classification = recognize(input.text, input.filename, {
      referenceDate: input.referenceDate,
      assist: guess,
    });
    const entities = extractEntities(input.text, this.registry);
    const fields = mapFields(entities, classification, input.text, {
      answerDeadlineOffsetDays: this.answerDeadlineOffsetDays,
    });

    documentsRecognizedCounter.inc({ category: classification.category, document_type: classification.type, mode });
    recognitionConfidenceHistogram.observe({ category: classification.category }, classification.confidence);
    fieldsNeedingReviewHistogram.observe({ document_type: classification.type }, fields.fields_needing_review);

    logger.info('Document processed', {
      document_id: input.document_id,
      document_type: classification.type,
      confidence: classification.confidence,
      urgency: classification.urgency,
      entity_count: entities.length,
      fields_needing_review: fields.fields_needing_review,
      mode,
    });

    return {
      document_id: input.document_id,
      filename: input.filename,
      classification,
      entities,
      fields,
    };
  }
}
