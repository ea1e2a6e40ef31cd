/**
 * Classification Assist
 *
 * Optional external classifier consulted before recognition. Its guess is
 * one more weighted signal; the rule layers still decide. Responses are
 * validated permissively and mapped onto the known document types.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { assistRequestDurationHistogram, assistRequestsCounter } from '../metrics';
import type { AssistGuess } from '../recognition';
import { isDocumentType } from '../patterns/document-types';
import { validateAssistResponse } from '../schemas';
import { DOCUMENT_TYPES, type DocumentType } from '../types';

export interface ClassificationAssist {
  readonly name: string;
  /** Resolves to null when the assist has no usable guess. */
  classify(text: string, filename: string): Promise<AssistGuess | null>;
}

/**
 * Labels assists commonly answer with that are not document types.
 */
export const ASSIST_TYPE_ALIASES: Readonly<Record<string, DocumentType>> = {
  court_summons: 'summons',
  eviction_summons: 'summons',
  eviction_complaint: 'complaint',
  writ_of_restitution: 'writ',
  writ_of_recovery: 'writ',
  court_judgment: 'judgment',
  order: 'court_order',
  eviction: 'eviction_notice',
  notice_to_vacate: 'notice_to_quit',
  lease_agreement: 'lease',
  rental_agreement: 'lease',
  rent_receipt: 'receipt',
  payment_receipt: 'receipt',
  rent_ledger: 'ledger',
  security_deposit: 'deposit_statement',
  deposit: 'deposit_statement',
  inspection_report: 'inspection',
  repair: 'repair_request',
  maintenance_request: 'repair_request',
  correspondence: 'letter',
  other: 'unknown',
};

export function normalizeAssistType(raw: string): DocumentType {
  const key = raw
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_');
  if (isDocumentType(key)) {
    return key;
  }
  return ASSIST_TYPE_ALIASES[key] ?? 'unknown';
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Turn a raw assist payload (a JSON string or a parsed object) into a guess.
 * Types are coerced and missing keys take defaults; unusable payloads give null.
 */
export function coerceAssistResponse(raw: unknown): AssistGuess | null {
  let data: unknown = raw;
  if (typeof raw === 'string') {
    try {
      data = JSON.parse(raw);
    } catch (err) {
      logger.warn('Assist response is not JSON', {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  const response = validateAssistResponse(data);
  if (!response) {
    return null;
  }

  return {
    type: normalizeAssistType(response.doc_type),
    confidence: clamp01(response.confidence),
  };
}

// ============================================================================
// OpenAI assist
// ============================================================================

const SYSTEM_PROMPT =
  'You classify tenant legal documents. Always respond with a single flat JSON object and no other text.';

function buildUserPrompt(text: string, filename: string): string {
  return [
    `Document filename: ${filename}`,
    '',
    'Document text:',
    '---',
    text,
    '---',
    '',
    'Respond with JSON using exactly these keys:',
    `"doc_type": one of ${DOCUMENT_TYPES.join(', ')}`,
    '"confidence": number from 0.0 to 1.0',
    '"title": short descriptive title',
    '"summary": two sentence plain-English summary for the tenant',
    '"key_dates": array of {"date": "YYYY-MM-DD", "description": string}',
    '"key_parties": array of {"name": string, "role": string}',
    '"key_amounts": array of {"amount": number, "description": string}',
    '"key_terms": array of strings',
  ].join('\n');
}

export interface OpenAiAssistOptions {
  /** OpenAI API key (uses config if not provided) */
  apiKey?: string;
  model?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Text beyond this many characters is cut before sending */
  maxChars?: number;
  /** Pre-built client; one is created from the options otherwise */
  client?: OpenAI;
}

export class OpenAiClassificationAssist implements ClassificationAssist {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxChars: number;

  constructor(options: OpenAiAssistOptions = {}) {
    this.model = options.model || config.assistModel;
    this.maxChars = options.maxChars || config.assistMaxChars;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey || config.openaiApiKey,
        timeout: options.timeoutMs || config.assistRequestTimeoutMs,
        maxRetries: 0, // Disable SDK retries - a failed assist falls back to rules
      });
  }

  async classify(text: string, filename: string): Promise<AssistGuess | null> {
    const truncated = text.length > this.maxChars ? `${text.slice(0, this.maxChars)}\n\n[... document truncated ...]` : text;
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(truncated, filename) },
        ],
        response_format: { type: 'json_object' },
        temperature: 0.1,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty response from OpenAI');
      }

      const durationMs = Date.now() - startTime;
      assistRequestsCounter.inc({ model: this.model, status: 'success' });
      assistRequestDurationHistogram.observe({ model: this.model }, durationMs / 1000);

      logger.info('Assist classification complete', {
        model: this.model,
        request_id: response.id,
        duration_ms: durationMs,
        tokens_used: response.usage?.total_tokens,
        truncated: truncated.length !== text.length,
      });

      return coerceAssistResponse(content);
    } catch (error) {
      assistRequestsCounter.inc({ model: this.model, status: 'error' });
      logger.error('Assist classification failed', error, {
        model: this.model,
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }
}

/**
 * The configured assist, or null when it is disabled or has no API key.
 */
export function createAssistFromConfig(): ClassificationAssist | null {
  if (!config.assistEnabled) {
    return null;
  }
  if (!config.openaiApiKey) {
    logger.warn('ASSIST_ENABLED is set but OPENAI_API_KEY is empty; assist disabled');
    return null;
  }
  return new OpenAiClassificationAssist();
}
