/**
 * Document Pipeline Module
 */

export {
  ASSIST_TYPE_ALIASES,
  OpenAiClassificationAssist,
  coerceAssistResponse,
  createAssistFromConfig,
  normalizeAssistType,
  type ClassificationAssist,
  type OpenAiAssistOptions,
} from './assist';
export { DocumentProcessor, type DocumentInput, type DocumentProcessorOptions } from './document-processor';
