/**
 * Case Aggregation Module
 */

export { aggregate, bucketForAmount, AMOUNT_BUCKET_RULES, type AggregateOptions } from './case-aggregator';
export {
  CaseHub,
  FORM_IDS,
  isFormId,
  type CaseDocumentSource,
  type CaseHubOptions,
  type Clock,
  type HearingInfo,
  type DeadlineInfo,
  type CalendarEvent,
  type CalendarEventType,
  type FormId,
  type FormAutofill,
  type AutofillValue,
} from './case-hub';
