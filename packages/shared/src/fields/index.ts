/**
 * Field Mapping Module
 */

export {
  FIELD_SET_VERSION,
  FIELD_DEFINITIONS,
  CONFIDENCE_FIELDS,
  TIER_WEIGHTS,
  NOTICE_TYPE_BY_DOCUMENT,
  COUNTY_JUDICIAL_DISTRICTS,
  getFieldDefinition,
  titleCase,
  type FieldDefinition,
  type FieldSource,
  type MatcherGroup,
  type TextRule,
} from './definitions';
export {
  mapFields,
  deriveAnswerDeadline,
  toFormFieldsDict,
  computeOverallConfidence,
  countFieldsNeedingReview,
  type MapFieldsOptions,
  type FormFieldsDict,
} from './mapper';
