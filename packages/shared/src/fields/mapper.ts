/**
 * Field Mapper
 *
 * Maps extracted entities and the classification onto the named form
 * fields. Pure and deterministic: the same input always gives an equal
 * output, with no timestamps.
 */

import { addDays } from '../calendar';
import { config } from '../config';
import type {
  AddressEntity,
  Classification,
  ConfidenceTier,
  EntityKind,
  ExtractedEntity,
  ExtractedField,
  FieldCategory,
  FieldName,
  FieldValue,
  FormFieldsExtraction,
} from '../types';
import {
  CONFIDENCE_FIELDS,
  COUNTY_JUDICIAL_DISTRICTS,
  FIELD_DEFINITIONS,
  FIELD_SET_VERSION,
  NOTICE_TYPE_BY_DOCUMENT,
  TIER_WEIGHTS,
  type FieldDefinition,
  type MatcherGroup,
  type TextRule,
} from './definitions';

export interface MapFieldsOptions {
  /** Days after the summons date used for a derived answer deadline */
  answerDeadlineOffsetDays?: number;
  /** County assumed for court documents that name none */
  defaultCounty?: string;
}

interface Resolution {
  value: FieldValue | null;
  tier: ConfidenceTier;
  source: string;
  sourceText: string;
  alternatives: FieldValue[];
}

const EMPTY: Resolution = { value: null, tier: 'empty', source: 'none', sourceText: '', alternatives: [] };

const TIER_ORDER: readonly ConfidenceTier[] = ['high', 'medium', 'low', 'guess', 'empty'];

function weaker(a: ConfidenceTier, b: ConfidenceTier): ConfidenceTier {
  return TIER_ORDER.indexOf(a) >= TIER_ORDER.indexOf(b) ? a : b;
}

function distinctOthers(values: readonly FieldValue[], value: FieldValue): FieldValue[] {
  return Array.from(new Set(values)).filter((candidate) => candidate !== value);
}

function firstMatchingGroup<E extends ExtractedEntity>(
  entities: readonly E[],
  groups: readonly MatcherGroup[]
): { group: MatcherGroup; matches: E[] } | null {
  for (const group of groups) {
    const matches = entities.filter((entity) => group.labels.includes(entity.context_label));
    if (matches.length > 0) {
      return { group, matches };
    }
  }
  return null;
}

function resolveEntity(entities: readonly ExtractedEntity[], kind: EntityKind, groups: readonly MatcherGroup[]): Resolution {
  const found = firstMatchingGroup(
    entities.filter((entity) => entity.kind === kind),
    groups
  );
  const first = found?.matches[0];
  if (!found || !first) {
    return EMPTY;
  }
  return {
    value: first.value,
    tier: found.group.tier,
    source: `entity:${first.kind}/${first.rule}`,
    sourceText: first.source_text,
    alternatives: distinctOthers(
      found.matches.map((entity) => entity.value),
      first.value
    ),
  };
}

function isAddress(entity: ExtractedEntity): entity is AddressEntity {
  return entity.kind === 'address';
}

function resolveComponent(
  entities: readonly ExtractedEntity[],
  component: 'street' | 'unit' | 'city' | 'state' | 'zip',
  groups: readonly MatcherGroup[]
): Resolution {
  const found = firstMatchingGroup(entities.filter(isAddress), groups);
  const first = found?.matches[0];
  const value = first?.components[component];
  if (!found || !first || value === null || value === undefined) {
    return EMPTY;
  }

  const tier = component === 'state' && first.components.state_defaulted ? weaker(found.group.tier, 'low') : found.group.tier;
  const others = found.matches
    .map((entity) => entity.components[component])
    .filter((candidate): candidate is string => typeof candidate === 'string');

  return {
    value,
    tier,
    source: component === 'state' && first.components.state_defaulted ? 'default:state' : `entity:address/${component}`,
    sourceText: first.source_text,
    alternatives: distinctOthers(others, value),
  };
}

function resolveText(rawText: string, rules: readonly TextRule[]): Resolution {
  for (const rule of rules) {
    const match = rule.pattern.exec(rawText);
    if (!match) {
      continue;
    }
    const value = rule.format ? rule.format(match) : match[1] ?? '';
    if (value.length === 0) {
      continue;
    }
    return { value, tier: rule.tier, source: `text:${rule.id}`, sourceText: match[0], alternatives: [] };
  }
  return EMPTY;
}

function resolveDefinition(definition: FieldDefinition, entities: readonly ExtractedEntity[], rawText: string): Resolution {
  const { source } = definition;
  switch (source.kind) {
    case 'entity':
      return resolveEntity(entities, source.entity, source.groups);
    case 'component':
      return resolveComponent(entities, source.component, source.groups);
    case 'text':
      return resolveText(rawText, source.rules);
  }
}

/** Fallbacks that depend on the classification or on other fields. All are LOW. */
function applyFallbacks(
  resolved: Map<FieldName, Resolution>,
  classification: Classification,
  options: Required<MapFieldsOptions>
): void {
  const noticeType = NOTICE_TYPE_BY_DOCUMENT[classification.type];
  if ((resolved.get('notice_type') ?? EMPTY).value === null && noticeType) {
    resolved.set('notice_type', {
      value: noticeType,
      tier: 'low',
      source: 'classification',
      sourceText: '',
      alternatives: [],
    });
  }

  if ((resolved.get('county') ?? EMPTY).value === null && classification.category === 'court' && options.defaultCounty) {
    resolved.set('county', {
      value: options.defaultCounty,
      tier: 'low',
      source: 'default:county',
      sourceText: '',
      alternatives: [],
    });
  }

  const county = resolved.get('county')?.value;
  const district = typeof county === 'string' ? COUNTY_JUDICIAL_DISTRICTS[county] : undefined;
  if ((resolved.get('judicial_district') ?? EMPTY).value === null && district) {
    resolved.set('judicial_district', {
      value: district,
      tier: 'low',
      source: 'derived:county',
      sourceText: '',
      alternatives: [],
    });
  }
}

function buildField(name: FieldName, displayName: string, resolution: Resolution): ExtractedField {
  if (resolution.value === null) {
    return {
      field_name: name,
      display_name: displayName,
      value: null,
      confidence: 'empty',
      source: 'none',
      source_text: '',
      alternatives: [],
      needs_review: true,
      review_reason: `${displayName} not found in document`,
    };
  }

  const reasons: string[] = [];
  if (resolution.tier !== 'high') {
    reasons.push(`Please verify ${displayName.toLowerCase()}`);
  }
  if (resolution.alternatives.length > 0) {
    reasons.push(`${resolution.alternatives.length} other candidate(s) found`);
  }

  return {
    field_name: name,
    display_name: displayName,
    value: resolution.value,
    confidence: resolution.tier,
    source: resolution.source,
    source_text: resolution.sourceText,
    alternatives: resolution.alternatives,
    needs_review: resolution.tier !== 'high' || resolution.alternatives.length > 0,
    review_reason: reasons.join('; '),
  };
}

/** Mean tier weight over CONFIDENCE_FIELDS, rounded to 3 decimals. */
export function computeOverallConfidence(fields: Readonly<Record<FieldName, ExtractedField>>): number {
  const total = CONFIDENCE_FIELDS.reduce((sum, name) => sum + TIER_WEIGHTS[fields[name].confidence], 0);
  return Math.round((total / CONFIDENCE_FIELDS.length) * 1000) / 1000;
}

export function countFieldsNeedingReview(fields: Readonly<Record<FieldName, ExtractedField>>): number {
  return Object.values(fields).filter((field) => field.needs_review).length;
}

const DEFINITIONS_BY_NAME = new Map<FieldName, FieldDefinition>(
  FIELD_DEFINITIONS.map((definition): [FieldName, FieldDefinition] => [definition.name, definition])
);

/** Builds the full field arena; the literal keeps the record complete at compile time. */
function buildFieldRecord(build: (name: FieldName) => ExtractedField): Record<FieldName, ExtractedField> {
  return {
    case_number: build('case_number'),
    court_name: build('court_name'),
    county: build('county'),
    judicial_district: build('judicial_district'),
    tenant_name: build('tenant_name'),
    tenant_address: build('tenant_address'),
    tenant_city: build('tenant_city'),
    tenant_state: build('tenant_state'),
    tenant_zip: build('tenant_zip'),
    tenant_phone: build('tenant_phone'),
    tenant_email: build('tenant_email'),
    landlord_name: build('landlord_name'),
    landlord_address: build('landlord_address'),
    landlord_city: build('landlord_city'),
    landlord_state: build('landlord_state'),
    landlord_zip: build('landlord_zip'),
    landlord_phone: build('landlord_phone'),
    landlord_email: build('landlord_email'),
    property_address: build('property_address'),
    property_city: build('property_city'),
    property_state: build('property_state'),
    property_zip: build('property_zip'),
    unit_number: build('unit_number'),
    lease_start_date: build('lease_start_date'),
    lease_end_date: build('lease_end_date'),
    monthly_rent: build('monthly_rent'),
    security_deposit: build('security_deposit'),
    lease_type: build('lease_type'),
    notice_date: build('notice_date'),
    notice_type: build('notice_type'),
    summons_date: build('summons_date'),
    service_date: build('service_date'),
    answer_deadline: build('answer_deadline'),
    hearing_date: build('hearing_date'),
    hearing_time: build('hearing_time'),
    rent_claimed: build('rent_claimed'),
    late_fees_claimed: build('late_fees_claimed'),
    other_fees_claimed: build('other_fees_claimed'),
    total_claimed: build('total_claimed'),
  };
}

/**
 * Fill an empty answer deadline from the summons date plus the offset.
 * Returns a new extraction; a deadline found in the document is never
 * overridden.
 */
export function deriveAnswerDeadline(
  extraction: FormFieldsExtraction,
  offsetDays: number = config.answerDeadlineOffsetDays
): FormFieldsExtraction {
  const summons = extraction.fields.summons_date;
  const deadline = extraction.fields.answer_deadline;
  if (typeof summons.value !== 'string' || deadline.value !== null) {
    return extraction;
  }

  const derived: ExtractedField = {
    ...deadline,
    value: addDays(summons.value, offsetDays),
    confidence: 'low',
    source: 'derived:summons_date',
    source_text: summons.source_text,
    alternatives: [],
    needs_review: true,
    review_reason: `Calculated as ${offsetDays} days from summons date; verify against the summons`,
  };
  const fields = { ...extraction.fields, answer_deadline: derived };

  return {
    ...extraction,
    fields,
    overall_confidence: computeOverallConfidence(fields),
    fields_needing_review: countFieldsNeedingReview(fields),
  };
}

/**
 * Map entities onto the form fields.
 *
 * @param rawText - used by the text-sourced fields (court name, county, hearing time, ...)
 */
export function mapFields(
  entities: readonly ExtractedEntity[],
  classification: Classification,
  rawText: string,
  options: MapFieldsOptions = {}
): FormFieldsExtraction {
  const resolvedOptions: Required<MapFieldsOptions> = {
    answerDeadlineOffsetDays: options.answerDeadlineOffsetDays ?? config.answerDeadlineOffsetDays,
    defaultCounty: options.defaultCounty ?? config.defaultCounty,
  };

  const resolved = new Map<FieldName, Resolution>();
  for (const definition of FIELD_DEFINITIONS) {
    resolved.set(definition.name, resolveDefinition(definition, entities, rawText));
  }
  applyFallbacks(resolved, classification, resolvedOptions);

  const fields = buildFieldRecord((name) =>
    buildField(name, DEFINITIONS_BY_NAME.get(name)?.displayName ?? name, resolved.get(name) ?? EMPTY)
  );

  const extraction: FormFieldsExtraction = {
    field_set_version: FIELD_SET_VERSION,
    document_type: classification.type,
    fields,
    overall_confidence: computeOverallConfidence(fields),
    fields_needing_review: countFieldsNeedingReview(fields),
  };

  return deriveAnswerDeadline(extraction, resolvedOptions.answerDeadlineOffsetDays);
}

export type FormFieldsDict = Record<FieldCategory, Record<string, FieldValue | null>> & {
  metadata: {
    field_set_version: string;
    document_type: string;
    overall_confidence: number;
    fields_needing_review: number;
    review_fields: string[];
  };
};

/**
 * Render the grouped plain mapping used by form filling:
 * {case, tenant, landlord, property, lease, dates, amounts, metadata}.
 */
export function toFormFieldsDict(extraction: FormFieldsExtraction): FormFieldsDict {
  const groups: Record<FieldCategory, Record<string, FieldValue | null>> = {
    case: {},
    tenant: {},
    landlord: {},
    property: {},
    lease: {},
    dates: {},
    amounts: {},
  };
  for (const definition of FIELD_DEFINITIONS) {
    groups[definition.category][definition.name] = extraction.fields[definition.name].value;
  }

  return {
    ...groups,
    metadata: {
      field_set_version: extraction.field_set_version,
      document_type: extraction.document_type,
      overall_confidence: extraction.overall_confidence,
      fields_needing_review: extraction.fields_needing_review,
      review_fields: FIELD_DEFINITIONS.filter((definition) => extraction.fields[definition.name].needs_review).map(
        (definition) => definition.name
      ),
    },
  };
}
