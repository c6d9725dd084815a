/** Every abstract setting kind a PlanSpec can record. */
export const SETTING_TAGS = [
  'name',
  'type',
  'scope',
  'projection',
  'desiredState',
  'histBaseline',
  'peakBaseline',
  'addHistorical',
  'includeReserved',
  'maxUtilization',
  'currentUtilization',
  'osMigration',
  'constraint',
  'relievePressure',
  'automation.provisionPM',
  'automation.suspendPM',
  'automation.provisionDS',
  'automation.suspendDS',
  'automation.resize',
  'entity.add',
  'entity.migrate',
  'entity.remove',
  'entity.replace',
] as const;

export type SettingTag = (typeof SETTING_TAGS)[number];

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | FieldRecord;

export interface FieldRecord {
  [key: string]: FieldValue;
}

export type SettingFields = FieldRecord;

export interface SettingEntry {
  tag: SettingTag;
  fields: SettingFields;
}

/**
 * Field equality filter. Keys may be dotted paths (`target.uuid`) that
 * resolve through nested records.
 */
export type SettingFilter = Record<string, FieldValue>;

/** JSON object submitted to the analysis service. */
export type WireDto = FieldRecord;

// Map definition DSL
//   "$field"         substitute context[field]
//   "@field:table"   translate context[field] through table
//   "key[group]"     list node rendered once per item of context[group]
export type MapNode = string | number | boolean | null | MapNode[] | MapDefinition;

export interface MapDefinition {
  [key: string]: MapNode;
}

export type MapDefinitionSet = Partial<Record<SettingTag, MapDefinition>>;

export type CollationPolicy = 'keep-first' | 'keep-last';

export interface CollationGroup {
  label: string;
  fields: string[];
}

export interface CollationRule {
  groups: CollationGroup[];
  policy?: CollationPolicy;
}

export type CollationRules = Partial<Record<SettingTag, CollationRule>>;

export function isFieldRecord(value: FieldValue | undefined): value is FieldRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSettingTag(value: string): value is SettingTag {
  return SETTING_TAGS.some((tag) => tag === value);
}
