/**
 * Option catalog
 * -------------------------------------------------
 * The allowed values for every selectable field on the inspection form,
 * the validity period of each equipment type and the TAG rule.
 *
 * A catalog is an immutable value: build it once with `createCatalog()` at
 * start-up and hand it to the store, the validator and the API. Tests build
 * their own with overrides.
 */
import { ValidationError } from '../utils/errors';

export interface EquipmentTypeOption {
  name: string;
  /** prefix used in the TAG, e.g. `VP` */
  tagPrefix: string;
  /** highest equipment sequence number allowed for this type */
  maxSequence: number;
  /** days after an inspection before the next one is due */
  validityDays: number;
}

export interface OptionCatalog {
  readonly platforms: readonly string[];
  readonly modules: readonly string[];
  readonly sectors: readonly string[];
  readonly equipmentTypes: readonly Readonly<EquipmentTypeOption>[];
  readonly defects: readonly string[];
  readonly causes: readonly string[];
  readonly rtiCategories: readonly string[];
  readonly recommendations: readonly string[];
  readonly damageTypes: readonly string[];
}

const DEFAULT_OPTIONS: OptionCatalog = {
  platforms: ['P-1', 'P-2', 'P-3', 'P-4'],
  modules: ['M01', 'M02', 'M03', 'M04', 'M05', 'M06', 'M07', 'M08', 'M09', 'M10'],
  sectors: ['S01', 'S02', 'S03'],
  equipmentTypes: [
    { name: 'Vaso de Pressão', tagPrefix: 'VP', maxSequence: 50, validityDays: 180 },
    { name: 'Tanque', tagPrefix: 'TQ', maxSequence: 40, validityDays: 365 },
    { name: 'Permutador', tagPrefix: 'PM', maxSequence: 30, validityDays: 360 },
    { name: 'Filtro', tagPrefix: 'FT', maxSequence: 100, validityDays: 90 },
  ],
  defects: ['Redução de espessura', 'Vazamento', 'Trinca', 'Desgaste anormal', 'Outro'],
  causes: ['Corrosão externa', 'Corrosão interna', 'Vibração excessiva', 'Impacto', 'Outro'],
  rtiCategories: ['I', 'II', 'III', 'IV'],
  recommendations: ['Reparar imediatamente', 'Estender prazo de execução', 'Interromper o serviço', 'Pintura', 'Outra'],
  damageTypes: ['Localizado', 'Disperso', 'Generalizado'],
};

export function createCatalog(overrides: Partial<OptionCatalog> = {}): OptionCatalog {
  const merged: OptionCatalog = { ...DEFAULT_OPTIONS, ...overrides };
  const prefixes = new Set(merged.equipmentTypes.map((t) => t.tagPrefix));
  if (prefixes.size !== merged.equipmentTypes.length) {
    throw new Error('createCatalog: equipment type TAG prefixes must be unique');
  }
  // Only the platform may contain '-': the TAG is read from the right, so the other segments must not
  const segments: [string, readonly string[]][] = [
    ['module', merged.modules],
    ['sector', merged.sectors],
    ['TAG prefix', merged.equipmentTypes.map((t) => t.tagPrefix)],
  ];
  for (const [label, values] of segments) {
    const bad = values.find((v) => v === '' || v.includes('-'));
    if (bad !== undefined) throw new Error(`createCatalog: ${label} "${bad}" must be non-empty and contain no '-'`);
  }
  if (merged.platforms.some((p) => p === '')) throw new Error('createCatalog: platforms must be non-empty');
  return Object.freeze({
    platforms: Object.freeze([...merged.platforms]),
    modules: Object.freeze([...merged.modules]),
    sectors: Object.freeze([...merged.sectors]),
    equipmentTypes: Object.freeze(merged.equipmentTypes.map((t) => Object.freeze({ ...t }))),
    defects: Object.freeze([...merged.defects]),
    causes: Object.freeze([...merged.causes]),
    rtiCategories: Object.freeze([...merged.rtiCategories]),
    recommendations: Object.freeze([...merged.recommendations]),
    damageTypes: Object.freeze([...merged.damageTypes]),
  });
}

export const DEFAULT_CATALOG = createCatalog();

export function findEquipmentType(catalog: OptionCatalog, name: string) {
  return catalog.equipmentTypes.find((t) => t.name === name);
}

function requireEquipmentType(catalog: OptionCatalog, name: string) {
  const type = findEquipmentType(catalog, name);
  if (!type) throw ValidationError.single('equipmentType', `unknown equipment type "${name}"`);
  return type;
}

export function validityDays(catalog: OptionCatalog, equipmentType: string): number {
  return requireEquipmentType(catalog, equipmentType).validityDays;
}

export interface TagFields {
  platform: string;
  module: string;
  sector: string;
  equipmentType: string;
  sequence: number;
}

/**
 * `P-1-M01-S01-VP-007`. Module, sector and prefix never contain '-' (checked
 * by `createCatalog`) and the sequence is digits, so the TAG splits back into
 * its tuple from the right and distinct tuples never produce the same TAG.
 */
export function tag(catalog: OptionCatalog, fields: TagFields): string {
  const type = requireEquipmentType(catalog, fields.equipmentType);
  return [fields.platform, fields.module, fields.sector, tagSuffix(type.tagPrefix, fields.sequence)].join('-');
}

function tagSuffix(prefix: string, sequence: number) {
  return `${prefix}-${String(sequence).padStart(3, '0')}`;
}

// The per-type equipment list the form offers, e.g. VP-001 … VP-050
export function tagsForType(catalog: OptionCatalog, equipmentType: string): string[] {
  const type = findEquipmentType(catalog, equipmentType);
  if (!type) return [];
  return Array.from({ length: type.maxSequence }, (_, i) => tagSuffix(type.tagPrefix, i + 1));
}

export interface IdentityFields extends TagFields {
  defect?: string | null;
  cause?: string | null;
  rtiCategory?: string | null;
  recommendation?: string | null;
  damageType?: string | null;
}

const OPTIONAL_FIELDS = ['defect', 'cause', 'rtiCategory', 'recommendation', 'damageType'] as const;
type OptionalCatalogField = (typeof OPTIONAL_FIELDS)[number];

const OPTIONAL_FIELD_SETS: Record<OptionalCatalogField, (c: OptionCatalog) => readonly string[]> = {
  defect: (c) => c.defects,
  cause: (c) => c.causes,
  rtiCategory: (c) => c.rtiCategories,
  recommendation: (c) => c.recommendations,
  damageType: (c) => c.damageTypes,
};

/**
 * Returns one issue per field whose value is outside the catalog. An empty
 * array means the identity is acceptable.
 */
export function checkIdentity(catalog: OptionCatalog, fields: IdentityFields) {
  const issues: { field: string; message: string }[] = [];
  const required: [keyof TagFields, readonly string[]][] = [
    ['platform', catalog.platforms],
    ['module', catalog.modules],
    ['sector', catalog.sectors],
  ];
  for (const [field, allowed] of required) {
    const value = String(fields[field]);
    if (!allowed.includes(value)) issues.push({ field, message: `"${value}" is not an allowed ${field}` });
  }

  const type = findEquipmentType(catalog, fields.equipmentType);
  if (!type) {
    issues.push({ field: 'equipmentType', message: `"${fields.equipmentType}" is not an allowed equipmentType` });
  } else if (!Number.isInteger(fields.sequence) || fields.sequence < 1 || fields.sequence > type.maxSequence) {
    issues.push({ field: 'sequence', message: `must be an integer between 1 and ${type.maxSequence}` });
  }

  for (const field of OPTIONAL_FIELDS) {
    const value = fields[field];
    if (value === undefined || value === null || value === '') continue;
    if (!OPTIONAL_FIELD_SETS[field](catalog).includes(value)) {
      issues.push({ field, message: `"${value}" is not an allowed ${field}` });
    }
  }
  return issues;
}
