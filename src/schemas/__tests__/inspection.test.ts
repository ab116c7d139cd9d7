import { describe, it, expect } from 'vitest';
import { mergeInspectionInput, parseInspectionInput, parseListFilter } from '../inspection';
import { parseHistoryRow, parseInspectionRow } from '../db/inspection';
import type { InspectionRow } from '../../types/db';
import { ValidationError } from '../../utils/errors';

const input = {
  platform: 'P-3',
  module: 'M10',
  sector: 'S03',
  equipmentType: 'Permutador',
  sequence: 30,
  inspectionDate: '2024-05-02',
};

const row: InspectionRow = {
  id: 5,
  platform: 'P-3',
  module: 'M10',
  sector: 'S03',
  equipment_type: 'Permutador',
  sequence: 30,
  tag: 'P-3-M10-S03-PM-030',
  defect: null,
  cause: null,
  rti_category: null,
  recommendation: null,
  damage_type: null,
  inspection_date: '2024-05-02',
  next_inspection_date: '2025-04-27',
  notes: '',
  photo_original_path: null,
  photo_path: null,
  thumbnail_path: null,
  created_at: '2024-05-02T09:00:00.000Z',
  updated_at: '2024-05-02T09:00:00.000Z',
  deleted_at: null,
};

describe('inspection input schema', () => {
  it('trims values and fills defaults', () => {
    expect(parseInspectionInput({ ...input, platform: ' P-3 ', defect: '' })).toEqual({
      ...input,
      defect: null,
      cause: null,
      rtiCategory: null,
      recommendation: null,
      damageType: null,
      notes: '',
    });
  });

  it('names each failing field', () => {
    try {
      parseInspectionInput({ ...input, sequence: 2.5, inspectionDate: '' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError);
      if (e instanceof ValidationError) {
        expect(e.issues).toEqual([
          { field: 'sequence', message: 'must be a whole number' },
          { field: 'inspectionDate', message: 'is required' },
        ]);
      }
    }
  });

  it('rejects unknown keys, including derived ones', () => {
    try {
      parseInspectionInput({ ...input, status: 'OK' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError);
      if (e instanceof ValidationError) expect(e.issues[0].field).toBe('status');
    }
  });

  it('merges a partial change onto the current values', () => {
    const merged = mergeInspectionInput({ ...input, notes: 'before' }, { notes: 'after', rti_category: 'III' });
    expect(merged.notes).toBe('after');
    expect(merged.rtiCategory).toBe('III');
    expect(merged.sequence).toBe(30);
    expect(() => mergeInspectionInput(input, 'nope')).toThrow(ValidationError);
  });
});

describe('list filter schema', () => {
  it('applies ordering defaults', () => {
    expect(parseListFilter({})).toEqual({ includeDeleted: false, orderBy: 'nextInspectionDate', order: 'asc' });
  });

  it('rejects an unknown status', () => {
    expect(() => parseListFilter({ status: 'LATE' })).toThrow(ValidationError);
  });
});

describe('db row parsing', () => {
  it('maps snake_case columns', () => {
    expect(parseInspectionRow(row)).toMatchObject({ id: 5, equipmentType: 'Permutador', nextInspectionDate: '2025-04-27' });
  });

  it('returns null for a malformed row', () => {
    expect(parseInspectionRow({ ...row, tag: null })).toBeNull();
  });

  it('parses history snapshots', () => {
    const snapshot = JSON.stringify(parseInspectionRow(row));
    const entry = parseHistoryRow({ id: 1, record_id: 5, action: 'create', changed_at: row.created_at, previous: null, next: snapshot });
    expect(entry?.next.tag).toBe('P-3-M10-S03-PM-030');
    expect(entry?.previous).toBeNull();
    expect(parseHistoryRow({ id: 1, record_id: 5, action: 'create', changed_at: row.created_at, previous: null, next: '{' })).toBeNull();
  });
});
