import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { DEFAULT_CATALOG } from '../../config/catalog';
import { TABLES } from '../../config/db';
import { RecordStore } from '../recordStore';
import { NotFoundError, StorageError, ValidationError } from '../errors';

// Local noon on 2024-07-01, so "today" is the same in every timezone
const clock = () => new Date(2024, 6, 1, 12, 0, 0);

const vessel = {
  platform: 'P-1',
  module: 'M01',
  sector: 'S01',
  equipmentType: 'Vaso de Pressão',
  sequence: 7,
  inspectionDate: '2024-01-10',
};

function countRows(db: Database.Database, table: string) {
  return db.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get();
}

describe('RecordStore', () => {
  let db: Database.Database;
  let store: RecordStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = new RecordStore(db, { catalog: DEFAULT_CATALOG, clock });
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('creates the schema on open', () => {
    expect(db.pragma('user_version', { simple: true })).toBe(1);
    expect(countRows(db, TABLES.inspections)).toEqual({ n: 0 });
  });

  describe('create', () => {
    it('derives tag, next date and status', () => {
      const created = store.create(vessel);
      expect(created).toMatchObject({
        id: 1,
        tag: 'P-1-M01-S01-VP-007',
        inspectionDate: '2024-01-10',
        nextInspectionDate: '2024-07-08',
        status: 'DUE_SOON',
        daysUntilDue: 7,
        notes: '',
        defect: null,
        photoPath: null,
        deletedAt: null,
      });
      expect(created.createdAt).toBe(created.updatedAt);
    });

    it('round-trips through get', () => {
      const created = store.create({ ...vessel, defect: 'Trinca', notes: 'Crack near the nozzle' });
      expect(store.get(created.id)).toEqual(created);
    });

    it('records a create history entry', () => {
      const created = store.create(vessel);
      const history = store.history(created.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ recordId: created.id, action: 'create', previous: null, changedAt: created.createdAt });
      expect(history[0].next.tag).toBe('P-1-M01-S01-VP-007');
    });

    it('rejects a future date without writing anything', () => {
      expect(() => store.create({ ...vessel, inspectionDate: '2024-07-02' })).toThrow(ValidationError);
      expect(countRows(db, TABLES.inspections)).toEqual({ n: 0 });
      expect(countRows(db, TABLES.history)).toEqual({ n: 0 });
    });

    it('rejects values outside the catalog', () => {
      try {
        store.create({ ...vessel, platform: 'P-9', sequence: 51 });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ValidationError);
        if (e instanceof ValidationError) expect(e.issues.map((i) => i.field)).toEqual(['platform', 'sequence']);
      }
    });

    it('refuses derived fields from the caller', () => {
      expect(() => store.create({ ...vessel, tag: 'X' })).toThrow(ValidationError);
      expect(() => store.create({ ...vessel, nextInspectionDate: '2030-01-01' })).toThrow(ValidationError);
    });

    it('accepts snake_case and legacy form keys', () => {
      const created = store.create({
        platform: 'P-2',
        module: 'M03',
        sector: 'S02',
        equipment_type: 'Filtro',
        sequence: '12',
        date: '2024-06-20',
        observations: 'Leak at flange',
      });
      expect(created.tag).toBe('P-2-M03-S02-FT-012');
      expect(created.sequence).toBe(12);
      expect(created.notes).toBe('Leak at flange');
      expect(created.nextInspectionDate).toBe('2024-09-18');
    });

    it('enforces the configured maximum inspection age', () => {
      const strict = new RecordStore(db, { catalog: DEFAULT_CATALOG, clock, maxInspectionAgeDays: 30 });
      expect(() => strict.create(vessel)).toThrow(ValidationError);
      expect(strict.create({ ...vessel, inspectionDate: '2024-06-15' }).inspectionDate).toBe('2024-06-15');
    });
  });

  describe('update', () => {
    it('recomputes derived fields', () => {
      const { id } = store.create(vessel);
      const updated = store.update(id, { inspectionDate: '2024-06-01' });
      expect(updated.nextInspectionDate).toBe('2024-11-28');
      expect(updated.status).toBe('OK');

      const retyped = store.update(id, { equipmentType: 'Tanque', inspectionDate: '2024-01-10' });
      expect(retyped.tag).toBe('P-1-M01-S01-TQ-007');
      expect(retyped.nextInspectionDate).toBe('2025-01-09');
    });

    it('appends one history entry per update with increasing timestamps', () => {
      const { id } = store.create(vessel);
      store.update(id, { notes: 'first' });
      store.update(id, { notes: 'second' });
      store.update(id, { notes: 'third' });

      const history = store.history(id);
      expect(history.map((h) => h.action)).toEqual(['create', 'update', 'update', 'update']);
      for (let i = 1; i < history.length; i++) {
        expect(history[i].changedAt > history[i - 1].changedAt).toBe(true);
      }
      expect(history[2].previous?.notes).toBe('first');
      expect(history[2].next.notes).toBe('second');
    });

    it('leaves the record untouched when validation fails', () => {
      const created = store.create(vessel);
      expect(() => store.update(created.id, { inspectionDate: '2025-01-01' })).toThrow(ValidationError);
      expect(store.get(created.id)).toEqual(created);
      expect(store.history(created.id)).toHaveLength(1);
    });

    it('fails for a missing record', () => {
      expect(() => store.update(42, { notes: 'x' })).toThrow(NotFoundError);
      expect(() => store.checkUpdate(42, { notes: 'x' })).toThrow(NotFoundError);
    });

    it('checkUpdate validates without writing', () => {
      const { id } = store.create(vessel);
      expect(() => store.checkUpdate(id, { inspectionDate: '2025-01-01' })).toThrow(ValidationError);
      store.checkUpdate(id, { notes: 'fine' });
      expect(store.get(id).notes).toBe('');
      expect(store.history(id)).toHaveLength(1);
    });

    it('applies the maximum age only to a changed inspection date', () => {
      const options = { catalog: DEFAULT_CATALOG, maxInspectionAgeDays: 30 };
      const { id } = new RecordStore(db, { ...options, clock }).create({ ...vessel, inspectionDate: '2024-06-15' });
      const later = new RecordStore(db, { ...options, clock: () => new Date(2024, 8, 1, 12, 0, 0) });

      expect(later.update(id, { notes: 'typo fix' }).notes).toBe('typo fix');
      expect(() => later.update(id, { inspectionDate: '2024-06-20' })).toThrow(ValidationError);
      expect(later.update(id, { inspectionDate: '2024-08-20' }).inspectionDate).toBe('2024-08-20');
      expect(() => later.update(id, { inspectionDate: '2024-09-02' })).toThrow(ValidationError);
    });
  });

  describe('photo paths', () => {
    let dir: string;
    let paths: { photoOriginalPath: string; photoPath: string; thumbnailPath: string };

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'inspection-store-'));
      paths = {
        photoOriginalPath: join(dir, 'original.png'),
        photoPath: join(dir, 'photo.jpg'),
        thumbnailPath: join(dir, 'thumb.jpg'),
      };
      for (const file of Object.values(paths)) await writeFile(file, 'image bytes');
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('attachPhoto stores the paths and records the change', () => {
      const { id } = store.create(vessel);
      expect(store.attachPhoto(id, paths)).toMatchObject(paths);
      const last = store.history(id)[1];
      expect(last.action).toBe('update');
      expect(last.previous?.photoPath).toBeNull();
      expect(last.next.photoPath).toBe(paths.photoPath);
    });

    it('refuses paths to files that do not exist', async () => {
      const created = store.create(vessel);
      await rm(paths.thumbnailPath);
      try {
        store.attachPhoto(created.id, paths);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ValidationError);
        if (e instanceof ValidationError) expect(e.issues.map((i) => i.field)).toEqual(['thumbnailPath']);
      }
      expect(() => store.update(created.id, { notes: 'x' }, paths)).toThrow(ValidationError);
      expect(store.get(created.id)).toEqual(created);
      expect(store.history(created.id)).toHaveLength(1);
    });

    it('update writes field changes and photo paths as one history entry', () => {
      const { id } = store.create(vessel);
      const updated = store.update(id, { notes: 'Repainted' }, paths);
      expect(updated).toMatchObject({ notes: 'Repainted', ...paths });
      const history = store.history(id);
      expect(history.map((h) => h.action)).toEqual(['create', 'update']);
      expect(history[1].next).toMatchObject({ notes: 'Repainted', photoPath: paths.photoPath });
    });
  });

  describe('softDelete', () => {
    it('hides the record but keeps the row and its history', () => {
      const { id } = store.create(vessel);
      const deleted = store.softDelete(id);
      expect(deleted.deletedAt).not.toBeNull();

      expect(() => store.get(id)).toThrow(NotFoundError);
      expect(store.list()).toEqual([]);
      expect(store.list({ includeDeleted: true }).map((r) => r.id)).toEqual([id]);
      expect(store.history(id).map((h) => h.action)).toEqual(['create', 'delete']);
      expect(() => store.update(id, { notes: 'x' })).toThrow(NotFoundError);
      expect(() => store.softDelete(id)).toThrow(NotFoundError);
    });
  });

  describe('get and history', () => {
    it('raise NotFoundError for unknown ids', () => {
      expect(() => store.get(999)).toThrow(NotFoundError);
      expect(() => store.history(999)).toThrow('Inspection 999 not found');
    });

    it('projects status for a given day', () => {
      const { id } = store.create(vessel);
      expect(store.get(id, '2024-07-09').status).toBe('OVERDUE');
      expect(store.get(id, '2024-06-01').status).toBe('OK');
    });
  });

  describe('list', () => {
    beforeEach(() => {
      store.create(vessel); // next 2024-07-08, DUE_SOON
      store.create({ ...vessel, equipmentType: 'Filtro', sequence: 3, inspectionDate: '2024-03-01' }); // next 2024-05-30, OVERDUE
      store.create({ ...vessel, platform: 'P-2', equipmentType: 'Tanque', sequence: 1, inspectionDate: '2024-06-01' }); // next 2025-06-01, OK
    });

    it('orders by next inspection date by default', () => {
      expect(store.list().map((r) => r.id)).toEqual([2, 1, 3]);
      expect(store.list().map((r) => r.status)).toEqual(['OVERDUE', 'DUE_SOON', 'OK']);
    });

    it('filters by status', () => {
      expect(store.list({ status: 'OVERDUE' }).map((r) => r.id)).toEqual([2]);
      expect(store.list({ status: ['OK', 'DUE_SOON'] }).map((r) => r.id)).toEqual([1, 3]);
    });

    it('filters by status against a given day', () => {
      const soon = store.list({ status: 'DUE_SOON', today: '2024-05-01' });
      expect(soon.map((r) => r.id)).toEqual([2]);
      expect(soon[0].daysUntilDue).toBe(29);
    });

    it('filters by type, platform and inspection date range', () => {
      expect(store.list({ equipmentType: 'Tanque' }).map((r) => r.id)).toEqual([3]);
      expect(store.list({ platform: 'P-1' }).map((r) => r.id)).toEqual([2, 1]);
      expect(store.list({ from: '2024-02-01', to: '2024-03-31' }).map((r) => r.id)).toEqual([2]);
    });

    it('orders by inspection date descending', () => {
      expect(store.list({ orderBy: 'inspectionDate', order: 'desc' }).map((r) => r.id)).toEqual([3, 2, 1]);
    });

    it('rejects an unknown equipment type or malformed dates', () => {
      expect(() => store.list({ equipmentType: 'Bomba' })).toThrow(ValidationError);
      expect(() => store.list({ from: '2024-02-30' })).toThrow(ValidationError);
      expect(() => store.list({ today: '2024/07/01' })).toThrow(ValidationError);
    });

    it('uses the configured warning window', () => {
      const narrow = new RecordStore(db, { catalog: DEFAULT_CATALOG, clock, warningWindowDays: 5 });
      expect(narrow.list().map((r) => r.status)).toEqual(['OVERDUE', 'OK', 'OK']);
      expect(narrow.list({ status: 'DUE_SOON' })).toEqual([]);
    });
  });

  it('wraps driver failures in StorageError', () => {
    store.close();
    expect(() => store.get(1)).toThrow(StorageError);
  });
});
