import { existsSync } from 'node:fs';
import Database from 'better-sqlite3';
import { addDays, format } from 'date-fns';
import { checkIdentity, tag, type OptionCatalog } from '../config/catalog';
import { DEFAULT_WARNING_WINDOW_DAYS } from '../config/app';
import { SCHEMA_DDL, SCHEMA_VERSION, TABLES, WRITE_COLUMNS, type WriteColumn } from '../config/db';
import { parseHistoryRow, parseInspectionRow } from '../schemas/db/inspection';
import {
  mergeInspectionInput,
  parseInspectionInput,
  parseListFilter,
  type ListFilter,
  type ParsedInspectionInput,
} from '../schemas/inspection';
import type {
  HistoryAction,
  HistoryEntry,
  InspectionInput,
  InspectionRecord,
  InspectionStatus,
  IsoDate,
  PhotoPaths,
  StoredInspection,
} from '../types/inspection';
import { assertInspectionDate, computeNextInspection, daysUntilDue, inspectionStatus, parseIsoDate } from './dateValidator';
import { InspectionError, NotFoundError, StorageError, ValidationError, errorMessage, type ErrorContext } from './errors';
import { nextTimestamp, systemClock, todayIso, type Clock } from './time';

export interface RecordStoreOptions {
  catalog: OptionCatalog;
  warningWindowDays?: number;
  maxInspectionAgeDays?: number;
  clock?: Clock;
}

type SqlValue = string | number | null;
type WriteParams = Record<WriteColumn, SqlValue>;

const ORDER_COLUMNS = {
  nextInspectionDate: 'next_inspection_date',
  inspectionDate: 'inspection_date',
  id: 'id',
} as const;

/**
 * Inspection records over a local SQLite file.
 *
 * Every write goes through the same path: validate against the catalog and
 * the date rules, recompute `tag` and `nextInspectionDate`, then write the
 * row and its history entry in one transaction. `status` and `daysUntilDue`
 * are never stored; they are projected on read against the store's clock.
 */
export class RecordStore {
  private readonly db: Database.Database;
  private readonly catalog: OptionCatalog;
  private readonly warningWindowDays: number;
  private readonly maxInspectionAgeDays?: number;
  private readonly clock: Clock;

  constructor(db: Database.Database, options: RecordStoreOptions) {
    this.db = db;
    this.catalog = options.catalog;
    this.warningWindowDays = options.warningWindowDays ?? DEFAULT_WARNING_WINDOW_DAYS;
    this.maxInspectionAgeDays = options.maxInspectionAgeDays;
    this.clock = options.clock ?? systemClock;
    this.guard('migrate', {}, () => this.migrate());
  }

  static open(path: string, options: RecordStoreOptions): RecordStore {
    let db: Database.Database;
    try {
      db = new Database(path);
    } catch (e) {
      console.warn('RecordStore.open failed', path, e);
      throw new StorageError(`Could not open database ${path}: ${errorMessage(e)}`, { path }, e);
    }
    return new RecordStore(db, options);
  }

  private migrate() {
    this.db.pragma('foreign_keys = ON');
    for (const statement of SCHEMA_DDL) {
      this.db.exec(statement);
    }
    this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }

  close() {
    this.guard('close', {}, () => this.db.close());
  }

  create(input: unknown): InspectionRecord {
    const fields = this.validate(parseInspectionInput(input), { checkAge: true });
    const stored = this.guard('create', {}, () =>
      this.db.transaction(() => {
        const now = nextTimestamp(this.clock);
        const params = this.toWriteParams(fields, {
          photoOriginalPath: null,
          photoPath: null,
          thumbnailPath: null,
          createdAt: now,
          updatedAt: now,
          deletedAt: null,
        }, fields);
        const columns = WRITE_COLUMNS.join(', ');
        const values = WRITE_COLUMNS.map((c) => `@${c}`).join(', ');
        const result = this.db.prepare(`INSERT INTO ${TABLES.inspections} (${columns}) VALUES (${values})`).run(params);
        const created = this.readStored(Number(result.lastInsertRowid));
        if (!created) throw new StorageError('Inserted inspection could not be read back');
        this.appendHistory(created.id, 'create', null, created, now);
        return created;
      })(),
    );
    console.info('[recordStore] created inspection', stored.id, stored.tag);
    return this.project(stored);
  }

  /**
   * Applies `changes` and, when given, the paths of a photo the handler has
   * already written. Both land in the same row write and history entry.
   */
  update(id: number, changes: unknown, photo?: PhotoPaths): InspectionRecord {
    if (photo) assertPhotoFiles(photo, id);
    const stored = this.guard('update', { recordId: id }, () =>
      this.db.transaction(() => {
        const current = this.requireActive(id);
        const fields = this.validateChange(current, changes);
        const now = this.stampAfter(current);
        const media = photo ? pickPhoto(photo) : pickPhoto(current);
        this.writeRow(id, this.toWriteParams(fields, { ...media, createdAt: current.createdAt, updatedAt: now, deletedAt: null }, fields));
        return this.commitChange(current, 'update', now);
      })(),
    );
    console.info('[recordStore] updated inspection', id);
    return this.project(stored);
  }

  // Same checks as update, without writing
  checkUpdate(id: number, changes: unknown) {
    this.guard('checkUpdate', { recordId: id }, () => {
      this.validateChange(this.requireActive(id), changes);
    });
  }

  /** Records the files written by the photo handler; the files must already exist. */
  attachPhoto(id: number, paths: PhotoPaths): InspectionRecord {
    assertPhotoFiles(paths, id);
    const stored = this.guard('attachPhoto', { recordId: id }, () =>
      this.db.transaction(() => {
        const current = this.requireActive(id);
        const now = this.stampAfter(current);
        this.writeRow(id, this.toWriteParams(toInput(current), { ...pickPhoto(paths), createdAt: current.createdAt, updatedAt: now, deletedAt: null }, current));
        return this.commitChange(current, 'update', now);
      })(),
    );
    return this.project(stored);
  }

  softDelete(id: number): InspectionRecord {
    const stored = this.guard('softDelete', { recordId: id }, () =>
      this.db.transaction(() => {
        const current = this.requireActive(id);
        const now = this.stampAfter(current);
        this.db
          .prepare(`UPDATE ${TABLES.inspections} SET deleted_at = @now, updated_at = @now WHERE id = @id`)
          .run({ id, now });
        return this.commitChange(current, 'delete', now);
      })(),
    );
    console.info('[recordStore] soft-deleted inspection', id);
    return this.project(stored);
  }

  get(id: number, today?: IsoDate): InspectionRecord {
    return this.project(
      this.guard('get', { recordId: id }, () => this.requireActive(id)),
      today,
    );
  }

  list(filter: ListFilter = {}): InspectionRecord[] {
    const f = parseListFilter(filter);
    const today = f.today ?? todayIso(this.clock);
    const todayDate = parseIsoDate(today);
    if (!todayDate) throw ValidationError.single('today', `"${today}" is not a valid date`);
    if (f.equipmentType !== undefined && !this.catalog.equipmentTypes.some((t) => t.name === f.equipmentType)) {
      throw ValidationError.single('equipmentType', `"${f.equipmentType}" is not an allowed equipmentType`);
    }
    if (f.from && !parseIsoDate(f.from)) throw ValidationError.single('from', `"${f.from}" is not a valid date`);
    if (f.to && !parseIsoDate(f.to)) throw ValidationError.single('to', `"${f.to}" is not a valid date`);

    const where: string[] = [];
    const params: Record<string, SqlValue> = {};
    if (!f.includeDeleted) where.push('deleted_at IS NULL');
    if (f.equipmentType !== undefined) {
      where.push('equipment_type = @equipmentType');
      params.equipmentType = f.equipmentType;
    }
    if (f.platform !== undefined) {
      where.push('platform = @platform');
      params.platform = f.platform;
    }
    if (f.from) {
      where.push('inspection_date >= @from');
      params.from = f.from;
    }
    if (f.to) {
      where.push('inspection_date <= @to');
      params.to = f.to;
    }
    if (f.status !== undefined) {
      const statuses = Array.isArray(f.status) ? f.status : [f.status];
      params.today = today;
      params.soonLimit = format(addDays(todayDate, this.warningWindowDays), 'yyyy-MM-dd');
      where.push(`(${statuses.map(statusCondition).join(' OR ')})`);
    }

    const orderColumn = ORDER_COLUMNS[f.orderBy];
    const direction = f.order === 'desc' ? 'DESC' : 'ASC';
    const sql = [
      `SELECT * FROM ${TABLES.inspections}`,
      where.length ? `WHERE ${where.join(' AND ')}` : '',
      `ORDER BY ${orderColumn} ${direction}, id ${direction}`,
    ]
      .filter(Boolean)
      .join(' ');

    const rows = this.guard('list', {}, () => {
      const statement = this.db.prepare(sql);
      return Object.keys(params).length ? statement.all(params) : statement.all();
    });
    return rows.map((raw) => this.project(this.requireParsed(parseInspectionRow(raw), 'list'), today));
  }

  history(id: number): HistoryEntry[] {
    return this.guard('history', { recordId: id }, () => {
      if (!this.readStored(id)) throw new NotFoundError(id);
      const rows = this.db
        .prepare(`SELECT * FROM ${TABLES.history} WHERE record_id = ? ORDER BY changed_at ASC, id ASC`)
        .all(id);
      return rows.map((raw) => this.requireParsed(parseHistoryRow(raw), 'history', id));
    });
  }

  /** Adds the read-time projections. `today` defaults to the store's clock. */
  project(stored: StoredInspection, today: IsoDate = todayIso(this.clock)): InspectionRecord {
    return {
      ...stored,
      status: inspectionStatus(today, stored.nextInspectionDate, this.warningWindowDays),
      daysUntilDue: daysUntilDue(today, stored.nextInspectionDate),
    };
  }

  // --- write path ---

  // The age limit applies to new dates only; an old record stays editable
  private validateChange(current: StoredInspection, changes: unknown) {
    const merged = mergeInspectionInput(toInput(current), changes);
    return this.validate(merged, { recordId: current.id, checkAge: merged.inspectionDate !== current.inspectionDate });
  }

  private validate(
    fields: ParsedInspectionInput,
    options: { recordId?: number; checkAge: boolean },
  ): ParsedInspectionInput & { tag: string; nextInspectionDate: IsoDate } {
    const context: ErrorContext = options.recordId === undefined ? {} : { recordId: options.recordId };
    const issues = checkIdentity(this.catalog, fields);
    if (issues.length) throw new ValidationError(issues, context);
    try {
      assertInspectionDate(fields.inspectionDate, todayIso(this.clock), {
        maxAgeDays: options.checkAge ? this.maxInspectionAgeDays : undefined,
      });
    } catch (e) {
      if (e instanceof ValidationError) throw new ValidationError(e.issues, context);
      throw e;
    }
    return {
      ...fields,
      tag: tag(this.catalog, fields),
      nextInspectionDate: computeNextInspection(fields.inspectionDate, fields.equipmentType, this.catalog),
    };
  }

  private toWriteParams(
    fields: InspectionInput,
    meta: Pick<StoredInspection, 'photoOriginalPath' | 'photoPath' | 'thumbnailPath' | 'createdAt' | 'updatedAt' | 'deletedAt'>,
    derived?: Pick<StoredInspection, 'tag' | 'nextInspectionDate'>,
  ): WriteParams {
    const d = derived ?? {
      tag: tag(this.catalog, fields),
      nextInspectionDate: computeNextInspection(fields.inspectionDate, fields.equipmentType, this.catalog),
    };
    return {
      platform: fields.platform,
      module: fields.module,
      sector: fields.sector,
      equipment_type: fields.equipmentType,
      sequence: fields.sequence,
      tag: d.tag,
      defect: fields.defect ?? null,
      cause: fields.cause ?? null,
      rti_category: fields.rtiCategory ?? null,
      recommendation: fields.recommendation ?? null,
      damage_type: fields.damageType ?? null,
      inspection_date: fields.inspectionDate,
      next_inspection_date: d.nextInspectionDate,
      notes: fields.notes ?? '',
      photo_original_path: meta.photoOriginalPath,
      photo_path: meta.photoPath,
      thumbnail_path: meta.thumbnailPath,
      created_at: meta.createdAt,
      updated_at: meta.updatedAt,
      deleted_at: meta.deletedAt,
    };
  }

  private writeRow(id: number, params: WriteParams) {
    const assignments = WRITE_COLUMNS.map((c) => `${c} = @${c}`).join(', ');
    this.db.prepare(`UPDATE ${TABLES.inspections} SET ${assignments} WHERE id = @id`).run({ ...params, id });
  }

  private commitChange(previous: StoredInspection, action: HistoryAction, changedAt: string): StoredInspection {
    const next = this.readStored(previous.id);
    if (!next) throw new StorageError('Updated inspection could not be read back', { recordId: previous.id });
    this.appendHistory(previous.id, action, previous, next, changedAt);
    return next;
  }

  private appendHistory(recordId: number, action: HistoryAction, previous: StoredInspection | null, next: StoredInspection, changedAt: string) {
    this.db
      .prepare(`INSERT INTO ${TABLES.history} (record_id, action, changed_at, previous, next) VALUES (?, ?, ?, ?, ?)`)
      .run(recordId, action, changedAt, previous ? JSON.stringify(previous) : null, JSON.stringify(next));
  }

  // History timestamps must increase strictly per record, even when two writes land in the same millisecond
  private stampAfter(current: StoredInspection): string {
    const last = this.db.prepare(`SELECT MAX(changed_at) AS last FROM ${TABLES.history} WHERE record_id = ?`).get(current.id);
    const lastChange = readLast(last);
    const floor = lastChange && lastChange > current.updatedAt ? lastChange : current.updatedAt;
    return nextTimestamp(this.clock, floor);
  }

  // --- read path ---

  private readStored(id: number): StoredInspection | null {
    const raw = this.db.prepare(`SELECT * FROM ${TABLES.inspections} WHERE id = ?`).get(id);
    if (raw === undefined) return null;
    return this.requireParsed(parseInspectionRow(raw), 'read', id);
  }

  private requireActive(id: number): StoredInspection {
    const stored = this.readStored(id);
    if (!stored || stored.deletedAt) throw new NotFoundError(id);
    return stored;
  }

  private requireParsed<T>(value: T | null, operation: string, recordId?: number): T {
    if (value === null) {
      throw new StorageError(`Malformed row returned by ${operation}`, recordId === undefined ? {} : { recordId });
    }
    return value;
  }

  private guard<T>(operation: string, context: ErrorContext, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof InspectionError) throw e;
      console.warn(`recordStore.${operation} failed`, context, e);
      throw new StorageError(`Inspection store ${operation} failed: ${errorMessage(e)}`, context, e);
    }
  }
}

function statusCondition(status: InspectionStatus): string {
  switch (status) {
    case 'OVERDUE':
      return 'next_inspection_date < @today';
    case 'DUE_SOON':
      return '(next_inspection_date >= @today AND next_inspection_date <= @soonLimit)';
    case 'OK':
      return 'next_inspection_date > @soonLimit';
  }
}

const PHOTO_FIELDS = ['photoOriginalPath', 'photoPath', 'thumbnailPath'] as const;

function assertPhotoFiles(paths: PhotoPaths, recordId: number) {
  const missing = PHOTO_FIELDS.filter((field) => !existsSync(paths[field])).map((field) => ({
    field,
    message: `file does not exist: ${paths[field]}`,
  }));
  if (missing.length) throw new ValidationError(missing, { recordId });
}

function readLast(row: unknown): string | null {
  if (typeof row === 'object' && row !== null && 'last' in row && typeof row.last === 'string') return row.last;
  return null;
}

function toInput(stored: StoredInspection): InspectionInput {
  return {
    platform: stored.platform,
    module: stored.module,
    sector: stored.sector,
    equipmentType: stored.equipmentType,
    sequence: stored.sequence,
    inspectionDate: stored.inspectionDate,
    defect: stored.defect,
    cause: stored.cause,
    rtiCategory: stored.rtiCategory,
    recommendation: stored.recommendation,
    damageType: stored.damageType,
    notes: stored.notes,
  };
}

function pickPhoto(stored: PhotoPaths | StoredInspection) {
  return {
    photoOriginalPath: stored.photoOriginalPath,
    photoPath: stored.photoPath,
    thumbnailPath: stored.thumbnailPath,
  };
}
