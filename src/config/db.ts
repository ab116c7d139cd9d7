/**
 * Central SQLite table and column configuration
 * -------------------------------------------------
 * Purpose: a single source of truth for table names, index names and the
 * schema DDL, so the store and the tests never re-encode literal strings.
 *
 * Notes:
 * - Columns are snake_case; rows are converted to camelCase on read.
 * - `tag` and `next_inspection_date` are written only by the store's
 *   write path, which recomputes them from the other columns.
 * - `inspection_history` rows are append-only. Snapshots are JSON text.
 */

export const TABLES = {
  inspections: 'inspections',
  history: 'inspection_history',
} as const;

export const INDEXES = {
  tag: 'idx_inspections_tag',
  inspectionDate: 'idx_inspections_inspection_date',
  nextInspectionDate: 'idx_inspections_next_inspection_date',
  platform: 'idx_inspections_platform',
  historyRecord: 'idx_history_record',
} as const;

export const SCHEMA_VERSION = 1;

export const SCHEMA_DDL = [
  `CREATE TABLE IF NOT EXISTS ${TABLES.inspections} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    platform TEXT NOT NULL,
    module TEXT NOT NULL,
    sector TEXT NOT NULL,
    equipment_type TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    tag TEXT NOT NULL,
    defect TEXT,
    cause TEXT,
    rti_category TEXT,
    recommendation TEXT,
    damage_type TEXT,
    inspection_date TEXT NOT NULL,
    next_inspection_date TEXT NOT NULL,
    notes TEXT NOT NULL DEFAULT '',
    photo_original_path TEXT,
    photo_path TEXT,
    thumbnail_path TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deleted_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS ${TABLES.history} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    record_id INTEGER NOT NULL REFERENCES ${TABLES.inspections} (id),
    action TEXT NOT NULL CHECK (action IN ('create', 'update', 'delete')),
    changed_at TEXT NOT NULL,
    previous TEXT,
    next TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS ${INDEXES.tag} ON ${TABLES.inspections} (tag)`,
  `CREATE INDEX IF NOT EXISTS ${INDEXES.inspectionDate} ON ${TABLES.inspections} (inspection_date)`,
  `CREATE INDEX IF NOT EXISTS ${INDEXES.nextInspectionDate} ON ${TABLES.inspections} (next_inspection_date)`,
  `CREATE INDEX IF NOT EXISTS ${INDEXES.platform} ON ${TABLES.inspections} (platform)`,
  `CREATE INDEX IF NOT EXISTS ${INDEXES.historyRecord} ON ${TABLES.history} (record_id, changed_at)`,
] as const;

/**
 * Columns the write path sets, in insert order. Excludes `id`, which
 * SQLite assigns.
 */
export const WRITE_COLUMNS = [
  'platform',
  'module',
  'sector',
  'equipment_type',
  'sequence',
  'tag',
  'defect',
  'cause',
  'rti_category',
  'recommendation',
  'damage_type',
  'inspection_date',
  'next_inspection_date',
  'notes',
  'photo_original_path',
  'photo_path',
  'thumbnail_path',
  'created_at',
  'updated_at',
  'deleted_at',
] as const;

export type WriteColumn = (typeof WRITE_COLUMNS)[number];
