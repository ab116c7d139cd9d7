/*
  Inspection API

  The surface the application shell calls. It wires the catalog, the record
  store, the photo handler and the report generator together and owns the
  ordering rules between them:

  - a photo is validated before anything is written, so a rejected upload
    leaves no record behind;
  - photo files are written first and the record's photo columns are
    updated only once they exist;
  - reports are written to the reports directory and their paths returned.
*/
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_CATALOG, type OptionCatalog } from '../config/catalog';
import { loadConfig, type AppConfig } from '../config/app';
import type { ListFilter } from '../schemas/inspection';
import type { HistoryEntry, InspectionRecord, PhotoPaths } from '../types/inspection';
import { StorageError, ValidationError, errorMessage, type RenderError } from './errors';
import { PhotoHandler, type ProcessedPhoto } from './photoHandler';
import { RecordStore } from './recordStore';
import { renderBatch, renderSingle, renderSummary } from './reportGenerator';
import { fileStamp, systemClock, type Clock } from './time';

export interface InspectionApp {
  config: AppConfig;
  catalog: OptionCatalog;
  store: RecordStore;
  photos: PhotoHandler;
  clock: Clock;
}

export interface AppOptions {
  config?: AppConfig;
  catalog?: OptionCatalog;
  clock?: Clock;
}

export function createInspectionApp(options: AppOptions = {}): InspectionApp {
  const config = options.config ?? loadConfig();
  const catalog = options.catalog ?? DEFAULT_CATALOG;
  const clock = options.clock ?? systemClock;
  const store = RecordStore.open(config.dbPath, {
    catalog,
    clock,
    warningWindowDays: config.warningWindowDays,
    maxInspectionAgeDays: config.maxInspectionAgeDays,
  });
  const photos = new PhotoHandler({ uploadsDir: config.uploadsDir });
  console.info('[inspectionApi] opened', config.dbPath);
  return { config, catalog, store, photos, clock };
}

export function closeInspectionApp(app: InspectionApp) {
  app.store.close();
}

export interface SaveOptions {
  /** path of the uploaded image file */
  photo?: string;
  /** reject the submission when no photo is supplied or the photo cannot be stored */
  photoRequired?: boolean;
}

export async function createInspection(app: InspectionApp, input: unknown, opts: SaveOptions = {}): Promise<InspectionRecord> {
  if (opts.photoRequired && !opts.photo) {
    throw ValidationError.single('photo', 'a photo is required');
  }
  if (opts.photo) await app.photos.validate(opts.photo);

  const created = app.store.create(input);
  if (!opts.photo) return created;

  try {
    return await storePhoto(app, created.id, opts.photo);
  } catch (e) {
    if (opts.photoRequired) {
      // Without its mandatory photo the submission is withdrawn; history keeps the attempt
      app.store.softDelete(created.id);
    }
    throw e;
  }
}

export async function updateInspection(
  app: InspectionApp,
  id: number,
  changes: unknown,
  opts: Pick<SaveOptions, 'photo'> = {},
): Promise<InspectionRecord> {
  if (!opts.photo) return app.store.update(id, changes);
  // Reject bad changes before any file is touched; the row is written only once the files exist
  app.store.checkUpdate(id, changes);
  const processed = await app.photos.process(opts.photo, id);
  return app.store.update(id, changes, pickPaths(processed));
}

export async function attachInspectionPhoto(app: InspectionApp, id: number, photo: string): Promise<InspectionRecord> {
  // Fail fast on a missing record before any file is written
  app.store.get(id);
  await app.photos.validate(photo);
  return storePhoto(app, id, photo);
}

async function storePhoto(app: InspectionApp, id: number, photo: string): Promise<InspectionRecord> {
  const processed = await app.photos.process(photo, id);
  return app.store.attachPhoto(id, pickPaths(processed));
}

function pickPaths(processed: ProcessedPhoto): PhotoPaths {
  return {
    photoOriginalPath: processed.photoOriginalPath,
    photoPath: processed.photoPath,
    thumbnailPath: processed.thumbnailPath,
  };
}

export function getInspection(app: InspectionApp, id: number): InspectionRecord {
  return app.store.get(id);
}

export function listInspections(app: InspectionApp, filter: ListFilter = {}): InspectionRecord[] {
  return app.store.list(filter);
}

export function deleteInspection(app: InspectionApp, id: number): InspectionRecord {
  return app.store.softDelete(id);
}

export function getInspectionHistory(app: InspectionApp, id: number): HistoryEntry[] {
  return app.store.history(id);
}

// --- reports ---

export type ReportKind = 'single' | 'batch' | 'summary';

export interface WrittenReport {
  path: string;
  pageCount: number;
  errors: RenderError[];
}

export function reportFileName(kind: ReportKind, stamp: string, tag?: string): string {
  if (kind === 'single') return `inspection_${(tag ?? 'UNKNOWN').replace(/[^A-Za-z0-9-]/g, '_')}_${stamp}.pdf`;
  return `${kind}_${stamp}.pdf`;
}

export async function writeReport(
  app: Pick<InspectionApp, 'config' | 'clock'>,
  kind: ReportKind,
  bytes: Uint8Array,
  tag?: string,
): Promise<string> {
  const path = join(app.config.reportsDir, reportFileName(kind, fileStamp(app.clock), tag));
  try {
    await mkdir(app.config.reportsDir, { recursive: true });
    await writeFile(path, bytes);
  } catch (e) {
    console.warn('inspectionApi.writeReport failed', path, e);
    throw new StorageError(`Could not write report ${path}: ${errorMessage(e)}`, { path }, e);
  }
  console.info('[inspectionApi] report written', path);
  return path;
}

export async function generateInspectionReport(app: InspectionApp, id: number): Promise<WrittenReport> {
  const record = app.store.get(id);
  const result = await renderSingle(record, { clock: app.clock });
  const path = await writeReport(app, 'single', result.bytes, record.tag);
  return { path, pageCount: result.pageCount, errors: result.errors };
}

export async function generateBatchReport(
  app: InspectionApp,
  filter: ListFilter = {},
  opts: { coverPage?: boolean } = {},
): Promise<WrittenReport> {
  const records = app.store.list(filter);
  const result = await renderBatch(records, { clock: app.clock, coverPage: opts.coverPage });
  const path = await writeReport(app, 'batch', result.bytes);
  return { path, pageCount: result.pageCount, errors: result.errors };
}

export async function generateSummaryReport(app: InspectionApp, filter: ListFilter = {}) {
  const records = app.store.list(filter);
  const result = await renderSummary(records, { clock: app.clock });
  const path = await writeReport(app, 'summary', result.bytes);
  return { path, pageCount: result.pageCount, errors: result.errors, counts: result.counts };
}
