/*
  Application configuration

  Everything the library needs from its environment, read once at start-up.
  Each setting has a default so the app runs out of the box:

  - INSPECTIONS_DB_PATH       SQLite file (default `inspections.db`)
  - INSPECTIONS_UPLOADS_DIR   original photos, optimized copies, thumbnails (default `uploads`)
  - INSPECTIONS_REPORTS_DIR   generated PDFs (default `reports`)
  - INSPECTIONS_WARNING_DAYS  days before the due date at which a record becomes DUE_SOON (default 30)
  - INSPECTIONS_MAX_AGE_DAYS  optional: reject inspection dates older than this many days
*/
import { z } from 'zod';

export const DEFAULT_WARNING_WINDOW_DAYS = 30;

export const PHOTO_LIMITS = {
  maxFileBytes: 10 * 1024 * 1024,
  maxWidth: 1920,
  maxHeight: 1080,
  quality: 85,
  thumbnailSize: 300,
  thumbnailQuality: 80,
} as const;

export type PhotoLimits = { [K in keyof typeof PHOTO_LIMITS]: number };

const EnvSchema = z.object({
  INSPECTIONS_DB_PATH: z.string().min(1).default('inspections.db'),
  INSPECTIONS_UPLOADS_DIR: z.string().min(1).default('uploads'),
  INSPECTIONS_REPORTS_DIR: z.string().min(1).default('reports'),
  INSPECTIONS_WARNING_DAYS: z.coerce.number().int().min(0).default(DEFAULT_WARNING_WINDOW_DAYS),
  INSPECTIONS_MAX_AGE_DAYS: z.coerce.number().int().positive().optional(),
});

export interface AppConfig {
  dbPath: string;
  uploadsDir: string;
  reportsDir: string;
  warningWindowDays: number;
  maxInspectionAgeDays?: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Blank values count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    dbPath: e.INSPECTIONS_DB_PATH,
    uploadsDir: e.INSPECTIONS_UPLOADS_DIR,
    reportsDir: e.INSPECTIONS_REPORTS_DIR,
    warningWindowDays: e.INSPECTIONS_WARNING_DAYS,
    maxInspectionAgeDays: e.INSPECTIONS_MAX_AGE_DAYS,
  };
}
