import { z } from 'zod';
import { toCamelCaseKeys } from '../../utils/case';
import type { HistoryEntry, StoredInspection } from '../../types/inspection';

export const StoredInspectionSchema = z.object({
  id: z.number().int(),
  platform: z.string(),
  module: z.string(),
  sector: z.string(),
  equipmentType: z.string(),
  sequence: z.number().int(),
  tag: z.string(),
  defect: z.string().nullable(),
  cause: z.string().nullable(),
  rtiCategory: z.string().nullable(),
  recommendation: z.string().nullable(),
  damageType: z.string().nullable(),
  inspectionDate: z.string(),
  nextInspectionDate: z.string(),
  notes: z.string(),
  photoOriginalPath: z.string().nullable(),
  photoPath: z.string().nullable(),
  thumbnailPath: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  deletedAt: z.string().nullable(),
});

export function parseInspectionRow(raw: unknown): StoredInspection | null {
  try {
    return StoredInspectionSchema.parse(toCamelCaseKeys(raw));
  } catch (e) {
    console.warn('parseInspectionRow failed', e, raw);
    return null;
  }
}

const snapshot = z
  .string()
  .transform((text, ctx) => {
    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'snapshot is not valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(StoredInspectionSchema);

export const HistoryRowSchema = z.object({
  id: z.number().int(),
  recordId: z.number().int(),
  action: z.enum(['create', 'update', 'delete']),
  changedAt: z.string(),
  previous: snapshot.nullable(),
  next: snapshot,
});

export function parseHistoryRow(raw: unknown): HistoryEntry | null {
  try {
    return HistoryRowSchema.parse(toCamelCaseKeys(raw));
  } catch (e) {
    console.warn('parseHistoryRow failed', e, raw);
    return null;
  }
}
