// Canonical types - use these everywhere in the library and the shell
// Dates are `YYYY-MM-DD` strings, timestamps are ISO-8601 strings

export type IsoDate = string;

export const INSPECTION_STATUSES = ['OK', 'DUE_SOON', 'OVERDUE'] as const;
export type InspectionStatus = (typeof INSPECTION_STATUSES)[number];

// What the form submits. Derived fields (tag, next date, status) are never accepted here.
export interface InspectionInput {
  platform: string;
  module: string;
  sector: string;
  equipmentType: string;
  sequence: number;
  inspectionDate: IsoDate;
  defect?: string | null;
  cause?: string | null;
  rtiCategory?: string | null;
  recommendation?: string | null;
  damageType?: string | null;
  notes?: string;
}

export interface PhotoPaths {
  photoOriginalPath: string;
  photoPath: string;
  thumbnailPath: string;
}

// The stored fields, before read-time projections are added
export interface StoredInspection extends Required<Omit<InspectionInput, 'notes'>> {
  id: number;
  notes: string;
  tag: string;
  nextInspectionDate: IsoDate;
  photoOriginalPath: string | null;
  photoPath: string | null;
  thumbnailPath: string | null;
  createdAt: string;
  updatedAt: string;
  deletedAt: string | null;
}

export interface InspectionRecord extends StoredInspection {
  status: InspectionStatus;
  daysUntilDue: number;
}

export type HistoryAction = 'create' | 'update' | 'delete';

export interface HistoryEntry {
  id: number;
  recordId: number;
  action: HistoryAction;
  changedAt: string;
  previous: StoredInspection | null;
  next: StoredInspection;
}

export type StatusCounts = Record<InspectionStatus, number> & { total: number };
