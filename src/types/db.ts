// Raw row shapes as better-sqlite3 returns them (snake_case, nullable columns as null)

export interface InspectionRow {
  id: number;
  platform: string;
  module: string;
  sector: string;
  equipment_type: string;
  sequence: number;
  tag: string;
  defect: string | null;
  cause: string | null;
  rti_category: string | null;
  recommendation: string | null;
  damage_type: string | null;
  inspection_date: string;
  next_inspection_date: string;
  notes: string;
  photo_original_path: string | null;
  photo_path: string | null;
  thumbnail_path: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}
