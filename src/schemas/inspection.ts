import { z } from 'zod';
import { toCamelCaseKeys } from '../utils/case';
import { ValidationError } from '../utils/errors';
import { INSPECTION_STATUSES, type InspectionInput } from '../types/inspection';

const optionalChoice = z
  .union([z.string().trim(), z.null()])
  .optional()
  .transform((v) => (v ? v : null));

export const InspectionInputSchema = z
  .object({
    platform: z.string().trim().min(1, 'is required'),
    module: z.string().trim().min(1, 'is required'),
    sector: z.string().trim().min(1, 'is required'),
    equipmentType: z.string().trim().min(1, 'is required'),
    sequence: z.coerce.number().int('must be a whole number').positive('must be positive'),
    inspectionDate: z.string().trim().min(1, 'is required'),
    defect: optionalChoice,
    cause: optionalChoice,
    rtiCategory: optionalChoice,
    recommendation: optionalChoice,
    damageType: optionalChoice,
    notes: z.string().optional().default(''),
  })
  // Derived fields are not part of the input; reject callers trying to set them
  .strict();

export type ParsedInspectionInput = z.output<typeof InspectionInputSchema>;

function normalizeInput(raw: unknown): unknown {
  const t = toCamelCaseKeys(raw);
  if (typeof t !== 'object' || t === null) return t;
  const out: Record<string, unknown> = { ...t };
  // Legacy form key for the inspection date
  if (out.inspectionDate === undefined && typeof out.date === 'string') {
    out.inspectionDate = out.date;
    delete out.date;
  }
  // Notes were called "observations" on the paper form
  if (out.notes === undefined && typeof out.observations === 'string') {
    out.notes = out.observations;
    delete out.observations;
  }
  return out;
}

export function parseInspectionInput(raw: unknown): ParsedInspectionInput {
  const result = InspectionInputSchema.safeParse(normalizeInput(raw));
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.') || (issue.code === 'unrecognized_keys' ? issue.keys.join(',') : 'input'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

// Merge a partial change onto an existing input, then validate the result as a whole
export function mergeInspectionInput(current: InspectionInput, changes: unknown): ParsedInspectionInput {
  const patch = normalizeInput(changes);
  if (typeof patch !== 'object' || patch === null) {
    throw ValidationError.single('input', 'changes must be an object');
  }
  return parseInspectionInput({ ...current, ...patch });
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD');
const statusEnum = z.enum(INSPECTION_STATUSES);

export const ListFilterSchema = z
  .object({
    status: z.union([statusEnum, z.array(statusEnum)]).optional(),
    equipmentType: z.string().min(1).optional(),
    platform: z.string().min(1).optional(),
    from: isoDate.optional(),
    to: isoDate.optional(),
    includeDeleted: z.boolean().optional().default(false),
    orderBy: z.enum(['nextInspectionDate', 'inspectionDate', 'id']).optional().default('nextInspectionDate'),
    order: z.enum(['asc', 'desc']).optional().default('asc'),
    today: isoDate.optional(),
  })
  .strict();

export type ListFilter = z.input<typeof ListFilterSchema>;
export type ParsedListFilter = z.output<typeof ListFilterSchema>;

export function parseListFilter(raw: unknown): ParsedListFilter {
  const result = ListFilterSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({ field: issue.path.join('.') || 'filter', message: issue.message })),
    );
  }
  return result.data;
}
