export * from './types/inspection';
export * from './utils/errors';
export {
  DEFAULT_CATALOG,
  checkIdentity,
  createCatalog,
  findEquipmentType,
  tag,
  tagsForType,
  validityDays,
  type EquipmentTypeOption,
  type IdentityFields,
  type OptionCatalog,
  type TagFields,
} from './config/catalog';
export { DEFAULT_WARNING_WINDOW_DAYS, PHOTO_LIMITS, loadConfig, type AppConfig, type PhotoLimits } from './config/app';
export { parseInspectionInput, parseListFilter, type ListFilter } from './schemas/inspection';
export * from './utils/dateValidator';
export { PhotoHandler, SUPPORTED_EXTENSIONS, recordPhotoDir, type PhotoInfo, type ProcessedPhoto, type ValidatedPhoto } from './utils/photoHandler';
export { RecordStore, type RecordStoreOptions } from './utils/recordStore';
export { renderBatch, renderSingle, renderSummary, type RenderResult, type SummaryResult } from './utils/reportGenerator';
export { STATUS_LABELS, countBy, countByStatus, sortByUrgency } from './utils/inspectionHelpers';
export { systemClock, todayIso, type Clock } from './utils/time';
export * from './utils/inspectionApi';
