import { describe, it, expect } from 'vitest';
import { loadConfig } from '../app';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      dbPath: 'inspections.db',
      uploadsDir: 'uploads',
      reportsDir: 'reports',
      warningWindowDays: 30,
      maxInspectionAgeDays: undefined,
    });
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      INSPECTIONS_DB_PATH: '/data/app.db',
      INSPECTIONS_UPLOADS_DIR: '/data/uploads',
      INSPECTIONS_REPORTS_DIR: '/data/reports',
      INSPECTIONS_WARNING_DAYS: '14',
      INSPECTIONS_MAX_AGE_DAYS: '30',
    });
    expect(config).toEqual({
      dbPath: '/data/app.db',
      uploadsDir: '/data/uploads',
      reportsDir: '/data/reports',
      warningWindowDays: 14,
      maxInspectionAgeDays: 30,
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ INSPECTIONS_WARNING_DAYS: '  ', INSPECTIONS_DB_PATH: '' }).warningWindowDays).toBe(30);
  });

  it('rejects a non-numeric warning window', () => {
    expect(() => loadConfig({ INSPECTIONS_WARNING_DAYS: 'soon' })).toThrow('Invalid configuration: INSPECTIONS_WARNING_DAYS');
  });
});
