import { describe, it, expect } from 'vitest';
import { toCamelCaseKeys } from '../case';

describe('case helpers', () => {
  it('camelizes nested keys', () => {
    expect(toCamelCaseKeys({ equipment_type: 'Tanque', photo_paths: [{ thumbnail_path: 't.jpg' }] })).toEqual({
      equipmentType: 'Tanque',
      photoPaths: [{ thumbnailPath: 't.jpg' }],
    });
  });

  it('leaves dates, buffers and scalars alone', () => {
    const when = new Date(2024, 0, 1);
    const bytes = Buffer.from('x');
    const out = toCamelCaseKeys({ created_at: when, raw_bytes: bytes });
    expect(out).toEqual({ createdAt: when, rawBytes: bytes });
    expect(toCamelCaseKeys('inspection_date')).toBe('inspection_date');
    expect(toCamelCaseKeys(null)).toBeNull();
  });
});
