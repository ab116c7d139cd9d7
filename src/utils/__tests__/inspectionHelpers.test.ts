import { describe, it, expect } from 'vitest';
import type { InspectionStatus } from '../../types/inspection';
import { countBy, countByStatus, sortByUrgency } from '../inspectionHelpers';

function item(id: number, status: InspectionStatus, nextInspectionDate: string, equipmentType = 'Tanque') {
  return { id, status, nextInspectionDate, equipmentType };
}

describe('inspectionHelpers', () => {
  it('countByStatus tallies each status', () => {
    const counts = countByStatus([item(1, 'OK', '2025-01-01'), item(2, 'OK', '2025-02-01'), item(3, 'OVERDUE', '2024-01-01')]);
    expect(counts).toEqual({ OK: 2, DUE_SOON: 0, OVERDUE: 1, total: 3 });
  });

  it('countBy groups on a field with sorted keys', () => {
    const records = [
      item(1, 'OK', '2025-01-01', 'Tanque'),
      item(2, 'OK', '2025-01-01', 'Filtro'),
      item(3, 'OK', '2025-01-01', 'Tanque'),
    ];
    expect(countBy(records, 'equipmentType')).toEqual([
      ['Filtro', 1],
      ['Tanque', 2],
    ]);
  });

  it('sortByUrgency puts overdue first, then by due date', () => {
    const sorted = sortByUrgency([
      item(1, 'OK', '2025-01-01'),
      item(2, 'DUE_SOON', '2024-07-20'),
      item(3, 'OVERDUE', '2024-06-01'),
      item(4, 'DUE_SOON', '2024-07-05'),
      item(5, 'OVERDUE', '2024-05-01'),
    ]);
    expect(sorted.map((r) => r.id)).toEqual([5, 3, 4, 2, 1]);
  });
});
