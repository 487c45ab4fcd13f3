import { describe, it, expect } from 'vitest';
import { exportFileName } from '../../src/exports/export.js';

const now = new Date(2024, 0, 15, 9, 30, 5);

describe('exportFileName', () => {
  it('uses the extension of the export type', () => {
    expect(exportFileName({ type: 'csv', folder: '/out', name: 'report', sink: false }, now)).toBe('report.csv');
    expect(exportFileName({ type: 'nd_json', folder: '/out', name: 'report' }, now)).toBe('report.ndjson');
    expect(exportFileName({ type: 'json', folder: '/out', name: 'report' }, now)).toBe('report.json');
  });

  it('appends the formatted time', () => {
    expect(exportFileName({ type: 'csv', folder: '/out', name: 'report_', dateFormat: '%Y%m%d-%H%M%S', sink: false }, now)).toBe(
      'report_20240115-093005.csv',
    );
  });

  it('reads the format as strftime codes', () => {
    expect(exportFileName({ type: 'csv', folder: '/out', name: 'result', dateFormat: '_%Y%m%d', sink: true }, new Date(2024, 0, 5))).toBe(
      'result_20240105.csv',
    );
    expect(exportFileName({ type: 'json', folder: '/out', name: 'r', dateFormat: '-YYYY-%y' }, now)).toBe('r-YYYY-24.json');
  });
});
