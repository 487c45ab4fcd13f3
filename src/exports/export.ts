import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import strftime from 'strftime';
import type pl from 'nodejs-polars';
import { ExportError } from '../errors.js';
import type { Clock } from '../clock.js';
import type { Logger } from '../logger.js';
import type { ExportItem, ExportType } from './types.js';

export interface ExportContext {
  clock: Clock;
  logger: Logger;
}

const EXTENSIONS: Record<ExportType, string> = {
  csv: '.csv',
  nd_json: '.ndjson',
  json: '.json',
};

/** `<name><formatted now><extension>` */
export function exportFileName(item: ExportItem, now: Date): string {
  const stamp = item.dateFormat === undefined ? '' : strftime(item.dateFormat, now);
  return `${item.name}${stamp}${EXTENSIONS[item.type]}`;
}

function write(item: ExportItem, plan: pl.LazyDataFrame, destination: string): void {
  switch (item.type) {
    case 'csv':
      if (item.sink) {
        plan.sinkCSV(destination, { maintainOrder: true });
      } else {
        plan.collectSync().writeCSV(destination);
      }
      return;
    case 'nd_json':
      plan.collectSync().writeJSON(destination, { format: 'lines' });
      return;
    case 'json':
      plan.collectSync().writeJSON(destination, { format: 'json' });
      return;
  }
}

/**
 * Writes the plan to the export's destination and returns the file path.
 * Any failure is raised as ExportError.
 */
export function exportPlan(item: ExportItem, plan: pl.LazyDataFrame, { clock, logger }: ExportContext): string {
  let destination = join(item.folder, item.name);
  try {
    destination = join(item.folder, exportFileName(item, clock.now()));
    logger.debug({ export: item.type, destination }, 'exporting');
    mkdirSync(item.folder, { recursive: true });
    write(item, plan, destination);
  } catch (err) {
    throw new ExportError(destination, err);
  }
  logger.info({ file: destination }, 'wrote export');
  return destination;
}
