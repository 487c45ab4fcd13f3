import type { Clock } from './clock.js';
import type { Logger } from './logger.js';
import type { ExportItem } from './exports/types.js';
import type { SourceItem } from './sources/types.js';
import type { TransformItem } from './transforms/types.js';

export interface Loader {
  source: SourceItem;
  transforms: TransformItem[];
}

export interface Config {
  source: Loader;
  transforms: TransformItem[];
  exports: ExportItem[];
  /** Canonical path of the document, when it was read from a file */
  path?: string;
}

export interface RunOptions {
  logger?: Logger;
  clock?: Clock;
}
