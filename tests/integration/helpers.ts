import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import pino from 'pino';
import type { Clock } from '../../src/clock.js';

export const silent = pino({ level: 'silent' });

export function fixedClock(date: Date): Clock {
  return { now: () => date };
}

export interface Workspace {
  /** Canonical path of the temporary directory */
  root: string;
  /** Writes a file below the root, creating parent directories; returns its path */
  write(path: string, content: string): string;
  path(...segments: string[]): string;
  remove(): void;
}

export function createWorkspace(): Workspace {
  const root = realpathSync(mkdtempSync(join(tmpdir(), 'detl-')));
  return {
    root,
    write(path, content) {
      const file = join(root, path);
      mkdirSync(dirname(file), { recursive: true });
      writeFileSync(file, content);
      return file;
    },
    path: (...segments) => join(root, ...segments),
    remove: () => rmSync(root, { recursive: true, force: true }),
  };
}

export const PEOPLE_CSV = ['name,city,age', 'Ada,Paris,36', 'Lin,Oslo,41', 'Bob,Paris,29', ''].join('\n');

export const CITIES_CSV = ['city,country', 'Paris,FR', 'Lyon,FR', ''].join('\n');
