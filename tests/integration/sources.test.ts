import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import pl from 'nodejs-polars';
import { readConfigFile } from '../../src/config/config.js';
import { loadConfig, loadConfigFile } from '../../src/config/load.js';
import { createContext } from '../../src/context.js';
import { ConfigCycleError, PathError } from '../../src/errors.js';
import { PEOPLE_CSV, createWorkspace, silent, type Workspace } from './helpers.js';

let ws: Workspace;

beforeEach(() => {
  ws = createWorkspace();
});

afterEach(() => {
  ws.remove();
});

function load(file: string): Record<string, unknown>[] {
  return loadConfigFile(file, createContext({ logger: silent })).collectSync().toRecords();
}

describe('file sources', () => {
  it('expands globs in sorted order', () => {
    ws.write('parts/b.csv', 'name\nLin\n');
    ws.write('parts/a.csv', 'name\nAda\n');
    const file = ws.write('job.toml', '[source]\ntype = "csv"\npath = "parts/*.csv"\n');
    expect(load(file)).toEqual([{ name: 'Ada' }, { name: 'Lin' }]);
  });

  it('accepts a list of paths', () => {
    ws.write('one.csv', 'name\nAda\n');
    ws.write('two.csv', 'name\nLin\n');
    const file = ws.write('job.toml', '[source]\ntype = "csv"\npath = ["two.csv", "one.csv"]\n');
    expect(load(file)).toEqual([{ name: 'Lin' }, { name: 'Ada' }]);
  });

  it('reads a custom separator without a header', () => {
    ws.write('raw.txt', 'Ada;Paris\nLin;Oslo\n');
    const file = ws.write(
      'job.toml',
      ['[source]', 'type = "csv"', 'path = "raw.txt"', 'separator = ";"', 'has_header = false'].join('\n'),
    );
    const rows = load(file);
    expect(rows.map((row) => Object.values(row))).toEqual([
      ['Ada', 'Paris'],
      ['Lin', 'Oslo'],
    ]);
  });

  it('parses pinned columns with their schema datatype', () => {
    ws.write('codes.csv', 'zip,town\n01234,Ada\n00042,Lin\n');
    const file = ws.write(
      'job.toml',
      ['[source]', 'type = "csv"', 'path = "codes.csv"', 'schema = { zip = "String" }'].join('\n'),
    );
    expect(load(file)).toEqual([
      { zip: '01234', town: 'Ada' },
      { zip: '00042', town: 'Lin' },
    ]);
  });

  it('truncates rows with more fields than the header', () => {
    ws.write('ragged.csv', 'a,b\nx,y\nz,w,v\n');
    const file = ws.write('job.toml', '[source]\ntype = "csv"\npath = "ragged.csv"\n');
    expect(load(file)).toEqual([
      { a: 'x', b: 'y' },
      { a: 'z', b: 'w' },
    ]);
  });

  it('casts newline-delimited JSON columns to their schema datatype', () => {
    ws.write('sizes.ndjson', '{"size":1}\n{"size":20}\n');
    const file = ws.write(
      'job.toml',
      ['[source]', 'type = "json_line"', 'path = "sizes.ndjson"', 'schema = { size = "String" }'].join('\n'),
    );
    expect(load(file)).toEqual([{ size: '1' }, { size: '20' }]);
  });

  it('reads newline-delimited JSON', () => {
    ws.write('people.ndjson', '{"name":"Ada","city":"Paris"}\n{"name":"Lin","city":"Oslo"}\n');
    const file = ws.write('job.toml', '[source]\ntype = "json_line"\npath = "people.ndjson"\n');
    expect(load(file)).toEqual([
      { name: 'Ada', city: 'Paris' },
      { name: 'Lin', city: 'Oslo' },
    ]);
  });

  it('reads a JSON document', () => {
    ws.write('people.json', '[{"name":"Ada","city":"Paris"},{"name":"Lin","city":"Oslo"}]');
    const file = ws.write('job.toml', '[source]\ntype = "json"\npath = "people.json"\n');
    expect(load(file)).toEqual([
      { name: 'Ada', city: 'Paris' },
      { name: 'Lin', city: 'Oslo' },
    ]);
  });

  it('reads parquet', () => {
    pl.DataFrame({ name: ['Ada', 'Lin'] }).writeParquet(ws.path('people.parquet'));
    const file = ws.write('job.toml', '[source]\ntype = "parquet"\npath = "people.parquet"\n');
    expect(load(file)).toEqual([{ name: 'Ada' }, { name: 'Lin' }]);
  });

  it('fails the parse when a path does not exist', () => {
    const file = ws.write('job.toml', '[source]\ntype = "csv"\npath = "missing.csv"\n');
    expect(() => readConfigFile(file, createContext())).toThrow(PathError);
  });

  it('fails the parse when a glob matches nothing', () => {
    const file = ws.write('job.toml', '[source]\ntype = "csv"\npath = "parts/*.csv"\n');
    expect(() => readConfigFile(file, createContext())).toThrow(
      new PathError('parts/*.csv', ws.root, `Pattern "parts/*.csv" matched no files in ${ws.root}`),
    );
  });
});

describe('inline source', () => {
  it('builds a frame from the listed columns', () => {
    const file = ws.write(
      'job.toml',
      [
        '[source]',
        'type = "inline"',
        '',
        '[[source.columns]]',
        'name = "title"',
        'datatype = "String"',
        'values = ["Foo", "Bar"]',
        '',
        '[[source.columns]]',
        'name = "active"',
        'values = [true, false]',
      ].join('\n'),
    );
    expect(load(file)).toEqual([
      { title: 'Foo', active: true },
      { title: 'Bar', active: false },
    ]);
  });
});

describe('config source', () => {
  beforeEach(() => {
    ws.write('main.toml', '[source]\ntype = "config"\npath = "nested/mid.toml"\n');
    ws.write(
      'nested/mid.toml',
      [
        '[source]',
        'type = "config"',
        'path = "deep/leaf.toml"',
        '',
        '[[transforms]]',
        'type = "select"',
        'columns = ["name"]',
      ].join('\n'),
    );
    ws.write('nested/deep/leaf.toml', '[source]\ntype = "csv"\npath = "people.csv"\n');
    ws.write('nested/deep/people.csv', PEOPLE_CSV);
  });

  it('resolves each document against its own directory', () => {
    expect(load(ws.path('main.toml'))).toEqual([{ name: 'Ada' }, { name: 'Lin' }, { name: 'Bob' }]);
  });

  it('resolves the outer path against the caller base directory', () => {
    const ctx = createContext({ baseDirectory: ws.path('nested'), logger: silent });
    const config = readConfigFile('mid.toml', ctx);
    expect(config.path).toBe(ws.path('nested', 'mid.toml'));
    expect(config.source.source).toEqual({ type: 'config', path: ws.path('nested', 'deep', 'leaf.toml') });
    expect(loadConfig(config, ctx).collectSync().height).toBe(3);
    expect(ctx).toEqual({ baseDirectory: ws.path('nested'), configStack: [], logger: silent });
  });

  it('detects a configuration that includes itself', () => {
    const file = ws.write('self.toml', '[source]\ntype = "config"\npath = "self.toml"\n');
    expect(() => load(file)).toThrow(new ConfigCycleError([file, file]));
  });

  it('detects indirect cycles', () => {
    const a = ws.write('a.toml', '[source]\ntype = "config"\npath = "b/b.toml"\n');
    const b = ws.write('b/b.toml', '[source]\ntype = "config"\npath = "../a.toml"\n');
    let caught: unknown;
    try {
      load(a);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigCycleError);
    expect(caught).toMatchObject({ chain: [a, b, a] });
  });

  it('loads the same file twice when it is not nested in itself', () => {
    const file = ws.write(
      'twice.toml',
      [
        '[source]',
        'type = "config"',
        'path = "nested/mid.toml"',
        '',
        '[[transforms]]',
        'type = "concat"',
        'other = { type = "config", path = "nested/mid.toml" }',
      ].join('\n'),
    );
    expect(load(file)).toHaveLength(6);
  });

  it('reports the base directory of the failing document', () => {
    ws.write('broken.toml', '[source]\ntype = "config"\npath = "nested/bad.toml"\n');
    ws.write('nested/bad.toml', '[source]\ntype = "csv"\npath = "nowhere.csv"\n');
    expect(() => load(ws.path('broken.toml'))).toThrow(
      new PathError('nowhere.csv', join(ws.root, 'nested')),
    );
  });
});
