import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { parse, stringify } from 'smol-toml';
import { systemClock, type Clock } from '../clock.js';
import { readConfigFile } from '../config/config.js';
import { inferSourceSchema, spliceSchema } from '../config/infer.js';
import { configJsonSchema } from '../config/json-schema.js';
import { runConfig } from '../config/load.js';
import { createContext } from '../context.js';
import type { Logger } from '../logger.js';
import type { Settings } from '../settings.js';

export interface CLIOptions {
  logger: Logger;
  settings: Settings;
  clock?: Clock;
  /** Receives command output; defaults to stdout */
  write?: (text: string) => void;
}

function parseRows(value: string): number {
  const rows = Number(value);
  if (!Number.isInteger(rows) || rows <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return rows;
}

/** Messages of an error and each of its causes, outermost first. */
export function errorChain(err: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = err;
  while (current !== undefined && current !== null) {
    if (current instanceof Error) {
      messages.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }
  return messages;
}

export function createCLI({ logger, settings, clock = systemClock, write }: CLIOptions): Command {
  const out = write ?? ((text: string) => process.stdout.write(text));

  const program = new Command()
    .name('detl')
    .description('Load, transform and export tabular data described by a TOML configuration');

  program
    .command('run')
    .description('Parse a configuration and write all of its exports')
    .argument('<config>', 'path to the configuration file')
    .action((path: string) => {
      const config = readConfigFile(path, createContext({ logger }));
      const files = runConfig(config, { logger, clock });
      logger.info({ files: files.length }, 'run complete');
    });

  program
    .command('dump-schema')
    .description('Write the JSON Schema of the configuration format')
    .argument('<path>', 'file to write the schema to')
    .action((path: string) => {
      const destination = resolve(path);
      writeFileSync(destination, `${JSON.stringify(configJsonSchema(), null, 2)}\n`);
      logger.info({ file: destination }, 'wrote schema');
    });

  program
    .command('infer-schema')
    .description("Infer the datatypes of a configuration's source")
    .argument('<config>', 'path to the configuration file')
    .option('-r, --rows <n>', 'number of rows to sample', parseRows)
    .option('-w, --write', 'write the schema into the configuration file')
    .action((path: string, options: { rows?: number; write?: boolean }) => {
      const ctx = createContext({ logger });
      const config = readConfigFile(path, ctx);
      const file = config.path ?? resolve(path);
      const schema = inferSourceSchema(config.source, ctx, options.rows ?? settings.inferRows);
      if (options.write === true) {
        const document = spliceSchema(parse(readFileSync(file, 'utf8')), schema);
        writeFileSync(file, stringify(document));
        logger.info({ file }, 'wrote inferred schema');
        return;
      }
      out(`${stringify({ schema })}\n`);
    });

  return program;
}
