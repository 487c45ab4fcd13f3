#!/usr/bin/env node
import { createLogger } from '../logger.js';
import { loadSettings } from '../settings.js';
import { createCLI, errorChain } from './program.js';

let logger = createLogger();

try {
  const settings = loadSettings();
  logger = createLogger(settings.logLevel);
  createCLI({ logger, settings }).parse(process.argv);
} catch (err) {
  const [message, ...causes] = errorChain(err);
  logger.error({ causes }, message ?? 'unknown error');
  process.exitCode = 1;
}
