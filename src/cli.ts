#!/usr/bin/env node
import { CommanderError } from 'commander';
import { engineOptionsFromEnv, readEnv } from './config.js';
import { createLogger } from './log.js';
import { createProgram } from './program.js';
import { TrackerEngine } from './tracker/engine.js';

function main() {
  const env = readEnv();
  const logger = createLogger(env.TASK_TRACKER_LOG_LEVEL ?? 'warn', { scope: 'tracker' });
  const engine = new TrackerEngine({ ...engineOptionsFromEnv(env), logger });
  return createProgram({ engine, logger }).parseAsync(process.argv);
}

Promise.resolve()
  .then(main)
  .catch((err) => {
    // commander has already printed its own usage errors
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
