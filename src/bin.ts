#!/usr/bin/env node
import { build_program } from './cli';
import { create_logger } from './log';

const log = create_logger('cli');

build_program()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
