#!/usr/bin/env node
import { main } from './cli.js';
import { logger } from './logger.js';

// exitCode rather than exit() so the pino transports can flush
main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ err }, 'Weekly list creator crashed');
    process.exitCode = 1;
  });
