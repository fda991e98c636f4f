#!/usr/bin/env -S npx tsx
import { SnakeAgentError } from '@snake-agent/shared';
import { main } from './cli.js';
import { createLogger } from './logger.js';

const logger = createLogger('snake-agent');

try {
  main();
} catch (err) {
  if (err instanceof SnakeAgentError) {
    logger.error({ code: err.code }, err.message);
  } else {
    logger.error({ err }, 'Unexpected failure');
  }
  process.exitCode = 1;
}
