import path from 'node:path';

import { config as loadEnv } from 'dotenv';

// .env in the working directory; real environment variables win
loadEnv();

const PROJECT_ROOT = process.cwd();

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
export const LOG_DIR = path.resolve(PROJECT_ROOT, process.env.LOG_DIR || 'logs');
export const CARDS_YAML_PATH = path.resolve(
  PROJECT_ROOT,
  process.env.CARDS_YAML_PATH || path.join('config', 'cards.yaml'),
);

export const TRELLO_BASE_URL =
  process.env.TRELLO_BASE_URL || 'https://api.trello.com/1';
/** Positive integer from an env value, or the fallback when unset or not a number. */
export function intEnv(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? '', 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export const REQUEST_TIMEOUT = intEnv(process.env.TRELLO_REQUEST_TIMEOUT, 30000); // 30s default

export const DEFAULT_POSITION = 'top';
