import { join } from 'path';

/**
 * Gets the base path for static resources (prompts, data files).
 * Resolved beside this module, so it is src/ when running from sources and
 * dist/src/ after a build (copyfiles places the JSON files there).
 */
export function getResourceBasePath(): string {
  return join(__dirname, '..');
}

/**
 * Gets the path to the prompts directory
 */
export function getPromptsPath(): string {
  return join(getResourceBasePath(), 'prompts');
}

/**
 * Gets the path to the data directory (word lists, lookup tables)
 */
export function getDataPath(): string {
  return join(getResourceBasePath(), 'data');
}
