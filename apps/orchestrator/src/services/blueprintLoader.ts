/**
 * Blueprint loader
 *
 * Reads blueprint definitions from `*.json` files and validates them against
 * the blueprint schema. A broken file is reported and skipped; the rest load.
 */

import { readdir, readFile } from 'fs/promises';
import { basename, join } from 'path';
import { BlueprintSchema, type Blueprint } from '@dockyard/shared';
import { config } from '../config.js';
import { BlueprintLoadError, getErrorMessage } from '../lib/errors.js';
import { blueprintLogger } from '../lib/logger.js';

export interface BlueprintLoadResult {
  blueprints: Blueprint[];
  errors: BlueprintLoadError[];
}

export function parseBlueprint(file: string, content: string): Blueprint {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new BlueprintLoadError(file, `invalid JSON: ${getErrorMessage(err)}`);
  }

  const parsed = BlueprintSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new BlueprintLoadError(file, 'does not match the blueprint schema', issues);
  }

  const blueprint: Blueprint = parsed.data;
  return blueprint;
}

export async function loadBlueprint(file: string): Promise<Blueprint> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    throw new BlueprintLoadError(file, `cannot read file: ${getErrorMessage(err)}`);
  }
  return parseBlueprint(file, content);
}

/**
 * Load every blueprint in a directory, sorted by file name.
 */
export async function loadBlueprints(directory: string = config.paths.blueprints): Promise<BlueprintLoadResult> {
  const entries = await readdir(directory);
  const files = entries.filter(entry => entry.endsWith('.json') && !entry.startsWith('.')).sort();

  const blueprints: Blueprint[] = [];
  const errors: BlueprintLoadError[] = [];
  const seen = new Set<string>();

  for (const entry of files) {
    const file = join(directory, entry);
    try {
      const blueprint = await loadBlueprint(file);

      if (seen.has(blueprint.name)) {
        throw new BlueprintLoadError(file, `duplicate blueprint name "${blueprint.name}"`);
      }
      if (basename(entry, '.json') !== blueprint.name) {
        blueprintLogger.warn({ file: entry, name: blueprint.name }, 'Blueprint file name does not match its name');
      }

      seen.add(blueprint.name);
      blueprints.push(blueprint);
    } catch (err) {
      if (!(err instanceof BlueprintLoadError)) {
        throw err;
      }
      blueprintLogger.error({ file: entry, details: err.details }, err.message);
      errors.push(err);
    }
  }

  blueprintLogger.info({ loaded: blueprints.length, failed: errors.length }, 'Blueprints loaded');
  return { blueprints, errors };
}
