import { mkdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import type { StackDescriptor } from '@dockyard/shared';
import { runtimeLogger } from '../lib/logger.js';

export const COMPOSE_FILE_NAME = 'docker-compose.yml';
export const ENV_FILE_NAME = '.env';

export interface StackArtifacts {
  composeYaml: string;
  envFile: string;
}

export function serializeCompose(descriptor: StackDescriptor): string {
  return stringifyYaml(descriptor);
}

async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, path);
}

/**
 * Write the compose file and `.env` into the app's stack directory.
 */
export async function writeStackFiles(stackDir: string, artifacts: StackArtifacts): Promise<string[]> {
  await mkdir(stackDir, { recursive: true });

  const composePath = join(stackDir, COMPOSE_FILE_NAME);
  const envPath = join(stackDir, ENV_FILE_NAME);
  await writeFileAtomic(composePath, artifacts.composeYaml);
  await writeFileAtomic(envPath, artifacts.envFile);

  runtimeLogger.info({ stackDir }, 'Stack files written');
  return [composePath, envPath];
}
