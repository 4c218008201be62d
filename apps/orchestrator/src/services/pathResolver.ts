import { posix } from 'path';
import { config } from '../config.js';

const APP_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

function checkAppName(appName: string): void {
  if (!APP_NAME_PATTERN.test(appName) || appName.includes('..')) {
    throw new Error(`Invalid app name for a stack directory: "${appName}"`);
  }
}

/** Stack directory as seen by this process */
export function getStackPath(appName: string, stacksRoot: string = config.paths.stacks): string {
  checkAppName(appName);
  return posix.join(stacksRoot, appName);
}

/** Stack directory as seen by the Docker host; becomes HOST_PATH */
export function getHostStackPath(appName: string, hostStacksRoot: string = config.paths.hostStacks): string {
  checkAppName(appName);
  return posix.join(hostStacksRoot, appName);
}
