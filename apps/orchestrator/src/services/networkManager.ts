import { spawn } from 'child_process';
import { config } from '../config.js';
import { ExternalSideEffectError, getErrorMessage } from '../lib/errors.js';
import { runtimeLogger } from '../lib/logger.js';

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (bin: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/**
 * Run a command and collect its output. A non-zero exit is a result, not an error;
 * the promise only rejects when the process cannot be started.
 */
export function runCommand(bin: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    runtimeLogger.debug({ cmd: bin, args }, 'Executing command');

    const proc = spawn(bin, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: timeoutMs,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code, signal) => {
      if (signal) {
        stderr += `${stderr ? '\n' : ''}terminated by ${signal} after ${timeoutMs}ms`;
      }
      resolve({ code, stdout, stderr });
    });

    proc.on('error', (err) => {
      reject(err);
    });
  });
}

/**
 * Container-runtime operations the stack builder needs for custom networks.
 */
export interface NetworkDriver {
  exists(name: string): Promise<boolean>;
  create(name: string): Promise<void>;
}

export class DockerNetworkDriver implements NetworkDriver {
  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly bin: string = config.docker.bin,
    private readonly timeoutMs: number = config.docker.networkCommandTimeoutMs
  ) {}

  async exists(name: string): Promise<boolean> {
    const result = await this.runner(this.bin, ['network', 'inspect', name], this.timeoutMs);
    return result.code === 0;
  }

  async create(name: string): Promise<void> {
    const result = await this.runner(this.bin, ['network', 'create', name], this.timeoutMs);
    if (result.code === 0) {
      return;
    }

    const output = (result.stderr || result.stdout).trim();
    // Lost a race with another create; the network is there either way
    if (/already exists/i.test(output)) {
      runtimeLogger.debug({ network: name }, 'Network already exists');
      return;
    }
    throw new ExternalSideEffectError(name, `Failed to create network "${name}": ${output || `exit code ${result.code}`}`, output);
  }
}

export type EnsureNetworkOutcome = 'existing' | 'created';

/**
 * Check-then-create. Not atomic; a concurrent create is treated as success.
 */
export async function ensureNetwork(driver: NetworkDriver, name: string): Promise<EnsureNetworkOutcome> {
  try {
    if (await driver.exists(name)) {
      runtimeLogger.debug({ network: name }, 'Network exists');
      return 'existing';
    }
    await driver.create(name);
  } catch (err) {
    if (err instanceof ExternalSideEffectError) {
      throw err;
    }
    throw new ExternalSideEffectError(name, `Failed to ensure network "${name}": ${getErrorMessage(err)}`);
  }

  runtimeLogger.info({ network: name }, 'Created network');
  return 'created';
}
