import execa from 'execa';
import { HarnessError, HarnessErrorCode } from './errors.js';
import { logger } from './logger.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order; empty when stdio is inherited */
  all: string;
  exitCode: number;
  signal?: string;
  timedOut: boolean;
}

export interface ExecOptions {
  cwd?: string;
  /** merged over process.env */
  env?: Record<string, string>;
  timeoutMs?: number;
  /** stream the child's stdio straight to the terminal instead of capturing it */
  inherit?: boolean;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  logger.debug({ command, args, cwd: options?.cwd }, 'spawning process');
  let result: execa.ExecaReturnValue;
  try {
    result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      stdio: options?.inherit ? 'inherit' : 'pipe',
      all: !options?.inherit,
      reject: false,
    });
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // With reject: false execa resolves spawn errors (ENOENT, EACCES) instead of throwing;
  // they are the only failures that carry no exit code, signal or timeout.
  if (result.failed && result.exitCode === undefined && !result.signal && !result.timedOut) {
    throw new HarnessError(HarnessErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: 'shortMessage' in result && typeof result.shortMessage === 'string' ? result.shortMessage : result.command,
    });
  }

  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    all: result.all ?? '',
    exitCode: result.exitCode ?? (result.killed ? 128 : 0),
    signal: result.signal ?? undefined,
    timedOut: result.timedOut,
  };
}

export const processRunner: ProcessRunner = { run };
