import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { processRunner } from '../shared/exec.js';
import type { ProcessRunner } from '../shared/exec.js';
import { logger } from '../shared/logger.js';
import { buildCliArgv, formatCommandLine } from '../tools/payload.js';
import type { CliTarget } from '../tools/payload.js';
import type { ToolArgsPayload } from '../tools/types.js';
import type { InvokeResult, ToolInvoker } from './types.js';

export interface CliInvokerOptions {
  command: string;
  target: CliTarget;
  timeoutMs: number;
  cwd?: string;
}

/**
 * Runs the external MCP client once per call and hands back everything it
 * printed. A non-zero exit is logged but not raised: the client reports tool
 * failures in its output, which the scraper still needs to see.
 */
export class CliToolInvoker implements ToolInvoker {
  constructor(
    private readonly options: CliInvokerOptions,
    private readonly runner: ProcessRunner = processRunner
  ) {}

  describe(toolName: string, payload: ToolArgsPayload): string {
    return formatCommandLine(this.options.command, buildCliArgv(this.options.target, toolName, payload));
  }

  async invoke(toolName: string, payload: ToolArgsPayload): Promise<InvokeResult> {
    const argv = buildCliArgv(this.options.target, toolName, payload);
    const result = await this.runner.run(this.options.command, argv, {
      cwd: this.options.cwd,
      timeoutMs: this.options.timeoutMs,
    });

    if (result.timedOut) {
      logger.warn({ toolName, timeoutMs: this.options.timeoutMs }, 'MCP client timed out');
    } else if (result.exitCode !== 0) {
      logger.warn({ toolName, exitCode: result.exitCode }, 'MCP client exited non-zero');
    }

    if (result.all.trim() === '') {
      throw new HarnessError(HarnessErrorCode.EMPTY_OUTPUT, 'No output captured from command', {
        exitCode: result.exitCode,
      });
    }
    return { output: result.all, structured: false };
  }
}
