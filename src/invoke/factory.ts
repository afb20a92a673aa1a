import type { HarnessConfig } from '../config/types.js';
import { CliToolInvoker } from './cli-invoker.js';
import { SdkToolInvoker } from './sdk-invoker.js';
import type { ToolInvoker } from './types.js';

export function createInvoker(config: HarnessConfig, cwd: string): ToolInvoker {
  const { cli } = config;
  if (cli.transport === 'sdk') {
    return new SdkToolInvoker({
      mcpConfigPath: cli.mcp_config,
      mcpName: cli.mcp_name,
      timeoutMs: cli.timeout_ms,
      cwd,
    });
  }
  return new CliToolInvoker({
    command: cli.command,
    target: { mcp_config: cli.mcp_config, mcp_name: cli.mcp_name },
    timeoutMs: cli.timeout_ms,
    cwd,
  });
}
