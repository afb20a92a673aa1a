import path from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { formatCommandLine, serializePayload } from '../tools/payload.js';
import type { ToolArgsPayload } from '../tools/types.js';
import { readMcpServerEntry } from './mcp-config.js';
import type { McpServerEntry } from './mcp-config.js';
import type { InvokeResult, ToolInvoker } from './types.js';

const CLIENT_INFO = { name: 'ytmcp', version: '0.1.0' };

export type TransportFactory = (server: McpServerEntry) => Transport;

export interface SdkInvokerOptions {
  mcpConfigPath: string;
  mcpName: string;
  timeoutMs: number;
  cwd?: string;
}

export const stdioTransport: TransportFactory = server =>
  new StdioClientTransport({
    command: server.command,
    args: server.args ?? [],
    env: { ...getDefaultEnvironment(), ...(server.env ?? {}) },
    cwd: server.cwd,
  });

/**
 * Calls tools through the MCP SDK instead of the external client CLI. The
 * server is started from the same MCP config file, one connection per call,
 * and the result comes back as text content, so nothing has to be scraped.
 */
export class SdkToolInvoker implements ToolInvoker {
  private server: McpServerEntry | null = null;

  constructor(
    private readonly options: SdkInvokerOptions,
    private readonly createTransport: TransportFactory = stdioTransport
  ) {}

  private resolveServer(): McpServerEntry {
    if (!this.server) {
      const configPath = path.resolve(this.options.cwd ?? process.cwd(), this.options.mcpConfigPath);
      this.server = readMcpServerEntry(configPath, this.options.mcpName);
    }
    return this.server;
  }

  describe(toolName: string, payload: ToolArgsPayload): string {
    const server = this.resolveServer();
    const launch = formatCommandLine(server.command, server.args ?? []);
    return `tools/call ${toolName} ${serializePayload(payload)} (server: ${launch})`;
  }

  async invoke(toolName: string, payload: ToolArgsPayload): Promise<InvokeResult> {
    const server = this.resolveServer();
    const client = new Client(CLIENT_INFO);
    await client.connect(this.createTransport(server));

    let raw: unknown;
    try {
      raw = await client.callTool(
        { name: toolName, arguments: { args: payload.args, kwargs: payload.kwargs } },
        undefined,
        { timeout: this.options.timeoutMs }
      );
    } finally {
      await client.close();
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HarnessError(HarnessErrorCode.TOOL_ERROR, `Unexpected tools/call result from ${toolName}`, {
        result: JSON.stringify(raw),
      });
    }

    const text = parsed.data.content
      .flatMap(item => (item.type === 'text' ? [item.text] : []))
      .join('\n');
    logger.debug({ toolName, isError: parsed.data.isError ?? false, length: text.length }, 'tool call finished');

    if (parsed.data.isError) {
      throw new HarnessError(HarnessErrorCode.TOOL_ERROR, `Tool ${toolName} reported an error`, { output: text });
    }
    if (text.trim() === '') {
      throw new HarnessError(HarnessErrorCode.EMPTY_OUTPUT, 'No output captured from command', { toolName });
    }
    return { output: text, structured: true };
  }
}
