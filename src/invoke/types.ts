import type { ToolArgsPayload } from '../tools/types.js';

export interface InvokeResult {
  /** captured client output, or the tool's text content for structured transports */
  output: string;
  /** true when `output` is the tool result itself rather than client log text */
  structured: boolean;
}

export interface ToolInvoker {
  /** Human-readable form of what invoke() will run, shown before running it. */
  describe(toolName: string, payload: ToolArgsPayload): string;
  invoke(toolName: string, payload: ToolArgsPayload): Promise<InvokeResult>;
}
