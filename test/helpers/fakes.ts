import type { ExecOptions, ExecResult, ProcessRunner } from '../../src/shared/exec.js';
import type { InvokeResult, ToolInvoker } from '../../src/invoke/types.js';
import type { Prompter } from '../../src/interactive/prompter.js';
import { serializePayload } from '../../src/tools/payload.js';
import type { ToolArgsPayload } from '../../src/tools/types.js';

export class FakePrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`No answer queued for: ${question}`);
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

export interface InvokeCall {
  toolName: string;
  payload: ToolArgsPayload;
}

type Responder = (call: InvokeCall) => InvokeResult | Promise<InvokeResult>;

export class FakeInvoker implements ToolInvoker {
  readonly calls: InvokeCall[] = [];

  constructor(private readonly respond: Responder) {}

  describe(toolName: string, payload: ToolArgsPayload): string {
    return `fake-client ${toolName} ${serializePayload(payload)}`;
  }

  async invoke(toolName: string, payload: ToolArgsPayload): Promise<InvokeResult> {
    const call = { toolName, payload };
    this.calls.push(call);
    return this.respond(call);
  }
}

export interface RunCall {
  command: string;
  args: string[];
  options?: ExecOptions;
}

export class FakeRunner implements ProcessRunner {
  readonly calls: RunCall[] = [];

  constructor(private readonly result: (call: RunCall) => Partial<ExecResult> = () => ({})) {}

  async run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    const call = { command, args, options };
    this.calls.push(call);
    return { stdout: '', stderr: '', all: '', exitCode: 0, timedOut: false, ...this.result(call) };
  }
}

export function collector(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: line => lines.push(line) };
}
