import fs from 'fs';
import os from 'os';
import path from 'path';
import { readMcpServerEntry } from '../../../src/invoke/mcp-config.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ytmcp-mcpcfg-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(content: string): string {
  const file = path.join(tmpDir, 'mcp_config.json');
  fs.writeFileSync(file, content);
  return file;
}

describe('readMcpServerEntry', () => {
  it('returns the named server entry', () => {
    const file = writeConfig(JSON.stringify({
      mcpServers: {
        youtrack: { command: 'python', args: ['main.py'], env: { YOUTRACK_API_TOKEN: 'test-token' } },
      },
    }));
    expect(readMcpServerEntry(file, 'youtrack')).toEqual({
      command: 'python',
      args: ['main.py'],
      env: { YOUTRACK_API_TOKEN: 'test-token' },
    });
  });

  it('lists the known servers when the name is missing', () => {
    const file = writeConfig(JSON.stringify({ mcpServers: { other: { command: 'node' } } }));
    expect(() => readMcpServerEntry(file, 'youtrack')).toThrow(expect.objectContaining({
      code: HarnessErrorCode.INVALID_CONFIG,
      message: `No server "youtrack" in ${file}`,
      context: { servers: 'other' },
    }));
  });

  it('rejects entries without a command', () => {
    const file = writeConfig(JSON.stringify({ mcpServers: { youtrack: { args: [] } } }));
    expect(() => readMcpServerEntry(file, 'youtrack')).toThrow(expect.objectContaining({
      code: HarnessErrorCode.INVALID_CONFIG,
      message: `Malformed MCP config: ${file}`,
    }));
  });

  it('rejects unreadable or non-JSON files', () => {
    const file = writeConfig('{ not json');
    expect(() => readMcpServerEntry(file, 'youtrack')).toThrow(expect.objectContaining({
      code: HarnessErrorCode.INVALID_CONFIG,
      message: `Cannot read MCP config: ${file}`,
    }));
    const missing = path.join(tmpDir, 'absent.json');
    expect(() => readMcpServerEntry(missing, 'youtrack')).toThrow(expect.objectContaining({
      code: HarnessErrorCode.INVALID_CONFIG,
    }));
  });
});
