import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';

const McpServerEntrySchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
});

const McpConfigFileSchema = z.object({
  mcpServers: z.record(McpServerEntrySchema),
});

export type McpServerEntry = z.infer<typeof McpServerEntrySchema>;

/** Read the `mcpServers.<name>` entry from an MCP client config file. */
export function readMcpServerEntry(configPath: string, name: string): McpServerEntry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Cannot read MCP config: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = McpConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Malformed MCP config: ${configPath}`, {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
    });
  }

  const entry = parsed.data.mcpServers[name];
  if (!entry) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `No server "${name}" in ${configPath}`, {
      servers: Object.keys(parsed.data.mcpServers).join(', ') || '(none)',
    });
  }
  return entry;
}
