// Config loader: reads ytmcp.config.yaml from the working directory (or an explicit
// --config-file) and deep-merges it over DEFAULT_CONFIG, so users only write the keys
// they change. YTMCP_* environment variables win over both.
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { HarnessConfigSchema, TransportSchema } from './types.js';
import type { HarnessConfig } from './types.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_FILE = 'ytmcp.config.yaml';

export const DEFAULT_CONFIG: HarnessConfig = {
  cli: {
    command: 'mcp-tools-cli',
    mcp_config: 'mcp_config.json',
    mcp_name: 'youtrack',
    transport: 'cli',
    timeout_ms: 120_000,
  },
  output: { iso_timestamps: false },
  docker: {
    image: 'youtrack-mcp:latest',
    extra_images: ['youtrack-mcp-local:1.17.3-wip'],
    context: '.',
  },
  tests: {
    runner: 'pytest',
    runner_args: ['-v', '--tb=short'],
    env_file: '.env',
  },
};

export interface ConfigResult {
  config: HarnessConfig;
  /** file that was read, or null when running on defaults */
  configPath: string | null;
}

export interface LoadConfigOptions {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.explicitPath
    ? resolve(cwd, options.explicitPath)
    : join(cwd, DEFAULT_CONFIG_FILE);

  let fileValues: Record<string, unknown> = {};
  let readPath: string | null = null;

  if (existsSync(configPath)) {
    fileValues = readConfigFile(configPath);
    readPath = configPath;
  } else if (options.explicitPath) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Config file not found: ${configPath}`);
  } else {
    logger.debug({ configPath }, 'no config file, using defaults');
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), fileValues);
  applyEnvOverrides(merged, env);

  const parsed = HarnessConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, 'Invalid configuration', {
      configPath: readPath ?? '(defaults)',
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
    });
  }
  return { config: parsed.data, configPath: readPath };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Failed to parse config: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Config root must be a mapping: ${configPath}`);
  }
  return raw;
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  const cli = isRecord(config['cli']) ? config['cli'] : {};
  if (env['YTMCP_COMMAND']) cli['command'] = env['YTMCP_COMMAND'];
  if (env['YTMCP_MCP_CONFIG']) cli['mcp_config'] = env['YTMCP_MCP_CONFIG'];
  if (env['YTMCP_MCP_NAME']) cli['mcp_name'] = env['YTMCP_MCP_NAME'];
  if (env['YTMCP_TRANSPORT']) {
    const transport = TransportSchema.safeParse(env['YTMCP_TRANSPORT']);
    if (!transport.success) {
      throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `YTMCP_TRANSPORT must be cli or sdk, got "${env['YTMCP_TRANSPORT']}"`);
    }
    cli['transport'] = transport.data;
  }
  config['cli'] = cli;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toRecord(config: HarnessConfig): Record<string, unknown> {
  // env overrides mutate the merged tree; DEFAULT_CONFIG must stay pristine
  const copy: Record<string, unknown> = structuredClone(config);
  return copy;
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
