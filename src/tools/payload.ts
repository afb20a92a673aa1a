import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { kwargsSchema } from './catalog.js';
import type { ParamDef, RawValue, RawValues, ToolArgsPayload, ToolDef } from './types.js';

export interface CliTarget {
  mcp_config: string;
  mcp_name: string;
}

/**
 * Assemble the `{ args, kwargs }` payload for a tool from user-entered values.
 * kwargs is itself a JSON string inside the payload; both layers go through
 * JSON.stringify so quotes or backslashes in user input cannot break them.
 */
export function buildToolArgs(tool: ToolDef, values: RawValues): ToolArgsPayload {
  let args = '';
  if (tool.positional) {
    const raw = values[tool.positional.name];
    if (typeof raw !== 'string' || raw.trim() === '') {
      throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing ${tool.positional.name} for ${tool.name}`);
    }
    args = raw.trim();
  }

  const kwargs: Record<string, unknown> = {};
  for (const param of tool.params) {
    const value = coerceParam(tool, param, values[param.name]);
    if (value !== undefined) kwargs[param.name] = value;
  }

  return { args, kwargs: JSON.stringify(kwargs) };
}

/** Build a payload from a ready-made kwargs JSON object, validated against the tool's schema. */
export function buildToolArgsFromJson(tool: ToolDef, args: string | undefined, kwargsJson: string): ToolArgsPayload {
  if (tool.positional && (args === undefined || args.trim() === '')) {
    throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing ${tool.positional.name} for ${tool.name}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(kwargsJson);
  } catch (e) {
    throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `kwargs is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = kwargsSchema(tool).safeParse(raw);
  if (!parsed.success) {
    // absent or blank required keys read the same as on the prompt path
    const missing = parsed.error.issues
      .filter(i => i.path.length === 1 && (i.code === 'too_small' || (i.code === 'invalid_type' && i.received === 'undefined')))
      .map(i => String(i.path[0]));
    if (missing.length > 0) {
      throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing ${missing.join(', ')} for ${tool.name}`);
    }
    throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `kwargs do not match ${tool.name}`, {
      issues: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    });
  }

  return { args: args?.trim() ?? '', kwargs: JSON.stringify(parsed.data) };
}

function coerceParam(tool: ToolDef, param: ParamDef, raw: RawValue | undefined): unknown {
  if (param.kind === 'field-map') {
    if (raw === undefined || typeof raw === 'string') {
      throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing ${param.name} for ${tool.name}`);
    }
    const field = raw.field.trim();
    if (field === '' || raw.value.trim() === '') {
      throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing field name or value for ${param.name}`);
    }
    return { [field]: raw.value.trim() };
  }

  if (raw !== undefined && typeof raw !== 'string') {
    throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `${param.name} takes a single value`);
  }
  const text = raw?.trim() ?? '';
  if (text === '') {
    if (param.optional) return undefined;
    throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing ${param.name} for ${tool.name}`);
  }

  switch (param.kind) {
    case 'string':
      return text;
    case 'integer':
      if (!/^-?\d+$/.test(text)) {
        throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `${param.name} must be an integer, got "${text}"`);
      }
      return Number(text);
    case 'list': {
      const items = text.split(',').map(s => s.trim()).filter(s => s.length > 0);
      if (items.length === 0 && !param.optional) {
        throw new HarnessError(HarnessErrorCode.MISSING_PARAMETER, `Missing ${param.name} for ${tool.name}`);
      }
      return items.length > 0 ? items : undefined;
    }
  }
}

export function serializePayload(payload: ToolArgsPayload): string {
  return JSON.stringify({ args: payload.args, kwargs: payload.kwargs });
}

export function buildCliArgv(target: CliTarget, toolName: string, payload: ToolArgsPayload): string[] {
  return [
    '--config', target.mcp_config,
    '--mcp-name', target.mcp_name,
    'call-tool',
    '--tool-name', toolName,
    '--tool-args', serializePayload(payload),
  ];
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(arg: string): string {
  if (SHELL_SAFE.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Copy-pasteable rendering of a command for display. */
export function formatCommandLine(command: string, argv: string[]): string {
  return [command, ...argv].map(shellQuote).join(' ');
}

/**
 * Parse repeated `key=value` options. For field-map params the value is itself
 * `field=value`, e.g. `custom_fields=Priority=High`.
 */
export function parseParamOptions(tool: ToolDef, pairs: string[]): RawValues {
  const values: RawValues = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `Expected key=value, got "${pair}"`);
    }
    const key = pair.slice(0, eq);
    const value = pair.slice(eq + 1);
    const param = tool.params.find(p => p.name === key);
    if (!param) {
      throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `${tool.name} has no parameter "${key}"`, {
        parameters: tool.params.map(p => p.name).join(', ') || '(none)',
      });
    }
    if (param.kind === 'field-map') {
      const inner = value.indexOf('=');
      if (inner <= 0) {
        throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `${key} expects field=value, got "${value}"`);
      }
      values[key] = { field: value.slice(0, inner), value: value.slice(inner + 1) };
    } else {
      values[key] = value;
    }
  }
  return values;
}
