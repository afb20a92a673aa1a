import { isDeepStrictEqual } from 'node:util';
import type { Palette } from '../shared/colors.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { ToolInvoker } from '../invoke/types.js';
import { formatCliOutput, formatToolText } from '../output/extractor.js';
import type { FormattedResult } from '../output/extractor.js';
import { stringifyJson } from '../output/json.js';
import type { ToolCatalog } from '../tools/catalog.js';
import { buildToolArgsFromJson } from '../tools/payload.js';
import type { ToolArgsPayload } from '../tools/types.js';
import type { ResultsTracker } from './tracker.js';
import type { Scenario, ScenarioStep, StepExpect } from './types.js';

export interface ScenarioRunDeps {
  catalog: ToolCatalog;
  invoker: ToolInvoker;
  tracker: ResultsTracker;
  palette: Palette;
  write: (line: string) => void;
  isoTimestamps?: boolean;
}

// Mistakes in the scenario itself; an expected failure never covers these.
const AUTHORING_ERRORS = new Set<HarnessErrorCode>([
  HarnessErrorCode.INVALID_SCENARIO,
  HarnessErrorCode.INVALID_PARAMETER,
  HarnessErrorCode.MISSING_PARAMETER,
  HarnessErrorCode.UNKNOWN_TOOL,
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function substitute(text: string, vars: Map<string, string>): string {
  return text.replace(/\$\{(\w+)\}/g, (_match, name: string) => {
    const value = vars.get(name);
    if (value === undefined) {
      throw new HarnessError(HarnessErrorCode.INVALID_SCENARIO, `Unknown variable \${${name}}`);
    }
    return value;
  });
}

function substituteDeep(value: unknown, vars: Map<string, string>): unknown {
  if (typeof value === 'string') return substitute(value, vars);
  if (Array.isArray(value)) return value.map(v => substituteDeep(v, vars));
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, substituteDeep(v, vars)]));
  }
  return value;
}

/** Follow a dotted path (`issue.customFields.0.name`) through objects and arrays. */
export function getPath(value: unknown, dottedPath: string): unknown {
  let current: unknown = value;
  for (const segment of dottedPath.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Returns the failure reason, or null when every expectation holds. */
export function checkExpectations(expect: StepExpect, formatted: FormattedResult): string | null {
  const value = formatted.kind === 'json' ? formatted.value : undefined;
  const toolError = isRecord(value) && 'error' in value ? value['error'] : undefined;
  const succeeded = formatted.kind === 'json' && toolError === undefined;
  const wantSuccess = expect.success ?? true;

  if (succeeded !== wantSuccess) {
    if (!wantSuccess) return 'expected the call to fail';
    if (toolError !== undefined) return `tool returned error: ${typeof toolError === 'string' ? toolError : stringifyJson(toolError)}`;
    return 'no JSON result in output';
  }
  if (expect.output_contains !== undefined && !formatted.text.includes(expect.output_contains)) {
    return `output does not contain "${expect.output_contains}"`;
  }
  if (expect.json_contains) {
    for (const [key, expected] of Object.entries(expect.json_contains)) {
      const actual = isRecord(value) ? value[key] : undefined;
      if (!isDeepStrictEqual(actual, expected)) {
        return `"${key}" is ${stringifyJson(actual)}, expected ${stringifyJson(expected)}`;
      }
    }
  }
  return null;
}

function buildPayload(deps: ScenarioRunDeps, step: ScenarioStep, vars: Map<string, string>): ToolArgsPayload {
  const args = step.args === undefined ? undefined : substitute(step.args, vars);
  const kwargsJson = JSON.stringify(substituteDeep(step.kwargs, vars));
  const tool = deps.catalog.findByName(step.tool);
  // Tools outside the catalog are passed through unvalidated.
  return tool ? buildToolArgsFromJson(tool, args, kwargsJson) : { args: args ?? '', kwargs: kwargsJson };
}

async function runStep(deps: ScenarioRunDeps, step: ScenarioStep, vars: Map<string, string>): Promise<string | null> {
  let formatted: FormattedResult;
  try {
    const payload = buildPayload(deps, step, vars);
    const result = await deps.invoker.invoke(step.tool, payload);
    const options = { isoTimestamps: deps.isoTimestamps };
    formatted = result.structured ? formatToolText(result.output, options) : formatCliOutput(result.output, options);
  } catch (err) {
    if (!(err instanceof HarnessError)) throw err;
    if (step.expect.success === false && !AUTHORING_ERRORS.has(err.code)) return null;
    return `[${err.code}] ${err.message}`;
  }

  const reason = checkExpectations(step.expect, formatted);
  if (reason !== null) return reason;

  for (const [name, dottedPath] of Object.entries(step.capture ?? {})) {
    const captured = formatted.kind === 'json' ? getPath(formatted.value, dottedPath) : undefined;
    if (captured === undefined || captured === null) {
      return `capture ${name}: path "${dottedPath}" not found`;
    }
    vars.set(name, typeof captured === 'string' ? captured : stringifyJson(captured));
  }
  return null;
}

/**
 * Run every step of a scenario in order, recording each outcome. A failing step
 * does not stop the run; later steps that need its captures fail on the
 * unknown variable instead.
 */
export async function runScenario(scenario: Scenario, deps: ScenarioRunDeps): Promise<void> {
  const { palette, write, tracker } = deps;
  const vars = new Map<string, string>();

  write(palette.blue(`Scenario: ${scenario.name}`));
  for (const step of scenario.steps) {
    const start = performance.now();
    const failureReason = await runStep(deps, step, vars);
    const durationMs = Math.round(performance.now() - start);

    tracker.record({
      scenarioId: scenario.id,
      stepId: step.id,
      stepName: step.name,
      status: failureReason === null ? 'passing' : 'failing',
      durationMs,
      failureReason: failureReason ?? undefined,
      recordedAt: new Date().toISOString(),
    });
    write(failureReason === null
      ? palette.green(`  ✓ ${step.name}`)
      : palette.red(`  ✗ ${step.name}: ${failureReason}`));
  }
}
