import { parse as parseYaml } from 'yaml';
import fs from 'fs/promises';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { Scenario, ScenarioStep } from './types.js';

const StepSchema = z.object({
  name: z.string().optional(),
  tool: z.string().min(1),
  args: z.union([z.string(), z.number()]).optional(),
  kwargs: z.record(z.unknown()).optional(),
  expect: z.object({
    success: z.boolean().optional(),
    output_contains: z.string().optional(),
    json_contains: z.record(z.unknown()).optional(),
  }).strict().optional(),
  capture: z.record(z.string()).optional(),
}).strict();

const ScenarioSchema = z.object({
  name: z.string().min(1),
  id: z.string().optional(),
  steps: z.array(StepSchema).min(1),
});

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 64);
}

export function parseScenario(yamlText: string): Scenario {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (e) {
    throw new HarnessError(HarnessErrorCode.INVALID_SCENARIO, `Invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = ScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HarnessError(HarnessErrorCode.INVALID_SCENARIO, 'Scenario must have a "name" and at least one step', {
      issues: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    });
  }

  const { name, steps } = parsed.data;
  // Honour explicit id from YAML if present and slug-safe; fall back to derived slug.
  const rawId = parsed.data.id?.trim() ?? '';
  const id = rawId && /^[a-z0-9_-]+$/i.test(rawId) ? rawId : slugify(name);

  const seen = new Map<string, number>();
  const normalized: ScenarioStep[] = steps.map((step, index) => {
    const stepName = step.name ?? `${index + 1}. ${step.tool}`;
    const base = slugify(stepName) || `step_${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return {
      id: count === 0 ? base : `${base}_${count + 1}`,
      name: stepName,
      tool: step.tool,
      args: step.args === undefined ? undefined : String(step.args),
      kwargs: step.kwargs ?? {},
      expect: step.expect ?? {},
      capture: step.capture,
    };
  });

  return { id, name, steps: normalized };
}

export async function parseScenarioFile(filePath: string): Promise<Scenario[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.INVALID_SCENARIO, `Cannot read scenario file: ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  // Support multi-document YAML (--- separator) or a single scenario
  const docs = raw.split(/^---$/m).filter(d => d.trim().length > 0);
  return docs.map(doc => parseScenario(doc));
}
