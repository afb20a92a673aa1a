export interface StepExpect {
  /** default true: the call returned JSON without a top-level "error" key */
  success?: boolean;
  output_contains?: string;
  /** shallow match against the parsed result object */
  json_contains?: Record<string, unknown>;
}

export interface ScenarioStep {
  id: string;        // generated: slugified name
  name: string;
  tool: string;
  args?: string;
  kwargs: Record<string, unknown>;
  expect: StepExpect;
  /** varName -> dotted path into the parsed result */
  capture?: Record<string, string>;
}

export interface Scenario {
  id: string;
  name: string;
  steps: ScenarioStep[];
}

export type StepStatus = 'passing' | 'failing';

export interface StepResult {
  scenarioId: string;
  stepId: string;
  stepName: string;
  status: StepStatus;
  durationMs: number;
  failureReason?: string;
  recordedAt: string;     // ISO 8601
}
