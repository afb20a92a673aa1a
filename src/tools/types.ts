export type ScalarKind = 'string' | 'integer' | 'list';

export interface PositionalDef {
  name: string;
  prompt: string;
  description: string;
}

export interface ScalarParamDef {
  kind: ScalarKind;
  name: string;
  prompt: string;
  description: string;
  optional?: boolean;
}

/** A single `{ <field>: <value> }` entry nested under the parameter name. */
export interface FieldMapParamDef {
  kind: 'field-map';
  name: string;
  keyPrompt: string;
  valuePrompt: string;
  description: string;
}

export type ParamDef = ScalarParamDef | FieldMapParamDef;

export interface ToolDef {
  name: string;
  description: string;
  /** sent as the `args` string; tools without one send "" */
  positional?: PositionalDef;
  /** encoded as the JSON string under `kwargs` */
  params: ParamDef[];
}

export interface FieldPair {
  field: string;
  value: string;
}

export type RawValue = string | FieldPair;
export type RawValues = Record<string, RawValue | undefined>;

export interface ToolArgsPayload {
  args: string;
  kwargs: string;
}
