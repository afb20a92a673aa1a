import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { ParamDef, PositionalDef, ToolDef } from './types.js';

const projectId: PositionalDef = {
  name: 'project_id',
  prompt: 'Enter project ID (e.g., AI, DEMO): ',
  description: 'Project short name, e.g. AI',
};

const issueId: PositionalDef = {
  name: 'issue_id',
  prompt: 'Enter issue ID (e.g., AI-2375): ',
  description: 'Readable issue id, e.g. AI-2375',
};

const fieldName: ParamDef = {
  kind: 'string',
  name: 'field_name',
  prompt: 'Enter field name (e.g., Type, Priority): ',
  description: 'Custom field name',
};

const tagName: ParamDef = {
  kind: 'string',
  name: 'tag_name',
  prompt: 'Enter tag name (e.g., refinement, urgent): ',
  description: 'Tag name',
};

// ── Issue & custom field tools ─────────────────────────────────

const issueTools: ToolDef[] = [
  {
    name: 'get_custom_fields',
    description: 'List the custom fields configured for a project.',
    positional: projectId,
    params: [],
  },
  {
    name: 'get_custom_field_allowed_values',
    description: 'List the values allowed for an enum or state field.',
    positional: projectId,
    params: [fieldName],
  },
  {
    name: 'create_issue',
    description: 'Create an issue in a project.',
    positional: projectId,
    params: [
      { kind: 'string', name: 'summary', prompt: 'Enter issue summary: ', description: 'Issue summary' },
      {
        kind: 'string',
        name: 'description',
        prompt: 'Enter issue description (optional, press Enter to skip): ',
        description: 'Issue description',
        optional: true,
      },
    ],
  },
  {
    name: 'get_issue',
    description: 'Get basic issue information.',
    positional: issueId,
    params: [],
  },
  {
    name: 'get_issue_raw',
    description: 'Get full issue data including every custom field.',
    positional: issueId,
    params: [],
  },
  {
    name: 'update_issue_type',
    description: 'Change the Type field of an issue.',
    positional: issueId,
    params: [
      {
        kind: 'string',
        name: 'issue_type',
        prompt: 'Enter issue type (e.g., Task, Bug, Feature): ',
        description: 'New issue type',
      },
    ],
  },
  {
    name: 'update_custom_fields',
    description: 'Set a custom field value on an issue.',
    positional: issueId,
    params: [
      {
        kind: 'field-map',
        name: 'custom_fields',
        keyPrompt: 'Enter field name (e.g., Team, Priority): ',
        valuePrompt: 'Enter field value (e.g., Python, High): ',
        description: 'Field name to value',
      },
    ],
  },
  {
    name: 'get_available_custom_field_values',
    description: 'Alternative lookup of the values available for a custom field.',
    positional: projectId,
    params: [fieldName],
  },
  {
    name: 'add_tag_to_issue',
    description: 'Add a tag to an issue.',
    positional: issueId,
    params: [tagName],
  },
];

// ── Tag tools ──────────────────────────────────────────────────

const tagTools: ToolDef[] = [
  {
    name: 'get_issue_tags',
    description: 'List the tags assigned to an issue.',
    positional: issueId,
    params: [],
  },
  {
    name: 'remove_tag_from_issue',
    description: 'Remove a tag from an issue.',
    positional: issueId,
    params: [tagName],
  },
  {
    name: 'set_issue_tags',
    description: 'Replace all tags of an issue.',
    positional: issueId,
    params: [
      {
        kind: 'list',
        name: 'tag_names',
        prompt: 'Enter tag names, comma-separated (e.g., deploy, urgent): ',
        description: 'Tags the issue should end up with',
      },
    ],
  },
  {
    name: 'remove_all_tags_from_issue',
    description: 'Remove every tag from an issue.',
    positional: issueId,
    params: [],
  },
  {
    name: 'find_tag_by_name',
    description: 'Look up a tag by exact name.',
    positional: {
      name: 'tag_name',
      prompt: 'Enter tag name (e.g., refinement, urgent): ',
      description: 'Tag name',
    },
    params: [],
  },
  {
    name: 'get_available_tags',
    description: 'List tags owned by or shared with the current user.',
    params: [
      {
        kind: 'string',
        name: 'query',
        prompt: 'Enter tag name filter (optional, press Enter to skip): ',
        description: 'Filter tags by name',
        optional: true,
      },
      {
        kind: 'integer',
        name: 'limit',
        prompt: 'Enter maximum number of tags (optional, press Enter for 50): ',
        description: 'Maximum number of tags to return',
        optional: true,
      },
    ],
  },
];

export class ToolCatalog {
  private readonly tools: ToolDef[];

  constructor(tools: ToolDef[] = [...issueTools, ...tagTools]) {
    this.tools = tools;
  }

  getAllTools(): ToolDef[] {
    return this.tools;
  }

  get size(): number {
    return this.tools.length;
  }

  findByName(name: string): ToolDef | undefined {
    return this.tools.find(t => t.name === name);
  }

  getByName(name: string): ToolDef {
    const tool = this.findByName(name);
    if (!tool) {
      throw new HarnessError(HarnessErrorCode.UNKNOWN_TOOL, `Unknown tool: ${name}`, {
        available: this.tools.map(t => t.name).join(', '),
      });
    }
    return tool;
  }

  /** Resolve a 1-based menu entry as typed by the user. */
  getByChoice(choice: string): ToolDef {
    const trimmed = choice.trim();
    const index = /^[1-9]\d*$/.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isInteger(index) || index < 1 || index > this.tools.length) {
      throw new HarnessError(
        HarnessErrorCode.INVALID_CHOICE,
        `Invalid choice. Please enter a number between 1 and ${this.tools.length}.`,
        { choice }
      );
    }
    return this.tools[index - 1];
  }
}

function paramSchema(param: ParamDef): z.ZodTypeAny {
  let schema: z.ZodTypeAny;
  switch (param.kind) {
    case 'string':
      schema = param.optional ? z.string() : z.string().trim().min(1);
      break;
    case 'integer':
      schema = z.number().int();
      break;
    case 'list':
      schema = param.optional ? z.array(z.string()) : z.array(z.string()).min(1);
      break;
    case 'field-map':
      schema = z.record(z.string());
      break;
  }
  schema = schema.describe(param.description);
  return param.kind !== 'field-map' && param.optional ? schema.optional() : schema;
}

/** zod schema of the object a tool expects under `kwargs`. */
export function kwargsSchema(tool: ToolDef): z.ZodObject<z.ZodRawShape, 'strict'> {
  const shape: z.ZodRawShape = {};
  for (const param of tool.params) {
    shape[param.name] = paramSchema(param);
  }
  return z.object(shape).strict();
}
