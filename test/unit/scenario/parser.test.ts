import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseScenario, parseScenarioFile, slugify } from '../../../src/scenario/parser.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

describe('parseScenario', () => {
  it('normalizes steps with defaults and slug ids', () => {
    const scenario = parseScenario(`
name: Issue lifecycle
steps:
  - name: Create issue
    tool: create_issue
    args: DEMO
    kwargs:
      summary: Harness check
    capture:
      issue_id: idReadable
  - tool: get_issue
    args: \${issue_id}
    expect:
      json_contains:
        summary: Harness check
`);
    expect(scenario).toEqual({
      id: 'issue_lifecycle',
      name: 'Issue lifecycle',
      steps: [
        {
          id: 'create_issue',
          name: 'Create issue',
          tool: 'create_issue',
          args: 'DEMO',
          kwargs: { summary: 'Harness check' },
          expect: {},
          capture: { issue_id: 'idReadable' },
        },
        {
          id: '2_get_issue',
          name: '2. get_issue',
          tool: 'get_issue',
          args: '${issue_id}',
          kwargs: {},
          expect: { json_contains: { summary: 'Harness check' } },
          capture: undefined,
        },
      ],
    });
  });

  it('keeps an explicit id and numbers duplicate step names', () => {
    const scenario = parseScenario(`
name: Tags
id: tag-checks
steps:
  - { name: Look up, tool: find_tag_by_name, args: urgent }
  - { name: Look up, tool: find_tag_by_name, args: 42 }
`);
    expect(scenario.id).toBe('tag-checks');
    expect(scenario.steps.map(s => s.id)).toEqual(['look_up', 'look_up_2']);
    expect(scenario.steps[1].args).toBe('42');
  });

  it('rejects a scenario without steps', () => {
    expect(() => parseScenario('name: Empty\nsteps: []\n')).toThrow(expect.objectContaining({
      code: HarnessErrorCode.INVALID_SCENARIO,
      message: 'Scenario must have a "name" and at least one step',
    }));
  });

  it('rejects unknown step keys', () => {
    expect(() => parseScenario('name: Typo\nsteps:\n  - tool: get_issue\n    kwarg: {}\n')).toThrow(
      expect.objectContaining({ code: HarnessErrorCode.INVALID_SCENARIO })
    );
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseScenario('name: [unclosed\n')).toThrow(expect.objectContaining({
      code: HarnessErrorCode.INVALID_SCENARIO,
      message: expect.stringMatching(/^Invalid YAML: /),
    }));
  });
});

describe('parseScenarioFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ytmcp-scenario-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('splits multi-document files', async () => {
    const file = path.join(tmpDir, 'two.yaml');
    fs.writeFileSync(file, 'name: First\nsteps:\n  - tool: get_issue\n    args: AI-1\n---\nname: Second\nsteps:\n  - tool: get_available_tags\n');
    const scenarios = await parseScenarioFile(file);
    expect(scenarios.map(s => s.id)).toEqual(['first', 'second']);
  });

  it('raises INVALID_SCENARIO for a missing file', async () => {
    await expect(parseScenarioFile(path.join(tmpDir, 'absent.yaml'))).rejects.toMatchObject({
      code: HarnessErrorCode.INVALID_SCENARIO,
    });
  });

  it('parses the bundled workflow', async () => {
    const scenarios = await parseScenarioFile(path.join(__dirname, '../../../scenarios/typical-workflow.yaml'));
    expect(scenarios).toHaveLength(1);
    expect(scenarios[0].steps.length).toBeGreaterThan(5);
  });
});

describe('slugify', () => {
  it('lowercases and collapses separators', () => {
    expect(slugify('  Get Issue (raw)!  ')).toBe('get_issue_raw');
  });
});
