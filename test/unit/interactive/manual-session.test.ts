import { runManualSession, collectValues } from '../../../src/interactive/manual-session.js';
import { ToolCatalog } from '../../../src/tools/catalog.js';
import { createPalette } from '../../../src/shared/colors.js';
import { HarnessError, HarnessErrorCode } from '../../../src/shared/errors.js';
import { FakeInvoker, FakePrompter, collector } from '../../helpers/fakes.js';

const RULE = '=====================================';
const catalog = new ToolCatalog();
const palette = createPalette(false);

describe('runManualSession', () => {
  it('prompts for the chosen tool, runs it and prints the result', async () => {
    const prompter = new FakePrompter(['2', 'AI', 'Type']);
    const invoker = new FakeInvoker(() => ({
      output: `text='Tool: get_custom_field_allowed_values, Result: [{"name": "Bug"}]', annotations=None`,
      structured: false,
    }));
    const out = collector();

    const code = await runManualSession({ catalog, prompter, invoker, palette, write: out.write });

    expect(code).toBe(0);
    expect(prompter.questions).toEqual([
      'Enter your choice (1-15): ',
      'Enter project ID (e.g., AI, DEMO): ',
      'Enter field name (e.g., Type, Priority): ',
    ]);
    expect(invoker.calls).toEqual([{
      toolName: 'get_custom_field_allowed_values',
      payload: { args: 'AI', kwargs: '{"field_name":"Type"}' },
    }]);
    expect(out.lines.slice(0, 6)).toEqual([RULE, 'YouTrack MCP Manual Testing Tool', RULE, '', 'Select a tool to test:', '  1) get_custom_fields']);
    expect(out.lines.slice(-8)).toEqual([
      'fake-client get_custom_field_allowed_values {"args":"AI","kwargs":"{\\"field_name\\":\\"Type\\"}"}',
      '',
      RULE,
      'RESULT:',
      RULE,
      '[\n  {\n    "name": "Bug"\n  }\n]',
      '',
      RULE,
    ]);
    expect(prompter.closed).toBe(true);
  });

  it('asks for field name and value for update_custom_fields', async () => {
    const prompter = new FakePrompter(['7', 'AI-2375', 'Team', 'Python']);
    const invoker = new FakeInvoker(() => ({ output: '{"ok": true}', structured: true }));
    const out = collector();

    await runManualSession({ catalog, prompter, invoker, palette, write: out.write });

    expect(prompter.questions.slice(1)).toEqual([
      'Enter issue ID (e.g., AI-2375): ',
      'Enter field name (e.g., Team, Priority): ',
      'Enter field value (e.g., Python, High): ',
    ]);
    expect(invoker.calls[0].payload).toEqual({ args: 'AI-2375', kwargs: '{"custom_fields":{"Team":"Python"}}' });
    expect(out.lines).toContain('{\n  "ok": true\n}');
  });

  it('exits 1 on an invalid menu choice without calling a tool', async () => {
    const prompter = new FakePrompter(['42']);
    const invoker = new FakeInvoker(() => ({ output: 'unused', structured: false }));
    const out = collector();

    const code = await runManualSession({ catalog, prompter, invoker, palette, write: out.write });

    expect(code).toBe(1);
    expect(out.lines[out.lines.length - 1]).toBe('Invalid choice. Please enter a number between 1 and 15.');
    expect(invoker.calls).toHaveLength(0);
    expect(prompter.closed).toBe(true);
  });

  it('reports empty output', async () => {
    const prompter = new FakePrompter(['4', 'AI-1']);
    const invoker = new FakeInvoker(() => {
      throw new HarnessError(HarnessErrorCode.EMPTY_OUTPUT, 'No output captured from command');
    });
    const out = collector();

    const code = await runManualSession({ catalog, prompter, invoker, palette, write: out.write });

    expect(code).toBe(1);
    expect(out.lines[out.lines.length - 1]).toBe('ERROR: No output captured from command');
  });

  it('lets unexpected errors propagate', async () => {
    const prompter = new FakePrompter(['4', 'AI-1']);
    const invoker = new FakeInvoker(() => {
      throw new HarnessError(HarnessErrorCode.SPAWN_FAILED, 'Command failed to spawn: mcp-tools-cli');
    });
    const out = collector();

    await expect(runManualSession({ catalog, prompter, invoker, palette, write: out.write }))
      .rejects.toMatchObject({ code: HarnessErrorCode.SPAWN_FAILED });
    expect(prompter.closed).toBe(true);
  });
});

describe('collectValues', () => {
  it('returns nothing for a tool without parameters beyond the positional', async () => {
    const prompter = new FakePrompter(['AI-9']);
    expect(await collectValues(catalog.getByName('get_issue'), prompter)).toEqual({ issue_id: 'AI-9' });
  });

  it('asks optional params too', async () => {
    const prompter = new FakePrompter(['', '']);
    expect(await collectValues(catalog.getByName('get_available_tags'), prompter)).toEqual({ query: '', limit: '' });
  });
});
