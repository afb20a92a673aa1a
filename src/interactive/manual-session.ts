import type { Palette } from '../shared/colors.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { ToolInvoker } from '../invoke/types.js';
import { formatCliOutput, formatToolText } from '../output/extractor.js';
import type { ToolCatalog } from '../tools/catalog.js';
import { buildToolArgs } from '../tools/payload.js';
import type { RawValues, ToolDef } from '../tools/types.js';
import type { Prompter } from './prompter.js';

const RULE = '=====================================';

export interface ManualSessionDeps {
  catalog: ToolCatalog;
  prompter: Prompter;
  invoker: ToolInvoker;
  palette: Palette;
  write: (line: string) => void;
  isoTimestamps?: boolean;
}

// Errors the menu reports in its own words; anything else propagates to the CLI.
const USER_FACING = new Set<HarnessErrorCode>([
  HarnessErrorCode.INVALID_CHOICE,
  HarnessErrorCode.MISSING_PARAMETER,
  HarnessErrorCode.INVALID_PARAMETER,
  HarnessErrorCode.EMPTY_OUTPUT,
]);

export async function collectValues(tool: ToolDef, prompter: Prompter): Promise<RawValues> {
  const values: RawValues = {};
  if (tool.positional) {
    values[tool.positional.name] = await prompter.ask(tool.positional.prompt);
  }
  for (const param of tool.params) {
    if (param.kind === 'field-map') {
      const field = await prompter.ask(param.keyPrompt);
      const value = await prompter.ask(param.valuePrompt);
      values[param.name] = { field, value };
    } else {
      values[param.name] = await prompter.ask(param.prompt);
    }
  }
  return values;
}

/**
 * One pass of the manual testing menu: pick a tool, answer its prompts, run it,
 * print the result. Resolves to the process exit code.
 */
export async function runManualSession(deps: ManualSessionDeps): Promise<number> {
  const { catalog, prompter, invoker, palette, write } = deps;

  write(palette.blue(RULE));
  write(palette.blue('YouTrack MCP Manual Testing Tool'));
  write(palette.blue(RULE));
  write('');
  write(palette.green('Select a tool to test:'));
  catalog.getAllTools().forEach((tool, i) => write(`  ${i + 1}) ${tool.name}`));
  write('');

  try {
    const choice = await prompter.ask(`Enter your choice (1-${catalog.size}): `);
    const tool = catalog.getByChoice(choice);
    const payload = buildToolArgs(tool, await collectValues(tool, prompter));

    write('');
    write(palette.yellow('Executing command:'));
    write(palette.yellow(invoker.describe(tool.name, payload)));
    write('');

    const result = await invoker.invoke(tool.name, payload);

    write(palette.green(RULE));
    write(palette.green('RESULT:'));
    write(palette.green(RULE));
    const options = { isoTimestamps: deps.isoTimestamps };
    const formatted = result.structured ? formatToolText(result.output, options) : formatCliOutput(result.output, options);
    write(formatted.text);
    write('');
    write(palette.green(RULE));
    return 0;
  } catch (err) {
    if (err instanceof HarnessError && USER_FACING.has(err.code)) {
      const message = err.code === HarnessErrorCode.EMPTY_OUTPUT ? `ERROR: ${err.message}` : err.message;
      write(palette.red(message));
      return 1;
    }
    throw err;
  } finally {
    prompter.close();
  }
}
