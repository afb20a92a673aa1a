import path from 'path';
import { Command, CommanderError } from 'commander';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { loadConfig } from './config/loader.js';
import { TransportSchema } from './config/types.js';
import type { HarnessConfig } from './config/types.js';
import { createInvoker as defaultCreateInvoker } from './invoke/factory.js';
import type { ToolInvoker } from './invoke/types.js';
import { ReadlinePrompter } from './interactive/prompter.js';
import type { Prompter } from './interactive/prompter.js';
import { runManualSession } from './interactive/manual-session.js';
import { formatCliOutput, formatToolText } from './output/extractor.js';
import { parseScenarioFile } from './scenario/parser.js';
import { runScenario } from './scenario/runner.js';
import { ResultsTracker } from './scenario/tracker.js';
import { colorsEnabled, createPalette } from './shared/colors.js';
import type { Palette } from './shared/colors.js';
import { HarnessError, HarnessErrorCode, formatError } from './shared/errors.js';
import { processRunner } from './shared/exec.js';
import type { ProcessRunner } from './shared/exec.js';
import { runTask } from './tasks/registry.js';
import { ToolCatalog, kwargsSchema } from './tools/catalog.js';
import { buildToolArgs, buildToolArgsFromJson, parseParamOptions } from './tools/payload.js';
import type { ToolArgsPayload } from './tools/types.js';

export const VERSION = '0.1.0';

export interface CliDeps {
  write?: (line: string) => void;
  writeErr?: (line: string) => void;
  createInvoker?: (config: HarnessConfig, cwd: string) => ToolInvoker;
  createPrompter?: () => Prompter;
  runner?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
  /** force colours on or off; defaults to TTY detection */
  color?: boolean;
}

type GlobalOptions = {
  configFile?: string;
  cwd?: string;
  transport?: string;
  isoTimestamps?: boolean;
  color: boolean;
};

type CallOptions = {
  arg?: string;
  param: string[];
  kwargs?: string;
};

interface RunContext {
  cwd: string;
  config: HarnessConfig;
  palette: Palette;
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const write = deps.write ?? ((line: string) => console.log(line));
  const writeErr = deps.writeErr ?? ((line: string) => console.error(line));
  const makeInvoker = deps.createInvoker ?? defaultCreateInvoker;
  const makePrompter = deps.createPrompter ?? (() => new ReadlinePrompter());
  const catalog = new ToolCatalog();

  const resolveContext = (cmd: Command): RunContext => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    const cwd = path.resolve(globals.cwd ?? process.cwd());
    const { config } = loadConfig({ explicitPath: globals.configFile, cwd, env: deps.env });
    if (globals.transport !== undefined) {
      const transport = TransportSchema.safeParse(globals.transport);
      if (!transport.success) {
        throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `--transport must be cli or sdk, got "${globals.transport}"`);
      }
      config.cli.transport = transport.data;
    }
    if (globals.isoTimestamps) config.output.iso_timestamps = true;
    const palette = createPalette(globals.color && (deps.color ?? colorsEnabled()));
    return { cwd, config, palette };
  };

  const manual = async (ctx: RunContext): Promise<number> =>
    runManualSession({
      catalog,
      prompter: makePrompter(),
      invoker: makeInvoker(ctx.config, ctx.cwd),
      palette: ctx.palette,
      write,
      isoTimestamps: ctx.config.output.iso_timestamps,
    });

  // Set before any .command() call: subcommands copy these settings when created.
  const program = new Command();
  program.exitOverride();
  program.configureOutput({
    writeOut: str => write(str.trimEnd()),
    writeErr: str => writeErr(str.trimEnd()),
  });
  program
    .name('ytmcp')
    .description('Build, test and call tools on a YouTrack MCP server')
    .version(VERSION)
    .option('--config-file <path>', 'harness config file (default: ./ytmcp.config.yaml)')
    .option('--cwd <dir>', 'MCP server repository root')
    .option('--transport <kind>', 'cli (external MCP client) or sdk (direct stdio connection)')
    .option('--iso-timestamps', 'add *_iso8601 fields next to created/updated timestamps')
    .option('--no-color', 'disable coloured output');

  program
    .command('manual', { isDefault: true })
    .description('Interactive menu: pick a tool, enter its parameters, see the result')
    .action(async (_opts: unknown, cmd: Command) => {
      setExitCode(await manual(resolveContext(cmd)));
    });

  program
    .command('call <tool>')
    .description('Call one tool without prompts')
    .option('--arg <value>', 'positional argument (project or issue id)')
    .option('--param <key=value>', 'keyword parameter, repeatable; field maps take key=field=value',
      (value: string, previous: string[]) => [...previous, value], [])
    .option('--kwargs <json>', 'keyword parameters as a JSON object (instead of --param)')
    .action(async (toolName: string, _opts: unknown, cmd: Command) => {
      const ctx = resolveContext(cmd);
      const opts = cmd.opts<CallOptions>();
      const tool = catalog.getByName(toolName);
      if (!tool.positional && opts.arg !== undefined) {
        throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, `${tool.name} takes no positional argument, got --arg "${opts.arg}"`);
      }
      if (opts.kwargs !== undefined && opts.param.length > 0) {
        throw new HarnessError(HarnessErrorCode.INVALID_PARAMETER, '--param cannot be combined with --kwargs');
      }

      let payload: ToolArgsPayload;
      try {
        payload = opts.kwargs !== undefined
          ? buildToolArgsFromJson(tool, opts.arg, opts.kwargs)
          : buildToolArgs(tool, { ...parseParamOptions(tool, opts.param), ...(tool.positional ? { [tool.positional.name]: opts.arg } : {}) });
      } catch (err) {
        if (err instanceof HarnessError && err.code === HarnessErrorCode.MISSING_PARAMETER) {
          writeErr(formatError(err));
          writeErr(cmd.helpInformation());
          setExitCode(1);
          return;
        }
        throw err;
      }

      const invoker = makeInvoker(ctx.config, ctx.cwd);
      const result = await invoker.invoke(tool.name, payload);
      const options = { isoTimestamps: ctx.config.output.iso_timestamps };
      const formatted = result.structured ? formatToolText(result.output, options) : formatCliOutput(result.output, options);
      write(formatted.text);
      setExitCode(formatted.kind === 'unparsed' ? 1 : 0);
    });

  program
    .command('list')
    .description('List the tools the menu offers')
    .option('--json', 'print tool definitions with JSON Schema for their kwargs')
    .action((opts: { json?: boolean }) => {
      const tools = catalog.getAllTools();
      if (opts.json) {
        write(JSON.stringify(tools.map(t => ({
          name: t.name,
          description: t.description,
          positional: t.positional?.name ?? null,
          kwargs: zodToJsonSchema(kwargsSchema(t)),
        })), null, 2));
        return;
      }
      tools.forEach((t, i) => write(`${String(i + 1).padStart(2)}) ${t.name.padEnd(36)}${t.description}`));
    });

  program
    .command('task [name]')
    .description('Build/test tasks for the server repository; run without a name for the list')
    .action(async (name: string | undefined, _opts: unknown, cmd: Command) => {
      const ctx = resolveContext(cmd);
      setExitCode(await runTask(name, {
        config: ctx.config,
        cwd: ctx.cwd,
        runner: deps.runner ?? processRunner,
        write,
        runManual: () => manual(ctx),
      }));
    });

  program
    .command('scenario <files...>')
    .description('Run scripted tool workflows from YAML files')
    .action(async (files: string[], _opts: unknown, cmd: Command) => {
      const ctx = resolveContext(cmd);
      const tracker = new ResultsTracker();
      const invoker = makeInvoker(ctx.config, ctx.cwd);
      for (const file of files) {
        for (const scenario of await parseScenarioFile(path.resolve(ctx.cwd, file))) {
          await runScenario(scenario, {
            catalog,
            invoker,
            tracker,
            palette: ctx.palette,
            write,
            isoTimestamps: ctx.config.output.iso_timestamps,
          });
        }
      }
      write('');
      write(tracker.summary());
      setExitCode(tracker.getFailCount() > 0 ? 1 : 0);
    });

  return program;
}

/** Parse argv and run the selected command. Resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const writeErr = deps.writeErr ?? ((line: string) => console.error(line));
  let exitCode = 0;
  const program = buildProgram(deps, code => { exitCode = code; });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof HarnessError) {
      writeErr(formatError(err));
      return 1;
    }
    throw err;
  }
  return exitCode;
}
