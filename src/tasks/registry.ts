// Build and test tasks for the MCP server repository. Each task proxies to the
// container build tool or the server's test runner; the child inherits the
// terminal so its progress output streams through unchanged.
import path from 'path';
import type { HarnessConfig } from '../config/types.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { ProcessRunner } from '../shared/exec.js';
import { logger } from '../shared/logger.js';
import { readEnvFile } from './env-file.js';

export type TaskGroup = 'build' | 'test';

export interface TaskContext {
  config: HarnessConfig;
  /** server repository root: build context, test dirs and .env resolve against it */
  cwd: string;
  runner: ProcessRunner;
  write: (line: string) => void;
  runManual: () => Promise<number>;
}

export interface TaskDef {
  name: string;
  group: TaskGroup;
  description: string;
  run(ctx: TaskContext): Promise<number>;
}

async function step(ctx: TaskContext, command: string, args: string[], env?: Record<string, string>): Promise<void> {
  const result = await ctx.runner.run(command, args, { cwd: ctx.cwd, env, inherit: true });
  if (result.exitCode !== 0) {
    throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `${command} exited with ${result.exitCode}`, {
      command: [command, ...args].join(' '),
    });
  }
}

function runnerArgs(ctx: TaskContext, dirs: string[], marker?: string): string[] {
  const selection = marker ? ['-m', marker] : [];
  return [...dirs, ...selection, ...ctx.config.tests.runner_args];
}

function imageRepository(image: string): string {
  const slash = image.lastIndexOf('/');
  const colon = image.lastIndexOf(':');
  return colon > slash ? image.slice(0, colon) : image;
}

const testUnit: TaskDef = {
  name: 'test-unit',
  group: 'test',
  description: 'Run unit tests only',
  async run(ctx) {
    ctx.write('🧪 Running unit tests...');
    await step(ctx, ctx.config.tests.runner, runnerArgs(ctx, ['tests/unit'], 'unit'));
    ctx.write('✅ Unit tests completed');
    return 0;
  },
};

const tasks: TaskDef[] = [
  {
    name: 'build',
    group: 'build',
    description: 'Build Docker image with latest code changes',
    async run(ctx) {
      const { image, context } = ctx.config.docker;
      ctx.write('🔨 Building YouTrack MCP Docker image with latest changes...');
      await step(ctx, 'docker', ['build', '-t', image, context]);
      ctx.write(`✅ Build complete! Image tagged as ${image}`);
      return 0;
    },
  },
  {
    name: 'clean',
    group: 'build',
    description: 'Remove Docker images',
    async run(ctx) {
      ctx.write('🧹 Cleaning up Docker images...');
      for (const image of [ctx.config.docker.image, ...ctx.config.docker.extra_images]) {
        // a missing image is not an error here
        const result = await ctx.runner.run('docker', ['rmi', image], { cwd: ctx.cwd });
        if (result.stdout.trim() !== '') ctx.write(result.stdout.trimEnd());
        if (result.exitCode !== 0) logger.debug({ image, stderr: result.stderr }, 'docker rmi skipped');
      }
      ctx.write('✅ Cleanup complete');
      return 0;
    },
  },
  {
    name: 'images',
    group: 'build',
    description: 'Show current Docker images',
    async run(ctx) {
      const repository = imageRepository(ctx.config.docker.image);
      ctx.write('📦 Current YouTrack MCP Docker images:');
      const result = await ctx.runner.run('docker', ['images'], { cwd: ctx.cwd });
      if (result.exitCode !== 0) logger.warn({ stderr: result.stderr }, 'docker images failed');
      const lines = result.stdout.split('\n').filter(line => line.includes(repository));
      ctx.write(lines.length > 0 ? lines.join('\n') : 'No YouTrack MCP images found');
      return 0;
    },
  },
  {
    name: 'test',
    group: 'test',
    description: 'Run unit tests (fast, default)',
    run: ctx => testUnit.run(ctx),
  },
  testUnit,
  {
    name: 'test-integration',
    group: 'test',
    description: 'Run integration tests',
    async run(ctx) {
      ctx.write('🧪 Running integration tests...');
      await step(ctx, ctx.config.tests.runner, runnerArgs(ctx, ['tests/integration'], 'integration'));
      ctx.write('✅ Integration tests completed');
      return 0;
    },
  },
  {
    name: 'test-all',
    group: 'test',
    description: 'Run all tests (unit + integration)',
    async run(ctx) {
      ctx.write('🧪 Running all tests (unit + integration)...');
      await step(ctx, ctx.config.tests.runner, runnerArgs(ctx, ['tests/unit', 'tests/integration']));
      ctx.write('✅ All tests completed');
      return 0;
    },
  },
  {
    name: 'test-e2e',
    group: 'test',
    description: 'Run end-to-end tests (requires YouTrack credentials)',
    async run(ctx) {
      ctx.write('🧪 Running end-to-end tests...');
      ctx.write('⚠️  Note: E2E tests require YOUTRACK_URL and YOUTRACK_API_TOKEN environment variables');
      const envPath = path.resolve(ctx.cwd, ctx.config.tests.env_file);
      const env = readEnvFile(envPath);
      if (env) {
        ctx.write(`📁 Loading environment variables from ${ctx.config.tests.env_file} file...`);
      } else {
        ctx.write(`⚠️  ${ctx.config.tests.env_file} file not found, using existing environment variables`);
      }
      await step(ctx, ctx.config.tests.runner, runnerArgs(ctx, ['tests/e2e'], 'e2e'), env ?? undefined);
      ctx.write('✅ E2E tests completed');
      return 0;
    },
  },
  {
    name: 'test-manual',
    group: 'test',
    description: 'Interactive manual testing via the MCP client',
    async run(ctx) {
      ctx.write('🧪 Starting interactive manual testing...');
      return ctx.runManual();
    },
  },
];

export function getAllTasks(): TaskDef[] {
  return tasks;
}

export function helpText(bin = 'ytmcp'): string {
  const section = (group: TaskGroup) =>
    tasks.filter(t => t.group === group).map(t => `  ${t.name.padEnd(18)}- ${t.description}`);
  return [
    'YouTrack MCP Server Commands:',
    '',
    'Build Commands:',
    ...section('build'),
    '',
    'Test Commands:',
    ...section('test'),
    '',
    'Examples:',
    `  ${bin} task build        # Build Docker image`,
    `  ${bin} task test         # Run unit tests`,
    `  ${bin} task test-all     # Run all tests`,
  ].join('\n');
}

/** Run a task by name; no name (or "help") prints the command overview. */
export async function runTask(name: string | undefined, ctx: TaskContext): Promise<number> {
  if (name === undefined || name === 'help') {
    ctx.write(helpText());
    return 0;
  }
  const task = tasks.find(t => t.name === name);
  if (!task) {
    throw new HarnessError(HarnessErrorCode.UNKNOWN_TASK, `Unknown task: ${name}`, { usage: '\n' + helpText() });
  }
  logger.debug({ task: task.name, cwd: ctx.cwd }, 'running task');
  return task.run(ctx);
}
