#!/usr/bin/env node
/**
 * kube-rollout CLI
 * Command-line interface for validating, planning and running Kubernetes rollouts
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, exit } from 'node:process';
import { z } from 'zod';
import { createContainer, type Deps } from '../src/app/container';
import type { ConfigOverrides } from '../src/config';
import { DEFAULT_TIMEOUTS } from '../src/config/defaults';
import { createLogger, type Logger } from '../src/lib/logger';
import { isRolloutError } from '../src/lib/errors';
import {
  deployCommand,
  historyCommand,
  planCommand,
  statusCommand,
  undoCommand,
  validateCommand,
  type CommandContext,
  type RolloutOptions,
} from '../src/cli/commands';
import { formatErrorMessage } from '../src/cli/format';
import { guidanceFor } from '../src/cli/guidance';

// Handle both development (apps/) and production (dist/apps/) paths
const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../package.json')
  : join(__dirname, '../package.json');
const packageJson = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

type GlobalOptions = {
  logLevel?: string;
  kubeconfig?: string;
  context?: string;
  stateDir?: string;
  dev?: boolean;
};

// Lazy so that --help and argument errors never build a logger or read config
let _deps: Deps | undefined;
let _fallbackLogger: Logger | undefined;

function getDeps(program: Command): Deps {
  if (!_deps) {
    const options = program.opts<GlobalOptions>();
    const overrides: ConfigOverrides = {};
    if (options.logLevel) overrides.logLevel = options.logLevel;
    else if (options.dev) overrides.logLevel = 'debug';
    if (options.dev) overrides.pretty = true;
    if (options.kubeconfig) overrides.kubeconfig = options.kubeconfig;
    if (options.context) overrides.context = options.context;
    if (options.stateDir) overrides.stateDir = options.stateDir;
    _deps = createContainer(overrides);
  }
  return _deps;
}

function getLogger(): Logger {
  if (_deps) return _deps.logger;
  _fallbackLogger ??= createLogger({ name: 'kube-rollout' });
  return _fallbackLogger;
}

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function reportError(error: unknown, dev: boolean): void {
  console.error(`\n❌ ${formatErrorMessage(error)}`);
  if (isRolloutError(error)) {
    getLogger().debug({ error: error.toJSON() }, 'Command failed');
  }

  console.error('\n💡 Next steps:');
  for (const hint of guidanceFor(error)) {
    console.error(`  • ${hint}`);
  }

  if (dev && error instanceof Error && error.stack) {
    console.error(`\n📍 Stack trace (dev mode):`);
    console.error(error.stack);
  }
}

/**
 * Run a command handler and translate its outcome into the exit code
 */
async function run(program: Command, handler: (context: CommandContext) => Promise<number>): Promise<void> {
  try {
    const deps = getDeps(program);
    process.exitCode = await handler({ deps, print });
  } catch (error) {
    reportError(error, program.opts<GlobalOptions>().dev === true);
    process.exitCode = 1;
  }
}

/**
 * Deploy-style commands abort on SIGINT/SIGTERM; the strategy then cleans up.
 * A second signal exits immediately.
 */
async function runAbortable(
  program: Command,
  handler: (context: CommandContext) => Promise<number>,
): Promise<void> {
  const controller = new AbortController();
  let forceTimer: NodeJS.Timeout | undefined;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      console.error(`\n⚠️ Received ${signal} again, exiting without cleanup`);
      exit(130);
    }
    getLogger().warn({ signal }, 'Abort requested; rolling back');
    console.error(`\n🛑 Received ${signal}, aborting rollout and cleaning up...`);
    controller.abort();

    forceTimer = setTimeout(() => {
      getLogger().error('Forced shutdown due to timeout');
      console.error('⚠️ Forced shutdown - the rollout may not have been cleaned up');
      exit(1);
    }, DEFAULT_TIMEOUTS.shutdown);
    forceTimer.unref();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  try {
    await run(program, (context) => handler({ ...context, signal: controller.signal }));
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (forceTimer) clearTimeout(forceTimer);
  }
}

function addRolloutOptions(command: Command): Command {
  return command
    .option('-s, --strategy <strategy>', 'rollout strategy: rolling, blue-green, canary')
    .option('-i, --image <image>', 'override the container image')
    .option('-c, --container <name>', 'container the image override applies to (default: first)')
    .option('-n, --namespace <namespace>', 'namespace for namespaced resources without one')
    .option('-d, --deployment <name>', 'Deployment to roll out when the manifests hold several')
    .option('--service <name>', 'Service fronting the Deployment')
    .option('--no-auto-rollback', 'leave a failed rollout in place instead of rolling back')
    .option('--timeout <ms>', 'health wait per step in milliseconds', parseInteger);
}

/**
 * `--no-auto-rollback` gives autoRollback a default of true; only an explicit
 * flag may override the plan and config
 */
function rolloutOptions(command: Command): RolloutOptions {
  const options = { ...command.opts<RolloutOptions>() };
  if (command.getOptionValueSource('autoRollback') !== 'cli') {
    delete options.autoRollback;
  }
  return options;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('kube-rollout')
    .description('Roll out Kubernetes Deployments with rolling, blue/green or canary strategies')
    .version(packageJson.version)
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
    .option('--kubeconfig <path>', 'path to a kubeconfig file (default: KUBECONFIG or ~/.kube/config)')
    .option('--context <name>', 'kubeconfig context to use')
    .option('--state-dir <dir>', 'directory holding rollout history (default: .kube-rollout)')
    .option('--dev', 'development mode: pretty debug logs and stack traces')
    .addHelpText(
      'after',
      `

Examples:
  $ kube-rollout validate k8s/
  $ kube-rollout plan k8s/ --strategy canary
  $ kube-rollout deploy k8s/ --image registry.example.com/web:1.4.2
  $ kube-rollout status web -n shop
  $ kube-rollout history web --limit 5
  $ kube-rollout undo web -n shop

Environment Variables:
  LOG_LEVEL                  Logging level
  KUBECONFIG / KUBE_CONTEXT  Cluster access
  ROLLOUT_NAMESPACE          Default namespace
  ROLLOUT_STRATEGY           Default strategy
  ROLLOUT_AUTO_ROLLBACK      Roll back failed rollouts (default: true)
  ROLLOUT_TIMEOUT_MS         Health wait per step
  ROLLOUT_STATE_STORE        memory or file
  ROLLOUT_STATE_DIR          History directory
`,
    );

  program
    .command('validate')
    .description('load and validate manifests without touching the cluster')
    .argument('<paths...>', 'manifest files or directories')
    .action(async (paths: string[]) => {
      await run(program, (context) => validateCommand(paths, context));
    });

  addRolloutOptions(
    program
      .command('plan')
      .description('show the apply order and the strategy steps without applying anything')
      .argument('<paths...>', 'manifest files or directories'),
  ).action(async (paths: string[], _options: RolloutOptions, command: Command) => {
    await run(program, (context) => planCommand(paths, rolloutOptions(command), context));
  });

  addRolloutOptions(
    program
      .command('deploy')
      .description('apply manifests and roll the Deployment out')
      .argument('<paths...>', 'manifest files or directories'),
  ).action(async (paths: string[], _options: RolloutOptions, command: Command) => {
    await runAbortable(program, (context) => deployCommand(paths, rolloutOptions(command), context));
  });

  program
    .command('status')
    .description('show live readiness, pods and the latest recorded rollout')
    .argument('<name>', 'Deployment name')
    .option('-n, --namespace <namespace>', 'namespace')
    .action(async (name: string, options: { namespace?: string }) => {
      await run(program, (context) => statusCommand(name, options, context));
    });

  program
    .command('history')
    .description('list recorded rollouts, newest first')
    .argument('[name]', 'Deployment name')
    .option('-n, --namespace <namespace>', 'namespace')
    .option('--limit <count>', 'maximum number of records', parseInteger)
    .action(async (name: string | undefined, options: { namespace?: string; limit?: number }) => {
      await run(program, (context) => historyCommand(name, options, context));
    });

  program
    .command('undo')
    .description('roll back to the previous successful revision')
    .argument('<name>', 'Deployment name')
    .option('-n, --namespace <namespace>', 'namespace')
    .action(async (name: string, options: { namespace?: string }) => {
      await runAbortable(program, (context) => undoCommand(name, options, context));
    });

  return program;
}

process.on('unhandledRejection', (reason) => {
  getLogger().fatal({ reason }, 'Unhandled rejection in CLI');
  console.error('❌ Unhandled rejection:', reason);
  exit(1);
});

if (require.main === module) {
  createProgram()
    .parseAsync(argv)
    .catch((error: unknown) => {
      reportError(error, false);
      exit(1);
    });
}
