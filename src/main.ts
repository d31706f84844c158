#!/usr/bin/env node
/**
 * Main entry point for Ferry Monitor
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { loadSettingsSafe, STATE_DIR_ENV } from './config/index.js';
import {
  ConfigStore,
  parseConfigDocument,
  redactConfig,
  type SaveConfigInput,
} from './core/config-store.js';
import { DaemonController, DEFAULT_LOG_LINES } from './core/controller.js';
import { StateStore } from './core/state-store.js';
import { runWorker } from './core/worker.js';
import { collectConfig, TerminalPrompter } from './cli/config-wizard.js';
import { formatResult, formatStatus } from './cli/format.js';
import { spawnDetached } from './infrastructure/process/daemon.js';
import type { AppSettings } from './types/index.js';
import { createLogger } from './utils/logger.js';

const HELP = `Ferry Monitor Daemon Manager

Usage: ferry-monitor <command> [options]

Commands:
  config [--file=PATH]     Configure monitoring (interactive, or from a YAML/JSON file)
  start [--confirm=TOKEN]  Start the monitor in the background
  stop                     Stop the monitor
  restart [--confirm=TOKEN]
                           Stop, pause, start
  status                   Show daemon status (exit 1 when not running)
  result                   Show the last recorded result
  logs [n]                 Show the last n log lines (default: ${DEFAULT_LOG_LINES})
  confirm-live             Issue a token allowing start with dry run disabled
  help                     Show this help message

Options:
  --settings=PATH          Settings YAML (default: ./config/settings.yaml)
  Environment ${STATE_DIR_ENV} overrides the state directory.`;

/**
 * Parsed command line
 */
interface CliArgs {
  command: string;
  positional: string[];
  settingsPath?: string;
  confirm?: string;
  file?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const option = (name: string): string | undefined =>
    argv.find((a) => a.startsWith(`--${name}=`))?.slice(name.length + 3);
  const positional = argv.filter((a) => !a.startsWith('--'));

  return {
    command: positional[0] ?? 'help',
    positional: positional.slice(1),
    settingsPath: option('settings'),
    confirm: option('confirm'),
    file: option('file'),
  };
}

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

function createController(settings: AppSettings, args: CliArgs): DaemonController {
  const store = new StateStore(settings.stateDir);
  const entry = fileURLToPath(import.meta.url);
  const workerArgs = ['run'];
  if (args.settingsPath) workerArgs.push(`--settings=${resolve(args.settingsPath)}`);

  return new DaemonController({
    store,
    configStore: new ConfigStore(store),
    // Lifecycle events go to the daemon log only; the CLI prints its own summary
    logger: createLogger(settings.logging.level, { logFile: store.pathOf('log'), console: false }),
    spawnWorker: async () => {
      await store.ensureDir();
      return spawnDetached({
        entry,
        args: workerArgs,
        logFile: store.pathOf('log'),
        env: { ...process.env, [STATE_DIR_ENV]: settings.stateDir },
      });
    },
  });
}

async function configure(settings: AppSettings, args: CliArgs): Promise<number> {
  const configStore = new ConfigStore(new StateStore(settings.stateDir));

  let input: SaveConfigInput;
  if (args.file) {
    // js-yaml also reads JSON
    input = parseConfigDocument(yaml.load(await readFile(args.file, 'utf-8')));
  } else {
    const prompter = new TerminalPrompter();
    try {
      input = await collectConfig(prompter);
    } finally {
      prompter.close();
    }
  }

  const saved = await configStore.save(input);
  print([
    '',
    `Configuration saved to ${configStore.configFile}`,
    '',
    'Monitoring Configuration:',
    JSON.stringify(redactConfig(saved), null, 2),
  ]);
  if (saved.credentials) {
    print(['', 'Secrets are stored separately (mode 0600); handle the state directory securely.']);
  }
  print(['', "Run 'ferry-monitor start' to begin monitoring"]);
  return 0;
}

async function dispatch(args: CliArgs, settings: AppSettings): Promise<number> {
  const controller = createController(settings, args);

  switch (args.command) {
    case 'start': {
      const { handle, staleHandleCleared } = await controller.start(args.confirm);
      if (staleHandleCleared) {
        console.log(`Cleared stale handle (PID ${staleHandleCleared.pid} was not running)`);
      }
      console.log(`Ferry monitor started (PID: ${handle.pid})`);
      console.log(`Logs: ${new StateStore(settings.stateDir).pathOf('log')}`);
      return 0;
    }

    case 'stop': {
      const handle = await controller.stop();
      console.log(`Ferry monitor stopped (PID: ${handle.pid})`);
      return 0;
    }

    case 'restart': {
      const { handle, stopped } = await controller.restart(args.confirm);
      if (stopped) console.log(`Stopped PID ${stopped.pid}`);
      console.log(`Ferry monitor started (PID: ${handle.pid})`);
      return 0;
    }

    case 'status': {
      const status = await controller.status();
      print(formatStatus(status));
      return status.state === 'RUNNING' ? 0 : 1;
    }

    case 'result': {
      const result = await new StateStore(settings.stateDir).readResult();
      if (!result) {
        console.log('No result recorded yet');
        return 1;
      }
      print(formatResult(result));
      return result.success ? 0 : 1;
    }

    case 'logs': {
      const requested = args.positional[0] ? Number(args.positional[0]) : DEFAULT_LOG_LINES;
      const count = Number.isInteger(requested) && requested > 0 ? requested : DEFAULT_LOG_LINES;
      const lines = await controller.logs(count);
      print([`Last ${count} lines of ferry monitor log:`, '----------------------------------------', ...lines]);
      return 0;
    }

    case 'confirm-live': {
      const token = await controller.requestDisableDryRun();
      print([
        'WARNING: starting with this token runs a LIVE booking that submits payment.',
        `Token (valid 10 minutes, single use): ${token}`,
        `Start with: ferry-monitor start --confirm=${token}`,
      ]);
      return 0;
    }

    case 'config':
      return configure(settings, args);

    case 'run':
      return runWorker(settings);

    case 'help':
    case '-h':
      console.log(HELP);
      return 0;

    default:
      console.error(`Unknown command: ${args.command}`);
      console.error("Run 'ferry-monitor help' for usage");
      return 1;
  }
}

/**
 * Main application
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'help' || process.argv.includes('--help')) {
    console.log(HELP);
    return;
  }

  const { settings, error } = await loadSettingsSafe(args.settingsPath);
  if (error || !settings) {
    console.error(`Settings error:\n${error}`);
    process.exit(1);
  }

  try {
    process.exit(await dispatch(args, settings));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
