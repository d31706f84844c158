/**
 * Worker entry: what the detached process runs
 */

import type { AppSettings } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { ConfigStore } from './config-store.js';
import { createExecutor } from './executor.js';
import { createNotifier } from './notifier.js';
import { createProber } from './prober.js';
import { StateStore } from './state-store.js';
import { WorkflowRunner } from './workflow.js';

/**
 * Clear the handle if it still names this process; a newer run's handle is left alone
 */
export async function releaseHandle(store: StateStore, pid: number): Promise<boolean> {
  const handle = await store.readHandle();
  if (handle?.pid !== pid) return false;
  await store.clearHandle();
  return true;
}

/**
 * Run the workflow to completion and return the process exit code.
 *
 * A crash is logged and leaves the handle and status snapshot as they are,
 * so the controller reports it as a stale handle on its next call.
 */
export async function runWorker(settings: AppSettings): Promise<number> {
  const store = new StateStore(settings.stateDir);
  // stdout of the worker already goes to the log file
  const logger = createLogger(settings.logging.level, {
    logFile: store.pathOf('log'),
    console: false,
  });

  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, stopping workflow`);
    abort.abort();
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  try {
    const config = await new ConfigStore(store).load();
    if (!config) {
      logger.error(`No monitor configuration found at ${store.pathOf('config')}`);
      await releaseHandle(store, process.pid);
      return 1;
    }

    logger.info(`Worker started (PID: ${process.pid})`);

    const runner = new WorkflowRunner({
      store,
      prober: createProber(settings.prober),
      executor: createExecutor(settings.executor, logger),
      notifier: createNotifier(settings.ntfy, logger),
      logger,
      cooldownMs: settings.workflow.cooldownMs,
      clickUrl: settings.ntfy.clickUrl,
    });

    const result = await runner.run(config, abort.signal);
    await releaseHandle(store, process.pid);

    logger.info(
      result ? `Worker finished (success: ${result.success})` : 'Worker finished without a result'
    );
    return result?.success ? 0 : 1;
  } catch (error) {
    logger.error('Workflow crashed', error);
    return 1;
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
  }
}
