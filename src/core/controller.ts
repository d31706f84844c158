/**
 * Daemon Controller: lifecycle of the detached workflow worker
 *
 * The controller owns the handle file. A handle whose process is gone is
 * cleared on the next start/stop/status call and reported as such.
 */

import { randomUUID } from 'crypto';
import type {
  DaemonHandle,
  DaemonStatus,
  NotRunningReason,
  RedactedConfig,
  StoredConfig,
} from '../types/index.js';
import type { LogSink } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { assertBookable, redactConfig, type ConfigStore } from './config-store.js';
import {
  AlreadyRunningError,
  DryRunConfirmationError,
  MissingConfigError,
  NoLogsError,
  NotRunningError,
  StartInProgressError,
  describeError,
} from './errors.js';
import type { StateStore } from './state-store.js';

export const DEFAULT_LOG_LINES = 50;
export const DRY_RUN_TOKEN_TTL_MS = 10 * 60 * 1000;
const RESTART_PAUSE_MS = 1000;

/**
 * Starts the worker in the background and returns its pid
 */
export type WorkerSpawner = () => Promise<number>;

export interface ControllerDependencies {
  store: StateStore;
  configStore: ConfigStore;
  logger: LogSink;
  spawnWorker: WorkerSpawner;
  isAlive?: (pid: number) => boolean;
  kill?: (pid: number, signal: NodeJS.Signals) => void;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface StartResult {
  handle: DaemonHandle;
  staleHandleCleared: DaemonHandle | null;
}

/**
 * Liveness check; EPERM means the process exists under another user
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

/**
 * Signal the worker's process group so in-flight commands go down with it,
 * falling back to the worker alone
 */
export function signalProcessGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch {
    process.kill(pid, signal);
  }
}

export class DaemonController {
  private readonly isAlive: (pid: number) => boolean;
  private readonly kill: (pid: number, signal: NodeJS.Signals) => void;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private deps: ControllerDependencies) {
    this.isAlive = deps.isAlive ?? isProcessAlive;
    this.kill = deps.kill ?? signalProcessGroup;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Spawn the worker and return without waiting for it.
   * The start lock is held from the liveness check until the handle is written,
   * so concurrent starts spawn at most one worker.
   */
  async start(confirmationToken?: string): Promise<StartResult> {
    const { store } = this.deps;
    if (!(await store.acquireStartLock())) {
      throw new StartInProgressError(store.pathOf('startLock'));
    }

    try {
      return await this.startLocked(confirmationToken);
    } finally {
      await store.releaseStartLock();
    }
  }

  private async startLocked(confirmationToken?: string): Promise<StartResult> {
    const { store, configStore, logger } = this.deps;

    const { handle: live, stale } = await this.inspectHandle();
    if (live) {
      throw new AlreadyRunningError(live);
    }

    const config = await configStore.load();
    if (!config) {
      throw new MissingConfigError(configStore.configFile);
    }
    assertBookable(config, this.deps.env ?? process.env);

    if (requiresLiveConfirmation(config)) {
      await this.consumeDryRunToken(confirmationToken);
      logger.warn('DRY RUN DISABLED: a successful booking will submit payment');
    }

    const pid = await this.deps.spawnWorker();
    const handle: DaemonHandle = { pid, startedAt: this.now().toISOString() };
    await store.writeHandle(handle);

    logger.info(`Ferry monitor started (PID: ${pid})`);
    return { handle, staleHandleCleared: stale };
  }

  /**
   * Terminate the worker and clear its handle
   */
  async stop(): Promise<DaemonHandle> {
    const { handle, stale } = await this.inspectHandle();
    if (!handle) {
      throw new NotRunningError(stale);
    }

    this.kill(handle.pid, 'SIGTERM');
    await this.deps.store.clearHandle();

    this.deps.logger.info(`Ferry monitor stopped (PID: ${handle.pid})`);
    return handle;
  }

  /**
   * Stop if running, pause, then start
   */
  async restart(confirmationToken?: string): Promise<StartResult & { stopped: DaemonHandle | null }> {
    let stopped: DaemonHandle | null = null;
    try {
      stopped = await this.stop();
    } catch (err) {
      if (!(err instanceof NotRunningError)) throw err;
      this.deps.logger.info(`Restart: ${err.message}`);
    }

    await this.sleep(RESTART_PAUSE_MS);
    const started = await this.start(confirmationToken);
    return { ...started, stopped };
  }

  /**
   * Current state; never throws for not-configured or not-running
   */
  async status(): Promise<DaemonStatus> {
    const { store } = this.deps;
    const { handle, stale } = await this.inspectHandle();

    if (handle) {
      return {
        state: 'RUNNING',
        handle,
        snapshot: await store.readStatus(),
        config: await this.loadRedactedConfig(),
      };
    }

    let reason: NotRunningReason = 'never-started';
    if (stale) {
      reason = 'stale-handle-cleared';
    } else if (store.exists('status') || store.exists('result')) {
      reason = 'exited';
    }

    return {
      state: 'NOT_RUNNING',
      reason,
      staleHandle: stale,
      snapshot: await store.readStatus(),
      result: await store.readResult(),
    };
  }

  /**
   * Last `lines` lines of the log
   */
  async logs(lines: number = DEFAULT_LOG_LINES): Promise<string[]> {
    const tail = await this.deps.store.tailLog(lines);
    if (tail === null) {
      throw new NoLogsError(this.deps.store.pathOf('log'));
    }
    return tail;
  }

  /**
   * First step of disabling dry-run: issue a single-use token for start()
   */
  async requestDisableDryRun(): Promise<string> {
    const token = randomUUID();
    const expiresAt = new Date(this.now().getTime() + DRY_RUN_TOKEN_TTL_MS).toISOString();
    await this.deps.store.writeDryRunToken({ token, expiresAt });
    this.deps.logger.info(`Live-booking confirmation requested (expires ${expiresAt})`);
    return token;
  }

  private async consumeDryRunToken(token: string | undefined): Promise<void> {
    const { store } = this.deps;
    if (!token) {
      throw new DryRunConfirmationError(
        "Dry run is disabled in the configuration. Run 'ferry-monitor confirm-live' and start with --confirm=<token>"
      );
    }

    const stored = await store.readDryRunToken();
    if (!stored || stored.token !== token) {
      throw new DryRunConfirmationError('Confirmation token is not valid');
    }

    await store.clearDryRunToken();
    if (Date.parse(stored.expiresAt) <= this.now().getTime()) {
      throw new DryRunConfirmationError("Confirmation token has expired. Run 'ferry-monitor confirm-live' again");
    }
  }

  /**
   * Read the handle, clearing it if its process is gone
   */
  private async inspectHandle(): Promise<{ handle: DaemonHandle | null; stale: DaemonHandle | null }> {
    const { store, logger } = this.deps;
    const handle = await store.readHandle();
    if (!handle) {
      if (store.exists('handle')) {
        // Unreadable handle file: nothing can be signalled through it
        await store.clearHandle();
        logger.warn('Unreadable handle file cleared');
      }
      return { handle: null, stale: null };
    }

    if (this.isAlive(handle.pid)) {
      return { handle, stale: null };
    }

    await store.clearHandle();
    logger.warn(`Stale handle cleared (PID ${handle.pid} is not running)`);
    return { handle: null, stale: handle };
  }

  private async loadRedactedConfig(): Promise<RedactedConfig | null> {
    try {
      const config = await this.deps.configStore.load();
      return config ? redactConfig(config) : null;
    } catch (err) {
      this.deps.logger.warn(`Configuration unreadable: ${describeError(err)}`);
      return null;
    }
  }
}

function requiresLiveConfirmation(config: StoredConfig): boolean {
  return config.monitor.autoBook && config.booking !== null && !config.booking.dryRun;
}
