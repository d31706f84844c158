import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { WorkflowRunner, type WorkflowDependencies } from '../../src/core/workflow.js';
import { StateStore } from '../../src/core/state-store.js';
import { ProbeInvocationError, ProbeTimeoutError } from '../../src/core/errors.js';
import type { BookingOutcome, ProbeResult, StatusSnapshot } from '../../src/types/index.js';
import {
  buildProbeResult,
  buildStoredConfig,
  createLoggerMock,
  createTempDir,
  removeTempDir,
} from '../helpers/factories.js';

const COOLDOWN_MS = 300_000;

type AsyncMock<T> = Mock<(...args: unknown[]) => Promise<T>>;

describe('WorkflowRunner', () => {
  let dir: string;
  let store: StateStore;
  let logger: ReturnType<typeof createLoggerMock>;
  let probe: AsyncMock<ProbeResult>;
  let book: AsyncMock<BookingOutcome>;
  let send: AsyncMock<void>;
  let sleep: AsyncMock<void>;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new StateStore(dir);
    logger = createLoggerMock();
    probe = vi.fn<(...args: unknown[]) => Promise<ProbeResult>>();
    book = vi.fn<(...args: unknown[]) => Promise<BookingOutcome>>();
    send = vi.fn<(...args: unknown[]) => Promise<void>>().mockResolvedValue(undefined);
    sleep = vi.fn<(...args: unknown[]) => Promise<void>>().mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function createRunner(overrides: Partial<WorkflowDependencies> = {}): WorkflowRunner {
    return new WorkflowRunner({
      store,
      prober: { probe },
      executor: { book },
      notifier: { send },
      logger,
      cooldownMs: COOLDOWN_MS,
      pid: 4242,
      env: {},
      sleep,
      ...overrides,
    });
  }

  function alwaysTimeOut(): void {
    probe.mockRejectedValue(new ProbeTimeoutError('Not available after 3600s (60 checks)', 3600, 60));
  }

  describe('without auto-booking', () => {
    it('completes successfully once the sailing is available', async () => {
      probe.mockResolvedValue(buildProbeResult({ checks: 2 }));
      const config = buildStoredConfig({ pollInterval: 60, timeout: 3600, autoBook: false });

      const result = await createRunner().run(config);

      expect(result).toMatchObject({
        success: true,
        phase: 'completed',
        available: true,
        confirmationNumber: null,
        booking: null,
        error: null,
      });
      expect(await store.readResult()).toEqual(result);
      expect(probe).toHaveBeenCalledTimes(1);
      expect(probe).toHaveBeenCalledWith(config.monitor, undefined);
      expect(book).not.toHaveBeenCalled();
    });

    it('leaves a completed status snapshot for the cycle', async () => {
      probe.mockResolvedValue(buildProbeResult());

      await createRunner().run(buildStoredConfig());

      const snapshot = await store.readStatus();
      expect(snapshot).toMatchObject({
        phase: 'completed',
        cycle: 1,
        pid: 4242,
        route: { departure: 'Departure Bay', arrival: 'Horseshoe Bay' },
        schedule: { date: '10/15/2025', time: '1:20 pm' },
        message: 'Availability found, auto-booking disabled',
      });
    });

    it('logs the availability fact with elapsed time and check count', async () => {
      probe.mockResolvedValue(buildProbeResult({ elapsed: 120.4, checks: 2 }));

      await createRunner().run(buildStoredConfig());

      expect(logger.info).toHaveBeenCalledWith('Ferry became AVAILABLE! (after 120s, 2 checks)');
    });
  });

  describe('with auto-booking', () => {
    it('captures the confirmation number of a successful booking', async () => {
      probe.mockResolvedValue(buildProbeResult());
      book.mockResolvedValue({ success: true, confirmationNumber: 'BC12345', failedStep: null, error: null });
      const config = buildStoredConfig({ autoBook: true });

      const result = await createRunner().run(config);

      expect(result).toMatchObject({ success: true, phase: 'completed', confirmationNumber: 'BC12345' });
      expect(result?.booking).toEqual({ success: true, confirmationNumber: 'BC12345', failedStep: null, error: null });
      expect(book).toHaveBeenCalledTimes(1);
      expect(book).toHaveBeenCalledWith(
        { monitor: config.monitor, booking: config.booking, credentials: config.credentials },
        undefined
      );
    });

    it('passes the dry-run flag through unchanged', async () => {
      probe.mockResolvedValue(buildProbeResult());
      book.mockResolvedValue({ success: true, confirmationNumber: 'LIVE_BOOKING', failedStep: null, error: null });

      await createRunner().run(buildStoredConfig({ autoBook: true }, { booking: { dryRun: false } }));

      expect(book.mock.calls[0][0]).toMatchObject({ booking: { dryRun: false } });
    });

    it('keeps the availability fact when the booking fails', async () => {
      const availability = buildProbeResult();
      probe.mockResolvedValue(availability);
      book.mockResolvedValue({ success: false, confirmationNumber: null, failedStep: 'payment', error: 'Card declined' });

      const result = await createRunner().run(buildStoredConfig({ autoBook: true }));

      expect(result).toMatchObject({
        success: false,
        phase: 'failed',
        available: true,
        availability,
        confirmationNumber: null,
        error: 'BookingFailureError: Card declined',
      });
      expect(result?.booking?.failedStep).toBe('payment');
      expect(book).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenCalledWith('Ferry became AVAILABLE! (after 120s, 2 checks)');
      expect(logger.info).toHaveBeenCalledWith("[failed] BOOKING FAILED at step 'payment': Card declined");
    });

    it('records a thrown executor error as a failed booking', async () => {
      probe.mockResolvedValue(buildProbeResult());
      book.mockRejectedValue(new Error('browser crashed'));

      const result = await createRunner().run(buildStoredConfig({ autoBook: true }));

      expect(result?.success).toBe(false);
      expect(result?.available).toBe(true);
      expect(result?.booking).toEqual({
        success: false,
        confirmationNumber: null,
        failedStep: null,
        error: 'browser crashed',
      });
    });

    it('does not call the executor when a referenced secret is unset', async () => {
      probe.mockResolvedValue(buildProbeResult());
      const config = buildStoredConfig({ autoBook: true }, { credentials: { password: 'env:FERRY_TEST_PASSWORD' } });

      const result = await createRunner({ env: {} }).run(config);

      expect(book).not.toHaveBeenCalled();
      expect(result?.booking?.error).toBe('Booking configuration incomplete: missing password');
    });

    it('resolves referenced secrets from the environment', async () => {
      probe.mockResolvedValue(buildProbeResult());
      book.mockResolvedValue({ success: true, confirmationNumber: 'DRY_RUN', failedStep: null, error: null });
      const config = buildStoredConfig({ autoBook: true }, { credentials: { password: 'env:FERRY_TEST_PASSWORD' } });

      await createRunner({ env: { FERRY_TEST_PASSWORD: 'test-secret-from-env' } }).run(config);

      expect(book.mock.calls[0][0]).toMatchObject({ credentials: { password: 'test-secret-from-env' } });
    });

    it('writes the booking snapshot and result stub before the executor runs', async () => {
      probe.mockResolvedValue(buildProbeResult());
      let seen: { snapshot: StatusSnapshot | null; stubPhase: string | undefined } | null = null;
      book.mockImplementation(async () => {
        seen = { snapshot: await store.readStatus(), stubPhase: (await store.readResult())?.phase };
        return { success: true, confirmationNumber: 'BC12345', failedStep: null, error: null };
      });

      await createRunner().run(buildStoredConfig({ autoBook: true }));

      expect(seen).toMatchObject({ snapshot: { phase: 'booking' }, stubPhase: 'booking' });
    });
  });

  describe('when monitoring times out', () => {
    it('fails the run when not continuous', async () => {
      alwaysTimeOut();

      const result = await createRunner().run(buildStoredConfig({ continuous: false }));

      expect(result).toMatchObject({
        success: false,
        phase: 'failed',
        available: false,
        availability: null,
        error: 'ProbeTimeoutError: Not available after 3600s (60 checks)',
      });
      expect(sleep).not.toHaveBeenCalled();
      expect((await store.readStatus())?.phase).toBe('failed');
    });

    it('loops with a cooldown in continuous mode and never writes a result', async () => {
      alwaysTimeOut();
      const controller = new AbortController();
      sleep.mockImplementation(async () => {
        if (sleep.mock.calls.length >= 3) controller.abort();
      });

      const result = await createRunner().run(buildStoredConfig({ continuous: true }), controller.signal);

      expect(result).toBeNull();
      expect(probe).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledWith(COOLDOWN_MS, controller.signal);
      expect(await store.readResult()).toBeNull();
      expect(await store.readStatus()).toMatchObject({ phase: 'monitoring', cycle: 3 });
    });

    it('records an invocation error distinctly from a timeout', async () => {
      probe.mockRejectedValue(new ProbeInvocationError('wait-for-ferry exited with code 2: bad date', 2));

      const result = await createRunner().run(buildStoredConfig());

      expect(result?.error).toBe('ProbeInvocationError: wait-for-ferry exited with code 2: bad date');
      expect(logger.error).toHaveBeenCalledWith('Probe invocation failed: wait-for-ferry exited with code 2: bad date');
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('treats any other probe failure as an invocation error', async () => {
      probe.mockRejectedValue(new Error('boom'));

      const result = await createRunner().run(buildStoredConfig());

      expect(result?.error).toBe('ProbeInvocationError: Error: boom');
    });
  });

  describe('continuous mode after success', () => {
    it('resumes monitoring after an availability-only completion', async () => {
      probe.mockResolvedValueOnce(buildProbeResult());
      probe.mockRejectedValue(new ProbeTimeoutError('Not available before timeout'));
      const controller = new AbortController();
      sleep.mockImplementation(async () => {
        if (sleep.mock.calls.length >= 2) controller.abort();
      });

      const result = await createRunner().run(buildStoredConfig({ continuous: true }), controller.signal);

      expect(probe).toHaveBeenCalledTimes(2);
      expect(result).toMatchObject({ success: true, phase: 'completed' });
      expect(await store.readResult()).toMatchObject({ success: true, phase: 'completed' });
    });

    it('stops after a confirmed booking', async () => {
      probe.mockResolvedValue(buildProbeResult());
      book.mockResolvedValue({ success: true, confirmationNumber: 'BC12345', failedStep: null, error: null });

      const result = await createRunner().run(buildStoredConfig({ continuous: true, autoBook: true }));

      expect(result?.confirmationNumber).toBe('BC12345');
      expect(probe).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  it('writes the monitoring snapshot before probing', async () => {
    let phaseDuringProbe: string | undefined;
    probe.mockImplementation(async () => {
      phaseDuringProbe = (await store.readStatus())?.phase;
      return buildProbeResult();
    });

    await createRunner().run(buildStoredConfig());

    expect(phaseDuringProbe).toBe('monitoring');
  });

  it('returns without a result when aborted during a probe', async () => {
    const controller = new AbortController();
    probe.mockImplementation(async () => {
      controller.abort();
      throw new ProbeInvocationError('killed by SIGTERM');
    });

    const result = await createRunner().run(buildStoredConfig(), controller.signal);

    expect(result).toBeNull();
    expect(await store.readResult()).toBeNull();
    expect(logger.info).toHaveBeenCalledWith('Workflow stopped');
  });

  it('does not let a notification failure change the outcome', async () => {
    probe.mockResolvedValue(buildProbeResult());
    send.mockRejectedValue(new Error('ntfy down'));

    const result = await createRunner().run(buildStoredConfig());

    expect(result?.success).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Notification skipped: Error: ntfy down');
  });
});
