import { abortable, sleep, toIso, withDeadline } from '@/utils/time';
import { CancelledError } from '@/errors';
import { deferred } from '../helpers/factories';

describe('time utils (unit)', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('formats epoch milliseconds as ISO strings', () => {
    expect(toIso(Date.UTC(2025, 0, 1, 10))).toBe('2025-01-01T10:00:00.000Z');
  });

  describe('sleep', () => {
    /**
     * Purpose:
     * Verifies Core behavior:
     * - resolves only after the full delay
     */
    it('resolves after the delay', async () => {
      const settled = jest.fn();
      const pending = sleep(1_000).then(settled);

      await jest.advanceTimersByTimeAsync(999);
      expect(settled).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(settled).toHaveBeenCalledTimes(1);
    });

    /**
     * Purpose:
     * Verifies Defensive behavior:
     * - an aborted signal rejects before any timer is set
     */
    it('rejects immediately for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(sleep(1_000, controller.signal)).rejects.toThrow('Cancelled before backoff wait');
    });

    /**
     * Purpose:
     * Verifies Error handling behavior:
     * - aborting mid-wait rejects with CancelledError
     */
    it('rejects when aborted during the wait', async () => {
      const controller = new AbortController();
      const pending = sleep(1_000, controller.signal);

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      await expect(pending).rejects.toThrow('Cancelled during backoff wait');
    });
  });

  describe('withDeadline', () => {
    /**
     * Purpose:
     * Verifies Core behavior:
     * - signal aborts exactly at the deadline
     * - reason is a CancelledError naming the deadline
     */
    it('aborts once the timeout elapses', () => {
      const deadline = withDeadline(undefined, 500);

      jest.advanceTimersByTime(499);
      expect(deadline.signal.aborted).toBe(false);

      jest.advanceTimersByTime(1);
      expect(deadline.signal.aborted).toBe(true);
      expect(deadline.signal.reason).toBeInstanceOf(CancelledError);
      expect(deadline.signal.reason).toHaveProperty('message', 'Deadline of 500ms exceeded');
    });

    /**
     * Purpose:
     * Verifies Core behavior:
     * - parent cancellation reaches the child signal
     */
    it('follows the parent signal', () => {
      const parent = new AbortController();
      const deadline = withDeadline(parent.signal);

      parent.abort('shutdown');

      expect(deadline.signal.aborted).toBe(true);
      expect(deadline.signal.reason).toBe('shutdown');
    });

    /**
     * Purpose:
     * Verifies Defensive behavior:
     * - dispose clears the pending timer
     */
    it('never fires after dispose', () => {
      const deadline = withDeadline(undefined, 500);
      deadline.dispose();

      jest.advanceTimersByTime(1_000);
      expect(deadline.signal.aborted).toBe(false);
    });
  });

  describe('abortable', () => {
    it('passes through the settled value', async () => {
      const controller = new AbortController();

      await expect(abortable(Promise.resolve(42), controller.signal)).resolves.toBe(42);
    });

    /**
     * Purpose:
     * Verifies Error handling behavior:
     * - abort wins over a promise that never settles
     * - the deadline reason is surfaced as-is
     */
    it('rejects with the abort reason when the signal fires first', async () => {
      const deadline = withDeadline(undefined, 100);
      const never = deferred<number>();
      const pending = abortable(never.promise, deadline.signal);

      jest.advanceTimersByTime(100);

      await expect(pending).rejects.toThrow('Deadline of 100ms exceeded');
    });

    it('wraps foreign abort reasons in CancelledError', async () => {
      const controller = new AbortController();
      controller.abort(new Error('gone'));

      await expect(abortable(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(
        CancelledError
      );
    });
  });
});
