import type { ActionId, DataRecord, MetricsSnapshot, ViewId } from '../types';
import { getLogger } from '@utils/logger';
import { AcquisitionError, ErrorKind, toDashboardError, type DashboardError } from './errors';

export interface DataProvider {
  fetchView(view: ViewId, signal: AbortSignal): Promise<DataRecord[]>;
  fetchMetrics(signal: AbortSignal): Promise<MetricsSnapshot>;
}

export interface ActionExecutor {
  execute(action: ActionId): Promise<void>;
}

/**
 * Settled background work, tagged with what it was for
 */
export type WorkResult =
  | { kind: 'view'; view: ViewId; records: DataRecord[] }
  | { kind: 'view-error'; view: ViewId; error: DashboardError }
  | { kind: 'metrics'; metrics: MetricsSnapshot }
  | { kind: 'metrics-error'; error: DashboardError }
  | { kind: 'action'; action: ActionId; error: DashboardError | null };

export interface RefreshOptions {
  intervalMs: number;
  /** Hard limit for every fetch */
  timeoutMs: number;
}

const METRICS = 'metrics';

class Abandoned extends Error {
  constructor() {
    super('abandoned');
    this.name = 'Abandoned';
  }
}

/**
 * Reject as soon as the signal aborts, with the abort reason
 */
export function withSignal<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Schedules fetches and collects their results.
 *
 * Promises never touch application state: each settlement pushes one
 * WorkResult, and the control loop drains them with `drain()`. At most one
 * fetch per view (and one metrics fetch) is in flight at a time.
 */
export class RefreshLoop {
  private readonly inFlight = new Map<string, AbortController>();
  private queue: WorkResult[] = [];
  private nextDue = 0;
  private stopped = false;

  constructor(
    private readonly provider: DataProvider,
    private readonly executor: ActionExecutor,
    private readonly options: RefreshOptions,
  ) {}

  isDue(now: number): boolean {
    return !this.stopped && now >= this.nextDue;
  }

  /** Make the next tick fetch regardless of the interval */
  requestNow(): void {
    this.nextDue = 0;
  }

  /**
   * Fetch the active view and the metrics snapshot, skipping whatever is
   * still in flight
   */
  start(view: ViewId, now: number): void {
    if (this.stopped) return;
    this.nextDue = now + this.options.intervalMs;
    this.launch(
      view,
      signal => this.provider.fetchView(view, signal),
      records => ({ kind: 'view', view, records }),
      error => ({ kind: 'view-error', view, error }),
    );
    this.launch(
      METRICS,
      signal => this.provider.fetchMetrics(signal),
      metrics => ({ kind: 'metrics', metrics }),
      error => ({ kind: 'metrics-error', error }),
    );
  }

  /**
   * Drop interest in a view's in-flight fetch; it will not report back
   */
  abandon(view: ViewId): void {
    const controller = this.inFlight.get(view);
    if (!controller) return;
    this.inFlight.delete(view);
    controller.abort(new Abandoned());
  }

  execute(action: ActionId): void {
    if (this.stopped) return;
    getLogger().info(`Executing action ${action}`);
    void this.executor.execute(action).then(
      () => {
        this.queue.push({ kind: 'action', action, error: null });
      },
      (error: unknown) => {
        this.queue.push({ kind: 'action', action, error: toDashboardError(error, ErrorKind.Action) });
      },
    );
  }

  /** Take every result settled since the last call */
  drain(): WorkResult[] {
    const batch = this.queue;
    this.queue = [];
    return batch;
  }

  stop(): void {
    this.stopped = true;
    for (const controller of this.inFlight.values()) {
      controller.abort(new Abandoned());
    }
    this.inFlight.clear();
  }

  private launch<T>(
    key: string,
    fetch: (signal: AbortSignal) => Promise<T>,
    onValue: (value: T) => WorkResult,
    onError: (error: DashboardError) => WorkResult,
  ): void {
    if (this.inFlight.has(key)) return;
    const controller = new AbortController();
    this.inFlight.set(key, controller);
    const { timeoutMs } = this.options;
    const timer = setTimeout(() => {
      controller.abort(new AcquisitionError(`Timed out after ${timeoutMs / 1000}s`, 'timeout'));
    }, timeoutMs);

    void withSignal(fetch(controller.signal), controller.signal)
      .then(
        value => {
          this.queue.push(onValue(value));
        },
        (error: unknown) => {
          if (error instanceof Abandoned) {
            getLogger().debug(`Abandoned fetch for ${key}`);
            return;
          }
          const failure = toDashboardError(error, ErrorKind.Acquisition);
          getLogger().warn(`Fetch for ${key} failed: ${failure.message}`);
          this.queue.push(onError(failure));
        },
      )
      .finally(() => {
        clearTimeout(timer);
        if (this.inFlight.get(key) === controller) this.inFlight.delete(key);
      });
  }
}
