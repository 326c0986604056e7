import type { KeyEvent, MetricsSnapshot, TerminalSize } from '../types';
import { ACTIONS } from '@views/index';
import { bodyHeight } from '@render/viewport';
import { getLogger } from '@utils/logger';
import {
  activeModel,
  activeViewId,
  rebuildRows,
  ruleKey,
  showMessage,
  type AppState,
} from './app-state';
import { dispatch, type Effect } from './navigation';
import type { RefreshLoop, WorkResult } from './refresh-loop';

/**
 * The single consumer of keys, fetch results, action outcomes and DNS
 * answers. `tick` applies everything queued since the previous call and
 * reports whether the frame needs redrawing.
 */
export class ControlLoop {
  private keys: KeyEvent[] = [];
  private pendingSize: TerminalSize | null = null;
  private lastSecond = -1;

  constructor(
    public readonly state: AppState,
    private readonly refresh: RefreshLoop,
  ) {
    this.syncViewport();
  }

  enqueueKey(key: KeyEvent): void {
    this.keys.push(key);
  }

  resize(size: TerminalSize): void {
    this.pendingSize = size;
  }

  get quitRequested(): boolean {
    return this.state.quit;
  }

  tick(now: number): boolean {
    const { state } = this;
    let changed = false;
    state.clock = now;

    const second = Math.floor(now / 1000);
    if (second !== this.lastSecond) {
      this.lastSecond = second;
      changed = true;
    }

    if (this.pendingSize) {
      state.size = this.pendingSize;
      this.pendingSize = null;
      changed = true;
    }

    const keys = this.keys;
    this.keys = [];
    for (const key of keys) {
      if (state.quit) break;
      for (const effect of dispatch(state, key)) this.perform(effect, now);
      changed = true;
    }
    if (state.quit) return true;

    this.syncViewport();

    if (this.refresh.isDue(now)) this.refresh.start(activeViewId(state), now);

    for (const result of this.refresh.drain()) {
      if (this.apply(result, now)) changed = true;
    }

    if (state.dns.drain() > 0) {
      rebuildRows(state, activeViewId(state));
      changed = true;
    }

    if (state.message && now >= state.message.expiresAt) {
      state.message = null;
      changed = true;
    }

    return changed;
  }

  stop(): void {
    this.refresh.stop();
  }

  private syncViewport(): void {
    const { state } = this;
    const id = activeViewId(state);
    activeModel(state).setViewport(state.size.columns, bodyHeight(id, state.size));
  }

  private perform(effect: Effect, now: number): void {
    const { state } = this;
    switch (effect.type) {
      case 'quit':
        state.quit = true;
        this.refresh.stop();
        break;
      case 'refresh':
        this.refresh.requestNow();
        break;
      case 'execute':
        showMessage(state, `${ACTIONS[effect.action].title}: running…`, 'info', now);
        this.refresh.execute(effect.action);
        break;
      case 'view-changed':
        this.refresh.abandon(effect.from);
        this.refresh.requestNow();
        this.syncViewport();
        break;
    }
  }

  private apply(result: WorkResult, now: number): boolean {
    const { state } = this;
    const logger = getLogger();
    switch (result.kind) {
      case 'view': {
        if (result.view !== activeViewId(state)) {
          logger.debug(`Discarded late result for ${result.view}`);
          return false;
        }
        if (result.view === 'runtime.rules') {
          for (const record of result.records) {
            const id = record['rule_id'];
            const hits = Number(record['hits'] ?? 0);
            if (id !== undefined && id !== null) {
              state.hitRates.observe(ruleKey(String(id)), Number.isFinite(hits) ? hits : 0, now);
            }
          }
        }
        state.records.set(result.view, result.records);
        state.status.set(result.view, { kind: 'live', at: now });
        rebuildRows(state, result.view);
        return true;
      }
      case 'view-error': {
        if (result.view !== activeViewId(state)) {
          logger.debug(`Discarded late failure for ${result.view}`);
          return false;
        }
        const reason = result.error.detail === 'timeout' ? 'timeout' : result.error.message;
        state.status.set(result.view, { kind: 'stale', reason, at: now });
        return true;
      }
      case 'metrics':
        this.applyMetrics(result.metrics, now);
        return true;
      case 'metrics-error':
        logger.warn(`Metrics unavailable: ${result.error.message}`);
        return false;
      case 'action': {
        const action = ACTIONS[result.action];
        if (result.error) {
          logger.error(`Action ${result.action} failed: ${result.error.message}`);
          showMessage(state, `${action.title} failed: ${result.error.message}`, 'error', now);
        } else {
          logger.info(`Action ${result.action} completed`);
          showMessage(state, action.done, 'info', now);
          this.refresh.requestNow();
        }
        return true;
      }
    }
  }

  private applyMetrics(metrics: MetricsSnapshot, now: number): void {
    const { state } = this;
    const first = !state.counters.has('questions');
    const rate = state.counters.observe('questions', metrics.questions, now);
    const qps = first ? (metrics.uptimeSeconds > 0 ? metrics.questions / metrics.uptimeSeconds : 0) : rate;
    const pool = metrics.poolUsed + metrics.poolFree;
    const errorsPerSecond = state.counters.observe('backendErrors', metrics.backendErrors, now);

    state.metrics = metrics;
    state.qps = qps;
    state.qpsHistory.push(now, qps);
    state.trends.qps.push(now, qps);
    state.trends.activeConnections.push(now, metrics.activeConnections);
    state.trends.poolEfficiency.push(now, pool > 0 ? (metrics.poolUsed / pool) * 100 : 0);
    state.trends.errorRate.push(now, qps > 0 ? (errorsPerSecond / qps) * 100 : 0);
  }
}
