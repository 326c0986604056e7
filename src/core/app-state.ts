import type {
  ActionId,
  DataRecord,
  MetricsSnapshot,
  TerminalSize,
  Thresholds,
  ViewId,
} from '../types';
import { LOG_LEVELS, PAGES, getPage, getView, type RowContext, type ViewDefinition } from '@views/index';
import type { Settings } from '@utils/config';
import { buildLadders, type Ladders } from './classifier';
import { DnsCache, type DnsResolver } from './dns-cache';
import { RateTracker } from './rate-tracker';
import { TrendBuffer } from './trend-buffer';
import { ViewModel } from './view-model';

export type Mode = 'browsing' | 'filtering' | 'confirming';

/**
 * Action captured when entering ConfirmingAction
 */
export interface PendingConfirmation {
  action: ActionId;
  view: ViewId;
}

export interface NavigationState {
  mode: Mode;
  /** Index into PAGES */
  page: number;
  /** Selected sub-page index for every page */
  subPages: number[];
  pending: PendingConfirmation | null;
}

export type AcquisitionStatus =
  | { kind: 'waiting' }
  | { kind: 'live'; at: number }
  | { kind: 'stale'; reason: string; at: number };

export interface TransientMessage {
  text: string;
  kind: 'info' | 'error';
  expiresAt: number;
}

export interface Trends {
  qps: TrendBuffer;
  activeConnections: TrendBuffer;
  /** Used / (used + free) backend pool connections, percent */
  poolEfficiency: TrendBuffer;
  /** New backend errors per second as a percent of QPS */
  errorRate: TrendBuffer;
}

export interface ServerIdentity {
  version: string;
  host: string;
}

/** Five minutes of one-second QPS samples */
export const QPS_HISTORY = 300;

export const MESSAGE_TTL_MS = 4000;

/**
 * The whole dashboard. Only the control loop mutates it.
 */
export interface AppState {
  nav: NavigationState;
  views: Map<ViewId, ViewModel>;
  /** Last raw records per view, kept so rows can be rebuilt when names resolve */
  records: Map<ViewId, readonly DataRecord[]>;
  status: Map<ViewId, AcquisitionStatus>;
  trends: Trends;
  qpsHistory: TrendBuffer;
  /** Global counters turned into rates (Questions) */
  counters: RateTracker;
  /** Hits per second per query rule id */
  hitRates: RateTracker;
  metrics: MetricsSnapshot | null;
  qps: number;
  message: TransientMessage | null;
  size: TerminalSize;
  clock: number;
  identity: ServerIdentity;
  thresholds: Thresholds;
  ladders: Ladders;
  dns: DnsCache;
  quit: boolean;
}

export interface AppStateOptions {
  settings: Settings;
  resolver: DnsResolver;
  identity: ServerIdentity;
  size: TerminalSize;
  now: number;
}

export function createAppState(options: AppStateOptions): AppState {
  const { settings, resolver, identity, size, now } = options;
  const views = new Map<ViewId, ViewModel>();
  for (const page of PAGES) {
    for (const view of page.views) {
      views.set(view.id, new ViewModel(view.id, view.columns));
    }
  }

  const logs = views.get('logs.tail');
  if (logs) {
    logs.setFollow(settings.logs.follow);
    if (!settings.logs.showDebug) logs.setScope(LOG_LEVELS.filter(l => l !== 'DEBUG'));
  }

  const capacity = settings.trendCapacity;
  return {
    nav: {
      mode: 'browsing',
      page: 0,
      subPages: PAGES.map(() => 0),
      pending: null,
    },
    views,
    records: new Map(),
    status: new Map(),
    trends: {
      qps: new TrendBuffer(capacity),
      activeConnections: new TrendBuffer(capacity),
      poolEfficiency: new TrendBuffer(capacity),
      errorRate: new TrendBuffer(capacity),
    },
    qpsHistory: new TrendBuffer(QPS_HISTORY),
    counters: new RateTracker(),
    hitRates: new RateTracker(),
    metrics: null,
    qps: 0,
    message: null,
    size,
    clock: now,
    identity,
    thresholds: settings.thresholds,
    ladders: buildLadders(settings.thresholds),
    dns: new DnsCache(resolver),
    quit: false,
  };
}

export function activeViewDefinition(state: AppState): ViewDefinition {
  const page = getPage(state.nav.page);
  return page.views[state.nav.subPages[state.nav.page] ?? 0] ?? getView('frontend.user-host');
}

export function activeViewId(state: AppState): ViewId {
  return activeViewDefinition(state).id;
}

export function viewModel(state: AppState, id: ViewId): ViewModel {
  const model = state.views.get(id);
  if (!model) throw new Error(`No view model for ${id}`);
  return model;
}

export function activeModel(state: AppState): ViewModel {
  return viewModel(state, activeViewId(state));
}

export function statusOf(state: AppState, id: ViewId): AcquisitionStatus {
  return state.status.get(id) ?? { kind: 'waiting' };
}

export function ruleKey(ruleId: string): string {
  return `rule:${ruleId}`;
}

export function rowContext(state: AppState): RowContext {
  return {
    ladders: state.ladders,
    thresholds: state.thresholds,
    hostOf: address => state.dns.lookup(address),
    hitRate: ruleId => state.hitRates.rate(ruleKey(ruleId)),
  };
}

/**
 * Rebuild a view's rows from its last raw records
 */
export function rebuildRows(state: AppState, id: ViewId): void {
  const records = state.records.get(id);
  if (!records) return;
  viewModel(state, id).applyData(getView(id).buildRows(records, rowContext(state)));
}

export function showMessage(
  state: AppState,
  text: string,
  kind: TransientMessage['kind'],
  now: number,
): void {
  state.message = { text, kind, expiresAt: now + MESSAGE_TTL_MS };
}
