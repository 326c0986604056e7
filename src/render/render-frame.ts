import {
  activeModel,
  activeViewDefinition,
  statusOf,
  type AcquisitionStatus,
  type AppState,
  type PendingConfirmation,
} from '@core/app-state';
import type { TerminalSize } from '../types';
import { ACTIONS, PAGES, getPage } from '@views/index';
import { renderFooter } from './footer';
import { center, clipLine, lineWidth, seg, spread, truncate, type Frame, type Line } from './frame';
import { renderHeader } from './header';
import { renderPerformance } from './performance';
import { renderBody, renderColumnTitles } from './table';
import { CHROME_ROWS, MIN_COLUMNS, MIN_ROWS, isTooSmall, performancePlan } from './viewport';

export const CONFIRM_HINT = 'Y/Enter confirm · any other key cancels';

export function tooSmallNotice(size: TerminalSize): string {
  return `Terminal too small: ${size.columns}x${size.rows} (minimum ${MIN_COLUMNS}x${MIN_ROWS})`;
}

function renderPageStrip(state: AppState): Line {
  const line: Line = [];
  PAGES.forEach((page, i) => {
    const label = ` ${i + 1} ${page.title} `;
    line.push(
      i === state.nav.page
        ? seg(label, { color: 'accent', bold: true, inverse: true })
        : seg(label, { color: 'muted' }),
    );
    line.push(seg(' '));
  });
  return line;
}

function renderSubPageStrip(state: AppState): Line {
  const page = getPage(state.nav.page);
  if (page.views.length < 2) return [];
  const current = state.nav.subPages[state.nav.page] ?? 0;
  const line: Line = [];
  page.views.forEach((view, i) => {
    if (i > 0) line.push(seg(' │ ', { color: 'border' }));
    line.push(
      i === current
        ? seg(view.label, { color: 'accent', bold: true })
        : seg(view.label, { color: 'foreground' }),
    );
  });
  return line;
}

function statusLine(status: AcquisitionStatus): Line {
  switch (status.kind) {
    case 'waiting':
      return [seg('○ waiting', { color: 'muted' })];
    case 'live':
      return [seg('● live', { color: 'success' })];
    case 'stale':
      return [seg(`▲ stale: ${status.reason}`, { color: 'warning' })];
  }
}

function renderHeading(state: AppState, width: number): Line {
  const view = activeViewDefinition(state);
  const model = activeModel(state);
  const left: Line = [seg(view.heading, { color: 'accent', bold: true })];
  if (model.degraded) left.push(seg(' …', { color: 'warning' }));
  if (view.id === 'logs.tail' && model.follow) left.push(seg(' [FOLLOW]', { color: 'info' }));
  if (model.filterQuery && state.nav.mode !== 'filtering') {
    left.push(seg(` [filter: ${model.filterQuery}]`, { color: 'warning' }));
  }

  const right = statusLine(statusOf(state, view.id));
  return spread(left, right, width);
}

/**
 * Boxed confirmation drawn over the middle of the screen
 */
export function confirmBox(pending: PendingConfirmation, width: number): Line[] {
  const action = ACTIONS[pending.action];
  const inner = Math.min(
    width - 4,
    Math.max(action.title.length, action.message.length, CONFIRM_HINT.length) + 2,
  );
  const row = (text: string, color: 'warning' | 'foreground' | 'muted', bold = false): Line => {
    const body = truncate(text, inner - 2);
    return [
      seg('│ ', { color: 'warning' }),
      seg(body + ' '.repeat(Math.max(0, inner - 2 - lineWidth([seg(body)]))), { color, bold }),
      seg(' │', { color: 'warning' }),
    ];
  };
  return [
    [seg(`┌${'─'.repeat(inner)}┐`, { color: 'warning' })],
    row(action.title, 'warning', true),
    row(action.message, 'foreground'),
    row('', 'foreground'),
    row(CONFIRM_HINT, 'muted'),
    [seg(`└${'─'.repeat(inner)}┘`, { color: 'warning' })],
  ];
}

function overlay(lines: Line[], box: Line[], width: number): void {
  const top = Math.max(0, Math.floor((lines.length - box.length) / 2));
  box.forEach((boxLine, i) => {
    if (top + i < lines.length) lines[top + i] = center(boxLine, width);
  });
}

/**
 * The complete screen for the current state. Pure: the same state and size
 * always give the same frame.
 */
export function renderFrame(state: AppState, size: TerminalSize): Frame {
  const width = size.columns;
  if (isTooSmall(size)) {
    return { width, lines: [[seg(truncate(tooSmallNotice(size), width), { color: 'error', bold: true })]] };
  }

  const view = activeViewDefinition(state);
  const model = activeModel(state);
  const lines: Line[] = [
    renderHeader(state, width),
    [seg('─'.repeat(width), { color: 'border' })],
    clipLine(renderPageStrip(state), width),
    clipLine(renderSubPageStrip(state), width),
    renderHeading(state, width),
  ];

  let tableRows = size.rows - CHROME_ROWS;
  if (view.id === 'performance.overview') {
    const plan = performancePlan(size);
    lines.push(...renderPerformance(state, plan, width));
    tableRows -= plan.rows;
  }

  lines.push(clipLine(renderColumnTitles(model), width));
  lines.push(...renderBody(model, Math.max(1, tableRows), width).map(l => clipLine(l, width)));
  lines.push(...renderFooter(state, width));

  const pending = state.nav.pending;
  if (state.nav.mode === 'confirming' && pending) {
    overlay(lines, confirmBox(pending, width), width);
  }
  return { width, lines: lines.slice(0, size.rows) };
}
