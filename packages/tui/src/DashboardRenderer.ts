/**
 * DashboardRenderer — DashboardView → Terminal Lines
 *
 * Pure functions: a view and a terminal size in, padded lines out.
 *
 *   ┌──────────────────────────────────────────────────────┐
 *   │  TITLE BAR (tailnet, host, backend state, clock)     │
 *   │  BANNER (missing binary / stale data / last update)  │
 *   ├──────────────────────────────────────────────────────┤
 *   │  SUMMARY (local address, online ratio, exit nodes)   │
 *   ├──────────────────────────────────────────────────────┤
 *   │  PEER TABLE                                          │
 *   ├──────────────────────────┬───────────────────────────┤
 *   │  DIAGNOSTICS             │  ACTIVITY                 │
 *   ├──────────────────────────┴───────────────────────────┤
 *   │  STATUS BAR (message or key legend)                  │
 *   └──────────────────────────────────────────────────────┘
 *
 * @module
 */
import { countOnline, findPeer, type Peer } from '@meshtop/core';
import { ansi, box, hline, pad, progressBar, stringWidth, truncate } from './AnsiRenderer.js';
import type { ActivityEntry, DashboardView, Overlay } from './DashboardController.js';

export const MIN_COLS = 40;
export const MIN_ROWS = 12;

const HEADER_ROWS = 3;
const SUMMARY_ROWS = 4;
const STATUS_ROWS = 1;

// Fixed peer table columns; HOSTNAME takes the rest
const ADDRESS_WIDTH = 16;
const ONLINE_WIDTH = 6;
const EXIT_WIDTH = 4;
const OS_WIDTH = 10;
const FIXED_WIDTH = 1 + (1 + ADDRESS_WIDTH) + (1 + ONLINE_WIDTH) + (1 + EXIT_WIDTH) + (1 + OS_WIDTH);

const LEGEND = ' r refresh  ↑↓ select  ⏎ ping  e exit nodes  x use exit  X clear exit  c copy  q quit';

// ============================================================================
// Frame
// ============================================================================

/**
 * Render every line of a frame. Each line is exactly `cols` columns
 * wide; there are exactly `rows` lines.
 */
export function renderFrame(view: DashboardView, cols: number, rows: number): string[] {
    if (cols < MIN_COLS || rows < MIN_ROWS) return renderTooSmall(cols, rows);

    const lines: string[] = [
        ...renderHeader(view, cols),
        ...renderSummary(view, cols),
    ];

    const body = rows - HEADER_ROWS - SUMMARY_ROWS - STATUS_ROWS;
    const peerCount = view.snapshot?.peers.length ?? 0;
    const tableHeight = Math.max(2, Math.min(peerCount + 1, Math.floor(body / 2)));
    lines.push(...fill(renderPeerTable(view, cols, tableHeight), tableHeight));

    const lower = body - tableHeight;
    if (lower >= 3) {
        lines.push(ansi.dim(hline(cols, box.horizontal, box.horizontal)));
        lines.push(...renderLowerPanels(view, cols, lower - 1));
    } else {
        lines.push(...fill([], lower));
    }

    lines.push(renderStatusBar(view, cols));
    return lines.map((line) => pad(line, cols));
}

/**
 * Compose a frame as one write: every line positioned explicitly, the
 * overlay (if any) drawn on top.
 */
export function composeFrame(view: DashboardView, cols: number, rows: number): string {
    let output = '';
    renderFrame(view, cols, rows).forEach((line, i) => {
        output += ansi.moveTo(i + 1, 1) + line + ansi.reset;
    });

    if (view.overlay && cols >= MIN_COLS && rows >= MIN_ROWS) {
        const overlay = renderOverlay(view.overlay, cols, rows);
        overlay.lines.forEach((line, i) => {
            output += ansi.moveTo(overlay.top + i, overlay.left) + line + ansi.reset;
        });
    }
    return output;
}

function renderTooSmall(cols: number, rows: number): string[] {
    const notice = `Terminal too small. Min: ${MIN_COLS}×${MIN_ROWS}`;
    const lines = fill([ansi.red(truncate(notice, cols))], Math.max(1, rows));
    return lines.map((line) => pad(line, cols));
}

// ============================================================================
// Header & Summary
// ============================================================================

function renderHeader(view: DashboardView, cols: number): string[] {
    const snap = view.snapshot;
    const title = ' MESHTOP ';
    const facts = snap
        ? `${snap.tailnet}  ${snap.selfHostname}  ${snap.backendState}  ${formatClock(view.now)} `
        : `${formatClock(view.now)} `;
    const gap = Math.max(1, cols - stringWidth(title) - stringWidth(facts));
    const titleLine = ansi.inverse(pad(title + ' '.repeat(gap) + facts, cols));

    return [titleLine, renderBanner(view, cols), ansi.dim(hline(cols, box.horizontal, box.horizontal))];
}

function renderBanner(view: DashboardView, cols: number): string {
    if (view.toolMissing) {
        const text = ` ✗ ${view.binary} not found or not executable. `
            + `Retrying every ${formatSeconds(view.intervalMs)} (attempt ${view.attempts})`;
        return ansi.banner(pad(text, cols));
    }
    if (view.lastFailure) {
        const since = view.snapshot ? `, showing data from ${formatClock(view.snapshot.capturedAt)}` : '';
        return ansi.yellow(truncate(` ! Refresh failed (${view.lastFailure.kind})${since}: ${view.lastFailure.message}`, cols));
    }
    if (view.refreshing) return ansi.dim(' refreshing…');
    if (view.snapshot) {
        return ansi.dim(` updated ${formatClock(view.snapshot.capturedAt)}, every ${formatSeconds(view.intervalMs)}`);
    }
    return '';
}

function renderSummary(view: DashboardView, cols: number): string[] {
    const snap = view.snapshot;
    if (!snap) {
        return [ansi.dim(' waiting for the first status…'), '', '', ansi.dim(hline(cols, box.horizontal, box.horizontal))];
    }

    const total = snap.peers.length;
    const online = countOnline(snap.peers);
    const ratio = total > 0 ? online / total : 0;
    const candidates = snap.exitNodeCandidates.map((p) => p.hostname).join(', ') || 'None';
    const active = snap.activeExitNode === null
        ? 'None'
        : `${findPeer(snap, snap.activeExitNode)?.hostname ?? snap.activeExitNode} (${snap.activeExitNode})`;

    return [
        ` ${ansi.dim('Local')}  ${snap.localAddress}   ${ansi.dim('Peers')}  ${online}/${total} online ${progressBar(ratio, 10)}`,
        ` ${ansi.dim('Exit nodes')}   ${truncate(candidates, cols - 15)}`,
        ` ${ansi.dim('Active exit')}  ${active}`,
        ansi.dim(hline(cols, box.horizontal, box.horizontal)),
    ];
}

// ============================================================================
// Peer Table
// ============================================================================

/**
 * The column header followed by the visible peer rows (at most
 * `height - 1`, scrolled to keep the selection in view).
 */
export function renderPeerTable(view: DashboardView, width: number, height: number): string[] {
    const hostWidth = Math.max(8, width - FIXED_WIDTH);
    const header = ansi.dim(formatColumns(hostWidth, 'HOSTNAME', 'ADDRESS', 'ONLINE', 'EXIT', 'OS'));
    const snap = view.snapshot;

    if (!snap) {
        const note = view.toolMissing ? ` no data: ${view.binary} is unavailable` : ' no data yet';
        return [header, ansi.dim(note)];
    }
    if (snap.peers.length === 0) return [header, ansi.dim(' no peers in this tailnet')];

    const visible = Math.max(1, height - 1);
    const offset = Math.max(0, Math.min(view.selectedIndex - visible + 1, snap.peers.length - visible));
    const rows = snap.peers.slice(offset, offset + visible).map((peer, i) =>
        formatPeerRow(peer, hostWidth, snap.activeExitNode, offset + i === view.selectedIndex));

    return [header, ...rows];
}

function formatPeerRow(peer: Peer, hostWidth: number, activeExitNode: string | null, selected: boolean): string {
    const isActive = activeExitNode !== null && peer.address === activeExitNode;
    const exitMark = isActive ? '●' : peer.exitNodeCapable ? '◆' : '';
    const onlineMark = peer.online ? '✓' : '✗';

    if (selected) {
        return ansi.inverse(formatColumns(hostWidth, peer.hostname, peer.address, onlineMark, exitMark, peer.os));
    }

    const styledExit = isActive ? ansi.cyan(exitMark) : exitMark ? ansi.yellow(exitMark) : '';
    return formatColumns(
        hostWidth,
        peer.online ? peer.hostname : ansi.dim(peer.hostname),
        peer.address,
        peer.online ? ansi.green(onlineMark) : ansi.red(onlineMark),
        styledExit,
        ansi.dim(peer.os),
    );
}

function formatColumns(hostWidth: number, host: string, address: string, online: string, exit: string, os: string): string {
    return ` ${pad(host, hostWidth)} ${pad(address, ADDRESS_WIDTH)} ${pad(online, ONLINE_WIDTH)} `
        + `${pad(exit, EXIT_WIDTH)} ${pad(os, OS_WIDTH)}`;
}

// ============================================================================
// Diagnostics & Activity
// ============================================================================

function renderLowerPanels(view: DashboardView, cols: number, height: number): string[] {
    const leftWidth = Math.floor((cols - 1) / 2);
    const rightWidth = cols - 1 - leftWidth;
    const left = renderDiagnostics(view, leftWidth, height);
    const right = renderActivity(view.activity, rightWidth, height);
    const divider = ansi.dim(box.vertical);

    const lines: string[] = [];
    for (let i = 0; i < height; i++) {
        lines.push(pad(left[i] ?? '', leftWidth) + divider + pad(right[i] ?? '', rightWidth));
    }
    return lines;
}

function renderDiagnostics(view: DashboardView, width: number, height: number): string[] {
    const lines = [ansi.bold(ansi.cyan(' DIAGNOSTICS'))];
    const text = view.snapshot?.diagnostics ?? '';
    if (!text) {
        lines.push(ansi.dim(view.snapshot ? ' (no output)' : ' waiting…'));
        return lines;
    }
    for (const raw of text.split('\n').slice(0, height - 1)) {
        lines.push(truncate(` ${raw.replace(/\t/g, '  ')}`, width));
    }
    return lines;
}

function renderActivity(activity: readonly ActivityEntry[], width: number, height: number): string[] {
    const lines = [ansi.bold(ansi.cyan(' ACTIVITY'))];
    for (const entry of activity.slice(-(height - 1))) {
        const line = ` ${ansi.dim(formatClock(entry.timestamp))} ${toneColor(entry.tone)(entry.tag)} ${entry.message}`;
        lines.push(truncate(line, width));
    }
    return lines;
}

function toneColor(tone: ActivityEntry['tone']): (s: string) => string {
    switch (tone) {
        case 'ok': return ansi.green;
        case 'warn': return ansi.yellow;
        case 'error': return ansi.red;
        case 'info': return ansi.cyan;
        case 'dim': return ansi.dim;
    }
}

// ============================================================================
// Status Bar & Overlay
// ============================================================================

function renderStatusBar(view: DashboardView, cols: number): string {
    const left = view.message ? ` ${view.message}` : LEGEND;
    const right = view.pendingAction ? `${view.pendingAction}… ` : view.refreshing ? 'syncing… ' : '';
    const room = cols - stringWidth(right);
    return ansi.inverse(pad(truncate(left, Math.max(0, room - 1)), room) + right);
}

export interface OverlayBox {
    /** 1-indexed screen position of the top-left corner */
    readonly top: number;
    readonly left: number;
    readonly lines: readonly string[];
}

const OVERLAY_HINT = 'press any key to close';

/** A bordered box centered on the screen. Long output is cut with a count of hidden lines. */
export function renderOverlay(overlay: Overlay, cols: number, rows: number): OverlayBox {
    const body = overlay.body.split('\n').map((line) => line.replace(/\t/g, '  '));
    const content = Math.max(stringWidth(overlay.title) + 4, OVERLAY_HINT.length, ...body.map(stringWidth));
    const width = Math.min(cols - 4, content + 4);
    const inner = width - 4;

    const maxBody = Math.max(1, rows - 6);
    const shown = body.length > maxBody
        ? [...body.slice(0, maxBody - 1), `… ${body.length - maxBody + 1} more lines`]
        : body;

    const paint = overlay.ok ? ansi.cyan : ansi.red;
    const title = ` ${truncate(overlay.title, width - 6)} `;
    const top = box.topLeft + box.horizontal + title
        + box.horizontal.repeat(Math.max(0, width - 3 - stringWidth(title))) + box.topRight;
    const side = paint(box.vertical);

    const lines = [
        paint(top),
        ...shown.map((line) => `${side} ${pad(line, inner)} ${side}`),
        `${side} ${pad(ansi.dim(OVERLAY_HINT), inner)} ${side}`,
        paint(hline(width, box.bottomLeft, box.bottomRight)),
    ];

    return {
        top: Math.max(1, Math.floor((rows - lines.length) / 2) + 1),
        left: Math.max(1, Math.floor((cols - width) / 2) + 1),
        lines,
    };
}

// ============================================================================
// Helpers
// ============================================================================

function fill(lines: readonly string[], height: number): string[] {
    const out = lines.slice(0, height);
    while (out.length < height) out.push('');
    return out;
}

/** Local wall-clock time, `HH:MM:SS`. */
export function formatClock(epochMs: number): string {
    const d = new Date(epochMs);
    return `${String(d.getHours()).padStart(2, '0')}:${String(d.getMinutes()).padStart(2, '0')}:${String(d.getSeconds()).padStart(2, '0')}`;
}

function formatSeconds(ms: number): string {
    return ms % 1000 === 0 ? `${ms / 1000}s` : `${(ms / 1000).toFixed(1)}s`;
}
