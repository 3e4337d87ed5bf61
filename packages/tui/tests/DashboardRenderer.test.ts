/**
 * DashboardRenderer.test.ts — Frames as Plain Strings
 *
 * Categories:
 *  1. Peer Table: columns, selection, scrolling
 *  2. Frame: layout, banners, too-small notice
 *  3. Overlay: centered box over the frame, clock
 */
import { describe, it, expect } from 'vitest';
import { createSnapshot, type Peer, type Snapshot } from '@meshtop/core';
import { ansi, stringWidth, stripAnsi } from '../src/AnsiRenderer.js';
import type { DashboardView } from '../src/DashboardController.js';
import {
    composeFrame, formatClock, renderFrame, renderOverlay, renderPeerTable,
} from '../src/DashboardRenderer.js';

const CAPTURED_AT = new Date(2026, 4, 4, 9, 12, 44).getTime();
const NOW = CAPTURED_AT + 3_000;

const GATEWAY: Peer = { hostname: 'gateway', address: '100.64.0.2', online: true, exitNodeCapable: true, os: 'linux' };
const LAPTOP: Peer = { hostname: 'laptop', address: '100.64.0.3', online: false, exitNodeCapable: false, os: 'macOS' };

function snapshotOf(peers: readonly Peer[], activeExitNode: string | null = null): Snapshot {
    return createSnapshot({
        localAddress: '100.64.0.1',
        selfHostname: 'workstation',
        backendState: 'Running',
        tailnet: 'example-tailnet',
        peers,
        exitNodeCandidates: peers.filter(p => p.exitNodeCapable),
        activeExitNode,
    }, 'Report:\n\t* UDP: true', CAPTURED_AT);
}

function viewOf(overrides: Partial<DashboardView> = {}): DashboardView {
    return {
        snapshot: undefined,
        selectedIndex: -1,
        binary: 'tailscale',
        intervalMs: 10_000,
        toolMissing: false,
        attempts: 1,
        lastFailure: undefined,
        refreshing: false,
        pendingAction: undefined,
        overlay: undefined,
        message: undefined,
        activity: [],
        now: NOW,
        ...overrides,
    };
}

/** One table row at 80 columns (HOSTNAME gets 39). */
function row(host: string, address: string, online: string, exit: string, os: string): string {
    return ` ${host.padEnd(39)} ${address.padEnd(16)} ${online.padEnd(6)} ${exit.padEnd(4)} ${os.padEnd(10)}`;
}

// ============================================================================
// 1. Peer Table
// ============================================================================

describe('renderPeerTable', () => {
    it('should render exactly a header and one row per peer', () => {
        const view = viewOf({ snapshot: snapshotOf([GATEWAY, LAPTOP]), selectedIndex: 1 });
        const lines = renderPeerTable(view, 80, 3);

        expect(lines).toHaveLength(3);
        expect(stripAnsi(lines[0] ?? '')).toBe(row('HOSTNAME', 'ADDRESS', 'ONLINE', 'EXIT', 'OS'));
        expect(stripAnsi(lines[1] ?? '')).toBe(row('gateway', '100.64.0.2', '✓', '◆', 'linux'));
        expect(lines[2]).toBe(ansi.inverse(row('laptop', '100.64.0.3', '✗', '', 'macOS')));
    });

    it('should mark the active exit node', () => {
        const view = viewOf({ snapshot: snapshotOf([GATEWAY, LAPTOP], '100.64.0.2'), selectedIndex: 1 });
        const lines = renderPeerTable(view, 80, 3);

        expect(stripAnsi(lines[1] ?? '')).toBe(row('gateway', '100.64.0.2', '✓', '●', 'linux'));
        expect(lines[1]).toContain(ansi.cyan('●'));
    });

    it('should scroll to keep the selection visible', () => {
        const peers = [0, 1, 2, 3, 4].map((i): Peer => ({
            hostname: `p${i}`, address: `100.64.0.${10 + i}`, online: true, exitNodeCapable: false, os: 'linux',
        }));
        const lines = renderPeerTable(viewOf({ snapshot: snapshotOf(peers), selectedIndex: 4 }), 80, 3);

        expect(lines.map(l => stripAnsi(l).trim().split(/\s+/)[0])).toEqual(['HOSTNAME', 'p3', 'p4']);
    });

    it('should explain an empty table', () => {
        expect(stripAnsi(renderPeerTable(viewOf(), 80, 3)[1] ?? '')).toBe(' no data yet');
        expect(stripAnsi(renderPeerTable(viewOf({ toolMissing: true }), 80, 3)[1] ?? ''))
            .toBe(' no data: tailscale is unavailable');
        expect(stripAnsi(renderPeerTable(viewOf({ snapshot: snapshotOf([]) }), 80, 3)[1] ?? ''))
            .toBe(' no peers in this tailnet');
    });
});

// ============================================================================
// 2. Frame
// ============================================================================

describe('renderFrame', () => {
    const view = viewOf({ snapshot: snapshotOf([GATEWAY, LAPTOP]), selectedIndex: 0 });

    it('should fill the terminal exactly', () => {
        const lines = renderFrame(view, 80, 24);

        expect(lines).toHaveLength(24);
        for (const line of lines) expect(stringWidth(line)).toBe(80);
    });

    it('should lay out header, summary, table, panels and status bar', () => {
        const plain = renderFrame(view, 80, 24).map(l => stripAnsi(l).trimEnd());

        expect(plain[0]?.startsWith(' MESHTOP ')).toBe(true);
        expect(stripAnsi(renderFrame(view, 80, 24)[0] ?? '').endsWith(`example-tailnet  workstation  Running  ${formatClock(NOW)} `))
            .toBe(true);
        expect(plain[1]).toBe(` updated ${formatClock(CAPTURED_AT)}, every 10s`);
        expect(plain[3]).toBe(' Local  100.64.0.1   Peers  1/2 online █████░░░░░');
        expect(plain[4]).toBe(' Exit nodes   gateway');
        expect(plain[5]).toBe(' Active exit  None');
        expect(plain[7]).toBe(row('HOSTNAME', 'ADDRESS', 'ONLINE', 'EXIT', 'OS').trimEnd());
        expect(plain[8]).toBe(row('gateway', '100.64.0.2', '✓', '◆', 'linux').trimEnd());
        expect(plain[9]).toBe(row('laptop', '100.64.0.3', '✗', '', 'macOS').trimEnd());
        expect(plain[11]).toBe(`${' DIAGNOSTICS'.padEnd(39)}│ ACTIVITY`);
        expect(plain[12]).toBe(`${' Report:'.padEnd(39)}│`);
        expect(plain[13]).toBe(`${'   * UDP: true'.padEnd(39)}│`);
        expect(plain[23]?.startsWith(' r refresh  ↑↓ select')).toBe(true);
    });

    it('should show the message and the running action in the status bar', () => {
        const lines = renderFrame({ ...view, message: 'Copied 100.64.0.2', pendingAction: 'ping' }, 80, 24);
        const status = stripAnsi(lines[23] ?? '');

        expect(status.startsWith(' Copied 100.64.0.2 ')).toBe(true);
        expect(status.endsWith('ping… ')).toBe(true);
    });

    it('should show a persistent banner while the binary is missing', () => {
        const lines = renderFrame(viewOf({ toolMissing: true, attempts: 3 }), 80, 24);

        expect(stripAnsi(lines[1] ?? '').trimEnd())
            .toBe(' ✗ tailscale not found or not executable. Retrying every 10s (attempt 3)');
        expect(stripAnsi(lines[3] ?? '').trimEnd()).toBe(' waiting for the first status…');
        expect(stripAnsi(lines[8] ?? '').trimEnd()).toBe(' no data: tailscale is unavailable');
    });

    it('should name the failure and the age of stale data', () => {
        const lines = renderFrame({
            ...view,
            lastFailure: { kind: 'parse', message: 'not JSON', at: NOW },
        }, 80, 24);

        expect(stripAnsi(lines[1] ?? '').trimEnd())
            .toBe(` ! Refresh failed (parse), showing data from ${formatClock(CAPTURED_AT)}: not JSON`);
    });

    it('should replace the layout with a notice below the minimum size', () => {
        const lines = renderFrame(view, 30, 10);

        expect(lines).toHaveLength(10);
        expect(stripAnsi(lines[0] ?? '')).toBe('Terminal too small. Min: 40×12');
        expect(lines.slice(1)).toEqual(Array.from({ length: 9 }, () => ' '.repeat(30)));
    });
});

// ============================================================================
// 3. Overlay
// ============================================================================

describe('renderOverlay', () => {
    it('should center a bordered box around the output', () => {
        const overlay = renderOverlay({ title: 'Ping gateway (100.64.0.2)', body: 'pong 1\npong 2', ok: true }, 80, 24);

        expect(overlay.top).toBe(10);
        expect(overlay.left).toBe(24);
        expect(overlay.lines.map(stripAnsi)).toEqual([
            `╭─ Ping gateway (100.64.0.2) ───╮`,
            `│ ${'pong 1'.padEnd(29)} │`,
            `│ ${'pong 2'.padEnd(29)} │`,
            `│ ${'press any key to close'.padEnd(29)} │`,
            `╰${'─'.repeat(31)}╯`,
        ]);
        expect(overlay.lines[0]?.startsWith('\x1b[36m')).toBe(true);
    });

    it('should draw failures in red', () => {
        const overlay = renderOverlay({ title: 'Exit nodes', body: 'no reply', ok: false }, 80, 24);
        expect(overlay.lines[0]?.startsWith('\x1b[31m')).toBe(true);
    });

    it('should cut long output with a count of hidden lines', () => {
        const body = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join('\n');
        const overlay = renderOverlay({ title: 'Exit nodes', body, ok: true }, 80, 12);

        expect(overlay.lines).toHaveLength(9);
        expect(stripAnsi(overlay.lines[5] ?? '')).toBe(`│ ${'line 5'.padEnd(22)} │`);
        expect(stripAnsi(overlay.lines[6] ?? '')).toBe(`│ ${'… 5 more lines'.padEnd(22)} │`);
    });

    it('should be drawn on top of the frame by composeFrame', () => {
        const view = viewOf({
            snapshot: snapshotOf([GATEWAY]),
            selectedIndex: 0,
            overlay: { title: 'Ping gateway (100.64.0.2)', body: 'pong 1\npong 2', ok: true },
        });
        expect(composeFrame(view, 80, 24)).toContain(`${ansi.moveTo(10, 24)}\x1b[36m╭─ Ping gateway`);
    });
});

describe('formatClock', () => {
    it('should format local time as HH:MM:SS', () => {
        expect(formatClock(new Date(2026, 0, 2, 3, 4, 5).getTime())).toBe('03:04:05');
    });
});
