/**
 * DebugObserver.test.ts — Event Summaries and the Default Sink
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, describeEvent } from '../src/observability/DebugObserver.js';
import type { DashboardEvent } from '../src/observability/DashboardEvent.js';

afterEach(() => { vi.restoreAllMocks(); });

// ============================================================================
// describeEvent
// ============================================================================

describe('describeEvent', () => {
    it('should summarize refresh events', () => {
        expect(describeEvent({ type: 'refresh.started', trigger: 'timer', timestamp: 0 }))
            .toEqual({ tag: 'SYNC', tone: 'dim', message: 'refresh (timer)' });
        expect(describeEvent({
            type: 'refresh.published', trigger: 'initial', peers: 4, online: 3, durationMs: 42, timestamp: 0,
        })).toEqual({ tag: 'SYNC', tone: 'ok', message: '4 peers, 3 online (42ms)' });
        expect(describeEvent({ type: 'refresh.coalesced', trigger: 'manual', timestamp: 0 }))
            .toEqual({ tag: 'SYNC', tone: 'dim', message: 'manual refresh skipped, cycle in flight' });
    });

    it('should mark a missing binary as an error and other failures as warnings', () => {
        const failed = (kind: 'tool-missing' | 'parse'): DashboardEvent => ({
            type: 'refresh.failed', trigger: 'timer', kind, message: 'boom', durationMs: 1, timestamp: 0,
        });
        expect(describeEvent(failed('tool-missing')))
            .toEqual({ tag: 'FAIL', tone: 'error', message: 'tool-missing: boom' });
        expect(describeEvent(failed('parse')).tone).toBe('warn');
    });

    it('should label actions with their target', () => {
        expect(describeEvent({
            type: 'action.completed', action: 'ping', target: '100.64.0.2', ok: true, durationMs: 310, timestamp: 0,
        })).toEqual({ tag: 'PING', tone: 'ok', message: 'ping 100.64.0.2 ok (310ms)' });
        expect(describeEvent({
            type: 'action.completed', action: 'exit-node.list', target: null, ok: false, durationMs: 5, timestamp: 0,
        })).toEqual({ tag: 'EXIT', tone: 'warn', message: 'exit-node.list failed (5ms)' });
        expect(describeEvent({
            type: 'action.rejected', action: 'exit-node.set', target: null, reason: 'busy', timestamp: 0,
        })).toEqual({ tag: 'EXIT', tone: 'warn', message: 'exit-node.set (none) rejected: busy' });
    });

    it('should summarize clipboard events', () => {
        expect(describeEvent({ type: 'clipboard.copied', chars: 10, timestamp: 0 }).message).toBe('copied 10 chars');
        expect(describeEvent({ type: 'clipboard.disabled', reason: 'xclip is not installed', timestamp: 0 }))
            .toEqual({ tag: 'CLIP', tone: 'warn', message: 'clipboard disabled: xclip is not installed' });
    });
});

// ============================================================================
// createDebugObserver
// ============================================================================

describe('createDebugObserver', () => {
    it('should write one console.debug line per event by default', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const debug = createDebugObserver();
        debug({ type: 'refresh.started', trigger: 'initial', timestamp: 0 });
        expect(spy).toHaveBeenCalledWith('[meshtop] SYNC refresh (initial)');
    });

    it('should return a custom handler as is', () => {
        const handler = vi.fn();
        expect(createDebugObserver(handler)).toBe(handler);
    });
});
