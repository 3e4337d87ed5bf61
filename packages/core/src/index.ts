/**
 * @meshtop/core
 *
 * Everything between the VPN client's CLI and the screen: a safe command
 * runner, the status parser, thin wrappers for diagnostics / ping /
 * exit-node / clipboard commands, and the refresh scheduler that
 * publishes one immutable snapshot per cycle.
 *
 * ```typescript
 * import { RefreshScheduler, runCommand, loadConfig } from '@meshtop/core';
 *
 * const scheduler = new RefreshScheduler({ runner: runCommand, config: loadConfig() });
 * scheduler.subscribe(() => render(scheduler.snapshot));
 * scheduler.start();
 * ```
 *
 * @module
 */

// ── Result ──────────────────────────────────────────────────
export { succeed, fail, type Result, type Success, type Failure } from './result.js';

// ── Command Runner ──────────────────────────────────────────
export {
    runCommand, isToolMissing, commandText, DEFAULT_MAX_OUTPUT_BYTES,
    type CommandRunner, type CommandResult, type CommandSuccess,
    type CommandFailure, type CommandFailureReason, type RunOptions,
} from './runner/CommandRunner.js';

// ── Status ──────────────────────────────────────────────────
export {
    UNKNOWN, createSnapshot, findPeer, isKnownPeerAddress,
    isExitNodeCandidate, countOnline,
    type Peer, type Snapshot, type StatusFragment,
} from './status/Snapshot.js';
export { parseStatus, StatusParseError, type StatusParseErrorKind } from './status/StatusParser.js';
export { StatusSchema, PeerStatusSchema, type StatusPayload, type PeerStatus } from './status/StatusSchema.js';

// ── Commands ────────────────────────────────────────────────
export {
    fetchStatus, fetchDiagnostics, listExitNodes, pingArgs, setExitNodeArgs,
    STATUS_ARGS, DIAGNOSTICS_ARGS, EXIT_NODE_LIST_ARGS,
} from './commands/VpnCommands.js';
export {
    ActionDispatcher,
    type ActionDispatcherOptions, type ActionOutcome, type ActionDone, type ActionRejected,
} from './commands/ActionDispatcher.js';
export {
    ClipboardWriter, resolveClipboardUtility,
    type ClipboardWriterOptions, type ClipboardOutcome, type ClipboardUtility,
} from './commands/ClipboardWriter.js';

// ── Scheduler ───────────────────────────────────────────────
export {
    RefreshScheduler,
    type RefreshSchedulerOptions, type SchedulerPhase, type RefreshOutcome, type RefreshFailure,
} from './scheduler/RefreshScheduler.js';

// ── Configuration ───────────────────────────────────────────
export {
    DEFAULT_CONFIG, mergeConfig, ConfigValidationError,
    type DashboardConfig, type PartialConfig, type PingConfig, type ClipboardConfig, type UiConfig,
} from './config/DashboardConfig.js';
export {
    loadConfig, applyCliOverrides, applyEnvOverrides, CONFIG_FILENAMES,
    type CliOverrides,
} from './config/ConfigLoader.js';

// ── Observability ───────────────────────────────────────────
export { createDebugObserver, describeEvent, type EventSummary, type EventTone } from './observability/DebugObserver.js';
export type {
    DashboardEvent, DebugFn, RefreshTrigger, RefreshFailureKind, ActionKind, RejectionReason,
    RefreshStartedEvent, RefreshPublishedEvent, RefreshFailedEvent, RefreshCoalescedEvent,
    ActionCompletedEvent, ActionRejectedEvent, ClipboardCopiedEvent, ClipboardDisabledEvent,
} from './observability/DashboardEvent.js';
