/**
 * @meshtop/tui — Terminal Front Ends for meshtop
 *
 * The interactive dashboard, the headless stderr stream, the demo
 * simulator and the CLI that picks between them.
 *
 * @module
 */

// ── Terminal Primitives ──────────────────────────────────
export {
    ansi, stripAnsi, charWidth, stringWidth, truncate, pad, box, hline, progressBar,
    ScreenManager, type ScreenHandlers,
} from './AnsiRenderer.js';
export { RingBuffer } from './RingBuffer.js';

// ── Dashboard ────────────────────────────────────────────
export {
    DashboardController, KEYS,
    type ActivityEntry, type Overlay, type DashboardView, type KeyResult, type DashboardControllerOptions,
} from './DashboardController.js';
export {
    renderFrame, composeFrame, renderPeerTable, renderOverlay, formatClock,
    MIN_COLS, MIN_ROWS, type OverlayBox,
} from './DashboardRenderer.js';
export { runDashboard, type DashboardOptions } from './CommandDashboard.js';

// ── Headless & Demo ──────────────────────────────────────
export {
    streamToStderr, formatEvent, formatEventJson,
    type StreamLoggerOptions, type LogFormat,
} from './StreamLogger.js';
export { SimulatedTailnet, type SimulatorOptions } from './Simulator.js';

// ── CLI ──────────────────────────────────────────────────
export {
    runMeshtop, parseMeshtopArgs, MESHTOP_HELP, MESHTOP_VERSION, MIN_INTERVAL_SECONDS,
    type MeshtopArgs, type MeshtopIO, type OutputMode,
} from './cli/meshtop.js';
