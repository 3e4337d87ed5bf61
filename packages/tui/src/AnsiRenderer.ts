/**
 * AnsiRenderer — Terminal Primitives for the Dashboard
 *
 * Escape sequences, column-width math, box drawing, and the screen
 * manager that owns the alternate buffer and raw-mode stdin.
 *
 * Every helper that measures or pads text ignores escape sequences, so
 * styled and plain strings line up the same way.
 *
 * @module
 */

// ============================================================================
// ANSI Escape Sequences
// ============================================================================

export const ansi = {
    cyan:    (s: string): string => `\x1b[36m${s}\x1b[0m`,
    green:   (s: string): string => `\x1b[32m${s}\x1b[0m`,
    red:     (s: string): string => `\x1b[31m${s}\x1b[0m`,
    yellow:  (s: string): string => `\x1b[33m${s}\x1b[0m`,
    magenta: (s: string): string => `\x1b[35m${s}\x1b[0m`,
    dim:     (s: string): string => `\x1b[2m${s}\x1b[0m`,
    bold:    (s: string): string => `\x1b[1m${s}\x1b[0m`,
    /** Reverse video; pass plain text, an inner `\x1b[0m` ends it early */
    inverse: (s: string): string => `\x1b[7m${s}\x1b[27m`,
    banner:  (s: string): string => `\x1b[1m\x1b[97m\x1b[41m${s}\x1b[0m`,
    reset: '\x1b[0m',

    hideCursor:  '\x1b[?25l',
    showCursor:  '\x1b[?25h',
    altScreen:   '\x1b[?1049h',
    mainScreen:  '\x1b[?1049l',
    clearScreen: '\x1b[2J\x1b[H',
    moveTo: (row: number, col: number): string => `\x1b[${row};${col}H`,
} as const;

const ESCAPE_PATTERN = /\x1b\[[0-9;?]*[a-zA-Z]/g;

/** Remove CSI escape sequences. */
export function stripAnsi(str: string): string {
    return str.replace(ESCAPE_PATTERN, '');
}

// ============================================================================
// Column Width
// ============================================================================

/** Code point ranges drawn two columns wide. */
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
    [0x1100, 0x115F],   // Hangul Jamo
    [0x231A, 0x231B],   // watch, hourglass
    [0x23E9, 0x23EC],
    [0x23F0, 0x23F0],
    [0x23F3, 0x23F3],
    [0x25FD, 0x25FE],
    [0x2614, 0x2615],
    [0x2648, 0x2653],   // zodiac
    [0x26A1, 0x26A1],
    [0x26AA, 0x26AB],
    [0x26BD, 0x26BE],
    [0x26C4, 0x26C5],
    [0x26D4, 0x26D4],
    [0x26EA, 0x26EA],
    [0x26F2, 0x26F5],
    [0x26FA, 0x26FA],
    [0x26FD, 0x26FD],
    [0x2705, 0x2705],
    [0x270A, 0x270B],
    [0x2728, 0x2728],
    [0x274C, 0x274C],
    [0x274E, 0x274E],
    [0x2753, 0x2757],
    [0x2795, 0x2797],
    [0x27B0, 0x27B0],
    [0x27BF, 0x27BF],
    [0x2E80, 0x303E],   // CJK radicals, punctuation
    [0x3041, 0x33BF],   // kana, CJK compatibility
    [0x3400, 0x4DBF],   // CJK extension A
    [0x4E00, 0x9FFF],   // CJK unified
    [0xAC00, 0xD7A3],   // Hangul syllables
    [0xF900, 0xFAFF],
    [0xFE10, 0xFE19],
    [0xFE30, 0xFE6F],
    [0xFF01, 0xFF60],   // fullwidth forms
    [0xFFE0, 0xFFE6],
    [0x1F1E6, 0x1F1FF], // regional indicators
    [0x1F300, 0x1F64F], // pictographs, emoticons
    [0x1F680, 0x1F6FF], // transport
    [0x1F900, 0x1F9FF],
    [0x1FA70, 0x1FAFF],
    [0x20000, 0x3FFFD], // CJK extension B and later
];

/** Zero-width: combining marks, variation selectors, ZWJ. */
function isZeroWidth(code: number): boolean {
    return (code >= 0x0300 && code <= 0x036F)
        || (code >= 0x1AB0 && code <= 0x1AFF)
        || (code >= 0x20D0 && code <= 0x20FF)
        || (code >= 0xFE00 && code <= 0xFE0F)
        || code === 0x200B
        || code === 0x200D;
}

/** Columns occupied by a single code point. */
export function charWidth(code: number): 0 | 1 | 2 {
    if (isZeroWidth(code)) return 0;
    if (code < 0x1100) return 1;
    let lo = 0;
    let hi = WIDE_RANGES.length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        const range = WIDE_RANGES[mid];
        if (!range) break;
        if (code < range[0]) hi = mid - 1;
        else if (code > range[1]) lo = mid + 1;
        else return 2;
    }
    return 1;
}

/**
 * Visual width of a string in terminal columns. Escape sequences count
 * as zero.
 */
export function stringWidth(str: string): number {
    let width = 0;
    for (const char of stripAnsi(str)) {
        width += charWidth(char.codePointAt(0) ?? 0);
    }
    return width;
}

/**
 * Cut `str` to at most `maxWidth` columns, ending with `suffix` when
 * anything was dropped. Styling of a truncated string is discarded.
 */
export function truncate(str: string, maxWidth: number, suffix = '…'): string {
    if (stringWidth(str) <= maxWidth) return str;
    if (maxWidth <= 0) return '';

    const target = maxWidth - stringWidth(suffix);
    if (target <= 0) return suffix.slice(0, maxWidth);

    let result = '';
    let width = 0;
    for (const char of stripAnsi(str)) {
        const w = charWidth(char.codePointAt(0) ?? 0);
        if (width + w > target) break;
        result += char;
        width += w;
    }
    return result + suffix;
}

/** Pad (or truncate) to exactly `targetWidth` columns. */
export function pad(str: string, targetWidth: number, align: 'left' | 'right' = 'left'): string {
    const width = stringWidth(str);
    if (width > targetWidth) return truncate(str, targetWidth);
    const spaces = ' '.repeat(targetWidth - width);
    return align === 'left' ? str + spaces : spaces + str;
}

// ============================================================================
// Box Drawing
// ============================================================================

export const box = {
    topLeft:    '╭', topRight:    '╮',
    bottomLeft: '╰', bottomRight: '╯',
    horizontal: '─', vertical:    '│',
} as const;

/** A horizontal rule `width` columns wide, including both ends. */
export function hline(width: number, left: string, right: string, fill: string = box.horizontal): string {
    return left + fill.repeat(Math.max(0, width - 2)) + right;
}

// ============================================================================
// Ratio Bar
// ============================================================================

/**
 * `█░` bar for a 0..1 ratio: green above 80%, yellow above 40%, red
 * otherwise.
 */
export function progressBar(ratio: number, width: number, filledChar = '█', emptyChar = '░'): string {
    const clamped = Number.isFinite(ratio) ? Math.max(0, Math.min(1, ratio)) : 0;
    const filled = Math.round(clamped * width);
    const bar = filledChar.repeat(filled) + emptyChar.repeat(Math.max(0, width - filled));

    if (clamped > 0.8) return ansi.green(bar);
    if (clamped > 0.4) return ansi.yellow(bar);
    return ansi.red(bar);
}

// ============================================================================
// Screen Manager
// ============================================================================

export interface ScreenHandlers {
    /** Called once per burst of resize events (debounced 100ms) */
    readonly onResize: () => void;
    /** Raw keypress data, decoded as UTF-8 */
    readonly onInput: (key: string) => void;
}

/**
 * Owns the alternate screen buffer and raw-mode stdin for the lifetime
 * of the dashboard. `exit()` restores the terminal and is idempotent.
 */
export class ScreenManager {
    private readonly _out: NodeJS.WriteStream;
    private readonly _in: NodeJS.ReadStream;
    private _handlers: ScreenHandlers | undefined;
    private _resizeTimer: ReturnType<typeof setTimeout> | undefined;
    private _active = false;
    private _cols = 80;
    private _rows = 24;

    constructor(out: NodeJS.WriteStream = process.stdout, input: NodeJS.ReadStream = process.stdin) {
        this._out = out;
        this._in = input;
    }

    get cols(): number { return this._cols; }
    get rows(): number { return this._rows; }
    get active(): boolean { return this._active; }

    enter(handlers: ScreenHandlers): void {
        if (this._active) return;
        this._active = true;
        this._handlers = handlers;
        this._measure();

        this._out.write(ansi.altScreen + ansi.hideCursor + ansi.clearScreen);

        if (this._in.isTTY) {
            this._in.setRawMode(true);
            this._in.resume();
            this._in.on('data', this._handleInput);
        }
        this._out.on('resize', this._handleResize);
    }

    exit(): void {
        if (!this._active) return;
        this._active = false;

        if (this._resizeTimer) {
            clearTimeout(this._resizeTimer);
            this._resizeTimer = undefined;
        }
        this._out.removeListener('resize', this._handleResize);

        if (this._in.isTTY) {
            this._in.removeListener('data', this._handleInput);
            this._in.setRawMode(false);
            this._in.pause();
        }
        this._out.write(ansi.reset + ansi.showCursor + ansi.mainScreen);
        this._handlers = undefined;
    }

    /** Write a fully composed frame in one call. */
    write(frame: string): void {
        if (this._active) this._out.write(frame);
    }

    // ── Private Handlers ─────────────────────────────────

    private _measure(): void {
        this._cols = this._out.columns || 80;
        this._rows = this._out.rows || 24;
    }

    private readonly _handleResize = (): void => {
        if (this._resizeTimer) clearTimeout(this._resizeTimer);
        this._resizeTimer = setTimeout(() => {
            this._resizeTimer = undefined;
            this._measure();
            this._out.write(ansi.clearScreen);
            this._handlers?.onResize();
        }, 100);
    };

    private readonly _handleInput = (data: Buffer): void => {
        this._handlers?.onInput(data.toString('utf8'));
    };
}
