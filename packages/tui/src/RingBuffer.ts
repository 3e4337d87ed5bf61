/**
 * RingBuffer — Bounded History, Oldest Evicted First
 *
 * Backs the activity log. `push` is O(1); reads copy out in insertion
 * order.
 *
 * @example
 * ```typescript
 * const log = new RingBuffer<string>(2);
 * log.push('a');
 * log.push('b');
 * log.push('c');   // 'a' is evicted
 * log.toArray();   // ['b', 'c']
 * ```
 *
 * @module
 */
export class RingBuffer<T> {
    private readonly _slots: Array<T | undefined>;
    /** Index of the oldest item */
    private _start = 0;
    private _size = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this._slots = new Array<T | undefined>(capacity).fill(undefined);
    }

    get size(): number { return this._size; }
    get capacity(): number { return this._slots.length; }

    push(item: T): void {
        const capacity = this._slots.length;
        if (this._size < capacity) {
            this._slots[(this._start + this._size) % capacity] = item;
            this._size++;
        } else {
            this._slots[this._start] = item;
            this._start = (this._start + 1) % capacity;
        }
    }

    /** Item at `index`, 0 being the oldest still held. */
    get(index: number): T | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this._size) return undefined;
        return this._slots[(this._start + index) % this._slots.length];
    }

    toArray(): T[] {
        return this.last(this._size);
    }

    /** The newest `n` items, oldest first. */
    last(n: number): T[] {
        const count = Math.max(0, Math.min(Math.floor(n), this._size));
        const out: T[] = [];
        for (let i = this._size - count; i < this._size; i++) {
            const item = this.get(i);
            if (item !== undefined) out.push(item);
        }
        return out;
    }

    clear(): void {
        this._slots.fill(undefined);
        this._start = 0;
        this._size = 0;
    }
}
