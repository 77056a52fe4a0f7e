/**
 * FrontierQueue - binary min-heap for the A* open set.
 *
 * Entries with equal priority come out in insertion order (FIFO), which
 * keeps search order stable across runs. Priorities may be any finite
 * number, fractional or negative.
 *
 * Key properties:
 * - O(log n) insert and extract-min
 * - No decrease-key: callers re-insert and skip stale entries on pop
 */

interface HeapEntry<T> {
    readonly value: T;
    readonly priority: number;
    /** Insertion counter, breaks priority ties */
    readonly seq: number;
}

export class FrontierQueue<T> {
    private heap: HeapEntry<T>[] = [];
    private nextSeq = 0;

    get size(): number {
        return this.heap.length;
    }

    get isEmpty(): boolean {
        return this.heap.length === 0;
    }

    /**
     * Insert a value with given priority.
     * @param priority lower = popped earlier
     */
    insert(value: T, priority: number): void {
        this.heap.push({ value, priority, seq: this.nextSeq++ });
        this.bubbleUp(this.heap.length - 1);
    }

    /**
     * Remove and return the minimum-priority value.
     * @throws Error if queue is empty
     */
    popMin(): T {
        const top = this.heap[0];
        const last = this.heap.pop();
        if (top === undefined || last === undefined) {
            throw new Error('FrontierQueue is empty');
        }

        if (this.heap.length > 0) {
            this.heap[0] = last;
            this.bubbleDown(0);
        }
        return top.value;
    }

    /**
     * Reset the queue for reuse.
     */
    clear(): void {
        this.heap = [];
        this.nextSeq = 0;
    }

    private before(i: number, j: number): boolean {
        const a = this.heap[i];
        const b = this.heap[j];
        return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
    }

    private bubbleUp(index: number): void {
        while (index > 0) {
            const parentIndex = (index - 1) >> 1;
            if (!this.before(index, parentIndex)) {
                break;
            }
            this.swap(index, parentIndex);
            index = parentIndex;
        }
    }

    private bubbleDown(index: number): void {
        const length = this.heap.length;
        for (;;) {
            const left = index * 2 + 1;
            const right = left + 1;
            let smallest = index;

            if (left < length && this.before(left, smallest)) smallest = left;
            if (right < length && this.before(right, smallest)) smallest = right;
            if (smallest === index) {
                return;
            }
            this.swap(index, smallest);
            index = smallest;
        }
    }

    private swap(i: number, j: number): void {
        const tmp = this.heap[i];
        this.heap[i] = this.heap[j];
        this.heap[j] = tmp;
    }
}
