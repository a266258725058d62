/**
 * Ordered in-memory channel between one producer and one consumer.
 *
 * With a capacity set, pushing onto a full channel drops the oldest buffered
 * item. The consumer reads with `for await` or `next()`; iteration ends once
 * the channel is closed and drained.
 */

export interface ChannelOptions<T> {
    capacity?: number;
    onDrop?: (item: T) => void;
}

export class Channel<T> implements AsyncIterable<T> {
    private items: T[] = [];
    private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
    private closed = false;
    private readonly capacity: number;
    private readonly onDrop?: (item: T) => void;

    constructor(options: ChannelOptions<T> = {}) {
        this.capacity = options.capacity ?? Infinity;
        this.onDrop = options.onDrop;
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Returns false when the channel is already closed.
     */
    push(item: T): boolean {
        if (this.closed) return false;

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ done: false, value: item });
            return true;
        }

        this.items.push(item);
        if (this.items.length > this.capacity) {
            const dropped = this.items.shift();
            if (dropped !== undefined && this.onDrop) this.onDrop(dropped);
        }
        return true;
    }

    /**
     * Remove buffered items that have not been read yet.
     */
    discard(predicate: (item: T) => boolean): number {
        const before = this.items.length;
        this.items = this.items.filter((item) => !predicate(item));
        return before - this.items.length;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter({ done: true, value: undefined });
        }
    }

    next(): Promise<IteratorResult<T, undefined>> {
        if (this.items.length > 0) {
            const [value] = this.items.splice(0, 1);
            return Promise.resolve({ done: false, value });
        }
        if (this.closed) {
            return Promise.resolve({ done: true, value: undefined });
        }
        return new Promise((resolve) => this.waiters.push(resolve));
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
            // Breaking out of a loop leaves the channel open for the producer
            return: async () => ({ done: true, value: undefined }),
        };
    }
}
