type Task<T> = () => Promise<T>;

/**
 * Runs tasks one after another per key. A failing task rejects its own
 * caller only; the next task for the key still runs.
 */
export class KeyedTaskQueue {
    private readonly tails = new Map<string, Promise<unknown>>();

    run<T>(key: string, task: Task<T>): Promise<T> {
        // tails never reject
        const previous = this.tails.get(key) ?? Promise.resolve();
        const next = previous.then(() => task());
        const tail: Promise<void> = next.then(
            () => this.release(key, tail),
            () => this.release(key, tail),
        );
        this.tails.set(key, tail);
        return next;
    }

    private release(key: string, tail: Promise<void>) {
        if (this.tails.get(key) === tail) {
            this.tails.delete(key);
        }
    }

    get pending(): number {
        return this.tails.size;
    }
}
