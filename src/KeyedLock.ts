/**
 * Serializes async tasks per key. Tasks for the same key run one after another in call
 * order; tasks for different keys do not wait on each other.
 */
export class KeyedLock {
    private readonly tails: Map<string, Promise<void>> = new Map();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => {};
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        try {
            await previous;
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** Keys with a task queued or running; zero once every task has settled. */
    get activeKeys(): number {
        return this.tails.size;
    }
}
