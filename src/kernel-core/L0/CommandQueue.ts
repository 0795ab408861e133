/**
 * Single-writer queue. Tasks run one at a time, in submission order, each to
 * completion (including awaited persistence) before the next starts.
 */
export class CommandQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    public run<T>(task: () => Promise<T> | T): Promise<T> {
        this.pending++;
        const result = this.tail.then(() => task());
        this.tail = result.then(
            () => { this.pending--; },
            () => { this.pending--; }
        );
        return result;
    }

    public get depth(): number {
        return this.pending;
    }

    /** Resolves once every task queued so far has settled. */
    public drain(): Promise<void> {
        return this.tail;
    }
}
