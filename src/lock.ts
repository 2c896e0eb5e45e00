/**
 * A FIFO mutual-exclusion lock built on a promise chain.
 *
 * Every task passed to `runExclusive` starts only after all earlier tasks have
 * settled, whether they resolved or rejected.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private held = false;

    get locked(): boolean {
        return this.held;
    }

    runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
        const run = this.tail.then(async () => {
            this.held = true;
            try {
                return await task();
            } finally {
                this.held = false;
            }
        });
        // The chain only tracks completion; the caller gets the outcome through `run`.
        this.tail = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }
}
