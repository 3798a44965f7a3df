/**
 * Single-flight ownership of a simulation's engine.
 *
 * `tryAcquire` is the synchronous check-and-set used by blocking callers;
 * `acquire` queues. On release, ownership passes straight to the oldest
 * waiter, so the guard is never observed free between two queued runs.
 */
export class StepGuard {
    private held = false;
    private readonly waiters: Array<() => void> = [];

    isHeld(): boolean {
        return this.held;
    }

    tryAcquire(): boolean {
        if (this.held) return false;
        this.held = true;
        return true;
    }

    acquire(): Promise<void> {
        if (this.tryAcquire()) return Promise.resolve();
        return new Promise<void>(resolve => {
            this.waiters.push(resolve);
        });
    }

    release(): void {
        if (!this.held) {
            throw new Error('StepGuard released while not held');
        }
        const next = this.waiters.shift();
        if (next) {
            next();
        } else {
            this.held = false;
        }
    }
}

/**
 * Completion record written by a background run when it exits. Futures only
 * read it.
 */
export class Completion {
    private done = false;
    private error: unknown = undefined;
    private faulted = false;
    private readonly listeners: Array<() => void> = [];

    get isDone(): boolean {
        return this.done;
    }

    get isFaulted(): boolean {
        return this.faulted;
    }

    get fault(): unknown {
        return this.error;
    }

    settle(fault?: { error: unknown }): void {
        if (this.done) return;
        if (fault) {
            this.faulted = true;
            this.error = fault.error;
        }
        this.done = true;
        for (const listener of this.listeners.splice(0)) listener();
    }

    onSettled(listener: () => void): void {
        if (this.done) {
            listener();
        } else {
            this.listeners.push(listener);
        }
    }
}

/**
 * Handle on an asynchronous stepping operation.
 */
export class StepFuture {
    private readonly completion: Completion;

    constructor(completion: Completion) {
        this.completion = completion;
    }

    /** Have the requested number of steps been completed? */
    isComplete(): boolean {
        return this.completion.isDone;
    }

    isFaulted(): boolean {
        return this.completion.isFaulted;
    }

    /** The error that ended the run, if it faulted. */
    get fault(): unknown {
        return this.completion.fault;
    }

    /**
     * Waits for the run to finish, or until `timeoutMs` elapses. Never
     * rejects and never cancels the run.
     * @returns Whether the run had finished when the wait ended.
     */
    wait(timeoutMs?: number): Promise<boolean> {
        return new Promise<boolean>(resolve => {
            let timer: ReturnType<typeof setTimeout> | undefined;
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => resolve(this.isComplete()), Math.max(0, timeoutMs));
            }
            this.completion.onSettled(() => {
                if (timer !== undefined) clearTimeout(timer);
                resolve(true);
            });
        });
    }

    /**
     * Resolves when the run succeeds; rejects with its fault otherwise.
     */
    async result(): Promise<void> {
        await this.wait();
        if (this.completion.isFaulted) {
            throw this.completion.fault;
        }
    }
}
