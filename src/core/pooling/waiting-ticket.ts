type Deferred<T> = {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (err: unknown) => void;
};

const deferred = <T>(): Deferred<T> => {
    let resolve!: (value: T) => void;
    let reject!: (err: unknown) => void;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
};

export type TicketState = 'pending' | 'fulfilled' | 'cancelled';

/**
 * A queued acquire. Settles exactly once: either a release fulfils it with a
 * connector or its own timeout/abort cancels it, whichever runs first.
 */
export class WaitingTicket<T, TPayload = undefined> {
    readonly payload: TPayload;
    private readonly settled = deferred<T>();
    private current: TicketState = 'pending';

    constructor(payload: TPayload) {
        this.payload = payload;
    }

    get promise(): Promise<T> {
        return this.settled.promise;
    }

    get state(): TicketState {
        return this.current;
    }

    get isPending(): boolean {
        return this.current === 'pending';
    }

    /** Returns false when the ticket was already settled. */
    fulfil(value: T): boolean {
        if (this.current !== 'pending') return false;
        this.current = 'fulfilled';
        this.settled.resolve(value);
        return true;
    }

    /** Returns false when the ticket was already settled. */
    cancel(reason: Error): boolean {
        if (this.current !== 'pending') return false;
        this.current = 'cancelled';
        this.settled.reject(reason);
        return true;
    }
}
