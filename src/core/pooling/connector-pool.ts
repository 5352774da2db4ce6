import { moveTo, type Connector, type ConnectorCredentials } from '../connectors/connector.js';
import { createLogger, type Logger } from '../logging/logger.js';
import {
    AcquireAbortedError,
    AcquireTimeoutError,
    ConnectorOpenError,
    PoolConfigurationError,
    PoolInvariantError,
} from './pool-errors.js';
import type { PoolKey } from './pool-key.js';
import type { AcquireOptions, ConnectorFactory, ConnectorPoolOptions, PoolStatus } from './pool-types.js';
import { WaitingTicket } from './waiting-ticket.js';

/** Longest delay setTimeout honours; anything above waits forever. */
const MAX_TIMER_MILLIS = 2 ** 31 - 1;

type OpenAttempt<TConnector> =
    | { ok: true; connector: TConnector }
    | { ok: false; error: ConnectorOpenError };

type Waiter<TConnector> = WaitingTicket<TConnector, ConnectorCredentials | undefined>;

const isSize = (value: number): boolean => Number.isInteger(value) && value >= 0;

/**
 * Rejects keys whose sizes cannot describe a pool:
 * 0 <= minPoolSize <= maxPoolSize <= poolSizeLimit.
 */
export function validatePoolBounds(key: PoolKey): void {
    const { minPoolSize: min, maxPoolSize: max, poolSizeLimit: limit } = key;

    if (!Number.isInteger(limit) || limit <= 0) {
        throw new PoolConfigurationError(`poolSizeLimit must be a positive integer (got ${limit})`);
    }
    if (!isSize(min)) {
        throw new PoolConfigurationError(`minPoolSize must be a non-negative integer (got ${min})`);
    }
    if (!isSize(max)) {
        throw new PoolConfigurationError(`maxPoolSize must be a non-negative integer (got ${max})`);
    }
    if (max > limit) {
        throw new PoolConfigurationError(`maxPoolSize ${max} exceeds the pool size limit of ${limit}`);
    }
    if (max < min) {
        throw new PoolConfigurationError(`maxPoolSize ${max} is below minPoolSize ${min}`);
    }
    if (!(key.acquireTimeoutMillis >= 0)) {
        throw new PoolConfigurationError(
            `acquireTimeoutMillis must be zero or more (got ${key.acquireTimeoutMillis})`
        );
    }
}

/**
 * Bounded set of connectors for one configuration.
 *
 * All bookkeeping (idle stack, busy count, waiting queue) happens in
 * synchronous sections between awaits, so no two callers ever interleave
 * inside it. Opens and resets run outside those sections; a connector being
 * opened is already counted as busy, which keeps `idle + busy <= max`
 * true while the I/O is in flight.
 */
export class ConnectorPool<TConnector extends Connector = Connector> {
    readonly key: PoolKey;

    private readonly createConnector: ConnectorFactory<TConnector>;
    private readonly log: Logger;
    private readonly min: number;
    private readonly max: number;

    /** Most recently released connector at the end. */
    private readonly idle: TConnector[] = [];
    private readonly waiting: Array<Waiter<TConnector>> = [];
    /** Connectors this pool opened and has not discarded. */
    private readonly members = new Set<TConnector>();
    private readonly resetting = new Set<TConnector>();
    private busy = 0;

    constructor(
        key: PoolKey,
        createConnector: ConnectorFactory<TConnector>,
        options: ConnectorPoolOptions = {}
    ) {
        validatePoolBounds(key);

        this.key = key;
        this.createConnector = createConnector;
        this.min = key.minPoolSize;
        this.max = key.maxPoolSize;
        this.log = (options.logger ?? createLogger()).child({
            component: 'ConnectorPool',
            pool: key.toString(),
        });
    }

    /**
     * Check a connector out of the pool.
     *
     * Order of preference:
     * 1. top the pool up to minPoolSize (the caller pays for the opens)
     * 2. the most recently released idle connector
     * 3. wait in FIFO order when maxPoolSize connectors are busy
     * 4. open a new connector
     *
     * The returned connector MUST be handed back through release().
     */
    async acquire(options: AcquireOptions = {}): Promise<TConnector> {
        const owner = options.owner ?? null;

        await this.fillToMinimum(options.credentials);

        const warm = this.idle.pop();
        if (warm) {
            this.busy++;
            warm[moveTo]('busy', owner);
            this.log.debug({ connectorId: warm.id }, 'Acquired idle connector');
            return warm;
        }

        if (this.busy >= this.max) {
            const handedOver = await this.waitForRelease(options);
            handedOver[moveTo]('busy', owner);
            this.log.debug({ connectorId: handedOver.id }, 'Acquired connector from a release');
            return handedOver;
        }

        this.busy++;
        this.assertBounds();
        const attempt = await this.tryOpen(options.credentials);
        if (!attempt.ok) {
            this.busy--;
            // The slot this open held may be all that kept a waiter queued.
            await this.replaceForWaiter();
            throw attempt.error;
        }
        attempt.connector[moveTo]('busy', owner);
        this.log.debug({ connectorId: attempt.connector.id }, 'Acquired new connector');
        return attempt.connector;
    }

    /**
     * Return a connector. Never rejects for connector I/O failures: a broken
     * connector, or one whose reset fails, is discarded instead of reused.
     */
    async release(connector: TConnector): Promise<void> {
        if (!this.members.has(connector) || connector.state !== 'busy' || this.resetting.has(connector)) {
            throw new PoolInvariantError(
                `Connector ${connector.id} is not checked out of the pool for ${this.key}`
            );
        }

        if (connector.isBroken) {
            await this.discard(connector, 'broken');
            await this.replaceForWaiter();
            return;
        }

        this.resetting.add(connector);
        let resetFailure: unknown = null;
        try {
            await connector.reset();
        } catch (err) {
            resetFailure = err;
        } finally {
            this.resetting.delete(connector);
        }

        if (resetFailure !== null || connector.isBroken) {
            this.log.debug({ connectorId: connector.id, err: resetFailure }, 'Reset failed');
            await this.discard(connector, 'reset failed');
            await this.replaceForWaiter();
            return;
        }

        this.handOff(connector);
    }

    /** Acquire, run `work`, and release whatever happens. */
    async use<T>(work: (connector: TConnector) => Promise<T>, options?: AcquireOptions): Promise<T> {
        const connector = await this.acquire(options);
        try {
            return await work(connector);
        } finally {
            await this.release(connector);
        }
    }

    status(): PoolStatus {
        return {
            busy: this.busy,
            idle: this.idle.length,
            waiting: this.waiting.filter(ticket => ticket.isPending).length,
        };
    }

    toString(): string {
        const { busy, idle, waiting } = this.status();
        return `[${busy} busy, ${idle} idle, ${waiting} waiting]`;
    }

    private async fillToMinimum(credentials: ConnectorCredentials | undefined): Promise<void> {
        while (this.idle.length + this.busy < this.min) {
            this.busy++;
            const attempt = await this.tryOpen(credentials);

            if (!attempt.ok) {
                this.busy--;
                if (this.idle.length === 0) {
                    await this.replaceForWaiter();
                    throw attempt.error;
                }
                this.log.warn(
                    { err: attempt.error, idle: this.idle.length },
                    'Could not fill the pool to its minimum size; continuing with idle connectors'
                );
                return;
            }

            // Callers that queued while this open was in flight come first.
            this.handOff(attempt.connector);
        }
    }

    /**
     * Creates and opens a connector. The caller has already counted it as busy.
     */
    private async tryOpen(credentials: ConnectorCredentials | undefined): Promise<OpenAttempt<TConnector>> {
        let connector: TConnector | null = null;
        try {
            connector = this.createConnector(this.key);
            connector[moveTo]('opening');
            await connector.open(credentials);
        } catch (err) {
            if (err instanceof PoolInvariantError) throw err;
            if (connector?.state === 'opening') {
                connector[moveTo]('discarded');
            }
            this.log.debug({ err }, 'Failed to open connector');
            return { ok: false, error: new ConnectorOpenError(this.key, err) };
        }

        this.members.add(connector);
        this.log.debug({ connectorId: connector.id }, 'Opened connector');
        return { ok: true, connector };
    }

    private async waitForRelease(options: AcquireOptions): Promise<TConnector> {
        const timeoutMillis = options.timeoutMillis ?? this.key.acquireTimeoutMillis;
        if (!(timeoutMillis > 0)) {
            throw new AcquireTimeoutError(this.key, Math.max(0, timeoutMillis || 0));
        }

        const { signal } = options;
        if (signal?.aborted) {
            throw new AcquireAbortedError(this.key, signal.reason);
        }

        const ticket: Waiter<TConnector> = new WaitingTicket(options.credentials);
        this.waiting.push(ticket);
        this.log.debug({ waiting: this.waiting.length }, 'Pool exhausted; waiting for a release');

        let timer: ReturnType<typeof setTimeout> | null = null;
        if (timeoutMillis <= MAX_TIMER_MILLIS) {
            timer = setTimeout(() => {
                this.cancelTicket(ticket, new AcquireTimeoutError(this.key, timeoutMillis));
            }, timeoutMillis);
            timer.unref();
        }
        const onAbort = (): void => {
            this.cancelTicket(ticket, new AcquireAbortedError(this.key, signal?.reason));
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            return await ticket.promise;
        } finally {
            if (timer) clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /** Loses quietly if a release already fulfilled the ticket. */
    private cancelTicket(ticket: Waiter<TConnector>, reason: Error): void {
        if (!ticket.cancel(reason)) return;
        const index = this.waiting.indexOf(ticket);
        if (index >= 0) this.waiting.splice(index, 1);
        this.log.debug({ err: reason }, 'Waiting acquire cancelled');
    }

    /**
     * Gives a busy (or freshly opened) connector to the oldest live waiter,
     * or parks it on the idle stack when nobody is waiting. Idle connectors
     * and live waiters never coexist.
     */
    private handOff(connector: TConnector): void {
        for (let ticket = this.waiting.shift(); ticket; ticket = this.waiting.shift()) {
            if (!ticket.isPending) continue;
            connector[moveTo]('in-transit');
            ticket.fulfil(connector);
            this.log.debug({ connectorId: connector.id }, 'Handed connector to a waiting acquire');
            return;
        }

        connector[moveTo]('idle');
        this.idle.push(connector);
        this.busy--;
        this.assertBounds();
        this.log.debug({ connectorId: connector.id }, 'Released connector to idle');
    }

    private async discard(connector: TConnector, reason: string): Promise<void> {
        this.busy--;
        this.members.delete(connector);
        connector[moveTo]('discarded');
        this.assertBounds();
        this.log.debug({ connectorId: connector.id, reason }, 'Discarded connector');

        try {
            await connector.close();
        } catch (err) {
            this.log.warn({ err, connectorId: connector.id }, 'Failed to close discarded connector');
        }
    }

    /**
     * After a discard frees capacity, waiters would otherwise sit until some
     * other release or their own timeout; open a replacement for them instead.
     */
    private async replaceForWaiter(): Promise<void> {
        const oldest = this.waiting.find(ticket => ticket.isPending);
        if (!oldest || this.idle.length + this.busy >= this.max) return;

        this.busy++;
        const attempt = await this.tryOpen(oldest.payload);
        if (!attempt.ok) {
            this.busy--;
            this.log.warn({ err: attempt.error }, 'Failed to open a replacement connector for a waiting acquire');
            return;
        }
        this.handOff(attempt.connector);
    }

    private assertBounds(): void {
        if (this.busy < 0 || this.idle.length + this.busy > this.max) {
            throw new PoolInvariantError(
                `Pool for ${this.key} out of bounds: ${this.busy} busy, ${this.idle.length} idle, max ${this.max}`
            );
        }
    }
}
