import type { PoolKey } from '../pooling/pool-key.js';
import { PoolInvariantError } from '../pooling/pool-errors.js';

/**
 * Where a connector sits in its pool's lifecycle.
 *
 * `in-transit` covers the hand-off from a release straight to a waiting
 * acquirer; the connector is owned by neither side until the waiter resumes.
 */
export type ConnectorState = 'created' | 'opening' | 'idle' | 'busy' | 'in-transit' | 'discarded';

export type ConnectorCredentials = {
  password?: string;
};

const allowedTransitions: Record<ConnectorState, readonly ConnectorState[]> = {
  created: ['opening'],
  opening: ['idle', 'busy', 'in-transit', 'discarded'],
  idle: ['busy', 'discarded'],
  busy: ['idle', 'in-transit', 'discarded'],
  'in-transit': ['busy'],
  discarded: [],
};

export class ConnectorBrokenError extends Error {
  readonly code = 'CONNECTOR_BROKEN';

  constructor(connectorId: number, cause: Error | null) {
    super(`Connector ${connectorId} is broken`, { cause });
    this.name = 'ConnectorBrokenError';
  }
}

/**
 * Key of the lifecycle method. Only the pool holds it; the package entry
 * does not export it.
 */
export const moveTo = Symbol('Connector.moveTo');

let nextConnectorId = 0;

const toError = (reason: unknown): Error =>
  reason instanceof Error ? reason : new Error(String(reason));

/**
 * A single pooled session to a backend.
 *
 * Subclasses supply the transport through `connect`, `resetSession` and
 * `disconnect`, and call `markBroken` from their I/O layer when the
 * transport fails. Ownership (`state`, `owner`) is changed only by the pool.
 */
export abstract class Connector {
  readonly id = ++nextConnectorId;
  readonly key: PoolKey;

  private currentState: ConnectorState = 'created';
  private currentOwner: unknown = null;
  private brokenBy: Error | null = null;

  constructor(key: PoolKey) {
    this.key = key;
  }

  get state(): ConnectorState {
    return this.currentState;
  }

  /** Whoever holds the connector; null unless it is busy. */
  get owner(): unknown {
    return this.currentOwner;
  }

  get isBroken(): boolean {
    return this.brokenBy !== null;
  }

  get brokenReason(): Error | null {
    return this.brokenBy;
  }

  async open(credentials: ConnectorCredentials = {}): Promise<void> {
    try {
      await this.connect(credentials);
    } catch (err) {
      this.markBroken(err);
      throw err;
    }
  }

  /**
   * Restores session defaults before the connector is reused.
   * A failure here leaves the connector broken.
   */
  async reset(): Promise<void> {
    if (this.brokenBy) {
      throw new ConnectorBrokenError(this.id, this.brokenBy);
    }
    try {
      await this.resetSession();
    } catch (err) {
      this.markBroken(err);
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.disconnect();
  }

  /** Moves the connector along its lifecycle. */
  [moveTo](next: ConnectorState, owner: unknown = null): void {
    if (!allowedTransitions[this.currentState].includes(next)) {
      throw new PoolInvariantError(
        `Connector ${this.id} cannot move from ${this.currentState} to ${next}`
      );
    }
    this.currentState = next;
    this.currentOwner = next === 'busy' ? owner : null;
  }

  /** First failure wins; later ones are not recorded. */
  protected markBroken(reason: unknown): void {
    if (!this.brokenBy) {
      this.brokenBy = toError(reason);
    }
  }

  protected assertUsable(): void {
    if (this.brokenBy) {
      throw new ConnectorBrokenError(this.id, this.brokenBy);
    }
  }

  protected abstract connect(credentials: ConnectorCredentials): Promise<void>;
  protected abstract resetSession(): Promise<void>;
  protected abstract disconnect(): Promise<void>;
}
