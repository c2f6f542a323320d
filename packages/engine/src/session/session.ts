import { randomUUID } from 'node:crypto';
import type { Identity } from '../identity/types.js';
import type { ProxyEndpoint } from '../proxy/types.js';
import { formatProxyServer } from '../proxy/proxy-list.js';
import { EngineError } from '../utils/errors.js';
import { recordRequest, type RotationState } from './rotation-policy.js';
import {
  LIFECYCLE_TRANSITIONS,
  type SessionInfo,
  type SessionLifecycle,
  type SessionSnapshot,
} from './types.js';

/**
 * The one shared mutable record of a browser session. Only the owning
 * controller mutates it, always while holding the session lock.
 */
export class Session {
  readonly id: string;
  private state: SessionLifecycle;
  private current: SessionSnapshot | undefined;
  private rotations: number;
  private readonly createdAt: number;

  constructor(now: number = Date.now()) {
    this.id = randomUUID();
    this.state = 'uninitialized';
    this.current = undefined;
    this.rotations = 0;
    this.createdAt = now;
  }

  transition(next: SessionLifecycle): void {
    if (!LIFECYCLE_TRANSITIONS[this.state].includes(next)) {
      throw new EngineError('invalid-state', `Illegal session transition ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  attach(identity: Identity, proxy: ProxyEndpoint | undefined, rotation: RotationState): void {
    this.current = { identity, proxy, rotation };
  }

  /** Swaps in a new identity and rotation state in one assignment. */
  replaceIdentity(identity: Identity, rotation: RotationState): void {
    const snapshot = this.require();
    this.current = { ...snapshot, identity, rotation };
    this.rotations += 1;
  }

  recordRequest(): void {
    const snapshot = this.require();
    this.current = { ...snapshot, rotation: recordRequest(snapshot.rotation) };
  }

  get lifecycle(): SessionLifecycle {
    return this.state;
  }

  get identity(): Identity {
    return this.require().identity;
  }

  get proxy(): ProxyEndpoint | undefined {
    return this.current?.proxy;
  }

  get rotation(): RotationState {
    return this.require().rotation;
  }

  get info(): SessionInfo {
    return {
      id: this.id,
      lifecycle: this.state,
      userAgent: this.current?.identity.userAgent,
      locale: this.current?.identity.locale,
      timezone: this.current?.identity.timezone,
      proxy: this.current?.proxy ? formatProxyServer(this.current.proxy) : undefined,
      requestCount: this.current?.rotation.requestCount ?? 0,
      rotations: this.rotations,
      createdAt: this.createdAt,
    };
  }

  private require(): SessionSnapshot {
    if (!this.current) {
      throw new EngineError('invalid-state', `Session ${this.id} has no identity yet`);
    }
    return this.current;
  }
}
