import type { Identity } from '../identity/types.js';
import type { ProxyEndpoint } from '../proxy/types.js';
import type { RotationState } from './rotation-policy.js';

type SessionLifecycle =
  | 'uninitialized'
  | 'initializing'
  | 'active'
  | 'rotating'
  | 'closing'
  | 'closed';

type SessionInfo = {
  id: string;
  lifecycle: SessionLifecycle;
  userAgent?: string;
  locale?: string;
  timezone?: string;
  proxy?: string;
  requestCount: number;
  rotations: number;
  createdAt: number;
};

type SessionSnapshot = {
  identity: Identity;
  proxy?: ProxyEndpoint;
  rotation: RotationState;
};

const LIFECYCLE_TRANSITIONS: Readonly<Record<SessionLifecycle, readonly SessionLifecycle[]>> = {
  uninitialized: ['initializing', 'closed'],
  initializing: ['active', 'closing', 'closed'],
  active: ['rotating', 'closing'],
  rotating: ['active', 'closing'],
  closing: ['closed'],
  closed: [],
};

export { LIFECYCLE_TRANSITIONS };
export type { SessionInfo, SessionLifecycle, SessionSnapshot };
