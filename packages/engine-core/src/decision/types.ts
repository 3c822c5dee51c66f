import type {
  ActivatableProfile,
  ArbitrationState,
  DeviceId,
  Reassignment,
} from '../types.js';

export type ClassicProfile = 'classic_media' | 'classic_call';

/**
 * Everything the resolver needs besides state and event.
 * `fallbackDevice` asks the owning classic collaborator for its own ranking.
 */
export interface ResolverContext {
  fallbackDevice: (profile: ClassicProfile) => DeviceId | null;
  enabled: ReadonlySet<ActivatableProfile>;
}

/** Output of a single resolution step. */
export interface Resolution {
  state: ArbitrationState;
  reassignments: Reassignment[];
}

/** A device proposed to take over one or more profiles after a disconnect or mode switch. */
export interface FallbackCandidate {
  profiles: ActivatableProfile[];
  device: DeviceId;
  seq: number;
  tierZero: boolean;
}
