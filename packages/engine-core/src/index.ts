// Types
export type {
  DeviceId,
  Profile,
  ActivatableProfile,
  ProfileGroup,
  Tier,
  Role,
  AudioDuty,
  Capability,
  AudioMode,
  StackEntry,
  ConnectionStack,
  ActiveDevices,
  ArbitrationState,
  ArbitrationEvent,
  EventKind,
  Reassignment,
} from './types.js';
export { ArbiterError, PROFILES, ACTIVATABLE_PROFILES, ROLES } from './types.js';

// Decision types
export type {
  ClassicProfile,
  ResolverContext,
  Resolution,
  FallbackCandidate,
} from './decision/types.js';
export type { ProfileSpec, TierOneGroup } from './decision/table.js';

// Precedence table
export {
  PROFILE_SPECS,
  SIBLING_GROUP,
  CLASSIC_PROFILE_FOR_DUTY,
  DUTY_ROLES,
} from './decision/table.js';

// Connection stacks
export {
  EMPTY_STACK,
  pushDevice,
  removeDevice,
  containsDevice,
  stackTail,
  sequenceOf,
} from './stack/connection-stack.js';

// Role assignment
export { assignRoles, canPreempt, preferredDuty } from './roles/assignment.js';

// Resolver
export { resolve } from './decision/resolver.js';
export { createInitialState, holderOf, isMarked, hearingTierHeld } from './decision/state.js';

// Validation
export { validateState } from './validation.js';
