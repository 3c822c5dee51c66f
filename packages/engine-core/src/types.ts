/** Opaque hardware device identifier. The engine only ever references devices by id. */
export type DeviceId = string;

/** Every profile that feeds signals into the arbiter. */
export type Profile =
  | 'classic_media'
  | 'classic_call'
  | 'hearing_aid'
  | 'le_audio'
  | 'le_hearing_aid';

/** Profiles backed by a collaborator that accepts setActiveDevice(). */
export type ActivatableProfile = Exclude<Profile, 'le_hearing_aid'>;

export const PROFILES: readonly Profile[] = [
  'classic_media',
  'classic_call',
  'hearing_aid',
  'le_audio',
  'le_hearing_aid',
];

/** Fixed order used whenever every activatable profile is visited. */
export const ACTIVATABLE_PROFILES: readonly ActivatableProfile[] = [
  'hearing_aid',
  'classic_media',
  'classic_call',
  'le_audio',
];

export type ProfileGroup = 'HEARING_AID' | 'CLASSIC' | 'LE_AUDIO';

/** Precedence level. Tier 0 preempts tier 1. */
export type Tier = 0 | 1;

/** Role slots tracked by ActiveDeviceState. */
export type Role =
  | 'CLASSIC_MEDIA'
  | 'CLASSIC_CALL'
  | 'HEARING_AID'
  | 'LE_AUDIO_MEDIA'
  | 'LE_AUDIO_CALL';

export const ROLES: readonly Role[] = [
  'HEARING_AID',
  'CLASSIC_MEDIA',
  'CLASSIC_CALL',
  'LE_AUDIO_MEDIA',
  'LE_AUDIO_CALL',
];

/** Audio duty a tier-1 device can carry. */
export type AudioDuty = 'MEDIA' | 'CALL';

/** What a device can carry over the profile that is being considered. */
export type Capability = 'media' | 'call' | 'unified';

export type AudioMode = 'NORMAL' | 'IN_CALL';

export interface StackEntry {
  device: DeviceId;
  /** Global connection sequence; higher means more recent across all stacks. */
  seq: number;
}

/** Oldest-first, duplicate-free. */
export type ConnectionStack = readonly StackEntry[];

export type ActiveDevices = Readonly<Record<Role, DeviceId | null>>;

/** Complete arbitration state. Replaced, never mutated, after each event. */
export interface ArbitrationState {
  readonly active: ActiveDevices;
  readonly mode: AudioMode;
  readonly stacks: Readonly<Record<Profile, ConnectionStack>>;
  readonly sequence: number;
}

/** Normalized inbound event consumed by the resolver. */
export type ArbitrationEvent =
  | { kind: 'connected'; profile: ActivatableProfile; device: DeviceId }
  | { kind: 'disconnected'; profile: ActivatableProfile; device: DeviceId }
  | { kind: 'active_changed'; profile: ActivatableProfile; device: DeviceId | null }
  | { kind: 'available'; device: DeviceId }
  | { kind: 'unavailable'; device: DeviceId }
  | { kind: 'mode_changed'; mode: AudioMode }
  | { kind: 'wired_audio_connected' };

export type EventKind = ArbitrationEvent['kind'];

/** One outbound setActiveDevice() call. */
export interface Reassignment {
  profile: ActivatableProfile;
  device: DeviceId | null;
  suppressNoise: boolean;
}

/** Arbiter error codes. */
export enum ArbiterError {
  MALFORMED_SIGNAL = 'MALFORMED_SIGNAL',
  UNKNOWN_PROFILE = 'UNKNOWN_PROFILE',
  MISSING_DEVICE = 'MISSING_DEVICE',
  UNSUPPORTED_SIGNAL = 'UNSUPPORTED_SIGNAL',
  INVALID_CONFIG = 'INVALID_CONFIG',
  DUPLICATE_STACK_ENTRY = 'DUPLICATE_STACK_ENTRY',
  HEARING_AID_NOT_EXCLUSIVE = 'HEARING_AID_NOT_EXCLUSIVE',
  TIER_ONE_OVERLAP = 'TIER_ONE_OVERLAP',
  LE_ROLES_SPLIT = 'LE_ROLES_SPLIT',
}
