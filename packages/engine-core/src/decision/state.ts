import { containsDevice, EMPTY_STACK } from '../stack/connection-stack.js';
import type {
  ActivatableProfile,
  ActiveDevices,
  ArbitrationState,
  AudioMode,
  ConnectionStack,
  DeviceId,
  Profile,
} from '../types.js';
import { PROFILE_SPECS } from './table.js';

/** Fresh state: nothing connected, nothing active. */
export function createInitialState(mode: AudioMode = 'NORMAL'): ArbitrationState {
  return {
    active: {
      CLASSIC_MEDIA: null,
      CLASSIC_CALL: null,
      HEARING_AID: null,
      LE_AUDIO_MEDIA: null,
      LE_AUDIO_CALL: null,
    },
    mode,
    stacks: {
      classic_media: EMPTY_STACK,
      classic_call: EMPTY_STACK,
      hearing_aid: EMPTY_STACK,
      le_audio: EMPTY_STACK,
      le_hearing_aid: EMPTY_STACK,
    },
    sequence: 0,
  };
}

/** Device currently active for a profile (its first role slot). */
export function holderOf(active: ActiveDevices, profile: ActivatableProfile): DeviceId | null {
  return active[PROFILE_SPECS[profile].roles[0]];
}

/** Whether a device announced LE hearing-aid capability. */
export function isMarked(stacks: Readonly<Record<Profile, ConnectionStack>>, device: DeviceId): boolean {
  return containsDevice(stacks.le_hearing_aid, device);
}

/**
 * Tier 0 is held by an active hearing aid, or by an active LE device that
 * carries the LE hearing-aid mark.
 */
export function hearingTierHeld(
  active: ActiveDevices,
  stacks: Readonly<Record<Profile, ConnectionStack>>,
): boolean {
  if (active.HEARING_AID !== null) {
    return true;
  }
  const le = holderOf(active, 'le_audio');
  return le !== null && isMarked(stacks, le);
}
