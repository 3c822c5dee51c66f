import type {
  ActivatableProfile,
  AudioDuty,
  Capability,
  ProfileGroup,
  Role,
  Tier,
} from '../types.js';

export interface ProfileSpec {
  group: ProfileGroup;
  tier: Tier;
  capability: Capability;
  /** Role slots the profile's active device occupies. */
  roles: readonly Role[];
}

/**
 * Static precedence data.
 * Hearing aid is tier 0; classic and LE audio share tier 1 and exclude each other.
 */
export const PROFILE_SPECS: Readonly<Record<ActivatableProfile, ProfileSpec>> = {
  hearing_aid: {
    group: 'HEARING_AID',
    tier: 0,
    capability: 'unified',
    roles: ['HEARING_AID'],
  },
  classic_media: {
    group: 'CLASSIC',
    tier: 1,
    capability: 'media',
    roles: ['CLASSIC_MEDIA'],
  },
  classic_call: {
    group: 'CLASSIC',
    tier: 1,
    capability: 'call',
    roles: ['CLASSIC_CALL'],
  },
  le_audio: {
    group: 'LE_AUDIO',
    tier: 1,
    capability: 'unified',
    roles: ['LE_AUDIO_MEDIA', 'LE_AUDIO_CALL'],
  },
};

export type TierOneGroup = Exclude<ProfileGroup, 'HEARING_AID'>;

/** The other tier-1 group. Hearing aid has no sibling. */
export const SIBLING_GROUP: Readonly<Record<ProfileGroup, TierOneGroup | null>> = {
  HEARING_AID: null,
  CLASSIC: 'LE_AUDIO',
  LE_AUDIO: 'CLASSIC',
};

/** Classic profile carrying each duty. */
export const CLASSIC_PROFILE_FOR_DUTY: Readonly<Record<AudioDuty, 'classic_media' | 'classic_call'>> = {
  MEDIA: 'classic_media',
  CALL: 'classic_call',
};

/** Role slot carrying each duty, per tier-1 group. */
export const DUTY_ROLES: Readonly<Record<AudioDuty, Record<TierOneGroup, Role>>> = {
  MEDIA: { CLASSIC: 'CLASSIC_MEDIA', LE_AUDIO: 'LE_AUDIO_MEDIA' },
  CALL: { CLASSIC: 'CLASSIC_CALL', LE_AUDIO: 'LE_AUDIO_CALL' },
};
