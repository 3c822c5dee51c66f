import type { ActiveDevices, ArbitrationState, ConnectionStack, Profile } from './types.js';
import { ArbiterError, PROFILES } from './types.js';

export function validateStack(stack: ConnectionStack): ArbiterError | null {
  const seen = new Set<string>();
  for (const entry of stack) {
    if (seen.has(entry.device)) {
      return ArbiterError.DUPLICATE_STACK_ENTRY;
    }
    seen.add(entry.device);
  }
  return null;
}

/** An active hearing aid excludes every tier-1 role. */
export function validateHearingAidExclusive(active: ActiveDevices): ArbiterError | null {
  if (active.HEARING_AID === null) {
    return null;
  }
  if (
    active.CLASSIC_MEDIA !== null ||
    active.CLASSIC_CALL !== null ||
    active.LE_AUDIO_MEDIA !== null ||
    active.LE_AUDIO_CALL !== null
  ) {
    return ArbiterError.HEARING_AID_NOT_EXCLUSIVE;
  }
  return null;
}

/** Classic and LE audio never share a duty. */
export function validateTierOneExclusive(active: ActiveDevices): ArbiterError | null {
  if (active.CLASSIC_MEDIA !== null && active.LE_AUDIO_MEDIA !== null) {
    return ArbiterError.TIER_ONE_OVERLAP;
  }
  if (active.CLASSIC_CALL !== null && active.LE_AUDIO_CALL !== null) {
    return ArbiterError.TIER_ONE_OVERLAP;
  }
  return null;
}

/** LE devices are unified: both LE roles always name the same device. */
export function validateLeRoles(active: ActiveDevices): ArbiterError | null {
  if (active.LE_AUDIO_MEDIA !== active.LE_AUDIO_CALL) {
    return ArbiterError.LE_ROLES_SPLIT;
  }
  return null;
}

/** Validate the arbitration invariants. Returns first violation found, or null. */
export function validateState(state: ArbitrationState): { error: ArbiterError; detail?: string } | null {
  for (const profile of PROFILES) {
    const sErr = validateStack(state.stacks[profile]);
    if (sErr) return { error: sErr, detail: describeStack(profile, state.stacks[profile]) };
  }

  const hErr = validateHearingAidExclusive(state.active);
  if (hErr) return { error: hErr, detail: `hearing_aid=${state.active.HEARING_AID}` };

  const tErr = validateTierOneExclusive(state.active);
  if (tErr) {
    const { CLASSIC_MEDIA, CLASSIC_CALL, LE_AUDIO_MEDIA, LE_AUDIO_CALL } = state.active;
    return {
      error: tErr,
      detail: `classic=${CLASSIC_MEDIA}/${CLASSIC_CALL} le=${LE_AUDIO_MEDIA}/${LE_AUDIO_CALL}`,
    };
  }

  const lErr = validateLeRoles(state.active);
  if (lErr) return { error: lErr };

  return null;
}

function describeStack(profile: Profile, stack: ConnectionStack): string {
  return `${profile}=[${stack.map((e) => e.device).join(',')}]`;
}
