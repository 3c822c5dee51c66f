import { canPreempt, preferredDuty } from '../roles/assignment.js';
import {
  containsDevice,
  pushDevice,
  removeDevice,
  sequenceOf,
  stackTail,
} from '../stack/connection-stack.js';
import {
  ACTIVATABLE_PROFILES,
  type ActivatableProfile,
  type ArbitrationEvent,
  type ArbitrationState,
  type AudioDuty,
  type AudioMode,
  type ConnectionStack,
  type DeviceId,
  type Profile,
  type Reassignment,
  type Role,
} from '../types.js';
import { hearingTierHeld, holderOf, isMarked } from './state.js';
import {
  CLASSIC_PROFILE_FOR_DUTY,
  DUTY_ROLES,
  PROFILE_SPECS,
  SIBLING_GROUP,
  type TierOneGroup,
} from './table.js';
import type { ClassicProfile, FallbackCandidate, Resolution, ResolverContext } from './types.js';

/** Working copy of the state for one resolution step. Never escapes `resolve`. */
interface Draft {
  active: Record<Role, DeviceId | null>;
  stacks: Record<Profile, ConnectionStack>;
  mode: AudioMode;
  sequence: number;
  reassignments: Reassignment[];
}

/**
 * Priority Resolver: apply one event to the arbitration state.
 *
 * Returns the next state plus the setActiveDevice() calls needed to reach it.
 * Pure function: the input state is not mutated and the only outside input is
 * the classic collaborators' fallback ranking exposed through `ctx`.
 *
 * Decision table (by event kind):
 * - connected       → activate unless tier 0 is held or mode gating defers; release conflicting groups
 * - disconnected    → if the device was active, walk the fallback chain (own group, tier 0, sibling tier 1)
 * - active_changed  → record without commanding the reporter; release conflicting groups
 * - available       → mark LE hearing-aid capability
 * - unavailable     → clear the mark
 * - mode_changed    → hand the mode's preferred duty between tier-1 groups
 * - wired_audio_connected → release every profile
 */
export function resolve(
  state: ArbitrationState,
  event: ArbitrationEvent,
  ctx: ResolverContext,
): Resolution {
  const draft: Draft = {
    active: { ...state.active },
    stacks: { ...state.stacks },
    mode: state.mode,
    sequence: state.sequence,
    reassignments: [],
  };

  switch (event.kind) {
    case 'connected':
      onConnected(draft, event.profile, event.device);
      break;
    case 'disconnected':
      onDisconnected(draft, event.profile, event.device, ctx);
      break;
    case 'active_changed':
      onActiveChanged(draft, event.profile, event.device);
      break;
    case 'available':
      draft.stacks.le_hearing_aid = pushDevice(draft.stacks.le_hearing_aid, event.device, nextSeq(draft));
      break;
    case 'unavailable':
      draft.stacks.le_hearing_aid = removeDevice(draft.stacks.le_hearing_aid, event.device);
      break;
    case 'mode_changed':
      onModeChanged(draft, event.mode, ctx);
      break;
    case 'wired_audio_connected':
      onWiredAudioConnected(draft);
      break;
  }

  return {
    state: {
      active: draft.active,
      mode: draft.mode,
      stacks: draft.stacks,
      sequence: draft.sequence,
    },
    reassignments: draft.reassignments.filter((r) => ctx.enabled.has(r.profile)),
  };
}

// ─── Event handlers ──────────────────────────────────────────

function onConnected(draft: Draft, profile: ActivatableProfile, device: DeviceId): void {
  draft.stacks[profile] = pushDevice(draft.stacks[profile], device, nextSeq(draft));

  const tierZero = isTierZero(draft, profile, device);
  if (!tierZero) {
    // Tier 0 keeps priority over new tier-1 connections.
    if (hearingTierHeld(draft.active, draft.stacks)) {
      return;
    }
    const spec = PROFILE_SPECS[profile];
    const sibling = SIBLING_GROUP[spec.group];
    if (
      sibling !== null &&
      !canPreempt(spec.capability, draft.mode) &&
      holdsDuty(draft, sibling, preferredDuty(draft.mode))
    ) {
      return;
    }
  }

  activate(draft, profile, device);
  releaseConflicts(draft, profile, tierZero);
}

function onDisconnected(
  draft: Draft,
  profile: ActivatableProfile,
  device: DeviceId,
  ctx: ResolverContext,
): void {
  const wasActive = holderOf(draft.active, profile) === device;
  draft.stacks[profile] = removeDevice(draft.stacks[profile], device);
  if (!wasActive) {
    return;
  }

  const candidate =
    ownGroupFallback(draft, profile, device, ctx) ??
    hearingTierFallback(draft, device) ??
    tierOneFallback(draft, profile, device, ctx);

  if (!candidate) {
    release(draft, profile, false);
    return;
  }
  commit(draft, candidate);
}

function onActiveChanged(draft: Draft, profile: ActivatableProfile, device: DeviceId | null): void {
  // Acknowledgment of a state we already hold.
  if (holderOf(draft.active, profile) === device) {
    return;
  }
  if (device === null) {
    setHolder(draft, profile, null);
    return;
  }

  draft.stacks[profile] = pushDevice(draft.stacks[profile], device, nextSeq(draft));
  // The reporting profile already knows; only the other profiles are commanded.
  setHolder(draft, profile, device);
  releaseConflicts(draft, profile, isTierZero(draft, profile, device));
}

function onModeChanged(draft: Draft, mode: AudioMode, ctx: ResolverContext): void {
  if (mode === draft.mode) {
    return;
  }
  draft.mode = mode;
  if (hearingTierHeld(draft.active, draft.stacks)) {
    return;
  }

  const duty = preferredDuty(mode);
  if (holderOf(draft.active, 'le_audio') !== null) {
    const classic = classicCandidate(draft, duty, null, ctx);
    if (classic) {
      commit(draft, classic);
    }
    return;
  }

  const classicActive =
    holderOf(draft.active, 'classic_media') !== null || holderOf(draft.active, 'classic_call') !== null;
  if (!classicActive || holdsDuty(draft, 'CLASSIC', duty)) {
    return;
  }
  const candidate = mostRecent([
    classicCandidate(draft, duty, null, ctx),
    leCandidate(draft, null),
  ]);
  if (candidate) {
    commit(draft, candidate);
  }
}

function onWiredAudioConnected(draft: Draft): void {
  for (const profile of ACTIVATABLE_PROFILES) {
    setHolder(draft, profile, null);
    draft.reassignments.push({ profile, device: null, suppressNoise: false });
  }
}

// ─── Fallback chain ──────────────────────────────────────────

function ownGroupFallback(
  draft: Draft,
  profile: ActivatableProfile,
  leaving: DeviceId,
  ctx: ResolverContext,
): FallbackCandidate | null {
  switch (profile) {
    case 'hearing_aid': {
      const entry = stackTail(draft.stacks.hearing_aid, (d) => d !== leaving);
      return entry ? { profiles: ['hearing_aid'], device: entry.device, seq: entry.seq, tierZero: true } : null;
    }
    case 'le_audio': {
      // A marked device keeps precedence within its own group.
      const marked = stackTail(draft.stacks.le_audio, (d) => d !== leaving && isMarked(draft.stacks, d));
      if (marked) {
        return { profiles: ['le_audio'], device: marked.device, seq: marked.seq, tierZero: true };
      }
      return leCandidate(draft, leaving);
    }
    case 'classic_media':
    case 'classic_call': {
      const device = classicFallback(profile, leaving, ctx);
      if (device === null) {
        return null;
      }
      return { profiles: [profile], device, seq: sequenceOf(draft.stacks[profile], device), tierZero: false };
    }
  }
}

function hearingTierFallback(draft: Draft, leaving: DeviceId): FallbackCandidate | null {
  const hearingAid = stackTail(draft.stacks.hearing_aid, (d) => d !== leaving);
  const leHearingAid = stackTail(draft.stacks.le_audio, (d) => d !== leaving && isMarked(draft.stacks, d));
  return mostRecent([
    hearingAid ? { profiles: ['hearing_aid'], device: hearingAid.device, seq: hearingAid.seq, tierZero: true } : null,
    leHearingAid ? { profiles: ['le_audio'], device: leHearingAid.device, seq: leHearingAid.seq, tierZero: true } : null,
  ]);
}

/** Cross-group tier-1 fallback; ties between both groups go to the most recent connection. */
function tierOneFallback(
  draft: Draft,
  profile: ActivatableProfile,
  leaving: DeviceId,
  ctx: ResolverContext,
): FallbackCandidate | null {
  const group = PROFILE_SPECS[profile].group;
  const duty = preferredDuty(draft.mode);
  return mostRecent([
    group !== 'LE_AUDIO' ? leCandidate(draft, leaving) : null,
    group !== 'CLASSIC' ? classicCandidate(draft, duty, leaving, ctx) : null,
  ]);
}

function leCandidate(draft: Draft, leaving: DeviceId | null): FallbackCandidate | null {
  const entry = stackTail(draft.stacks.le_audio, (d) => d !== leaving);
  if (!entry) {
    return null;
  }
  return {
    profiles: ['le_audio'],
    device: entry.device,
    seq: entry.seq,
    tierZero: isMarked(draft.stacks, entry.device),
  };
}

/**
 * Classic candidate for a duty. A combo device that is also connected on the
 * other classic profile takes both.
 */
function classicCandidate(
  draft: Draft,
  duty: AudioDuty,
  leaving: DeviceId | null,
  ctx: ResolverContext,
): FallbackCandidate | null {
  const profile = CLASSIC_PROFILE_FOR_DUTY[duty];
  const device = classicFallback(profile, leaving, ctx);
  if (device === null) {
    return null;
  }
  const other: ClassicProfile = profile === 'classic_media' ? 'classic_call' : 'classic_media';
  const profiles: ActivatableProfile[] = [profile];
  if (ctx.enabled.has(other) && containsDevice(draft.stacks[other], device)) {
    profiles.push(other);
  }
  return { profiles, device, seq: sequenceOf(draft.stacks[profile], device), tierZero: false };
}

function classicFallback(
  profile: ClassicProfile,
  leaving: DeviceId | null,
  ctx: ResolverContext,
): DeviceId | null {
  if (!ctx.enabled.has(profile)) {
    return null;
  }
  const device = ctx.fallbackDevice(profile);
  // A collaborator that still reports the departing device has nothing else to offer.
  return device === leaving ? null : device;
}

function mostRecent(candidates: (FallbackCandidate | null)[]): FallbackCandidate | null {
  let best: FallbackCandidate | null = null;
  for (const candidate of candidates) {
    if (candidate && (best === null || candidate.seq > best.seq)) {
      best = candidate;
    }
  }
  return best;
}

// ─── State helpers ───────────────────────────────────────────

function nextSeq(draft: Draft): number {
  draft.sequence += 1;
  return draft.sequence;
}

function isTierZero(draft: Draft, profile: ActivatableProfile, device: DeviceId): boolean {
  return PROFILE_SPECS[profile].tier === 0 || (profile === 'le_audio' && isMarked(draft.stacks, device));
}

function holdsDuty(draft: Draft, group: TierOneGroup, duty: AudioDuty): boolean {
  return draft.active[DUTY_ROLES[duty][group]] !== null;
}

function setHolder(draft: Draft, profile: ActivatableProfile, device: DeviceId | null): void {
  for (const role of PROFILE_SPECS[profile].roles) {
    draft.active[role] = device;
  }
}

function activate(draft: Draft, profile: ActivatableProfile, device: DeviceId): void {
  setHolder(draft, profile, device);
  draft.reassignments.push({ profile, device, suppressNoise: false });
}

/** Clear a profile if it holds a device. */
function release(draft: Draft, profile: ActivatableProfile, suppressNoise: boolean): void {
  if (holderOf(draft.active, profile) === null) {
    return;
  }
  setHolder(draft, profile, null);
  draft.reassignments.push({ profile, device: null, suppressNoise });
}

/**
 * Release every active profile that cannot coexist with `profile`.
 * Tier 0 clears everything else; tier 1 clears the hearing aid and the sibling group.
 * Each release is a hand-off, so noise is suppressed.
 */
function releaseConflicts(draft: Draft, profile: ActivatableProfile, tierZero: boolean): void {
  const group = PROFILE_SPECS[profile].group;
  for (const other of ACTIVATABLE_PROFILES) {
    if (other === profile) {
      continue;
    }
    const otherGroup = PROFILE_SPECS[other].group;
    if (tierZero || otherGroup === 'HEARING_AID' || otherGroup === SIBLING_GROUP[group]) {
      release(draft, other, true);
    }
  }
}

function commit(draft: Draft, candidate: FallbackCandidate): void {
  for (const profile of candidate.profiles) {
    activate(draft, profile, candidate.device);
  }
  releaseConflicts(draft, candidate.profiles[0], candidate.tierZero);
}
