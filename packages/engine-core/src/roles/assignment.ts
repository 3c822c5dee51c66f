import type { AudioDuty, AudioMode, Capability } from '../types.js';

/** The duty the current mode favours: media in NORMAL, call in IN_CALL. */
export function preferredDuty(mode: AudioMode): AudioDuty {
  return mode === 'IN_CALL' ? 'CALL' : 'MEDIA';
}

/**
 * Mode-gated role assignment.
 *
 * Returns the duties a tier-1 device should occupy if activated, most preferred
 * first. A unified device carries both, ordered by mode; a single-duty device
 * carries only its own. Pure function: no side effects, deterministic.
 */
export function assignRoles(capability: Capability, mode: AudioMode): AudioDuty[] {
  switch (capability) {
    case 'media': return ['MEDIA'];
    case 'call': return ['CALL'];
    case 'unified': return mode === 'IN_CALL' ? ['CALL', 'MEDIA'] : ['MEDIA', 'CALL'];
  }
}

/**
 * Whether a newly connected device may take over from the sibling tier-1 group.
 * A device that cannot carry the mode's preferred duty leaves that duty to
 * whichever group already handles it.
 */
export function canPreempt(capability: Capability, mode: AudioMode): boolean {
  return assignRoles(capability, mode).includes(preferredDuty(mode));
}
