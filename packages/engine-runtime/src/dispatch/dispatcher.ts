import { holderOf } from '@audio-arbiter/engine-core';
import type { ArbitrationState, Reassignment } from '@audio-arbiter/engine-core';
import type { CollaboratorSet, CommandResult } from '../collaborators/types.js';
import type { Logger } from '../logger.js';

export interface CommandDispatcherOptions {
  collaborators: CollaboratorSet;
  logger: Logger;
  /** Skip calls whose target already held the profile before the event. */
  dedupe: boolean;
}

/**
 * Turns reassignments into setActiveDevice() calls.
 *
 * Fire-and-forget: results are only observed to log refusals and failures.
 * Nothing is retried; later events re-assert the resolved state.
 */
export class CommandDispatcher {
  private readonly collaborators: CollaboratorSet;
  private readonly log: Logger;
  private readonly dedupe: boolean;

  constructor(options: CommandDispatcherOptions) {
    this.collaborators = options.collaborators;
    this.log = options.logger;
    this.dedupe = options.dedupe;
  }

  /** Issue calls in order. `previous` is the state before the event that produced them. */
  dispatch(reassignments: readonly Reassignment[], previous: ArbitrationState): number {
    let sent = 0;
    for (const reassignment of reassignments) {
      if (this.dedupe && holderOf(previous.active, reassignment.profile) === reassignment.device) {
        this.log.debug({ ...reassignment }, 'skipping redundant setActiveDevice');
        continue;
      }
      if (this.send(reassignment)) {
        sent++;
      }
    }
    return sent;
  }

  private send(reassignment: Reassignment): boolean {
    let result: CommandResult | null;
    try {
      result = this.invoke(reassignment);
    } catch (err) {
      this.log.error({ err, ...reassignment }, 'setActiveDevice threw');
      return false;
    }
    if (result === null) {
      return false;
    }

    this.log.debug({ ...reassignment }, 'setActiveDevice');
    void Promise.resolve(result).then(
      (ok) => {
        if (!ok) {
          this.log.warn({ ...reassignment }, 'setActiveDevice refused');
        }
      },
      (err: unknown) => {
        this.log.error({ err, ...reassignment }, 'setActiveDevice failed');
      },
    );
    return true;
  }

  /** Null when the profile has no collaborator. */
  private invoke({ profile, device, suppressNoise }: Reassignment): CommandResult | null {
    if (profile === 'classic_call') {
      const collaborator = this.collaborators.classic_call;
      return collaborator ? collaborator.setActiveDevice(device) : null;
    }
    const collaborator = this.collaborators[profile];
    return collaborator ? collaborator.setActiveDevice(device, suppressNoise) : null;
  }
}
