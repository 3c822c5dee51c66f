import {
  ACTIVATABLE_PROFILES,
  createInitialState,
  resolve,
  validateState,
} from '@audio-arbiter/engine-core';
import type {
  ActivatableProfile,
  ArbitrationEvent,
  ArbitrationState,
  AudioMode,
  DeviceId,
  ResolverContext,
  Role,
} from '@audio-arbiter/engine-core';
import type { AudioRoutingSystem, CollaboratorSet, Unsubscribe } from './collaborators/types.js';
import { loadConfig } from './config.js';
import type { ArbiterConfig } from './config.js';
import { CommandDispatcher } from './dispatch/dispatcher.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { SerialEventQueue } from './queue/serial-queue.js';
import { classifySignal } from './signals/classifier.js';

export interface ArbiterDependencies {
  collaborators: CollaboratorSet;
  audioRouting: AudioRoutingSystem;
  /** Defaults to a root logger at the configured level. */
  logger?: Logger;
  /** Environment read for configuration. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Active device arbiter.
 *
 * Owns the arbitration state. Every inbound signal is classified, queued and
 * resolved by a single worker; the resulting reassignments go out through the
 * dispatcher without waiting for answers.
 */
export class ActiveDeviceArbiter {
  readonly config: ArbiterConfig;

  private state: ArbitrationState = createInitialState();
  private readonly collaborators: CollaboratorSet;
  private readonly audioRouting: AudioRoutingSystem;
  private readonly enabled: ReadonlySet<ActivatableProfile>;
  private readonly context: ResolverContext;
  private queue: SerialEventQueue<ArbitrationEvent>;
  private readonly dispatcher: CommandDispatcher;
  private readonly log: Logger;
  private subscriptions: Unsubscribe[] = [];
  private started = false;

  /** `config` overrides values read from the environment. */
  constructor(deps: ArbiterDependencies, config: Partial<ArbiterConfig> = {}) {
    this.config = { ...loadConfig(deps.env), ...config };
    this.collaborators = deps.collaborators;
    this.audioRouting = deps.audioRouting;

    const root = deps.logger ?? createLogger({ level: this.config.logLevel });
    this.log = root.child({ component: 'arbiter' });

    const disabled = new Set<ActivatableProfile>(this.config.disabledProfiles);
    this.enabled = new Set(
      ACTIVATABLE_PROFILES.filter((p) => this.collaborators[p] !== undefined && !disabled.has(p)),
    );
    this.context = {
      fallbackDevice: (profile) => this.collaborators[profile]?.getFallbackDevice() ?? null,
      enabled: this.enabled,
    };

    this.dispatcher = new CommandDispatcher({
      collaborators: this.collaborators,
      logger: root.child({ component: 'dispatcher' }),
      dedupe: this.config.dedupeCommands,
    });
    this.queue = this.createQueue();
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  /**
   * Seed the audio mode and subscribe to every enabled source.
   * After cleanup() the arbiter starts over from an empty state.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    if (this.queue.isClosed) {
      this.queue = this.createQueue();
      this.state = createInitialState();
    }
    // Queued so that events submitted earlier resolve against the mode they saw.
    const mode = this.audioRouting.getMode();
    this.enqueue({ kind: 'mode_changed', mode });

    for (const profile of this.enabled) {
      const collaborator = this.collaborators[profile];
      if (collaborator) {
        this.subscriptions.push(
          collaborator.subscribe((signal) => {
            this.submit({ ...signal, profile });
          }),
        );
      }
    }
    const leHearingAid = this.collaborators.le_hearing_aid;
    if (leHearingAid) {
      this.subscriptions.push(
        leHearingAid.subscribe((signal) => {
          this.submit({ ...signal, profile: 'le_hearing_aid' });
        }),
      );
    }
    this.subscriptions.push(
      this.audioRouting.onModeChanged((mode) => {
        this.submit({ type: 'audio_mode_changed', mode });
      }),
    );

    this.log.info({ enabled: [...this.enabled], mode }, 'arbiter started');
  }

  /** Unsubscribe from every source and drop pending events. */
  cleanup(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
    this.queue.close();
    this.started = false;
    this.log.info('arbiter stopped');
  }

  /** Resolves once every event submitted so far has been processed. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // ─── Inbound ─────────────────────────────────────────────────

  /**
   * Classify and enqueue a raw signal.
   * Returns false when the signal was dropped.
   */
  submit(signal: unknown): boolean {
    const classification = classifySignal(signal);
    if ('error' in classification) {
      this.log.warn({ code: classification.error, detail: classification.detail }, 'dropping malformed signal');
      return false;
    }
    if ('ignored' in classification) {
      this.log.debug({ transition: classification.ignored }, 'ignoring transition');
      return false;
    }
    const { event } = classification;
    if ('profile' in event && !this.enabled.has(event.profile)) {
      this.log.warn({ profile: event.profile, kind: event.kind }, 'dropping signal from disabled profile');
      return false;
    }
    return this.enqueue(event);
  }

  wiredAudioDeviceConnected(): boolean {
    return this.enqueue({ kind: 'wired_audio_connected' });
  }

  // ─── Queries ─────────────────────────────────────────────────

  getActiveDevice(role: Role): DeviceId | null {
    return this.state.active[role];
  }

  getAudioMode(): AudioMode {
    return this.state.mode;
  }

  snapshot(): ArbitrationState {
    return this.state;
  }

  // ─── Worker ──────────────────────────────────────────────────

  private createQueue(): SerialEventQueue<ArbitrationEvent> {
    return new SerialEventQueue<ArbitrationEvent>({
      worker: (event) => this.process(event),
      onError: (err, event) => this.log.error({ err, event }, 'event processing failed'),
    });
  }

  private enqueue(event: ArbitrationEvent): boolean {
    if (!this.queue.enqueue(event)) {
      this.log.warn({ event }, 'arbiter stopped, dropping event');
      return false;
    }
    return true;
  }

  private process(event: ArbitrationEvent): void {
    const previous = this.state;
    const { state, reassignments } = resolve(previous, event, this.context);
    this.state = state;

    const violation = validateState(state);
    if (violation) {
      this.log.error({ event, ...violation }, 'arbitration invariant violated');
    }
    this.log.debug({ event, reassignments }, 'event resolved');
    this.dispatcher.dispatch(reassignments, previous);
  }
}
