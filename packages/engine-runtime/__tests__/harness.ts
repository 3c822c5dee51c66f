import { vi } from 'vitest';
import type { AudioMode, DeviceId } from '@audio-arbiter/engine-core';
import { ActiveDeviceArbiter } from '../src/arbiter.js';
import type {
  AudioRoutingSystem,
  CommandResult,
  ConnectivityDatabase,
  LeHearingAidSignal,
  LeHearingAidSource,
  ProfileSignal,
  Unsubscribe,
} from '../src/collaborators/types.js';
import type { ArbiterConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';
import type { Logger } from '../src/logger.js';

export type LogRecord = Record<string, unknown>;

/** Logger that keeps every JSON line it writes. */
export function captureLogs(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  });
  return { logger, records };
}

/** Ranks devices by when they last connected on any profile. */
export class FakeConnectivityDatabase implements ConnectivityDatabase {
  private readonly order: DeviceId[] = [];

  touch(device: DeviceId): void {
    const index = this.order.indexOf(device);
    if (index !== -1) {
      this.order.splice(index, 1);
    }
    this.order.push(device);
  }

  mostRecentlyConnected(candidates: readonly DeviceId[]): DeviceId | null {
    for (let i = this.order.length - 1; i >= 0; i--) {
      if (candidates.includes(this.order[i])) {
        return this.order[i];
      }
    }
    return null;
  }
}

/**
 * Stand-in for one profile service. Fits both the media and call contracts,
 * answers every setActiveDevice() with true and never acknowledges on its own.
 */
export class FakeProfile {
  readonly setActiveDevice = vi.fn(
    (_device: DeviceId | null, _suppressNoise?: boolean): CommandResult => true,
  );
  private readonly listeners = new Set<(signal: ProfileSignal) => void>();
  private readonly connected: DeviceId[] = [];

  constructor(private readonly db: FakeConnectivityDatabase) {}

  get subscriberCount(): number {
    return this.listeners.size;
  }

  getFallbackDevice(): DeviceId | null {
    return this.db.mostRecentlyConnected(this.connected);
  }

  subscribe(listener: (signal: ProfileSignal) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  connect(device: DeviceId): void {
    if (!this.connected.includes(device)) {
      this.connected.push(device);
    }
    this.db.touch(device);
    this.emit({ type: 'connection_state_changed', device, previousState: 'DISCONNECTED', state: 'CONNECTED' });
  }

  disconnect(device: DeviceId): void {
    const index = this.connected.indexOf(device);
    if (index !== -1) {
      this.connected.splice(index, 1);
    }
    this.emit({ type: 'connection_state_changed', device, previousState: 'CONNECTED', state: 'DISCONNECTED' });
  }

  /** The service reports a new active device, e.g. after a user selection. */
  reportActive(device: DeviceId | null): void {
    if (device !== null) {
      this.db.touch(device);
    }
    this.emit({ type: 'active_device_changed', device });
  }

  private emit(signal: ProfileSignal): void {
    for (const listener of this.listeners) {
      listener(signal);
    }
  }
}

export class FakeLeHearingAidSource implements LeHearingAidSource {
  private readonly listeners = new Set<(signal: LeHearingAidSignal) => void>();

  subscribe(listener: (signal: LeHearingAidSignal) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  connect(device: DeviceId): void {
    this.emit({ type: 'connection_state_changed', device, previousState: 'DISCONNECTED', state: 'CONNECTED' });
  }

  disconnect(device: DeviceId): void {
    this.emit({ type: 'connection_state_changed', device, previousState: 'CONNECTED', state: 'DISCONNECTED' });
  }

  private emit(signal: LeHearingAidSignal): void {
    for (const listener of this.listeners) {
      listener(signal);
    }
  }
}

export class FakeAudioRouting implements AudioRoutingSystem {
  private readonly listeners = new Set<(mode: AudioMode) => void>();

  constructor(public mode: AudioMode = 'NORMAL') {}

  getMode(): AudioMode {
    return this.mode;
  }

  onModeChanged(listener: (mode: AudioMode) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  change(mode: AudioMode): void {
    this.mode = mode;
    for (const listener of this.listeners) {
      listener(mode);
    }
  }
}

export interface Harness {
  arbiter: ActiveDeviceArbiter;
  media: FakeProfile;
  call: FakeProfile;
  hearingAid: FakeProfile;
  le: FakeProfile;
  leHearingAid: FakeLeHearingAidSource;
  routing: FakeAudioRouting;
  records: LogRecord[];
  /** Forget every recorded setActiveDevice() call. */
  clearCalls(): void;
}

export interface HarnessOptions {
  mode?: AudioMode;
  config?: Partial<ArbiterConfig>;
  /** Leave out a collaborator entirely. */
  without?: ReadonlyArray<'media' | 'call' | 'hearingAid' | 'le'>;
}

/** A started arbiter wired to fakes for every collaborator. */
export function createHarness(options: HarnessOptions = {}): Harness {
  const db = new FakeConnectivityDatabase();
  const media = new FakeProfile(db);
  const call = new FakeProfile(db);
  const hearingAid = new FakeProfile(db);
  const le = new FakeProfile(db);
  const leHearingAid = new FakeLeHearingAidSource();
  const routing = new FakeAudioRouting(options.mode);
  const { logger, records } = captureLogs();
  const without = new Set(options.without ?? []);

  const arbiter = new ActiveDeviceArbiter(
    {
      collaborators: {
        classic_media: without.has('media') ? undefined : media,
        classic_call: without.has('call') ? undefined : call,
        hearing_aid: without.has('hearingAid') ? undefined : hearingAid,
        le_audio: without.has('le') ? undefined : le,
        le_hearing_aid: leHearingAid,
      },
      audioRouting: routing,
      logger,
      env: {},
    },
    options.config,
  );
  arbiter.start();

  return {
    arbiter,
    media,
    call,
    hearingAid,
    le,
    leHearingAid,
    routing,
    records,
    clearCalls() {
      for (const profile of [media, call, hearingAid, le]) {
        profile.setActiveDevice.mockClear();
      }
    },
  };
}
