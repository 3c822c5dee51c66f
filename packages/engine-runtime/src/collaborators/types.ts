import type { AudioMode, DeviceId } from '@audio-arbiter/engine-core';

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED' | 'DISCONNECTING';

/** Outbound calls may answer synchronously or later. */
export type CommandResult = boolean | Promise<boolean>;

export type Unsubscribe = () => void;

/** Signals a profile collaborator reports about its own devices. */
export type ProfileSignal =
  | {
      type: 'connection_state_changed';
      device: DeviceId;
      previousState: ConnectionState;
      state: ConnectionState;
    }
  | { type: 'active_device_changed'; device: DeviceId | null };

interface ProfileCollaborator {
  /** The collaborator's own choice of device to fall back to, if any. */
  getFallbackDevice(): DeviceId | null;
  subscribe(listener: (signal: ProfileSignal) => void): Unsubscribe;
}

/** classic_media, hearing_aid and le_audio. */
export interface MediaCollaborator extends ProfileCollaborator {
  setActiveDevice(device: DeviceId | null, suppressNoise: boolean): CommandResult;
}

/** classic_call takes no noise flag. */
export interface CallCollaborator extends ProfileCollaborator {
  setActiveDevice(device: DeviceId | null): CommandResult;
}

export type LeHearingAidSignal =
  | {
      type: 'connection_state_changed';
      device: DeviceId;
      previousState: ConnectionState;
      state: ConnectionState;
    }
  | { type: 'device_available'; device: DeviceId };

/** Announces LE hearing-aid capability. Never commanded. */
export interface LeHearingAidSource {
  subscribe(listener: (signal: LeHearingAidSignal) => void): Unsubscribe;
}

export interface AudioRoutingSystem {
  getMode(): AudioMode;
  onModeChanged(listener: (mode: AudioMode) => void): Unsubscribe;
}

/** Connection history shared by collaborators to rank their fallback candidates. */
export interface ConnectivityDatabase {
  mostRecentlyConnected(candidates: readonly DeviceId[]): DeviceId | null;
}

/** A missing entry disables that profile. */
export interface CollaboratorSet {
  classic_media?: MediaCollaborator;
  classic_call?: CallCollaborator;
  hearing_aid?: MediaCollaborator;
  le_audio?: MediaCollaborator;
  le_hearing_aid?: LeHearingAidSource;
}
