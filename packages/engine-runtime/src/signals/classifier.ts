import { z } from 'zod';
import { ArbiterError } from '@audio-arbiter/engine-core';
import type { ArbitrationEvent, AudioMode, Profile } from '@audio-arbiter/engine-core';
import type { ConnectionState } from '../collaborators/types.js';

// ─── Schemas ─────────────────────────────────────────────────

const PROFILE_VALUES = [
  'classic_media',
  'classic_call',
  'hearing_aid',
  'le_audio',
  'le_hearing_aid',
] as const satisfies readonly Profile[];

const CONNECTION_STATES = [
  'DISCONNECTED',
  'CONNECTING',
  'CONNECTED',
  'DISCONNECTING',
] as const satisfies readonly ConnectionState[];

const AUDIO_MODES = ['NORMAL', 'IN_CALL'] as const satisfies readonly AudioMode[];

const device = z.string().min(1);
const profile = z.enum(PROFILE_VALUES);
const connectionState = z.enum(CONNECTION_STATES);

export const inboundSignalSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('connection_state_changed'),
    profile,
    device,
    previousState: connectionState,
    state: connectionState,
  }),
  z.object({
    type: z.literal('active_device_changed'),
    profile,
    device: device.nullish(),
  }),
  z.object({
    type: z.literal('device_available'),
    profile: z.literal('le_hearing_aid'),
    device,
  }),
  z.object({
    type: z.literal('audio_mode_changed'),
    mode: z.enum(AUDIO_MODES),
  }),
  z.object({
    type: z.literal('wired_audio_connected'),
  }),
]);

export type InboundSignal = z.infer<typeof inboundSignalSchema>;

/** Outcome of classifying one raw signal. */
export type Classification =
  | { event: ArbitrationEvent }
  | { ignored: string }
  | { error: ArbiterError; detail: string };

// ─── Classification ──────────────────────────────────────────

function errorFor(issue: z.ZodIssue): ArbiterError {
  switch (issue.path[0]) {
    case 'type': return ArbiterError.UNSUPPORTED_SIGNAL;
    case 'profile': return ArbiterError.UNKNOWN_PROFILE;
    case 'device': return ArbiterError.MISSING_DEVICE;
    default: return ArbiterError.MALFORMED_SIGNAL;
  }
}

/**
 * Validate a raw signal and normalize it into an arbitration event.
 *
 * Connection-state transitions that neither enter nor leave CONNECTED are
 * ignored. On the LE hearing-aid source, entering CONNECTED means available
 * and leaving it means unavailable.
 */
export function classifySignal(raw: unknown): Classification {
  const parsed = inboundSignalSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return { error: errorFor(issue), detail: `${where}: ${issue.message}` };
  }

  const signal = parsed.data;
  switch (signal.type) {
    case 'connection_state_changed': {
      const entered = signal.state === 'CONNECTED' && signal.previousState !== 'CONNECTED';
      const left = signal.previousState === 'CONNECTED' && signal.state !== 'CONNECTED';
      if (!entered && !left) {
        return { ignored: `${signal.previousState} -> ${signal.state}` };
      }
      const source = signal.profile;
      if (source === 'le_hearing_aid') {
        return entered
          ? { event: { kind: 'available', device: signal.device } }
          : { event: { kind: 'unavailable', device: signal.device } };
      }
      return entered
        ? { event: { kind: 'connected', profile: source, device: signal.device } }
        : { event: { kind: 'disconnected', profile: source, device: signal.device } };
    }
    case 'active_device_changed': {
      const source = signal.profile;
      if (source === 'le_hearing_aid') {
        return { error: ArbiterError.UNSUPPORTED_SIGNAL, detail: 'le_hearing_aid has no active device' };
      }
      return { event: { kind: 'active_changed', profile: source, device: signal.device ?? null } };
    }
    case 'device_available':
      return { event: { kind: 'available', device: signal.device } };
    case 'audio_mode_changed':
      return { event: { kind: 'mode_changed', mode: signal.mode } };
    case 'wired_audio_connected':
      return { event: { kind: 'wired_audio_connected' } };
  }
}
