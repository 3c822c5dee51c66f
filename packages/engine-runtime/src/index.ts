// Collaborator contracts
export type {
  ConnectionState,
  CommandResult,
  Unsubscribe,
  ProfileSignal,
  MediaCollaborator,
  CallCollaborator,
  LeHearingAidSignal,
  LeHearingAidSource,
  AudioRoutingSystem,
  ConnectivityDatabase,
  CollaboratorSet,
} from './collaborators/types.js';

// Arbiter
export { ActiveDeviceArbiter } from './arbiter.js';
export type { ArbiterDependencies } from './arbiter.js';

// Signals
export { classifySignal, inboundSignalSchema } from './signals/classifier.js';
export type { Classification, InboundSignal } from './signals/classifier.js';

// Queue + dispatch
export { SerialEventQueue } from './queue/serial-queue.js';
export type { SerialEventQueueOptions } from './queue/serial-queue.js';
export { CommandDispatcher } from './dispatch/dispatcher.js';
export type { CommandDispatcherOptions } from './dispatch/dispatcher.js';

// Configuration + logging
export { arbiterConfigSchema, parseConfig, loadConfig, ConfigError } from './config.js';
export type { ArbiterConfig, ArbiterConfigInput } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
