/**
 * Public entry point: animation model, device protocol, device session and
 * the persistence and React helpers built on them.
 */

export * from './config/deviceConfig';
export * from './types/palette';
export type * from './types/animation';
export type * from './types/device';

export { Frame, type ReadonlyFrame } from './engine/frame';
export { AnimationSequence, clampFrameDelay, type FrameSource } from './engine/animationSequence';
export { PadAddressMap } from './engine/padAddressMap';
export {
  ALL_OFF_GRID,
  DeviceProtocolEncoder,
  InvalidGridLengthError,
  InvalidPadIndexError,
  messagesOf,
  type EncoderOptions,
} from './engine/deviceProtocol';

export {
  DeviceDisconnectedError,
  DeviceSession,
  isConnectionLostError,
  type DeviceSessionOptions,
} from './services/DeviceSession';
export { PlaybackDriver } from './services/PlaybackDriver';
export { createKeywordPortSelector } from './services/portSelection';

export {
  animationFilePath,
  deleteAnimationFile,
  listAnimationFiles,
  loadAnimationFile,
  readAnimationFile,
  saveAnimationFile,
} from './utils/animationPersistence';
export {
  LayoutLibrary,
  sanitizeLayoutName,
  type LayoutEntry,
  type LayoutLibraryEvent,
  type LayoutLibraryListener,
} from './utils/layoutLibrary';
export { exportAnimationToMidi } from './utils/midiExport';

export { useAnimationSequence, type AnimationSequenceSnapshot } from './hooks/useAnimationSequence';
export { useDeviceSession, type UseDeviceSessionReturn } from './hooks/useDeviceSession';
