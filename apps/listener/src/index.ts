/**
 * @lumasync/listener
 *
 * Playback client for phones in the audience.
 */

export {
  ListenSession,
  createMediaSession,
  createFramesSession,
} from "./listen.js";
export type {
  ListenStatus,
  ListenSessionOptions,
  FrameStreamSource,
  MediaSessionConfig,
  FramesSessionConfig,
} from "./listen.js";

export { HttpStatusSource } from "./realtime/statusSource.js";
export { FrameStreamClient } from "./realtime/frameStreamClient.js";
export type {
  ConnectionStatus,
  FrameStreamClientOptions,
  FrameStreamListener,
} from "./realtime/frameStreamClient.js";

export { MediaElementAudioClient, mediaUrlFor } from "./audio/mediaClient.js";
export type { MediaElementLike, MediaClientOptions } from "./audio/mediaClient.js";

export { FramePlayer } from "./audio/framePlayer.js";
export type {
  FramePlayerOptions,
  PcmAudioContext,
  PcmAudioBuffer,
  PcmBufferSource,
} from "./audio/framePlayer.js";

export { base64ToBytes, decodePcmFrame } from "./audio/pcm.js";
