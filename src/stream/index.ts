export { FrameDecoder, type Frame } from './components/FrameDecoder.js';
export { EventDecoder, type PayloadSchema } from './components/EventDecoder.js';
export {
  StreamingSession,
  type SessionCompletionHandler,
  type SessionState,
  type StreamingSessionOptions,
} from './StreamingSession.js';
export { SessionRegistry, type RegisteredSession } from './SessionRegistry.js';
