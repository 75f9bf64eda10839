export { MessageChannel } from "./message-channel";
export {
  classifyMessage,
  parseFrame,
  type StreamMessage,
  type StreamMessageKind,
} from "./message-classifier";
export { StreamDispatcher, type StreamHandlers } from "./stream-dispatcher";
export {
  createWsSocket,
  type StreamSocket,
  type StreamSocketFactory,
  type StreamSocketHandlers,
} from "./stream-socket";
export {
  StreamingClient,
  type ConnectionStatus,
  type StreamDataType,
  type StreamKind,
  type StreamingClientOptions,
  type Subscription,
} from "./streaming-client";
