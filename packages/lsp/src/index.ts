export * from './config.js';
export * from './errors.js';
export type * from './types.js';
export { DebugLogger } from './debug/DebugLogger.js';
export type { DebugSettings, LogLevel } from './debug/types.js';
export { FrameDecoder, FrameError, encodeFrame } from './transport/framing.js';
export { FramedTransport } from './transport/framed-transport.js';
export {
  decodeMessage,
  encodeMessage,
  type JsonRpcId,
  type Message,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
} from './transport/codec.js';
export {
  CANCEL_REQUEST_METHOD,
  RequestMultiplexer,
  type PendingCallInfo,
} from './rpc/multiplexer.js';
export {
  InboundDispatcher,
  type NotificationListener,
  type RequestContext,
  type RequestHandler,
} from './rpc/dispatcher.js';
export {
  FEATURE_CAPABILITIES,
  supportsFeature,
  type FeatureMethod,
} from './service/capabilities.js';
export {
  DiagnosticsStore,
  type DiagnosticsSnapshot,
  type WaitForDiagnosticsOptions,
} from './service/diagnostics.js';
export {
  buildInitializeParams,
  fromFileUri,
  loadInitializeTemplate,
  renderInitializeParams,
  toFileUri,
  type InitializeTemplate,
} from './service/initialize-params.js';
export { launchSession } from './service/launch.js';
export { ProcessSupervisor } from './service/process-supervisor.js';
export type { ActiveProgress } from './service/progress.js';
export {
  LspSession,
  type FeatureResults,
  type ServerInfo,
  type StateChangeListener,
} from './service/session.js';
