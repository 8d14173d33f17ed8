export * from './errors.js';
export * from './protocol/types.js';
export * from './protocol/schemas.js';
export { EnvelopeCodec, type DecodeResult } from './protocol/codec.js';
export { EnvelopeFactory } from './protocol/envelopes.js';

export type { ExecutionRequest, ExecutionResult, ExecState, ExecutionSnapshot } from './execution/types.js';
export { ExecutionStateMachine, type Transition, type OutputOutcome } from './execution/state-machine.js';
export { ExecutionRegistry, ExecutionHandle } from './execution/registry.js';
export { classifyExit, type ExitClassification } from './execution/exit-status.js';

export { DeadlineWatchdog } from './watchdog/deadline-watchdog.js';
export { ReconnectPolicy, type ReconnectPolicyOptions } from './reconnect/policy.js';

export { BaseTransport, StreamTransport, type Transport } from './connection/transport.js';
export {
  WebSocketTransport,
  connectWebSocket,
  parseVersionHeader,
  PROTOCOL_VERSION_HEADER,
} from './connection/websocket-transport.js';
export { ConnectionSession } from './connection/session.js';
export { ResponderSession, type ResponderPolicy, type ResponderSessionOptions } from './connection/responder.js';
export {
  InitiatorSession,
  type ExecuteInput,
  type ExecutionHandlers,
  type ExecutionOutcome,
  type ExecutionTicket,
} from './connection/initiator.js';

export { SandboxClient, type ClientState, type SandboxClientOptions, type TransportFactory } from './client/sandbox-client.js';
export { createWebSocketClient } from './client/connect.js';

export type { ExecutionBackend, BackendExit, BackendHandle, ExecutionSpec, OutputChunk } from './backend/types.js';
export { SubprocessBackend } from './backend/subprocess.js';
export { ExecutionAuditLog } from './logging/writer.js';
export { getConfig, resetConfig, type SandboxConfig } from './config.js';
export { startResponder, type ResponderServer, type StartResponderOptions } from './server.js';
