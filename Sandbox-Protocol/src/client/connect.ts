import { getConfig, type SandboxConfig } from '../config.js';
import { connectWebSocket } from '../connection/websocket-transport.js';
import { SandboxClient, type SandboxClientOptions } from './sandbox-client.js';

/**
 * SandboxClient for a WebSocket responder, with reconnect, keepalive and
 * timeout grace taken from the environment config unless overridden.
 */
export function createWebSocketClient(
  url: string,
  overrides: Partial<SandboxClientOptions> = {},
  config: SandboxConfig = getConfig(),
): SandboxClient {
  return new SandboxClient({
    connect: (version) => connectWebSocket(url, { version }),
    reconnect: { baseDelayMs: config.reconnectBaseMs, maxDelayMs: config.reconnectMaxMs },
    pingIntervalMs: config.pingIntervalMs,
    pingTimeoutMs: config.pingTimeoutMs,
    timeoutGraceMs: config.timeoutGraceMs,
    ...overrides,
  });
}
