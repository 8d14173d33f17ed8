/**
 * Responder service
 *
 * Accepts connections on stdio or a WebSocket server and runs one
 * ResponderSession per connection. Backend slots are shared by every
 * connection, so the concurrency cap holds for the whole process.
 */

import type { IncomingMessage } from 'node:http';
import type { Readable, Writable } from 'node:stream';
import { WebSocketServer } from 'ws';
import { Logger } from '@fathom/shared/Utils/logger.js';
import { SubprocessBackend } from './backend/subprocess.js';
import type { ExecutionBackend } from './backend/types.js';
import { getConfig, type SandboxConfig } from './config.js';
import { ResponderSession } from './connection/responder.js';
import { StreamTransport, type Transport } from './connection/transport.js';
import {
  PROTOCOL_VERSION_HEADER,
  WebSocketTransport,
  parseVersionHeader,
} from './connection/websocket-transport.js';
import type { ExecutionSnapshot } from './execution/types.js';
import { ExecutionAuditLog } from './logging/writer.js';
import { ExecutionSlots } from './utils/execution-slots.js';

const logger = new Logger('fathom:server');

export interface StartResponderOptions {
  config?: SandboxConfig;
  backend?: ExecutionBackend;
  /** Audit log; null disables it (default: JSONL files in the configured log dir) */
  audit?: ExecutionAuditLog | null;
  /** Streams for the stdio transport (default: process.stdin / process.stdout) */
  stdio?: { input: Readable; output: Writable };
}

export interface ConnectionExecution extends ExecutionSnapshot {
  connection_id: string;
}

export interface ResponderServer {
  readonly transport: SandboxConfig['transport'];
  readonly sessions: ReadonlySet<ResponderSession>;
  /** Live executions across every connection */
  listExecutions(): ConnectionExecution[];
  /** Bound port for the WebSocket transport, null for stdio */
  port(): number | null;
  /** Resolves once every connection is gone */
  closed(): Promise<void>;
  close(reason?: string): Promise<void>;
}

function declaredVersion(request: IncomingMessage): number | undefined {
  return parseVersionHeader(request.headers[PROTOCOL_VERSION_HEADER]);
}

export async function startResponder(options: StartResponderOptions = {}): Promise<ResponderServer> {
  const config = options.config ?? getConfig();
  const backend = options.backend ?? new SubprocessBackend({
    sandboxDir: config.sandboxDir,
    maxProcesses: config.maxProcesses,
    maxFileSizeBytes: config.maxFileSizeBytes,
  });
  const audit = options.audit === undefined ? new ExecutionAuditLog(config.logDir) : options.audit;
  const slots = new ExecutionSlots(config.maxConcurrentExecutions, config.maxQueueDepth);

  const languages = config.languages.filter((language) => backend.languages.includes(language));
  const unavailable = config.languages.filter((language) => !backend.languages.includes(language));
  if (unavailable.length > 0) {
    logger.warn('Configured languages the backend cannot run', { languages: unavailable.join(',') });
  }

  const sessions = new Set<ResponderSession>();
  let resolveClosed: () => void = () => undefined;
  const allClosed = new Promise<void>((resolve) => {
    resolveClosed = resolve;
  });

  const attach = (transport: Transport): ResponderSession => {
    const session = new ResponderSession({
      transport,
      backend,
      slots,
      supportedVersions: config.supportedVersions,
      policy: {
        languages,
        maxTimeoutMs: config.maxTimeoutMs,
        maxMemoryMb: config.maxMemoryMb,
        maxCpuShares: config.maxCpuShares,
        maxOutputBytes: config.maxOutputBytes,
      },
      ...(audit ? { audit } : {}),
    });
    sessions.add(session);
    logger.info('Connection opened', { connectionId: session.connectionId, connections: sessions.size });
    session.onClose(() => {
      sessions.delete(session);
      if (config.transport === 'stdio') resolveClosed();
    });
    return session;
  };

  let wss: WebSocketServer | null = null;

  if (config.transport === 'stdio') {
    const input = options.stdio?.input ?? process.stdin;
    const output = options.stdio?.output ?? process.stdout;
    attach(new StreamTransport(input, output, { endWritable: false }));
  } else {
    const server = new WebSocketServer({
      host: config.host,
      port: config.port,
      verifyClient: (info, callback) => {
        const header = info.req.headers[PROTOCOL_VERSION_HEADER];
        const version = declaredVersion(info.req);
        if (header !== undefined && (version === undefined || !config.supportedVersions.includes(version))) {
          logger.warn('Refusing upgrade with unsupported protocol version', { header: String(header) });
          callback(false, 426, `Unsupported protocol version (supported: ${config.supportedVersions.join(', ')})`);
          return;
        }
        callback(true);
      },
    });
    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => resolve());
      server.once('error', reject);
    });
    server.on('error', (error) => {
      logger.error('WebSocket server error', error);
    });
    server.on('connection', (socket, request) => {
      attach(new WebSocketTransport(socket, declaredVersion(request)));
    });
    wss = server;
  }

  logger.info('Responder running', {
    transport: config.transport,
    languages: languages.join(','),
    versions: config.supportedVersions.join(','),
  });

  return {
    transport: config.transport,
    sessions,
    listExecutions() {
      return [...sessions].flatMap((session) =>
        session.listExecutions().map((snapshot) => ({ ...snapshot, connection_id: session.connectionId })),
      );
    },
    port() {
      if (!wss) return null;
      const address = wss.address();
      return typeof address === 'object' && address !== null ? address.port : null;
    },
    closed() {
      return allClosed;
    },
    async close(reason = 'responder shutting down') {
      for (const session of [...sessions]) {
        session.close(reason);
      }
      await backend.shutdown?.();
      if (wss) {
        const server = wss;
        wss = null;
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
      }
      resolveClosed();
    },
  };
}
