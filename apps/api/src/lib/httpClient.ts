import http from 'node:http';
import https from 'node:https';
import net from 'node:net';
import axios from 'axios';
import type { AxiosInstance } from 'axios';

export interface HttpTimeouts {
  connectMs: number;
  readMs: number;
  writeMs: number;
  poolMs: number;
}

export const DEFAULT_TIMEOUTS: HttpTimeouts = {
  connectMs: 10_000,
  readMs: 30_000,
  writeMs: 10_000,
  poolMs: 5_000,
};

export const POOL_LIMITS = {
  maxConnections: 100,
  maxKeepAliveConnections: 20,
};

export interface HttpClient {
  instance: AxiosInstance;
  timeouts: HttpTimeouts;
  /** Overall budget for one request, connect through last byte. */
  deadlineMs: number;
  close(): void;
}

export function totalDeadline(timeouts: HttpTimeouts): number {
  return timeouts.connectMs + timeouts.readMs + timeouts.writeMs + timeouts.poolMs;
}

/** The parts of a freshly created socket the connect timer touches. */
export interface PendingSocket {
  once(event: 'connect' | 'secureConnect' | 'close', listener: () => void): unknown;
  destroy(error?: Error): unknown;
}

/**
 * Destroys `socket` unless `readyEvent` fires within `connectMs`.
 * For TLS the ready event is `secureConnect`, so the handshake counts too.
 */
export function armConnectTimeout(
  socket: PendingSocket,
  connectMs: number,
  readyEvent: 'connect' | 'secureConnect'
): void {
  const timer = setTimeout(() => {
    socket.destroy(new Error(`Connect timeout after ${connectMs}ms`));
  }, connectMs);
  timer.unref();

  const disarm = (): void => clearTimeout(timer);
  socket.once(readyEvent, disarm);
  socket.once('close', disarm);
}

// Sockets handed back from the keep-alive pool never pass through here
function limitConnectTime(
  agent: http.Agent,
  connectMs: number,
  readyEvent: 'connect' | 'secureConnect'
): void {
  const create = agent.createConnection.bind(agent);
  agent.createConnection = (options, callback) => {
    const socket = create(options, callback);
    if (socket instanceof net.Socket) {
      armConnectTimeout(socket, connectMs, readyEvent);
    }
    return socket;
  };
}

/**
 * Shared outbound client: one keep-alive pool per protocol, TLS verified,
 * redirects followed. Every status resolves; callers decide what counts as failure.
 *
 * `connectMs` bounds each new connection and `readMs` is the socket inactivity
 * timeout. Waiting for a pooled socket and writing the body are bounded only by
 * `deadlineMs`, which the caller applies as an abort signal.
 */
export function createHttpClient(timeouts: HttpTimeouts = DEFAULT_TIMEOUTS): HttpClient {
  const agentOptions = {
    keepAlive: true,
    maxSockets: POOL_LIMITS.maxConnections,
    maxFreeSockets: POOL_LIMITS.maxKeepAliveConnections,
  };
  const httpAgent = new http.Agent(agentOptions);
  const httpsAgent = new https.Agent({ ...agentOptions, rejectUnauthorized: true });
  limitConnectTime(httpAgent, timeouts.connectMs, 'connect');
  limitConnectTime(httpsAgent, timeouts.connectMs, 'secureConnect');

  const instance = axios.create({
    httpAgent,
    httpsAgent,
    timeout: timeouts.readMs,
    maxRedirects: 5,
    responseType: 'text',
    // Leave bodies as text; the router parses them itself
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
  });

  return {
    instance,
    timeouts,
    deadlineMs: totalDeadline(timeouts),
    close() {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
