export type UpstreamMessage =
  | { kind: 'text'; text: string }
  | { kind: 'binary'; data: Buffer };

export type ReceiveResult =
  | { kind: 'message'; message: UpstreamMessage }
  | { kind: 'closed'; code: number; reason: string }
  | { kind: 'timeout' };

export type KeepaliveSettings = {
  intervalMs: number;
  timeoutMs: number;
};

export type ConnectOptions = {
  handshakeTimeoutMs: number;
  /** Protocol-level pings; the connection is dropped when a pong is late. */
  keepalive?: KeepaliveSettings;
  signal: AbortSignal;
};

/**
 * One open WebSocket to the upstream source. A connection is never reopened;
 * the channels connect again instead.
 */
export interface UpstreamConnection {
  readonly id: number;
  readonly url: string;
  isOpen(): boolean;
  /** Next inbound frame, the close, or a timeout marker when `timeoutMs` elapses first. */
  receive(signal: AbortSignal, timeoutMs?: number): Promise<ReceiveResult>;
  /** Rejects with ConnectionClosedError once the socket is no longer open. */
  send(text: string): Promise<void>;
  /** True when a pong arrived within `timeoutMs`. */
  ping(timeoutMs: number): Promise<boolean>;
  close(code?: number, reason?: string): Promise<void>;
}

export interface UpstreamConnector {
  /**
   * Rejects with InvalidTargetError, ConnectTimeoutError, ConnectionRefusedError
   * or the transport error.
   */
  connect(url: string, options: ConnectOptions): Promise<UpstreamConnection>;
}
