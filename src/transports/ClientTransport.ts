/**
 * Generic client-side transport interface.
 *
 * One transport instance carries one WebSocket session. It never reconnects on
 * its own; the shard creates a new transport for every connection attempt.
 */

export interface ClientTransport {
  /**
   * Whether currently connected.
   */
  readonly connected: boolean;

  /**
   * Open the WebSocket. Resolves once the handshake completes.
   */
  connect(url: string): Promise<void>;

  /**
   * Close the connection. Callbacks registered on this transport may still fire
   * for the closing handshake.
   */
  close(code?: number, reason?: string): void;

  /**
   * Send a text message.
   */
  send(text: string): void;

  /**
   * Register lifecycle callbacks.
   */
  onClose(cb: (code: number, reason: string) => void): void;
  onError(cb: (err: Error) => void): void;
  /** Text frames arrive as strings, binary (compressed) frames as Buffers. */
  onMessage(cb: (data: string | Buffer) => void): void;
}
