/**
 * Socket Session
 *
 * One WebSocket connection, split once into a sending half and a receiving
 * half so one task can write while another reads. Neither half touches the
 * other's state after the split.
 *
 * Lifecycle, tracked by the sender and advanced only by explicit calls:
 *
 *   connected → authenticating → authenticated → subscribed | listening → closed
 *
 * The session never waits for the server to acknowledge anything. Callers
 * watch the receive side for the authorization or subscription reply.
 *
 * Endpoints used by this library:
 * - Market data: wss://stream.data.alpaca.markets/v2/{iex|sip}
 * - Order updates: wss://paper-api.alpaca.markets/stream, wss://api.alpaca.markets/stream
 */

import { randomUUID } from "node:crypto";
import { ProtocolError, TransportError } from "@tickline/domain";
import { type Logger, withConnectionContext } from "@tickline/logger";
import WebSocket from "ws";
import { FrameQueue } from "./frame-queue.js";
import { log as defaultLog } from "./logger.js";

// ============================================
// Types
// ============================================

export type SessionState =
  | "connected"
  | "authenticating"
  | "authenticated"
  | "subscribed"
  | "listening"
  | "closed";

/** One decoded message, or the reason a message could not be decoded */
export type FrameResult<R> = { ok: true; value: R } | { ok: false; error: ProtocolError };

/**
 * Wire format of a session. `encode` returns a string for a text frame or
 * a Buffer for a binary frame. `decode` returns one result per message in
 * the frame; a frame that cannot be read at all yields a single failure.
 */
export interface FrameCodec<A, R> {
  encode(action: A): string | Buffer;
  decode(data: Buffer, isBinary: boolean): FrameResult<R>[];
}

/**
 * What `stream()` does with a frame that failed to decode:
 * - terminate: the stream rejects with the ProtocolError
 * - skip: the frame is logged at warn and dropped
 *
 * `frames()` hands every failure to the caller instead.
 */
export type MalformedFramePolicy = "terminate" | "skip";

export interface SocketSessionOptions<A, R> {
  codec: FrameCodec<A, R>;
  /** Extra headers for the upgrade request */
  headers?: Record<string, string>;
  malformedFrames?: MalformedFramePolicy;
  logger?: Logger;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

function decodeFrame<R>(codec: FrameCodec<unknown, R>, data: Buffer, isBinary: boolean): FrameResult<R>[] {
  try {
    return codec.decode(data, isBinary);
  } catch (error) {
    const protocolError =
      error instanceof ProtocolError
        ? error
        : new ProtocolError("Frame could not be decoded", "MALFORMED_FRAME", { cause: error });
    return [{ ok: false, error: protocolError }];
  }
}

// ============================================
// Session
// ============================================

export class SocketSession<A, R> {
  private consumed = false;

  private constructor(
    private readonly ws: WebSocket,
    private readonly inbound: FrameQueue<FrameResult<R>>,
    private readonly options: SocketSessionOptions<A, R>,
    private readonly logger: Logger
  ) {}

  /**
   * Open a connection. Frames are buffered from this point on, so nothing
   * sent by the server before the caller starts reading is lost.
   *
   * @throws {TransportError} If the connection cannot be established
   */
  static connect<A, R>(url: string, options: SocketSessionOptions<A, R>): Promise<SocketSession<A, R>> {
    const logger = withConnectionContext(options.logger ?? defaultLog, {
      url,
      connectionId: randomUUID(),
    });
    const inbound = new FrameQueue<FrameResult<R>>();

    return new Promise((resolve, reject) => {
      let opened = false;
      const ws = new WebSocket(url, { headers: options.headers });

      ws.on("message", (data, isBinary) => {
        for (const result of decodeFrame(options.codec, toBuffer(data), isBinary)) {
          inbound.push(result);
        }
      });

      ws.on("error", (error) => {
        if (!opened) {
          logger.error({ error: error.message }, "WebSocket connect failed");
          reject(new TransportError(`Failed to connect to ${url}: ${error.message}`, { cause: error }));
          return;
        }
        logger.error({ error: error.message }, "WebSocket error");
        inbound.fail(new TransportError(`Connection to ${url} failed: ${error.message}`, { cause: error }));
      });

      ws.on("close", (code, reason) => {
        logger.info({ code, reason: reason.toString() }, "WebSocket closed");
        inbound.end();
      });

      ws.once("open", () => {
        opened = true;
        logger.info("WebSocket connected");
        resolve(new SocketSession(ws, inbound, options, logger));
      });
    });
  }

  /**
   * Hand the connection over to a sender and a receiver. Can be called
   * only once; the session is unusable afterwards.
   */
  split(): [SocketSender<A>, SocketReceiver<R>] {
    if (this.consumed) {
      throw new Error("Socket session has already been split");
    }
    this.consumed = true;
    return [
      new SocketSender(this.ws, this.options.codec, this.logger),
      new SocketReceiver(this.ws, this.inbound, this.options.malformedFrames ?? "terminate", this.logger),
    ];
  }
}

// ============================================
// Sender
// ============================================

export class SocketSender<A> {
  private current: SessionState = "connected";

  constructor(
    private readonly ws: WebSocket,
    private readonly codec: FrameCodec<A, unknown>,
    private readonly logger: Logger
  ) {
    ws.once("close", () => {
      this.current = "closed";
    });
  }

  get state(): SessionState {
    return this.current;
  }

  /**
   * Encode and write one action. Resolves once the frame is written; does
   * not wait for any reply.
   *
   * @param next - lifecycle state this action moves the session into once written
   * @throws {TransportError} If the connection is closed or the write fails
   */
  async send(action: A, next?: SessionState): Promise<void> {
    if (this.current === "closed" || this.ws.readyState !== WebSocket.OPEN) {
      throw new TransportError("Cannot send on a closed connection");
    }

    const frame = this.codec.encode(action);

    await new Promise<void>((resolve, reject) => {
      this.ws.send(frame, { binary: typeof frame !== "string" }, (error) => {
        if (error) {
          this.logger.error({ error: error.message }, "WebSocket write failed");
          reject(new TransportError(`Write failed: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });

    // The state moves only once the frame is on the wire.
    if (next && this.state !== "closed") {
      this.current = next;
    }
  }

  /**
   * Record that the server acknowledged authentication
   */
  markAuthenticated(): void {
    if (this.current === "authenticating") {
      this.current = "authenticated";
    }
  }

  close(code = 1000, reason = "client closed"): void {
    if (this.current === "closed") {
      return;
    }
    this.current = "closed";
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }
}

// ============================================
// Receiver
// ============================================

export class SocketReceiver<R> {
  private claimed = false;

  constructor(
    private readonly ws: WebSocket,
    private readonly inbound: FrameQueue<FrameResult<R>>,
    private readonly policy: MalformedFramePolicy,
    private readonly logger: Logger
  ) {}

  /**
   * Decoded messages in arrival order, until the connection closes.
   * Abandoning the loop closes the connection.
   *
   * @throws {TransportError} If the connection fails
   * @throws {ProtocolError} On an undecodable frame under the "terminate" policy
   */
  async *stream(): AsyncGenerator<R, void, undefined> {
    for await (const result of this.frames()) {
      if (result.ok) {
        yield result.value;
        continue;
      }
      if (this.policy === "skip") {
        this.logger.warn({ error: result.error.toJSON() }, "Skipping undecodable frame");
        continue;
      }
      throw result.error;
    }
  }

  /**
   * Every decode outcome in arrival order, failures included. Abandoning
   * the loop closes the connection.
   *
   * @throws {TransportError} If the connection fails
   */
  async *frames(): AsyncGenerator<FrameResult<R>, void, undefined> {
    if (this.claimed) {
      throw new Error("Socket receiver can only be consumed once");
    }
    this.claimed = true;

    try {
      for (;;) {
        const next = await this.inbound.next();
        if (next.done) {
          return;
        }
        yield next.value;
      }
    } finally {
      if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
        this.ws.close(1000, "receiver closed");
      }
    }
  }
}
