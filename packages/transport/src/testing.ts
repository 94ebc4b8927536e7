/**
 * In-process WebSocket server for tests. Listens on an ephemeral port on
 * the loopback interface and records everything clients send.
 */

import type { IncomingHttpHeaders } from "node:http";
import { type WebSocket, WebSocketServer } from "ws";

export interface ReceivedFrame {
  data: Buffer;
  isBinary: boolean;
}

export type MessageHandler = (client: WebSocket, frame: ReceivedFrame) => void;
export type ConnectionHandler = (client: WebSocket, headers: IncomingHttpHeaders) => void;

export class MockSocketServer {
  private server: WebSocketServer | null = null;
  private readonly clients = new Set<WebSocket>();
  private waiters: Array<{ count: number; resolve: () => void }> = [];
  private closeWaiters: Array<() => void> = [];

  readonly received: ReceivedFrame[] = [];
  readonly upgradeHeaders: IncomingHttpHeaders[] = [];
  closedConnections = 0;

  onConnection: ConnectionHandler | null = null;
  onMessage: MessageHandler | null = null;

  /**
   * Start listening and return the ws:// URL to connect to
   */
  start(): Promise<string> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: "127.0.0.1", port: 0 }, () => {
        const address = server.address();
        if (typeof address === "object" && address !== null) {
          resolve(`ws://127.0.0.1:${address.port}`);
        } else {
          reject(new Error("Mock server has no port"));
        }
      });
      this.server = server;

      server.on("connection", (client, request) => {
        this.clients.add(client);
        this.upgradeHeaders.push(request.headers);

        client.on("message", (data, isBinary) => {
          const buffer = Buffer.isBuffer(data)
            ? data
            : Array.isArray(data)
              ? Buffer.concat(data)
              : Buffer.from(data);
          const frame = { data: buffer, isBinary };
          this.received.push(frame);
          this.onMessage?.(client, frame);
          this.notify();
        });

        client.on("close", () => {
          this.clients.delete(client);
          this.closedConnections += 1;
          for (const resolveClose of this.closeWaiters.splice(0)) {
            resolveClose();
          }
        });

        this.onConnection?.(client, request.headers);
      });
    });
  }

  /** Received frames decoded as UTF-8 JSON */
  receivedJson(): unknown[] {
    return this.received.map((frame) => JSON.parse(frame.data.toString("utf-8")));
  }

  /** Resolve once at least `count` frames have arrived */
  waitForMessages(count: number): Promise<void> {
    if (this.received.length >= count) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push({ count, resolve });
    });
  }

  /** Resolve once a client connection has closed */
  waitForClose(): Promise<void> {
    if (this.closedConnections > 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.closeWaiters.push(resolve);
    });
  }

  /** Send a frame to every connected client */
  broadcast(data: string | Buffer, options: { binary?: boolean } = {}): void {
    for (const client of this.clients) {
      client.send(data, { binary: options.binary ?? Buffer.isBuffer(data) });
    }
  }

  /** Close every client connection from the server side */
  disconnectAll(code = 1000): void {
    for (const client of this.clients) {
      client.close(code);
    }
  }

  /** Drop every client connection without a close handshake */
  terminateAll(): void {
    for (const client of this.clients) {
      client.terminate();
    }
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    for (const client of this.clients) {
      client.terminate();
    }
    this.clients.clear();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }

  private notify(): void {
    const ready = this.waiters.filter((waiter) => this.received.length >= waiter.count);
    this.waiters = this.waiters.filter((waiter) => this.received.length < waiter.count);
    for (const waiter of ready) {
      waiter.resolve();
    }
  }
}
