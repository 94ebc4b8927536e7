/**
 * Trade Updates WebSocket Client
 *
 * Order lifecycle events for the account, pushed as they happen.
 *
 * Endpoints:
 * - Paper: wss://paper-api.alpaca.markets/stream
 * - Live: wss://api.alpaca.markets/stream
 *
 * @see https://docs.alpaca.markets/docs/websocket-streaming
 */

import type { TradingEnvironment } from "@tickline/domain";
import type { Logger } from "@tickline/logger";
import {
  type MalformedFramePolicy,
  type SessionState,
  type SocketReceiver,
  type SocketSender,
  SocketSession,
} from "@tickline/transport";
import { log as defaultLog } from "../logger.js";
import { CODEC_HEADERS, CODECS, type TradeUpdatesCodecName } from "./codec.js";
import type { MessageStream, TradeUpdatesAction, TradeUpdatesResponse } from "./messages.js";

export const TRADE_UPDATES_URLS: Record<TradingEnvironment, string> = {
  PAPER: "wss://paper-api.alpaca.markets/stream",
  LIVE: "wss://api.alpaca.markets/stream",
};

export interface TradeUpdatesClientConfig {
  environment: TradingEnvironment;
  /** Wire format (default: json) */
  codec?: TradeUpdatesCodecName;
  /** Override the endpoint chosen by `environment` */
  url?: string;
  malformedFrames?: MalformedFramePolicy;
  logger?: Logger;
}

/**
 * Sending half of a trade updates connection
 */
export class TradeUpdatesSender {
  constructor(private readonly sender: SocketSender<TradeUpdatesAction>) {}

  get state(): SessionState {
    return this.sender.state;
  }

  /**
   * Send credentials. The server answers with an `authorization` response;
   * call `markAuthenticated()` once it reports `authorized`.
   */
  authenticate(keyId: string, secretKey: string): Promise<void> {
    return this.sender.send(
      { action: "authenticate", data: { key_id: keyId, secret_key: secretKey } },
      "authenticating",
    );
  }

  markAuthenticated(): void {
    this.sender.markAuthenticated();
  }

  listen(streams: MessageStream[] = ["trade_updates"]): Promise<void> {
    return this.sender.send({ action: "listen", data: { streams } }, "listening");
  }

  close(): void {
    this.sender.close();
  }
}

/**
 * Trade updates client.
 *
 * @example
 * ```typescript
 * const client = await TradeUpdatesClient.connect({ environment: "PAPER" });
 * await client.authenticate(config.keyId, config.secretKey);
 * await client.listen();
 *
 * for await (const response of client.stream()) {
 *   if (response.stream === "trade_updates") {
 *     console.log(response.data.event, response.data.order.id);
 *   }
 * }
 * ```
 */
export class TradeUpdatesClient {
  private handedOff = false;

  private constructor(
    private readonly sender: TradeUpdatesSender,
    private readonly receiver: SocketReceiver<TradeUpdatesResponse>,
  ) {}

  /**
   * @throws {TransportError} If the connection cannot be established
   */
  static async connect(config: TradeUpdatesClientConfig): Promise<TradeUpdatesClient> {
    const codec = config.codec ?? "json";
    const url = config.url ?? TRADE_UPDATES_URLS[config.environment];
    const session = await SocketSession.connect<TradeUpdatesAction, TradeUpdatesResponse>(url, {
      codec: CODECS[codec],
      headers: CODEC_HEADERS[codec],
      malformedFrames: config.malformedFrames,
      logger: config.logger ?? defaultLog,
    });
    const [sender, receiver] = session.split();
    return new TradeUpdatesClient(new TradeUpdatesSender(sender), receiver);
  }

  get state(): SessionState {
    return this.sender.state;
  }

  async authenticate(keyId: string, secretKey: string): Promise<void> {
    await this.owned().authenticate(keyId, secretKey);
  }

  async listen(streams?: MessageStream[]): Promise<void> {
    await this.owned().listen(streams);
  }

  /**
   * Responses until the connection closes. Can be consumed once.
   */
  stream(): AsyncGenerator<TradeUpdatesResponse, void, undefined> {
    this.owned();
    return this.receiver.stream();
  }

  /**
   * Hand both halves to the caller so they can be driven independently.
   * The client itself is unusable afterwards.
   */
  split(): [TradeUpdatesSender, SocketReceiver<TradeUpdatesResponse>] {
    this.owned();
    this.handedOff = true;
    return [this.sender, this.receiver];
  }

  close(): void {
    this.sender.close();
  }

  private owned(): TradeUpdatesSender {
    if (this.handedOff) {
      throw new Error("Trade updates client has already been split");
    }
    return this.sender;
  }
}
