/**
 * Real-time Stock Data Client
 *
 * Endpoints:
 * - IEX: wss://stream.data.alpaca.markets/v2/iex
 * - SIP: wss://stream.data.alpaca.markets/v2/sip
 *
 * @see https://docs.alpaca.markets/docs/real-time-stock-pricing-data
 */

import { type DataFeed, ValidationError } from "@tickline/domain";
import type { Logger } from "@tickline/logger";
import {
  createJsonCodec,
  type MalformedFramePolicy,
  type SessionState,
  type SocketReceiver,
  type SocketSender,
  SocketSession,
} from "@tickline/transport";
import { log as defaultLog } from "../logger.js";
import {
  type RealtimeAction,
  type RealtimeMessage,
  RealtimeMessageSchema,
  type Subscription,
} from "./messages.js";

export const REALTIME_URLS: Record<DataFeed, string> = {
  iex: "wss://stream.data.alpaca.markets/v2/iex",
  sip: "wss://stream.data.alpaca.markets/v2/sip",
};

export interface RealtimeClientConfig {
  /** Data source (default: iex) */
  source?: DataFeed;
  /** Override the endpoint chosen by `source` */
  url?: string;
  malformedFrames?: MalformedFramePolicy;
  logger?: Logger;
}

export interface RealtimeCredentials {
  key: string;
  secret: string;
}

const SUBSCRIPTION_CHANNELS = ["trades", "quotes", "bars", "dailyBars", "updatedBars"] as const;

/**
 * Keep the channels the caller named. Each named list replaces that
 * channel's current set on the server, so `[]` clears the channel and is
 * sent as is; omitted channels are left alone.
 *
 * @throws {ValidationError} If no channel is named
 */
export function normalizeSubscription(subscription: Subscription): Subscription {
  const normalized: Subscription = {};
  for (const channel of SUBSCRIPTION_CHANNELS) {
    const symbols = subscription[channel];
    if (symbols !== undefined) {
      normalized[channel] = symbols;
    }
  }
  if (Object.keys(normalized).length === 0) {
    throw new ValidationError("Subscription must name at least one channel", { field: "subscription" });
  }
  return normalized;
}

/**
 * Sending half of a real-time connection
 */
export class RealtimeSender {
  constructor(private readonly sender: SocketSender<RealtimeAction>) {}

  get state(): SessionState {
    return this.sender.state;
  }

  /**
   * Send credentials. The server answers `success` / `authenticated` or an
   * error; call `markAuthenticated()` on success.
   */
  authenticate(credentials: RealtimeCredentials): Promise<void> {
    return this.sender.send(
      { action: "auth", key: credentials.key, secret: credentials.secret },
      "authenticating"
    );
  }

  markAuthenticated(): void {
    this.sender.markAuthenticated();
  }

  /**
   * Set the symbol list of every channel named in `subscription`. The
   * server answers with the full list of current subscriptions.
   */
  async subscribe(subscription: Subscription): Promise<void> {
    await this.sender.send({ action: "subscribe", ...normalizeSubscription(subscription) }, "subscribed");
  }

  async unsubscribe(subscription: Subscription): Promise<void> {
    await this.sender.send({ action: "unsubscribe", ...normalizeSubscription(subscription) });
  }

  close(): void {
    this.sender.close();
  }
}

/**
 * Real-time market data client.
 *
 * @example
 * ```typescript
 * const client = await RealtimeClient.connect({ source: "iex" });
 * await client.authenticate({ key: config.keyId, secret: config.secretKey });
 * await client.subscribe({ trades: ["AAPL"], bars: ["*"] });
 *
 * for await (const message of client.stream()) {
 *   if (message.T === "t") {
 *     console.log(message.symbol, message.price, message.exchange.name);
 *   }
 * }
 * ```
 */
export class RealtimeClient {
  private handedOff = false;

  private constructor(
    private readonly sender: RealtimeSender,
    private readonly receiver: SocketReceiver<RealtimeMessage>
  ) {}

  /**
   * @throws {TransportError} If the connection cannot be established
   */
  static async connect(config: RealtimeClientConfig = {}): Promise<RealtimeClient> {
    const url = config.url ?? REALTIME_URLS[config.source ?? "iex"];
    const session = await SocketSession.connect<RealtimeAction, RealtimeMessage>(url, {
      codec: createJsonCodec<RealtimeAction, RealtimeMessage>(RealtimeMessageSchema),
      malformedFrames: config.malformedFrames,
      logger: config.logger ?? defaultLog,
    });
    const [sender, receiver] = session.split();
    return new RealtimeClient(new RealtimeSender(sender), receiver);
  }

  get state(): SessionState {
    return this.sender.state;
  }

  async authenticate(credentials: RealtimeCredentials): Promise<void> {
    await this.owned().authenticate(credentials);
  }

  async subscribe(subscription: Subscription): Promise<void> {
    await this.owned().subscribe(subscription);
  }

  async unsubscribe(subscription: Subscription): Promise<void> {
    await this.owned().unsubscribe(subscription);
  }

  /**
   * Messages until the connection closes. Can be consumed once.
   */
  stream(): AsyncGenerator<RealtimeMessage, void, undefined> {
    this.owned();
    return this.receiver.stream();
  }

  /**
   * Hand both halves to the caller so they can be driven independently.
   * The client itself is unusable afterwards.
   */
  split(): [RealtimeSender, SocketReceiver<RealtimeMessage>] {
    this.owned();
    this.handedOff = true;
    return [this.sender, this.receiver];
  }

  close(): void {
    this.sender.close();
  }

  private owned(): RealtimeSender {
    if (this.handedOff) {
      throw new Error("Realtime client has already been split");
    }
    return this.sender;
  }
}
