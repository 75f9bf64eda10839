/**
 * StreamingClient - persistent WebSocket to the broker's realtime feeds
 *
 * One client per feed kind:
 * - data:  symbol subscriptions, data type SymbolUpdate or DepthUpdate
 * - order: order/trade/position/general updates for the account
 *
 * Features:
 * - Handshake carries `Authorization: {clientId}:{accessToken}`
 * - Automatic reconnection with exponential backoff + jitter, unbounded
 * - The current subscription set is re-sent on every CONNECTED, one
 *   subscribe frame per data type
 * - Keepalive via "ping" text frames; any inbound frame counts as liveness,
 *   and silence past the pong timeout terminates the socket and reconnects
 * - Inbound frames are classified and pushed into a bounded MessageChannel;
 *   no business logic runs in socket callbacks
 * - disconnect() is idempotent and bounded by a grace period
 */

import { BROKER_WS } from "../../constants/broker.constants";
import type { CredentialConfig, MarketDataType, OrderDataType } from "../../config/schema";
import { ConnectionError, toError } from "../../errors/app.errors";
import { silentLogger, type Logger } from "../../utils/logger.util";
import { calculateBackoff } from "../broker/rate-limit";
import { MessageChannel } from "./message-channel";
import { parseFrame, type StreamMessage } from "./message-classifier";
import {
  createWsSocket,
  type StreamSocket,
  type StreamSocketFactory,
} from "./stream-socket";

// ============================================================================
// Types
// ============================================================================

export type StreamKind = "data" | "order";

export type ConnectionStatus =
  | "DISCONNECTED"
  | "CONNECTING"
  | "CONNECTED"
  | "RECONNECTING";

export type StreamDataType = MarketDataType | OrderDataType;

export interface Subscription {
  dataType: StreamDataType;
  /** Empty for order feeds */
  symbol: string;
}

export interface StreamingClientOptions {
  kind: StreamKind;
  url: string;
  credentials: CredentialConfig;
  channel?: MessageChannel<StreamMessage>;
  socketFactory?: StreamSocketFactory;
  logger?: Logger;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  stableConnectionMs?: number;
  pingIntervalMs?: number;
  pongTimeoutMs?: number;
  connectionTimeoutMs?: number;
  disconnectGraceMs?: number;
  /** Jitter source */
  random?: () => number;
  onConnect?: () => void;
  onDisconnect?: (error: ConnectionError) => void;
}

type SubscribeFrame =
  | { type: "subscribe" | "unsubscribe"; dataType: MarketDataType; symbols: string[] }
  | { type: "subscribe" | "unsubscribe"; dataType: OrderDataType };

const MARKET_DATA_TYPES: readonly StreamDataType[] = ["SymbolUpdate", "DepthUpdate"];

function isMarketDataType(dataType: StreamDataType): dataType is MarketDataType {
  return MARKET_DATA_TYPES.includes(dataType);
}

// ============================================================================
// StreamingClient Implementation
// ============================================================================

export class StreamingClient {
  private socket: StreamSocket | null = null;
  private state: ConnectionStatus = "DISCONNECTED";
  // dataType -> symbols, in first-subscribed order
  private readonly subscriptions = new Map<StreamDataType, Set<string>>();

  // Reconnection state
  private reconnectAttempt = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;

  // Keepalive state
  private pingTimer: NodeJS.Timeout | null = null;
  private pongTimeoutTimer: NodeJS.Timeout | null = null;
  private stableConnectionTimer: NodeJS.Timeout | null = null;
  private connectionTimer: NodeJS.Timeout | null = null;

  // Shutdown
  private closing = false;
  private disconnecting: Promise<void> | null = null;
  private closeWaiter: (() => void) | null = null;

  // Metrics
  private messagesReceived = 0;
  private lastMessageAt = 0;
  private disconnectCount = 0;

  readonly kind: StreamKind;
  readonly channel: MessageChannel<StreamMessage>;
  private readonly url: string;
  private readonly authorization: string;
  private readonly socketFactory: StreamSocketFactory;
  private readonly logger: Logger;
  private readonly reconnectBaseMs: number;
  private readonly reconnectMaxMs: number;
  private readonly stableConnectionMs: number;
  private readonly pingIntervalMs: number;
  private readonly pongTimeoutMs: number;
  private readonly connectionTimeoutMs: number;
  private readonly disconnectGraceMs: number;
  private readonly random: () => number;
  private readonly onConnectCb?: () => void;
  private readonly onDisconnectCb?: (error: ConnectionError) => void;

  constructor(options: StreamingClientOptions) {
    this.kind = options.kind;
    this.url = options.url;
    this.authorization = `${options.credentials.clientId}:${options.credentials.accessToken}`;
    this.channel = options.channel ?? new MessageChannel<StreamMessage>(BROKER_WS.CHANNEL_CAPACITY);
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.logger = options.logger ?? silentLogger;
    this.reconnectBaseMs = options.reconnectBaseMs ?? BROKER_WS.RECONNECT_BASE_MS;
    this.reconnectMaxMs = options.reconnectMaxMs ?? BROKER_WS.RECONNECT_MAX_MS;
    this.stableConnectionMs = options.stableConnectionMs ?? BROKER_WS.STABLE_CONNECTION_MS;
    this.pingIntervalMs = options.pingIntervalMs ?? BROKER_WS.PING_INTERVAL_MS;
    this.pongTimeoutMs = options.pongTimeoutMs ?? BROKER_WS.PONG_TIMEOUT_MS;
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? BROKER_WS.CONNECTION_TIMEOUT_MS;
    this.disconnectGraceMs = options.disconnectGraceMs ?? BROKER_WS.DISCONNECT_GRACE_MS;
    this.random = options.random ?? Math.random;
    this.onConnectCb = options.onConnect;
    this.onDisconnectCb = options.onDisconnect;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Public API - Connection Management
  // ═══════════════════════════════════════════════════════════════════════════

  connect(): void {
    if (this.closing) {
      this.logger.warn(`[${this.kind}] Client was disconnected, not reconnecting`);
      return;
    }
    if (this.socket) {
      this.logger.debug(`[${this.kind}] Already ${this.state}, skipping connect`);
      return;
    }

    this.state = "CONNECTING";
    this.logger.info(`[${this.kind}] Connecting to ${this.url} (attempt ${this.reconnectAttempt + 1})`);

    let socket: StreamSocket | null = null;
    try {
      socket = this.socketFactory(
        this.url,
        { Authorization: this.authorization },
        {
          onOpen: () => {
            if (socket && socket === this.socket) this.handleOpen();
          },
          onMessage: (text) => {
            if (socket && socket === this.socket) this.handleFrame(text);
          },
          onClose: (code, reason) => {
            if (socket && socket === this.socket) this.handleClose(code, reason);
          },
          onError: (err) => {
            if (socket && socket === this.socket) {
              this.logger.warn(`[${this.kind}] Socket error: ${err.message}`);
            }
          },
        },
      );
      this.socket = socket;
      this.startConnectionTimeout();
    } catch (err) {
      this.logger.error(`[${this.kind}] Connection failed`, toError(err));
      this.scheduleReconnect();
    }
  }

  /**
   * Close the socket once and stop reconnecting. Resolves after the close
   * event or the grace period, whichever comes first. Later calls return the
   * same promise.
   */
  disconnect(): Promise<void> {
    if (this.disconnecting) return this.disconnecting;

    this.closing = true;
    this.clearAllTimers();
    const socket = this.socket;

    if (!socket) {
      this.state = "DISCONNECTED";
      this.disconnecting = Promise.resolve();
      return this.disconnecting;
    }

    this.logger.info(`[${this.kind}] Disconnecting...`);
    this.disconnecting = new Promise<void>((resolve) => {
      let settled = false;
      const finish = (): void => {
        if (settled) return;
        settled = true;
        clearTimeout(graceTimer);
        this.socket = null;
        this.state = "DISCONNECTED";
        this.logger.info(`[${this.kind}] Disconnected`);
        resolve();
      };
      this.closeWaiter = finish;

      const graceTimer = setTimeout(() => {
        this.logger.warn(`[${this.kind}] No close within ${this.disconnectGraceMs}ms, terminating`);
        this.safeTerminate(socket);
        finish();
      }, this.disconnectGraceMs);

      try {
        socket.close(1000, "Client disconnect");
      } catch (err) {
        this.logger.warn(`[${this.kind}] Close failed (${toError(err).message}), terminating`);
        this.safeTerminate(socket);
        finish();
      }
    });
    return this.disconnecting;
  }

  getState(): ConnectionStatus {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "CONNECTED";
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Public API - Subscriptions
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Add to the subscription set. Symbols are required for market data types
   * and ignored for order data types.
   */
  subscribe(dataType: StreamDataType, symbols: readonly string[] = []): void {
    this.assertDataType(dataType);
    const current = this.subscriptions.get(dataType) ?? new Set<string>();
    const added = isMarketDataType(dataType) ? symbols.filter((s) => !current.has(s)) : [];
    const isNewType = !this.subscriptions.has(dataType);

    for (const symbol of added) current.add(symbol);
    this.subscriptions.set(dataType, current);

    if (this.state === "CONNECTED" && (added.length > 0 || (isNewType && !isMarketDataType(dataType)))) {
      this.send(this.frame("subscribe", dataType, added));
    }
  }

  unsubscribe(dataType: StreamDataType, symbols?: readonly string[]): void {
    const current = this.subscriptions.get(dataType);
    if (!current) return;

    const removed = isMarketDataType(dataType) ? (symbols ?? [...current]).filter((s) => current.has(s)) : [];
    for (const symbol of removed) current.delete(symbol);
    if (current.size === 0 || !isMarketDataType(dataType)) {
      this.subscriptions.delete(dataType);
    }

    if (this.state === "CONNECTED") {
      this.send(this.frame("unsubscribe", dataType, removed));
    }
  }

  getSubscriptions(): Subscription[] {
    const list: Subscription[] = [];
    for (const [dataType, symbols] of this.subscriptions) {
      if (isMarketDataType(dataType)) {
        for (const symbol of symbols) list.push({ dataType, symbol });
      } else {
        list.push({ dataType, symbol: "" });
      }
    }
    return list;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Public API - Metrics
  // ═══════════════════════════════════════════════════════════════════════════

  getMetrics(): {
    state: ConnectionStatus;
    subscriptions: number;
    messagesReceived: number;
    lastMessageAgeMs: number;
    reconnectAttempts: number;
    disconnectCount: number;
    droppedMessages: number;
  } {
    return {
      state: this.state,
      subscriptions: this.getSubscriptions().length,
      messagesReceived: this.messagesReceived,
      lastMessageAgeMs: this.lastMessageAt > 0 ? Date.now() - this.lastMessageAt : 0,
      reconnectAttempts: this.reconnectAttempt,
      disconnectCount: this.disconnectCount,
      droppedMessages: this.channel.dropped,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Event Handlers
  // ═══════════════════════════════════════════════════════════════════════════

  private handleOpen(): void {
    this.clearConnectionTimeout();
    this.state = "CONNECTED";
    this.logger.info(`[${this.kind}] Connected to ${this.url}`);

    this.startPing();
    this.startStableConnectionTimer();
    this.resubscribeAll();
    this.onConnectCb?.();
  }

  private handleFrame(text: string): void {
    this.lastMessageAt = Date.now();
    this.messagesReceived++;
    // Any inbound frame proves the socket is alive
    this.clearPongTimeout();

    if (text.trim().toLowerCase() === "pong") return;

    for (const message of parseFrame(text)) {
      this.channel.push(message);
    }
  }

  private handleClose(code: number, reason: string): void {
    this.socket = null;
    this.clearAllTimers();
    this.disconnectCount++;

    if (this.closing) {
      this.closeWaiter?.();
      this.closeWaiter = null;
      return;
    }

    const error = new ConnectionError(
      `${this.kind} stream closed: code=${code} reason="${reason || "none"}"`,
      this.url,
      code,
    );
    this.logger.warn(`[${this.kind}] ${error.message}`);
    this.onDisconnectCb?.(error);
    this.scheduleReconnect();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Message Sending
  // ═══════════════════════════════════════════════════════════════════════════

  private frame(type: "subscribe" | "unsubscribe", dataType: StreamDataType, symbols: readonly string[]): SubscribeFrame {
    return isMarketDataType(dataType) ? { type, dataType, symbols: [...symbols] } : { type, dataType };
  }

  private resubscribeAll(): void {
    for (const [dataType, symbols] of this.subscriptions) {
      if (isMarketDataType(dataType) && symbols.size === 0) continue;
      this.send(this.frame("subscribe", dataType, [...symbols]));
    }
  }

  private send(frame: SubscribeFrame): void {
    if (!this.socket || this.state !== "CONNECTED") return;
    try {
      this.socket.send(JSON.stringify(frame));
      this.logger.debug(`[${this.kind}] ${frame.type} ${frame.dataType}`);
    } catch (err) {
      this.logger.warn(`[${this.kind}] Failed to send ${frame.type}: ${toError(err).message}`);
    }
  }

  private assertDataType(dataType: StreamDataType): void {
    if (isMarketDataType(dataType) !== (this.kind === "data")) {
      throw new RangeError(`data type ${dataType} does not belong to the ${this.kind} feed`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Timers and Reconnection
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Send "ping" text frames on an interval. The pong timeout starts with the
   * first unanswered ping and is cleared by any inbound frame.
   */
  private startPing(): void {
    this.clearPing();
    this.pingTimer = setInterval(() => {
      if (!this.socket || this.state !== "CONNECTED") return;
      try {
        this.socket.send("ping");
        if (!this.pongTimeoutTimer) this.startPongTimeout();
      } catch (err) {
        this.logger.warn(`[${this.kind}] Ping send failed (${toError(err).message}), reconnecting`);
        this.dropSocket();
      }
    }, this.pingIntervalMs);
  }

  private clearPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.clearPongTimeout();
  }

  private startPongTimeout(): void {
    this.clearPongTimeout();
    this.pongTimeoutTimer = setTimeout(() => {
      this.pongTimeoutTimer = null;
      if (this.state !== "CONNECTED") return;
      this.logger.warn(`[${this.kind}] No inbound frame within ${this.pongTimeoutMs}ms, socket appears dead`);
      this.dropSocket();
    }, this.pongTimeoutMs);
  }

  private clearPongTimeout(): void {
    if (this.pongTimeoutTimer) {
      clearTimeout(this.pongTimeoutTimer);
      this.pongTimeoutTimer = null;
    }
  }

  /** Resets backoff once a connection has stayed up */
  private startStableConnectionTimer(): void {
    this.clearStableConnectionTimer();
    this.stableConnectionTimer = setTimeout(() => {
      if (this.state === "CONNECTED") {
        this.logger.debug(`[${this.kind}] Connection stable, resetting backoff`);
        this.reconnectAttempt = 0;
      }
    }, this.stableConnectionMs);
  }

  private clearStableConnectionTimer(): void {
    if (this.stableConnectionTimer) {
      clearTimeout(this.stableConnectionTimer);
      this.stableConnectionTimer = null;
    }
  }

  private startConnectionTimeout(): void {
    this.clearConnectionTimeout();
    this.connectionTimer = setTimeout(() => {
      this.connectionTimer = null;
      if (this.state === "CONNECTING" || this.state === "RECONNECTING") {
        this.logger.warn(`[${this.kind}] Connection timeout after ${this.connectionTimeoutMs}ms`);
        this.dropSocket();
      }
    }, this.connectionTimeoutMs);
  }

  private clearConnectionTimeout(): void {
    if (this.connectionTimer) {
      clearTimeout(this.connectionTimer);
      this.connectionTimer = null;
    }
  }

  /**
   * Abandon the current socket (its late events are ignored) and reconnect
   */
  private dropSocket(): void {
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      this.disconnectCount++;
      this.safeTerminate(socket);
    }
    this.scheduleReconnect();
  }

  private safeTerminate(socket: StreamSocket): void {
    try {
      socket.terminate();
    } catch (err) {
      this.logger.debug(`[${this.kind}] Terminate failed: ${toError(err).message}`);
    }
  }

  private scheduleReconnect(): void {
    if (this.closing || this.reconnectTimer) return;

    this.clearAllTimers();
    this.state = "RECONNECTING";
    this.reconnectAttempt++;

    const delay = calculateBackoff(
      this.reconnectAttempt - 1,
      {
        baseDelayMs: this.reconnectBaseMs,
        maxDelayMs: this.reconnectMaxMs,
        jitterFactor: 0.3,
        maxRetries: 0,
      },
      this.random,
    );
    this.logger.info(`[${this.kind}] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempt})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearAllTimers(): void {
    this.clearPing();
    this.clearStableConnectionTimer();
    this.clearConnectionTimeout();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
