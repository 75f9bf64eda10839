#!/usr/bin/env node
import "dotenv/config";
import type { AxiosAdapter } from "axios";
import { loadAppConfig } from "../config/loadConfig";
import type { AppConfig } from "../config/schema";
import { SystemClock } from "../core/clock";
import { ShutdownCoordinator, type ProcessLike } from "../core/shutdown-coordinator";
import { StrategyEngine } from "../core/strategy-engine";
import { sideLabel } from "../domain/trade.types";
import { AuthError, toError } from "../errors/app.errors";
import { describeFailure } from "../services/broker/broker-client";
import { FyersRestClient } from "../services/broker/fyers-rest-client";
import { PaperOrderGate } from "../services/broker/paper-order-gate";
import { MessageChannel } from "../services/streaming/message-channel";
import type { StreamMessage } from "../services/streaming/message-classifier";
import { StreamDispatcher } from "../services/streaming/stream-dispatcher";
import type { StreamSocketFactory } from "../services/streaming/stream-socket";
import { StreamingClient } from "../services/streaming/streaming-client";
import { BROKER_WS } from "../constants/broker.constants";
import { formatClockTime } from "../utils/time.util";
import { ConsoleLogger, type Logger } from "../utils/logger.util";
import type { EnvSource } from "../config/env";

export interface MainOptions {
  argv?: string[];
  env?: EnvSource;
  process?: ProcessLike;
  socketFactory?: StreamSocketFactory;
  /** Strategy and credentials file reader */
  readFile?: (path: string) => string;
  /** axios adapter for the broker REST client */
  adapter?: AxiosAdapter;
}

function logStartup(config: AppConfig, logger: Logger): void {
  const s = config.strategy;
  logger.info(`Starting options basket trader (preset: ${s.preset})`);
  logger.info(
    `Underlying ${s.underlying} via ${s.indexSymbol}, step ${s.strikeStep}, lot ${s.lotSize}, ${s.expiryFormat} expiry`,
  );
  for (const leg of s.legs) {
    logger.info(
      `  ${leg.role}: ${sideLabel(leg.side)} ${leg.optionType} ATM${leg.optionType === "CE" ? "+" : "-"}${leg.offset} x${leg.qtyMultiplier}`,
    );
  }
  logger.info(
    `Entry ${s.entryWeekdays.join(",")} from ${formatClockTime(s.entryTime)}, exit by ${formatClockTime(s.exitTime)} ${s.timezone}; ` +
      `target ${s.targetPct}% stop-loss ${s.stopLossPct}%`,
  );
  if (config.liveTrading) {
    logger.warn("LIVE TRADING ENABLED: orders will be sent to the broker");
  } else {
    logger.info("Paper trading: orders are simulated (set LIVE_TRADING=I_UNDERSTAND_THE_RISKS to trade)");
  }
}

function startStreaming(
  config: AppConfig,
  logger: ConsoleLogger,
  coordinator: ShutdownCoordinator,
  socketFactory?: StreamSocketFactory,
): void {
  const { streaming, credentials, strategy } = config;
  if (streaming.mode === "off") return;

  const channel = new MessageChannel<StreamMessage>(BROKER_WS.CHANNEL_CAPACITY);
  const clients: StreamingClient[] = [];

  if (streaming.mode === "data" || streaming.mode === "both") {
    const client = new StreamingClient({
      kind: "data",
      url: streaming.dataUrl,
      credentials,
      channel,
      socketFactory,
      logger: logger.child("data"),
    });
    client.subscribe(streaming.dataType, [strategy.indexSymbol, ...streaming.symbols]);
    clients.push(client);
  }
  if (streaming.mode === "order" || streaming.mode === "both") {
    const client = new StreamingClient({
      kind: "order",
      url: streaming.orderUrl,
      credentials,
      channel,
      socketFactory,
      logger: logger.child("order"),
    });
    for (const dataType of streaming.orderDataTypes) client.subscribe(dataType);
    clients.push(client);
  }

  const dispatcher = new StreamDispatcher(
    channel,
    {
      general: (m) => logger.info(`General: ${m.message}${m.code === null ? "" : ` (code ${m.code})`}`),
      quote: (m) => logger.debug(`Quote ${m.symbol ?? "?"} ltp=${m.ltp ?? "?"}`),
      depth: (m) => logger.debug(`Depth ${m.symbol ?? "?"}`),
      tradePrint: (m) => logger.debug(`Print ${m.symbol ?? "?"} @ ${m.price ?? "?"}`),
      trade: (m) => logger.info(`Trade ${m.tradeNumber ?? "?"} ${m.symbol ?? ""}`),
      order: (m) => logger.info(`Order ${m.orderId ?? "?"} ${m.symbol ?? ""} status=${m.status ?? "?"}`),
      position: (m) => logger.info(`Position ${m.symbol ?? "?"} netQty=${m.netQty ?? "?"}`),
      unknown: (m) => logger.debug(`Unclassified frame: ${JSON.stringify(m.raw).slice(0, 200)}`),
    },
    logger,
  );
  const dispatching = dispatcher.run();

  for (const client of clients) client.connect();

  coordinator.register("streaming", async () => {
    await Promise.all(clients.map((client) => client.disconnect()));
    channel.close();
    const count = await dispatching;
    logger.info(`Streaming stopped after ${count} message(s), ${channel.dropped} dropped`);
  });
}

/**
 * Returns the process exit code: 0 after a clean shutdown, 1 when startup fails
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const bootLogger = new ConsoleLogger();

  let config: AppConfig;
  try {
    config = loadAppConfig({ argv: options.argv, env: options.env, readFile: options.readFile });
  } catch (err) {
    bootLogger.error("Startup failed: configuration", toError(err));
    return 1;
  }

  const logger = new ConsoleLogger({ level: config.logLevel });
  logStartup(config, logger);

  const rest = new FyersRestClient({
    credentials: config.credentials,
    endpoints: config.broker,
    logger: logger.child("broker"),
    adapter: options.adapter,
  });

  logger.info("Verifying broker session...");
  const profile = await rest.getProfile();
  if (!profile.success) {
    const error = new AuthError(`Broker profile check failed: ${describeFailure(profile.error)}`);
    logger.error("Startup failed: authentication", error);
    return 1;
  }
  logger.info(`Authenticated as ${profile.data.name || profile.data.clientId} (${profile.data.clientId})`);

  const broker = new PaperOrderGate(rest, config.liveTrading, logger.child("paper"));
  const coordinator = new ShutdownCoordinator({
    process: options.process,
    logger: logger.child("shutdown"),
  }).install();

  startStreaming(config, logger.child("stream"), coordinator, options.socketFactory);

  const engine = new StrategyEngine({
    config: config.strategy,
    broker,
    clock: new SystemClock(),
    logger: logger.child("engine"),
  });

  const outcome = await engine.run(coordinator.signal);
  await coordinator.trigger("strategy cycle finished");

  const pnl = outcome.realizedPnl === null ? "n/a" : outcome.realizedPnl.toFixed(2);
  if (outcome.state === "FAILED") {
    logger.error(`Cycle ended FAILED: ${outcome.failure ?? "unknown"}`);
  } else {
    logger.info(`Cycle ended ${outcome.state} (exit ${outcome.exitReason}, realized pnl ${pnl})`);
  }
  return 0;
}

if (require.main === module) {
  process.on("unhandledRejection", (reason) => {
    console.error("[UnhandledRejection]", reason);
  });

  process.on("uncaughtException", (error) => {
    console.error("[UncaughtException]", error);
    process.exit(1);
  });

  main({ argv: process.argv.slice(2) })
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error("Fatal error in main():", err);
      process.exit(1);
    });
}
