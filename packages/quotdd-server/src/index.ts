import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { loadQuotes } from "./quotes.js";
import { QuoteService } from "./service.js";
import { buildStatusServer, type StatusServer } from "./status-server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const quotes = await loadQuotes(config.quotesFile);

  const service = new QuoteService({
    host: config.host,
    port: config.port,
    quotes,
    rateLimit: { threshold: config.rateLimitThreshold, decayAmount: config.rateLimitDecay },
    decayIntervalMs: config.decayIntervalSec * 1000,
    connectionTimeoutMs: config.connectionTimeoutMs,
    maxConnections: config.maxConnections,
    failFast: config.failFast,
    logger,
  });
  await service.listen();

  let status: StatusServer | undefined;
  if (config.statusPort !== undefined) {
    status = buildStatusServer(service, logger);
    await status.listen({ host: config.host, port: config.statusPort });
  }

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "shutting down");
    service.close().catch((error: unknown) => {
      logger.error({ err: error }, "shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await service.wait();
  } finally {
    await status?.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
