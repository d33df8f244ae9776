import { createAppContext } from "./app/context";
import { readEnv, redactEnvForLogs } from "./config/env";
import { createLogger } from "./config/logger";
import { startHttpServer } from "./http/server";

async function main(): Promise<void> {
  const env = readEnv();
  // Console prompts own stdout; logs move to stderr so the two never interleave.
  const logger = createLogger(env.GATEWAY_LOG_LEVEL, {
    filePath: env.GATEWAY_LOG_FILE || undefined,
    write: env.GATEWAY_CONFIRMATION_DELIVERY === "console" ? (line) => process.stderr.write(line) : undefined,
  });

  logger.info("gateway_boot", {
    confirmationMode: env.GATEWAY_CONFIRMATION_MODE,
    confirmationDelivery: env.GATEWAY_CONFIRMATION_DELIVERY,
    env: redactEnvForLogs(env),
  });

  const context = createAppContext(env, logger);
  const server = startHttpServer({
    host: env.GATEWAY_HOST,
    port: env.GATEWAY_PORT,
    logger,
    context,
  });

  if (context.approvalQueue) {
    logger.info("gateway_approval_ui", { url: `http://${env.GATEWAY_HOST}:${env.GATEWAY_PORT}/approval` });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("gateway_shutdown_start", { signal });

    context.close();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    logger.info("gateway_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("gateway_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("gateway_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`mailcal-gateway fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
