import "dotenv/config";
import express from "express";
import preferencesRouter from "./routes/preferences.route";
import { signalStore } from "./services/signal-store.service";
import { engineConfig } from "./services/preference-engine.service";
import { logger } from "./utils/logger";
import { LOG_SOURCES, LOG_MESSAGES, SERVER_CONFIG } from "./constants/log";
import { errorHandler } from "./middleware/error.middleware";

const app = express();

app.use(express.json({ limit: SERVER_CONFIG.JSON_BODY_LIMIT }));

app.use((req, res, next) => {
  req.setTimeout(SERVER_CONFIG.REQUEST_TIMEOUT_MS, () => {
    res.status(408).json({
      error: {
        code: "REQUEST_TIMEOUT",
        message: "Request timeout",
        details: {}
      }
    });
  });
  next();
});

app.use("/api", preferencesRouter);

// Must stay the last middleware
app.use(errorHandler);

const PORT = process.env.PORT || SERVER_CONFIG.DEFAULT_PORT;

async function startServer(): Promise<void> {
  try {
    logger.system(LOG_MESSAGES.CONFIG_LOADED, {
      recomputePolicy: engineConfig.recomputePolicy,
      halfLifeMs: engineConfig.policy.halfLifeMs,
      membership: engineConfig.membershipServiceUrl ?? "local"
    });

    await signalStore.init(engineConfig.signalDbPath);

    const server = app.listen(PORT, () => {
      logger.system(LOG_MESSAGES.SERVER_LISTENING, { port: PORT });
    });

    const shutdown = (signal: NodeJS.Signals) => {
      logger.system(LOG_MESSAGES.GRACEFUL_SHUTDOWN, { signal });
      server.close();
      signalStore
        .close()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error(LOG_SOURCES.SERVER, error instanceof Error ? error : LOG_MESSAGES.UNKNOWN_ERROR);
          process.exit(1);
        });
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  } catch (error) {
    logger.error(LOG_SOURCES.SERVER, LOG_MESSAGES.FAILED_TO_START_SERVER, {
      reason: error instanceof Error ? error.message : "unknown"
    });
    process.exit(1);
  }
}

if (require.main === module) {
  void startServer();
}

export default app;
