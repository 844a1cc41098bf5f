import express from "express";
import session from "express-session";

import { loadConfig } from "./config";
import { registerRoutes } from "./routes";
import { requestLoggingMiddleware, getLogger, logger } from "./observability/logger";

const config = loadConfig();
const app = express();

const shutdownSignals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
for (const signal of shutdownSignals) {
  process.once(signal, () => {
    logger.info("Shutdown signal received", {
      event: "server.shutdown",
      context: { signal },
    });
    process.exit(0);
  });
}

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use(
  session({
    secret: config.sessionSecret,
    resave: false,
    saveUninitialized: false,
    cookie: {
      secure: config.production,
      httpOnly: true,
      sameSite: "lax",
      maxAge: 1000 * 60 * 60 * 8, // 8 hours
    },
  })
);

app.use(requestLoggingMiddleware);

(async () => {
  const server = await registerRoutes(app, { config });

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    getLogger().info("Server started", {
      event: "server.start",
      context: { port: config.port, erpConfigured: config.erpBaseUrl !== null },
    });
  });
})().catch(error => {
  logger.error("Server failed to start", { event: "server.start" }, error);
  process.exit(1);
});
