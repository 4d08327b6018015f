import { createApp } from "./app";
import { config } from "./config";
import logger from "./logger";
import { COUNTRIES } from "./registry";

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, countriesLoaded: COUNTRIES.length }, `dialplan service running on port ${config.port}`);
  logger.info({ healthUrl: `http://localhost:${config.port}/health` }, `Health check: http://localhost:${config.port}/health`);
  logger.info(
    { validateUrl: `http://localhost:${config.port}/validate?number=%2B12025550173` },
    `Validate number: http://localhost:${config.port}/validate?number=%2B12025550173`,
  );
});

function shutdown(signal: string) {
  logger.info({ signal }, `Received ${signal}, shutting down gracefully...`);
  server.close((err) => {
    if (err) {
      logger.error({ error: err }, "Error while closing server");
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
