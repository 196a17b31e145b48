import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { makeLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = makeLogger({ level: config.logLevel });
const app = buildApp(config, { logger });

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info({ host: config.host, port: config.port }, "Checkout payment processor listening");
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "Failed to start checkout payment processor");
    process.exit(1);
  });
