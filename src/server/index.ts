import { loadConfig } from "../config.js";
import { serverLogger } from "../logger.js";
import { createServices } from "../services/index.js";
import { buildServer } from "./app.js";

const config = loadConfig();
const services = createServices(config);
const app = await buildServer(services);

// Background sync runs alongside the HTTP server
services.orchestrator.start();

async function shutdown(signal: string): Promise<void> {
  serverLogger.info({ signal }, "Shutting down");
  try {
    await app.close();
    await services.close();
    process.exit(0);
  } catch (err) {
    serverLogger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));

// Start server
try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port },
    "Server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  await services.close();
  process.exit(1);
}
