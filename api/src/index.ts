/**
 * Custody service entry point: loads config, starts the janitor, serves HTTP.
 */

import { gracefulShutdown } from "../../shared/src/graceful-shutdown.js";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createServices } from "./services.js";

const config = loadConfig();
const services = createServices(config);
const app = createApp({ config, services });

services.janitor.start();

const server = app.listen(config.port, () => {
  console.log(`[api] custody service listening on :${config.port}${config.devMode ? " (dev mode)" : ""}`);
});

gracefulShutdown(server, [() => services.janitor.stop()]);
