import { fileURLToPath } from "node:url";
import { loadConfig } from "./common/config.js";
import { errorMessage, log, setLogLevel } from "./common/logger.js";
import { createDashboardServer, InMemoryGateway, loadSeed } from "./dashboard/index.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const seedPath = config.seedPath ?? fileURLToPath(new URL("../config/seed.json", import.meta.url));
const seed = await loadSeed(seedPath);
const gateway = new InMemoryGateway(seed, { timeRange: config.performanceTimeRange });
const { app } = createDashboardServer(config, gateway);

try {
  await app.listen({ port: config.port, host: config.host });
  log.info("dashboard listening", { host: config.host, port: config.port, seedPath });
} catch (err) {
  if (typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE") {
    log.error(`Port ${config.port} is already in use; set DASHBOARD_PORT to another port.`);
  } else {
    log.error("dashboard failed to start", { error: errorMessage(err) });
  }
  process.exit(1);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("dashboard shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      },
    );
  });
}
