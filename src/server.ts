/**
 * HTTP entry point — serves the screening API.
 *
 * Start: npm run serve
 */

import { createApp } from "./server/app.js";
import { createDependencies } from "./screening/service.js";
import { config } from "./config/index.js";
import { moduleLogger } from "./utils/logger.js";

const log = moduleLogger("server");

const app = createApp(createDependencies(config));

app.listen(config.port, () => {
  log.info(`═══════════════════════════════════════════`);
  log.info(`  ATM Call Screener API`);
  log.info(`  http://localhost:${config.port}`);
  log.info(`  Prices: ${config.priceProvider}, throttle ${config.throttleMs}ms`);
  log.info(`═══════════════════════════════════════════`);
});
