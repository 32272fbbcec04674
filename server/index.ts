// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
// Do NOT move dotenv loading into db.ts or services.
import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config";
import { createSystemContext } from "./context";
import { configureLogging, log } from "./logging";
import { createPlatform } from "./platform";
import { startTargetConfigurator } from "./services/targetConfigurator";

const SYSTEM_USER = "system";

const config = loadConfig();
configureLogging({ logCommands: config.logCommands });

const platform = createPlatform(config);
const stopConfigurator = startTargetConfigurator(platform.bus, createSystemContext(SYSTEM_USER));

log(`deployment core ready (${config.env})`);

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  log(`${signal} received, shutting down`);
  stopConfigurator();
  await platform.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      console.error(`[platform] Shutdown failed: ${err instanceof Error ? err.message : err}`);
      process.exitCode = 1;
    });
  });
}

export { platform };
