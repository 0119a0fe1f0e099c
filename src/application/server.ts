import "dotenv/config";
import { createApp } from "./app";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import { VillageManager } from "../domain/simulation/systems/village/VillageManager";
import { RandomSource } from "../shared/utils/RandomUtils";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";

/**
 * Main server entry point.
 *
 * Initializes the village from the environment, serves the HTTP API and,
 * when `AUTO_TICK_INTERVAL_MS` is set, advances one day per interval.
 *
 * @module application
 */

const manager = container.get<VillageManager>(TYPES.VillageManager);
const rng = container.get<RandomSource>(TYPES.RandomSource);

if (!CONFIG.SIMULATION_SEED) {
  logger.info(`No SIMULATION_SEED set, using ${rng.seed}`, LogCategory.SIMULATION);
}

manager.initializeVillage({
  villageName: CONFIG.VILLAGE_NAME,
  villagerCount: CONFIG.INITIAL_VILLAGERS,
  forestSizeSqKm: CONFIG.FOREST_SIZE_SQ_KM,
  riverName: CONFIG.RIVER_NAME,
});

const app = createApp(container, CONFIG);
const server = app.listen(CONFIG.PORT, () => {
  logger.info(`Village server running on http://localhost:${CONFIG.PORT}`);
});

let autoTick: NodeJS.Timeout | undefined;
if (CONFIG.AUTO_TICK_INTERVAL_MS > 0) {
  autoTick = setInterval(() => {
    try {
      manager.simulateDailyTick();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Automatic tick failed:", LogCategory.SIMULATION, message);
    }
  }, CONFIG.AUTO_TICK_INTERVAL_MS);
}

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  if (autoTick) clearInterval(autoTick);
  server.close(() => {
    logger
      .flush()
      .catch((err: unknown) => {
        console.error("Failed to flush logs:", err);
      })
      .finally(() => {
        logger.destroy();
        process.exit(0);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
