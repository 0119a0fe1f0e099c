import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type AppConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Sets up the Inversify container with the village simulation and its
 * collaborators. Everything is registered as a singleton so the HTTP layer
 * and the process entry point share one village.
 *
 * Registered:
 * - Core: RandomSource, Logger, VillageEvents, WeatherSystem
 * - Simulation: VillageManager
 * - Infrastructure: VillageController
 *
 * @module config
 */
import { RandomSource } from "../shared/utils/RandomUtils";
import { Logger, logger as defaultLogger } from "../infrastructure/utils/logger";
import {
  createVillageEvents,
  type VillageEvents,
} from "../domain/simulation/core/events";
import { WeatherSystem, VillageManager } from "../domain/simulation/systems";
import {
  RandomNameProvider,
  type NameProvider,
} from "../domain/data/NameProvider";
import { VillageController } from "../infrastructure/controllers/villageController";

export interface ContainerOverrides {
  config?: AppConfig;
  rng?: RandomSource;
  logger?: Logger;
  names?: NameProvider;
}

export function createContainer(overrides: ContainerOverrides = {}): Container {
  const config = overrides.config ?? CONFIG;
  const container = new Container();

  container.bind<AppConfig>(TYPES.VillageConfig).toConstantValue(config);
  container
    .bind<RandomSource>(TYPES.RandomSource)
    .toConstantValue(overrides.rng ?? new RandomSource(config.SIMULATION_SEED));
  container
    .bind<Logger>(TYPES.Logger)
    .toConstantValue(overrides.logger ?? defaultLogger);
  container
    .bind<VillageEvents>(TYPES.VillageEvents)
    .toConstantValue(createVillageEvents());
  container
    .bind<NameProvider>(TYPES.NameProvider)
    .toConstantValue(overrides.names ?? new RandomNameProvider());

  container
    .bind<WeatherSystem>(TYPES.WeatherSystem)
    .to(WeatherSystem)
    .inSingletonScope();
  container
    .bind<VillageManager>(TYPES.VillageManager)
    .to(VillageManager)
    .inSingletonScope();
  container
    .bind<VillageController>(TYPES.VillageController)
    .to(VillageController)
    .inSingletonScope();

  return container;
}

export const container = createContainer();
