/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  VillageManager: Symbol.for("VillageManager"),
  WeatherSystem: Symbol.for("WeatherSystem"),
  RandomSource: Symbol.for("RandomSource"),
  Logger: Symbol.for("Logger"),
  VillageEvents: Symbol.for("VillageEvents"),
  VillageConfig: Symbol.for("VillageConfig"),
  NameProvider: Symbol.for("NameProvider"),
  VillageController: Symbol.for("VillageController"),
};
