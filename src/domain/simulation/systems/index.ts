/**
 * Systems Index
 * ==============
 *
 * Central re-export for the village simulation systems.
 *
 * ┌──────────────────────────────────────────────────────────────┐
 * │ DOMAIN      │ SYSTEMS                                        │
 * ├──────────────────────────────────────────────────────────────┤
 * │ CORE        │ Weather                                        │
 * │ WORLD       │ Forest, River                                  │
 * │ ECONOMY     │ Vendor, Tannery, VillageStorage, ExternalMarket│
 * │ AGENTS      │ Villager, SiteRegistry                         │
 * │ VILLAGE     │ VillageManager, Migration                      │
 * └──────────────────────────────────────────────────────────────┘
 *
 * @module domain/simulation/systems
 */

export { WeatherSystem } from "./core/WeatherSystem";

export { Forest } from "./world/Forest";
export { River } from "./world/River";

export { Vendor } from "./economy/Vendor";
export { Tannery } from "./economy/Tannery";
export { VillageStorage } from "./economy/VillageStorage";
export { ExternalMarket } from "./economy/ExternalMarket";

export { Villager, SiteRegistry } from "./agents";

export { VillageManager } from "./village/VillageManager";
export type { VillageInitOptions } from "./village/VillageManager";
export { MigrationSystem, computeAttractiveness } from "./village/MigrationSystem";
