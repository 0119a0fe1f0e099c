/**
 * @fileoverview Agent Systems - Barrel exports
 *
 * Aldeanos, su subsistema de decisión y los sitios que se les prestan.
 *
 * @module domain/simulation/systems/agents
 */

export { Villager } from "./Villager";
export type { VillagerInit, VillagerDayContext, ActionOutcome } from "./Villager";
export { SiteRegistry } from "./SiteRegistry";
export type { SiteRegistryInit } from "./SiteRegistry";
