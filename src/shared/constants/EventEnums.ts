/**
 * Village event enumerations.
 *
 * Events are queued during a tick and flushed once the tick completes.
 *
 * @module shared/constants/EventEnums
 */

export enum VillageEventType {
  WEATHER_CHANGED = "weather:changed",
  VILLAGER_DIED = "villager:died",
  VILLAGER_ARRIVED = "villager:arrived",
  VILLAGER_LEFT = "villager:left",
  TRADE_EXPORTED = "trade:exported",
  TRADE_IMPORTED = "trade:imported",
  DAY_COMPLETED = "village:day-completed",
}
