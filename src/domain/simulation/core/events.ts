import { BatchedEventEmitter } from "./BatchedEventEmitter";
import { VillageEventType } from "../../../shared/constants/EventEnums";
import type { WeatherSnapshot } from "../../../shared/types/simulation/weather";
import type {
  DailyReport,
  MigrationEvent,
} from "../../../shared/types/simulation/village";
import type { TradeRecord } from "../../../shared/types/simulation/economy";

/**
 * Payload carried by each village event.
 */
export interface VillageEventMap extends Record<string, unknown> {
  [VillageEventType.WEATHER_CHANGED]: WeatherSnapshot;
  [VillageEventType.VILLAGER_DIED]: {
    villagerId: string;
    name: string;
    day: number;
  };
  [VillageEventType.VILLAGER_ARRIVED]: {
    villagerId: string;
    name: string;
    day: number;
    migration: boolean;
  };
  [VillageEventType.VILLAGER_LEFT]: MigrationEvent;
  [VillageEventType.TRADE_EXPORTED]: TradeRecord;
  [VillageEventType.TRADE_IMPORTED]: TradeRecord;
  [VillageEventType.DAY_COMPLETED]: DailyReport;
}

/**
 * Event bus shared by the village manager and whoever watches it.
 * Events raised during a tick are batched and flushed once the tick ends.
 *
 * @see BatchedEventEmitter for batching behavior
 */
export type VillageEvents = BatchedEventEmitter<VillageEventMap>;

export function createVillageEvents(): VillageEvents {
  return new BatchedEventEmitter<VillageEventMap>();
}

export { VillageEventType };
