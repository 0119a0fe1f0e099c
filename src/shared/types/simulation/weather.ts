import type { Season, WeatherCondition } from "../../constants/WeatherEnums";

/**
 * Read-only view of one simulated day's weather, consumed by every site.
 */
export interface WeatherSnapshot {
  /** Days elapsed since the simulation started (1 on the first tick) */
  readonly day: number;
  readonly season: Season;
  /** 1-based position inside the current season */
  readonly dayInSeason: number;
  readonly condition: WeatherCondition;
  /** Daily temperature estimate in °C */
  readonly temperature: number;
  /** Precipitation intensity, 0 (dry) to 3 (torrential) */
  readonly precipitation: number;
}
