import { injectable, inject, unmanaged } from "inversify";
import { TYPES } from "../../../../config/Types";
import {
  Season,
  TimeOfDay,
  WeatherCondition,
} from "../../../../shared/constants/WeatherEnums";
import type { WeatherSnapshot } from "../../../../shared/types/simulation/weather";
import { RandomSource } from "../../../../shared/utils/RandomUtils";

export interface WeatherConfig {
  daysPerSeason: number;
  startSeason: Season;
  startCondition: WeatherCondition;
}

const DEFAULT_CONFIG: WeatherConfig = {
  daysPerSeason: 30,
  startSeason: Season.SPRING,
  startCondition: WeatherCondition.CLOUDY,
};

export const SEASON_ORDER: readonly Season[] = [
  Season.SPRING,
  Season.SUMMER,
  Season.AUTUMN,
  Season.WINTER,
];

type ConditionWeights = Partial<Record<WeatherCondition, number>>;

/**
 * Probability of tomorrow's condition given today's.
 */
const TRANSITIONS: Record<WeatherCondition, ConditionWeights> = {
  [WeatherCondition.CLEAR]: {
    [WeatherCondition.CLEAR]: 0.6,
    [WeatherCondition.CLOUDY]: 0.3,
    [WeatherCondition.LIGHT_RAIN]: 0.1,
  },
  [WeatherCondition.CLOUDY]: {
    [WeatherCondition.CLEAR]: 0.2,
    [WeatherCondition.CLOUDY]: 0.4,
    [WeatherCondition.OVERCAST]: 0.2,
    [WeatherCondition.LIGHT_RAIN]: 0.1,
    [WeatherCondition.FOGGY]: 0.1,
  },
  [WeatherCondition.OVERCAST]: {
    [WeatherCondition.CLOUDY]: 0.3,
    [WeatherCondition.OVERCAST]: 0.4,
    [WeatherCondition.LIGHT_RAIN]: 0.2,
    [WeatherCondition.HEAVY_RAIN]: 0.1,
  },
  [WeatherCondition.LIGHT_RAIN]: {
    [WeatherCondition.CLOUDY]: 0.4,
    [WeatherCondition.OVERCAST]: 0.3,
    [WeatherCondition.LIGHT_RAIN]: 0.2,
    [WeatherCondition.HEAVY_RAIN]: 0.1,
  },
  [WeatherCondition.HEAVY_RAIN]: {
    [WeatherCondition.LIGHT_RAIN]: 0.4,
    [WeatherCondition.STORM]: 0.3,
    [WeatherCondition.OVERCAST]: 0.2,
    [WeatherCondition.HEAVY_RAIN]: 0.1,
  },
  [WeatherCondition.STORM]: {
    [WeatherCondition.HEAVY_RAIN]: 0.5,
    [WeatherCondition.CLOUDY]: 0.3,
    [WeatherCondition.LIGHT_RAIN]: 0.2,
  },
  [WeatherCondition.FOGGY]: {
    [WeatherCondition.CLOUDY]: 0.5,
    [WeatherCondition.FOGGY]: 0.3,
    [WeatherCondition.CLEAR]: 0.2,
  },
  [WeatherCondition.SNOWY]: {
    [WeatherCondition.CLOUDY]: 0.3,
    [WeatherCondition.SNOWY]: 0.5,
    [WeatherCondition.BLIZZARD]: 0.1,
    [WeatherCondition.CLEAR]: 0.1,
  },
  [WeatherCondition.BLIZZARD]: {
    [WeatherCondition.SNOWY]: 0.6,
    [WeatherCondition.CLOUDY]: 0.3,
    [WeatherCondition.BLIZZARD]: 0.1,
  },
  [WeatherCondition.HAIL]: {
    [WeatherCondition.STORM]: 0.4,
    [WeatherCondition.HEAVY_RAIN]: 0.3,
    [WeatherCondition.CLOUDY]: 0.3,
  },
};

/**
 * Seasonal multipliers applied on top of the transition table. Missing
 * entries count as 1.
 */
const SEASONAL_TENDENCIES: Record<Season, ConditionWeights> = {
  [Season.SPRING]: {
    [WeatherCondition.LIGHT_RAIN]: 1.5,
    [WeatherCondition.CLEAR]: 1.2,
    [WeatherCondition.SNOWY]: 0.2,
    [WeatherCondition.STORM]: 1.1,
  },
  [Season.SUMMER]: {
    [WeatherCondition.CLEAR]: 1.8,
    [WeatherCondition.STORM]: 1.3,
    [WeatherCondition.HEAVY_RAIN]: 0.8,
    [WeatherCondition.SNOWY]: 0.01,
    [WeatherCondition.FOGGY]: 0.5,
  },
  [Season.AUTUMN]: {
    [WeatherCondition.CLOUDY]: 1.3,
    [WeatherCondition.FOGGY]: 1.5,
    [WeatherCondition.LIGHT_RAIN]: 1.2,
    [WeatherCondition.CLEAR]: 0.8,
    [WeatherCondition.SNOWY]: 0.3,
  },
  [Season.WINTER]: {
    [WeatherCondition.SNOWY]: 2.5,
    [WeatherCondition.BLIZZARD]: 1.5,
    [WeatherCondition.CLOUDY]: 1.2,
    [WeatherCondition.OVERCAST]: 1.2,
    [WeatherCondition.CLEAR]: 0.5,
    [WeatherCondition.LIGHT_RAIN]: 0.5,
    [WeatherCondition.STORM]: 0.3,
  },
};

const SEASON_AVERAGE_TEMPERATURE: Record<Season, number> = {
  [Season.SPRING]: 12,
  [Season.SUMMER]: 22,
  [Season.AUTUMN]: 14,
  [Season.WINTER]: 2,
};

const CONDITION_TEMPERATURE_MODIFIER: Record<WeatherCondition, number> = {
  [WeatherCondition.CLEAR]: 2,
  [WeatherCondition.CLOUDY]: 0,
  [WeatherCondition.OVERCAST]: -1,
  [WeatherCondition.LIGHT_RAIN]: -1.5,
  [WeatherCondition.HEAVY_RAIN]: -2,
  [WeatherCondition.STORM]: -2.5,
  [WeatherCondition.FOGGY]: -0.5,
  [WeatherCondition.SNOWY]: -5,
  [WeatherCondition.BLIZZARD]: -8,
  [WeatherCondition.HAIL]: -3,
};

const PRECIPITATION_INTENSITY: Record<WeatherCondition, number> = {
  [WeatherCondition.CLEAR]: 0,
  [WeatherCondition.CLOUDY]: 0,
  [WeatherCondition.OVERCAST]: 0.1,
  [WeatherCondition.LIGHT_RAIN]: 1,
  [WeatherCondition.HEAVY_RAIN]: 2,
  [WeatherCondition.STORM]: 3,
  [WeatherCondition.FOGGY]: 0,
  [WeatherCondition.SNOWY]: 1.5,
  [WeatherCondition.BLIZZARD]: 3,
  [WeatherCondition.HAIL]: 2.5,
};

const SNOW_CONDITIONS: ReadonlySet<WeatherCondition> = new Set([
  WeatherCondition.SNOWY,
  WeatherCondition.BLIZZARD,
]);

/** Snow outside winter is damped when it is warmer than this. */
const SNOW_DAMPING_TEMPERATURE = 2;
const SNOW_DAMPING_FACTOR = 0.01;
const HAIL_DAMPING_FACTOR = 0.1;
/** Snow that falls this warm outside winter half melts on landing. */
const SNOW_MELT_TEMPERATURE = 1;

export function nextSeason(season: Season): Season {
  const index = SEASON_ORDER.indexOf(season);
  return SEASON_ORDER[(index + 1) % SEASON_ORDER.length];
}

export function estimateTemperature(
  season: Season,
  condition: WeatherCondition,
): number {
  return (
    SEASON_AVERAGE_TEMPERATURE[season] +
    CONDITION_TEMPERATURE_MODIFIER[condition]
  );
}

export function precipitationIntensity(
  season: Season,
  condition: WeatherCondition,
): number {
  const base = PRECIPITATION_INTENSITY[condition];
  if (
    SNOW_CONDITIONS.has(condition) &&
    season !== Season.WINTER &&
    estimateTemperature(season, condition) > SNOW_MELT_TEMPERATURE
  ) {
    return base * 0.5;
  }
  return base;
}

/**
 * Normalized probabilities of tomorrow's condition, in table order.
 */
export function computeTransitionWeights(
  current: WeatherCondition,
  season: Season,
): Array<[WeatherCondition, number]> {
  const temperature = estimateTemperature(season, current);
  const tendencies = SEASONAL_TENDENCIES[season];
  const weighted: Array<[WeatherCondition, number]> = [];

  for (const condition of Object.values(WeatherCondition)) {
    const base = TRANSITIONS[current][condition];
    if (base === undefined) continue;

    let weight = base * (tendencies[condition] ?? 1);
    if (
      SNOW_CONDITIONS.has(condition) &&
      season !== Season.WINTER &&
      temperature > SNOW_DAMPING_TEMPERATURE
    ) {
      weight *= SNOW_DAMPING_FACTOR;
    }
    if (
      condition === WeatherCondition.HAIL &&
      current !== WeatherCondition.STORM
    ) {
      weight *= HAIL_DAMPING_FACTOR;
    }
    weighted.push([condition, weight]);
  }

  const total = weighted.reduce((sum, [, w]) => sum + w, 0);
  if (total <= 0) return [[current, 1]];
  return weighted.map(([condition, w]) => [condition, w / total]);
}

export function timeOfDayForHour(hour: number): TimeOfDay {
  if (hour >= 4 && hour <= 6) return TimeOfDay.DAWN;
  if (hour >= 7 && hour <= 11) return TimeOfDay.MORNING;
  if (hour >= 12 && hour <= 16) return TimeOfDay.AFTERNOON;
  if (hour >= 17 && hour <= 20) return TimeOfDay.EVENING;
  return TimeOfDay.NIGHT;
}

/**
 * Seasonal weather model advanced once per simulated day.
 *
 * Seasons last `daysPerSeason` days each. Tomorrow's condition is drawn
 * from a Markov table over today's condition, skewed by the season.
 */
@injectable()
export class WeatherSystem {
  private readonly config: WeatherConfig;
  private readonly rng: RandomSource;
  private day = 0;
  private dayInSeason = 0;
  private season: Season;
  private condition: WeatherCondition;

  constructor(
    @inject(TYPES.RandomSource) rng: RandomSource,
    @unmanaged() config?: Partial<WeatherConfig>,
  ) {
    this.rng = rng;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.season = this.config.startSeason;
    this.condition = this.config.startCondition;
  }

  public get currentSeason(): Season {
    return this.season;
  }

  public get currentCondition(): WeatherCondition {
    return this.condition;
  }

  public get currentDay(): number {
    return this.day;
  }

  public advanceDay(): WeatherSnapshot {
    this.day++;
    this.dayInSeason++;
    if (this.dayInSeason > this.config.daysPerSeason) {
      this.dayInSeason = 1;
      this.season = nextSeason(this.season);
    }

    this.condition = this.pickNextCondition();
    return this.getSnapshot();
  }

  public getTemperatureEstimate(): number {
    return estimateTemperature(this.season, this.condition);
  }

  public getPrecipitationIntensity(): number {
    return precipitationIntensity(this.season, this.condition);
  }

  public getSnapshot(): WeatherSnapshot {
    return {
      day: this.day,
      season: this.season,
      dayInSeason: Math.max(1, this.dayInSeason),
      condition: this.condition,
      temperature: this.getTemperatureEstimate(),
      precipitation: this.getPrecipitationIntensity(),
    };
  }

  private pickNextCondition(): WeatherCondition {
    const weights = computeTransitionWeights(this.condition, this.season);
    const roll = this.rng.float();
    let cumulative = 0;
    for (const [condition, probability] of weights) {
      cumulative += probability;
      if (roll < cumulative) return condition;
    }
    return weights[weights.length - 1][0];
  }
}
