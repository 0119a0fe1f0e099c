import { AttemptStatus } from "../../../../shared/constants/AIEnums";
import { ItemId } from "../../../../shared/constants/ItemEnums";
import {
  FishSpecies,
  isFishSpecies,
} from "../../../../shared/constants/ResourceEnums";
import {
  Season,
  TimeOfDay,
  WeatherCondition,
} from "../../../../shared/constants/WeatherEnums";
import type { WeatherSnapshot } from "../../../../shared/types/simulation/weather";
import { RandomSource } from "../../../../shared/utils/RandomUtils";
import { clamp, clamp01 } from "../../../../shared/utils/mathUtils";
import { timeOfDayForHour } from "../core/WeatherSystem";

/**
 * Coarse water conditions fish respond to.
 */
export enum WaterCondition {
  SUNNY = "sunny",
  CLOUDY = "cloudy",
  RAINY = "rainy",
  STORMY = "stormy",
  FOGGY = "foggy",
}

interface FishProfile {
  /** 1 = very common */
  rarity: number;
  escapeChance: number;
  activeTimes: readonly TimeOfDay[];
  weatherPreference: readonly WaterCondition[];
  minSkill: number;
  /** Fish per km of length, per metre of depth, per unit of flow */
  density: number;
}

export const FISH_PROFILES: Record<FishSpecies, FishProfile> = {
  [FishSpecies.TROUT]: {
    rarity: 0.7,
    escapeChance: 0.3,
    activeTimes: [TimeOfDay.DAWN, TimeOfDay.EVENING],
    weatherPreference: [WaterCondition.CLOUDY, WaterCondition.RAINY],
    minSkill: 0.5,
    density: 10,
  },
  [FishSpecies.SALMON]: {
    rarity: 0.5,
    escapeChance: 0.4,
    activeTimes: [TimeOfDay.MORNING, TimeOfDay.EVENING],
    weatherPreference: [WaterCondition.CLOUDY],
    minSkill: 2,
    density: 6,
  },
  [FishSpecies.CATFISH]: {
    rarity: 0.6,
    escapeChance: 0.25,
    activeTimes: [TimeOfDay.NIGHT, TimeOfDay.EVENING],
    weatherPreference: [WaterCondition.RAINY, WaterCondition.STORMY],
    minSkill: 1,
    density: 8,
  },
  [FishSpecies.MINNOW]: {
    rarity: 0.9,
    escapeChance: 0.5,
    activeTimes: [TimeOfDay.MORNING, TimeOfDay.AFTERNOON],
    weatherPreference: [WaterCondition.SUNNY],
    minSkill: 0,
    density: 30,
  },
};

export const RIVER_CONSTANTS = {
  BASE_CATCH_CHANCE: 0.3,
  SKILL_BONUS_PER_LEVEL: 0.05,
  MAX_SKILL_BONUS: 0.5,
  EQUIPMENT_BONUS: 0.2,
  TIME_BONUS: 0.1,
  WEATHER_BONUS: 0.1,
  CLARITY_WEIGHT: 0.2,
  RARITY_PENALTY: 0.3,
  ESCAPE_PENALTY: 0.5,
  POLLUTION_PENALTY: 0.3,
  MIN_CATCH_CHANCE: 0.01,
  MAX_CATCH_CHANCE: 0.9,
  SPECIAL_CATCH_BASE: 0.1,
  SPECIAL_CATCH_POLLUTION_WEIGHT: 0.2,
  /** Anglers above this skill may pull up a stone */
  SPECIAL_CATCH_SKILL: 5,
  /** Pollution added per 100 fish caught */
  FISHING_POLLUTION_IMPACT: 0.1,
  POLLUTION_DISSIPATION_PER_FLOW: 0.01,
  REPRODUCTION_RATE: 0.04,
  BASE_MORTALITY_RATE: 0.01,
  /** Upstream inflow kicks in below this share of capacity */
  MIN_POPULATION_SHARE: 0.25,
  INFLOW_SHARE: 0.01,
  INITIAL_POPULATION_SHARE: 0.8,
} as const;

const WATER_CONDITION_BY_WEATHER: Record<WeatherCondition, WaterCondition> = {
  [WeatherCondition.CLEAR]: WaterCondition.SUNNY,
  [WeatherCondition.CLOUDY]: WaterCondition.CLOUDY,
  [WeatherCondition.OVERCAST]: WaterCondition.CLOUDY,
  [WeatherCondition.LIGHT_RAIN]: WaterCondition.RAINY,
  [WeatherCondition.HEAVY_RAIN]: WaterCondition.RAINY,
  [WeatherCondition.SNOWY]: WaterCondition.RAINY,
  [WeatherCondition.STORM]: WaterCondition.STORMY,
  [WeatherCondition.BLIZZARD]: WaterCondition.STORMY,
  [WeatherCondition.HAIL]: WaterCondition.STORMY,
  [WeatherCondition.FOGGY]: WaterCondition.FOGGY,
};

const WATER_CLARITY: Record<WaterCondition, number> = {
  [WaterCondition.SUNNY]: 1,
  [WaterCondition.CLOUDY]: 0.8,
  [WaterCondition.FOGGY]: 0.6,
  [WaterCondition.RAINY]: 0.5,
  [WaterCondition.STORMY]: 0.3,
};

const WATER_MORTALITY: Record<WaterCondition, number> = {
  [WaterCondition.SUNNY]: 0,
  [WaterCondition.CLOUDY]: 0,
  [WaterCondition.FOGGY]: 0,
  [WaterCondition.RAINY]: 0.005,
  [WaterCondition.STORMY]: 0.02,
};

/** Multiplies the catch chance. */
const CATCH_SEASON_MOD: Record<Season, number> = {
  [Season.SPRING]: 1.1,
  [Season.SUMMER]: 1.0,
  [Season.AUTUMN]: 0.9,
  [Season.WINTER]: 0.7,
};

const REPRODUCTION_SEASON_MOD: Record<Season, number> = {
  [Season.SPRING]: 1.5,
  [Season.SUMMER]: 1.2,
  [Season.AUTUMN]: 0.8,
  [Season.WINTER]: 0.3,
};

export interface RiverOptions {
  name: string;
  lengthKm: number;
  depthM: number;
  flowRate: number;
  pollution?: number;
  initialPopulation?: Partial<Record<FishSpecies, number>>;
}

export interface FishingRequest {
  species: string;
  /** Number of casts */
  attempts: number;
  skill: number;
  hasEquipment?: boolean;
}

export interface FishingResult {
  status: AttemptStatus;
  species?: FishSpecies;
  caught: number;
  specialItem?: ItemId;
  probability?: number;
  message: string;
}

export interface RiverStats {
  name: string;
  lengthKm: number;
  depthM: number;
  flowRate: number;
  pollution: number;
  waterClarity: number;
  waterCondition: WaterCondition;
  population: Partial<Record<FishSpecies, number>>;
  capacity: Partial<Record<FishSpecies, number>>;
}

/**
 * A river stocked with fish. Population per species stays within
 * [0, capacity], where capacity depends on the river's size and pollution.
 */
export class River {
  public readonly name: string;
  public readonly lengthKm: number;
  public readonly depthM: number;
  public readonly flowRate: number;

  private readonly rng: RandomSource;
  private pollution: number;
  private population = new Map<FishSpecies, number>();
  private waterCondition = WaterCondition.CLOUDY;
  private waterClarity = WATER_CLARITY[WaterCondition.CLOUDY];
  private season = Season.SPRING;

  constructor(rng: RandomSource, options: RiverOptions) {
    this.rng = rng;
    this.name = options.name;
    this.lengthKm = options.lengthKm;
    this.depthM = options.depthM;
    this.flowRate = options.flowRate;
    this.pollution = clamp01(options.pollution ?? 0);

    for (const species of Object.values(FishSpecies)) {
      const capacity = this.getCapacity(species);
      const initial =
        options.initialPopulation?.[species] ??
        Math.floor(capacity * RIVER_CONSTANTS.INITIAL_POPULATION_SHARE);
      this.population.set(species, clamp(Math.floor(initial), 0, capacity));
    }
    this.waterClarity = WATER_CLARITY[this.waterCondition] * (1 - this.pollution);
  }

  public getCapacity(species: FishSpecies): number {
    return Math.floor(
      this.lengthKm *
        this.depthM *
        this.flowRate *
        FISH_PROFILES[species].density *
        (1 - 0.5 * this.pollution),
    );
  }

  public getPopulation(species: FishSpecies): number {
    return this.population.get(species) ?? 0;
  }

  public getPollution(): number {
    return this.pollution;
  }

  public getFishAbundance(): Partial<Record<FishSpecies, number>> {
    const abundance: Partial<Record<FishSpecies, number>> = {};
    for (const [species, count] of this.population) abundance[species] = count;
    return abundance;
  }

  public getTotalFish(): number {
    let total = 0;
    for (const count of this.population.values()) total += count;
    return total;
  }

  public updateDaily(weather: WeatherSnapshot): void {
    this.season = weather.season;
    this.waterCondition = WATER_CONDITION_BY_WEATHER[weather.condition];

    this.pollution = clamp01(
      this.pollution -
        RIVER_CONSTANTS.POLLUTION_DISSIPATION_PER_FLOW * this.flowRate,
    );
    this.waterClarity =
      WATER_CLARITY[this.waterCondition] * (1 - this.pollution);

    const mortalityRate =
      (RIVER_CONSTANTS.BASE_MORTALITY_RATE +
        WATER_MORTALITY[this.waterCondition]) *
      (1 + this.pollution);

    for (const species of Object.values(FishSpecies)) {
      const capacity = this.getCapacity(species);
      const current = this.getPopulation(species);

      const births =
        capacity > 0
          ? Math.max(
              0,
              Math.floor(
                current *
                  RIVER_CONSTANTS.REPRODUCTION_RATE *
                  REPRODUCTION_SEASON_MOD[this.season] *
                  (1 - current / capacity),
              ),
            )
          : 0;
      const deaths = Math.min(current, Math.floor(current * mortalityRate));
      let next = current + births - deaths;

      if (next < capacity * RIVER_CONSTANTS.MIN_POPULATION_SHARE) {
        next += Math.ceil(capacity * RIVER_CONSTANTS.INFLOW_SHARE);
      }

      this.population.set(species, clamp(next, 0, capacity));
    }
  }

  /**
   * Catch chance for one cast, before the roll.
   */
  public getCatchProbability(
    species: FishSpecies,
    skill: number,
    timeOfDay: TimeOfDay,
    hasEquipment = false,
  ): number {
    const profile = FISH_PROFILES[species];
    const c = RIVER_CONSTANTS;
    const raw =
      c.BASE_CATCH_CHANCE +
      Math.min(skill * c.SKILL_BONUS_PER_LEVEL, c.MAX_SKILL_BONUS) +
      (hasEquipment ? c.EQUIPMENT_BONUS : 0) +
      (profile.activeTimes.includes(timeOfDay) ? c.TIME_BONUS : -c.TIME_BONUS) +
      (profile.weatherPreference.includes(this.waterCondition)
        ? c.WEATHER_BONUS
        : -c.WEATHER_BONUS) +
      this.waterClarity * c.CLARITY_WEIGHT -
      (1 - profile.rarity) * c.RARITY_PENALTY -
      profile.escapeChance * c.ESCAPE_PENALTY -
      this.pollution * c.POLLUTION_PENALTY;

    return clamp(
      raw * CATCH_SEASON_MOD[this.season],
      c.MIN_CATCH_CHANCE,
      c.MAX_CATCH_CHANCE,
    );
  }

  public attemptFishing(request: FishingRequest): FishingResult {
    const { species, skill } = request;
    if (!isFishSpecies(species)) {
      return {
        status: AttemptStatus.INVALID,
        caught: 0,
        message: `Unknown fish type: ${species}`,
      };
    }

    const profile = FISH_PROFILES[species];
    if (skill < profile.minSkill) {
      return {
        status: AttemptStatus.INVALID,
        species,
        caught: 0,
        message: `Fishing skill ${skill.toFixed(1)} is too low for ${species} (needs ${profile.minSkill})`,
      };
    }

    if (this.getPopulation(species) <= 0) {
      return {
        status: AttemptStatus.UNAVAILABLE,
        species,
        caught: 0,
        message: `No ${species} available in ${this.name}`,
      };
    }

    const timeOfDay = timeOfDayForHour(this.rng.intRange(0, 23));
    const probability = this.getCatchProbability(
      species,
      skill,
      timeOfDay,
      request.hasEquipment,
    );

    let caught = 0;
    for (let i = 0; i < Math.max(0, request.attempts); i++) {
      if (this.getPopulation(species) - caught <= 0) break;
      if (this.rng.chance(probability)) caught++;
    }

    if (caught === 0) {
      return {
        status: AttemptStatus.MISSED,
        species,
        caught: 0,
        probability,
        message: `Nothing bit at ${this.name} this ${timeOfDay}`,
      };
    }

    this.population.set(species, this.getPopulation(species) - caught);
    this.pollution = clamp01(
      this.pollution + (RIVER_CONSTANTS.FISHING_POLLUTION_IMPACT * caught) / 100,
    );

    const specialItem = this.rollSpecialCatch(skill);
    return {
      status: AttemptStatus.CAUGHT,
      species,
      caught,
      specialItem,
      probability,
      message: `Caught ${caught} ${species} at ${this.name}`,
    };
  }

  public getStats(): RiverStats {
    const capacity: Partial<Record<FishSpecies, number>> = {};
    for (const species of Object.values(FishSpecies)) {
      capacity[species] = this.getCapacity(species);
    }
    return {
      name: this.name,
      lengthKm: this.lengthKm,
      depthM: this.depthM,
      flowRate: this.flowRate,
      pollution: this.pollution,
      waterClarity: this.waterClarity,
      waterCondition: this.waterCondition,
      population: this.getFishAbundance(),
      capacity,
    };
  }

  private rollSpecialCatch(skill: number): ItemId | undefined {
    const chance =
      RIVER_CONSTANTS.SPECIAL_CATCH_BASE +
      this.pollution * RIVER_CONSTANTS.SPECIAL_CATCH_POLLUTION_WEIGHT;
    if (!this.rng.chance(chance)) return undefined;
    // driftwood
    if (this.pollution > 0.5) return ItemId.WOOD;
    if (skill > RIVER_CONSTANTS.SPECIAL_CATCH_SKILL) return ItemId.STONE;
    return undefined;
  }
}
