import { AttemptStatus } from "../../../../shared/constants/AIEnums";
import {
  TreeType,
  WildlifeSpecies,
  isWildlifeSpecies,
} from "../../../../shared/constants/ResourceEnums";
import { Season, WeatherCondition } from "../../../../shared/constants/WeatherEnums";
import type { WeatherSnapshot } from "../../../../shared/types/simulation/weather";
import { RandomSource } from "../../../../shared/utils/RandomUtils";
import { clamp, clamp01 } from "../../../../shared/utils/mathUtils";

export interface ForestOptions {
  name: string;
  sizeSqKm: number;
  /** Overrides the size-derived starting wildlife, per species */
  initialWildlife?: Partial<Record<WildlifeSpecies, number>>;
}

export interface TreeHarvest {
  cut: number;
  breakdown: { mature: number; young: number };
  /** Estimated split of the cut wood by tree species */
  woodByType: Partial<Record<TreeType, number>>;
}

export interface HuntResult {
  status: AttemptStatus;
  species?: WildlifeSpecies;
  meat: number;
  skin: number;
  message: string;
}

export interface ForageResult {
  gathered: number;
  message: string;
}

export interface ForestStats {
  name: string;
  sizeSqKm: number;
  matureTrees: number;
  youngTrees: number;
  saplings: number;
  treeDensity: number;
  health: number;
  moisture: number;
  soilFertility: number;
  undergrowthDensity: number;
  fireRisk: number;
  diseaseLevel: number;
  pestInfestation: number;
  forageStock: number;
  treesCutToday: number;
  wildlife: Partial<Record<WildlifeSpecies, number>>;
}

export const FOREST_CONSTANTS = {
  /** Starting trees per km² */
  INITIAL_MATURE_PER_SQ_KM: 1000,
  INITIAL_YOUNG_PER_SQ_KM: 500,
  INITIAL_SAPLINGS_PER_SQ_KM: 800,
  /** Effective trees (mature + 0.5 young + 0.1 saplings) per km² at full density */
  MAX_TREES_PER_SQ_KM: 1500,
  YOUNG_DENSITY_WEIGHT: 0.5,
  SAPLING_DENSITY_WEIGHT: 0.1,
  SAPLING_SPAWN_RATE_PER_MATURE_TREE: 0.02,
  SAPLING_TO_YOUNG_MATURATION_RATE: 0.1,
  YOUNG_TO_MATURE_MATURATION_RATE: 0.05,
  BASE_TREE_MORTALITY_RATE: 0.005,
  WILDLIFE_CARRYING_CAPACITY_PER_SQ_KM: 200,
  WILDLIFE_BASE_REPRODUCTION_RATE: 0.15,
  WILDLIFE_BASE_MORTALITY_RATE: 0.1,
  MIN_INITIAL_WILDLIFE: 5,
  FORAGE_CAPACITY_PER_SQ_KM: 150,
  FORAGE_DAILY_REGROWTH: 0.3,
  HUNT_BASE_CHANCE: 0.25,
  HUNT_SKILL_BONUS_PER_LEVEL: 0.05,
  HUNT_MAX_SKILL_BONUS: 0.5,
  MIN_HUNT_CHANCE: 0.01,
  MAX_HUNT_CHANCE: 0.9,
} as const;

const TREE_MIX: Record<TreeType, number> = {
  [TreeType.OAK]: 0.3,
  [TreeType.PINE]: 0.25,
  [TreeType.BIRCH]: 0.2,
  [TreeType.MAPLE]: 0.15,
  [TreeType.SPRUCE]: 0.1,
};

interface WildlifeProfile {
  /** Subtracted from the catch probability */
  difficulty: number;
  meat: number;
  skin: number;
}

const WILDLIFE_PROFILES: Record<WildlifeSpecies, WildlifeProfile> = {
  [WildlifeSpecies.DEER]: { difficulty: 0.15, meat: 3, skin: 2 },
  [WildlifeSpecies.BOAR]: { difficulty: 0.2, meat: 3, skin: 2 },
  [WildlifeSpecies.RABBIT]: { difficulty: 0.05, meat: 1, skin: 1 },
  [WildlifeSpecies.FOX]: { difficulty: 0.1, meat: 0, skin: 1 },
  [WildlifeSpecies.BIRD]: { difficulty: 0.1, meat: 1, skin: 0 },
  [WildlifeSpecies.SQUIRREL]: { difficulty: 0.05, meat: 1, skin: 0 },
};

const GROWTH_SEASON_MOD: Record<Season, number> = {
  [Season.SPRING]: 1.0,
  [Season.SUMMER]: 0.8,
  [Season.AUTUMN]: 0.2,
  [Season.WINTER]: 0,
};

const UNDERGROWTH_SEASON_DELTA: Record<Season, number> = {
  [Season.SPRING]: 0.1,
  [Season.SUMMER]: 0.05,
  [Season.AUTUMN]: -0.05,
  [Season.WINTER]: -0.1,
};

const WILDLIFE_CAPACITY_SEASON_MOD: Record<Season, number> = {
  [Season.SPRING]: 1.2,
  [Season.SUMMER]: 1.0,
  [Season.AUTUMN]: 0.8,
  [Season.WINTER]: 0.4,
};

const FORAGE_SEASON_MOD: Record<Season, number> = {
  [Season.SPRING]: 1.0,
  [Season.SUMMER]: 1.2,
  [Season.AUTUMN]: 1.0,
  [Season.WINTER]: 0.2,
};

const WET_CONDITIONS: ReadonlySet<WeatherCondition> = new Set([
  WeatherCondition.LIGHT_RAIN,
  WeatherCondition.HEAVY_RAIN,
  WeatherCondition.SNOWY,
]);

function growthTemperatureMod(temperature: number): number {
  if (temperature >= 10 && temperature <= 25) return 1;
  if (
    (temperature >= 5 && temperature < 10) ||
    (temperature > 25 && temperature <= 30)
  ) {
    return 0.5;
  }
  return 0;
}

/**
 * Shared forest: tiered tree stock, wildlife and forage, all evolving once
 * per day under the weather.
 *
 * Counts never go below zero. The effective tree count never exceeds
 * `size × MAX_TREES_PER_SQ_KM` and each wildlife species never exceeds its
 * carrying capacity for the day.
 */
export class Forest {
  public readonly name: string;
  public readonly sizeSqKm: number;

  private readonly rng: RandomSource;
  private matureTrees: number;
  private youngTrees: number;
  private saplings: number;
  private treeDensity = 0;
  private health = 0.8;
  private moisture = 0.6;
  private soilFertility = 0.7;
  private undergrowthDensity = 0.5;
  private fireRisk = 0.1;
  private diseaseLevel = 0.05;
  private pestInfestation = 0.1;
  private forageStock: number;
  private treesCutToday = 0;
  private wildlife = new Map<WildlifeSpecies, number>();

  constructor(rng: RandomSource, options: ForestOptions) {
    this.rng = rng;
    this.name = options.name;
    this.sizeSqKm = options.sizeSqKm;

    this.matureTrees = Math.floor(
      FOREST_CONSTANTS.INITIAL_MATURE_PER_SQ_KM * this.sizeSqKm,
    );
    this.youngTrees = Math.floor(
      FOREST_CONSTANTS.INITIAL_YOUNG_PER_SQ_KM * this.sizeSqKm,
    );
    this.saplings = Math.floor(
      FOREST_CONSTANTS.INITIAL_SAPLINGS_PER_SQ_KM * this.sizeSqKm,
    );

    const species = Object.values(WildlifeSpecies);
    const basePerSpecies = Math.floor(
      ((FOREST_CONSTANTS.WILDLIFE_CARRYING_CAPACITY_PER_SQ_KM * this.sizeSqKm) /
        species.length) *
        0.5,
    );
    for (const s of species) {
      const override = options.initialWildlife?.[s];
      this.wildlife.set(
        s,
        override ??
          Math.max(
            FOREST_CONSTANTS.MIN_INITIAL_WILDLIFE,
            Math.floor(basePerSpecies * this.rng.floatRange(0.7, 1.3)),
          ),
      );
    }

    this.forageStock = Math.floor(
      this.sizeSqKm *
        FOREST_CONSTANTS.FORAGE_CAPACITY_PER_SQ_KM *
        this.undergrowthDensity,
    );
    this.enforceTreeCapacity();
    this.updateTreeDensity();
  }

  public get maxEffectiveTrees(): number {
    return this.sizeSqKm * FOREST_CONSTANTS.MAX_TREES_PER_SQ_KM;
  }

  public get effectiveTreeCount(): number {
    return (
      this.matureTrees +
      this.youngTrees * FOREST_CONSTANTS.YOUNG_DENSITY_WEIGHT +
      this.saplings * FOREST_CONSTANTS.SAPLING_DENSITY_WEIGHT
    );
  }

  public getHealth(): number {
    return this.health;
  }

  public getTreeCounts(): { mature: number; young: number; saplings: number } {
    return {
      mature: this.matureTrees,
      young: this.youngTrees,
      saplings: this.saplings,
    };
  }

  public getWildlifePopulation(species: WildlifeSpecies): number {
    return this.wildlife.get(species) ?? 0;
  }

  public getForageStock(): number {
    return this.forageStock;
  }

  /**
   * Species with at least one animal left.
   */
  public getHuntableSpecies(): WildlifeSpecies[] {
    return [...this.wildlife.entries()]
      .filter(([, count]) => count > 0)
      .map(([species]) => species);
  }

  /**
   * Carrying capacity of a single species under the current conditions.
   */
  public getSpeciesCapacity(season: Season): number {
    const total = Math.floor(
      this.sizeSqKm *
        FOREST_CONSTANTS.WILDLIFE_CARRYING_CAPACITY_PER_SQ_KM *
        this.health *
        this.undergrowthDensity *
        (1 - this.pestInfestation * 0.3) *
        WILDLIFE_CAPACITY_SEASON_MOD[season],
    );
    return Math.max(1, Math.floor(total / Math.max(1, this.wildlife.size)));
  }

  public updateDaily(weather: WeatherSnapshot): void {
    const { season, condition, temperature, precipitation } = weather;

    this.updateMoistureAndFireRisk(precipitation, temperature, condition);
    this.updateTreeGrowthAndMortality(season, temperature, condition);
    this.updateWildlife(season, temperature, condition);
    this.updateDiseaseAndPests(season, temperature);
    this.health = this.calculateHealth();
    this.updateTreeDensity();
    this.updateUndergrowth(season);
    this.regrowForage(season);

    this.treesCutToday = 0;
  }

  /**
   * Cuts mature trees first, then young ones. Saplings are never cut.
   */
  public cutTrees(amount: number): TreeHarvest {
    const requested = Math.max(0, Math.floor(amount));
    if (requested === 0) {
      return { cut: 0, breakdown: { mature: 0, young: 0 }, woodByType: {} };
    }

    const fromMature = Math.min(requested, this.matureTrees);
    this.matureTrees -= fromMature;
    const fromYoung = Math.min(requested - fromMature, this.youngTrees);
    this.youngTrees -= fromYoung;

    const cut = fromMature + fromYoung;
    this.treesCutToday += cut;
    this.updateTreeDensity();

    const woodByType: Partial<Record<TreeType, number>> = {};
    if (cut > 0) {
      for (const type of Object.values(TreeType)) {
        woodByType[type] = Math.ceil(cut * TREE_MIX[type]);
      }
    }

    const disturbance = cut / (this.sizeSqKm * 100 + 1);
    this.soilFertility = Math.max(0.1, this.soilFertility - 0.001 * disturbance);
    this.health = Math.max(0.1, this.health - 0.0005 * disturbance);

    return { cut, breakdown: { mature: fromMature, young: fromYoung }, woodByType };
  }

  /**
   * One hunting attempt. Success removes exactly one animal.
   */
  public attemptHunt(species: string, skill: number): HuntResult {
    if (!isWildlifeSpecies(species)) {
      return {
        status: AttemptStatus.INVALID,
        meat: 0,
        skin: 0,
        message: `Unknown wildlife species: ${species}`,
      };
    }

    const population = this.wildlife.get(species) ?? 0;
    if (population <= 0) {
      return {
        status: AttemptStatus.UNAVAILABLE,
        species,
        meat: 0,
        skin: 0,
        message: `No ${species} left in ${this.name}`,
      };
    }

    const profile = WILDLIFE_PROFILES[species];
    const probability = clamp(
      FOREST_CONSTANTS.HUNT_BASE_CHANCE +
        Math.min(
          skill * FOREST_CONSTANTS.HUNT_SKILL_BONUS_PER_LEVEL,
          FOREST_CONSTANTS.HUNT_MAX_SKILL_BONUS,
        ) -
        profile.difficulty,
      FOREST_CONSTANTS.MIN_HUNT_CHANCE,
      FOREST_CONSTANTS.MAX_HUNT_CHANCE,
    );

    if (!this.rng.chance(probability)) {
      return {
        status: AttemptStatus.MISSED,
        species,
        meat: 0,
        skin: 0,
        message: `The ${species} got away`,
      };
    }

    this.wildlife.set(species, population - 1);
    return {
      status: AttemptStatus.CAUGHT,
      species,
      meat: profile.meat,
      skin: profile.skin,
      message: `Hunted a ${species} in ${this.name}`,
    };
  }

  /**
   * Gathers berries from the undergrowth, never more than requested or left.
   */
  public forage(requested: number): ForageResult {
    const gathered = Math.max(
      0,
      Math.min(Math.floor(requested), Math.floor(this.forageStock)),
    );
    this.forageStock -= gathered;
    return {
      gathered,
      message:
        gathered > 0
          ? `Gathered ${gathered} berries in ${this.name}`
          : `Nothing left to forage in ${this.name}`,
    };
  }

  public getStats(): ForestStats {
    const wildlife: Partial<Record<WildlifeSpecies, number>> = {};
    for (const [species, count] of this.wildlife) wildlife[species] = count;
    return {
      name: this.name,
      sizeSqKm: this.sizeSqKm,
      matureTrees: this.matureTrees,
      youngTrees: this.youngTrees,
      saplings: this.saplings,
      treeDensity: this.treeDensity,
      health: this.health,
      moisture: this.moisture,
      soilFertility: this.soilFertility,
      undergrowthDensity: this.undergrowthDensity,
      fireRisk: this.fireRisk,
      diseaseLevel: this.diseaseLevel,
      pestInfestation: this.pestInfestation,
      forageStock: this.forageStock,
      treesCutToday: this.treesCutToday,
      wildlife,
    };
  }

  private updateMoistureAndFireRisk(
    precipitation: number,
    temperature: number,
    condition: WeatherCondition,
  ): void {
    this.moisture += precipitation * 0.1;
    const evaporation =
      (0.01 + Math.max(0, temperature - 10) / 500) *
      (1 - this.treeDensity * 0.5);
    this.moisture = clamp01(this.moisture - evaporation);

    const dryness = 1 - this.moisture;
    const heat = Math.max(0, temperature - 15) / 20;
    let fireRisk = dryness * 0.5 + heat * 0.3 + this.undergrowthDensity * 0.2;
    if (condition === WeatherCondition.STORM) {
      fireRisk *= 0.5;
      // lightning
      if (this.rng.chance(0.05)) fireRisk += 0.3;
    } else if (WET_CONDITIONS.has(condition)) {
      fireRisk *= 0.2;
    }
    this.fireRisk = clamp01(fireRisk + this.rng.floatRange(-0.05, 0.05));
  }

  private updateTreeGrowthAndMortality(
    season: Season,
    temperature: number,
    condition: WeatherCondition,
  ): void {
    const conditionsMod = Math.max(
      0,
      GROWTH_SEASON_MOD[season] *
        growthTemperatureMod(temperature) *
        this.health *
        this.moisture *
        this.soilFertility *
        (1 - this.treeDensity * 0.3) *
        (1 - this.diseaseLevel * 0.5) *
        (1 - this.pestInfestation * 0.5),
    );

    const newSaplings = Math.floor(
      this.matureTrees *
        FOREST_CONSTANTS.SAPLING_SPAWN_RATE_PER_MATURE_TREE *
        conditionsMod *
        this.rng.floatRange(0.8, 1.2),
    );
    this.saplings += newSaplings;

    const saplingsMaturing = Math.min(
      this.saplings,
      Math.floor(
        this.saplings *
          FOREST_CONSTANTS.SAPLING_TO_YOUNG_MATURATION_RATE *
          conditionsMod *
          this.rng.floatRange(0.7, 1.3),
      ),
    );
    this.saplings -= saplingsMaturing;
    this.youngTrees += saplingsMaturing;

    const youngMaturing = Math.min(
      this.youngTrees,
      Math.floor(
        this.youngTrees *
          FOREST_CONSTANTS.YOUNG_TO_MATURE_MATURATION_RATE *
          conditionsMod *
          this.rng.floatRange(0.7, 1.3),
      ),
    );
    this.youngTrees -= youngMaturing;
    this.matureTrees += youngMaturing;

    let matureMortality =
      FOREST_CONSTANTS.BASE_TREE_MORTALITY_RATE +
      (1 - this.health) * 0.01 +
      this.diseaseLevel * 0.02 +
      this.pestInfestation * 0.02;
    let youngMortality = matureMortality * 1.5;
    let saplingMortality = matureMortality * 2;

    const drought =
      season === Season.SUMMER && this.moisture < 0.1 && temperature > 30;
    if (condition === WeatherCondition.BLIZZARD || drought) {
      matureMortality *= 1.5;
      youngMortality *= 2;
      saplingMortality *= 2.5;
    }
    // windthrow
    if (condition === WeatherCondition.STORM && this.rng.chance(0.1)) {
      matureMortality *= 1.2;
      youngMortality *= 1.5;
    }

    this.matureTrees -= this.mortality(this.matureTrees, matureMortality);
    this.youngTrees -= this.mortality(this.youngTrees, youngMortality);
    this.saplings -= this.mortality(this.saplings, saplingMortality);

    this.soilFertility = clamp(
      this.soilFertility -
        0.0001 +
        matureMortality * this.matureTrees * 0.00001,
      0.1,
      1,
    );

    this.enforceTreeCapacity();
  }

  private mortality(count: number, rate: number): number {
    return Math.min(
      count,
      Math.floor(count * rate * this.rng.floatRange(0.8, 1.2)),
    );
  }

  /**
   * Trims saplings, then young, then mature trees until the effective
   * count fits the forest's area.
   */
  private enforceTreeCapacity(): void {
    let excess = this.effectiveTreeCount - this.maxEffectiveTrees;
    if (excess <= 0) return;

    const trim = (count: number, weight: number): number => {
      if (excess <= 0 || count === 0) return 0;
      const removed = Math.min(count, Math.ceil(excess / weight));
      excess -= removed * weight;
      return removed;
    };

    this.saplings -= trim(
      this.saplings,
      FOREST_CONSTANTS.SAPLING_DENSITY_WEIGHT,
    );
    this.youngTrees -= trim(
      this.youngTrees,
      FOREST_CONSTANTS.YOUNG_DENSITY_WEIGHT,
    );
    this.matureTrees -= trim(this.matureTrees, 1);
  }

  private updateTreeDensity(): void {
    const max = this.maxEffectiveTrees;
    this.treeDensity = max > 0 ? Math.min(1, this.effectiveTreeCount / max) : 0;
  }

  private updateUndergrowth(season: Season): void {
    const light = 1 - this.treeDensity * 0.7;
    this.undergrowthDensity = clamp(
      this.undergrowthDensity +
        UNDERGROWTH_SEASON_DELTA[season] *
          this.moisture *
          light *
          this.soilFertility *
          this.rng.floatRange(0.5, 1.5),
      0.05,
      1,
    );
  }

  private updateWildlife(
    season: Season,
    temperature: number,
    condition: WeatherCondition,
  ): void {
    const capacity = this.getSpeciesCapacity(season);

    const reproductionMod =
      season === Season.SPRING ? 1.5 : season === Season.WINTER ? 0.2 : 1;
    let mortalityMod = season === Season.WINTER ? 1.8 : 1;
    if (condition === WeatherCondition.BLIZZARD) mortalityMod *= 2.5;
    else if (condition === WeatherCondition.STORM) mortalityMod *= 1.5;
    if (this.moisture < 0.1 && temperature > 30) mortalityMod *= 1.5;

    for (const [species, population] of this.wildlife) {
      if (population === 0) continue;

      let births = 0;
      if (population < capacity) {
        births = Math.max(
          0,
          Math.floor(
            population *
              FOREST_CONSTANTS.WILDLIFE_BASE_REPRODUCTION_RATE *
              reproductionMod *
              (1 - population / (capacity + 1)),
          ),
        );
      }
      const deaths = Math.min(
        population,
        Math.floor(
          population * FOREST_CONSTANTS.WILDLIFE_BASE_MORTALITY_RATE * mortalityMod,
        ),
      );

      this.wildlife.set(
        species,
        clamp(population + births - deaths, 0, capacity),
      );
    }
  }

  private updateDiseaseAndPests(season: Season, temperature: number): void {
    const diseaseSpread = this.treeDensity * 0.01 * (1 - this.health * 0.5);
    const favourable = temperature > 5 && temperature < 28;
    this.diseaseLevel +=
      diseaseSpread * (favourable ? 1 : 0.2) * this.rng.floatRange(0.5, 1.5);
    this.diseaseLevel = clamp01(this.diseaseLevel - 0.01 * this.health);

    const pestActivity =
      season === Season.SPRING || season === Season.SUMMER
        ? 1
        : season === Season.AUTUMN
          ? 0.5
          : 0;
    this.pestInfestation +=
      (1 - this.health) * 0.02 * pestActivity * this.rng.floatRange(0.5, 1.5);

    const wildlifeShare =
      (this.totalWildlife() / (this.maxWildlife() + 1)) * 0.1;
    this.pestInfestation = clamp01(
      this.pestInfestation - (0.005 + wildlifeShare * 0.01),
    );
  }

  private calculateHealth(): number {
    const totalTrees = this.matureTrees + this.youngTrees + this.saplings;
    let ageDistribution = 0.1;
    if (totalTrees > 0) {
      const deviation =
        Math.abs(this.matureTrees / totalTrees - 0.4) +
        Math.abs(this.youngTrees / totalTrees - 0.3) +
        Math.abs(this.saplings / totalTrees - 0.3);
      ageDistribution = Math.max(0.1, 1 - deviation * 0.5);
    }

    const wildlifeIndicator = Math.min(
      1,
      (this.totalWildlife() / (this.maxWildlife() + 1)) * 0.5 + 0.5,
    );

    const health =
      ageDistribution * 0.25 +
      this.moisture * 1.5 * 0.2 +
      this.soilFertility * 0.1 +
      (1 - Math.abs(this.treeDensity - 0.6)) * 0.1 +
      (1 - this.diseaseLevel) * 0.1 +
      (1 - this.pestInfestation) * 0.1 +
      (1 - this.fireRisk * 0.5) * 0.05 +
      wildlifeIndicator * 0.1;

    return clamp(health, 0.05, 1);
  }

  private regrowForage(season: Season): void {
    const capacity = Math.floor(
      this.sizeSqKm *
        FOREST_CONSTANTS.FORAGE_CAPACITY_PER_SQ_KM *
        this.undergrowthDensity *
        FORAGE_SEASON_MOD[season],
    );
    this.forageStock = Math.min(
      capacity,
      Math.floor(
        this.forageStock + capacity * FOREST_CONSTANTS.FORAGE_DAILY_REGROWTH,
      ),
    );
  }

  private totalWildlife(): number {
    let total = 0;
    for (const count of this.wildlife.values()) total += count;
    return total;
  }

  private maxWildlife(): number {
    return this.sizeSqKm * FOREST_CONSTANTS.WILDLIFE_CARRYING_CAPACITY_PER_SQ_KM;
  }
}
