import { MigrationKind } from "../../../../shared/constants/VillageEnums";
import { SIMULATION_CONSTANTS } from "../../../../shared/constants/SimulationConstants";
import type { RandomSource } from "../../../../shared/utils/RandomUtils";
import { clamp, clamp01 } from "../../../../shared/utils/mathUtils";

const M = SIMULATION_CONSTANTS.MIGRATION;

export interface AttractivenessInputs {
  population: number;
  averageHappiness: number;
  averageHealth: number;
  /** Units of food in village storage */
  foodUnits: number;
  treasury: number;
  safety?: number;
}

export interface MigrationDecision {
  kind: MigrationKind;
  count: number;
  attractiveness: number;
}

/** Anything that can be ranked for emigration */
export interface MigrationCandidate {
  id: string;
  health: number;
  happiness: number;
}

export function foodSecurity(foodUnits: number, population: number): number {
  if (population <= 0) return 1;
  return Math.min(1, foodUnits / population / M.FOOD_SECURE_UNITS_PER_CAPITA);
}

export function wealthScore(treasury: number, population: number): number {
  return clamp01(treasury / (population + 1) / M.WEALTHY_TREASURY_PER_CAPITA);
}

/**
 * Weighted 0-1 score of how appealing the village is to settle in.
 */
export function computeAttractiveness(inputs: AttractivenessInputs): number {
  const w = M.WEIGHTS;
  const score =
    w.HAPPINESS * (inputs.averageHappiness / 100) +
    w.HEALTH * (inputs.averageHealth / 100) +
    w.FOOD * foodSecurity(inputs.foodUnits, inputs.population) +
    w.WEALTH * wealthScore(inputs.treasury, inputs.population) +
    w.SAFETY * (inputs.safety ?? M.DEFAULT_SAFETY_SCORE);
  return clamp01(score);
}

/**
 * Weekly migration check with a cooldown after every event.
 *
 * `evaluateDay` is called once per simulated day. While the cooldown runs it
 * only counts down; otherwise every seventh call scores the village and may
 * return an immigration or emigration batch for the manager to apply.
 */
export class MigrationSystem {
  private cooldown = 0;
  private daysSinceCheck = 0;

  constructor(private readonly rng: RandomSource) {}

  public getCooldown(): number {
    return this.cooldown;
  }

  public getDaysSinceCheck(): number {
    return this.daysSinceCheck;
  }

  public evaluateDay(
    inputs: AttractivenessInputs,
  ): MigrationDecision | undefined {
    if (this.cooldown > 0) {
      this.cooldown--;
      return undefined;
    }

    this.daysSinceCheck++;
    if (this.daysSinceCheck < M.CHECK_INTERVAL_DAYS) return undefined;
    this.daysSinceCheck = 0;

    const attractiveness = computeAttractiveness(inputs);
    const decision =
      this.planImmigration(inputs.population, attractiveness) ??
      this.planEmigration(inputs.population, attractiveness);
    if (decision) this.cooldown = M.COOLDOWN_DAYS;
    return decision;
  }

  /**
   * Lowest happiness + health first; ties keep the input order.
   */
  public selectEmigrants<T extends MigrationCandidate>(
    candidates: readonly T[],
    count: number,
  ): T[] {
    return [...candidates]
      .sort((a, b) => a.happiness + a.health - (b.happiness + b.health))
      .slice(0, Math.max(0, count));
  }

  private planImmigration(
    population: number,
    attractiveness: number,
  ): MigrationDecision | undefined {
    if (attractiveness <= M.IMMIGRATION_THRESHOLD) return undefined;
    if (population >= M.MAX_POPULATION) return undefined;

    const maxBatch = clamp(
      Math.floor(population * M.BATCH_POPULATION_SHARE * attractiveness),
      1,
      M.MAX_IMMIGRANTS_PER_EVENT,
    );
    const count = Math.min(
      this.rng.intRange(1, maxBatch),
      M.MAX_POPULATION - population,
    );
    return { kind: MigrationKind.IMMIGRATION, count, attractiveness };
  }

  private planEmigration(
    population: number,
    attractiveness: number,
  ): MigrationDecision | undefined {
    if (attractiveness >= M.EMIGRATION_THRESHOLD) return undefined;
    if (population <= M.MIN_POPULATION) return undefined;

    const bound = Math.min(
      Math.floor(population * M.BATCH_POPULATION_SHARE * (1 - attractiveness)),
      M.MAX_EMIGRANTS_PER_EVENT,
      population - M.MIN_POPULATION,
    );
    if (bound < 1) return undefined;

    return {
      kind: MigrationKind.EMIGRATION,
      count: this.rng.intRange(1, bound),
      attractiveness,
    };
  }
}
