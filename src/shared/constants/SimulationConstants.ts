/**
 * Consolidated simulation constants, grouped by concern.
 *
 * Per-site dynamics (forest growth, river stock, tannery labour) live next to
 * the site that uses them; the values here are shared across the villager
 * cycle and the village manager.
 *
 * @module shared/constants/SimulationConstants
 */

export const SIMULATION_CONSTANTS = {
  /**
   * Needs thresholds. Health, energy and happiness live on a 0-100 scale.
   */
  NEEDS: {
    MIN: 0,
    MAX: 100,
    /** Below this energy a villager goes to sleep before anything else. */
    LOW_ENERGY_THRESHOLD: 30,
    /** Below this health a villager eats from inventory or looks for food. */
    EAT_HEALTH_THRESHOLD: 70,
    /** Work is only planned above both of these. */
    WORK_ENERGY_THRESHOLD: 50,
    WORK_HEALTH_THRESHOLD: 50,
    /** Happiness lost when a villager starts the day with no food at all. */
    HUNGER_HAPPINESS_PENALTY: 5,
    /** Both below → extra health decay at the end of the day. */
    EXHAUSTION_ENERGY_THRESHOLD: 10,
    EXHAUSTION_HEALTH_THRESHOLD: 20,
    EXHAUSTION_HEALTH_DECAY: 5,
    /** Health restored per unit of food = round(nutrition * factor). */
    NUTRITION_HEALTH_FACTOR: 0.1,
  } as const,

  SKILLS: {
    MAX_LEVEL: 10,
    MIN_FISHING_TO_FISH: 0.5,
    MIN_HUNTING_TO_HUNT: 1.0,
    /** Gain after a production attempt = SUCCESS_GAIN + GAIN_PER_UNIT × yield. */
    SUCCESS_GAIN: 0.1,
    GAIN_PER_UNIT: 0.05,
    /** Gain after an attempt that yielded nothing (not for woodcutting). */
    ATTEMPT_GAIN: 0.02,
    /** Gain from a generic work shift. */
    WORK_GAIN: 0.05,
  } as const,

  PLANNING: {
    /** Greedy planner: only the top candidate is committed. */
    MAX_PLAN_SIZE: 1,
    MAX_ACTIONS_PER_DAY: 3,
    MAX_REPLANS_PER_DAY: 1,
    SLEEP_HOURS: 8,
    WOODCUTTING_HOURS: 4,
    SHIFT_HOURS: 6,
    FISHING_ATTEMPTS: 3,
    FORAGE_BASE_AMOUNT: 4,
    /** Stock of the occupation's primary output above which surplus is sold. */
    SURPLUS_THRESHOLD: 10,
    SURPLUS_SELL_FRACTION: 0.5,
    ACTION_HISTORY_LIMIT: 50,
  } as const,

  /** Happiness change after a production attempt. */
  PRODUCTION_MOOD: {
    SUCCESS: 3,
    FAILURE: -2,
  } as const,

  VILLAGE: {
    INITIAL_TREASURY: 1000,
    REPORT_HISTORY_SIZE: 30,
    /** A Woodcutter holding more than this gives half of it to storage. */
    WOOD_CONTRIBUTION_THRESHOLD: 5,
    WOOD_CONTRIBUTION_SHARE: 0.5,
    FISH_CONTRIBUTION_THRESHOLD: 5,
    FISH_CONTRIBUTION_SHARE: 0.25,
    BERRY_CONTRIBUTION_THRESHOLD: 10,
    BERRY_CONTRIBUTION_SHARE: 0.25,
    WHEAT_CONTRIBUTION_THRESHOLD: 20,
    WHEAT_CONTRIBUTION_SHARE: 0.5,
    /** Field sizes in hectares per km² of forest */
    FIELD_SIZE_PER_FOREST_SQ_KM: {
      HILLTOP: 0.15,
      SOUTH_MEADOW: 0.25,
      SEASIDE: 0.13,
    },
    /** Wood storage above this queues an export batch. */
    WOOD_EXPORT_THRESHOLD: 100,
    WOOD_EXPORT_BATCH: 20,
    /** Bread storage below this queues an import sized by population. */
    BREAD_IMPORT_THRESHOLD: 10,
    BREAD_IMPORT_PER_FIVE_VILLAGERS: 10,
  } as const,

  MIGRATION: {
    CHECK_INTERVAL_DAYS: 7,
    COOLDOWN_DAYS: 30,
    MAX_POPULATION: 1000,
    MIN_POPULATION: 5,
    MAX_IMMIGRANTS_PER_EVENT: 5,
    MAX_EMIGRANTS_PER_EVENT: 3,
    IMMIGRATION_THRESHOLD: 0.7,
    EMIGRATION_THRESHOLD: 0.3,
    /** Share of the population considered for a migration batch. */
    BATCH_POPULATION_SHARE: 0.05,
    /** Baseline safety score; the village has no standing army. */
    DEFAULT_SAFETY_SCORE: 0.5,
    /** Food units per villager that count as full food security. */
    FOOD_SECURE_UNITS_PER_CAPITA: 10,
    /** Treasury per villager that counts as full wealth. */
    WEALTHY_TREASURY_PER_CAPITA: 50,
    WEIGHTS: {
      HAPPINESS: 0.3,
      HEALTH: 0.2,
      FOOD: 0.25,
      WEALTH: 0.15,
      SAFETY: 0.1,
    },
  } as const,
} as const;
