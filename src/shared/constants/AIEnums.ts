/**
 * Action type enumerations for villager planning.
 *
 * @module shared/constants/AIEnums
 */

/**
 * Closed set of actions a villager can plan and execute.
 * Every member has exactly one handler; see `ACTION_HANDLERS`.
 */
export enum ActionType {
  SLEEP = "sleep",
  EAT = "eat",
  BUY = "buy",
  SELL_GOODS = "sell_goods",
  FISH = "fish",
  HUNT = "hunt",
  FORAGE = "forage",
  CUT_WOOD = "cut_wood",
  TANNERY_WORK = "tannery_work",
  FARM = "farm",
  WORK_GENERIC = "work_generic",
  IDLE = "idle",
}

/**
 * Outcome status of a resource site attempt (fishing, hunting).
 */
export enum AttemptStatus {
  /** At least one unit was obtained */
  CAUGHT = "caught",
  /** The attempt happened but yielded nothing */
  MISSED = "missed",
  /** Nothing was there to attempt */
  UNAVAILABLE = "unavailable",
  /** Malformed request: unknown species, skill below the species minimum */
  INVALID = "invalid",
}
