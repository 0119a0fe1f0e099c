/**
 * Village population enumerations.
 *
 * @module shared/constants/VillageEnums
 */

/**
 * Occupations a villager can hold. Occupation drives the work an idle,
 * healthy villager chooses.
 */
export enum Occupation {
  FARMER = "Farmer",
  WOODCUTTER = "Woodcutter",
  FISHERMAN = "Fisherman",
  FORAGER = "Forager",
  HUNTER = "Hunter",
  TANNER = "Tanner",
  LABORER = "Laborer",
}

/**
 * Skills tracked per villager. Levels only grow, up to a fixed cap.
 */
export enum SkillName {
  FARMING = "farming",
  WOODCUTTING = "woodcutting",
  FISHING = "fishing",
  FORAGING = "foraging",
  HUNTING = "hunting",
  TANNING = "tanning",
  LABOR = "labor",
}

/**
 * Direction of a migration event.
 */
export enum MigrationKind {
  IMMIGRATION = "immigration",
  EMIGRATION = "emigration",
}
