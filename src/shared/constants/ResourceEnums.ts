/**
 * Resource site enumerations: site kinds and the species living in them.
 *
 * @module shared/constants/ResourceEnums
 */

/**
 * Shared resource sites a villager may be granted access to.
 */
export enum SiteKind {
  FOREST = "forest",
  RIVER = "river",
  TANNERY = "tannery",
  FIELD = "field",
}

/**
 * Fish species living in the river.
 */
export enum FishSpecies {
  TROUT = "trout",
  SALMON = "salmon",
  CATFISH = "catfish",
  MINNOW = "minnow",
}

/**
 * Huntable wildlife living in the forest.
 */
export enum WildlifeSpecies {
  DEER = "deer",
  RABBIT = "rabbit",
  FOX = "fox",
  BIRD = "bird",
  SQUIRREL = "squirrel",
  BOAR = "boar",
}

/**
 * Tree species mix of the forest, used to break down harvested wood.
 */
export enum TreeType {
  OAK = "oak",
  PINE = "pine",
  BIRCH = "birch",
  MAPLE = "maple",
  SPRUCE = "spruce",
}

/**
 * Crops a field can be sown with.
 */
export enum CropType {
  WHEAT = "wheat",
  FRUITS = "fruits",
}

/**
 * What a farmer's shift did to a field.
 */
export enum FieldTask {
  PLANT = "plant",
  TEND = "tend",
  HARVEST = "harvest",
}

const FISH_SPECIES: ReadonlySet<string> = new Set<string>(
  Object.values(FishSpecies),
);
const WILDLIFE_SPECIES: ReadonlySet<string> = new Set<string>(
  Object.values(WildlifeSpecies),
);

export function isFishSpecies(value: unknown): value is FishSpecies {
  return typeof value === "string" && FISH_SPECIES.has(value);
}

export function isWildlifeSpecies(value: unknown): value is WildlifeSpecies {
  return typeof value === "string" && WILDLIFE_SPECIES.has(value);
}
