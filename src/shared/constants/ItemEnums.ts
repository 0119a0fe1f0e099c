/**
 * Item enumerations for the village economy.
 *
 * @module shared/constants/ItemEnums
 */

/**
 * Every item that can sit in an inventory, a vendor stall or village storage.
 */
export enum ItemId {
  WHEAT = "wheat",
  APPLE = "apple",
  BREAD = "bread",
  ROAST_MEAT = "roast_meat",
  FISH = "fish",
  BEER = "beer",
  WINE = "wine",
  BERRIES = "berries",
  MEAT = "meat",

  WOOD = "wood",
  STONE = "stone",
  SKIN = "skin",
  LEATHER = "leather",
  FABRIC = "fabric",

  DAILY_CLOTHES = "daily_clothes",
  WOMENS_WEAR = "womens_wear",
  MENS_ARMOR = "mens_armor",
}

/**
 * Broad item categories. Vendors trade by category.
 */
export enum ItemCategory {
  FOOD = "food",
  RAW_MATERIAL = "raw_material",
  CLOTHING = "clothing",
}

const ITEM_IDS: ReadonlySet<string> = new Set<string>(Object.values(ItemId));

/**
 * Type guard for values arriving from the outside (HTTP bodies, plan targets).
 */
export function isItemId(value: unknown): value is ItemId {
  return typeof value === "string" && ITEM_IDS.has(value);
}
