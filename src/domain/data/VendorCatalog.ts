import type { ItemStock } from "../../shared/types/simulation/economy";
import { ItemCategory, ItemId } from "../../shared/constants/ItemEnums";

export interface VendorDefinition {
  id: string;
  name: string;
  shopName: string;
  money: number;
  /** Categories the vendor buys and sells */
  categories: readonly ItemCategory[];
  inventory: ItemStock;
}

export const VENDOR_IDS = {
  FORGE: "ironheart-forge",
  GROCER: "greenleaf-grocer",
  TAVERN: "tipsy-griffin",
} as const;

/**
 * Vendors present in a freshly initialized village.
 */
export const DEFAULT_VENDORS: readonly VendorDefinition[] = [
  {
    id: VENDOR_IDS.FORGE,
    name: "Garrick Ironheart",
    shopName: "Ironheart Forge",
    money: 100,
    categories: [ItemCategory.RAW_MATERIAL, ItemCategory.CLOTHING],
    inventory: {
      [ItemId.WOOD]: 50,
      [ItemId.STONE]: 30,
      [ItemId.LEATHER]: 20,
      [ItemId.FABRIC]: 15,
      [ItemId.SKIN]: 5,
      [ItemId.MENS_ARMOR]: 10,
      [ItemId.DAILY_CLOTHES]: 5,
      [ItemId.WOMENS_WEAR]: 5,
    },
  },
  {
    id: VENDOR_IDS.GROCER,
    name: "Mira Greenleaf",
    shopName: "Greenleaf Grocer",
    money: 100,
    categories: [ItemCategory.FOOD],
    inventory: {
      [ItemId.WHEAT]: 100,
      [ItemId.APPLE]: 50,
      [ItemId.BREAD]: 30,
    },
  },
  {
    id: VENDOR_IDS.TAVERN,
    name: "Lyra",
    shopName: "The Tipsy Griffin",
    money: 100,
    categories: [ItemCategory.FOOD],
    inventory: {
      [ItemId.BEER]: 10,
      [ItemId.WINE]: 20,
      [ItemId.FISH]: 15,
      [ItemId.ROAST_MEAT]: 10,
      [ItemId.BREAD]: 25,
    },
  },
];
