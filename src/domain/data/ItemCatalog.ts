import type {
  ItemDefinition,
  ItemStock,
} from "../../shared/types/simulation/economy";
import { ItemCategory, ItemId, isItemId } from "../../shared/constants/ItemEnums";

const ITEMS: Record<ItemId, ItemDefinition> = {
  [ItemId.WHEAT]: {
    id: ItemId.WHEAT,
    name: "Wheat",
    category: ItemCategory.FOOD,
    baseValue: 0.2,
    nutritionalValue: 5,
  },
  [ItemId.APPLE]: {
    id: ItemId.APPLE,
    name: "Apple",
    category: ItemCategory.FOOD,
    baseValue: 0.5,
    nutritionalValue: 50,
  },
  [ItemId.BREAD]: {
    id: ItemId.BREAD,
    name: "Bread",
    category: ItemCategory.FOOD,
    baseValue: 1.0,
    nutritionalValue: 200,
  },
  [ItemId.ROAST_MEAT]: {
    id: ItemId.ROAST_MEAT,
    name: "Roast Meat",
    category: ItemCategory.FOOD,
    baseValue: 3.0,
    nutritionalValue: 300,
  },
  [ItemId.FISH]: {
    id: ItemId.FISH,
    name: "Fish",
    category: ItemCategory.FOOD,
    baseValue: 1.5,
    nutritionalValue: 180,
  },
  [ItemId.BEER]: {
    id: ItemId.BEER,
    name: "Beer",
    category: ItemCategory.FOOD,
    baseValue: 2.0,
    nutritionalValue: 50,
  },
  [ItemId.WINE]: {
    id: ItemId.WINE,
    name: "Wine",
    category: ItemCategory.FOOD,
    baseValue: 5.0,
    nutritionalValue: 100,
  },
  [ItemId.BERRIES]: {
    id: ItemId.BERRIES,
    name: "Berries",
    category: ItemCategory.FOOD,
    baseValue: 0.3,
    nutritionalValue: 25,
  },
  [ItemId.MEAT]: {
    id: ItemId.MEAT,
    name: "Raw Meat",
    category: ItemCategory.FOOD,
    baseValue: 1.2,
    nutritionalValue: 120,
  },
  [ItemId.WOOD]: {
    id: ItemId.WOOD,
    name: "Wood",
    category: ItemCategory.RAW_MATERIAL,
    baseValue: 0.1,
  },
  [ItemId.STONE]: {
    id: ItemId.STONE,
    name: "Stone",
    category: ItemCategory.RAW_MATERIAL,
    baseValue: 0.2,
  },
  [ItemId.SKIN]: {
    id: ItemId.SKIN,
    name: "Animal Skin",
    category: ItemCategory.RAW_MATERIAL,
    baseValue: 0.4,
  },
  [ItemId.LEATHER]: {
    id: ItemId.LEATHER,
    name: "Leather",
    category: ItemCategory.RAW_MATERIAL,
    baseValue: 0.5,
  },
  [ItemId.FABRIC]: {
    id: ItemId.FABRIC,
    name: "Fabric",
    category: ItemCategory.RAW_MATERIAL,
    baseValue: 0.3,
  },
  [ItemId.DAILY_CLOTHES]: {
    id: ItemId.DAILY_CLOTHES,
    name: "Daily Clothes",
    category: ItemCategory.CLOTHING,
    baseValue: 20,
    requiredMaterials: { [ItemId.FABRIC]: 1, [ItemId.LEATHER]: 1 },
  },
  [ItemId.WOMENS_WEAR]: {
    id: ItemId.WOMENS_WEAR,
    name: "Women's Wear",
    category: ItemCategory.CLOTHING,
    baseValue: 25,
    requiredMaterials: { [ItemId.FABRIC]: 1, [ItemId.LEATHER]: 1 },
  },
  [ItemId.MENS_ARMOR]: {
    id: ItemId.MENS_ARMOR,
    name: "Men's Armor",
    category: ItemCategory.CLOTHING,
    baseValue: 50,
    requiredMaterials: {
      [ItemId.FABRIC]: 2,
      [ItemId.LEATHER]: 1,
      [ItemId.STONE]: 1,
    },
  },
};

/**
 * Static catalog of every item in the village economy.
 */
export class ItemCatalog {
  public static getItem(id: ItemId): ItemDefinition {
    return ITEMS[id];
  }

  public static getAllItems(): ItemDefinition[] {
    return Object.values(ITEMS);
  }

  public static getByCategory(category: ItemCategory): ItemDefinition[] {
    return ItemCatalog.getAllItems().filter(
      (item) => item.category === category,
    );
  }

  public static isFood(id: ItemId): boolean {
    return ITEMS[id].category === ItemCategory.FOOD;
  }

  public static getBaseValue(id: ItemId): number {
    return ITEMS[id].baseValue;
  }

  /**
   * Nutritional value of a food, 0 for anything else.
   */
  public static getNutrition(id: ItemId): number {
    return ITEMS[id].nutritionalValue ?? 0;
  }

  public static getRequiredMaterials(id: ItemId): ItemStock {
    return ITEMS[id].requiredMaterials ?? {};
  }

  public static getDisplayName(id: ItemId): string {
    return ITEMS[id].name;
  }

  public static toStock(source: ReadonlyMap<ItemId, number>): ItemStock {
    const stock: ItemStock = {};
    for (const [item, quantity] of source) stock[item] = quantity;
    return stock;
  }

  /**
   * Typed entries of a stock map, skipping empty slots.
   */
  public static entries(stock: ItemStock): Array<[ItemId, number]> {
    const result: Array<[ItemId, number]> = [];
    for (const [key, quantity] of Object.entries(stock)) {
      if (isItemId(key) && quantity !== undefined) result.push([key, quantity]);
    }
    return result;
  }
}

/**
 * Foods a villager may buy when empty-handed, in order of preference.
 */
export const STAPLE_FOODS: readonly ItemId[] = [
  ItemId.BREAD,
  ItemId.APPLE,
  ItemId.FISH,
  ItemId.ROAST_MEAT,
];
