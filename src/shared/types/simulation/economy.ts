import type { TradeDirection } from "../../constants/EconomyEnums";
import type { ItemCategory, ItemId } from "../../constants/ItemEnums";

/**
 * Item quantities keyed by item id. Missing keys mean zero.
 */
export type ItemStock = Partial<Record<ItemId, number>>;

export interface ItemDefinition {
  id: ItemId;
  name: string;
  category: ItemCategory;
  baseValue: number;
  /** Foods only */
  nutritionalValue?: number;
  /** Clothing only: materials consumed to craft one unit */
  requiredMaterials?: ItemStock;
}

/**
 * A settled trade between village storage and the outside world.
 */
export interface TradeRecord {
  direction: TradeDirection;
  item: ItemId;
  quantity: number;
  unitPrice: number;
  total: number;
}

/**
 * What a villager knows about one vendor when planning.
 */
export interface VendorListing {
  id: string;
  name: string;
  shopName: string;
  money: number;
  categories: readonly ItemCategory[];
  stock: ItemStock;
  /** Price a customer pays per unit */
  sellPrices: ItemStock;
  /** Price the vendor pays a producer per unit */
  buyPrices: ItemStock;
}
