import { ItemCatalog } from "../../../data/ItemCatalog";
import type { VendorDefinition } from "../../../data/VendorCatalog";
import type { ItemCategory, ItemId } from "../../../../shared/constants/ItemEnums";
import type {
  ItemStock,
  VendorListing,
} from "../../../../shared/types/simulation/economy";
import { clamp, roundMoney } from "../../../../shared/utils/mathUtils";

export const VENDOR_CONSTANTS = {
  /** Share of base value a vendor pays producers at full saturation */
  BUY_PRICE_FACTOR: 0.8,
  MIN_SATURATION: 0.2,
  MAX_SATURATION: 1.2,
  /** Saturation lost per unit bought from producers */
  SATURATION_DROP_PER_UNIT: 0.02,
  SATURATION_DAILY_RECOVERY: 0.05,
} as const;

export interface VendorTradeResult {
  success: boolean;
  total: number;
  message: string;
}

/**
 * Shop that sells to villagers and buys from producers.
 *
 * Both primitives are all-or-nothing: on failure neither money nor
 * inventory change.
 */
export class Vendor {
  public readonly id: string;
  public readonly name: string;
  public readonly shopName: string;
  public readonly categories: readonly ItemCategory[];

  private money: number;
  private inventory = new Map<ItemId, number>();
  /** Per-item demand; buying floods the market and lowers what the vendor pays */
  private saturation = new Map<ItemId, number>();

  constructor(definition: VendorDefinition) {
    this.id = definition.id;
    this.name = definition.name;
    this.shopName = definition.shopName;
    this.categories = definition.categories;
    this.money = definition.money;

    for (const [item, quantity] of ItemCatalog.entries(definition.inventory)) {
      if (quantity > 0) this.inventory.set(item, quantity);
    }
  }

  public getMoney(): number {
    return this.money;
  }

  public trades(item: ItemId): boolean {
    return this.categories.includes(ItemCatalog.getItem(item).category);
  }

  public getStock(item: ItemId): number {
    return this.inventory.get(item) ?? 0;
  }

  public getSaturation(item: ItemId): number {
    return this.saturation.get(item) ?? 1;
  }

  /** Price a customer pays per unit. */
  public getSellPrice(item: ItemId): number {
    return ItemCatalog.getBaseValue(item);
  }

  /** Price the vendor pays a producer per unit. */
  public getBuyPrice(item: ItemId): number {
    return roundMoney(
      ItemCatalog.getBaseValue(item) *
        VENDOR_CONSTANTS.BUY_PRICE_FACTOR *
        this.getSaturation(item),
    );
  }

  public addToInventory(item: ItemId, quantity: number): void {
    if (quantity <= 0) return;
    this.inventory.set(item, this.getStock(item) + quantity);
  }

  public removeFromInventory(item: ItemId, quantity: number): boolean {
    const stock = this.getStock(item);
    if (quantity <= 0 || stock < quantity) return false;
    if (stock === quantity) this.inventory.delete(item);
    else this.inventory.set(item, stock - quantity);
    return true;
  }

  public sellItemToCustomer(
    item: ItemId,
    quantity: number,
    unitPrice: number = this.getSellPrice(item),
  ): VendorTradeResult {
    if (quantity <= 0) {
      return { success: false, total: 0, message: "Invalid quantity" };
    }
    if (this.getStock(item) < quantity) {
      return {
        success: false,
        total: 0,
        message: `${this.shopName} has only ${this.getStock(item)} ${ItemCatalog.getDisplayName(item)}`,
      };
    }

    const total = roundMoney(unitPrice * quantity);
    this.removeFromInventory(item, quantity);
    this.money = roundMoney(this.money + total);
    return {
      success: true,
      total,
      message: `Sold ${quantity} ${ItemCatalog.getDisplayName(item)} for ${total}`,
    };
  }

  public buyItemFromProducer(
    item: ItemId,
    quantity: number,
    unitPrice: number = this.getBuyPrice(item),
  ): VendorTradeResult {
    if (quantity <= 0) {
      return { success: false, total: 0, message: "Invalid quantity" };
    }

    const total = roundMoney(unitPrice * quantity);
    if (total > this.money) {
      return {
        success: false,
        total: 0,
        message: `${this.shopName} cannot afford ${total}`,
      };
    }

    this.money = roundMoney(this.money - total);
    this.addToInventory(item, quantity);
    this.saturation.set(
      item,
      clamp(
        this.getSaturation(item) -
          VENDOR_CONSTANTS.SATURATION_DROP_PER_UNIT * quantity,
        VENDOR_CONSTANTS.MIN_SATURATION,
        VENDOR_CONSTANTS.MAX_SATURATION,
      ),
    );
    return {
      success: true,
      total,
      message: `Bought ${quantity} ${ItemCatalog.getDisplayName(item)} for ${total}`,
    };
  }

  /**
   * Demand recovers a little every day.
   */
  public updateDaily(): void {
    for (const [item, value] of this.saturation) {
      this.saturation.set(
        item,
        clamp(
          value + VENDOR_CONSTANTS.SATURATION_DAILY_RECOVERY,
          VENDOR_CONSTANTS.MIN_SATURATION,
          VENDOR_CONSTANTS.MAX_SATURATION,
        ),
      );
    }
  }

  public toListing(): VendorListing {
    const stock: ItemStock = {};
    const sellPrices: ItemStock = {};
    const buyPrices: ItemStock = {};
    for (const [item, quantity] of this.inventory) {
      stock[item] = quantity;
      sellPrices[item] = this.getSellPrice(item);
    }
    for (const definition of ItemCatalog.getAllItems()) {
      if (this.trades(definition.id)) {
        buyPrices[definition.id] = this.getBuyPrice(definition.id);
      }
    }
    return {
      id: this.id,
      name: this.name,
      shopName: this.shopName,
      money: this.money,
      categories: this.categories,
      stock,
      sellPrices,
      buyPrices,
    };
  }
}
