import { ItemCatalog } from "../../../data/ItemCatalog";
import { ItemCategory, ItemId } from "../../../../shared/constants/ItemEnums";
import type { ItemStock } from "../../../../shared/types/simulation/economy";
import type { WeatherSnapshot } from "../../../../shared/types/simulation/weather";
import { RandomSource } from "../../../../shared/utils/RandomUtils";
import { roundMoney } from "../../../../shared/utils/mathUtils";
import type { Vendor } from "./Vendor";

export const TANNERY_CONSTANTS = {
  MIN_HEALTH_TO_WORK: 20,
  WAGE_PER_SHIFT: 10,
  HIDES_PER_PRODUCTIVITY_POINT: 2,
  MIN_SKILL_FACTOR: 0.5,
  OVERWORK_THRESHOLD: 0.8,
  ACCIDENT_CHANCE: 0.01,
  BASE_HEALTH_COST: 5,
  OVERWORK_HEALTH_PENALTY: 3,
  ACCIDENT_HEALTH_PENALTY: 10,
  PAID_HAPPINESS: 1,
  UNPAID_HAPPINESS: -10,
  /** One hide in this many stays with the tannery as leather */
  HOUSE_SHARE_DIVISOR: 4,
  DEFAULT_DAILY_CAPACITY: 20,
  FREEZING_CAPACITY_FACTOR: 0.7,
  CLOTHING_PER_LABOR_POINT: 2,
  COMPLEXITY_PER_MATERIAL: 0.2,
  LEATHER_RESERVE: 5,
} as const;

const DEFAULT_STOCK: ItemStock = {
  [ItemId.LEATHER]: 10,
  [ItemId.FABRIC]: 10,
  [ItemId.STONE]: 2,
};

export interface TanneryOptions {
  name: string;
  money?: number;
  dailyCapacity?: number;
  stock?: ItemStock;
}

export interface TanneryWorkRequest {
  workerId: string;
  hides: number;
  skill: number;
  health: number;
  happiness: number;
}

export interface TanneryWorkResult {
  /** False when the worker was turned away; nothing changed */
  attempted: boolean;
  hidesUsed: number;
  /** Leather handed to the worker */
  leatherProduced: number;
  /** Leather kept by the tannery */
  leatherKept: number;
  healthCost: number;
  wage: number;
  happinessChange: number;
  accident: boolean;
  message: string;
}

export interface ManufacturedBatch {
  item: ItemId;
  quantity: number;
}

export interface TanneryStats {
  name: string;
  money: number;
  dailyCapacity: number;
  hidesProcessedToday: number;
  laborPoints: number;
  stock: ItemStock;
  manufactured: ItemStock;
}

interface ProductionOption {
  item: ItemId;
  maxPossible: number;
  profitMargin: number;
  complexity: number;
}

/**
 * Workshop where tanners turn hides into leather. Labour banked by the
 * day's shifts is turned into clothing overnight.
 */
export class Tannery {
  public readonly name: string;

  private readonly rng: RandomSource;
  private readonly baseCapacity: number;
  private money: number;
  private capacityToday: number;
  private hidesProcessedToday = 0;
  private laborPoints = 0;
  private stock = new Map<ItemId, number>();
  private manufactured = new Map<ItemId, number>();

  constructor(rng: RandomSource, options: TanneryOptions) {
    this.rng = rng;
    this.name = options.name;
    this.money = options.money ?? 200;
    this.baseCapacity =
      options.dailyCapacity ?? TANNERY_CONSTANTS.DEFAULT_DAILY_CAPACITY;
    this.capacityToday = this.baseCapacity;
    for (const [item, quantity] of ItemCatalog.entries(
      options.stock ?? DEFAULT_STOCK,
    )) {
      if (quantity > 0) this.stock.set(item, quantity);
    }
  }

  public getMoney(): number {
    return this.money;
  }

  public getStock(item: ItemId): number {
    return this.stock.get(item) ?? 0;
  }

  public getManufactured(item: ItemId): number {
    return this.manufactured.get(item) ?? 0;
  }

  public getRemainingCapacity(): number {
    return Math.max(0, this.capacityToday - this.hidesProcessedToday);
  }

  /**
   * One shift by a tanner who brings their own hides. The tannery keeps a
   * share of the leather and pays a wage when it can afford one.
   */
  public work(request: TanneryWorkRequest): TanneryWorkResult {
    const c = TANNERY_CONSTANTS;
    if (request.health < c.MIN_HEALTH_TO_WORK) {
      return {
        attempted: false,
        hidesUsed: 0,
        leatherProduced: 0,
        leatherKept: 0,
        healthCost: 0,
        wage: 0,
        happinessChange: 0,
        accident: false,
        message: `Too weak to work at ${this.name}`,
      };
    }

    const productivity =
      Math.max(c.MIN_SKILL_FACTOR, request.skill) *
      (request.health / 100) *
      (request.happiness / 100);
    const hidesUsed = Math.max(
      0,
      Math.min(
        Math.floor(request.hides),
        this.getRemainingCapacity(),
        Math.floor(productivity * c.HIDES_PER_PRODUCTIVITY_POINT),
      ),
    );

    this.hidesProcessedToday += hidesUsed;
    this.laborPoints += productivity;

    const leatherKept = Math.floor(hidesUsed / c.HOUSE_SHARE_DIVISOR);
    const leatherProduced = hidesUsed - leatherKept;
    if (leatherKept > 0) {
      this.stock.set(ItemId.LEATHER, this.getStock(ItemId.LEATHER) + leatherKept);
    }

    let healthCost = c.BASE_HEALTH_COST;
    if (this.hidesProcessedToday > this.capacityToday * c.OVERWORK_THRESHOLD) {
      healthCost += c.OVERWORK_HEALTH_PENALTY;
    }
    const accident = this.rng.chance(c.ACCIDENT_CHANCE);
    if (accident) healthCost += c.ACCIDENT_HEALTH_PENALTY;

    let wage = 0;
    let happinessChange: number = c.UNPAID_HAPPINESS;
    if (this.money >= c.WAGE_PER_SHIFT) {
      wage = c.WAGE_PER_SHIFT;
      this.money = roundMoney(this.money - wage);
      happinessChange = c.PAID_HAPPINESS;
    }

    return {
      attempted: true,
      hidesUsed,
      leatherProduced,
      leatherKept,
      healthCost,
      wage,
      happinessChange,
      accident,
      message:
        hidesUsed > 0
          ? `Tanned ${hidesUsed} hides at ${this.name}`
          : `Worked a shift at ${this.name} without tanning anything`,
    };
  }

  /**
   * Resets the day's capacity and turns banked labour into clothing.
   */
  public updateDaily(weather: WeatherSnapshot): ManufacturedBatch[] {
    const c = TANNERY_CONSTANTS;
    const capacity = Math.floor(this.laborPoints * c.CLOTHING_PER_LABOR_POINT);
    const batches = this.manufacture(capacity);

    this.laborPoints = 0;
    this.hidesProcessedToday = 0;
    this.capacityToday =
      weather.temperature < 0
        ? Math.floor(this.baseCapacity * c.FREEZING_CAPACITY_FACTOR)
        : this.baseCapacity;

    return batches;
  }

  /**
   * Sells clothing and any leather above the reserve, as much as the vendor
   * can pay for. Returns the money earned.
   */
  public sellManufacturedGoods(vendor: Vendor): number {
    let earned = 0;

    for (const [item, quantity] of [...this.manufactured]) {
      const sold = this.sellTo(vendor, item, quantity);
      if (sold.quantity === 0) continue;
      earned += sold.total;
      if (sold.quantity === quantity) this.manufactured.delete(item);
      else this.manufactured.set(item, quantity - sold.quantity);
    }

    const surplusLeather =
      this.getStock(ItemId.LEATHER) - TANNERY_CONSTANTS.LEATHER_RESERVE;
    if (surplusLeather > 0) {
      const sold = this.sellTo(vendor, ItemId.LEATHER, surplusLeather);
      if (sold.quantity > 0) {
        earned += sold.total;
        this.removeStock(ItemId.LEATHER, sold.quantity);
      }
    }

    return roundMoney(earned);
  }

  public getStats(): TanneryStats {
    return {
      name: this.name,
      money: this.money,
      dailyCapacity: this.capacityToday,
      hidesProcessedToday: this.hidesProcessedToday,
      laborPoints: this.laborPoints,
      stock: ItemCatalog.toStock(this.stock),
      manufactured: ItemCatalog.toStock(this.manufactured),
    };
  }

  private sellTo(
    vendor: Vendor,
    item: ItemId,
    quantity: number,
  ): { quantity: number; total: number } {
    const price = ItemCatalog.getBaseValue(item);
    const affordable = Math.min(
      quantity,
      Math.floor(vendor.getMoney() / price),
    );
    if (affordable <= 0) return { quantity: 0, total: 0 };

    const result = vendor.buyItemFromProducer(item, affordable, price);
    if (!result.success) return { quantity: 0, total: 0 };

    this.money = roundMoney(this.money + result.total);
    return { quantity: affordable, total: result.total };
  }

  private removeStock(item: ItemId, quantity: number): void {
    const remaining = this.getStock(item) - quantity;
    if (remaining <= 0) this.stock.delete(item);
    else this.stock.set(item, remaining);
  }

  private productionOptions(): ProductionOption[] {
    const options: ProductionOption[] = [];
    for (const definition of ItemCatalog.getByCategory(ItemCategory.CLOTHING)) {
      const materials = ItemCatalog.entries(
        ItemCatalog.getRequiredMaterials(definition.id),
      );
      if (materials.length === 0) continue;

      let maxPossible = Infinity;
      let materialCost = 0;
      for (const [material, required] of materials) {
        maxPossible = Math.min(
          maxPossible,
          Math.floor(this.getStock(material) / required),
        );
        materialCost += ItemCatalog.getBaseValue(material) * required;
      }
      if (maxPossible <= 0) continue;

      options.push({
        item: definition.id,
        maxPossible,
        profitMargin: definition.baseValue - materialCost,
        complexity: materials.length,
      });
    }
    return options.sort((a, b) => b.profitMargin - a.profitMargin);
  }

  private manufacture(capacity: number): ManufacturedBatch[] {
    const batches: ManufacturedBatch[] = [];
    let effortUsed = 0;

    for (const option of this.productionOptions()) {
      if (effortUsed >= capacity) break;

      const complexityFactor =
        1 + option.complexity * TANNERY_CONSTANTS.COMPLEXITY_PER_MATERIAL;
      const toMake = Math.min(
        option.maxPossible,
        Math.floor((capacity - effortUsed) / complexityFactor),
      );
      if (toMake <= 0) continue;

      for (const [material, required] of ItemCatalog.entries(
        ItemCatalog.getRequiredMaterials(option.item),
      )) {
        this.removeStock(material, required * toMake);
      }
      this.manufactured.set(
        option.item,
        this.getManufactured(option.item) + toMake,
      );
      effortUsed += toMake * complexityFactor;
      batches.push({ item: option.item, quantity: toMake });
    }

    return batches;
  }
}
