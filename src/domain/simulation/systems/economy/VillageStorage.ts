import { ItemCatalog } from "../../../data/ItemCatalog";
import type { ItemId } from "../../../../shared/constants/ItemEnums";
import type { ItemStock } from "../../../../shared/types/simulation/economy";

/**
 * Pooled village stock, split into food and everything else.
 * Quantities never go below zero; empty entries are dropped.
 */
export class VillageStorage {
  private food = new Map<ItemId, number>();
  private resources = new Map<ItemId, number>();

  private bucket(item: ItemId): Map<ItemId, number> {
    return ItemCatalog.isFood(item) ? this.food : this.resources;
  }

  public get(item: ItemId): number {
    return this.bucket(item).get(item) ?? 0;
  }

  public add(item: ItemId, quantity: number): void {
    if (quantity <= 0) return;
    const bucket = this.bucket(item);
    bucket.set(item, (bucket.get(item) ?? 0) + quantity);
  }

  public remove(item: ItemId, quantity: number): boolean {
    const bucket = this.bucket(item);
    const current = bucket.get(item) ?? 0;
    if (quantity <= 0 || current < quantity) return false;
    if (current === quantity) bucket.delete(item);
    else bucket.set(item, current - quantity);
    return true;
  }

  public totalFood(): number {
    let total = 0;
    for (const quantity of this.food.values()) total += quantity;
    return total;
  }

  public getFoodStorage(): ItemStock {
    return ItemCatalog.toStock(this.food);
  }

  public getResourceStorage(): ItemStock {
    return ItemCatalog.toStock(this.resources);
  }
}
