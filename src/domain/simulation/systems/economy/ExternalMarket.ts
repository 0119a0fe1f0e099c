import { ItemCatalog } from "../../../data/ItemCatalog";
import { TradeDirection } from "../../../../shared/constants/EconomyEnums";
import { ItemId } from "../../../../shared/constants/ItemEnums";
import type {
  ItemStock,
  TradeRecord,
} from "../../../../shared/types/simulation/economy";
import { roundMoney } from "../../../../shared/utils/mathUtils";
import type { VillageStorage } from "./VillageStorage";

/** Fixed prices quoted by the outside market, both ways. */
export const EXTERNAL_MARKET_PRICES: ItemStock = {
  [ItemId.WOOD]: 1.5,
  [ItemId.LEATHER]: 20,
  [ItemId.FISH]: 3,
  [ItemId.BERRIES]: 0.8,
  [ItemId.SKIN]: 4,
};

const DEFAULT_EXPORT_FACTOR = 0.7;
const DEFAULT_IMPORT_FACTOR = 1.3;

export interface SkippedTrade {
  direction: TradeDirection;
  item: ItemId;
  quantity: number;
  reason: string;
}

export interface SettlementResult {
  trades: TradeRecord[];
  skipped: SkippedTrade[];
  treasury: number;
}

/**
 * Trading partner outside the village. Orders are queued during the day and
 * settled against village storage and treasury in one pass: exports first,
 * then imports.
 *
 * An order that cannot be filled stays queued for the next settlement.
 */
export class ExternalMarket {
  private exports = new Map<ItemId, number>();
  private imports = new Map<ItemId, number>();

  public getExportPrice(item: ItemId): number {
    return (
      EXTERNAL_MARKET_PRICES[item] ??
      roundMoney(ItemCatalog.getBaseValue(item) * DEFAULT_EXPORT_FACTOR)
    );
  }

  public getImportPrice(item: ItemId): number {
    return (
      EXTERNAL_MARKET_PRICES[item] ??
      roundMoney(ItemCatalog.getBaseValue(item) * DEFAULT_IMPORT_FACTOR)
    );
  }

  public isExportQueued(item: ItemId): boolean {
    return this.exports.has(item);
  }

  public isImportQueued(item: ItemId): boolean {
    return this.imports.has(item);
  }

  public queueExport(item: ItemId, quantity: number): void {
    if (quantity > 0) this.exports.set(item, quantity);
  }

  public queueImport(item: ItemId, quantity: number): void {
    if (quantity > 0) this.imports.set(item, quantity);
  }

  public getPendingExports(): ItemStock {
    return ItemCatalog.toStock(this.exports);
  }

  public getPendingImports(): ItemStock {
    return ItemCatalog.toStock(this.imports);
  }

  public settle(storage: VillageStorage, treasury: number): SettlementResult {
    const trades: TradeRecord[] = [];
    const skipped: SkippedTrade[] = [];
    let balance = treasury;

    for (const [item, quantity] of [...this.exports]) {
      if (!storage.remove(item, quantity)) {
        skipped.push({
          direction: TradeDirection.EXPORT,
          item,
          quantity,
          reason: `only ${storage.get(item)} in storage`,
        });
        continue;
      }
      const unitPrice = this.getExportPrice(item);
      const total = roundMoney(unitPrice * quantity);
      balance = roundMoney(balance + total);
      this.exports.delete(item);
      trades.push({
        direction: TradeDirection.EXPORT,
        item,
        quantity,
        unitPrice,
        total,
      });
    }

    for (const [item, quantity] of [...this.imports]) {
      const unitPrice = this.getImportPrice(item);
      const total = roundMoney(unitPrice * quantity);
      if (total > balance) {
        skipped.push({
          direction: TradeDirection.IMPORT,
          item,
          quantity,
          reason: `treasury ${balance} cannot cover ${total}`,
        });
        continue;
      }
      balance = roundMoney(balance - total);
      storage.add(item, quantity);
      this.imports.delete(item);
      trades.push({
        direction: TradeDirection.IMPORT,
        item,
        quantity,
        unitPrice,
        total,
      });
    }

    return { trades, skipped, treasury: balance };
  }
}
