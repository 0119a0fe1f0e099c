import { describe, it, expect, beforeEach } from "vitest";
import { ExternalMarket } from "../../src/domain/simulation/systems/economy/ExternalMarket";
import { VillageStorage } from "../../src/domain/simulation/systems/economy/VillageStorage";
import { TradeDirection } from "../../src/shared/constants/EconomyEnums";
import { ItemId } from "../../src/shared/constants/ItemEnums";

describe("ExternalMarket", () => {
  let market: ExternalMarket;
  let storage: VillageStorage;

  beforeEach(() => {
    market = new ExternalMarket();
    storage = new VillageStorage();
  });

  describe("precios", () => {
    it("debe usar los precios fijos cuando existen", () => {
      expect(market.getExportPrice(ItemId.WOOD)).toBe(1.5);
      expect(market.getImportPrice(ItemId.LEATHER)).toBe(20);
    });

    it("debe derivar el resto del valor base", () => {
      expect(market.getImportPrice(ItemId.BREAD)).toBe(1.3);
      expect(market.getExportPrice(ItemId.BREAD)).toBe(0.7);
    });
  });

  describe("settle", () => {
    it("debe liquidar exportaciones antes que importaciones", () => {
      storage.add(ItemId.WOOD, 30);
      market.queueExport(ItemId.WOOD, 20);
      market.queueImport(ItemId.BREAD, 30);

      const result = market.settle(storage, 10);

      expect(result.trades).toEqual([
        {
          direction: TradeDirection.EXPORT,
          item: ItemId.WOOD,
          quantity: 20,
          unitPrice: 1.5,
          total: 30,
        },
        {
          direction: TradeDirection.IMPORT,
          item: ItemId.BREAD,
          quantity: 30,
          unitPrice: 1.3,
          total: 39,
        },
      ]);
      expect(result.skipped).toEqual([]);
      expect(result.treasury).toBe(1);
      expect(storage.get(ItemId.WOOD)).toBe(10);
      expect(storage.get(ItemId.BREAD)).toBe(30);
      expect(market.getPendingExports()).toEqual({});
      expect(market.getPendingImports()).toEqual({});
    });

    it("debe mantener en cola una exportación sin existencias", () => {
      storage.add(ItemId.WOOD, 5);
      market.queueExport(ItemId.WOOD, 20);

      const result = market.settle(storage, 0);

      expect(result.trades).toEqual([]);
      expect(result.skipped).toEqual([
        {
          direction: TradeDirection.EXPORT,
          item: ItemId.WOOD,
          quantity: 20,
          reason: "only 5 in storage",
        },
      ]);
      expect(market.isExportQueued(ItemId.WOOD)).toBe(true);
      expect(storage.get(ItemId.WOOD)).toBe(5);
    });

    it("nunca debe dejar el tesoro en negativo", () => {
      market.queueImport(ItemId.BREAD, 30);

      const result = market.settle(storage, 10);

      expect(result.treasury).toBe(10);
      expect(result.skipped[0].reason).toBe("treasury 10 cannot cover 39");
      expect(market.isImportQueued(ItemId.BREAD)).toBe(true);
      expect(storage.get(ItemId.BREAD)).toBe(0);
    });

    it("debe ignorar pedidos vacíos", () => {
      market.queueExport(ItemId.WOOD, 0);
      market.queueImport(ItemId.BREAD, -1);
      expect(market.getPendingExports()).toEqual({});
      expect(market.getPendingImports()).toEqual({});
    });
  });
});
