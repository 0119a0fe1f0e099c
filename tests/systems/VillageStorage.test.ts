import { describe, it, expect, beforeEach } from "vitest";
import { VillageStorage } from "../../src/domain/simulation/systems/economy/VillageStorage";
import { ItemId } from "../../src/shared/constants/ItemEnums";

describe("VillageStorage", () => {
  let storage: VillageStorage;

  beforeEach(() => {
    storage = new VillageStorage();
  });

  it("debe separar comida de recursos", () => {
    storage.add(ItemId.BREAD, 5);
    storage.add(ItemId.FISH, 2);
    storage.add(ItemId.WOOD, 7);

    expect(storage.getFoodStorage()).toEqual({
      [ItemId.BREAD]: 5,
      [ItemId.FISH]: 2,
    });
    expect(storage.getResourceStorage()).toEqual({ [ItemId.WOOD]: 7 });
    expect(storage.totalFood()).toBe(7);
  });

  it("debe ignorar cantidades no positivas", () => {
    storage.add(ItemId.WOOD, 0);
    storage.add(ItemId.WOOD, -2);
    expect(storage.get(ItemId.WOOD)).toBe(0);
    expect(storage.remove(ItemId.WOOD, 0)).toBe(false);
  });

  it("no debe retirar más de lo que hay", () => {
    storage.add(ItemId.STONE, 3);

    expect(storage.remove(ItemId.STONE, 4)).toBe(false);
    expect(storage.get(ItemId.STONE)).toBe(3);

    expect(storage.remove(ItemId.STONE, 3)).toBe(true);
    expect(storage.getResourceStorage()).toEqual({});
  });
});
