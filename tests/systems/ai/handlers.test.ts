import { describe, it, expect, beforeEach } from "vitest";
import {
  ACTION_HANDLERS,
  handleConsume,
  handleFarm,
  handleFish,
  handleGather,
  handleGenericWork,
  handleHunt,
  handleRest,
  handleTanneryWork,
  handleTrade,
  healthPerUnit,
  treesRequested,
} from "../../../src/domain/simulation/systems/agents/ai/handlers";
import {
  createActionPlan,
  type CreatePlanParams,
} from "../../../src/domain/simulation/systems/agents/ai/core/ActionPlan";
import type { HandlerContext } from "../../../src/domain/simulation/systems/agents/ai/types";
import { SiteRegistry } from "../../../src/domain/simulation/systems/agents/SiteRegistry";
import type { Villager } from "../../../src/domain/simulation/systems/agents/Villager";
import { Forest } from "../../../src/domain/simulation/systems/world/Forest";
import { River } from "../../../src/domain/simulation/systems/world/River";
import { Field } from "../../../src/domain/simulation/systems/world/Field";
import { Tannery } from "../../../src/domain/simulation/systems/economy/Tannery";
import { ActionType } from "../../../src/shared/constants/AIEnums";
import { ItemId } from "../../../src/shared/constants/ItemEnums";
import {
  CropType,
  FishSpecies,
  SiteKind,
  WildlifeSpecies,
} from "../../../src/shared/constants/ResourceEnums";
import { Occupation, SkillName } from "../../../src/shared/constants/VillageEnums";
import {
  ScriptedRandom,
  createVendors,
  createVillager,
  createWeather,
} from "../../setup";

const ALL_SITES = [SiteKind.FOREST, SiteKind.RIVER, SiteKind.TANNERY];

describe("handlers", () => {
  let rng: ScriptedRandom;
  let sites: SiteRegistry;

  function ctx(
    villager: Villager,
    type: ActionType,
    extra: Partial<CreatePlanParams> = {},
  ): HandlerContext {
    return {
      villager,
      plan: createActionPlan({
        villagerId: villager.id,
        type,
        source: "test",
        ...extra,
      }),
      sites,
      weather: createWeather(),
      rng,
    };
  }

  beforeEach(() => {
    rng = new ScriptedRandom();
    sites = new SiteRegistry({
      forest: new Forest(rng, {
        name: "Test Wood",
        sizeSqKm: 1,
        initialWildlife: { [WildlifeSpecies.DEER]: 10 },
      }),
      river: new River(rng, {
        name: "Test River",
        lengthKm: 2,
        depthM: 2,
        flowRate: 1,
      }),
      tannery: new Tannery(rng, { name: "Test Tannery" }),
      vendors: createVendors(),
    });
  });

  it("debe tener un handler por tipo de acción", () => {
    for (const type of Object.values(ActionType)) {
      expect(typeof ACTION_HANDLERS[type]).toBe("function");
    }
  });

  it("debe rechazar un tipo de acción ajeno", () => {
    const result = handleRest(ctx(createVillager(), ActionType.IDLE));
    expect(result).toEqual({
      success: false,
      completed: false,
      message: "Wrong action type",
    });
  });

  describe("handleRest", () => {
    it("debe dormir las horas del plan", () => {
      const result = handleRest(ctx(createVillager(), ActionType.SLEEP));
      expect(result.success).toBe(true);
      expect(result.message).toBe("Slept 8 hours");
    });
  });

  describe("handleConsume", () => {
    it("debe curar según el valor nutritivo", () => {
      const villager = createVillager({
        health: 50,
        inventory: { [ItemId.BREAD]: 1 },
      });
      const result = handleConsume(
        ctx(villager, ActionType.EAT, { targetItem: ItemId.BREAD }),
      );

      expect(healthPerUnit(200)).toBe(20);
      expect(result.message).toBe("Ate 1 Bread");
      expect(villager.health).toBe(70);
      expect(villager.getItemCount(ItemId.BREAD)).toBe(0);
    });

    it("no debe comer lo que no tiene", () => {
      const villager = createVillager({ health: 50 });
      const result = handleConsume(
        ctx(villager, ActionType.EAT, { targetItem: ItemId.BREAD }),
      );

      expect(result.completed).toBe(false);
      expect(result.message).toBe("Not enough Bread");
      expect(villager.health).toBe(50);
    });

    it("debe rechazar lo que no es comida", () => {
      const villager = createVillager({ inventory: { [ItemId.WOOD]: 1 } });
      const result = handleConsume(
        ctx(villager, ActionType.EAT, { targetItem: ItemId.WOOD }),
      );
      expect(result.message).toBe("Nothing edible selected");
      expect(villager.getItemCount(ItemId.WOOD)).toBe(1);
    });
  });

  describe("handleTrade", () => {
    it("debe comprar moviendo dinero e inventario de ambos", () => {
      const villager = createVillager({ money: 5 });
      const result = handleTrade(
        ctx(villager, ActionType.BUY, {
          targetItem: ItemId.BREAD,
          targetEntity: "greenleaf-grocer",
          quantity: 2,
        }),
      );

      expect(result.success).toBe(true);
      expect(result.system).toBe("greenleaf-grocer");
      expect(villager.money).toBe(3);
      expect(villager.getItemCount(ItemId.BREAD)).toBe(2);
      const grocer = sites.getVendor("greenleaf-grocer");
      expect(grocer?.getStock(ItemId.BREAD)).toBe(28);
      expect(grocer?.getMoney()).toBe(102);
    });

    it("no debe comprar sin dinero suficiente", () => {
      const villager = createVillager({ money: 1 });
      const result = handleTrade(
        ctx(villager, ActionType.BUY, {
          targetItem: ItemId.BREAD,
          targetEntity: "greenleaf-grocer",
          quantity: 2,
        }),
      );

      expect(result.completed).toBe(false);
      expect(result.message).toBe("Cannot afford 2");
      expect(villager.money).toBe(1);
      expect(sites.getVendor("greenleaf-grocer")?.getStock(ItemId.BREAD)).toBe(30);
    });

    it("debe rechazar un vendedor desconocido", () => {
      const result = handleTrade(
        ctx(createVillager({ money: 5 }), ActionType.BUY, {
          targetItem: ItemId.BREAD,
          targetEntity: "nowhere",
        }),
      );
      expect(result.message).toBe("Unknown vendor: nowhere");
    });

    it("debe vender al precio de compra del vendedor", () => {
      const villager = createVillager({ inventory: { [ItemId.WOOD]: 5 } });
      const result = handleTrade(
        ctx(villager, ActionType.SELL_GOODS, {
          targetItem: ItemId.WOOD,
          targetEntity: "ironheart-forge",
          quantity: 5,
        }),
      );

      expect(result.message).toBe("Sold 5 Wood for 0.4");
      expect(villager.money).toBe(0.4);
      expect(villager.getItemCount(ItemId.WOOD)).toBe(0);
      expect(sites.getVendor("ironheart-forge")?.getStock(ItemId.WOOD)).toBe(55);
    });

    it("no debe vender a quien no comercia el artículo", () => {
      const villager = createVillager({ inventory: { [ItemId.WOOD]: 5 } });
      const result = handleTrade(
        ctx(villager, ActionType.SELL_GOODS, {
          targetItem: ItemId.WOOD,
          targetEntity: "greenleaf-grocer",
          quantity: 5,
        }),
      );

      expect(result.message).toBe("Greenleaf Grocer does not trade wood");
      expect(villager.getItemCount(ItemId.WOOD)).toBe(5);
    });
  });

  describe("handleFish", () => {
    const fisher = () =>
      createVillager({
        occupation: Occupation.FISHERMAN,
        access: ALL_SITES,
        skills: { [SkillName.FISHING]: 1 },
      });

    it("debe guardar la captura y mejorar la habilidad", () => {
      const villager = fisher();
      rng.push(0.25, 0.1, 0.9, 0.2, 0.5);

      const result = handleFish(
        ctx(villager, ActionType.FISH, {
          targetEntity: FishSpecies.TROUT,
          quantity: 3,
        }),
      );

      expect(result.success).toBe(true);
      expect(result.system).toBe("Test River");
      expect(villager.getItemCount(ItemId.FISH)).toBe(2);
      expect(villager.happiness).toBe(83);
      expect(villager.getSkill(SkillName.FISHING)).toBeCloseTo(1.2, 10);
    });

    it("debe cansar y desanimar una jornada sin captura", () => {
      const villager = fisher();
      rng.push(0.25, 0.9, 0.9, 0.9);

      const result = handleFish(
        ctx(villager, ActionType.FISH, {
          targetEntity: FishSpecies.TROUT,
          quantity: 3,
        }),
      );

      expect(result.success).toBe(false);
      expect(result.completed).toBe(true);
      expect(villager.happiness).toBe(78);
      expect(villager.health).toBe(98);
      expect(villager.getSkill(SkillName.FISHING)).toBeCloseTo(1.02, 10);
    });

    it("no debe pescar sin acceso al río", () => {
      const result = handleFish(
        ctx(createVillager(), ActionType.FISH, {
          targetEntity: FishSpecies.TROUT,
        }),
      );
      expect(result.completed).toBe(false);
      expect(result.message).toBe("No river access");
    });
  });

  describe("handleHunt", () => {
    it("debe guardar carne y piel", () => {
      const villager = createVillager({
        occupation: Occupation.HUNTER,
        access: ALL_SITES,
        skills: { [SkillName.HUNTING]: 1 },
      });
      rng.push(0.1);

      const result = handleHunt(
        ctx(villager, ActionType.HUNT, { targetEntity: WildlifeSpecies.DEER }),
      );

      expect(result.message).toBe("Hunted a deer in Test Wood");
      expect(villager.getItemCount(ItemId.MEAT)).toBe(3);
      expect(villager.getItemCount(ItemId.SKIN)).toBe(2);
      expect(villager.getSkill(SkillName.HUNTING)).toBeCloseTo(1.35, 10);
    });
  });

  describe("handleGather", () => {
    it("debe recolectar la base más la habilidad entera", () => {
      const villager = createVillager({
        access: ALL_SITES,
        skills: { [SkillName.FORAGING]: 1.5 },
      });

      const result = handleGather(
        ctx(villager, ActionType.FORAGE, {
          targetItem: ItemId.BERRIES,
          quantity: 4,
        }),
      );

      expect(result.data).toEqual({ gathered: 5 });
      expect(villager.getItemCount(ItemId.BERRIES)).toBe(5);
      expect(villager.getSkill(SkillName.FORAGING)).toBeCloseTo(1.85, 10);
    });

    it("debe talar según horas y habilidad", () => {
      const villager = createVillager({
        occupation: Occupation.WOODCUTTER,
        access: ALL_SITES,
        skills: { [SkillName.WOODCUTTING]: 2 },
      });

      const matureBefore = sites.forest?.getTreeCounts().mature ?? 0;

      const result = handleGather(ctx(villager, ActionType.CUT_WOOD));

      expect(result.message).toBe("Cut 4 trees in Test Wood");
      expect(villager.getItemCount(ItemId.WOOD)).toBe(4);
      expect(sites.forest?.getTreeCounts().mature).toBe(matureBefore - 4);
      expect(villager.getSkill(SkillName.WOODCUTTING)).toBeCloseTo(2.3, 10);
    });

    it("no debe mejorar la habilidad si no queda nada que talar", () => {
      const villager = createVillager({
        occupation: Occupation.WOODCUTTER,
        access: ALL_SITES,
        skills: { [SkillName.WOODCUTTING]: 2 },
      });
      const counts = sites.forest?.getTreeCounts() ?? { mature: 0, young: 0 };
      sites.forest?.cutTrees(counts.mature + counts.young);

      const result = handleGather(ctx(villager, ActionType.CUT_WOOD));

      expect(result.success).toBe(false);
      expect(result.completed).toBe(true);
      expect(result.message).toBe("No trees left to cut in Test Wood");
      expect(villager.getItemCount(ItemId.WOOD)).toBe(0);
      expect(villager.getSkill(SkillName.WOODCUTTING)).toBe(2);
      expect(villager.happiness).toBe(78);
    });

    it("debe pedir al menos un árbol", () => {
      expect(treesRequested(4, 0, 0.8)).toBe(2);
      expect(treesRequested(1, 0, 0.8)).toBe(1);
    });
  });

  describe("handleTanneryWork", () => {
    it("debe curtir las pieles del aldeano y pagarle", () => {
      const villager = createVillager({
        occupation: Occupation.TANNER,
        happiness: 100,
        access: ALL_SITES,
        skills: { [SkillName.TANNING]: 2 },
        inventory: { [ItemId.SKIN]: 5 },
      });

      const result = handleTanneryWork(ctx(villager, ActionType.TANNERY_WORK));

      expect(result.success).toBe(true);
      expect(villager.getItemCount(ItemId.LEATHER)).toBe(3);
      expect(villager.getItemCount(ItemId.SKIN)).toBe(1);
      expect(villager.health).toBe(95);
      expect(villager.happiness).toBe(100);
      expect(villager.money).toBe(10);
      expect(villager.getSkill(SkillName.TANNING)).toBeCloseTo(2.3, 10);
    });

    it("no debe trabajar sin pieles", () => {
      const villager = createVillager({
        occupation: Occupation.TANNER,
        access: ALL_SITES,
      });
      const result = handleTanneryWork(ctx(villager, ActionType.TANNERY_WORK));
      expect(result.message).toBe("No hides to tan");
      expect(sites.tannery?.getMoney()).toBe(200);
    });
  });

  describe("handleFarm", () => {
    let field: Field;

    function farmer(): Villager {
      return createVillager({
        occupation: Occupation.FARMER,
        access: [SiteKind.FIELD],
        skills: { [SkillName.FARMING]: 1 },
      });
    }

    function farmCtx(villager: Villager, target = "Test Field"): HandlerContext {
      return ctx(villager, ActionType.FARM, {
        targetSite: SiteKind.FIELD,
        targetEntity: target,
      });
    }

    beforeEach(() => {
      field = new Field(rng, {
        name: "Test Field",
        sizeHa: 1,
        sown: { crop: CropType.WHEAT, growthStage: 0.95 },
      });
      sites = new SiteRegistry({ fields: [field] });
    });

    it("debe guardar la cosecha en el inventario", () => {
      const villager = farmer();
      const result = handleFarm(farmCtx(villager));

      expect(result.success).toBe(true);
      expect(result.message).toBe("Harvested 199 wheat in Test Field");
      expect(result.system).toBe("Test Field");
      expect(villager.getItemCount(ItemId.WHEAT)).toBe(199);
      expect(villager.happiness).toBe(83);
      expect(villager.getSkill(SkillName.FARMING)).toBeCloseTo(1.1, 10);
    });

    it("debe sembrar el campo vacío sin cambiar el ánimo", () => {
      const villager = farmer();
      handleFarm(farmCtx(villager));
      const result = handleFarm(farmCtx(villager));

      expect(result.success).toBe(true);
      expect(result.message).toBe("Planted wheat in Test Field");
      expect(field.getCrop()).toBe(CropType.WHEAT);
      expect(villager.happiness).toBe(83);
      expect(villager.getSkill(SkillName.FARMING)).toBeCloseTo(1.15, 10);
    });

    it("debe desanimar una cosecha perdida", () => {
      const villager = farmer();
      for (let day = 0; day < 25; day++) {
        field.updateDaily(createWeather({ temperature: -5, precipitation: 0 }));
      }
      const result = handleFarm(farmCtx(villager));

      expect(result.success).toBe(false);
      expect(result.completed).toBe(true);
      expect(villager.getItemCount(ItemId.WHEAT)).toBe(0);
      expect(villager.happiness).toBe(78);
      expect(villager.getSkill(SkillName.FARMING)).toBeCloseTo(1.02, 10);
    });

    it("no debe trabajar sin acceso al campo", () => {
      const result = handleFarm(farmCtx(createVillager()));
      expect(result.completed).toBe(false);
      expect(result.message).toBe("No field access");
    });

    it("debe rechazar un campo desconocido", () => {
      const result = handleFarm(farmCtx(farmer(), "Nowhere"));
      expect(result.completed).toBe(false);
      expect(result.message).toBe("Unknown field: Nowhere");
    });
  });

  describe("handleGenericWork", () => {
    it("debe entrenar la habilidad del oficio", () => {
      const villager = createVillager();
      const result = handleGenericWork(ctx(villager, ActionType.WORK_GENERIC));

      expect(result.message).toBe("Worked a 6 hour shift");
      expect(villager.getSkill(SkillName.LABOR)).toBe(0.05);
    });
  });
});
