import { describe, it, expect } from "vitest";
import {
  canExecute,
  createActionPlan,
  sortByPriority,
  type CreatePlanParams,
  type VillagerState,
} from "../../../src/domain/simulation/systems/agents/ai";
import { ActionType } from "../../../src/shared/constants/AIEnums";
import { ItemId } from "../../../src/shared/constants/ItemEnums";
import { Occupation } from "../../../src/shared/constants/VillageEnums";
import { createVillager } from "../../setup";

function plan(type: ActionType, extra: Partial<CreatePlanParams> = {}) {
  return createActionPlan({
    villagerId: "villager_test",
    type,
    source: "test",
    ...extra,
  });
}

describe("ActionPlan", () => {
  describe("createActionPlan", () => {
    it("debe escalar el impacto por horas de sueño", () => {
      const sleep = plan(ActionType.SLEEP);

      expect(sleep.duration).toBe(8);
      expect(sleep.priority).toBe(0.8);
      expect(sleep.impact).toEqual({
        health: 8,
        happiness: 5,
        energy: 80,
        money: 0,
      });
    });

    it("debe cobrar la tala por hora", () => {
      expect(plan(ActionType.CUT_WOOD).impact).toEqual({
        health: -4,
        happiness: 0,
        energy: -20,
        money: 0,
      });
    });

    it("debe fusionar los requisitos sobre los del perfil", () => {
      const fish = plan(ActionType.FISH, { requirements: { minEnergy: 50 } });
      expect(fish.requirements).toEqual({ minHealth: 30, minEnergy: 50 });
    });

    it("debe asignar ids únicos y cantidad 1 por defecto", () => {
      const a = plan(ActionType.IDLE);
      const b = plan(ActionType.IDLE);
      expect(a.id).not.toBe(b.id);
      expect(a.quantity).toBe(1);
    });
  });

  describe("canExecute", () => {
    it("debe aceptar un plan en el umbral exacto", () => {
      const villager = createVillager({ health: 30, energy: 20 });
      expect(canExecute(plan(ActionType.FISH), villager)).toEqual({ ok: true });
    });

    it("debe rechazar por salud, energía y dinero", () => {
      expect(
        canExecute(plan(ActionType.FISH), createVillager({ health: 29 })),
      ).toEqual({ ok: false, reason: "Needs health 30" });
      expect(
        canExecute(plan(ActionType.FISH), createVillager({ energy: 10 })),
      ).toEqual({ ok: false, reason: "Needs energy 20" });
      expect(
        canExecute(
          plan(ActionType.BUY, { requirements: { minMoney: 2 } }),
          createVillager({ money: 1 }),
        ),
      ).toEqual({ ok: false, reason: "Needs 2 money" });
    });

    it("debe exigir el artículo para comer o vender", () => {
      const eat = plan(ActionType.EAT, { targetItem: ItemId.BREAD });
      expect(canExecute(eat, createVillager()).reason).toBe(
        "Not enough items held",
      );
      expect(
        canExecute(
          eat,
          createVillager({ inventory: { [ItemId.BREAD]: 1 } }),
        ).ok,
      ).toBe(true);
    });

    it("debe exigir pieles para la curtiduría", () => {
      const tanner = createVillager({ occupation: Occupation.TANNER });
      expect(canExecute(plan(ActionType.TANNERY_WORK), tanner)).toEqual({
        ok: false,
        reason: "No hides to tan",
      });
    });

    it("debe rechazar a un aldeano muerto", () => {
      const dead: VillagerState = {
        id: "villager_dead",
        name: "Gone",
        occupation: Occupation.LABORER,
        health: 0,
        happiness: 0,
        energy: 0,
        money: 0,
        isAlive: false,
        getSkill: () => 0,
        getItemCount: () => 0,
        getInventory: () => new Map(),
        hasAccess: () => false,
      };
      expect(canExecute(plan(ActionType.IDLE), dead)).toEqual({
        ok: false,
        reason: "Villager is dead",
      });
    });
  });

  describe("sortByPriority", () => {
    it("debe ordenar de mayor a menor conservando los empates", () => {
      const idle = plan(ActionType.IDLE);
      const fish = plan(ActionType.FISH);
      const hunt = plan(ActionType.HUNT);
      const eat = plan(ActionType.EAT);

      const sorted = sortByPriority([idle, fish, hunt, eat]);

      expect(sorted.map((p) => p.type)).toEqual([
        ActionType.EAT,
        ActionType.FISH,
        ActionType.HUNT,
        ActionType.IDLE,
      ]);
    });
  });
});
