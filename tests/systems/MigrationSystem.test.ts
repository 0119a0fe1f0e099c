import { describe, it, expect, beforeEach } from "vitest";
import {
  MigrationSystem,
  computeAttractiveness,
  foodSecurity,
  wealthScore,
  type AttractivenessInputs,
  type MigrationDecision,
} from "../../src/domain/simulation/systems/village/MigrationSystem";
import { MigrationKind } from "../../src/shared/constants/VillageEnums";
import { ScriptedRandom } from "../setup";

const THRIVING: AttractivenessInputs = {
  population: 10,
  averageHappiness: 100,
  averageHealth: 100,
  foodUnits: 100,
  treasury: 550,
};

const FAILING: AttractivenessInputs = {
  population: 100,
  averageHappiness: 0,
  averageHealth: 0,
  foodUnits: 0,
  treasury: 0,
};

function runDays(
  system: MigrationSystem,
  inputs: AttractivenessInputs,
  days: number,
): Array<MigrationDecision | undefined> {
  const decisions: Array<MigrationDecision | undefined> = [];
  for (let i = 0; i < days; i++) decisions.push(system.evaluateDay(inputs));
  return decisions;
}

describe("MigrationSystem", () => {
  let rng: ScriptedRandom;
  let system: MigrationSystem;

  beforeEach(() => {
    rng = new ScriptedRandom();
    system = new MigrationSystem(rng);
  });

  describe("puntuación", () => {
    it("debe medir la seguridad alimentaria por habitante", () => {
      expect(foodSecurity(50, 10)).toBe(0.5);
      expect(foodSecurity(500, 10)).toBe(1);
      expect(foodSecurity(0, 0)).toBe(1);
    });

    it("debe medir la riqueza por habitante", () => {
      expect(wealthScore(250, 9)).toBe(0.5);
      expect(wealthScore(5000, 9)).toBe(1);
    });

    it("debe ponderar los cinco factores", () => {
      expect(computeAttractiveness(THRIVING)).toBeCloseTo(0.95, 10);
      expect(computeAttractiveness(FAILING)).toBeCloseTo(0.05, 10);
      expect(computeAttractiveness({ ...FAILING, safety: 1 })).toBeCloseTo(
        0.1,
        10,
      );
    });
  });

  describe("evaluateDay", () => {
    it("debe evaluar solo cada siete días", () => {
      const decisions = runDays(system, THRIVING, 7);

      expect(decisions.slice(0, 6)).toEqual([
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
        undefined,
      ]);
      expect(decisions[6]).toEqual({
        kind: MigrationKind.IMMIGRATION,
        count: 1,
        attractiveness: computeAttractiveness(THRIVING),
      });
      expect(system.getCooldown()).toBe(30);
    });

    it("no debe contar días durante el enfriamiento", () => {
      runDays(system, THRIVING, 7);

      const cooling = runDays(system, THRIVING, 30);
      expect(cooling.every((d) => d === undefined)).toBe(true);
      expect(system.getCooldown()).toBe(0);
      expect(system.getDaysSinceCheck()).toBe(0);

      const next = runDays(system, THRIVING, 7);
      expect(next[6]?.kind).toBe(MigrationKind.IMMIGRATION);
    });

    it("debe expulsar a un lote limitado si la aldea es poco atractiva", () => {
      rng.push(0.99);
      const decisions = runDays(system, FAILING, 7);

      expect(decisions[6]?.kind).toBe(MigrationKind.EMIGRATION);
      // floor(100 * 0.05 * 0.95) = 4, capped at 3
      expect(decisions[6]?.count).toBe(3);
    });

    it("no debe vaciar una aldea en el mínimo", () => {
      const decisions = runDays(system, { ...FAILING, population: 5 }, 7);
      expect(decisions[6]).toBeUndefined();
      expect(system.getCooldown()).toBe(0);
    });

    it("no debe migrar con atractivo intermedio", () => {
      const middling = { ...THRIVING, averageHappiness: 50, foodUnits: 0 };
      // 0.15 + 0.2 + 0 + 0.15 + 0.05 = 0.55
      expect(computeAttractiveness(middling)).toBeCloseTo(0.55, 10);
      expect(runDays(system, middling, 7)[6]).toBeUndefined();
    });

    it("no debe superar la población máxima", () => {
      const full = { ...THRIVING, population: 1000, foodUnits: 10000, treasury: 50050 };
      expect(runDays(system, full, 7)[6]).toBeUndefined();
    });
  });

  describe("selectEmigrants", () => {
    it("debe elegir a los más descontentos conservando empates", () => {
      const candidates = [
        { id: "a", health: 50, happiness: 50 },
        { id: "b", health: 10, happiness: 20 },
        { id: "c", health: 60, happiness: 40 },
        { id: "d", health: 30, happiness: 0 },
      ];

      expect(system.selectEmigrants(candidates, 3).map((c) => c.id)).toEqual([
        "b",
        "d",
        "a",
      ]);
      expect(system.selectEmigrants(candidates, 0)).toEqual([]);
    });
  });
});
