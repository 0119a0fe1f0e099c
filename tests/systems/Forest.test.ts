import { describe, it, expect, beforeEach } from "vitest";
import { Forest } from "../../src/domain/simulation/systems/world/Forest";
import { WeatherSystem } from "../../src/domain/simulation/systems/core/WeatherSystem";
import { AttemptStatus } from "../../src/shared/constants/AIEnums";
import {
  TreeType,
  WildlifeSpecies,
} from "../../src/shared/constants/ResourceEnums";
import { RandomSource } from "../../src/shared/utils/RandomUtils";
import { ScriptedRandom, createWeather } from "../setup";

const TEN_OF_EACH = {
  [WildlifeSpecies.DEER]: 10,
  [WildlifeSpecies.RABBIT]: 10,
  [WildlifeSpecies.FOX]: 10,
  [WildlifeSpecies.BIRD]: 10,
  [WildlifeSpecies.SQUIRREL]: 10,
  [WildlifeSpecies.BOAR]: 10,
};

describe("Forest", () => {
  let rng: ScriptedRandom;
  let forest: Forest;

  beforeEach(() => {
    rng = new ScriptedRandom();
    forest = new Forest(rng, {
      name: "Test Wood",
      sizeSqKm: 1,
      initialWildlife: TEN_OF_EACH,
    });
  });

  describe("constructor", () => {
    it("debe sembrar los árboles según el tamaño", () => {
      expect(forest.getTreeCounts()).toEqual({
        mature: 1000,
        young: 500,
        saplings: 800,
      });
      expect(forest.effectiveTreeCount).toBe(1330);
      expect(forest.maxEffectiveTrees).toBe(1500);
      expect(forest.getForageStock()).toBe(75);
    });

    it("debe derivar la fauna inicial del tamaño cuando no se indica", () => {
      const sized = new Forest(new ScriptedRandom([0, 0, 0, 0, 0, 0]), {
        name: "Sized Wood",
        sizeSqKm: 2,
      });
      // floor(floor(400 / 6 * 0.5) * 0.7)
      for (const species of Object.values(WildlifeSpecies)) {
        expect(sized.getWildlifePopulation(species)).toBe(23);
      }
    });

    it("no debe consumir tiradas con la fauna indicada", () => {
      expect(rng.remaining()).toBe(0);
      expect(forest.getWildlifePopulation(WildlifeSpecies.DEER)).toBe(10);
    });
  });

  describe("cutTrees", () => {
    it("debe talar árboles maduros y repartir la madera por especie", () => {
      const harvest = forest.cutTrees(5);

      expect(harvest.cut).toBe(5);
      expect(harvest.breakdown).toEqual({ mature: 5, young: 0 });
      expect(harvest.woodByType).toEqual({
        [TreeType.OAK]: 2,
        [TreeType.PINE]: 2,
        [TreeType.BIRCH]: 1,
        [TreeType.MAPLE]: 1,
        [TreeType.SPRUCE]: 1,
      });
      expect(forest.getTreeCounts().mature).toBe(995);
      expect(forest.getStats().treesCutToday).toBe(5);
    });

    it("debe agotar los maduros antes de tocar los jóvenes", () => {
      const first = forest.cutTrees(1200);
      expect(first.breakdown).toEqual({ mature: 1000, young: 200 });

      const second = forest.cutTrees(400);
      expect(second.cut).toBe(300);
      expect(second.breakdown).toEqual({ mature: 0, young: 300 });

      const third = forest.cutTrees(10);
      expect(third.cut).toBe(0);
      expect(third.woodByType).toEqual({});
      expect(forest.getTreeCounts()).toEqual({
        mature: 0,
        young: 0,
        saplings: 800,
      });
    });

    it("debe ignorar cantidades no positivas", () => {
      expect(forest.cutTrees(0).cut).toBe(0);
      expect(forest.cutTrees(-3).cut).toBe(0);
      expect(forest.getTreeCounts().mature).toBe(1000);
    });
  });

  describe("attemptHunt", () => {
    it("debe rechazar especies desconocidas sin cambios", () => {
      const result = forest.attemptHunt("dragon", 5);
      expect(result.status).toBe(AttemptStatus.INVALID);
      expect(result.message).toBe("Unknown wildlife species: dragon");
    });

    it("debe cazar cuando la tirada cae bajo la probabilidad", () => {
      // 0.25 + 1 * 0.05 - 0.15 = 0.15
      rng.push(0.1);
      const result = forest.attemptHunt(WildlifeSpecies.DEER, 1);

      expect(result).toEqual({
        status: AttemptStatus.CAUGHT,
        species: WildlifeSpecies.DEER,
        meat: 3,
        skin: 2,
        message: "Hunted a deer in Test Wood",
      });
      expect(forest.getWildlifePopulation(WildlifeSpecies.DEER)).toBe(9);
    });

    it("debe fallar sin reducir la población", () => {
      rng.push(0.2);
      const result = forest.attemptHunt(WildlifeSpecies.DEER, 1);

      expect(result.status).toBe(AttemptStatus.MISSED);
      expect(result.message).toBe("The deer got away");
      expect(forest.getWildlifePopulation(WildlifeSpecies.DEER)).toBe(10);
    });

    it("debe informar cuando no quedan animales", () => {
      const empty = new Forest(rng, {
        name: "Empty Wood",
        sizeSqKm: 1,
        initialWildlife: { ...TEN_OF_EACH, [WildlifeSpecies.BOAR]: 0 },
      });

      const result = empty.attemptHunt(WildlifeSpecies.BOAR, 10);
      expect(result.status).toBe(AttemptStatus.UNAVAILABLE);
      expect(result.message).toBe("No boar left in Empty Wood");
      expect(empty.getHuntableSpecies()).toEqual([
        WildlifeSpecies.DEER,
        WildlifeSpecies.RABBIT,
        WildlifeSpecies.FOX,
        WildlifeSpecies.BIRD,
        WildlifeSpecies.SQUIRREL,
      ]);
    });
  });

  describe("forage", () => {
    it("nunca debe dar más de lo pedido ni de lo que queda", () => {
      expect(forest.forage(10).gathered).toBe(10);
      expect(forest.getForageStock()).toBe(65);

      expect(forest.forage(100).gathered).toBe(65);
      const empty = forest.forage(5);
      expect(empty.gathered).toBe(0);
      expect(empty.message).toBe("Nothing left to forage in Test Wood");
    });
  });

  describe("updateDaily", () => {
    it("debe reiniciar la tala del día y regenerar la recolección", () => {
      forest.cutTrees(3);
      forest.forage(75);

      forest.updateDaily(createWeather());

      expect(forest.getStats().treesCutToday).toBe(0);
      expect(forest.getForageStock()).toBeGreaterThan(0);
    });

    it("debe mantener todos los stocks dentro de sus límites", () => {
      const seeded = new RandomSource("forest-seed");
      const weather = new WeatherSystem(seeded, { daysPerSeason: 10 });
      const woods = new Forest(seeded, { name: "Long Wood", sizeSqKm: 1 });

      for (let day = 0; day < 80; day++) {
        woods.updateDaily(weather.advanceDay());
        woods.cutTrees(15);
        woods.forage(20);
        woods.attemptHunt(WildlifeSpecies.RABBIT, 3);

        const stats = woods.getStats();
        expect(stats.matureTrees).toBeGreaterThanOrEqual(0);
        expect(stats.youngTrees).toBeGreaterThanOrEqual(0);
        expect(stats.saplings).toBeGreaterThanOrEqual(0);
        expect(stats.forageStock).toBeGreaterThanOrEqual(0);
        expect(woods.effectiveTreeCount).toBeLessThanOrEqual(
          woods.maxEffectiveTrees,
        );
        expect(stats.health).toBeGreaterThanOrEqual(0.05);
        expect(stats.health).toBeLessThanOrEqual(1);
        for (const value of [
          stats.moisture,
          stats.fireRisk,
          stats.diseaseLevel,
          stats.pestInfestation,
          stats.treeDensity,
        ]) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(1);
        }
        for (const count of Object.values(stats.wildlife)) {
          expect(count).toBeGreaterThanOrEqual(0);
        }
      }
    });
  });
});
