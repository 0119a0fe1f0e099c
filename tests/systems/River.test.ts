import { describe, it, expect, beforeEach } from "vitest";
import {
  River,
  WaterCondition,
} from "../../src/domain/simulation/systems/world/River";
import { AttemptStatus } from "../../src/shared/constants/AIEnums";
import { ItemId } from "../../src/shared/constants/ItemEnums";
import { FishSpecies } from "../../src/shared/constants/ResourceEnums";
import { TimeOfDay } from "../../src/shared/constants/WeatherEnums";
import { ScriptedRandom, createWeather } from "../setup";

const RIVER = {
  name: "Test River",
  lengthKm: 2,
  depthM: 2,
  flowRate: 1,
};

describe("River", () => {
  let rng: ScriptedRandom;
  let river: River;

  beforeEach(() => {
    rng = new ScriptedRandom();
    river = new River(rng, RIVER);
  });

  describe("constructor", () => {
    it("debe calcular la capacidad por tamaño del río", () => {
      expect(river.getStats().capacity).toEqual({
        [FishSpecies.TROUT]: 40,
        [FishSpecies.SALMON]: 24,
        [FishSpecies.CATFISH]: 32,
        [FishSpecies.MINNOW]: 120,
      });
    });

    it("debe truncar la capacidad fraccionaria", () => {
      const short = new River(rng, {
        ...RIVER,
        lengthKm: 1.05,
        depthM: 1,
      });
      // 1.05 * 10 = 10.5 y 1.05 * 30 = 31.5
      expect(short.getCapacity(FishSpecies.TROUT)).toBe(10);
      expect(short.getCapacity(FishSpecies.MINNOW)).toBe(31);
    });

    it("debe poblar al 80% de la capacidad", () => {
      expect(river.getFishAbundance()).toEqual({
        [FishSpecies.TROUT]: 32,
        [FishSpecies.SALMON]: 19,
        [FishSpecies.CATFISH]: 25,
        [FishSpecies.MINNOW]: 96,
      });
      expect(river.getTotalFish()).toBe(172);
    });

    it("debe recortar la población inicial a la capacidad", () => {
      const stocked = new River(rng, {
        ...RIVER,
        initialPopulation: { [FishSpecies.TROUT]: 500 },
      });
      expect(stocked.getPopulation(FishSpecies.TROUT)).toBe(40);
    });
  });

  describe("attemptFishing", () => {
    it("debe rechazar especies desconocidas", () => {
      const result = river.attemptFishing({
        species: "shark",
        attempts: 3,
        skill: 5,
      });
      expect(result.status).toBe(AttemptStatus.INVALID);
      expect(result.message).toBe("Unknown fish type: shark");
    });

    it("debe exigir la habilidad mínima de la especie", () => {
      const result = river.attemptFishing({
        species: FishSpecies.SALMON,
        attempts: 3,
        skill: 1,
      });
      expect(result.status).toBe(AttemptStatus.INVALID);
      expect(result.message).toBe(
        "Fishing skill 1.0 is too low for salmon (needs 2)",
      );
      expect(river.getPopulation(FishSpecies.SALMON)).toBe(19);
    });

    it("debe informar cuando no hay peces de la especie", () => {
      const empty = new River(rng, {
        ...RIVER,
        initialPopulation: { [FishSpecies.TROUT]: 0 },
      });
      const result = empty.attemptFishing({
        species: FishSpecies.TROUT,
        attempts: 3,
        skill: 1,
      });
      expect(result.status).toBe(AttemptStatus.UNAVAILABLE);
      expect(result.message).toBe("No trout available in Test River");
    });

    it("debe pescar una vez por tirada bajo la probabilidad", () => {
      // hour 6 (dawn), three casts, then the special catch roll
      rng.push(0.25, 0.1, 0.9, 0.2, 0.5);
      const result = river.attemptFishing({
        species: FishSpecies.TROUT,
        attempts: 3,
        skill: 1,
      });

      expect(result.status).toBe(AttemptStatus.CAUGHT);
      expect(result.caught).toBe(2);
      expect(result.specialItem).toBeUndefined();
      expect(result.probability).toBeCloseTo(0.517, 10);
      expect(result.message).toBe("Caught 2 trout at Test River");
      expect(river.getPopulation(FishSpecies.TROUT)).toBe(30);
      expect(river.getPollution()).toBeCloseTo(0.002, 10);
      expect(rng.remaining()).toBe(0);
    });

    it("debe devolver MISSED sin tocar la población", () => {
      rng.push(0.25, 0.9, 0.9, 0.9);
      const result = river.attemptFishing({
        species: FishSpecies.TROUT,
        attempts: 3,
        skill: 1,
      });

      expect(result.status).toBe(AttemptStatus.MISSED);
      expect(result.caught).toBe(0);
      expect(result.message).toBe("Nothing bit at Test River this dawn");
      expect(river.getPopulation(FishSpecies.TROUT)).toBe(32);
      expect(river.getPollution()).toBe(0);
    });

    it("debe sacar una piedra a pescadores expertos", () => {
      rng.push(0.25, 0.1, 0.9, 0.9, 0.05);
      const result = river.attemptFishing({
        species: FishSpecies.TROUT,
        attempts: 3,
        skill: 6,
      });

      expect(result.caught).toBe(1);
      expect(result.specialItem).toBe(ItemId.STONE);
    });

    it("nunca debe pescar más de lo que hay", () => {
      const sparse = new River(new ScriptedRandom([], 0), {
        ...RIVER,
        initialPopulation: { [FishSpecies.MINNOW]: 2 },
      });
      const result = sparse.attemptFishing({
        species: FishSpecies.MINNOW,
        attempts: 10,
        skill: 1,
      });
      expect(result.caught).toBe(2);
      expect(sparse.getPopulation(FishSpecies.MINNOW)).toBe(0);
    });
  });

  describe("getCatchProbability", () => {
    it("debe premiar la hora activa de la especie", () => {
      const dawn = river.getCatchProbability(FishSpecies.TROUT, 1, TimeOfDay.DAWN);
      const noon = river.getCatchProbability(
        FishSpecies.TROUT,
        1,
        TimeOfDay.AFTERNOON,
      );
      expect(dawn - noon).toBeCloseTo(0.22, 10);
    });
  });

  describe("updateDaily", () => {
    it("debe disipar la contaminación y ajustar la claridad", () => {
      const polluted = new River(rng, { ...RIVER, pollution: 0.5 });
      polluted.updateDaily(createWeather());

      const stats = polluted.getStats();
      expect(stats.pollution).toBeCloseTo(0.49, 10);
      expect(stats.waterCondition).toBe(WaterCondition.SUNNY);
      expect(stats.waterClarity).toBeCloseTo(0.51, 10);
    });

    it("debe repoblar desde aguas arriba una especie agotada", () => {
      const empty = new River(rng, {
        ...RIVER,
        initialPopulation: { [FishSpecies.TROUT]: 0 },
      });
      empty.updateDaily(createWeather());
      expect(empty.getPopulation(FishSpecies.TROUT)).toBe(1);
    });

    it("debe mantener cada especie entre cero y su capacidad", () => {
      for (let day = 0; day < 60; day++) {
        river.updateDaily(createWeather({ day }));
        for (const species of Object.values(FishSpecies)) {
          const count = river.getPopulation(species);
          expect(count).toBeGreaterThanOrEqual(0);
          expect(count).toBeLessThanOrEqual(river.getCapacity(species));
        }
      }
    });
  });
});
