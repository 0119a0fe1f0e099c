import { describe, it, expect } from "vitest";
import { RandomSource } from "../../src/shared/utils/RandomUtils";
import { ScriptedRandom } from "../setup";

describe("RandomSource", () => {
  it("debe repetir la misma secuencia con la misma semilla", () => {
    const a = new RandomSource("test-seed");
    const b = new RandomSource("test-seed");
    const seqA = Array.from({ length: 5 }, () => a.float());
    const seqB = Array.from({ length: 5 }, () => b.float());
    expect(seqA).toEqual(seqB);
    expect(a.seed).toBe("test-seed");
  });

  it("debe generar una semilla cuando no se da ninguna", () => {
    expect(new RandomSource().seed).toMatch(/^village-\d+$/);
  });

  it("debe mantener float en [0, 1)", () => {
    const rng = new RandomSource("range-seed");
    for (let i = 0; i < 200; i++) {
      const value = rng.float();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  describe("intRange", () => {
    it("debe incluir ambos extremos", () => {
      const rng = new ScriptedRandom([0, 0.999]);
      expect(rng.intRange(1, 6)).toBe(1);
      expect(rng.intRange(1, 6)).toBe(6);
    });
  });

  describe("floatRange", () => {
    it("debe interpolar entre min y max", () => {
      const rng = new ScriptedRandom([0.5, 0]);
      expect(rng.floatRange(0.8, 1.2)).toBeCloseTo(1.0, 10);
      expect(rng.floatRange(10, 50)).toBe(10);
    });
  });

  describe("chance", () => {
    it("debe ser cierta solo por debajo de la probabilidad", () => {
      const rng = new ScriptedRandom([0.29, 0.3]);
      expect(rng.chance(0.3)).toBe(true);
      expect(rng.chance(0.3)).toBe(false);
    });
  });

  describe("element", () => {
    it("debe elegir por índice proporcional", () => {
      const rng = new ScriptedRandom([0.6]);
      expect(rng.element(["a", "b"])).toBe("b");
    });

    it("debe devolver undefined para un array vacío", () => {
      expect(new ScriptedRandom().element([])).toBeUndefined();
    });

    it("elementOrThrow debe lanzar con un array vacío", () => {
      expect(() => new ScriptedRandom().elementOrThrow([])).toThrow(
        "Cannot pick from an empty array",
      );
    });
  });

  describe("shuffle", () => {
    it("debe conservar los mismos elementos", () => {
      const rng = new RandomSource("shuffle-seed");
      const shuffled = rng.shuffle([1, 2, 3, 4, 5]);
      expect([...shuffled].sort((x, y) => x - y)).toEqual([1, 2, 3, 4, 5]);
    });

    it("debe intercambiar con el índice elegido", () => {
      // i=2 → j=0, i=1 → j=1
      const rng = new ScriptedRandom([0, 0.9]);
      expect(rng.shuffle(["a", "b", "c"])).toEqual(["c", "b", "a"]);
    });
  });
});
