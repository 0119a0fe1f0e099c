import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  Logger,
  isLogCategory,
} from "../../src/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "../../src/shared/constants/LogEnums";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({
      minLevel: LogLevel.INFO,
      consoleOutput: false,
      fileOutput: false,
    });
  });

  it("debe descartar entradas por debajo del nivel mínimo", () => {
    logger.debug("hidden", LogCategory.AI);
    logger.info("shown", LogCategory.AI);

    expect(logger.getBufferSize()).toBe(1);
    expect(logger.getRecentLogs()[0].message).toBe("shown");
  });

  it("debe usar la categoría general cuando el segundo argumento son datos", () => {
    logger.info("with data", { count: 2 });
    logger.warn("with category", LogCategory.ECONOMY, { count: 3 });

    const [first, second] = logger.getRecentLogs();
    expect(first.category).toBe(LogCategory.GENERAL);
    expect(first.data).toEqual({ count: 2 });
    expect(second.category).toBe(LogCategory.ECONOMY);
    expect(second.data).toEqual({ count: 3 });
  });

  it("debe etiquetar las entradas con el día simulado", () => {
    logger.setTick(3);
    logger.info("day three", LogCategory.SIMULATION);
    expect(logger.getRecentLogs()[0].day).toBe(3);
  });

  it("agentLog debe prefijar el mensaje con el aldeano", () => {
    logger.agentLog(LogLevel.WARN, LogCategory.NEEDS, "villager_1", "tired");

    const [entry] = logger.getRecentLogs();
    expect(entry.message).toBe("[Villager:villager_1] tired");
    expect(entry.villagerId).toBe("villager_1");
    expect(entry.level).toBe(LogLevel.WARN);
  });

  describe("queryLogs", () => {
    beforeEach(() => {
      logger.setTick(1);
      logger.info("Sold wood", LogCategory.ECONOMY);
      logger.agentLog(LogLevel.INFO, LogCategory.AI, "villager_1", "fish: ok");
      logger.setTick(2);
      logger.error("Broken", LogCategory.HTTP);
      logger.agentLog(LogLevel.WARN, LogCategory.AI, "villager_2", "idle");
    });

    it("debe filtrar por aldeano", () => {
      const entries = logger.queryLogs({ villagerId: "villager_1" });
      expect(entries.map((e) => e.message)).toEqual([
        "[Villager:villager_1] fish: ok",
      ]);
    });

    it("debe filtrar por nivel y categoría", () => {
      expect(
        logger.queryLogs({ levels: [LogLevel.ERROR] }).map((e) => e.message),
      ).toEqual(["Broken"]);
      expect(
        logger.queryLogs({ categories: [LogCategory.AI] }).length,
      ).toBe(2);
    });

    it("debe filtrar por día y texto sin distinguir mayúsculas", () => {
      expect(logger.queryLogs({ day: 2 }).length).toBe(2);
      expect(
        logger.queryLogs({ messageContains: "SOLD" }).map((e) => e.message),
      ).toEqual(["Sold wood"]);
    });

    it("debe quedarse con las últimas coincidencias según el límite", () => {
      const entries = logger.queryLogs({ limit: 2 });
      expect(entries.map((e) => e.message)).toEqual([
        "Broken",
        "[Villager:villager_2] idle",
      ]);
    });
  });

  it("debe acotar el buffer de memoria", () => {
    const small = new Logger({
      minLevel: LogLevel.DEBUG,
      maxMemoryLogs: 2,
      consoleOutput: false,
      fileOutput: false,
    });
    small.info("one");
    small.info("two");
    small.info("three");

    expect(small.getBufferSize()).toBe(2);
    expect(small.getRecentLogs().map((e) => e.message)).toEqual([
      "two",
      "three",
    ]);
  });

  it("debe contar métricas por nivel y categoría", () => {
    logger.info("a", LogCategory.WORLD);
    logger.info("b", LogCategory.WORLD);
    logger.error("c", LogCategory.HTTP);

    const metrics = logger.getMetrics();
    expect(metrics.totalCount).toBe(3);
    expect(metrics.byLevel[LogLevel.INFO]).toBe(2);
    expect(metrics.byLevel[LogLevel.ERROR]).toBe(1);
    expect(metrics.byCategory[LogCategory.WORLD]).toBe(2);

    logger.resetMetrics();
    expect(logger.getMetrics().totalCount).toBe(0);
  });

  it("isLogCategory debe reconocer solo categorías conocidas", () => {
    expect(isLogCategory("economy")).toBe(true);
    expect(isLogCategory("nonsense")).toBe(false);
    expect(isLogCategory(3)).toBe(false);
  });

  describe("salida a fichero", () => {
    let logDir: string;
    let fileLogger: Logger;

    beforeEach(() => {
      logDir = fs.mkdtempSync(path.join(os.tmpdir(), "village-logs-"));
      fileLogger = new Logger({
        minLevel: LogLevel.DEBUG,
        consoleOutput: false,
        fileOutput: true,
        logDir,
        writeIntervalMs: 60_000,
      });
    });

    afterEach(() => {
      fileLogger.destroy();
      fs.rmSync(logDir, { recursive: true, force: true });
    });

    it("flush debe escribir las entradas pendientes como JSON lines", async () => {
      fileLogger.setTick(5);
      fileLogger.info("written", LogCategory.SIMULATION);
      fileLogger.warn("also written", LogCategory.WEATHER);

      await fileLogger.flush();

      const files = fs.readdirSync(logDir);
      expect(files.length).toBe(1);
      expect(files[0]).toMatch(/^logs-\d{4}-\d{2}-\d{2}\.jsonl$/);

      const lines = fs
        .readFileSync(path.join(logDir, files[0]), "utf-8")
        .trim()
        .split("\n")
        .map((line) => JSON.parse(line));
      expect(lines.map((l) => l.message)).toEqual(["written", "also written"]);
      expect(lines[0].day).toBe(5);
      expect(lines[1].category).toBe(LogCategory.WEATHER);
    });
  });
});
