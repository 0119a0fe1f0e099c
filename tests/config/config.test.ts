import path from "path";
import { describe, it, expect } from "vitest";
import { CONFIG, loadConfig } from "../../src/config/config";
import { LogLevel } from "../../src/shared/constants/LogEnums";

describe("Config", () => {
  it("debe tener valores por defecto", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(8080);
    expect(config.VILLAGE_NAME).toBe("Greendale");
    expect(config.SIMULATION_SEED).toBeUndefined();
    expect(config.INITIAL_VILLAGERS).toBe(10);
    expect(config.FOREST_SIZE_SQ_KM).toBe(2);
    expect(config.RIVER_NAME).toBe("Clearwater River");
    expect(config.AUTO_TICK_INTERVAL_MS).toBe(0);
    expect(config.LOG_LEVEL).toBe(LogLevel.INFO);
    expect(config.LOG_TO_FILE).toBe(false);
    expect(config.LOG_DIR).toBe(path.join(process.cwd(), "logs"));
    expect(config.ALLOWED_ORIGINS).toBe("*");
  });

  it("debe usar valores de entorno cuando están disponibles", () => {
    const config = loadConfig({
      PORT: "3000",
      VILLAGE_NAME: "Testford",
      SIMULATION_SEED: " test-seed ",
      INITIAL_VILLAGERS: "4",
      FOREST_SIZE_SQ_KM: "1.5",
      AUTO_TICK_INTERVAL_MS: "250",
      LOG_LEVEL: "DEBUG",
      LOG_TO_FILE: "true",
      LOG_DIR: "/tmp/village-test-logs",
      ALLOWED_ORIGINS: "http://a.test, http://b.test",
    });

    expect(config.PORT).toBe(3000);
    expect(config.VILLAGE_NAME).toBe("Testford");
    expect(config.SIMULATION_SEED).toBe("test-seed");
    expect(config.INITIAL_VILLAGERS).toBe(4);
    expect(config.FOREST_SIZE_SQ_KM).toBe(1.5);
    expect(config.AUTO_TICK_INTERVAL_MS).toBe(250);
    expect(config.LOG_LEVEL).toBe(LogLevel.DEBUG);
    expect(config.LOG_TO_FILE).toBe(true);
    expect(config.LOG_DIR).toBe(path.resolve("/tmp/village-test-logs"));
    expect(config.ALLOWED_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
  });

  it("debe tratar valores vacíos como ausentes", () => {
    const config = loadConfig({ PORT: "", SIMULATION_SEED: "  ", LOG_LEVEL: "" });
    expect(config.PORT).toBe(8080);
    expect(config.SIMULATION_SEED).toBeUndefined();
    expect(config.LOG_LEVEL).toBe(LogLevel.INFO);
  });

  it("debe rechazar un puerto inválido", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(
      'Invalid PORT="abc": expected a port number',
    );
    expect(() => loadConfig({ PORT: "70000" })).toThrow(
      'Invalid PORT="70000": expected a port number',
    );
  });

  it("debe rechazar una población inicial no entera o no positiva", () => {
    expect(() => loadConfig({ INITIAL_VILLAGERS: "0" })).toThrow(
      'Invalid INITIAL_VILLAGERS="0": expected a positive integer',
    );
    expect(() => loadConfig({ INITIAL_VILLAGERS: "2.5" })).toThrow(
      'Invalid INITIAL_VILLAGERS="2.5": expected a positive integer',
    );
  });

  it("debe rechazar un nivel de log desconocido", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(
      'Invalid LOG_LEVEL="loud": expected one of debug, info, warn, error',
    );
  });

  it("debe congelar la configuración", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
    expect(Object.isFrozen(CONFIG)).toBe(true);
  });
});
