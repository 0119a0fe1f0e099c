import { injectable, inject } from "inversify";
import type { Request, Response } from "express";
import { TYPES } from "../../config/Types";
import { Logger } from "../utils/logger";
import { LogCategory } from "../../shared/constants/LogEnums";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import { SIMULATION_CONSTANTS } from "../../shared/constants/SimulationConstants";
import { VillageManager } from "../../domain/simulation/systems/village/VillageManager";
import type { DailyReport } from "../../shared/types/simulation/village";

/**
 * Request validation limits.
 */
const TICK_CONSTANTS = {
  MIN_DAYS: 1,
  MAX_DAYS: 365,
  DEFAULT_DAYS: 1,
} as const;

function parseIntInRange(
  value: unknown,
  min: number,
  max: number,
): number | null {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
        ? Number(value)
        : NaN;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) return null;
  return parsed;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Controller for the village API.
 *
 * Handles HTTP endpoints for:
 * - Health checks
 * - Village stats, villagers and world knowledge
 * - Recent daily reports
 * - Advancing the simulation
 */
@injectable()
export class VillageController {
  constructor(
    @inject(TYPES.VillageManager) private readonly manager: VillageManager,
    @inject(TYPES.Logger) private readonly logger: Logger,
  ) {}

  healthCheck(_req: Request, res: Response): void {
    res.json({
      status: ResponseStatus.OK,
      initialized: this.manager.isInitialized(),
      day: this.manager.getDay(),
    });
  }

  getVillage(_req: Request, res: Response): void {
    if (!this.ensureInitialized(res)) return;
    res.json({
      name: this.manager.getVillageName(),
      stats: this.manager.getStats(),
    });
  }

  getVillagers(_req: Request, res: Response): void {
    if (!this.ensureInitialized(res)) return;
    res.json({ villagers: this.manager.getVillagers() });
  }

  getVillager(req: Request, res: Response): void {
    if (!this.ensureInitialized(res)) return;
    const id = req.params?.id;
    const villager = typeof id === "string" ? this.manager.getVillager(id) : undefined;
    if (!villager) {
      res
        .status(HttpStatusCode.NOT_FOUND)
        .json({ error: `Villager not found: ${id}` });
      return;
    }
    res.json({ villager });
  }

  getWorld(_req: Request, res: Response): void {
    if (!this.ensureInitialized(res)) return;
    res.json({ world: this.manager.getWorldKnowledge() });
  }

  getReports(req: Request, res: Response): void {
    if (!this.ensureInitialized(res)) return;
    const maxReports = SIMULATION_CONSTANTS.VILLAGE.REPORT_HISTORY_SIZE;
    const rawLimit = req.query?.limit;
    const limit =
      rawLimit === undefined ? maxReports : parseIntInRange(rawLimit, 1, maxReports);
    if (limit === null) {
      res.status(HttpStatusCode.BAD_REQUEST).json({
        error: `limit must be an integer between 1 and ${maxReports}`,
      });
      return;
    }
    res.json({ reports: this.manager.getRecentReports(limit) });
  }

  tick(req: Request, res: Response): void {
    if (!this.ensureInitialized(res)) return;

    const body: unknown = req.body;
    const rawDays =
      body && typeof body === "object" && "days" in body ? body.days : undefined;
    const days =
      rawDays === undefined
        ? TICK_CONSTANTS.DEFAULT_DAYS
        : parseIntInRange(rawDays, TICK_CONSTANTS.MIN_DAYS, TICK_CONSTANTS.MAX_DAYS);
    if (days === null) {
      res.status(HttpStatusCode.BAD_REQUEST).json({
        error: `days must be an integer between ${TICK_CONSTANTS.MIN_DAYS} and ${TICK_CONSTANTS.MAX_DAYS}`,
      });
      return;
    }

    try {
      const reports: DailyReport[] = [];
      for (let i = 0; i < days; i++) {
        reports.push(this.manager.simulateDailyTick());
      }
      res.json({
        status: ResponseStatus.SUCCESS,
        day: this.manager.getDay(),
        reports,
      });
    } catch (error) {
      this.logger.error("Error advancing simulation:", LogCategory.HTTP, errorMessage(error));
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to advance simulation" });
    }
  }

  private ensureInitialized(res: Response): boolean {
    if (this.manager.isInitialized()) return true;
    res
      .status(HttpStatusCode.CONFLICT)
      .json({ error: "Village not initialized" });
    return false;
  }
}
