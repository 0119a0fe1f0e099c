import { Router, type Request, type Response } from "express";
import type { Container } from "inversify";
import { TYPES } from "@/config/Types";
import type { VillageController } from "@/infrastructure/controllers/villageController";

/**
 * Village API routes.
 *
 * - `GET /health` - Liveness and current day
 * - `GET /api/village` - Name and aggregate stats
 * - `GET /api/village/villagers` - All living villagers
 * - `GET /api/village/villagers/:id` - One villager
 * - `GET /api/village/world` - What villagers know when planning
 * - `GET /api/village/reports?limit=n` - Most recent daily reports
 * - `POST /api/village/tick` - Advance `{ days }` days (1-365)
 */
export function createVillageRoutes(container: Container): Router {
  const router = Router();
  const controller = container.get<VillageController>(TYPES.VillageController);

  router.get("/health", (req: Request, res: Response) =>
    controller.healthCheck(req, res),
  );
  router.get("/api/village", (req: Request, res: Response) =>
    controller.getVillage(req, res),
  );
  router.get("/api/village/villagers", (req: Request, res: Response) =>
    controller.getVillagers(req, res),
  );
  router.get("/api/village/villagers/:id", (req: Request, res: Response) =>
    controller.getVillager(req, res),
  );
  router.get("/api/village/world", (req: Request, res: Response) =>
    controller.getWorld(req, res),
  );
  router.get("/api/village/reports", (req: Request, res: Response) =>
    controller.getReports(req, res),
  );
  router.post("/api/village/tick", (req: Request, res: Response) =>
    controller.tick(req, res),
  );

  return router;
}
