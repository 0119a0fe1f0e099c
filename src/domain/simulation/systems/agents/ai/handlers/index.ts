/**
 * @fileoverview Índice de Handlers
 *
 * Un handler por tipo de acción. El registro es exhaustivo sobre
 * `ActionType`: añadir un tipo sin handler no compila.
 *
 * @module domain/simulation/systems/agents/ai/handlers
 */

import { ActionType } from "@/shared/constants/AIEnums";
import type { ActionHandler } from "../types";
import { handleRest, handleIdle } from "./RestHandler";
import { handleConsume } from "./ConsumeHandler";
import { handleTrade } from "./TradeHandler";
import { handleFish } from "./FishHandler";
import { handleHunt } from "./HuntHandler";
import { handleGather } from "./GatherHandler";
import { handleTanneryWork, handleFarm, handleGenericWork } from "./WorkHandler";

export { handleRest, handleIdle } from "./RestHandler";
export { handleConsume, healthPerUnit } from "./ConsumeHandler";
export { handleTrade } from "./TradeHandler";
export { handleFish } from "./FishHandler";
export { handleHunt } from "./HuntHandler";
export { handleGather, treesRequested } from "./GatherHandler";
export { handleTanneryWork, handleFarm, handleGenericWork } from "./WorkHandler";

export const ACTION_HANDLERS: Record<ActionType, ActionHandler> = {
  [ActionType.SLEEP]: handleRest,
  [ActionType.EAT]: handleConsume,
  [ActionType.BUY]: handleTrade,
  [ActionType.SELL_GOODS]: handleTrade,
  [ActionType.FISH]: handleFish,
  [ActionType.HUNT]: handleHunt,
  [ActionType.FORAGE]: handleGather,
  [ActionType.CUT_WOOD]: handleGather,
  [ActionType.TANNERY_WORK]: handleTanneryWork,
  [ActionType.FARM]: handleFarm,
  [ActionType.WORK_GENERIC]: handleGenericWork,
  [ActionType.IDLE]: handleIdle,
};
