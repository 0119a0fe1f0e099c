/**
 * @fileoverview Handler de Consumo
 *
 * Come del inventario propio. Todo o nada: si no hay suficiente, no se
 * consume nada.
 *
 * @module domain/simulation/systems/agents/ai/handlers/ConsumeHandler
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { ItemCatalog } from "@/domain/data/ItemCatalog";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { errorResult, successResult } from "../types";

/**
 * Salud que devuelve una unidad de comida
 */
export function healthPerUnit(nutritionalValue: number): number {
  return Math.round(
    nutritionalValue * SIMULATION_CONSTANTS.NEEDS.NUTRITION_HEALTH_FACTOR,
  );
}

export function handleConsume(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan } = ctx;
  if (plan.type !== ActionType.EAT) {
    return errorResult("Wrong action type");
  }

  const item = plan.targetItem;
  if (!item || !ItemCatalog.isFood(item)) {
    return errorResult("Nothing edible selected");
  }
  if (!villager.removeItem(item, plan.quantity)) {
    return errorResult(`Not enough ${ItemCatalog.getDisplayName(item)}`);
  }

  const healed = healthPerUnit(ItemCatalog.getNutrition(item)) * plan.quantity;
  villager.adjustNeeds({ health: healed });

  return successResult(
    `Ate ${plan.quantity} ${ItemCatalog.getDisplayName(item)}`,
    undefined,
    { item, quantity: plan.quantity, healed },
  );
}
