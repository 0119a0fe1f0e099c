/**
 * @fileoverview Handler de Descanso
 *
 * Dormir no tiene efectos propios: la recuperación de salud y energía
 * viene del impacto del plan (por hora dormida).
 *
 * @module domain/simulation/systems/agents/ai/handlers/RestHandler
 */

import { ActionType } from "@/shared/constants/AIEnums";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { errorResult, successResult } from "../types";

export function handleRest(ctx: HandlerContext): HandlerExecutionResult {
  const { plan } = ctx;
  if (plan.type !== ActionType.SLEEP) {
    return errorResult("Wrong action type");
  }
  return successResult(`Slept ${plan.duration} hours`);
}

export function handleIdle(ctx: HandlerContext): HandlerExecutionResult {
  if (ctx.plan.type !== ActionType.IDLE) {
    return errorResult("Wrong action type");
  }
  return successResult("Idled around the village");
}
