/**
 * @fileoverview Exportaciones de Detectores
 *
 * Los detectores observan el estado del aldeano y proponen planes.
 * Cada detector es una función pura: (DetectorContext) => ActionPlan[]
 *
 * @module domain/simulation/systems/agents/ai/detectors
 */

export { detectNeeds } from "./NeedsDetector";
export { detectFood, heldFoods, isHungryWithoutFood } from "./FoodDetector";
export { detectWork } from "./WorkDetector";
export { detectTrade } from "./TradeDetector";

import type { ActionPlan, DetectorContext } from "../types";
import { detectNeeds } from "./NeedsDetector";
import { detectFood } from "./FoodDetector";
import { detectWork } from "./WorkDetector";
import { detectTrade } from "./TradeDetector";

/**
 * Tipo de función detector
 */
export type Detector = (ctx: DetectorContext) => ActionPlan[];

/**
 * Lista ordenada de todos los detectores
 *
 * El orden importa, los empates de prioridad se resuelven por él:
 * 1. Descanso
 * 2. Comida (comer, conseguir)
 * 3. Trabajo del oficio
 * 4. Venta de excedentes
 */
export const ALL_DETECTORS: readonly Detector[] = [
  detectNeeds,
  detectFood,
  detectWork,
  detectTrade,
];

/**
 * Ejecuta todos los detectores en orden y concatena sus planes
 */
export function runAllDetectors(ctx: DetectorContext): ActionPlan[] {
  const plans: ActionPlan[] = [];
  for (const detector of ALL_DETECTORS) {
    plans.push(...detector(ctx));
  }
  return plans;
}
