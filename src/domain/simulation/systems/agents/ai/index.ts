/**
 * @fileoverview Subsistema de decisión de aldeanos
 *
 * Flujo de un turno:
 * ```
 * estado del aldeano → detectores → planes ordenados → mejor plan → handler
 * ```
 *
 * Los detectores solo observan y proponen; los handlers ejecutan contra los
 * sitios compartidos y devuelven un `HandlerExecutionResult`.
 *
 * @module domain/simulation/systems/agents/ai
 */

export * from "./types";
export {
  ACTION_PROFILES,
  canExecute,
  createActionPlan,
  sortByPriority,
  type CreatePlanParams,
  type EligibilityCheck,
} from "./core/ActionPlan";
export { ALL_DETECTORS, runAllDetectors, type Detector } from "./detectors";
export { ACTION_HANDLERS } from "./handlers";
