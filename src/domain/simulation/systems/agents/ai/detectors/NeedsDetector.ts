/**
 * @fileoverview Detector de Necesidades
 *
 * Propone dormir cuando la energía cae por debajo del umbral bajo.
 *
 * @module domain/simulation/systems/agents/ai/detectors/NeedsDetector
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import type { ActionPlan, DetectorContext } from "../types";
import { createActionPlan } from "../core/ActionPlan";

const { LOW_ENERGY_THRESHOLD } = SIMULATION_CONSTANTS.NEEDS;

export function detectNeeds(ctx: DetectorContext): ActionPlan[] {
  const { villager } = ctx;
  if (villager.energy >= LOW_ENERGY_THRESHOLD) return [];

  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.SLEEP,
      duration: SIMULATION_CONSTANTS.PLANNING.SLEEP_HOURS,
      source: "NeedsDetector",
    }),
  ];
}
