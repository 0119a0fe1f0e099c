/**
 * @fileoverview Detector de Comercio
 *
 * Vende parte del excedente del producto principal del oficio cuando el
 * aldeano acumula demasiado.
 *
 * @module domain/simulation/systems/agents/ai/detectors/TradeDetector
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { OCCUPATION_PROFILES } from "@/domain/data/OccupationCatalog";
import type { ActionPlan, DetectorContext } from "../types";
import { createActionPlan } from "../core/ActionPlan";

const { SURPLUS_THRESHOLD, SURPLUS_SELL_FRACTION } =
  SIMULATION_CONSTANTS.PLANNING;

export function detectTrade(ctx: DetectorContext): ActionPlan[] {
  const { villager, world } = ctx;
  const output = OCCUPATION_PROFILES[villager.occupation].primaryOutput;
  if (!output) return [];

  const held = villager.getItemCount(output);
  if (held <= SURPLUS_THRESHOLD) return [];

  const quantity = Math.floor(held * SURPLUS_SELL_FRACTION);
  const vendor = world.vendors.find((listing) => {
    const price = listing.buyPrices[output];
    return price !== undefined && listing.money >= price * quantity;
  });
  if (!vendor) return [];

  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.SELL_GOODS,
      targetItem: output,
      targetEntity: vendor.id,
      quantity,
      source: "TradeDetector",
    }),
  ];
}
