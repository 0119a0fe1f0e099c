/**
 * @fileoverview Detector de Trabajo
 *
 * Con energía y salud por encima de 50, propone el trabajo del oficio.
 * El granjero va al campo que más lo necesita: primero uno maduro, luego
 * uno vacío; sin campos cae en la jornada genérica.
 * Prioridad plana por tipo de acción, sin modificador de urgencia.
 *
 * @module domain/simulation/systems/agents/ai/detectors/WorkDetector
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { ItemId } from "@/shared/constants/ItemEnums";
import { SiteKind } from "@/shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { Occupation } from "@/shared/constants/VillageEnums";
import type { ActionPlan, DetectorContext } from "../types";
import { createActionPlan } from "../core/ActionPlan";
import { planBuy, planFish, planForage, planHunt } from "./FoodDetector";

const { WORK_ENERGY_THRESHOLD, WORK_HEALTH_THRESHOLD } =
  SIMULATION_CONSTANTS.NEEDS;
const SOURCE = "WorkDetector";

function genericShift(villagerId: string): ActionPlan[] {
  return [
    createActionPlan({
      villagerId,
      type: ActionType.WORK_GENERIC,
      source: SOURCE,
    }),
  ];
}

function planFarm(ctx: DetectorContext): ActionPlan[] {
  const { villager, world } = ctx;
  if (!villager.hasAccess(SiteKind.FIELD) || world.fields.length === 0) {
    return genericShift(villager.id);
  }

  const field =
    world.fields.find((listing) => listing.readyToHarvest) ??
    world.fields.find((listing) => listing.crop === undefined) ??
    world.fields[0];
  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.FARM,
      targetSite: SiteKind.FIELD,
      targetEntity: field.name,
      source: SOURCE,
    }),
  ];
}

export function detectWork(ctx: DetectorContext): ActionPlan[] {
  const { villager } = ctx;
  if (
    villager.energy <= WORK_ENERGY_THRESHOLD ||
    villager.health <= WORK_HEALTH_THRESHOLD
  ) {
    return [];
  }

  switch (villager.occupation) {
    case Occupation.WOODCUTTER:
      if (!villager.hasAccess(SiteKind.FOREST)) return [];
      return [
        createActionPlan({
          villagerId: villager.id,
          type: ActionType.CUT_WOOD,
          targetSite: SiteKind.FOREST,
          targetItem: ItemId.WOOD,
          duration: SIMULATION_CONSTANTS.PLANNING.WOODCUTTING_HOURS,
          source: SOURCE,
        }),
      ];
    case Occupation.HUNTER:
      return planHunt(ctx, SOURCE);
    case Occupation.FISHERMAN:
      return planFish(ctx, SOURCE);
    case Occupation.FORAGER:
      return planForage(ctx, SOURCE);
    case Occupation.TANNER:
      if (villager.getItemCount(ItemId.SKIN) > 0) {
        if (!villager.hasAccess(SiteKind.TANNERY)) return [];
        return [
          createActionPlan({
            villagerId: villager.id,
            type: ActionType.TANNERY_WORK,
            targetSite: SiteKind.TANNERY,
            targetItem: ItemId.LEATHER,
            source: SOURCE,
          }),
        ];
      }
      return planBuy(ctx, ItemId.SKIN, 1, SOURCE);
    case Occupation.FARMER:
      return planFarm(ctx);
    case Occupation.LABORER:
      return genericShift(villager.id);
  }
}
