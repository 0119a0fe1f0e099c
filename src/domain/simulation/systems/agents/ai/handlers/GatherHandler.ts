/**
 * @fileoverview Handler de Recolección
 *
 * Recolectar bayas y talar árboles en el bosque compartido.
 * El bosque nunca entrega más de lo pedido ni de lo que tiene.
 *
 * @module domain/simulation/systems/agents/ai/handlers/GatherHandler
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { ItemId } from "@/shared/constants/ItemEnums";
import { SiteKind } from "@/shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { SkillName } from "@/shared/constants/VillageEnums";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { errorResult, failureResult, successResult } from "../types";

const { SUCCESS_GAIN, GAIN_PER_UNIT, ATTEMPT_GAIN } = SIMULATION_CONSTANTS.SKILLS;
const MOOD = SIMULATION_CONSTANTS.PRODUCTION_MOOD;

/**
 * Árboles que un leñador intenta talar en una jornada
 */
export function treesRequested(
  hours: number,
  skill: number,
  variation: number,
): number {
  return Math.max(1, Math.round(hours * (0.5 + skill * 0.25) * variation));
}

function handleForage(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  const forest = sites.forest;
  if (!forest || !villager.hasAccess(SiteKind.FOREST)) {
    return errorResult("No forest access");
  }

  const skill = villager.getSkill(SkillName.FORAGING);
  const result = forest.forage(plan.quantity + Math.floor(skill));

  if (result.gathered === 0) {
    villager.adjustNeeds({ happiness: MOOD.FAILURE });
    villager.improveSkill(SkillName.FORAGING, ATTEMPT_GAIN);
    return failureResult(result.message, forest.name, { gathered: 0 });
  }

  villager.addItem(ItemId.BERRIES, result.gathered);
  villager.adjustNeeds({ happiness: MOOD.SUCCESS });
  villager.improveSkill(
    SkillName.FORAGING,
    SUCCESS_GAIN + GAIN_PER_UNIT * result.gathered,
  );
  return successResult(result.message, forest.name, {
    gathered: result.gathered,
  });
}

function handleCutWood(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites, rng } = ctx;
  const forest = sites.forest;
  if (!forest || !villager.hasAccess(SiteKind.FOREST)) {
    return errorResult("No forest access");
  }

  const skill = villager.getSkill(SkillName.WOODCUTTING);
  const requested = treesRequested(
    plan.duration,
    skill,
    rng.floatRange(0.8, 1.2),
  );
  const harvest = forest.cutTrees(requested);

  if (harvest.cut === 0) {
    villager.adjustNeeds({ happiness: MOOD.FAILURE });
    return failureResult(`No trees left to cut in ${forest.name}`, forest.name, {
      requested,
      cut: 0,
    });
  }

  villager.addItem(ItemId.WOOD, harvest.cut);
  villager.adjustNeeds({ happiness: MOOD.SUCCESS });
  villager.improveSkill(
    SkillName.WOODCUTTING,
    SUCCESS_GAIN + GAIN_PER_UNIT * harvest.cut,
  );
  return successResult(`Cut ${harvest.cut} trees in ${forest.name}`, forest.name, {
    requested,
    cut: harvest.cut,
    breakdown: harvest.breakdown,
  });
}

export function handleGather(ctx: HandlerContext): HandlerExecutionResult {
  switch (ctx.plan.type) {
    case ActionType.FORAGE:
      return handleForage(ctx);
    case ActionType.CUT_WOOD:
      return handleCutWood(ctx);
    default:
      return errorResult("Wrong action type");
  }
}
