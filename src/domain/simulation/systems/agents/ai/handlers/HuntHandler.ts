/**
 * @fileoverview Handler de Caza
 *
 * @module domain/simulation/systems/agents/ai/handlers/HuntHandler
 */

import { ActionType, AttemptStatus } from "@/shared/constants/AIEnums";
import { ItemId } from "@/shared/constants/ItemEnums";
import { SiteKind } from "@/shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { SkillName } from "@/shared/constants/VillageEnums";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { errorResult, failureResult, successResult } from "../types";

const { SUCCESS_GAIN, GAIN_PER_UNIT, ATTEMPT_GAIN } = SIMULATION_CONSTANTS.SKILLS;
const MOOD = SIMULATION_CONSTANTS.PRODUCTION_MOOD;

export function handleHunt(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  if (plan.type !== ActionType.HUNT) {
    return errorResult("Wrong action type");
  }

  const forest = sites.forest;
  if (!forest || !villager.hasAccess(SiteKind.FOREST)) {
    return errorResult("No forest access");
  }
  if (!plan.targetEntity) return errorResult("No prey selected");

  const result = forest.attemptHunt(
    plan.targetEntity,
    villager.getSkill(SkillName.HUNTING),
  );

  switch (result.status) {
    case AttemptStatus.INVALID:
      return errorResult(result.message);

    case AttemptStatus.UNAVAILABLE:
      return failureResult(result.message, forest.name);

    case AttemptStatus.MISSED:
      villager.adjustNeeds({ happiness: MOOD.FAILURE });
      villager.improveSkill(SkillName.HUNTING, ATTEMPT_GAIN);
      return failureResult(result.message, forest.name);

    case AttemptStatus.CAUGHT: {
      villager.addItem(ItemId.MEAT, result.meat);
      villager.addItem(ItemId.SKIN, result.skin);
      villager.adjustNeeds({ happiness: MOOD.SUCCESS });
      villager.improveSkill(
        SkillName.HUNTING,
        SUCCESS_GAIN + GAIN_PER_UNIT * (result.meat + result.skin),
      );
      return successResult(result.message, forest.name, {
        species: result.species,
        meat: result.meat,
        skin: result.skin,
      });
    }
  }
}
