/**
 * @fileoverview Handler de Pesca
 *
 * Lanza la caña en el río compartido. El río decide la captura; los
 * efectos sobre el aldeano (habilidad, ánimo, cansancio extra) se aplican
 * aquí.
 *
 * @module domain/simulation/systems/agents/ai/handlers/FishHandler
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
/** Extra health lost on a fruitless trip */
const MISS_HEALTH_COST = 2;

export function handleFish(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  if (plan.type !== ActionType.FISH) {
    return errorResult("Wrong action type");
  }

  const river = sites.river;
  if (!river || !villager.hasAccess(SiteKind.RIVER)) {
    return errorResult("No river access");
  }
  if (!plan.targetEntity) return errorResult("No fish species selected");

  const result = river.attemptFishing({
    species: plan.targetEntity,
    attempts: plan.quantity,
    skill: villager.getSkill(SkillName.FISHING),
  });

  switch (result.status) {
    case AttemptStatus.INVALID:
      return errorResult(result.message);

    case AttemptStatus.UNAVAILABLE:
      return failureResult(result.message, river.name, { caught: 0 });

    case AttemptStatus.MISSED:
      villager.adjustNeeds({ happiness: MOOD.FAILURE, health: -MISS_HEALTH_COST });
      villager.improveSkill(SkillName.FISHING, ATTEMPT_GAIN);
      return failureResult(result.message, river.name, { caught: 0 });

    case AttemptStatus.CAUGHT:
      villager.addItem(ItemId.FISH, result.caught);
      if (result.specialItem) villager.addItem(result.specialItem, 1);
      villager.adjustNeeds({ happiness: MOOD.SUCCESS });
      villager.improveSkill(
        SkillName.FISHING,
        SUCCESS_GAIN + GAIN_PER_UNIT * result.caught,
      );
      return successResult(result.message, river.name, {
        caught: result.caught,
        species: result.species,
        specialItem: result.specialItem,
      });
  }
}
