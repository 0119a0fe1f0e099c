/**
 * @fileoverview Handlers de Trabajo
 *
 * Turno en la curtiduría, faena en el campo y jornada genérica.
 *
 * @module domain/simulation/systems/agents/ai/handlers/WorkHandler
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { ItemId } from "@/shared/constants/ItemEnums";
import { FieldTask, SiteKind } from "@/shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { SkillName } from "@/shared/constants/VillageEnums";
import { OCCUPATION_PROFILES } from "@/domain/data/OccupationCatalog";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { errorResult, failureResult, successResult } from "../types";

const { SUCCESS_GAIN, GAIN_PER_UNIT, ATTEMPT_GAIN, WORK_GAIN } =
  SIMULATION_CONSTANTS.SKILLS;
const MOOD = SIMULATION_CONSTANTS.PRODUCTION_MOOD;

export function handleTanneryWork(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  if (plan.type !== ActionType.TANNERY_WORK) {
    return errorResult("Wrong action type");
  }

  const tannery = sites.tannery;
  if (!tannery || !villager.hasAccess(SiteKind.TANNERY)) {
    return errorResult("No tannery access");
  }

  const hides = villager.getItemCount(ItemId.SKIN);
  if (hides === 0) return errorResult("No hides to tan");

  const result = tannery.work({
    workerId: villager.id,
    hides,
    skill: villager.getSkill(SkillName.TANNING),
    health: villager.health,
    happiness: villager.happiness,
  });
  if (!result.attempted) return errorResult(result.message);

  villager.removeItem(ItemId.SKIN, result.hidesUsed);
  villager.addItem(ItemId.LEATHER, result.leatherProduced);
  villager.adjustNeeds({
    health: -result.healthCost,
    happiness: result.happinessChange,
  });
  if (result.wage > 0) villager.earn(result.wage);

  const data = {
    hidesUsed: result.hidesUsed,
    leather: result.leatherProduced,
    wage: result.wage,
    accident: result.accident,
  };

  if (result.hidesUsed === 0) {
    villager.improveSkill(SkillName.TANNING, ATTEMPT_GAIN);
    return failureResult(result.message, tannery.name, data);
  }

  villager.improveSkill(
    SkillName.TANNING,
    SUCCESS_GAIN + GAIN_PER_UNIT * result.hidesUsed,
  );
  return successResult(result.message, tannery.name, data);
}

/**
 * Sembrar y cuidar entrenan como una jornada; solo la cosecha mueve el ánimo.
 */
export function handleFarm(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  if (plan.type !== ActionType.FARM) {
    return errorResult("Wrong action type");
  }
  if (!villager.hasAccess(SiteKind.FIELD)) {
    return errorResult("No field access");
  }

  const field = sites.getField(plan.targetEntity);
  if (!field) return errorResult(`Unknown field: ${plan.targetEntity ?? "none"}`);

  const result = field.work(villager.getSkill(SkillName.FARMING));
  const data = { task: result.task, crop: result.crop, harvested: result.harvested };

  if (result.task !== FieldTask.HARVEST) {
    villager.improveSkill(SkillName.FARMING, WORK_GAIN);
    return successResult(result.message, field.name, data);
  }

  if (result.item === undefined || result.harvested === 0) {
    villager.adjustNeeds({ happiness: MOOD.FAILURE });
    villager.improveSkill(SkillName.FARMING, ATTEMPT_GAIN);
    return failureResult(result.message, field.name, data);
  }

  villager.addItem(result.item, result.harvested);
  villager.adjustNeeds({ happiness: MOOD.SUCCESS });
  villager.improveSkill(SkillName.FARMING, SUCCESS_GAIN);
  return successResult(result.message, field.name, data);
}

export function handleGenericWork(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan } = ctx;
  if (plan.type !== ActionType.WORK_GENERIC) {
    return errorResult("Wrong action type");
  }

  villager.improveSkill(OCCUPATION_PROFILES[villager.occupation].skill, WORK_GAIN);
  return successResult(`Worked a ${plan.duration} hour shift`);
}
