/**
 * @fileoverview Creación y validación de planes de acción
 *
 * Cada tipo de acción tiene un perfil fijo: prioridad, impacto genérico
 * (fijo + por hora) y requisitos mínimos. La elegibilidad se vuelve a
 * comprobar justo antes de ejecutar, porque el estado del aldeano puede
 * haber cambiado desde la planificación.
 *
 * @module domain/simulation/systems/agents/ai/core/ActionPlan
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { ItemId } from "@/shared/constants/ItemEnums";
import type { SiteKind } from "@/shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import {
  ACTION_PRIORITIES,
  type ActionImpact,
  type ActionPlan,
  type ActionRequirements,
  type VillagerState,
} from "../types";

interface ActionProfile {
  priority: number;
  impact: ActionImpact;
  /** Multiplied by the plan's duration and added to `impact` */
  impactPerHour?: Partial<ActionImpact>;
  requirements: ActionRequirements;
  defaultDuration: number;
}

const NO_IMPACT: ActionImpact = { health: 0, happiness: 0, energy: 0, money: 0 };

export const ACTION_PROFILES: Record<ActionType, ActionProfile> = {
  [ActionType.SLEEP]: {
    priority: ACTION_PRIORITIES.SLEEP,
    impact: { ...NO_IMPACT, happiness: 5 },
    impactPerHour: { health: 1, energy: 10 },
    requirements: {},
    defaultDuration: SIMULATION_CONSTANTS.PLANNING.SLEEP_HOURS,
  },
  [ActionType.EAT]: {
    priority: ACTION_PRIORITIES.EAT,
    impact: { ...NO_IMPACT, happiness: 5, energy: 5 },
    requirements: {},
    defaultDuration: 1,
  },
  [ActionType.BUY]: {
    priority: ACTION_PRIORITIES.BUY,
    impact: { ...NO_IMPACT, happiness: 2 },
    requirements: {},
    defaultDuration: 1,
  },
  [ActionType.SELL_GOODS]: {
    priority: ACTION_PRIORITIES.SELL,
    impact: { ...NO_IMPACT, happiness: 2 },
    requirements: {},
    defaultDuration: 1,
  },
  [ActionType.FISH]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT, health: -5, energy: -20 },
    requirements: { minHealth: 30, minEnergy: 20 },
    defaultDuration: 4,
  },
  [ActionType.HUNT]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT, health: -5, energy: -25 },
    requirements: { minHealth: 40, minEnergy: 30 },
    defaultDuration: 4,
  },
  [ActionType.FORAGE]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT, energy: -10 },
    requirements: { minHealth: 20, minEnergy: 15 },
    defaultDuration: 2,
  },
  [ActionType.CUT_WOOD]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT },
    impactPerHour: { health: -1, energy: -5 },
    requirements: { minHealth: 40, minEnergy: 30 },
    defaultDuration: SIMULATION_CONSTANTS.PLANNING.WOODCUTTING_HOURS,
  },
  [ActionType.TANNERY_WORK]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT, energy: -25 },
    requirements: { minHealth: 40, minEnergy: 30 },
    defaultDuration: SIMULATION_CONSTANTS.PLANNING.SHIFT_HOURS,
  },
  [ActionType.FARM]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT, health: -5, energy: -25 },
    requirements: { minHealth: 40, minEnergy: 30 },
    defaultDuration: SIMULATION_CONSTANTS.PLANNING.SHIFT_HOURS,
  },
  [ActionType.WORK_GENERIC]: {
    priority: ACTION_PRIORITIES.PRODUCTION,
    impact: { ...NO_IMPACT, health: -5, energy: -30, money: 10 },
    requirements: { minHealth: 40, minEnergy: 30 },
    defaultDuration: SIMULATION_CONSTANTS.PLANNING.SHIFT_HOURS,
  },
  [ActionType.IDLE]: {
    priority: ACTION_PRIORITIES.IDLE,
    impact: { ...NO_IMPACT, energy: -2 },
    requirements: {},
    defaultDuration: 1,
  },
};

export interface CreatePlanParams {
  villagerId: string;
  type: ActionType;
  source: string;
  targetItem?: ItemId;
  targetSite?: SiteKind;
  targetEntity?: string;
  quantity?: number;
  duration?: number;
  priority?: number;
  /** Merged over the profile's requirements */
  requirements?: ActionRequirements;
}

let planIdCounter = 0;

function computeImpact(profile: ActionProfile, duration: number): ActionImpact {
  const perHour = profile.impactPerHour ?? {};
  return {
    health: profile.impact.health + (perHour.health ?? 0) * duration,
    happiness: profile.impact.happiness + (perHour.happiness ?? 0) * duration,
    energy: profile.impact.energy + (perHour.energy ?? 0) * duration,
    money: profile.impact.money + (perHour.money ?? 0) * duration,
  };
}

/**
 * Crea un plan con ID único a partir del perfil de su tipo
 */
export function createActionPlan(params: CreatePlanParams): ActionPlan {
  const profile = ACTION_PROFILES[params.type];
  const duration = params.duration ?? profile.defaultDuration;
  return {
    id: `plan_${++planIdCounter}`,
    villagerId: params.villagerId,
    type: params.type,
    priority: params.priority ?? profile.priority,
    targetItem: params.targetItem,
    targetSite: params.targetSite,
    targetEntity: params.targetEntity,
    quantity: params.quantity ?? 1,
    duration,
    requirements: { ...profile.requirements, ...params.requirements },
    impact: computeImpact(profile, duration),
    source: params.source,
  };
}

export interface EligibilityCheck {
  ok: boolean;
  reason?: string;
}

/**
 * Comprueba el plan contra el estado actual del aldeano
 */
export function canExecute(
  plan: ActionPlan,
  villager: VillagerState,
): EligibilityCheck {
  if (!villager.isAlive) return { ok: false, reason: "Villager is dead" };

  const { minHealth, minEnergy, minMoney, minHappiness } = plan.requirements;
  if (minHealth !== undefined && villager.health < minHealth) {
    return { ok: false, reason: `Needs health ${minHealth}` };
  }
  if (minEnergy !== undefined && villager.energy < minEnergy) {
    return { ok: false, reason: `Needs energy ${minEnergy}` };
  }
  if (minMoney !== undefined && villager.money < minMoney) {
    return { ok: false, reason: `Needs ${minMoney} money` };
  }
  if (minHappiness !== undefined && villager.happiness < minHappiness) {
    return { ok: false, reason: `Needs happiness ${minHappiness}` };
  }

  switch (plan.type) {
    case ActionType.EAT:
    case ActionType.SELL_GOODS:
      if (
        plan.targetItem === undefined ||
        villager.getItemCount(plan.targetItem) < plan.quantity
      ) {
        return { ok: false, reason: "Not enough items held" };
      }
      break;
    case ActionType.TANNERY_WORK:
      if (villager.getItemCount(ItemId.SKIN) < 1) {
        return { ok: false, reason: "No hides to tan" };
      }
      break;
    default:
      break;
  }

  return { ok: true };
}

/**
 * Orden descendente por prioridad; estable, así que los empates conservan
 * el orden en que se propusieron
 */
export function sortByPriority(plans: readonly ActionPlan[]): ActionPlan[] {
  return [...plans].sort((a, b) => b.priority - a.priority);
}
