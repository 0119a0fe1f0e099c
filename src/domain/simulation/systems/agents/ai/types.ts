/**
 * @fileoverview Tipos del sistema de decisión de aldeanos
 *
 * Define los tipos que comparten:
 * - Planes de acción (ActionPlan)
 * - Contexto de detectores (solo lectura)
 * - Contexto de handlers (mutación del aldeano y de los sitios)
 *
 * Arquitectura:
 * - Detectores: observan el estado del aldeano → proponen planes
 * - Planificador: ordena por prioridad y conserva el mejor
 * - Handlers: ejecutan el plan contra el bosque, el río, la curtiduría o un vendedor
 *
 * @module domain/simulation/systems/agents/ai/types
 */

import type { ActionType } from "@/shared/constants/AIEnums";
import type { ItemId } from "@/shared/constants/ItemEnums";
import type { SiteKind } from "@/shared/constants/ResourceEnums";
import type { Occupation, SkillName } from "@/shared/constants/VillageEnums";
import type { WorldKnowledge } from "@/shared/types/simulation/village";
import type { WeatherSnapshot } from "@/shared/types/simulation/weather";
import type { RandomSource } from "@/shared/utils/RandomUtils";
import type { SiteRegistry } from "../SiteRegistry";

/**
 * Umbrales mínimos para poder ejecutar un plan
 */
export interface ActionRequirements {
  minHealth?: number;
  minEnergy?: number;
  minMoney?: number;
  minHappiness?: number;
}

/**
 * Efecto genérico de un plan, aplicado tras los efectos propios de la acción
 */
export interface ActionImpact {
  health: number;
  happiness: number;
  energy: number;
  money: number;
}

/**
 * Plan de acción: intención puntuada de un aldeano para un turno del día
 */
export interface ActionPlan {
  readonly id: string;
  readonly villagerId: string;
  readonly type: ActionType;
  /** Escala 0-1; gana el mayor, empates por orden de inserción */
  readonly priority: number;
  readonly targetItem?: ItemId;
  readonly targetSite?: SiteKind;
  /** Especie para pescar o cazar, o id de vendedor para comerciar */
  readonly targetEntity?: string;
  readonly quantity: number;
  /** Horas o unidades de trabajo */
  readonly duration: number;
  readonly requirements: Readonly<ActionRequirements>;
  readonly impact: Readonly<ActionImpact>;
  /** Detector que propuso el plan */
  readonly source: string;
}

/**
 * Prioridades estándar por tipo de acción
 */
export const ACTION_PRIORITIES = {
  EAT: 0.9,
  SLEEP: 0.8,
  PRODUCTION: 0.7,
  BUY: 0.6,
  SELL: 0.5,
  IDLE: 0.1,
} as const;

/**
 * Vista de solo lectura del aldeano
 */
export interface VillagerState {
  readonly id: string;
  readonly name: string;
  readonly occupation: Occupation;
  readonly health: number;
  readonly happiness: number;
  readonly energy: number;
  readonly money: number;
  readonly isAlive: boolean;
  getSkill(skill: SkillName): number;
  getItemCount(item: ItemId): number;
  getInventory(): ReadonlyMap<ItemId, number>;
  hasAccess(site: SiteKind): boolean;
}

/**
 * Operaciones que los handlers pueden hacer sobre el aldeano.
 * Todas respetan los límites: necesidades en [0, 100], inventario ≥ 0,
 * habilidades sin bajar y con tope.
 */
export interface VillagerActor extends VillagerState {
  adjustNeeds(delta: Partial<Omit<ActionImpact, "money">>): void;
  addItem(item: ItemId, quantity: number): void;
  /** Todo o nada: false y sin cambios si no hay suficiente */
  removeItem(item: ItemId, quantity: number): boolean;
  earn(amount: number): void;
  /** Todo o nada: false y sin cambios si no alcanza el dinero */
  spend(amount: number): boolean;
  improveSkill(skill: SkillName, amount: number): void;
}

/**
 * Contexto de solo lectura que reciben los detectores.
 * Los detectores NO modifican estado, solo observan y proponen planes.
 */
export interface DetectorContext {
  readonly villager: VillagerState;
  readonly world: WorldKnowledge;
  readonly rng: RandomSource;
}

/**
 * Contexto que reciben los handlers
 */
export interface HandlerContext {
  readonly villager: VillagerActor;
  readonly plan: ActionPlan;
  readonly sites: SiteRegistry;
  readonly weather: WeatherSnapshot;
  readonly rng: RandomSource;
}

/**
 * Resultado de un handler
 */
export interface HandlerExecutionResult {
  /** Si la acción produjo lo que buscaba */
  success: boolean;
  /**
   * Si la acción llegó a ejecutarse. false = no hubo cambios y el ciclo
   * diario puede replanificar.
   */
  completed: boolean;
  /** Mensaje de debug/error */
  message?: string;
  /** Sitio o vendedor que atendió la acción */
  system?: string;
  /** Datos adicionales del resultado */
  data?: Record<string, unknown>;
}

/**
 * La acción no se ejecutó: no elegible o error real (sitio, especie o
 * vendedor inválido)
 */
export function errorResult(message: string): HandlerExecutionResult {
  return {
    success: false,
    completed: false,
    message,
  };
}

/**
 * La acción se intentó pero no rindió nada
 */
export function failureResult(
  message: string,
  system?: string,
  data?: Record<string, unknown>,
): HandlerExecutionResult {
  return {
    success: false,
    completed: true,
    message,
    system,
    data,
  };
}

/**
 * Crea un resultado de éxito para handlers
 */
export function successResult(
  message: string,
  system?: string,
  data?: Record<string, unknown>,
): HandlerExecutionResult {
  return {
    success: true,
    completed: true,
    message,
    system,
    data,
  };
}

export type ActionHandler = (ctx: HandlerContext) => HandlerExecutionResult;
