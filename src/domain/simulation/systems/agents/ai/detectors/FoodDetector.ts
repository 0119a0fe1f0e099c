/**
 * @fileoverview Detector de Comida
 *
 * Dos pasos:
 * 1. Salud baja y comida en el inventario → comer lo más nutritivo
 * 2. Salud baja o sin comida → conseguirla, de lo más específico a lo
 *    menos: recolectar, pescar, cazar y, si no tiene nada, comprar
 *
 * La penalización de felicidad por hambre la aplica el aldeano antes de
 * planificar (ver `isHungryWithoutFood`); el detector solo observa.
 *
 * @module domain/simulation/systems/agents/ai/detectors/FoodDetector
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { ItemId } from "@/shared/constants/ItemEnums";
import { FishSpecies, SiteKind } from "@/shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { SkillName } from "@/shared/constants/VillageEnums";
import type { VendorListing } from "@/shared/types/simulation/economy";
import { ItemCatalog, STAPLE_FOODS } from "@/domain/data/ItemCatalog";
import { FISH_PROFILES } from "@/domain/simulation/systems/world/River";
import type { ActionPlan, DetectorContext, VillagerState } from "../types";
import { createActionPlan } from "../core/ActionPlan";

const { EAT_HEALTH_THRESHOLD } = SIMULATION_CONSTANTS.NEEDS;
const { MIN_FISHING_TO_FISH, MIN_HUNTING_TO_HUNT } = SIMULATION_CONSTANTS.SKILLS;
const { FISHING_ATTEMPTS, FORAGE_BASE_AMOUNT } = SIMULATION_CONSTANTS.PLANNING;

/**
 * Comidas en el inventario, de la más a la menos nutritiva
 */
export function heldFoods(villager: VillagerState): ItemId[] {
  const foods: ItemId[] = [];
  for (const [item, quantity] of villager.getInventory()) {
    if (quantity > 0 && ItemCatalog.isFood(item)) foods.push(item);
  }
  return foods.sort(
    (a, b) => ItemCatalog.getNutrition(b) - ItemCatalog.getNutrition(a),
  );
}

export function isHungryWithoutFood(villager: VillagerState): boolean {
  return heldFoods(villager).length === 0;
}

/**
 * Especie más abundante que el aldeano sabe pescar
 */
export function pickFishSpecies(
  ctx: DetectorContext,
): FishSpecies | undefined {
  const skill = ctx.villager.getSkill(SkillName.FISHING);
  let best: FishSpecies | undefined;
  let bestCount = 0;
  for (const species of Object.values(FishSpecies)) {
    const count = ctx.world.riverFishAbundance[species] ?? 0;
    if (FISH_PROFILES[species].minSkill > skill) continue;
    if (count > bestCount) {
      best = species;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Primer vendedor con existencias del artículo
 */
export function findSellingVendor(
  vendors: readonly VendorListing[],
  item: ItemId,
  quantity: number,
): VendorListing | undefined {
  return vendors.find(
    (vendor) =>
      (vendor.stock[item] ?? 0) >= quantity &&
      vendor.sellPrices[item] !== undefined,
  );
}

export function planFish(ctx: DetectorContext, source: string): ActionPlan[] {
  const { villager } = ctx;
  if (!villager.hasAccess(SiteKind.RIVER)) return [];
  if (villager.getSkill(SkillName.FISHING) < MIN_FISHING_TO_FISH) return [];

  const species = pickFishSpecies(ctx);
  if (!species) return [];

  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.FISH,
      targetSite: SiteKind.RIVER,
      targetEntity: species,
      quantity: FISHING_ATTEMPTS,
      source,
    }),
  ];
}

export function planHunt(ctx: DetectorContext, source: string): ActionPlan[] {
  const { villager, world, rng } = ctx;
  if (!villager.hasAccess(SiteKind.FOREST)) return [];
  if (villager.getSkill(SkillName.HUNTING) < MIN_HUNTING_TO_HUNT) return [];

  const species = rng.element(world.huntableSpecies);
  if (!species) return [];

  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.HUNT,
      targetSite: SiteKind.FOREST,
      targetEntity: species,
      source,
    }),
  ];
}

export function planForage(ctx: DetectorContext, source: string): ActionPlan[] {
  const { villager } = ctx;
  if (!villager.hasAccess(SiteKind.FOREST)) return [];

  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.FORAGE,
      targetSite: SiteKind.FOREST,
      targetItem: ItemId.BERRIES,
      quantity: FORAGE_BASE_AMOUNT,
      source,
    }),
  ];
}

/**
 * Compra de un artículo al primer vendedor que lo tenga, si alcanza el dinero
 */
export function planBuy(
  ctx: DetectorContext,
  item: ItemId,
  quantity: number,
  source: string,
): ActionPlan[] {
  const { villager, world } = ctx;
  const vendor = findSellingVendor(world.vendors, item, quantity);
  const price = vendor?.sellPrices[item];
  if (!vendor || price === undefined) return [];

  const total = price * quantity;
  if (villager.money < total) return [];

  return [
    createActionPlan({
      villagerId: villager.id,
      type: ActionType.BUY,
      targetItem: item,
      targetEntity: vendor.id,
      quantity,
      requirements: { minMoney: total },
      source,
    }),
  ];
}

export function detectFood(ctx: DetectorContext): ActionPlan[] {
  const { villager } = ctx;
  const plans: ActionPlan[] = [];
  const foods = heldFoods(villager);
  const lowHealth = villager.health < EAT_HEALTH_THRESHOLD;

  if (lowHealth && foods.length > 0) {
    plans.push(
      createActionPlan({
        villagerId: villager.id,
        type: ActionType.EAT,
        targetItem: foods[0],
        quantity: 1,
        source: "FoodDetector",
      }),
    );
  }

  if (!lowHealth && foods.length > 0) return plans;

  plans.push(...planForage(ctx, "FoodDetector"));
  plans.push(...planFish(ctx, "FoodDetector"));
  plans.push(...planHunt(ctx, "FoodDetector"));

  if (foods.length === 0) {
    for (const staple of STAPLE_FOODS) {
      const buy = planBuy(ctx, staple, 1, "FoodDetector");
      if (buy.length > 0) {
        plans.push(...buy);
        break;
      }
    }
  }

  return plans;
}
