import { ActionType } from "../../../../shared/constants/AIEnums";
import type { ItemId } from "../../../../shared/constants/ItemEnums";
import { LogCategory, LogLevel } from "../../../../shared/constants/LogEnums";
import type { SiteKind } from "../../../../shared/constants/ResourceEnums";
import { SIMULATION_CONSTANTS } from "../../../../shared/constants/SimulationConstants";
import { SkillName, type Occupation } from "../../../../shared/constants/VillageEnums";
import type { ItemStock } from "../../../../shared/types/simulation/economy";
import type {
  VillagerSnapshot,
  WorldKnowledge,
} from "../../../../shared/types/simulation/village";
import type { WeatherSnapshot } from "../../../../shared/types/simulation/weather";
import type { RandomSource } from "../../../../shared/utils/RandomUtils";
import { clamp, roundMoney } from "../../../../shared/utils/mathUtils";
import type { Logger } from "../../../../infrastructure/utils/logger";
import { ItemCatalog } from "../../../data/ItemCatalog";
import type { SiteRegistry } from "./SiteRegistry";
import {
  canExecute,
  createActionPlan,
  sortByPriority,
} from "./ai/core/ActionPlan";
import { isHungryWithoutFood, runAllDetectors } from "./ai/detectors";
import { ACTION_HANDLERS } from "./ai/handlers";
import {
  errorResult,
  failureResult,
  type ActionImpact,
  type ActionPlan,
  type HandlerExecutionResult,
  type VillagerActor,
} from "./ai/types";

const NEEDS = SIMULATION_CONSTANTS.NEEDS;
const PLANNING = SIMULATION_CONSTANTS.PLANNING;

export interface VillagerInit {
  id: string;
  name: string;
  age: number;
  occupation: Occupation;
  health: number;
  happiness: number;
  energy: number;
  money: number;
  skills?: Partial<Record<SkillName, number>>;
  inventory?: ItemStock;
  access?: readonly SiteKind[];
}

/**
 * What a villager sees and touches during one day.
 */
export interface VillagerDayContext {
  world: WorldKnowledge;
  sites: SiteRegistry;
  weather: WeatherSnapshot;
  rng: RandomSource;
  logger?: Logger;
}

export interface ActionOutcome {
  plan: ActionPlan;
  result: HandlerExecutionResult;
}

function clampNeed(value: number): number {
  return clamp(value, NEEDS.MIN, NEEDS.MAX);
}

/**
 * A villager: needs, purse, inventory and skills, plus the greedy
 * plan/execute cycle that runs once per simulated day.
 */
export class Villager implements VillagerActor {
  public readonly id: string;
  public readonly name: string;
  public readonly age: number;
  public readonly occupation: Occupation;

  private _health: number;
  private _happiness: number;
  private _energy: number;
  private _money: number;
  private _isAlive = true;
  private dailyEarnings = 0;
  private dailyExpenses = 0;

  private readonly skills = new Map<SkillName, number>();
  private readonly inventory = new Map<ItemId, number>();
  private readonly access: Set<SiteKind>;
  private currentPlan: ActionPlan[] = [];
  private readonly actionHistory: ActionOutcome[] = [];

  constructor(init: VillagerInit) {
    this.id = init.id;
    this.name = init.name;
    this.age = init.age;
    this.occupation = init.occupation;
    this._health = clampNeed(init.health);
    this._happiness = clampNeed(init.happiness);
    this._energy = clampNeed(init.energy);
    this._money = Math.max(0, init.money);
    this.access = new Set(init.access ?? []);

    for (const skill of Object.values(SkillName)) {
      const level = init.skills?.[skill];
      if (level === undefined) continue;
      this.skills.set(skill, clamp(level, 0, SIMULATION_CONSTANTS.SKILLS.MAX_LEVEL));
    }
    for (const [item, quantity] of ItemCatalog.entries(init.inventory ?? {})) {
      this.addItem(item, quantity);
    }
  }

  get health(): number {
    return this._health;
  }

  get happiness(): number {
    return this._happiness;
  }

  get energy(): number {
    return this._energy;
  }

  get money(): number {
    return this._money;
  }

  get isAlive(): boolean {
    return this._isAlive;
  }

  public getSkill(skill: SkillName): number {
    return this.skills.get(skill) ?? 0;
  }

  public getItemCount(item: ItemId): number {
    return this.inventory.get(item) ?? 0;
  }

  public getInventory(): ReadonlyMap<ItemId, number> {
    return this.inventory;
  }

  public hasAccess(site: SiteKind): boolean {
    return this.access.has(site);
  }

  public getPlannedActions(): readonly ActionPlan[] {
    return [...this.currentPlan];
  }

  public getActionHistory(): readonly ActionOutcome[] {
    return this.actionHistory;
  }

  public getDailyEarnings(): number {
    return this.dailyEarnings;
  }

  public getDailyExpenses(): number {
    return this.dailyExpenses;
  }

  public adjustNeeds(delta: Partial<Omit<ActionImpact, "money">>): void {
    if (delta.health !== undefined) {
      this._health = clampNeed(this._health + delta.health);
    }
    if (delta.happiness !== undefined) {
      this._happiness = clampNeed(this._happiness + delta.happiness);
    }
    if (delta.energy !== undefined) {
      this._energy = clampNeed(this._energy + delta.energy);
    }
  }

  public addItem(item: ItemId, quantity: number): void {
    const amount = Math.floor(quantity);
    if (amount <= 0) return;
    this.inventory.set(item, this.getItemCount(item) + amount);
  }

  public removeItem(item: ItemId, quantity: number): boolean {
    const amount = Math.floor(quantity);
    const held = this.getItemCount(item);
    if (amount <= 0 || held < amount) return false;
    if (held === amount) this.inventory.delete(item);
    else this.inventory.set(item, held - amount);
    return true;
  }

  public earn(amount: number): void {
    if (amount <= 0) return;
    this._money = roundMoney(this._money + amount);
    this.dailyEarnings = roundMoney(this.dailyEarnings + amount);
  }

  public spend(amount: number): boolean {
    if (amount < 0 || amount > this._money) return false;
    this._money = roundMoney(this._money - amount);
    this.dailyExpenses = roundMoney(this.dailyExpenses + amount);
    return true;
  }

  public improveSkill(skill: SkillName, amount: number): void {
    if (amount <= 0) return;
    this.skills.set(
      skill,
      Math.min(SIMULATION_CONSTANTS.SKILLS.MAX_LEVEL, this.getSkill(skill) + amount),
    );
  }

  /**
   * Replaces the current plan with the best candidate the villager can
   * run right now; empty when none is eligible.
   * Starting the pass with nothing to eat costs happiness.
   */
  public planNextActions(
    world: WorldKnowledge,
    rng: RandomSource,
  ): readonly ActionPlan[] {
    if (!this._isAlive) {
      this.currentPlan = [];
      return [];
    }

    if (isHungryWithoutFood(this)) {
      this.adjustNeeds({ happiness: -NEEDS.HUNGER_HAPPINESS_PENALTY });
    }

    const candidates = sortByPriority(
      runAllDetectors({ villager: this, world, rng }).filter(
        (plan) => canExecute(plan, this).ok,
      ),
    );
    this.currentPlan = candidates.slice(0, PLANNING.MAX_PLAN_SIZE);
    return [...this.currentPlan];
  }

  /**
   * Replaces the current plan with an explicit one.
   */
  public queuePlan(plan: ActionPlan): void {
    this.currentPlan = [plan];
  }

  /**
   * Pops and runs the next planned action. Eligibility is re-checked
   * against the current state; an ineligible plan changes nothing.
   */
  public executeNextAction(ctx: VillagerDayContext): ActionOutcome | undefined {
    const plan = this.currentPlan.shift();
    if (!plan) return undefined;

    const check = canExecute(plan, this);
    if (!check.ok) {
      return this.record(ctx, plan, errorResult(check.reason ?? "Not eligible"));
    }

    const result = ACTION_HANDLERS[plan.type]({
      villager: this,
      plan,
      sites: ctx.sites,
      weather: ctx.weather,
      rng: ctx.rng,
    });
    if (!result.completed) return this.record(ctx, plan, result);

    this.applyImpact(plan.impact);
    this.actionHistory.push({ plan, result });
    if (this.actionHistory.length > PLANNING.ACTION_HISTORY_LIMIT) {
      this.actionHistory.shift();
    }

    if (this._health <= 0) {
      this.die();
      return this.record(
        ctx,
        plan,
        failureResult(`${this.name} died while doing ${plan.type}`, result.system),
      );
    }
    return this.record(ctx, plan, result);
  }

  /**
   * One day: plan, execute up to the daily cap (re-planning once after an
   * action that could not run), fall back to idling, then the end-of-day
   * needs check.
   */
  public dailyUpdateCycle(ctx: VillagerDayContext): ActionOutcome[] {
    if (!this._isAlive) return [];

    this.dailyEarnings = 0;
    this.dailyExpenses = 0;
    this.planNextActions(ctx.world, ctx.rng);

    const outcomes: ActionOutcome[] = [];
    let completed = 0;
    let replans = 0;

    for (let i = 0; i < PLANNING.MAX_ACTIONS_PER_DAY && this._isAlive; i++) {
      const outcome = this.executeNextAction(ctx);
      if (!outcome) break;
      outcomes.push(outcome);
      if (outcome.result.completed) {
        completed++;
      } else if (replans < PLANNING.MAX_REPLANS_PER_DAY) {
        replans++;
        this.planNextActions(ctx.world, ctx.rng);
      }
    }

    if (completed === 0 && this._isAlive) {
      this.queuePlan(
        createActionPlan({
          villagerId: this.id,
          type: ActionType.IDLE,
          source: "Villager",
        }),
      );
      const idle = this.executeNextAction(ctx);
      if (idle) outcomes.push(idle);
    }

    this.checkExhaustion(ctx);
    return outcomes;
  }

  public toSnapshot(): VillagerSnapshot {
    const skills: Partial<Record<SkillName, number>> = {};
    for (const [skill, level] of this.skills) skills[skill] = level;
    return {
      id: this.id,
      name: this.name,
      age: this.age,
      occupation: this.occupation,
      health: this._health,
      happiness: this._happiness,
      energy: this._energy,
      money: this._money,
      dailyEarnings: this.dailyEarnings,
      dailyExpenses: this.dailyExpenses,
      isAlive: this._isAlive,
      skills,
      inventory: ItemCatalog.toStock(this.inventory),
      access: [...this.access],
      lastAction: this.actionHistory.at(-1)?.plan.type,
    };
  }

  private applyImpact(impact: Readonly<ActionImpact>): void {
    this.adjustNeeds(impact);
    if (impact.money > 0) {
      this.earn(impact.money);
    } else if (impact.money < 0) {
      this.spend(Math.min(this._money, -impact.money));
    }
  }

  private checkExhaustion(ctx: VillagerDayContext): void {
    if (
      this._isAlive &&
      this._energy < NEEDS.EXHAUSTION_ENERGY_THRESHOLD &&
      this._health < NEEDS.EXHAUSTION_HEALTH_THRESHOLD
    ) {
      this.adjustNeeds({ health: -NEEDS.EXHAUSTION_HEALTH_DECAY });
      ctx.logger?.agentLog(
        LogLevel.WARN,
        LogCategory.NEEDS,
        this.id,
        "Exhausted and starving",
        { health: this._health, energy: this._energy },
      );
    }
    if (this._health <= 0) this.die();
  }

  private die(): void {
    this._isAlive = false;
    this.currentPlan = [];
  }

  private record(
    ctx: VillagerDayContext,
    plan: ActionPlan,
    result: HandlerExecutionResult,
  ): ActionOutcome {
    ctx.logger?.agentLog(
      LogLevel.DEBUG,
      LogCategory.AI,
      this.id,
      `${plan.type}: ${result.message ?? (result.success ? "ok" : "failed")}`,
      { completed: result.completed, success: result.success },
    );
    return { plan, result };
  }
}
