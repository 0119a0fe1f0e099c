import { injectable, inject, optional } from "inversify";
import { TYPES } from "../../../../config/Types";
import { ItemId } from "../../../../shared/constants/ItemEnums";
import { CropType } from "../../../../shared/constants/ResourceEnums";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import { SIMULATION_CONSTANTS } from "../../../../shared/constants/SimulationConstants";
import {
  MigrationKind,
  Occupation,
  SkillName,
} from "../../../../shared/constants/VillageEnums";
import { TradeDirection } from "../../../../shared/constants/EconomyEnums";
import type { TradeRecord } from "../../../../shared/types/simulation/economy";
import type {
  DailyReport,
  MigrationEvent,
  VillageStats,
  VillagerActionRecord,
  VillagerSnapshot,
  WorldKnowledge,
} from "../../../../shared/types/simulation/village";
import { RandomSource } from "../../../../shared/utils/RandomUtils";
import { average, roundMoney } from "../../../../shared/utils/mathUtils";
import { Logger } from "../../../../infrastructure/utils/logger";
import { ItemCatalog } from "../../../data/ItemCatalog";
import {
  FOUNDER_OCCUPATIONS,
  MIGRANT_OCCUPATIONS,
  OCCUPATION_PROFILES,
} from "../../../data/OccupationCatalog";
import { DEFAULT_VENDORS, VENDOR_IDS } from "../../../data/VendorCatalog";
import { RandomNameProvider, type NameProvider } from "../../../data/NameProvider";
import { VillageEventType, type VillageEvents } from "../../core/events";
import { WeatherSystem } from "../core/WeatherSystem";
import { Forest } from "../world/Forest";
import { River } from "../world/River";
import { Field } from "../world/Field";
import { Tannery } from "../economy/Tannery";
import { Vendor } from "../economy/Vendor";
import { VillageStorage } from "../economy/VillageStorage";
import { ExternalMarket } from "../economy/ExternalMarket";
import { SiteRegistry } from "../agents/SiteRegistry";
import { Villager, type VillagerInit } from "../agents/Villager";
import { MigrationSystem, computeAttractiveness } from "./MigrationSystem";

const VILLAGE = SIMULATION_CONSTANTS.VILLAGE;
const FIELD_SIZES = VILLAGE.FIELD_SIZE_PER_FOREST_SQ_KM;

export interface VillageInitOptions {
  villageName?: string;
  villagerCount?: number;
  forestSizeSqKm?: number;
  riverName?: string;
  treasury?: number;
  /** Explicit founders; when given, no founders are generated */
  founders?: ReadonlyArray<Omit<VillagerInit, "id">>;
}

interface StorageContribution {
  occupation: Occupation;
  item: ItemId;
  threshold: number;
  share: number;
}

const STORAGE_CONTRIBUTIONS: readonly StorageContribution[] = [
  {
    occupation: Occupation.WOODCUTTER,
    item: ItemId.WOOD,
    threshold: VILLAGE.WOOD_CONTRIBUTION_THRESHOLD,
    share: VILLAGE.WOOD_CONTRIBUTION_SHARE,
  },
  {
    occupation: Occupation.FISHERMAN,
    item: ItemId.FISH,
    threshold: VILLAGE.FISH_CONTRIBUTION_THRESHOLD,
    share: VILLAGE.FISH_CONTRIBUTION_SHARE,
  },
  {
    occupation: Occupation.FORAGER,
    item: ItemId.BERRIES,
    threshold: VILLAGE.BERRY_CONTRIBUTION_THRESHOLD,
    share: VILLAGE.BERRY_CONTRIBUTION_SHARE,
  },
  {
    occupation: Occupation.FARMER,
    item: ItemId.WHEAT,
    threshold: VILLAGE.WHEAT_CONTRIBUTION_THRESHOLD,
    share: VILLAGE.WHEAT_CONTRIBUTION_SHARE,
  },
];

/**
 * Owns the population, the shared sites, the vendors and the village
 * purse, and advances all of them one day at a time.
 *
 * Tick order:
 * 1. Weather
 * 2. Sites, fields and vendors react to the new weather
 * 3. Every living villager runs its daily cycle, in arrival order
 * 4. The dead are removed
 * 5. Settlement: storage contributions, tannery sales, external trade
 * 6. Migration check
 * 7. Stats and report
 */
@injectable()
export class VillageManager {
  private readonly names: NameProvider;

  private villageName = "";
  private initialized = false;
  private day = 0;
  private treasury: number = VILLAGE.INITIAL_TREASURY;
  private nextVillagerNumber = 0;

  private villagers = new Map<string, Villager>();
  private sites = new SiteRegistry();
  private storage = new VillageStorage();
  private market = new ExternalMarket();
  private migration: MigrationSystem;
  private reports: DailyReport[] = [];

  constructor(
    @inject(TYPES.WeatherSystem) private readonly weather: WeatherSystem,
    @inject(TYPES.RandomSource) private readonly rng: RandomSource,
    @inject(TYPES.Logger) private readonly logger: Logger,
    @inject(TYPES.VillageEvents) private readonly events: VillageEvents,
    @inject(TYPES.NameProvider) @optional() names?: NameProvider,
  ) {
    this.names = names ?? new RandomNameProvider();
    this.migration = new MigrationSystem(rng);
  }

  /**
   * Builds the sites, the vendors and the founding population.
   * Calling it again starts a fresh village on the same weather.
   */
  public initializeVillage(options: VillageInitOptions = {}): void {
    const forestSize = options.forestSizeSqKm ?? 2;
    this.villageName = options.villageName ?? "Greendale";
    this.day = 0;
    this.treasury = options.treasury ?? VILLAGE.INITIAL_TREASURY;
    this.villagers = new Map();
    this.storage = new VillageStorage();
    this.market = new ExternalMarket();
    this.migration = new MigrationSystem(this.rng);
    this.reports = [];

    this.sites = new SiteRegistry({
      forest: new Forest(this.rng, {
        name: "The Old Wood",
        sizeSqKm: forestSize,
      }),
      river: new River(this.rng, {
        name: options.riverName ?? "Clearwater River",
        lengthKm: forestSize * 2,
        depthM: this.rng.floatRange(1, 5),
        flowRate: this.rng.floatRange(0.5, 2),
      }),
      tannery: new Tannery(this.rng, { name: "The Rusty Hide" }),
      fields: [
        new Field(this.rng, {
          name: "Hilltop Farm",
          sizeHa: forestSize * FIELD_SIZES.HILLTOP,
        }),
        new Field(this.rng, {
          name: "South Meadow",
          sizeHa: forestSize * FIELD_SIZES.SOUTH_MEADOW,
        }),
        new Field(this.rng, {
          name: "Seaside Pasture",
          sizeHa: forestSize * FIELD_SIZES.SEASIDE,
          crop: CropType.FRUITS,
        }),
      ],
      vendors: DEFAULT_VENDORS.map((definition) => new Vendor(definition)),
    });

    if (options.founders) {
      for (const founder of options.founders) this.addVillager(founder);
    } else {
      const count = options.villagerCount ?? 10;
      for (let i = 0; i < count; i++) this.addVillager(this.generateFounder());
    }

    this.initialized = true;
    this.logger.info(
      `Village ${this.villageName} initialized with ${this.villagers.size} villagers`,
      LogCategory.SIMULATION,
      { seed: this.rng.seed },
    );
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  public getDay(): number {
    return this.day;
  }

  public getVillageName(): string {
    return this.villageName;
  }

  public getTreasury(): number {
    return this.treasury;
  }

  public getSites(): SiteRegistry {
    return this.sites;
  }

  public getStorage(): VillageStorage {
    return this.storage;
  }

  public getMarket(): ExternalMarket {
    return this.market;
  }

  public getMigrationCooldown(): number {
    return this.migration.getCooldown();
  }

  public getVillagers(): VillagerSnapshot[] {
    return [...this.villagers.values()].map((v) => v.toSnapshot());
  }

  public getVillager(id: string): VillagerSnapshot | undefined {
    return this.villagers.get(id)?.toSnapshot();
  }

  public getVillagerEntity(id: string): Villager | undefined {
    return this.villagers.get(id);
  }

  public getRecentReports(limit: number = VILLAGE.REPORT_HISTORY_SIZE): DailyReport[] {
    if (limit <= 0) return [];
    return this.reports.slice(-limit);
  }

  public getWorldKnowledge(): WorldKnowledge {
    const marketPrices: Partial<Record<ItemId, number>> = {};
    for (const item of Object.values(ItemId)) {
      marketPrices[item] = this.market.getExportPrice(item);
    }
    return {
      vendors: this.sites.vendors.map((vendor) => vendor.toListing()),
      marketPrices,
      forestHealth: this.sites.forest?.getHealth(),
      huntableSpecies: this.sites.forest?.getHuntableSpecies() ?? [],
      riverFishAbundance: this.sites.river?.getFishAbundance() ?? {},
      fields: this.sites.fields.map((field) => field.toListing()),
    };
  }

  public getStats(): VillageStats {
    const living = [...this.villagers.values()];
    const averageHappiness = average(living.map((v) => v.happiness));
    const averageHealth = average(living.map((v) => v.health));
    return {
      day: this.day,
      population: living.length,
      averageHappiness,
      averageHealth,
      averageEnergy: average(living.map((v) => v.energy)),
      attractiveness: computeAttractiveness({
        population: living.length,
        averageHappiness,
        averageHealth,
        foodUnits: this.countFoodUnits(),
        treasury: this.treasury,
      }),
      treasury: this.treasury,
      foodStorage: this.storage.getFoodStorage(),
      resourceStorage: this.storage.getResourceStorage(),
      migrationCooldown: this.migration.getCooldown(),
    };
  }

  public simulateDailyTick(): DailyReport {
    if (!this.initialized) {
      throw new Error("Village must be initialized before simulating");
    }

    this.day++;
    this.logger.setTick(this.day);
    this.logger.info(`Simulating day ${this.day}`, LogCategory.SIMULATION);

    this.weather.advanceDay();
    const weather = this.weather.getSnapshot();
    this.events.queueEvent(VillageEventType.WEATHER_CHANGED, weather);

    this.updateSites(weather);

    const actions = this.runVillagers(weather);
    const deaths = this.removeDead();
    const trades = this.settle();
    const migration = this.handleMigration();

    const report: DailyReport = {
      day: this.day,
      weather,
      actions,
      deaths,
      trades,
      migration,
      stats: this.getStats(),
    };
    this.reports.push(report);
    if (this.reports.length > VILLAGE.REPORT_HISTORY_SIZE) {
      this.reports.shift();
    }

    this.logger.info(
      `Day ${this.day} done: population ${report.stats.population}, treasury ${report.stats.treasury}`,
      LogCategory.SIMULATION,
    );
    this.events.queueEvent(VillageEventType.DAY_COMPLETED, report);
    this.events.flushEvents();
    return report;
  }

  private updateSites(weather: DailyReport["weather"]): void {
    this.sites.forest?.updateDaily(weather);
    this.sites.river?.updateDaily(weather);
    for (const field of this.sites.fields) field.updateDaily(weather);
    for (const vendor of this.sites.vendors) vendor.updateDaily();

    const batches = this.sites.tannery?.updateDaily(weather) ?? [];
    for (const batch of batches) {
      this.logger.debug(
        `${this.sites.tannery?.name} made ${batch.quantity} ${batch.item}`,
        LogCategory.ECONOMY,
      );
    }
  }

  /**
   * World knowledge is rebuilt for each villager so plans see the vendor
   * stock and wildlife left by the villagers before them.
   */
  private runVillagers(weather: DailyReport["weather"]): VillagerActionRecord[] {
    const records: VillagerActionRecord[] = [];
    for (const villager of [...this.villagers.values()]) {
      if (!villager.isAlive) continue;
      const ctx = {
        world: this.getWorldKnowledge(),
        sites: this.sites,
        weather,
        rng: this.rng,
        logger: this.logger,
      };
      for (const { plan, result } of villager.dailyUpdateCycle(ctx)) {
        records.push({
          villagerId: villager.id,
          villagerName: villager.name,
          action: plan.type,
          success: result.success,
          message: result.message,
        });
      }
    }
    return records;
  }

  private removeDead(): string[] {
    const deaths: string[] = [];
    for (const villager of [...this.villagers.values()]) {
      if (villager.isAlive) continue;
      this.villagers.delete(villager.id);
      deaths.push(villager.name);
      this.logger.info(`${villager.name} has died`, LogCategory.LIFECYCLE, {
        villagerId: villager.id,
      });
      this.events.queueEvent(VillageEventType.VILLAGER_DIED, {
        villagerId: villager.id,
        name: villager.name,
        day: this.day,
      });
    }
    return deaths;
  }

  private settle(): TradeRecord[] {
    this.collectContributions();

    const tannery = this.sites.tannery;
    const forge = this.sites.getVendor(VENDOR_IDS.FORGE);
    if (tannery && forge) {
      const earned = tannery.sellManufacturedGoods(forge);
      if (earned > 0) {
        this.logger.info(
          `${tannery.name} sold goods to ${forge.shopName} for ${earned}`,
          LogCategory.ECONOMY,
        );
      }
    }

    this.queueAutomaticTrades();

    const result = this.market.settle(this.storage, this.treasury);
    this.treasury = result.treasury;
    for (const trade of result.trades) {
      this.logger.info(
        `${trade.direction} ${trade.quantity} ${trade.item} for ${trade.total}`,
        LogCategory.ECONOMY,
      );
      this.events.queueEvent(
        trade.direction === TradeDirection.EXPORT
          ? VillageEventType.TRADE_EXPORTED
          : VillageEventType.TRADE_IMPORTED,
        trade,
      );
    }
    for (const skipped of result.skipped) {
      this.logger.debug(
        `Skipped ${skipped.direction} of ${skipped.quantity} ${skipped.item}: ${skipped.reason}`,
        LogCategory.ECONOMY,
      );
    }
    return result.trades;
  }

  private collectContributions(): void {
    for (const villager of this.villagers.values()) {
      for (const rule of STORAGE_CONTRIBUTIONS) {
        if (villager.occupation !== rule.occupation) continue;
        const held = villager.getItemCount(rule.item);
        if (held <= rule.threshold) continue;

        const amount = Math.floor(held * rule.share);
        if (amount > 0 && villager.removeItem(rule.item, amount)) {
          this.storage.add(rule.item, amount);
          this.logger.debug(
            `${villager.name} contributed ${amount} ${rule.item} to storage`,
            LogCategory.ECONOMY,
          );
        }
      }
    }
  }

  private queueAutomaticTrades(): void {
    if (
      this.storage.get(ItemId.WOOD) > VILLAGE.WOOD_EXPORT_THRESHOLD &&
      !this.market.isExportQueued(ItemId.WOOD)
    ) {
      this.market.queueExport(ItemId.WOOD, VILLAGE.WOOD_EXPORT_BATCH);
    }

    if (
      this.storage.get(ItemId.BREAD) < VILLAGE.BREAD_IMPORT_THRESHOLD &&
      !this.market.isImportQueued(ItemId.BREAD)
    ) {
      const batches = Math.floor(this.villagers.size / 5) + 1;
      this.market.queueImport(
        ItemId.BREAD,
        VILLAGE.BREAD_IMPORT_PER_FIVE_VILLAGERS * batches,
      );
    }
  }

  private handleMigration(): MigrationEvent | undefined {
    const living = [...this.villagers.values()];
    const decision = this.migration.evaluateDay({
      population: living.length,
      averageHappiness: average(living.map((v) => v.happiness)),
      averageHealth: average(living.map((v) => v.health)),
      foodUnits: this.countFoodUnits(),
      treasury: this.treasury,
    });
    if (!decision) return undefined;

    const villagerIds: string[] = [];
    if (decision.kind === MigrationKind.IMMIGRATION) {
      for (let i = 0; i < decision.count; i++) {
        const villager = this.addVillager(this.generateMigrant());
        villagerIds.push(villager.id);
        this.events.queueEvent(VillageEventType.VILLAGER_ARRIVED, {
          villagerId: villager.id,
          name: villager.name,
          day: this.day,
          migration: true,
        });
      }
      this.logger.info(
        `${decision.count} villagers arrived (attractiveness ${decision.attractiveness.toFixed(2)})`,
        LogCategory.MIGRATION,
      );
    } else {
      for (const leaver of this.migration.selectEmigrants(living, decision.count)) {
        this.villagers.delete(leaver.id);
        villagerIds.push(leaver.id);
      }
      this.logger.warn(
        `${villagerIds.length} villagers left (attractiveness ${decision.attractiveness.toFixed(2)})`,
        LogCategory.MIGRATION,
      );
    }

    const event: MigrationEvent = {
      kind: decision.kind,
      day: this.day,
      villagerIds,
      attractiveness: decision.attractiveness,
    };
    if (event.kind === MigrationKind.EMIGRATION) {
      this.events.queueEvent(VillageEventType.VILLAGER_LEFT, event);
    }
    return event;
  }

  /**
   * Food in storage plus food held by villagers.
   */
  private countFoodUnits(): number {
    let total = this.storage.totalFood();
    for (const villager of this.villagers.values()) {
      for (const [item, quantity] of villager.getInventory()) {
        if (ItemCatalog.isFood(item)) total += quantity;
      }
    }
    return total;
  }

  private addVillager(init: Omit<VillagerInit, "id">): Villager {
    const villager = new Villager({
      ...init,
      id: `villager_${++this.nextVillagerNumber}`,
      access: init.access ?? OCCUPATION_PROFILES[init.occupation].access,
    });
    this.villagers.set(villager.id, villager);
    return villager;
  }

  private generateFounder(): Omit<VillagerInit, "id"> {
    const occupation = this.rng.elementOrThrow(FOUNDER_OCCUPATIONS);
    const skills: Partial<Record<SkillName, number>> = {};
    skills[OCCUPATION_PROFILES[occupation].skill] = this.rng.floatRange(0.5, 2);
    if (occupation === Occupation.HUNTER) {
      skills[SkillName.FORAGING] = this.rng.floatRange(0.2, 1);
    }
    if (occupation === Occupation.TANNER) {
      skills[SkillName.HUNTING] = this.rng.floatRange(0.2, 0.8);
    }
    return {
      name: this.names.nextName(this.rng),
      age: this.rng.intRange(18, 50),
      occupation,
      skills,
      money: roundMoney(this.rng.floatRange(10, 50)),
      health: this.rng.intRange(70, 100),
      happiness: this.rng.intRange(60, 90),
      energy: this.rng.intRange(80, 100),
    };
  }

  private generateMigrant(): Omit<VillagerInit, "id"> {
    const occupation = this.rng.elementOrThrow(MIGRANT_OCCUPATIONS);
    const skills: Partial<Record<SkillName, number>> = {};
    skills[OCCUPATION_PROFILES[occupation].skill] = this.rng.floatRange(0.1, 1);
    return {
      name: this.names.nextName(this.rng),
      age: this.rng.intRange(18, 40),
      occupation,
      skills,
      money: roundMoney(this.rng.floatRange(5, 20)),
      health: this.rng.intRange(60, 90),
      happiness: this.rng.intRange(50, 80),
      energy: this.rng.intRange(70, 100),
    };
  }
}
