import type { ActionType } from "../../constants/AIEnums";
import type {
  CropType,
  FishSpecies,
  SiteKind,
  WildlifeSpecies,
} from "../../constants/ResourceEnums";
import type { MigrationKind, Occupation, SkillName } from "../../constants/VillageEnums";
import type { ItemStock, TradeRecord, VendorListing } from "./economy";
import type { WeatherSnapshot } from "./weather";

/**
 * What a villager can tell about a field from its edge.
 */
export interface FieldListing {
  name: string;
  /** Undefined while the field lies empty */
  crop?: CropType;
  growthStage: number;
  readyToHarvest: boolean;
}

/**
 * Read-only knowledge of the village shared with every villager when planning.
 */
export interface WorldKnowledge {
  vendors: readonly VendorListing[];
  /** What the outside market pays per item */
  marketPrices: ItemStock;
  forestHealth?: number;
  huntableSpecies: readonly WildlifeSpecies[];
  riverFishAbundance: Partial<Record<FishSpecies, number>>;
  fields: readonly FieldListing[];
}

export interface VillagerSnapshot {
  id: string;
  name: string;
  age: number;
  occupation: Occupation;
  health: number;
  happiness: number;
  energy: number;
  money: number;
  dailyEarnings: number;
  dailyExpenses: number;
  isAlive: boolean;
  skills: Partial<Record<SkillName, number>>;
  inventory: ItemStock;
  access: SiteKind[];
  lastAction?: ActionType;
}

export interface VillagerActionRecord {
  villagerId: string;
  villagerName: string;
  action: ActionType;
  success: boolean;
  message?: string;
}

export interface MigrationEvent {
  kind: MigrationKind;
  day: number;
  villagerIds: string[];
  attractiveness: number;
}

export interface VillageStats {
  day: number;
  population: number;
  averageHappiness: number;
  averageHealth: number;
  averageEnergy: number;
  attractiveness: number;
  treasury: number;
  foodStorage: ItemStock;
  resourceStorage: ItemStock;
  migrationCooldown: number;
}

export interface DailyReport {
  day: number;
  weather: WeatherSnapshot;
  actions: VillagerActionRecord[];
  deaths: string[];
  trades: TradeRecord[];
  migration?: MigrationEvent;
  stats: VillageStats;
}
