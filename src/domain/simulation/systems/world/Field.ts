import { ItemId } from "../../../../shared/constants/ItemEnums";
import { CropType, FieldTask } from "../../../../shared/constants/ResourceEnums";
import type { FieldListing } from "../../../../shared/types/simulation/village";
import type { WeatherSnapshot } from "../../../../shared/types/simulation/weather";
import { RandomSource } from "../../../../shared/utils/RandomUtils";
import { clamp, clamp01 } from "../../../../shared/utils/mathUtils";

export interface FieldOptions {
  name: string;
  sizeHa: number;
  /** Crop sown whenever the field lies empty */
  crop?: CropType;
  soilQuality?: number;
  soilMoisture?: number;
  /** A crop already standing when the field is created */
  sown?: { crop: CropType; growthStage: number };
}

export interface FieldHarvest {
  crop?: CropType;
  item?: ItemId;
  quantity: number;
}

export interface FieldWorkResult {
  task: FieldTask;
  crop: CropType;
  item?: ItemId;
  harvested: number;
  message: string;
}

export const FIELD_CONSTANTS = {
  KG_PER_HECTARE: 1000,
  /** Harvested kilograms per inventory unit */
  KG_PER_UNIT: 10,
  HARVEST_READY_STAGE: 0.9,
  DAILY_MOISTURE_LOSS: 0.05,
  /** Moisture added per level of precipitation (0-3) */
  RAIN_MOISTURE_PER_LEVEL: 0.1,
  DAILY_FERTILIZER_DECAY: 0.02,
  MAX_DAILY_PEST_GROWTH: 0.05,
  MAX_DAILY_WEED_GROWTH: 0.03,
  DRY_SOIL_THRESHOLD: 0.3,
  PEST_DAMAGE_THRESHOLD: 0.5,
  WEED_DAMAGE_THRESHOLD: 0.7,
  DRY_SOIL_DAMAGE: 0.05,
  PEST_DAMAGE: 0.03,
  WEED_DAMAGE: 0.02,
  /** No growth at or below this temperature */
  FROST_TEMPERATURE: 0,
  SOIL_DEPLETION_PER_HARVEST: 0.05,
  MIN_SOIL_QUALITY: 0.3,
  TEND_BASE_EFFECT: 0.2,
  TEND_EFFECT_PER_SKILL: 0.05,
  MAX_TEND_EFFECT: 0.6,
} as const;

interface CropProfile {
  /** Growth stage gained per day under ideal conditions */
  growthRate: number;
  yieldMultiplier: number;
  item: ItemId;
}

const CROP_PROFILES: Record<CropType, CropProfile> = {
  [CropType.WHEAT]: { growthRate: 0.04, yieldMultiplier: 3, item: ItemId.WHEAT },
  [CropType.FRUITS]: { growthRate: 0.03, yieldMultiplier: 2, item: ItemId.APPLE },
};

/**
 * Farmland tended by the village farmers. A crop grows a little each day
 * depending on soil, moisture, pests and weeds, and is harvested into
 * inventory units once it is ripe.
 *
 * Every level stays in [0, 1]. Soil quality never drops below
 * `MIN_SOIL_QUALITY`.
 */
export class Field {
  public readonly name: string;
  public readonly sizeHa: number;
  public readonly defaultCrop: CropType;

  private readonly rng: RandomSource;
  private soilQuality: number;
  private soilMoisture: number;
  private crop?: CropType;
  private growthStage = 0;
  private cropHealth = 1;
  private fertilizerLevel = 0;
  private pestLevel = 0;
  private weedLevel = 0;
  private totalYield = 0;

  constructor(rng: RandomSource, options: FieldOptions) {
    this.rng = rng;
    this.name = options.name;
    this.sizeHa = options.sizeHa;
    this.defaultCrop = options.crop ?? CropType.WHEAT;
    this.soilQuality = clamp01(options.soilQuality ?? 0.7);
    this.soilMoisture = clamp01(options.soilMoisture ?? 0.5);
    if (options.sown) {
      this.crop = options.sown.crop;
      this.growthStage = clamp01(options.sown.growthStage);
    }
  }

  public getCrop(): CropType | undefined {
    return this.crop;
  }

  public getGrowthStage(): number {
    return this.growthStage;
  }

  public getCropHealth(): number {
    return this.cropHealth;
  }

  public getSoilQuality(): number {
    return this.soilQuality;
  }

  public getSoilMoisture(): number {
    return this.soilMoisture;
  }

  public getPestLevel(): number {
    return this.pestLevel;
  }

  public getWeedLevel(): number {
    return this.weedLevel;
  }

  public getTotalYield(): number {
    return this.totalYield;
  }

  public isReadyToHarvest(): boolean {
    return (
      this.crop !== undefined &&
      this.growthStage >= FIELD_CONSTANTS.HARVEST_READY_STAGE
    );
  }

  /**
   * Sows a crop on an empty field. False when a crop is already standing.
   */
  public plantCrop(crop: CropType): boolean {
    if (this.crop !== undefined) return false;
    this.crop = crop;
    this.growthStage = 0;
    this.cropHealth = 1;
    return true;
  }

  public updateDaily(weather: WeatherSnapshot): void {
    this.soilMoisture = clamp01(
      this.soilMoisture +
        weather.precipitation * FIELD_CONSTANTS.RAIN_MOISTURE_PER_LEVEL,
    );
    if (this.crop === undefined || this.growthStage >= 1) return;

    if (weather.temperature > FIELD_CONSTANTS.FROST_TEMPERATURE) {
      const modifier =
        this.soilQuality *
        this.soilMoisture *
        this.cropHealth *
        (1 + this.fertilizerLevel * 0.3) *
        (1 - this.pestLevel * 0.5) *
        (1 - this.weedLevel * 0.3);
      this.growthStage = Math.min(
        1,
        this.growthStage + CROP_PROFILES[this.crop].growthRate * modifier,
      );
    }

    this.soilMoisture = Math.max(
      0,
      this.soilMoisture - FIELD_CONSTANTS.DAILY_MOISTURE_LOSS,
    );
    this.fertilizerLevel = Math.max(
      0,
      this.fertilizerLevel - FIELD_CONSTANTS.DAILY_FERTILIZER_DECAY,
    );
    this.pestLevel = Math.min(
      1,
      this.pestLevel + this.rng.floatRange(0, FIELD_CONSTANTS.MAX_DAILY_PEST_GROWTH),
    );
    this.weedLevel = Math.min(
      1,
      this.weedLevel + this.rng.floatRange(0, FIELD_CONSTANTS.MAX_DAILY_WEED_GROWTH),
    );

    let healthChange = 0;
    if (this.soilMoisture < FIELD_CONSTANTS.DRY_SOIL_THRESHOLD) {
      healthChange -= FIELD_CONSTANTS.DRY_SOIL_DAMAGE;
    }
    if (this.pestLevel > FIELD_CONSTANTS.PEST_DAMAGE_THRESHOLD) {
      healthChange -= FIELD_CONSTANTS.PEST_DAMAGE;
    }
    if (this.weedLevel > FIELD_CONSTANTS.WEED_DAMAGE_THRESHOLD) {
      healthChange -= FIELD_CONSTANTS.WEED_DAMAGE;
    }
    this.cropHealth = clamp01(this.cropHealth + healthChange);
  }

  public irrigate(amount: number): void {
    this.soilMoisture = clamp01(this.soilMoisture + Math.max(0, amount));
  }

  public applyFertilizer(amount: number): void {
    const applied = Math.max(0, amount);
    this.fertilizerLevel = clamp01(this.fertilizerLevel + applied);
    this.soilQuality = clamp01(this.soilQuality + applied * 0.1);
  }

  public controlPests(effectiveness: number): void {
    this.pestLevel = Math.max(0, this.pestLevel - Math.max(0, effectiveness));
  }

  public removeWeeds(effectiveness: number): void {
    this.weedLevel = Math.max(0, this.weedLevel - Math.max(0, effectiveness));
  }

  /**
   * Gathers a ripe crop and leaves the field empty. Nothing happens before
   * the crop is ripe.
   */
  public harvest(): FieldHarvest {
    const crop = this.crop;
    if (crop === undefined || !this.isReadyToHarvest()) {
      return { crop, quantity: 0 };
    }

    const profile = CROP_PROFILES[crop];
    const kilograms =
      this.sizeHa *
      FIELD_CONSTANTS.KG_PER_HECTARE *
      this.cropHealth *
      this.soilQuality *
      (1 + this.fertilizerLevel * 0.2) *
      Math.min(1, this.growthStage) *
      profile.yieldMultiplier;
    const quantity = Math.floor(kilograms / FIELD_CONSTANTS.KG_PER_UNIT);

    this.crop = undefined;
    this.growthStage = 0;
    this.cropHealth = 1;
    this.totalYield += quantity;
    this.soilQuality = Math.max(
      FIELD_CONSTANTS.MIN_SOIL_QUALITY,
      this.soilQuality - FIELD_CONSTANTS.SOIL_DEPLETION_PER_HARVEST,
    );

    return { crop, item: profile.item, quantity };
  }

  /**
   * One farmer's shift: sow an empty field, harvest a ripe one, otherwise
   * water it and clear pests and weeds.
   */
  public work(skill: number): FieldWorkResult {
    const standing = this.crop;
    if (standing === undefined) {
      this.plantCrop(this.defaultCrop);
      return {
        task: FieldTask.PLANT,
        crop: this.defaultCrop,
        harvested: 0,
        message: `Planted ${this.defaultCrop} in ${this.name}`,
      };
    }

    if (this.isReadyToHarvest()) {
      const { item, quantity } = this.harvest();
      return {
        task: FieldTask.HARVEST,
        crop: standing,
        item,
        harvested: quantity,
        message:
          quantity > 0
            ? `Harvested ${quantity} ${item} in ${this.name}`
            : `The ${standing} crop in ${this.name} failed`,
      };
    }

    const effect = clamp(
      FIELD_CONSTANTS.TEND_BASE_EFFECT + FIELD_CONSTANTS.TEND_EFFECT_PER_SKILL * skill,
      0,
      FIELD_CONSTANTS.MAX_TEND_EFFECT,
    );
    this.irrigate(effect);
    this.controlPests(effect);
    this.removeWeeds(effect);
    return {
      task: FieldTask.TEND,
      crop: standing,
      harvested: 0,
      message: `Tended the ${standing} in ${this.name}`,
    };
  }

  public toListing(): FieldListing {
    return {
      name: this.name,
      crop: this.crop,
      growthStage: this.growthStage,
      readyToHarvest: this.isReadyToHarvest(),
    };
  }
}
