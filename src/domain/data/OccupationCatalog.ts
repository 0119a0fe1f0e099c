import { ItemId } from "../../shared/constants/ItemEnums";
import { SiteKind } from "../../shared/constants/ResourceEnums";
import { Occupation, SkillName } from "../../shared/constants/VillageEnums";

export interface OccupationProfile {
  /** Skill trained by the occupation's work */
  skill: SkillName;
  /** What the occupation produces and sells when it piles up */
  primaryOutput?: ItemId;
  /** Sites a villager of this occupation is granted on arrival */
  access: readonly SiteKind[];
}

export const OCCUPATION_PROFILES: Record<Occupation, OccupationProfile> = {
  [Occupation.FARMER]: {
    skill: SkillName.FARMING,
    primaryOutput: ItemId.WHEAT,
    access: [SiteKind.FOREST, SiteKind.RIVER, SiteKind.FIELD],
  },
  [Occupation.WOODCUTTER]: {
    skill: SkillName.WOODCUTTING,
    primaryOutput: ItemId.WOOD,
    access: [SiteKind.FOREST, SiteKind.RIVER],
  },
  [Occupation.FISHERMAN]: {
    skill: SkillName.FISHING,
    primaryOutput: ItemId.FISH,
    access: [SiteKind.FOREST, SiteKind.RIVER],
  },
  [Occupation.FORAGER]: {
    skill: SkillName.FORAGING,
    primaryOutput: ItemId.BERRIES,
    access: [SiteKind.FOREST, SiteKind.RIVER],
  },
  [Occupation.HUNTER]: {
    skill: SkillName.HUNTING,
    primaryOutput: ItemId.SKIN,
    access: [SiteKind.FOREST, SiteKind.RIVER],
  },
  [Occupation.TANNER]: {
    skill: SkillName.TANNING,
    primaryOutput: ItemId.LEATHER,
    access: [SiteKind.FOREST, SiteKind.RIVER, SiteKind.TANNERY],
  },
  [Occupation.LABORER]: {
    skill: SkillName.LABOR,
    access: [SiteKind.FOREST, SiteKind.RIVER],
  },
};

/** Occupations drawn for the founding villagers. */
export const FOUNDER_OCCUPATIONS: readonly Occupation[] = [
  Occupation.FARMER,
  Occupation.WOODCUTTER,
  Occupation.FISHERMAN,
  Occupation.FORAGER,
  Occupation.HUNTER,
  Occupation.TANNER,
];

/** Occupations drawn for immigrants. */
export const MIGRANT_OCCUPATIONS: readonly Occupation[] = [
  Occupation.FARMER,
  Occupation.WOODCUTTER,
  Occupation.FISHERMAN,
  Occupation.FORAGER,
  Occupation.LABORER,
];
