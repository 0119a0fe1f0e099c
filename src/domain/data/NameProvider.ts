import type { RandomSource } from "../../shared/utils/RandomUtils";
import names from "./villagerNames.json";

/**
 * Source of villager names. Names need not be unique; villager ids are.
 */
export interface NameProvider {
  nextName(rng: RandomSource): string;
}

export class RandomNameProvider implements NameProvider {
  public nextName(rng: RandomSource): string {
    const first = rng.elementOrThrow(names.firstNames);
    const prefix = rng.elementOrThrow(names.surnamePrefixes);
    const suffix = rng.elementOrThrow(names.surnameSuffixes);
    return `${first} ${prefix}${suffix}`;
  }
}
