import { SiteKind } from "@/shared/constants/ResourceEnums";
import type { Forest } from "../world/Forest";
import type { River } from "../world/River";
import type { Field } from "../world/Field";
import type { Tannery } from "../economy/Tannery";
import type { Vendor } from "../economy/Vendor";

export interface SiteRegistryInit {
  forest?: Forest;
  river?: River;
  tannery?: Tannery;
  fields?: readonly Field[];
  vendors?: readonly Vendor[];
}

/**
 * Non-owning handles to the shared sites, lent to villagers for the
 * duration of a tick. The village manager owns the sites themselves.
 */
export class SiteRegistry {
  public readonly forest?: Forest;
  public readonly river?: River;
  public readonly tannery?: Tannery;
  public readonly fields: readonly Field[];
  public readonly vendors: readonly Vendor[];

  constructor(init: SiteRegistryInit = {}) {
    this.forest = init.forest;
    this.river = init.river;
    this.tannery = init.tannery;
    this.fields = init.fields ?? [];
    this.vendors = init.vendors ?? [];
  }

  public getVendor(id: string | undefined): Vendor | undefined {
    if (id === undefined) return undefined;
    return this.vendors.find((vendor) => vendor.id === id);
  }

  public getField(name: string | undefined): Field | undefined {
    if (name === undefined) return undefined;
    return this.fields.find((field) => field.name === name);
  }

  public has(kind: SiteKind): boolean {
    switch (kind) {
      case SiteKind.FOREST:
        return this.forest !== undefined;
      case SiteKind.RIVER:
        return this.river !== undefined;
      case SiteKind.TANNERY:
        return this.tannery !== undefined;
      case SiteKind.FIELD:
        return this.fields.length > 0;
    }
  }
}
