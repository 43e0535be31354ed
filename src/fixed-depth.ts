// Seismic Relocator - Fixed-depth directive
// Chooses whether the solver may solve for depth or must hold it constant.

import type { FixedDepthRegion } from "./config.js";
import { agencyID, hasFixedDepth, statusFlag } from "./origin-utils.js";
import type { FixedDepthDirective, Origin } from "./types.js";

export interface FixedDepthOptions {
  agencyID: string;
  regions: readonly FixedDepthRegion[];
  /** km, the default depth outside any configured region */
  defaultDepth: number;
}

export function regionFor(origin: Origin, regions: readonly FixedDepthRegion[]): FixedDepthRegion | undefined {
  return regions.find(
    (r) =>
      origin.latitude >= r.latMin &&
      origin.latitude <= r.latMax &&
      origin.longitude >= r.lonMin &&
      origin.longitude <= r.lonMax,
  );
}

/**
 * Precedence: region override, then the depth of a manual origin from our
 * own agency, then a fixed depth that already equals the regional default,
 * otherwise free depth. The last two only apply to origins with fixed depth.
 */
export function fixedDepthDirective(origin: Origin, options: FixedDepthOptions): FixedDepthDirective {
  const region = regionFor(origin, options.regions);
  if (region) {
    return { kind: "region", depth: region.depth };
  }

  if (hasFixedDepth(origin)) {
    if (agencyID(origin) === options.agencyID && statusFlag(origin) === "M") {
      return { kind: "trusted-manual", depth: origin.depth };
    }
    if (origin.depth === options.defaultDepth) {
      return { kind: "default-passthrough", depth: options.defaultDepth };
    }
  }

  return { kind: "free" };
}

export function directiveDepth(directive: FixedDepthDirective): number | null {
  return directive.kind === "free" ? null : directive.depth;
}
