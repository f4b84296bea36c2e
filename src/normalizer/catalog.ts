import type { ServiceCatalog } from "../config/schema.js";
import { ownValue } from "../scope.js";
import type { Cloud } from "../types.js";

export const UNMAPPED_SERVICE = "Other";

export type ServiceMapping = {
  service: string;
  mapped: boolean;
};

/** Exact catalog match first, then case-insensitive; anything else is "Other". */
export function mapService(catalog: ServiceCatalog, cloud: Cloud, providerService: string): ServiceMapping {
  const entries = catalog[cloud];
  const exact = ownValue(entries, providerService);
  if (exact !== undefined) return { service: exact, mapped: true };

  const lowered = providerService.toLowerCase();
  const match = Object.keys(entries)
    .sort()
    .find((name) => name.toLowerCase() === lowered);
  const service = match === undefined ? undefined : ownValue(entries, match);
  if (service !== undefined) return { service, mapped: true };

  return { service: UNMAPPED_SERVICE, mapped: false };
}
