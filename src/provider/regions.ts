import { ConfigurationError } from "../util/errors.js";

// Region codes are given without the "dd-" prefix the API hosts are keyed by
export const REGION_CODES = ["na", "eu", "au", "au-gov", "af", "ap", "latam", "canada"] as const;

export type RegionCode = (typeof REGION_CODES)[number];

const REGION_HOSTS: Record<`dd-${RegionCode}`, string> = {
  "dd-na": "api-na.dimensiondata.com",
  "dd-eu": "api-eu.dimensiondata.com",
  "dd-au": "api-au.dimensiondata.com",
  "dd-au-gov": "api-canberra.dimensiondata.com",
  "dd-af": "api-mea.dimensiondata.com",
  "dd-ap": "api-ap.dimensiondata.com",
  "dd-latam": "api-latam.dimensiondata.com",
  "dd-canada": "api-canada.dimensiondata.com",
};

function isRegionCode(region: string): region is RegionCode {
  return REGION_CODES.some((code) => code === region);
}

export function listRegions(): string[] {
  return [...REGION_CODES];
}

export function resolveRegionHost(region: string): string {
  if (!isRegionCode(region)) {
    throw new ConfigurationError(`Unknown region "${region}", expected one of: ${listRegions().join(", ")}`);
  }
  return REGION_HOSTS[`dd-${region}`];
}
