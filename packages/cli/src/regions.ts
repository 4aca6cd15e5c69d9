import regionData from "./data/regions.json";
import { countryFlag } from "./render";

interface RegionInfo {
  location: string;
  country: string;
}

const REGIONS: Record<string, RegionInfo | undefined> = regionData;

export function regionInfo(region: string): RegionInfo | null {
  return REGIONS[region] ?? null;
}

/** "europe-west1  🇧🇪 St. Ghislain" for known regions, the bare name otherwise. */
export function regionLabel(region: string): string {
  const info = regionInfo(region);
  if (!info) return region;
  return `${region.padEnd(24)} ${countryFlag(info.country)} ${info.location}`;
}

/** "us-central1-b | Zone B" */
export function zoneLabel(zone: string): string {
  const letter = zone.split("-").pop() ?? "";
  return `${zone} | Zone ${letter.toUpperCase()}`;
}
