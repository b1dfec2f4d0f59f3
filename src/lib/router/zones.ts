/**
 * Default zone set for geosharded clusters: ISO 3166-1 alpha-2 codes.
 * Order matters; assignment is `zones[sequence % zones.length]`.
 */
export const DEFAULT_ZONES: readonly string[] = Object.freeze([
  "US",
  "CA",
  "GB",
  "DE",
  "FR",
  "IN",
  "JP",
  "CN",
  "BR",
  "AU",
  "SG",
  "NL",
  "SE",
  "CH",
  "IT",
  "ES",
  "MX",
  "KR",
  "ZA",
  "AE",
]);

export function parseZones(input: string): string[] {
  return input
    .split(",")
    .map((zone) => zone.trim())
    .filter((zone) => zone.length > 0);
}
