import type { UnknownFieldPolicy } from "./types";

const UNKNOWN_FIELD_POLICIES: readonly UnknownFieldPolicy[] = ["exclude", "warn", "raise"];

// Bad values fall back to the default with a warning; loading the package
// never fails because of the environment.

function intFromEnv(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (!/^\s*\d+\s*$/.test(raw) || value < min) {
    console.warn(`[vpic] Ignoring ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function unknownFieldsFromEnv(): UnknownFieldPolicy {
  const raw = process.env.VPIC_UNKNOWN_FIELDS;
  if (!raw) return "exclude";
  const policy = UNKNOWN_FIELD_POLICIES.find((p) => p === raw.trim().toLowerCase());
  if (!policy) {
    console.warn(
      `[vpic] Ignoring VPIC_UNKNOWN_FIELDS="${raw}" (expected ${UNKNOWN_FIELD_POLICIES.join(", ")}), using exclude`
    );
    return "exclude";
  }
  return policy;
}

export const config = {
  baseUrl: process.env.VPIC_BASE_URL || "https://vpic.nhtsa.dot.gov/api/vehicles/",
  timeoutMs: intFromEnv("VPIC_TIMEOUT_MS", 15000, 1),
  retries: intFromEnv("VPIC_RETRIES", 2, 0),
  retryDelayMs: intFromEnv("VPIC_RETRY_DELAY_MS", 1000, 0),
  standardizeNames: process.env.VPIC_STANDARDIZE_NAMES !== "false",
  unknownFields: unknownFieldsFromEnv(),
};
