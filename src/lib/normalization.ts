import type { VpicRecord } from "./types";
import { FIELD_ALIASES, type AliasScope, type FieldAliasTable } from "./normalization-maps";

export function isRecord(value: unknown): value is VpicRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Write a field as an own property. Plain assignment would treat a
 * "__proto__" key from JSON as the prototype setter and lose it.
 */
export function setField(record: VpicRecord, key: string, value: unknown): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function aliasTable(scope: AliasScope): FieldAliasTable {
  return FIELD_ALIASES[scope];
}

function lookupAlias(table: FieldAliasTable, key: string): string | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Rename the keys of one record to their canonical spelling. Values are
 * untouched apart from nested records, whose keys are renamed the same way.
 *
 * Keys that are not in the table keep their spelling and claim their slot
 * first. An aliased key whose canonical name is already taken keeps its
 * original spelling, so no value is ever dropped and a second pass changes
 * nothing.
 */
export function normalizeRecord(record: VpicRecord, scope: AliasScope): VpicRecord {
  const table = aliasTable(scope);
  const claimed = new Set(
    Object.keys(record).filter((key) => lookupAlias(table, key) === undefined)
  );

  const normalized: VpicRecord = {};
  for (const [key, value] of Object.entries(record)) {
    let target = key;
    const alias = lookupAlias(table, key);
    if (alias !== undefined && !claimed.has(alias)) {
      target = alias;
      claimed.add(alias);
    }
    setField(normalized, target, normalizeValue(value, scope));
  }
  return normalized;
}

function normalizeValue(value: unknown, scope: AliasScope): unknown {
  if (Array.isArray(value)) return value.map((item) => normalizeValue(item, scope));
  if (isRecord(value)) return normalizeRecord(value, scope);
  return value;
}

export function normalizeNames(records: VpicRecord[], scope: AliasScope): VpicRecord[] {
  return records.map((record) => normalizeRecord(record, scope));
}
