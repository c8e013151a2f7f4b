import { MappingError } from "./errors";
import { isRecord } from "./normalization";
import type { VpicRecord } from "./types";

const INTEGER_RE = /^[+-]?\d+$/;

export function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  return "";
}

export function toInt(value: unknown): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!INTEGER_RE.test(trimmed)) return null;
  const parsed = parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function toBool(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return null;
  const lower = value.trim().toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  return null;
}

/**
 * Reads typed fields out of a normalized record and remembers which keys it
 * consumed, so the caller can tell which upstream fields no mapper knows.
 *
 * Optional fields never throw: text falls back to "", numbers and booleans to
 * null, lists to []. Only the `require*` readers raise, for the field that
 * identifies the record.
 */
export class RecordReader {
  private readonly consumed = new Set<string>();

  constructor(
    readonly record: VpicRecord,
    readonly kind: string
  ) {}

  private read(key: string): unknown {
    this.consumed.add(key);
    return this.record[key];
  }

  has(key: string): boolean {
    return Object.hasOwn(this.record, key);
  }

  text(key: string): string {
    return toText(this.read(key));
  }

  int(key: string): number | null {
    return toInt(this.read(key));
  }

  bool(key: string): boolean | null {
    return toBool(this.read(key));
  }

  array(key: string): unknown[] {
    const value = this.read(key);
    return Array.isArray(value) ? value : [];
  }

  list(key: string): VpicRecord[] {
    return this.array(key).filter(isRecord);
  }

  requireText(key: string): string {
    if (!this.has(key)) {
      throw new MappingError(`${this.kind} is missing required field "${key}"`, this.record);
    }
    return this.text(key);
  }

  requireInt(key: string): number {
    if (!this.has(key)) {
      throw new MappingError(`${this.kind} is missing required field "${key}"`, this.record);
    }
    const value = this.int(key);
    if (value === null) {
      throw new MappingError(
        `${this.kind} field "${key}" is not an integer: ${JSON.stringify(this.record[key])}`,
        this.record
      );
    }
    return value;
  }

  /** Keys present in the record that no reader call asked for */
  unknownKeys(): string[] {
    return Object.keys(this.record).filter((key) => !this.consumed.has(key));
  }
}
