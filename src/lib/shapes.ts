import { z } from "zod";
import { MappingError } from "./errors";
import { isRecord, setField } from "./normalization";
import type { VpicRecord } from "./types";

// ===== Response shapes =====
// vPIC wraps every payload in { Count, Message, SearchCriteria, Results }.
// Results is either a list of flat records or a list of name/value pairs that
// has to be pivoted. Each endpoint declares which one it returns, so nothing
// past the client ever branches on shape.

export interface ListShape {
  kind: "list";
}

export interface PairShape {
  kind: "pairs";
  keyField: string;
  valueField: string;
  /** Partition pairs by this field and pivot each group separately */
  groupField?: string;
}

export type ResponseShape = ListShape | PairShape;

export const LIST_SHAPE: ListShape = { kind: "list" };

export const VARIABLE_VALUE_SHAPE: PairShape = {
  kind: "pairs",
  keyField: "Variable",
  valueField: "Value",
};

export const BATCH_DECODE_SHAPE: PairShape = {
  ...VARIABLE_VALUE_SHAPE,
  groupField: "BatchIndex",
};

const envelopeSchema = z.object({
  Count: z.number().optional(),
  Message: z.string().optional(),
  SearchCriteria: z.string().nullable().optional(),
  Results: z.array(z.unknown()),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export function parseEnvelope(payload: unknown): Envelope {
  const parsed = envelopeSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MappingError(`Unexpected vPIC response envelope${where}: ${issue.message}`, payload);
  }
  return parsed.data;
}

function toRecords(results: unknown[]): VpicRecord[] {
  return results.map((item) => {
    if (!isRecord(item)) {
      throw new MappingError("vPIC result is not an object", item);
    }
    return item;
  });
}

export function pivotPairs(pairs: VpicRecord[], shape: PairShape): VpicRecord {
  const flat: VpicRecord = {};
  for (const pair of pairs) {
    const name = pair[shape.keyField];
    if (typeof name !== "string" || name === "") {
      throw new MappingError(`Pair is missing its "${shape.keyField}" field`, pair);
    }
    setField(flat, name, pair[shape.valueField] ?? null);
  }
  return flat;
}

function groupIndex(value: unknown): string | null {
  if (typeof value === "number") return String(value);
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  return null;
}

export function partitionPairs(pairs: VpicRecord[], groupField: string): VpicRecord[][] {
  const groups = new Map<string, VpicRecord[]>();
  for (const pair of pairs) {
    const index = groupIndex(pair[groupField]);
    if (index === null) {
      throw new MappingError(`Pair is missing its "${groupField}" field`, pair);
    }
    const group = groups.get(index);
    if (group) {
      group.push(pair);
    } else {
      groups.set(index, [pair]);
    }
  }

  const keys = [...groups.keys()];
  // Batch indexes follow the order VINs were submitted in
  if (keys.every((key) => /^\d+$/.test(key))) {
    keys.sort((a, b) => Number(a) - Number(b));
  }
  return keys.map((key) => groups.get(key) ?? []);
}

/** Unwrap an envelope and return its results as flat records. */
export function unifyResponse(payload: unknown, shape: ResponseShape): VpicRecord[] {
  const records = toRecords(parseEnvelope(payload).Results);

  switch (shape.kind) {
    case "list":
      return records;
    case "pairs": {
      if (records.length === 0) return [];
      if (!shape.groupField) return [pivotPairs(records, shape)];

      // The batch endpoint may already answer with one flat row per VIN
      if (!records.some((record) => shape.keyField in record)) return records;

      return partitionPairs(records, shape.groupField).map((group) =>
        pivotPairs(group, shape)
      );
    }
  }
}
