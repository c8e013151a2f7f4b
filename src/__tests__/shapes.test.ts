import { describe, it, expect } from "vitest";
import { MappingError } from "../lib/errors";
import {
  BATCH_DECODE_SHAPE,
  LIST_SHAPE,
  VARIABLE_VALUE_SHAPE,
  parseEnvelope,
  partitionPairs,
  unifyResponse,
} from "../lib/shapes";
import { envelope } from "./fake-transport";

describe("unifyResponse", () => {
  describe("list shape", () => {
    it("returns the results as they are", () => {
      const results = [{ Make_ID: 440 }, { Make_ID: 441 }];
      expect(unifyResponse(envelope(results), LIST_SHAPE)).toEqual(results);
    });

    it("returns an empty list for an empty result set", () => {
      expect(unifyResponse(envelope([]), LIST_SHAPE)).toEqual([]);
    });
  });

  describe("pair shape", () => {
    it("pivots Variable/Value pairs into one record", () => {
      const payload = envelope([
        { Variable: "Make", Value: "TESLA", VariableId: 26 },
        { Variable: "ModelYear", Value: "2021", VariableId: 29 },
      ]);
      expect(unifyResponse(payload, VARIABLE_VALUE_SHAPE)).toEqual([
        { Make: "TESLA", ModelYear: "2021" },
      ]);
    });

    it("turns a missing value into null", () => {
      const payload = envelope([{ Variable: "Trim" }]);
      expect(unifyResponse(payload, VARIABLE_VALUE_SHAPE)).toEqual([{ Trim: null }]);
    });

    it("keeps the last value of a repeated variable", () => {
      const payload = envelope([
        { Variable: "Make", Value: "FORD" },
        { Variable: "Make", Value: "LINCOLN" },
      ]);
      expect(unifyResponse(payload, VARIABLE_VALUE_SHAPE)).toEqual([{ Make: "LINCOLN" }]);
    });

    it("keeps a variable named __proto__", () => {
      const payload = envelope([
        { Variable: "__proto__", Value: "x" },
        { Variable: "Make", Value: "TESLA" },
      ]);
      const [record] = unifyResponse(payload, VARIABLE_VALUE_SHAPE);

      expect(Object.keys(record)).toEqual(["__proto__", "Make"]);
      expect(Object.getOwnPropertyDescriptor(record, "__proto__")?.value).toBe("x");
    });

    it("returns no records for no pairs", () => {
      expect(unifyResponse(envelope([]), VARIABLE_VALUE_SHAPE)).toEqual([]);
    });

    it("rejects a pair without a variable name", () => {
      const payload = envelope([{ Value: "TESLA" }]);
      expect(() => unifyResponse(payload, VARIABLE_VALUE_SHAPE)).toThrow(
        'Pair is missing its "Variable" field'
      );
    });
  });

  describe("grouped pair shape", () => {
    it("returns one record per batch index in submission order", () => {
      const payload = envelope([
        { BatchIndex: "1", Variable: "Make", Value: "TESLA" },
        { BatchIndex: "0", Variable: "Make", Value: "FORD" },
        { BatchIndex: "1", Variable: "ModelYear", Value: "2020" },
        { BatchIndex: "0", Variable: "ModelYear", Value: "2021" },
      ]);
      expect(unifyResponse(payload, BATCH_DECODE_SHAPE)).toEqual([
        { Make: "FORD", ModelYear: "2021" },
        { Make: "TESLA", ModelYear: "2020" },
      ]);
    });

    it("passes flat rows through unchanged", () => {
      const rows = [
        { VIN: "5YJSA1E2XMF000001", Make: "TESLA" },
        { VIN: "1FTMW1T88MFA00001", Make: "FORD" },
      ];
      expect(unifyResponse(envelope(rows), BATCH_DECODE_SHAPE)).toEqual(rows);
    });
  });

  it("rejects a result that is not an object", () => {
    expect(() => unifyResponse(envelope(["TESLA"]), LIST_SHAPE)).toThrow(
      "vPIC result is not an object"
    );
  });
});

describe("partitionPairs", () => {
  it("sorts numeric indexes numerically", () => {
    const pairs = [
      { BatchIndex: 10, Variable: "Make" },
      { BatchIndex: 2, Variable: "Make" },
    ];
    expect(partitionPairs(pairs, "BatchIndex")).toEqual([[pairs[1]], [pairs[0]]]);
  });

  it("keeps first-seen order for non-numeric indexes", () => {
    const pairs = [
      { BatchIndex: "b", Variable: "Make" },
      { BatchIndex: "a", Variable: "Make" },
    ];
    expect(partitionPairs(pairs, "BatchIndex")).toEqual([[pairs[0]], [pairs[1]]]);
  });

  it("rejects a pair without an index", () => {
    expect(() => partitionPairs([{ Variable: "Make" }], "BatchIndex")).toThrow(MappingError);
  });
});

describe("parseEnvelope", () => {
  it("accepts a payload with only Results", () => {
    expect(parseEnvelope({ Results: [] })).toEqual({ Results: [] });
  });

  it("rejects a payload without Results", () => {
    expect(() => parseEnvelope({ Count: 0 })).toThrow(MappingError);
    expect(() => parseEnvelope({ Count: 0 })).toThrow(/^Unexpected vPIC response envelope at Results: /);
  });

  it("rejects a payload that is not an object", () => {
    expect(() => parseEnvelope("<html>Service Unavailable</html>")).toThrow(
      /^Unexpected vPIC response envelope: /
    );
  });
});
