import { describe, it, expect } from "vitest";
import { aliasTable, normalizeNames, normalizeRecord } from "../lib/normalization";
import { ALIAS_SCOPES } from "../lib/normalization-maps";

// =============================================================================
// normalizeRecord
// =============================================================================

describe("normalizeRecord", () => {
  it("renames make fields to their canonical spelling", () => {
    expect(normalizeRecord({ Make_ID: 440, Make_Name: "ASTON MARTIN" }, "make")).toEqual({
      MakeId: 440,
      Make: "ASTON MARTIN",
    });
  });

  it("renames model fields from the GetModelsForMake response", () => {
    expect(
      normalizeRecord(
        { Make_ID: 441, Make_Name: "TESLA", Model_ID: 1685, Model_Name: "Model S" },
        "model"
      )
    ).toEqual({ MakeId: 441, Make: "TESLA", ModelId: 1685, Model: "Model S" });
  });

  it("leaves unknown fields as they are", () => {
    expect(normalizeRecord({ Frobnicator: "on", Make_ID: 1 }, "make")).toEqual({
      Frobnicator: "on",
      MakeId: 1,
    });
  });

  it("resolves Name differently per scope", () => {
    expect(normalizeRecord({ Name: "Truck" }, "vehicle-type")).toEqual({ VehicleType: "Truck" });
    expect(normalizeRecord({ Name: "FORD" }, "wmi")).toEqual({ Manufacturer: "FORD" });
    expect(normalizeRecord({ Name: "Plant 7" }, "plant")).toEqual({ Name: "Plant 7" });
  });

  it("maps ID to Id everywhere except WMI lookups", () => {
    expect(normalizeRecord({ ID: 2, Name: "Battery Type" }, "variable")).toEqual({
      Id: 2,
      Name: "Battery Type",
    });
    expect(normalizeRecord({ ID: 976, Name: "FORD" }, "wmi")).toEqual({
      ManufacturerId: 976,
      Manufacturer: "FORD",
    });
  });

  it("maps DBAs on manufacturer records", () => {
    expect(normalizeRecord({ Mfr_ID: 955, DBAs: "Tesla Motors" }, "manufacturer")).toEqual({
      ManufacturerId: 955,
      Dbas: "Tesla Motors",
    });
  });

  it("maps DecodeVin display labels", () => {
    expect(
      normalizeRecord(
        { "Model Year": "2021", "Body Class": "Pickup", "Manufacturer Name": "FORD MOTOR COMPANY, USA" },
        "decode"
      )
    ).toEqual({ ModelYear: "2021", BodyClass: "Pickup", Manufacturer: "FORD MOTOR COMPANY, USA" });
  });

  it("keeps the original key when its canonical name is already present", () => {
    expect(normalizeRecord({ Make_Name: "TESLA", Make: "Tesla" }, "make")).toEqual({
      Make_Name: "TESLA",
      Make: "Tesla",
    });
  });

  it("keeps the second of two aliases for the same field under its own name", () => {
    expect(normalizeRecord({ Make_ID: 1, MakeID: 2 }, "decode")).toEqual({
      MakeId: 1,
      MakeID: 2,
    });
  });

  it("renames keys of nested records", () => {
    expect(
      normalizeRecord({ Mfr_ID: 955, Divisions: [{ Mfr_Name: "TESLA" }], Extra: { MfrId: 1 } }, "manufacturer")
    ).toEqual({
      ManufacturerId: 955,
      Divisions: [{ Manufacturer: "TESLA" }],
      Extra: { ManufacturerId: 1 },
    });
  });

  it("keeps a __proto__ key from JSON as an ordinary field", () => {
    const normalized = normalizeRecord(JSON.parse('{"__proto__":"x","Make_ID":1}'), "make");

    expect(Object.keys(normalized)).toEqual(["__proto__", "MakeId"]);
    expect(Object.getOwnPropertyDescriptor(normalized, "__proto__")?.value).toBe("x");
    expect(Object.getPrototypeOf(normalized)).toBe(Object.prototype);
  });

  it("does not modify its input", () => {
    const record = { Make_ID: 440, Make_Name: "ASTON MARTIN" };
    normalizeRecord(record, "make");
    expect(record).toEqual({ Make_ID: 440, Make_Name: "ASTON MARTIN" });
  });

  describe.each(ALIAS_SCOPES)("%s scope", (scope) => {
    const record = Object.fromEntries(
      Object.keys(aliasTable(scope)).map((key, index) => [key, index])
    );

    it("is idempotent", () => {
      const once = normalizeRecord(record, scope);
      expect(normalizeRecord(once, scope)).toEqual(once);
    });

    it("never drops a value", () => {
      const once = normalizeRecord(record, scope);
      expect(Object.values(once).sort()).toEqual(Object.values(record).sort());
    });
  });
});

// =============================================================================
// normalizeNames
// =============================================================================

describe("normalizeNames", () => {
  it("normalizes every record in order", () => {
    expect(
      normalizeNames([{ Make_ID: 440 }, { Make_ID: 441 }], "make")
    ).toEqual([{ MakeId: 440 }, { MakeId: 441 }]);
  });

  it("returns an empty list for no records", () => {
    expect(normalizeNames([], "make")).toEqual([]);
  });
});

describe("aliasTable", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(aliasTable("make"))).toBe(true);
  });
});
