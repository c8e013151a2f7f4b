import decodeVariableLabels from "./data/decode-variable-labels.json";

// ===== Field Alias Maps =====
// vPIC spells the same variable differently from one endpoint to the next.
// Each endpoint family gets its own table so that a name like "Name" can mean
// a vehicle type in one response and a manufacturer in another.

export type AliasScope =
  | "decode"
  | "wmi"
  | "make"
  | "model"
  | "vehicle-type"
  | "manufacturer"
  | "plant"
  | "document"
  | "variable"
  | "variable-value"
  | "canadian-specs";

export type FieldAliasTable = Readonly<Record<string, string>>;

const COMMON_ALIASES: FieldAliasTable = {
  ID: "Id",
};

const MAKE_ALIASES: FieldAliasTable = {
  Make_ID: "MakeId",
  MakeID: "MakeId",
  Make_Name: "Make",
  MakeName: "Make",
};

const MANUFACTURER_ALIASES: FieldAliasTable = {
  Mfr_ID: "ManufacturerId",
  MfrId: "ManufacturerId",
  Mfr_Name: "Manufacturer",
  MfrName: "Manufacturer",
  ManufacturerName: "Manufacturer",
  Mfr_CommonName: "ManufacturerCommonName",
};

const VEHICLE_TYPE_ALIASES: FieldAliasTable = {
  VehicleTypeName: "VehicleType",
};

const SCOPE_ALIASES: Record<AliasScope, FieldAliasTable> = {
  decode: {
    ...MAKE_ALIASES,
    ModelID: "ModelId",
    GVWR: "GVWRFrom",
    GVWR_to: "GVWRTo",
    GCWR: "GCWRFrom",
    GCWR_to: "GCWRTo",
    // DecodeVin (unflattened) reports variables by their display label
    ...decodeVariableLabels,
  },

  wmi: {
    ...MAKE_ALIASES,
    ...MANUFACTURER_ALIASES,
    ...VEHICLE_TYPE_ALIASES,
    // GetWMIsForManufacturer names the manufacturer "Name" and its id "Id"
    Name: "Manufacturer",
    Id: "ManufacturerId",
    ID: "ManufacturerId",
  },

  make: {
    ...MAKE_ALIASES,
    ...MANUFACTURER_ALIASES,
    ...VEHICLE_TYPE_ALIASES,
  },

  model: {
    ...MAKE_ALIASES,
    ...VEHICLE_TYPE_ALIASES,
    Model_ID: "ModelId",
    ModelID: "ModelId",
    Model_Name: "Model",
    ModelName: "Model",
  },

  "vehicle-type": {
    ...MAKE_ALIASES,
    ...VEHICLE_TYPE_ALIASES,
    Name: "VehicleType",
  },

  manufacturer: {
    ...MANUFACTURER_ALIASES,
    DBAs: "Dbas",
  },

  plant: {},

  document: {
    ...MANUFACTURER_ALIASES,
  },

  variable: {},

  "variable-value": {},

  "canadian-specs": {},
};

function buildTable(scope: AliasScope): FieldAliasTable {
  return Object.freeze({ ...COMMON_ALIASES, ...SCOPE_ALIASES[scope] });
}

export const FIELD_ALIASES: Readonly<Record<AliasScope, FieldAliasTable>> = Object.freeze({
  decode: buildTable("decode"),
  wmi: buildTable("wmi"),
  make: buildTable("make"),
  model: buildTable("model"),
  "vehicle-type": buildTable("vehicle-type"),
  manufacturer: buildTable("manufacturer"),
  plant: buildTable("plant"),
  document: buildTable("document"),
  variable: buildTable("variable"),
  "variable-value": buildTable("variable-value"),
  "canadian-specs": buildTable("canadian-specs"),
});

export const ALIAS_SCOPES: readonly AliasScope[] = [
  "decode",
  "wmi",
  "make",
  "model",
  "vehicle-type",
  "manufacturer",
  "plant",
  "document",
  "variable",
  "variable-value",
  "canadian-specs",
];
