import { config } from "./config";
import { MappingError, ValidationError } from "./errors";
import { normalizeNames } from "./normalization";
import type { AliasScope } from "./normalization-maps";
import {
  BATCH_DECODE_SHAPE,
  LIST_SHAPE,
  VARIABLE_VALUE_SHAPE,
  unifyResponse,
  type ResponseShape,
} from "./shapes";
import { HttpTransport } from "./transport/http-transport";
import type { TransportOptions, VpicTransport } from "./transport/types";
import {
  ReportType,
  type CanadianUnits,
  type CfrPart,
  type EquipmentType,
  type QueryParams,
  type VpicRecord,
} from "./types";

export const MAX_BATCH_SIZE = 50;
export const MANUFACTURERS_PAGE_SIZE = 100;
export const PARTS_PAGE_SIZE = 1000;

const MIN_MODEL_YEAR = 1981;
const MIN_PLANT_CODE_YEAR = 2016;
const MIN_CANADIAN_SPEC_YEAR = 1971;

export interface ClientOptions extends TransportOptions {
  /** Rewrite vPIC's field names to their canonical spelling (default true) */
  standardizeNames?: boolean;
  /** Send requests through this transport instead of the default HttpTransport */
  transport?: VpicTransport;
}

export interface DecodeVinOptions {
  modelYear?: number;
  /** Include the extra NCSA variables */
  extend?: boolean;
  /**
   * Use the key/value endpoint (default). With `false` the Variable/Value
   * endpoint is called and its pairs are pivoted into the same flat record.
   */
  flatten?: boolean;
}

export interface WmisForManufacturerOptions {
  manufacturer?: string | number;
  vehicleType?: string | number;
}

export interface PartsOptions {
  cfrPart: CfrPart;
  fromDate: string;
  toDate: string;
  page?: number;
}

export interface AllManufacturersOptions {
  manufacturerType?: string;
  page?: number;
}

export interface EquipmentPlantCodesOptions {
  year: number;
  equipmentType: EquipmentType;
  reportType?: ReportType;
}

export interface ModelsForMakeOptions {
  modelYear?: number;
  vehicleType?: string;
}

export interface CanadianVehicleSpecificationsOptions {
  year: number;
  make: string;
  model?: string;
  /** Default "Metric" */
  units?: CanadianUnits;
}

interface RequestOptions {
  params?: QueryParams;
  form?: Record<string, string>;
  shape?: ResponseShape;
  scope: AliasScope;
}

function segment(value: string | number): string {
  return encodeURIComponent(String(value).trim());
}

function requireValue(value: string | number | undefined, field: string): string | number {
  if (value === undefined || (typeof value === "string" && value.trim() === "")) {
    throw new ValidationError(`${field} is required`, field);
  }
  return value;
}

function checkVin(vin: string, field = "vin"): string {
  const trimmed = vin.trim();
  if (trimmed === "") throw new ValidationError(`${field} is required`, field);
  if (trimmed.length < 6 || trimmed.length > 17) {
    throw new ValidationError(
      `${field} must be 6 to 17 characters, use * for unknown characters (got "${trimmed}")`,
      field
    );
  }
  return trimmed;
}

function checkPage(page: number): number {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError(`page must be a positive integer (got ${page})`, "page");
  }
  return page;
}

const BATCH_SEPARATOR = /[;\r\n]+/;

/**
 * Split a batch into "VIN" or "VIN,modelYear" entries. Semicolons and newlines
 * separate entries, in a single string and inside list items alike.
 */
export function parseVinBatch(vins: string | readonly string[]): string[] {
  const items: readonly string[] = typeof vins === "string" ? [vins] : vins;
  const entries = items
    .flatMap((item) => item.split(BATCH_SEPARATOR))
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");

  if (entries.length === 0) {
    throw new ValidationError("pass at least one VIN", "vins");
  }
  if (entries.length > MAX_BATCH_SIZE) {
    throw new ValidationError(
      `pass at most ${MAX_BATCH_SIZE} VINs per batch (got ${entries.length})`,
      "vins"
    );
  }

  return entries.map((entry) => {
    const [vin, year, ...rest] = entry.split(",").map((part) => part.trim());
    if (rest.length > 0) {
      throw new ValidationError(`batch entry must be "VIN" or "VIN,modelYear" (got "${entry}")`, "vins");
    }
    const checkedVin = checkVin(vin, "vins");
    if (year === undefined || year === "") return checkedVin;
    if (!/^\d{4}$/.test(year)) {
      throw new ValidationError(`model year in batch entry "${entry}" must be a year`, "vins");
    }
    return `${checkedVin},${year}`;
  });
}

/**
 * Client for the vPIC vehicle API that returns plain records.
 *
 * vPIC names the same variable differently from endpoint to endpoint
 * ("Make_Name", "MakeName", "Make"). By default the client rewrites those
 * names to one canonical spelling; pass `standardizeNames: false` to get
 * vPIC's own names back. Fields the alias tables don't know are returned
 * under their vPIC name either way.
 */
export class Client {
  readonly standardizeNames: boolean;
  private readonly transport: VpicTransport;

  constructor(options: ClientOptions = {}) {
    this.standardizeNames = options.standardizeNames ?? config.standardizeNames;
    this.transport = options.transport ?? new HttpTransport(options);
  }

  private async request(path: string, options: RequestOptions): Promise<VpicRecord[]> {
    const params: QueryParams = { ...options.params, format: "json" };
    const payload = options.form
      ? await this.transport.post(path, options.form, params)
      : await this.transport.get(path, params);

    const records = unifyResponse(payload, options.shape ?? LIST_SHAPE);
    return this.standardizeNames ? normalizeNames(records, options.scope) : records;
  }

  private async requestOne(path: string, options: RequestOptions): Promise<VpicRecord> {
    const [first] = await this.request(path, options);
    if (!first) {
      throw new MappingError(`vPIC returned no results for ${path}`, null);
    }
    return first;
  }

  /**
   * Decode a full or partial VIN. Partial VINs use * for unknown characters
   * and need not include the check digit.
   */
  async decodeVin(vin: string, options: DecodeVinOptions = {}): Promise<VpicRecord> {
    const { modelYear, extend = false, flatten = true } = options;
    const checkedVin = checkVin(vin);
    if (modelYear !== undefined && (!Number.isInteger(modelYear) || modelYear < MIN_MODEL_YEAR)) {
      throw new ValidationError(`model year must be ${MIN_MODEL_YEAR} or later`, "modelYear");
    }

    let endpoint = flatten ? "DecodeVinValues" : "DecodeVin";
    if (extend) endpoint = `${endpoint}Extended`;

    return this.requestOne(`${endpoint}/${segment(checkedVin)}`, {
      params: { modelyear: modelYear },
      shape: flatten ? LIST_SHAPE : VARIABLE_VALUE_SHAPE,
      scope: "decode",
    });
  }

  /**
   * Decode up to 50 VINs in one request. Each entry is "VIN" or
   * "VIN,modelYear"; results come back in the order submitted.
   */
  async decodeVinBatch(vins: string | readonly string[]): Promise<VpicRecord[]> {
    const entries = parseVinBatch(vins);
    return this.request("DecodeVINValuesBatch", {
      form: { DATA: entries.join(";") },
      shape: BATCH_DECODE_SHAPE,
      scope: "decode",
    });
  }

  /** Look up a World Manufacturer Identifier (3 or 6 characters) */
  async decodeWmi(wmi: string): Promise<VpicRecord> {
    const trimmed = wmi.trim();
    if (trimmed.length !== 3 && trimmed.length !== 6) {
      throw new ValidationError(`WMI must be 3 or 6 characters (got "${trimmed}")`, "wmi");
    }
    return this.requestOne(`DecodeWMI/${segment(trimmed)}`, { scope: "wmi" });
  }

  async getWmisForManufacturer(options: WmisForManufacturerOptions): Promise<VpicRecord[]> {
    const manufacturer = String(options.manufacturer ?? "").trim();
    const vehicleType = String(options.vehicleType ?? "").trim();
    if (manufacturer === "" && vehicleType === "") {
      throw new ValidationError("manufacturer or vehicleType is required", "manufacturer");
    }

    const path = manufacturer
      ? `GetWMIsForManufacturer/${segment(manufacturer)}`
      : "GetWMIsForManufacturer";
    return this.request(path, {
      params: { vehicleType: vehicleType || undefined },
      scope: "wmi",
    });
  }

  async getAllMakes(): Promise<VpicRecord[]> {
    return this.request("GetAllMakes", { scope: "make" });
  }

  /**
   * Part 565/566 documents submitted between two dates, up to 1000 per page.
   */
  async getParts(options: PartsOptions): Promise<VpicRecord[]> {
    const { cfrPart, fromDate, toDate, page = 1 } = options;
    if (cfrPart !== "565" && cfrPart !== "566") {
      throw new ValidationError(`cfrPart must be "565" or "566"`, "cfrPart");
    }
    return this.request("GetParts", {
      params: {
        type: cfrPart,
        fromDate: String(requireValue(fromDate, "fromDate")),
        toDate: String(requireValue(toDate, "toDate")),
        page: checkPage(page),
      },
      scope: "document",
    });
  }

  /** Yields one page of documents per step; stops at the first short page. */
  async *iterateParts(options: PartsOptions): AsyncGenerator<VpicRecord[], void, undefined> {
    for (let page = options.page ?? 1; ; page++) {
      const records = await this.getParts({ ...options, page });
      if (records.length === 0) return;
      yield records;
      if (records.length < PARTS_PAGE_SIZE) return;
    }
  }

  async getAllManufacturers(options: AllManufacturersOptions = {}): Promise<VpicRecord[]> {
    const { manufacturerType, page = 1 } = options;
    return this.request("GetAllManufacturers", {
      params: { ManufacturerType: manufacturerType, page: checkPage(page) },
      scope: "manufacturer",
    });
  }

  /** Yields one page of manufacturers per step; stops at the first short page. */
  async *iterateAllManufacturers(
    options: AllManufacturersOptions = {}
  ): AsyncGenerator<VpicRecord[], void, undefined> {
    for (let page = options.page ?? 1; ; page++) {
      const records = await this.getAllManufacturers({ ...options, page });
      if (records.length === 0) return;
      yield records;
      if (records.length < MANUFACTURERS_PAGE_SIZE) return;
    }
  }

  /**
   * Details for a manufacturer id, a full name, or every manufacturer whose
   * name contains a partial name.
   */
  async getManufacturerDetails(manufacturer: string | number): Promise<VpicRecord[]> {
    const value = requireValue(manufacturer, "manufacturer");
    return this.request(`GetManufacturerDetails/${segment(value)}`, { scope: "manufacturer" });
  }

  async getMakesForManufacturer(
    manufacturer: string | number,
    modelYear?: number
  ): Promise<VpicRecord[]> {
    const value = requireValue(manufacturer, "manufacturer");
    if (modelYear !== undefined) {
      return this.request(`GetMakesForManufacturerAndYear/${segment(value)}`, {
        params: { year: modelYear },
        scope: "make",
      });
    }
    return this.request(`GetMakeForManufacturer/${segment(value)}`, { scope: "make" });
  }

  /** Matching on a partial vehicle type ("Passenger") is a substring match */
  async getMakesForVehicleType(vehicleType: string): Promise<VpicRecord[]> {
    const value = requireValue(vehicleType, "vehicleType");
    return this.request(`GetMakesForVehicleType/${segment(value)}`, { scope: "make" });
  }

  /** A numeric make is a MakeId; a string is a full or partial make name. */
  async getVehicleTypesForMake(make: string | number): Promise<VpicRecord[]> {
    const value = requireValue(make, "make");
    const path =
      typeof value === "number"
        ? `GetVehicleTypesForMakeId/${segment(value)}`
        : `GetVehicleTypesForMake/${segment(value)}`;
    return this.request(path, { scope: "vehicle-type" });
  }

  /** Plants with a DOT code that make tires, brake hoses, glazing or retreads */
  async getEquipmentPlantCodes(options: EquipmentPlantCodesOptions): Promise<VpicRecord[]> {
    const { year, equipmentType, reportType = ReportType.ALL } = options;
    if (!Number.isInteger(year) || year < MIN_PLANT_CODE_YEAR) {
      throw new ValidationError(`year must be ${MIN_PLANT_CODE_YEAR} or later`, "year");
    }
    return this.request("GetEquipmentPlantCodes", {
      params: { year, equipmentType, reportType },
      scope: "plant",
    });
  }

  async getModelsForMake(
    make: string | number,
    options: ModelsForMakeOptions = {}
  ): Promise<VpicRecord[]> {
    const value = requireValue(make, "make");
    const { modelYear, vehicleType } = options;
    const byId = typeof value === "number";

    let path: string;
    if (modelYear !== undefined || vehicleType) {
      const year = modelYear !== undefined ? `/modelyear/${segment(modelYear)}` : "";
      const type = vehicleType ? `/vehicletype/${segment(vehicleType)}` : "";
      path = byId
        ? `GetModelsForMakeIdYear/makeId/${segment(value)}${year}${type}`
        : `GetModelsForMakeYear/make/${segment(value)}${year}${type}`;
    } else {
      path = byId ? `GetModelsForMakeId/${segment(value)}` : `GetModelsForMake/${segment(value)}`;
    }
    return this.request(path, { scope: "model" });
  }

  async getVehicleVariableList(): Promise<VpicRecord[]> {
    return this.request("GetVehicleVariableList", { scope: "variable" });
  }

  /** Accepts a variable name ("Battery Type") or its numeric id */
  async getVehicleVariableValuesList(variable: string | number): Promise<VpicRecord[]> {
    const value = requireValue(variable, "variable");
    return this.request(`GetVehicleVariableValuesList/${segment(value)}`, {
      scope: "variable-value",
    });
  }

  /**
   * Original vehicle dimensions from Transport Canada's Canadian Vehicle
   * Specifications, matched on year, make and optionally model.
   */
  async getCanadianVehicleSpecifications(
    options: CanadianVehicleSpecificationsOptions
  ): Promise<VpicRecord[]> {
    const { year, make, model, units = "Metric" } = options;
    if (!Number.isInteger(year) || year < MIN_CANADIAN_SPEC_YEAR) {
      throw new ValidationError(`year must be ${MIN_CANADIAN_SPEC_YEAR} or later`, "year");
    }
    if (units !== "Metric" && units !== "US") {
      throw new ValidationError(`units must be "Metric" or "US"`, "units");
    }
    return this.request("GetCanadianVehicleSpecifications", {
      params: {
        Year: year,
        Make: String(requireValue(make, "make")).trim(),
        Model: model?.trim() || undefined,
        units,
      },
      scope: "canadian-specs",
    });
  }
}
