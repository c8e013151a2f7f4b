import {
  Client,
  type AllManufacturersOptions,
  type ClientOptions,
  type DecodeVinOptions,
  type EquipmentPlantCodesOptions,
  type ModelsForMakeOptions,
  type PartsOptions,
  type WmisForManufacturerOptions,
} from "./client";
import { RecordReader } from "./coercion";
import { config } from "./config";
import { MappingError } from "./errors";
import {
  mapDocument,
  mapMake,
  mapManufacturer,
  mapManufacturerDetail,
  mapModel,
  mapPlantCode,
  mapVariable,
  mapVariableValue,
  mapVehicle,
  mapVehicleType,
  mapWorldManufacturerIndex,
} from "./mappers";
import type {
  Document,
  Make,
  Manufacturer,
  ManufacturerDetail,
  Model,
  PlantCode,
  UnknownFieldPolicy,
  Variable,
  VariableValue,
  Vehicle,
  VehicleType,
  VpicRecord,
  WorldManufacturerIndex,
} from "./types";

export interface TypedClientOptions extends Omit<ClientOptions, "standardizeNames"> {
  /**
   * What to do with fields vPIC returns that no domain object has an
   * attribute for: drop them ("exclude", default), log them ("warn"), or
   * throw a MappingError ("raise").
   */
  unknownFields?: UnknownFieldPolicy;
}

type Mapper<T> = (reader: RecordReader) => T;

/**
 * Client for the vPIC vehicle API that returns read-only domain objects
 * instead of records. Names are always standardized.
 */
export class TypedClient {
  readonly unknownFields: UnknownFieldPolicy;
  private readonly client: Client;

  constructor(options: TypedClientOptions = {}) {
    this.unknownFields = options.unknownFields ?? config.unknownFields;
    this.client = new Client({ ...options, standardizeNames: true });
  }

  private build<T extends object>(record: VpicRecord, kind: string, mapper: Mapper<T>): Readonly<T> {
    const reader = new RecordReader(record, kind);
    const built = mapper(reader);

    const unknown = reader.unknownKeys();
    if (unknown.length > 0 && this.unknownFields !== "exclude") {
      const message = `${kind} has fields with no attribute: ${unknown.join(", ")}`;
      if (this.unknownFields === "raise") throw new MappingError(message, record);
      console.warn(`[vpic] ${message}`);
    }
    return Object.freeze(built);
  }

  private buildAll<T extends object>(
    records: VpicRecord[],
    kind: string,
    mapper: Mapper<T>
  ): Readonly<T>[] {
    return records.map((record) => this.build(record, kind, mapper));
  }

  async decodeVin(vin: string, options: Omit<DecodeVinOptions, "flatten"> = {}): Promise<Vehicle> {
    return this.build(await this.client.decodeVin(vin, options), "Vehicle", mapVehicle);
  }

  async decodeVinBatch(vins: string | readonly string[]): Promise<Vehicle[]> {
    return this.buildAll(await this.client.decodeVinBatch(vins), "Vehicle", mapVehicle);
  }

  async decodeWmi(wmi: string): Promise<WorldManufacturerIndex> {
    return this.build(
      await this.client.decodeWmi(wmi),
      "WorldManufacturerIndex",
      mapWorldManufacturerIndex
    );
  }

  async getWmisForManufacturer(
    options: WmisForManufacturerOptions
  ): Promise<WorldManufacturerIndex[]> {
    return this.buildAll(
      await this.client.getWmisForManufacturer(options),
      "WorldManufacturerIndex",
      mapWorldManufacturerIndex
    );
  }

  async getAllMakes(): Promise<Make[]> {
    return this.buildAll(await this.client.getAllMakes(), "Make", mapMake);
  }

  async getParts(options: PartsOptions): Promise<Document[]> {
    return this.buildAll(await this.client.getParts(options), "Document", mapDocument);
  }

  async *iterateParts(options: PartsOptions): AsyncGenerator<Document[], void, undefined> {
    for await (const page of this.client.iterateParts(options)) {
      yield this.buildAll(page, "Document", mapDocument);
    }
  }

  async getAllManufacturers(options: AllManufacturersOptions = {}): Promise<Manufacturer[]> {
    return this.buildAll(
      await this.client.getAllManufacturers(options),
      "Manufacturer",
      mapManufacturer
    );
  }

  async *iterateAllManufacturers(
    options: AllManufacturersOptions = {}
  ): AsyncGenerator<Manufacturer[], void, undefined> {
    for await (const page of this.client.iterateAllManufacturers(options)) {
      yield this.buildAll(page, "Manufacturer", mapManufacturer);
    }
  }

  async getManufacturerDetails(manufacturer: string | number): Promise<ManufacturerDetail[]> {
    return this.buildAll(
      await this.client.getManufacturerDetails(manufacturer),
      "ManufacturerDetail",
      mapManufacturerDetail
    );
  }

  async getMakesForManufacturer(
    manufacturer: string | number,
    modelYear?: number
  ): Promise<Make[]> {
    return this.buildAll(
      await this.client.getMakesForManufacturer(manufacturer, modelYear),
      "Make",
      mapMake
    );
  }

  async getMakesForVehicleType(vehicleType: string): Promise<Make[]> {
    return this.buildAll(await this.client.getMakesForVehicleType(vehicleType), "Make", mapMake);
  }

  async getVehicleTypesForMake(make: string | number): Promise<VehicleType[]> {
    return this.buildAll(
      await this.client.getVehicleTypesForMake(make),
      "VehicleType",
      mapVehicleType
    );
  }

  async getEquipmentPlantCodes(options: EquipmentPlantCodesOptions): Promise<PlantCode[]> {
    return this.buildAll(
      await this.client.getEquipmentPlantCodes(options),
      "PlantCode",
      mapPlantCode
    );
  }

  async getModelsForMake(make: string | number, options: ModelsForMakeOptions = {}): Promise<Model[]> {
    return this.buildAll(await this.client.getModelsForMake(make, options), "Model", mapModel);
  }

  async getVehicleVariableList(): Promise<Variable[]> {
    return this.buildAll(await this.client.getVehicleVariableList(), "Variable", mapVariable);
  }

  async getVehicleVariableValuesList(variable: string | number): Promise<VariableValue[]> {
    return this.buildAll(
      await this.client.getVehicleVariableValuesList(variable),
      "VariableValue",
      mapVariableValue
    );
  }
}
