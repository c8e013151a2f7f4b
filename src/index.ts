export {
  Client,
  MAX_BATCH_SIZE,
  MANUFACTURERS_PAGE_SIZE,
  PARTS_PAGE_SIZE,
  parseVinBatch,
} from "./lib/client";
export type {
  AllManufacturersOptions,
  CanadianVehicleSpecificationsOptions,
  ClientOptions,
  DecodeVinOptions,
  EquipmentPlantCodesOptions,
  ModelsForMakeOptions,
  PartsOptions,
  WmisForManufacturerOptions,
} from "./lib/client";
export { TypedClient } from "./lib/typed-client";
export type { TypedClientOptions } from "./lib/typed-client";
export {
  InternalError,
  InvalidParameters,
  InvalidRequest,
  MappingError,
  MethodNotFound,
  ServiceUnavailable,
  TooManyRequests,
  TransportError,
  ValidationError,
  VpicError,
  errorFromResponse,
} from "./lib/errors";
export { normalizeNames, normalizeRecord, aliasTable } from "./lib/normalization";
export { ALIAS_SCOPES, FIELD_ALIASES } from "./lib/normalization-maps";
export type { AliasScope, FieldAliasTable } from "./lib/normalization-maps";
export {
  BATCH_DECODE_SHAPE,
  LIST_SHAPE,
  VARIABLE_VALUE_SHAPE,
  unifyResponse,
} from "./lib/shapes";
export type { ListShape, PairShape, ResponseShape } from "./lib/shapes";
export { RecordReader, toBool, toInt, toText } from "./lib/coercion";
export { HttpTransport } from "./lib/transport/http-transport";
export type { TransportOptions, VpicTransport } from "./lib/transport/types";
export { EquipmentType, ReportType } from "./lib/types";
export type {
  CanadianUnits,
  CfrPart,
  Document,
  Make,
  Manufacturer,
  ManufacturerDetail,
  ManufacturerVehicleType,
  Model,
  PlantCode,
  QueryParams,
  QueryValue,
  UnknownFieldPolicy,
  Variable,
  VariableValue,
  Vehicle,
  VehicleType,
  VpicRecord,
  WorldManufacturerIndex,
} from "./lib/types";
export { VERSION } from "./lib/version";
