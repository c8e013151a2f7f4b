// ===== Records =====

/**
 * One flat result from vPIC after shape unification. Keys are canonical
 * names when the client standardizes them, vPIC's own spelling otherwise.
 */
export type VpicRecord = Record<string, unknown>;

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export type UnknownFieldPolicy = "exclude" | "warn" | "raise";

// ===== Enums =====

export enum EquipmentType {
  TIRES = 1,
  BRAKE_HOSES = 3,
  GLAZING = 13,
  RETREAD = 16,
}

export enum ReportType {
  NEW = "New",
  UPDATED = "Updated",
  CLOSED = "Closed",
  ALL = "All",
}

/** 49 CFR Part 565 (VIN guidance) or Part 566 (manufacturer identification) */
export type CfrPart = "565" | "566";

/** Units for Canadian Vehicle Specification dimensions */
export type CanadianUnits = "Metric" | "US";

// ===== Domain objects =====

export interface Make {
  readonly makeId: number;
  readonly make: string;
  readonly manufacturerId: number | null;
  readonly manufacturer: string;
  readonly vehicleTypeId: number | null;
  readonly vehicleType: string;
}

export interface Model {
  readonly modelId: number;
  readonly model: string;
  readonly makeId: number | null;
  readonly make: string;
  readonly vehicleTypeId: number | null;
  readonly vehicleType: string;
}

/** A vehicle type as listed inside a manufacturer record */
export interface ManufacturerVehicleType {
  readonly name: string;
  readonly isPrimary: boolean | null;
  readonly gvwrFrom: string;
  readonly gvwrTo: string;
}

export interface Manufacturer {
  readonly manufacturerId: number;
  readonly manufacturer: string;
  readonly manufacturerCommonName: string;
  readonly country: string;
  readonly vehicleTypes: readonly ManufacturerVehicleType[];
}

export interface ManufacturerDetail {
  readonly manufacturerId: number;
  readonly manufacturer: string;
  readonly manufacturerCommonName: string;
  readonly manufacturerTypes: readonly string[];
  readonly vehicleTypes: readonly ManufacturerVehicleType[];
  readonly equipmentItems: readonly string[];
  readonly address: string;
  readonly address2: string;
  readonly city: string;
  readonly stateProvince: string;
  readonly postalCode: string;
  readonly country: string;
  readonly contactEmail: string;
  readonly contactFax: string;
  readonly contactPhone: string;
  readonly dbas: string;
  readonly lastUpdated: string;
  readonly otherManufacturerDetails: string;
  readonly primaryProduct: string;
  readonly principalFirstName: string;
  readonly principalLastName: string;
  readonly principalPosition: string;
  readonly submittedName: string;
  readonly submittedOn: string;
  readonly submittedPosition: string;
}

export interface VehicleType {
  readonly vehicleTypeId: number | null;
  readonly vehicleType: string;
  readonly makeId: number | null;
  readonly make: string;
}

export interface PlantCode {
  readonly dotCode: string;
  readonly oldDotCode: string;
  readonly name: string;
  readonly address: string;
  readonly city: string;
  readonly stateProvince: string;
  readonly postalCode: string;
  readonly country: string;
  readonly status: string;
}

/** A Part 565/566 submission */
export interface Document {
  readonly name: string;
  readonly manufacturerId: number | null;
  readonly manufacturer: string;
  readonly letterDate: string;
  readonly coverLetterUrl: string;
  readonly url: string;
  readonly type: string;
  readonly modelYearFrom: number | null;
  readonly modelYearTo: number | null;
}

export interface Variable {
  readonly id: number;
  readonly name: string;
  readonly groupName: string;
  readonly dataType: string;
  readonly description: string;
}

export interface VariableValue {
  readonly id: number;
  readonly name: string;
  readonly elementName: string;
}

export interface WorldManufacturerIndex {
  readonly wmi: string;
  readonly manufacturerId: number | null;
  readonly manufacturer: string;
  readonly commonName: string;
  readonly parentCompanyName: string;
  readonly make: string;
  readonly vehicleType: string;
  readonly country: string;
  readonly url: string;
  readonly createdOn: string;
  readonly updatedOn: string;
  readonly dateAvailableToPublic: string;
}

/**
 * A decoded VIN. vPIC fills different subsets of these per vehicle type, so
 * every text attribute defaults to "".
 */
export interface Vehicle {
  readonly vin: string;
  readonly suggestedVin: string;
  readonly errorCode: string;
  readonly errorText: string;
  readonly additionalErrorText: string;
  readonly possibleValues: string;
  readonly vehicleDescriptor: string;

  readonly make: string;
  readonly makeId: number | null;
  readonly manufacturer: string;
  readonly manufacturerId: number | null;
  readonly model: string;
  readonly modelId: number | null;
  readonly modelYear: string;
  readonly series: string;
  readonly series2: string;
  readonly trim: string;
  readonly trim2: string;
  readonly vehicleType: string;
  readonly bodyClass: string;
  readonly bodyCabType: string;
  readonly doors: string;
  readonly windows: string;
  readonly seats: string;
  readonly seatRows: string;
  readonly basePrice: string;
  readonly destinationMarket: string;
  readonly note: string;
  readonly nonLandUse: string;
  readonly cashForClunkers: string;

  readonly plantCity: string;
  readonly plantState: string;
  readonly plantCountry: string;
  readonly plantCompanyName: string;

  readonly driveType: string;
  readonly axles: string;
  readonly axleConfiguration: string;
  readonly brakeSystemType: string;
  readonly brakeSystemDesc: string;
  readonly steeringLocation: string;
  readonly transmissionStyle: string;
  readonly transmissionSpeeds: string;
  readonly trackWidth: string;
  readonly wheelBaseType: string;
  readonly wheelBaseShort: string;
  readonly wheelBaseLong: string;
  readonly wheels: string;
  readonly wheelSizeFront: string;
  readonly wheelSizeRear: string;
  readonly curbWeightLb: string;
  readonly gvwrFrom: string;
  readonly gvwrTo: string;
  readonly gcwrFrom: string;
  readonly gcwrTo: string;
  readonly bedType: string;
  readonly bedLengthIn: string;
  readonly topSpeedMph: string;

  readonly engineConfiguration: string;
  readonly engineCylinders: string;
  readonly engineCycles: string;
  readonly engineHp: string;
  readonly engineHpTo: string;
  readonly engineKw: string;
  readonly engineManufacturer: string;
  readonly engineModel: string;
  readonly displacementCc: string;
  readonly displacementCi: string;
  readonly displacementL: string;
  readonly fuelTypePrimary: string;
  readonly fuelTypeSecondary: string;
  readonly fuelInjectionType: string;
  readonly valveTrainDesign: string;
  readonly coolingType: string;
  readonly turbo: string;
  readonly otherEngineInfo: string;

  readonly electrificationLevel: string;
  readonly evDriveUnit: string;
  readonly batteryType: string;
  readonly batteryInfo: string;
  readonly batteryA: string;
  readonly batteryATo: string;
  readonly batteryV: string;
  readonly batteryVTo: string;
  readonly batteryKwh: string;
  readonly batteryKwhTo: string;
  readonly batteryCells: string;
  readonly batteryModules: string;
  readonly batteryPacks: string;
  readonly chargerLevel: string;
  readonly chargerPowerKw: string;

  readonly abs: string;
  readonly esc: string;
  readonly tpms: string;
  readonly edr: string;
  readonly cib: string;
  readonly canAacn: string;
  readonly tractionControl: string;
  readonly dynamicBrakeSupport: string;
  readonly activeSafetySysNote: string;
  readonly adaptiveCruiseControl: string;
  readonly adaptiveDrivingBeam: string;
  readonly adaptiveHeadlights: string;
  readonly autoReverseSystem: string;
  readonly automaticPedestrianAlertingSound: string;
  readonly blindSpotIntervention: string;
  readonly blindSpotMon: string;
  readonly daytimeRunningLight: string;
  readonly driverAssist: string;
  readonly forwardCollisionWarning: string;
  readonly keylessIgnition: string;
  readonly laneCenteringAssistance: string;
  readonly laneDepartureWarning: string;
  readonly laneKeepSystem: string;
  readonly lowerBeamHeadlampLightSource: string;
  readonly parkAssist: string;
  readonly pedestrianAutomaticEmergencyBraking: string;
  readonly rearAutomaticEmergencyBraking: string;
  readonly rearCrossTrafficAlert: string;
  readonly rearVisibilitySystem: string;
  readonly semiautomaticHeadlampBeamSwitching: string;
  readonly saeAutomationLevel: string;
  readonly saeAutomationLevelTo: string;
  readonly entertainmentSystem: string;

  readonly airBagLocCurtain: string;
  readonly airBagLocFront: string;
  readonly airBagLocKnee: string;
  readonly airBagLocSeatCushion: string;
  readonly airBagLocSide: string;
  readonly pretensioner: string;
  readonly seatBeltsAll: string;
  readonly otherRestraintSystemInfo: string;

  readonly busType: string;
  readonly busLength: string;
  readonly busFloorConfigType: string;
  readonly otherBusInfo: string;
  readonly customMotorcycleType: string;
  readonly motorcycleChassisType: string;
  readonly motorcycleSuspensionType: string;
  readonly otherMotorcycleInfo: string;
  readonly wheelieMitigation: string;
  readonly trailerType: string;
  readonly trailerBodyType: string;
  readonly trailerLength: string;
  readonly otherTrailerInfo: string;

  // Present on the extended decode endpoints only
  readonly ncsaBodyType: string;
  readonly ncsaMake: string;
  readonly ncsaModel: string;
  readonly ncsaNote: string;
  readonly ncsaMappingException: string;
  readonly ncsaMapExcApprovedBy: string;
  readonly ncsaMapExcApprovedOn: string;
}
