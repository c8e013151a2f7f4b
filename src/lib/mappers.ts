import { isRecord } from "./normalization";
import { toBool, toText, type RecordReader } from "./coercion";
import type {
  Document,
  Make,
  Manufacturer,
  ManufacturerDetail,
  ManufacturerVehicleType,
  Model,
  PlantCode,
  Variable,
  VariableValue,
  Vehicle,
  VehicleType,
  WorldManufacturerIndex,
} from "./types";

// Each mapper reads canonical field names (see normalization-maps.ts) and
// builds one domain object. The field passed to require*() identifies the
// record; every other field is optional.

export function mapMake(r: RecordReader): Make {
  return {
    makeId: r.requireInt("MakeId"),
    make: r.text("Make"),
    manufacturerId: r.int("ManufacturerId"),
    manufacturer: r.text("Manufacturer"),
    vehicleTypeId: r.int("VehicleTypeId"),
    vehicleType: r.text("VehicleType"),
  };
}

export function mapModel(r: RecordReader): Model {
  return {
    modelId: r.requireInt("ModelId"),
    model: r.text("Model"),
    makeId: r.int("MakeId"),
    make: r.text("Make"),
    vehicleTypeId: r.int("VehicleTypeId"),
    vehicleType: r.text("VehicleType"),
  };
}

function mapManufacturerVehicleTypes(r: RecordReader): ManufacturerVehicleType[] {
  return r.list("VehicleTypes").map((item) => ({
    name: toText(item.Name),
    isPrimary: toBool(item.IsPrimary),
    gvwrFrom: toText(item.GVWRFrom),
    gvwrTo: toText(item.GVWRTo),
  }));
}

// Entries come either as plain strings or as { Name: "..." }
function names(items: unknown[]): string[] {
  return items
    .map((item) => (isRecord(item) ? toText(item.Name) : toText(item)))
    .filter((name) => name !== "");
}

export function mapManufacturer(r: RecordReader): Manufacturer {
  return {
    manufacturerId: r.requireInt("ManufacturerId"),
    manufacturer: r.text("Manufacturer"),
    manufacturerCommonName: r.text("ManufacturerCommonName"),
    country: r.text("Country"),
    vehicleTypes: mapManufacturerVehicleTypes(r),
  };
}

export function mapManufacturerDetail(r: RecordReader): ManufacturerDetail {
  return {
    manufacturerId: r.requireInt("ManufacturerId"),
    manufacturer: r.text("Manufacturer"),
    manufacturerCommonName: r.text("ManufacturerCommonName"),
    manufacturerTypes: names(r.array("ManufacturerTypes")),
    vehicleTypes: mapManufacturerVehicleTypes(r),
    equipmentItems: names(r.array("EquipmentItems")),
    address: r.text("Address"),
    address2: r.text("Address2"),
    city: r.text("City"),
    stateProvince: r.text("StateProvince"),
    postalCode: r.text("PostalCode"),
    country: r.text("Country"),
    contactEmail: r.text("ContactEmail"),
    contactFax: r.text("ContactFax"),
    contactPhone: r.text("ContactPhone"),
    dbas: r.text("Dbas"),
    lastUpdated: r.text("LastUpdated"),
    otherManufacturerDetails: r.text("OtherManufacturerDetails"),
    primaryProduct: r.text("PrimaryProduct"),
    principalFirstName: r.text("PrincipalFirstName"),
    principalLastName: r.text("PrincipalLastName"),
    principalPosition: r.text("PrincipalPosition"),
    submittedName: r.text("SubmittedName"),
    submittedOn: r.text("SubmittedOn"),
    submittedPosition: r.text("SubmittedPosition"),
  };
}

export function mapVehicleType(r: RecordReader): VehicleType {
  return {
    vehicleType: r.requireText("VehicleType"),
    vehicleTypeId: r.int("VehicleTypeId"),
    makeId: r.int("MakeId"),
    make: r.text("Make"),
  };
}

export function mapPlantCode(r: RecordReader): PlantCode {
  return {
    dotCode: r.requireText("DOTCode"),
    oldDotCode: r.text("OldDotCode"),
    name: r.text("Name"),
    address: r.text("Address"),
    city: r.text("City"),
    stateProvince: r.text("StateProvince"),
    postalCode: r.text("PostalCode"),
    country: r.text("Country"),
    status: r.text("Status"),
  };
}

export function mapDocument(r: RecordReader): Document {
  return {
    name: r.requireText("Name"),
    manufacturerId: r.int("ManufacturerId"),
    manufacturer: r.text("Manufacturer"),
    letterDate: r.text("LetterDate"),
    coverLetterUrl: r.text("CoverLetterURL"),
    url: r.text("URL"),
    type: r.text("Type"),
    modelYearFrom: r.int("ModelYearFrom"),
    modelYearTo: r.int("ModelYearTo"),
  };
}

export function mapVariable(r: RecordReader): Variable {
  return {
    id: r.requireInt("Id"),
    name: r.text("Name"),
    groupName: r.text("GroupName"),
    dataType: r.text("DataType"),
    description: r.text("Description"),
  };
}

export function mapVariableValue(r: RecordReader): VariableValue {
  return {
    id: r.requireInt("Id"),
    name: r.text("Name"),
    elementName: r.text("ElementName"),
  };
}

export function mapWorldManufacturerIndex(r: RecordReader): WorldManufacturerIndex {
  return {
    manufacturer: r.requireText("Manufacturer"),
    wmi: r.text("WMI"),
    manufacturerId: r.int("ManufacturerId"),
    commonName: r.text("CommonName"),
    parentCompanyName: r.text("ParentCompanyName"),
    make: r.text("Make"),
    vehicleType: r.text("VehicleType"),
    country: r.text("Country"),
    url: r.text("URL"),
    createdOn: r.text("CreatedOn"),
    updatedOn: r.text("UpdatedOn"),
    dateAvailableToPublic: r.text("DateAvailableToPublic"),
  };
}

export function mapVehicle(r: RecordReader): Vehicle {
  return {
    make: r.requireText("Make"),
    vin: r.text("VIN"),
    suggestedVin: r.text("SuggestedVIN"),
    errorCode: r.text("ErrorCode"),
    errorText: r.text("ErrorText"),
    additionalErrorText: r.text("AdditionalErrorText"),
    possibleValues: r.text("PossibleValues"),
    vehicleDescriptor: r.text("VehicleDescriptor"),

    makeId: r.int("MakeId"),
    manufacturer: r.text("Manufacturer"),
    manufacturerId: r.int("ManufacturerId"),
    model: r.text("Model"),
    modelId: r.int("ModelId"),
    modelYear: r.text("ModelYear"),
    series: r.text("Series"),
    series2: r.text("Series2"),
    trim: r.text("Trim"),
    trim2: r.text("Trim2"),
    vehicleType: r.text("VehicleType"),
    bodyClass: r.text("BodyClass"),
    bodyCabType: r.text("BodyCabType"),
    doors: r.text("Doors"),
    windows: r.text("Windows"),
    seats: r.text("Seats"),
    seatRows: r.text("SeatRows"),
    basePrice: r.text("BasePrice"),
    destinationMarket: r.text("DestinationMarket"),
    note: r.text("Note"),
    nonLandUse: r.text("NonLandUse"),
    cashForClunkers: r.text("CashForClunkers"),

    plantCity: r.text("PlantCity"),
    plantState: r.text("PlantState"),
    plantCountry: r.text("PlantCountry"),
    plantCompanyName: r.text("PlantCompanyName"),

    driveType: r.text("DriveType"),
    axles: r.text("Axles"),
    axleConfiguration: r.text("AxleConfiguration"),
    brakeSystemType: r.text("BrakeSystemType"),
    brakeSystemDesc: r.text("BrakeSystemDesc"),
    steeringLocation: r.text("SteeringLocation"),
    transmissionStyle: r.text("TransmissionStyle"),
    transmissionSpeeds: r.text("TransmissionSpeeds"),
    trackWidth: r.text("TrackWidth"),
    wheelBaseType: r.text("WheelBaseType"),
    wheelBaseShort: r.text("WheelBaseShort"),
    wheelBaseLong: r.text("WheelBaseLong"),
    wheels: r.text("Wheels"),
    wheelSizeFront: r.text("WheelSizeFront"),
    wheelSizeRear: r.text("WheelSizeRear"),
    curbWeightLb: r.text("CurbWeightLB"),
    gvwrFrom: r.text("GVWRFrom"),
    gvwrTo: r.text("GVWRTo"),
    gcwrFrom: r.text("GCWRFrom"),
    gcwrTo: r.text("GCWRTo"),
    bedType: r.text("BedType"),
    bedLengthIn: r.text("BedLengthIN"),
    topSpeedMph: r.text("TopSpeedMPH"),

    engineConfiguration: r.text("EngineConfiguration"),
    engineCylinders: r.text("EngineCylinders"),
    engineCycles: r.text("EngineCycles"),
    engineHp: r.text("EngineHP"),
    engineHpTo: r.text("EngineHP_to"),
    engineKw: r.text("EngineKW"),
    engineManufacturer: r.text("EngineManufacturer"),
    engineModel: r.text("EngineModel"),
    displacementCc: r.text("DisplacementCC"),
    displacementCi: r.text("DisplacementCI"),
    displacementL: r.text("DisplacementL"),
    fuelTypePrimary: r.text("FuelTypePrimary"),
    fuelTypeSecondary: r.text("FuelTypeSecondary"),
    fuelInjectionType: r.text("FuelInjectionType"),
    valveTrainDesign: r.text("ValveTrainDesign"),
    coolingType: r.text("CoolingType"),
    turbo: r.text("Turbo"),
    otherEngineInfo: r.text("OtherEngineInfo"),

    electrificationLevel: r.text("ElectrificationLevel"),
    evDriveUnit: r.text("EVDriveUnit"),
    batteryType: r.text("BatteryType"),
    batteryInfo: r.text("BatteryInfo"),
    batteryA: r.text("BatteryA"),
    batteryATo: r.text("BatteryA_to"),
    batteryV: r.text("BatteryV"),
    batteryVTo: r.text("BatteryV_to"),
    batteryKwh: r.text("BatteryKWh"),
    batteryKwhTo: r.text("BatteryKWh_to"),
    batteryCells: r.text("BatteryCells"),
    batteryModules: r.text("BatteryModules"),
    batteryPacks: r.text("BatteryPacks"),
    chargerLevel: r.text("ChargerLevel"),
    chargerPowerKw: r.text("ChargerPowerKW"),

    abs: r.text("ABS"),
    esc: r.text("ESC"),
    tpms: r.text("TPMS"),
    edr: r.text("EDR"),
    cib: r.text("CIB"),
    canAacn: r.text("CAN_AACN"),
    tractionControl: r.text("TractionControl"),
    dynamicBrakeSupport: r.text("DynamicBrakeSupport"),
    activeSafetySysNote: r.text("ActiveSafetySysNote"),
    adaptiveCruiseControl: r.text("AdaptiveCruiseControl"),
    adaptiveDrivingBeam: r.text("AdaptiveDrivingBeam"),
    adaptiveHeadlights: r.text("AdaptiveHeadlights"),
    autoReverseSystem: r.text("AutoReverseSystem"),
    automaticPedestrianAlertingSound: r.text("AutomaticPedestrianAlertingSound"),
    blindSpotIntervention: r.text("BlindSpotIntervention"),
    blindSpotMon: r.text("BlindSpotMon"),
    daytimeRunningLight: r.text("DaytimeRunningLight"),
    driverAssist: r.text("DriverAssist"),
    forwardCollisionWarning: r.text("ForwardCollisionWarning"),
    keylessIgnition: r.text("KeylessIgnition"),
    laneCenteringAssistance: r.text("LaneCenteringAssistance"),
    laneDepartureWarning: r.text("LaneDepartureWarning"),
    laneKeepSystem: r.text("LaneKeepSystem"),
    lowerBeamHeadlampLightSource: r.text("LowerBeamHeadlampLightSource"),
    parkAssist: r.text("ParkAssist"),
    pedestrianAutomaticEmergencyBraking: r.text("PedestrianAutomaticEmergencyBraking"),
    rearAutomaticEmergencyBraking: r.text("RearAutomaticEmergencyBraking"),
    rearCrossTrafficAlert: r.text("RearCrossTrafficAlert"),
    rearVisibilitySystem: r.text("RearVisibilitySystem"),
    semiautomaticHeadlampBeamSwitching: r.text("SemiautomaticHeadlampBeamSwitching"),
    saeAutomationLevel: r.text("SAEAutomationLevel"),
    saeAutomationLevelTo: r.text("SAEAutomationLevel_to"),
    entertainmentSystem: r.text("EntertainmentSystem"),

    airBagLocCurtain: r.text("AirBagLocCurtain"),
    airBagLocFront: r.text("AirBagLocFront"),
    airBagLocKnee: r.text("AirBagLocKnee"),
    airBagLocSeatCushion: r.text("AirBagLocSeatCushion"),
    airBagLocSide: r.text("AirBagLocSide"),
    pretensioner: r.text("Pretensioner"),
    seatBeltsAll: r.text("SeatBeltsAll"),
    otherRestraintSystemInfo: r.text("OtherRestraintSystemInfo"),

    busType: r.text("BusType"),
    busLength: r.text("BusLength"),
    busFloorConfigType: r.text("BusFloorConfigType"),
    otherBusInfo: r.text("OtherBusInfo"),
    customMotorcycleType: r.text("CustomMotorcycleType"),
    motorcycleChassisType: r.text("MotorcycleChassisType"),
    motorcycleSuspensionType: r.text("MotorcycleSuspensionType"),
    otherMotorcycleInfo: r.text("OtherMotorcycleInfo"),
    wheelieMitigation: r.text("WheelieMitigation"),
    trailerType: r.text("TrailerType"),
    trailerBodyType: r.text("TrailerBodyType"),
    trailerLength: r.text("TrailerLength"),
    otherTrailerInfo: r.text("OtherTrailerInfo"),

    ncsaBodyType: r.text("NCSABodyType"),
    ncsaMake: r.text("NCSAMake"),
    ncsaModel: r.text("NCSAModel"),
    ncsaNote: r.text("NCSANote"),
    ncsaMappingException: r.text("NCSAMappingException"),
    ncsaMapExcApprovedBy: r.text("NCSAMapExcApprovedBy"),
    ncsaMapExcApprovedOn: r.text("NCSAMapExcApprovedOn"),
  };
}
