import { z } from "zod";

export const MeasureTypeSchema = z.enum([
  "noEntry",
  "speedLimitation",
  "parkingProhibited",
  "alternateRoad"
]);

export const RoadTypeSchema = z.enum(["lane", "departmentalRoad", "nationalRoad", "rawGeoJSON"]);

export const RecurrenceTypeSchema = z.enum(["everyDay", "certainDays"]);

export const RegulationCategorySchema = z.enum(["temporaryRegulation", "permanentRegulation"]);

export const RegulationStatusSchema = z.enum(["draft", "published"]);

export const RegulationSubjectSchema = z.enum(["event", "incident", "roadMaintenance", "other"]);

export const VehicleTypeSchema = z.enum([
  "heavyGoodsVehicle",
  "commercial",
  "bus",
  "bicycle",
  "pedestrians",
  "emergencyServices",
  "critair",
  "other"
]);

export const IdentifierListSchema = z.object({
  identifiers: z.array(z.string())
});

export type MeasureType = z.infer<typeof MeasureTypeSchema>;
export type RoadType = z.infer<typeof RoadTypeSchema>;
export type RecurrenceType = z.infer<typeof RecurrenceTypeSchema>;
export type RegulationCategory = z.infer<typeof RegulationCategorySchema>;
export type RegulationStatus = z.infer<typeof RegulationStatusSchema>;
export type RegulationSubject = z.infer<typeof RegulationSubjectSchema>;
export type VehicleType = z.infer<typeof VehicleTypeSchema>;

export interface PeriodDto {
  start_date: string;
  end_date?: string;
  start_time?: string;
  end_time?: string;
  recurrence_type: RecurrenceType;
  is_permanent: boolean;
}

export interface RawGeoJsonDto {
  label: string;
  geometry: string;
}

export interface LocationDto {
  road_type: RoadType;
  raw_geo_json: RawGeoJsonDto;
}

export interface VehicleSetDto {
  all_vehicles: boolean;
  restricted_types?: VehicleType[];
  exempted_types?: VehicleType[];
  other_restricted_type_text?: string;
  other_exempted_type_text?: string;
  heavyweight_max_weight?: number;
  max_weight?: number;
  max_width?: number;
  max_length?: number;
  max_height?: number;
}

export interface MeasureDto {
  type: MeasureType;
  max_speed?: number;
  periods: PeriodDto[];
  locations: LocationDto[];
  vehicle_set: VehicleSetDto;
}

export interface RegulationDto {
  identifier: string;
  category: RegulationCategory;
  status: RegulationStatus;
  subject: RegulationSubject;
  title: string;
  other_category_text: string;
  measures: MeasureDto[];
}
