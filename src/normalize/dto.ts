import type { FlatRecord } from "../validation/flatRecordSchema";
import type { LocationDto, MeasureDto, PeriodDto, VehicleSetDto } from "../registry/models";

export type VehicleSetFields = { [K in keyof VehicleSetDto]?: VehicleSetDto[K] | null };

const DIMENSION_KEYS = [
  "heavyweight_max_weight",
  "max_weight",
  "max_width",
  "max_length",
  "max_height"
] as const;

export function toPeriodDto(record: FlatRecord): PeriodDto {
  const period: PeriodDto = {
    start_date: record.period_start_date,
    recurrence_type: record.period_recurrence_type,
    is_permanent: record.period_is_permanent
  };
  if (record.period_end_date !== null) period.end_date = record.period_end_date;
  if (record.period_start_time !== null) period.start_time = record.period_start_time;
  if (record.period_end_time !== null) period.end_time = record.period_end_time;
  return period;
}

// The raw GeoJSON carrier is used whatever road type the row declares.
export function toLocationDto(record: FlatRecord): LocationDto {
  return {
    road_type: record.location_road_type,
    raw_geo_json: {
      label: record.location_label,
      geometry: record.location_geometry
    }
  };
}

/**
 * Drops null and empty fields. A set left with nothing but `all_vehicles: true`
 * is the canonical minimal form `{ all_vehicles: true }`.
 */
export function simplifyVehicleSet(fields: VehicleSetFields): VehicleSetDto {
  const set: VehicleSetDto = { all_vehicles: fields.all_vehicles ?? true };
  if (fields.restricted_types && fields.restricted_types.length > 0) {
    set.restricted_types = fields.restricted_types;
  }
  if (fields.exempted_types && fields.exempted_types.length > 0) {
    set.exempted_types = fields.exempted_types;
  }
  if (fields.other_restricted_type_text) {
    set.other_restricted_type_text = fields.other_restricted_type_text;
  }
  if (fields.other_exempted_type_text) {
    set.other_exempted_type_text = fields.other_exempted_type_text;
  }
  for (const key of DIMENSION_KEYS) {
    const value = fields[key];
    if (typeof value === "number") set[key] = value;
  }
  return set;
}

export function toVehicleSetDto(record: FlatRecord): VehicleSetDto {
  return simplifyVehicleSet({
    all_vehicles: record.vehicle_all_vehicles,
    restricted_types: record.vehicle_restricted_types,
    exempted_types: record.vehicle_exempted_types,
    other_restricted_type_text: record.vehicle_other_restricted_type_text,
    other_exempted_type_text: record.vehicle_other_exempted_type_text,
    heavyweight_max_weight: record.vehicle_heavyweight_max_weight,
    max_weight: record.vehicle_max_weight,
    max_width: record.vehicle_max_width,
    max_length: record.vehicle_max_length,
    max_height: record.vehicle_max_height
  });
}

export function buildMeasure(record: FlatRecord): MeasureDto {
  const measure: MeasureDto = {
    type: record.measure_type_,
    periods: [toPeriodDto(record)],
    locations: [toLocationDto(record)],
    vehicle_set: toVehicleSetDto(record)
  };

  if (record.measure_type_ === "speedLimitation") {
    const maxSpeed = record.measure_max_speed;
    if (maxSpeed === null || maxSpeed === undefined || maxSpeed <= 0) {
      throw new Error("speedLimitation measure requires a positive measure_max_speed");
    }
    measure.max_speed = maxSpeed;
  }

  return measure;
}
