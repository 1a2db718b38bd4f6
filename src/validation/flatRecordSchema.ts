import { z } from "zod";
import {
  MeasureTypeSchema,
  RecurrenceTypeSchema,
  RegulationCategorySchema,
  RegulationStatusSchema,
  RegulationSubjectSchema,
  RoadTypeSchema,
  VehicleTypeSchema
} from "../registry/models";

const optionalText = z.string().nullable().optional();
const optionalDimension = z.number().positive().nullable().optional();
const optionalVehicleTypes = z.array(VehicleTypeSchema).nullable().optional();

/**
 * Contract of one clean row: one (regulation, measure) pair with its period,
 * location and vehicle fields flattened under a family prefix.
 */
export const FlatRecordSchema = z.object({
  regulation_identifier: z.string().min(1),
  regulation_status: RegulationStatusSchema,
  regulation_category: RegulationCategorySchema,
  regulation_subject: RegulationSubjectSchema,
  regulation_title: z.string().min(1),
  regulation_other_category_text: z.string(),

  measure_type_: MeasureTypeSchema,
  measure_max_speed: z.number().int().nullable().optional(),

  location_road_type: RoadTypeSchema,
  location_label: z.string().min(1),
  location_geometry: z.string().min(1),

  period_start_date: z.string().min(1),
  period_end_date: z.string().nullable(),
  period_start_time: z.string().nullable(),
  period_end_time: z.string().nullable(),
  period_recurrence_type: RecurrenceTypeSchema,
  period_is_permanent: z.boolean(),

  vehicle_all_vehicles: z.boolean().nullable().optional(),
  vehicle_restricted_types: optionalVehicleTypes,
  vehicle_exempted_types: optionalVehicleTypes,
  vehicle_other_restricted_type_text: optionalText,
  vehicle_other_exempted_type_text: optionalText,
  vehicle_heavyweight_max_weight: optionalDimension,
  vehicle_max_weight: optionalDimension,
  vehicle_max_width: optionalDimension,
  vehicle_max_length: optionalDimension,
  vehicle_max_height: optionalDimension
});

export type FlatRecord = z.infer<typeof FlatRecordSchema>;

type WidenText<T> = { [K in keyof T]: T[K] extends string ? string : T[K] };

/** What adapters emit: the flat record before enum values are checked. */
export type CleanRecord = WidenText<z.input<typeof FlatRecordSchema>>;
