export const RAW_GEOJSON = "rawGeoJSON";

export interface PeriodFields {
  period_start_date: string;
  period_end_date: string | null;
  period_start_time: string | null;
  period_end_time: string | null;
  period_recurrence_type: string;
  period_is_permanent: boolean;
}

export interface LocationFields {
  location_road_type: string;
  location_label: string;
  location_geometry: string;
}

export type PeriodFieldsFrom<D extends string | null> = Omit<PeriodFields, "period_start_date"> & {
  period_start_date: D;
};

/** Every-day, permanent period starting at `startDate`. */
export function permanentPeriod<D extends string | null>(startDate: D): PeriodFieldsFrom<D> {
  return {
    period_start_date: startDate,
    period_end_date: null,
    period_start_time: null,
    period_end_time: null,
    period_recurrence_type: "everyDay",
    period_is_permanent: true
  };
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}
