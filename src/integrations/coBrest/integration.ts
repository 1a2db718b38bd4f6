import { Frame, RawFrame, filterRows } from "../../io/frame";
import type { CleanRecord } from "../../validation/flatRecordSchema";
import type { VehicleType } from "../../registry/models";
import { FetchContext, IntegrationOptions, RegulationIntegration } from "../../pipeline/integration";
import { downloadArtifact } from "../../capture/download";
import { readZippedShapefile } from "../../io/shapefile";
import { reprojectGeometry } from "../../geo/lambert93";
import { parseGeometry } from "../../geo/geometry";
import { parseNumber } from "../../utils/number";
import { toUtcIsoSeconds } from "../../utils/time";
import { Logger, makeNoopLogger } from "../../logging/logger";
import { LocationFields, PeriodFields, RAW_GEOJSON, isBlank, permanentPeriod } from "../shared";
import {
  BrestRawDataSchema,
  BrestRawRow,
  DESCRIPTION_CONFIG,
  DescriptionConfig,
  ONE_WAY_DESCRIPTION
} from "./schema";

export const BREST_URL =
  "https://www.data.gouv.fr/api/1/datasets/r/3ca7bd06-6489-45a2-aee9-efc6966121b2";
export const BREST_LAYER = "DEP_ARR_CIRC_STAT_L_V";

export interface BrestIntegrationOptions extends IntegrationOptions {
  url?: string;
}

type VehicleFields = Pick<
  CleanRecord,
  | "vehicle_all_vehicles"
  | "vehicle_restricted_types"
  | "vehicle_exempted_types"
  | "vehicle_other_exempted_type_text"
  | "vehicle_heavyweight_max_weight"
  | "vehicle_max_height"
  | "vehicle_max_width"
>;

interface RegulationFields {
  regulation_identifier: string;
  regulation_status: string;
  regulation_category: string;
  regulation_subject: string;
  regulation_title: string;
  regulation_other_category_text: string;
}

export function castBooleanText(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  return typeof value === "string" && value.trim().toUpperCase() === "OUI";
}

export function descriptionConfig(description: string | null): DescriptionConfig | null {
  if (description === null || !Object.hasOwn(DESCRIPTION_CONFIG, description)) return null;
  return DESCRIPTION_CONFIG[description];
}

/** VELO / CYCLO come as OUI / NON text; rows without an order number are dropped. */
export function preprocessBrestRawData(frame: RawFrame): RawFrame {
  const kept = filterRows(
    frame,
    (row) => row.NOARR !== null && row.NOARR !== undefined && String(row.NOARR).trim() !== ""
  );
  return {
    columns: kept.columns,
    rows: kept.rows.map((row) => ({
      ...row,
      VELO: castBooleanText(row.VELO),
      CYCLO: castBooleanText(row.CYCLO)
    }))
  };
}

export function computeMeasureType<R extends Pick<BrestRawRow, "DESCRIPTIF" | "SENS">>(
  rows: R[],
  logger: Logger = makeNoopLogger()
): (R & { measure_type_: string })[] {
  const result = rows.flatMap((row) => {
    const config = descriptionConfig(row.DESCRIPTIF);
    if (!config) return [];
    if (row.DESCRIPTIF === ONE_WAY_DESCRIPTION && row.SENS === 1) return [];
    return [{ ...row, measure_type_: config.measure_type }];
  });
  const removed = rows.length - result.length;
  if (removed > 0) {
    logger.info(`Dropping ${removed} rows with an unsupported DESCRIPTIF or a one-way SENS`);
  }
  return result;
}

export function computeSavePeriodFields<R extends Pick<BrestRawRow, "DT_MAT">>(
  rows: R[],
  logger: Logger = makeNoopLogger()
): (R & PeriodFields)[] {
  const result = rows.flatMap((row) => {
    const measuredAt: Date | null = row.DT_MAT;
    return measuredAt === null ? [] : [{ ...row, ...permanentPeriod(toUtcIsoSeconds(measuredAt)) }];
  });
  const removed = rows.length - result.length;
  if (removed > 0) {
    logger.warn(`Dropping ${removed} rows with null DT_MAT (no start date available)`);
  }
  return result;
}

export function computeSaveLocationFields<R extends Pick<BrestRawRow, "LIBCO" | "LIBRU" | "geometry">>(
  rows: R[],
  logger: Logger = makeNoopLogger()
): (R & LocationFields)[] {
  let missing = 0;
  let unreadable = 0;
  const result: (R & LocationFields)[] = [];

  for (const row of rows) {
    const text: string | null = row.geometry;
    if (text === null || isBlank(text)) {
      missing += 1;
      continue;
    }
    const geometry = parseGeometry(text);
    if (!geometry) {
      unreadable += 1;
      continue;
    }
    result.push({
      ...row,
      location_road_type: RAW_GEOJSON,
      location_label: `${row.LIBCO ?? ""} – ${row.LIBRU ?? ""}`,
      location_geometry: JSON.stringify(reprojectGeometry(geometry))
    });
  }

  if (missing > 0) logger.warn(`Dropping ${missing} rows with null geometry (no geometry available)`);
  if (unreadable > 0) logger.warn(`Dropping ${unreadable} rows with unreadable geometry`);
  return result;
}

/** Title of a regulation comes from the first row carrying its NOARR. */
export function computeRegulationFields<
  R extends Pick<BrestRawRow, "NOARR" | "DESCRIPTIF" | "LIBRU">
>(rows: R[], status: string): (R & RegulationFields)[] {
  const titles = new Map<string, string>();
  return rows.map((row) => {
    const identifier = row.NOARR ?? "";
    const title = titles.get(identifier) ?? `${row.DESCRIPTIF ?? ""} – ${row.LIBRU ?? ""}`;
    titles.set(identifier, title);
    return {
      ...row,
      regulation_identifier: identifier,
      regulation_status: status,
      regulation_category: "permanentRegulation",
      regulation_subject: "other",
      regulation_title: title,
      regulation_other_category_text: "Circulation"
    };
  });
}

function positiveOrNull(value: number | null): number | null {
  const n = parseNumber(value);
  return n === null || n === 0 ? null : n;
}

export function computeVehicleFields(
  row: Pick<BrestRawRow, "POIDS" | "HAUTEUR" | "LARGEUR" | "VELO" | "CYCLO">,
  config: DescriptionConfig
): VehicleFields {
  const weight = positiveOrNull(row.POIDS);
  let exempted: VehicleType[] | undefined = config.exempted_types;
  let restricted: VehicleType[] | undefined = config.restricted_types;

  if (exempted === undefined) {
    exempted = [];
    if (row.CYCLO) exempted.push("other");
    if (row.VELO) exempted.push("bicycle");
  }

  let otherExemptedText: string | null = null;
  if (exempted.length > 0) {
    otherExemptedText = exempted.includes("other") ? "cyclomoteur" : "autres véhicules autorisés";
  }

  if (weight !== null) restricted = ["heavyGoodsVehicle"];

  return {
    vehicle_all_vehicles: !(restricted && restricted.length > 0),
    vehicle_restricted_types: restricted ?? null,
    vehicle_exempted_types: exempted,
    vehicle_other_exempted_type_text: otherExemptedText,
    vehicle_heavyweight_max_weight: weight,
    vehicle_max_height: positiveOrNull(row.HAUTEUR),
    vehicle_max_width: positiveOrNull(row.LARGEUR)
  };
}

/**
 * Brest metropolitan traffic orders, published from a zipped shapefile in
 * Lambert-93. One regulation per order number (NOARR), one measure per row.
 */
export class BrestIntegration extends RegulationIntegration<typeof BrestRawDataSchema.shape> {
  readonly organization = "co_brest";
  readonly rawDataSchema = BrestRawDataSchema;
  private url: string;

  constructor(options: BrestIntegrationOptions = {}) {
    super(options);
    this.url = options.url ?? BREST_URL;
  }

  async fetchRawData(context: FetchContext): Promise<RawFrame> {
    this.logger.info({ url: this.url }, "Downloading shapefile archive");
    const download = await downloadArtifact({
      url: this.url,
      outDir: context.artifactDir,
      fileName: "data.zip"
    });
    this.logger.info({ bytes: download.meta.byte_length }, "Reading shapefile layer");
    return readZippedShapefile(download.buffer, { layer: BREST_LAYER });
  }

  preprocessRawData(frame: RawFrame): RawFrame {
    return preprocessBrestRawData(frame);
  }

  computeCleanData(frame: Frame<BrestRawRow>): CleanRecord[] {
    const withType = computeMeasureType(frame.rows, this.logger);
    const withPeriod = computeSavePeriodFields(withType, this.logger);
    const withLocation = computeSaveLocationFields(withPeriod, this.logger);
    const rows = computeRegulationFields(withLocation, this.regulationStatus);

    return rows.flatMap((row) => {
      const config = descriptionConfig(row.DESCRIPTIF);
      if (!config) return [];
      return [
        {
          regulation_identifier: row.regulation_identifier,
          regulation_status: row.regulation_status,
          regulation_category: row.regulation_category,
          regulation_subject: row.regulation_subject,
          regulation_title: row.regulation_title,
          regulation_other_category_text: row.regulation_other_category_text,
          measure_type_: row.measure_type_,
          measure_max_speed: row.VITEMAX,
          period_start_date: row.period_start_date,
          period_end_date: row.period_end_date,
          period_start_time: row.period_start_time,
          period_end_time: row.period_end_time,
          period_recurrence_type: row.period_recurrence_type,
          period_is_permanent: row.period_is_permanent,
          location_road_type: row.location_road_type,
          location_label: row.location_label,
          location_geometry: row.location_geometry,
          ...computeVehicleFields(row, config)
        }
      ];
    });
  }
}
