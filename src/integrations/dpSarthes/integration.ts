import type { Frame, RawFrame } from "../../io/frame";
import type { CleanRecord } from "../../validation/flatRecordSchema";
import { FetchContext, IntegrationOptions, RegulationIntegration } from "../../pipeline/integration";
import { downloadArtifact } from "../../capture/download";
import { readCsv } from "../../io/csv";
import { md5 } from "../../utils/hash";
import { Logger, makeNoopLogger } from "../../logging/logger";
import { LocationFields, PeriodFieldsFrom, RAW_GEOJSON, isBlank, permanentPeriod } from "../shared";
import { MAX_SPEED_LIMIT, SarthesRawDataSchema, SarthesRawRow, UNKNOWN_TITLE } from "./schema";

export const SARTHES_URL =
  "https://data.sarthe.fr" +
  "/api/explore/v2.1/catalog/datasets/227200029_limitations-vitesse/exports/csv" +
  "?lang=fr&timezone=Europe%2FBerlin&use_labels=true&delimiter=%3B";

export const SARTHES_DELIMITER = ";";

export interface SarthesIntegrationOptions extends IntegrationOptions {
  url?: string;
}

type WithSpeed<R> = R & { VITESSE: number };

export function computeVitesse<R extends Pick<SarthesRawRow, "VITESSE">>(
  rows: R[],
  logger: Logger = makeNoopLogger()
): WithSpeed<R>[] {
  const result: WithSpeed<R>[] = [];
  for (const row of rows) {
    const raw: number | null = row.VITESSE;
    if (raw === null) continue;
    const speed = Math.trunc(raw);
    if (speed <= 0 || speed > MAX_SPEED_LIMIT) continue;
    result.push({ ...row, VITESSE: speed });
  }
  const removed = rows.length - result.length;
  if (removed > 0) logger.info(`Removing ${removed} rows with invalid VITESSE`);
  return result;
}

export function fallbackIdentifier(row: {
  loc_txt: string | null;
  VITESSE: number;
  longueur: number | null;
}): string {
  const parts = [row.loc_txt ?? "", String(row.VITESSE), row.longueur === null ? "" : String(row.longueur)];
  return md5(parts.join("|"));
}

/** Rows sharing an identifier are ambiguous; all of them are dropped. */
export function buildIdAndDropDuplicates<
  R extends { loc_txt: string | null; VITESSE: number; longueur: number | null }
>(rows: R[], logger: Logger = makeNoopLogger()): (R & { id: string })[] {
  const withId = rows.map((row) => ({ ...row, id: fallbackIdentifier(row) }));
  const counts = new Map<string, number>();
  for (const row of withId) counts.set(row.id, (counts.get(row.id) ?? 0) + 1);

  const duplicated = Array.from(counts.entries())
    .filter(([, count]) => count > 1)
    .map(([id]) => id);
  if (duplicated.length > 0) {
    logger.warn(`Found ${duplicated.length} duplicated fallback ids, dropping all corresponding rows`);
    logger.debug({ ids: duplicated }, "Duplicated ids");
  }

  return withId.filter((row) => counts.get(row.id) === 1);
}

export function computeTitle<R extends Pick<SarthesRawRow, "infobulle">>(rows: R[]): (R & { title: string })[] {
  return rows.map((row) => {
    const infobulle: string | null = row.infobulle;
    return { ...row, title: infobulle === null || infobulle === "" ? UNKNOWN_TITLE : infobulle };
  });
}

type WithStartDate<R> = R & PeriodFieldsFrom<string | null>;

/** Jan 1st of `annee` when known, else `date_modif` as given. */
export function computeStartDate<R extends Pick<SarthesRawRow, "annee" | "date_modif">>(
  rows: R[],
  logger: Logger = makeNoopLogger()
): WithStartDate<R>[] {
  const missing = rows.filter((row) => row.annee === null).length;
  if (missing > 0) {
    logger.info(`Using date_modif as fallback for ${missing} rows with missing annee`);
  }
  return rows.map((row) => {
    const year: number | null = row.annee;
    const startDate: string | null = year === null ? row.date_modif : `${Math.trunc(year)}-01-01T00:00:00Z`;
    return { ...row, ...permanentPeriod(startDate) };
  });
}

export function computeSaveLocationFields<R extends Pick<SarthesRawRow, "loc_txt" | "geo_shape"> & { title: string }>(
  rows: R[],
  logger: Logger = makeNoopLogger()
): (R & LocationFields)[] {
  const result: (R & LocationFields)[] = [];
  for (const row of rows) {
    const shape: string | null = row.geo_shape;
    if (shape === null) continue;
    const label: string | null = row.loc_txt;
    result.push({
      ...row,
      location_road_type: RAW_GEOJSON,
      location_label: label === null || isBlank(label) ? row.title : label,
      location_geometry: shape
    });
  }
  const removed = rows.length - result.length;
  if (removed > 0) {
    logger.warn(`Dropping ${removed} rows with null geo_shape (no geometry available)`);
  }
  return result;
}

/**
 * Sarthe departmental speed limits, one CSV row per road section. Each row
 * becomes its own single-measure regulation.
 */
export class SarthesIntegration extends RegulationIntegration<typeof SarthesRawDataSchema.shape> {
  readonly organization = "dp_sarthes";
  readonly rawDataSchema = SarthesRawDataSchema;
  private url: string;

  constructor(options: SarthesIntegrationOptions = {}) {
    super(options);
    this.url = options.url ?? SARTHES_URL;
  }

  async fetchRawData(context: FetchContext): Promise<RawFrame> {
    this.logger.info({ url: this.url }, "Downloading data");
    const download = await downloadArtifact({
      url: this.url,
      outDir: context.artifactDir,
      fileName: "data.csv"
    });
    return readCsv(download.buffer, { delimiter: SARTHES_DELIMITER });
  }

  computeCleanData(frame: Frame<SarthesRawRow>): CleanRecord[] {
    const withSpeed = computeVitesse(frame.rows, this.logger);
    const withId = buildIdAndDropDuplicates(withSpeed, this.logger);
    const withTitle = computeTitle(withId);
    const withPeriod = computeStartDate(withTitle, this.logger);
    const rows = computeSaveLocationFields(withPeriod, this.logger);

    return rows.map((row) => ({
      regulation_identifier: row.id,
      regulation_status: this.regulationStatus,
      regulation_category: "permanentRegulation",
      regulation_subject: "other",
      regulation_title: row.title,
      regulation_other_category_text: "Limitation de vitesse",
      measure_type_: "speedLimitation",
      measure_max_speed: row.VITESSE,
      period_start_date: row.period_start_date ?? "",
      period_end_date: row.period_end_date,
      period_start_time: row.period_start_time,
      period_end_time: row.period_end_time,
      period_recurrence_type: row.period_recurrence_type,
      period_is_permanent: row.period_is_permanent,
      location_road_type: row.location_road_type,
      location_label: row.location_label,
      location_geometry: row.location_geometry,
      vehicle_all_vehicles: true
    }));
  }
}
