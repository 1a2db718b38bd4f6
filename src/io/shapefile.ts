import path from "path";
import JSZip from "jszip";
import * as shapefile from "shapefile";
import { RawFrame, RawRecord } from "./frame";

export interface ReadShapefileOptions {
  /** Base name of the layer inside the archive; defaults to the first .shp found. */
  layer?: string;
  encoding?: string;
}

async function extractLayer(
  archive: Buffer,
  layer: string | undefined
): Promise<{ shp: Buffer; dbf: Buffer }> {
  const zip = await JSZip.loadAsync(archive);
  const shpEntries = zip.file(/\.shp$/i).filter((entry) => {
    if (!layer) return true;
    return path.basename(entry.name).toLowerCase() === `${layer}.shp`.toLowerCase();
  });
  const shpEntry = shpEntries[0];
  if (!shpEntry) {
    throw new Error(`No ${layer ? `${layer}.shp` : ".shp"} file found in archive`);
  }

  const dbfName = shpEntry.name.replace(/\.shp$/i, ".dbf");
  const dbfEntry = zip.file(new RegExp(`^${escapeRegExp(dbfName)}$`, "i"))[0];
  if (!dbfEntry) {
    throw new Error(`Missing attribute table ${dbfName} in archive`);
  }

  return {
    shp: await shpEntry.async("nodebuffer"),
    dbf: await dbfEntry.async("nodebuffer")
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// DBF dates have no time zone and the reader builds them at local midnight.
function calendarDateToUtc(value: unknown): unknown {
  if (!(value instanceof Date)) return value;
  if (Number.isNaN(value.getTime())) return null;
  return new Date(Date.UTC(value.getFullYear(), value.getMonth(), value.getDate()));
}

/**
 * Reads a zipped shapefile into a frame: one row per feature, attribute
 * columns plus a `geometry` column holding the GeoJSON geometry as text, in
 * the layer's own coordinate system. Dates come out at UTC midnight.
 */
export async function readZippedShapefile(
  archive: Buffer,
  options: ReadShapefileOptions = {}
): Promise<RawFrame> {
  const { shp, dbf } = await extractLayer(archive, options.layer);
  const source = await shapefile.open(
    shp,
    dbf,
    options.encoding ? { encoding: options.encoding } : undefined
  );

  const rows: RawRecord[] = [];
  const columns = new Set<string>();
  let result = await source.read();
  while (!result.done) {
    const feature = result.value;
    const row: RawRecord = {};
    for (const [key, value] of Object.entries(feature.properties ?? {})) {
      row[key] = calendarDateToUtc(value);
    }
    row.geometry = feature.geometry ? JSON.stringify(feature.geometry) : null;
    for (const key of Object.keys(row)) columns.add(key);
    rows.push(row);
    result = await source.read();
  }

  return { columns: Array.from(columns), rows };
}
