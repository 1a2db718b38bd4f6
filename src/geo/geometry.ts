import { z } from "zod";
import type { Geometry } from "geojson";

const PositionSchema = z.array(z.number().finite()).min(2);

export const GeometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal("Point"), coordinates: PositionSchema }),
    z.object({ type: z.literal("MultiPoint"), coordinates: z.array(PositionSchema) }),
    z.object({ type: z.literal("LineString"), coordinates: z.array(PositionSchema) }),
    z.object({ type: z.literal("MultiLineString"), coordinates: z.array(z.array(PositionSchema)) }),
    z.object({ type: z.literal("Polygon"), coordinates: z.array(z.array(PositionSchema)) }),
    z.object({
      type: z.literal("MultiPolygon"),
      coordinates: z.array(z.array(z.array(PositionSchema)))
    }),
    z.object({ type: z.literal("GeometryCollection"), geometries: z.array(GeometrySchema) })
  ])
);

/** Parses GeoJSON geometry text; null when it is not JSON or not a geometry. */
export function parseGeometry(text: string): Geometry | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = GeometrySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
