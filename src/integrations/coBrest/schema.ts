import { z } from "zod";
import { column } from "../../validation/columns";
import type { MeasureType, VehicleType } from "../../registry/models";

/** Columns of the Brest traffic-order layer that the integration reads. */
export const BrestRawDataSchema = z.object({
  NOARR: column.string.nullable(),
  DESCRIPTIF: column.string.nullable(),
  LIBRU: column.string.nullable(),
  LIBCO: column.string.nullable(),
  geometry: column.string.nullable(),
  SENS: column.int.nullable(),
  VELO: column.bool.required(),
  CYCLO: column.bool.required(),
  VITEMAX: column.int.nullable(),
  POIDS: column.float.nullable(),
  HAUTEUR: column.float.nullable(),
  LARGEUR: column.float.nullable(),
  DT_MAT: column.timestamp.nullable()
});

export type BrestRawRow = z.infer<typeof BrestRawDataSchema>;

export interface DescriptionConfig {
  measure_type: MeasureType;
  exempted_types?: VehicleType[];
  restricted_types?: VehicleType[];
}

export const ONE_WAY_DESCRIPTION = "Sens interdit / Sens unique";

// Only these DESCRIPTIF values are integrated.
export const DESCRIPTION_CONFIG: Record<string, DescriptionConfig> = {
  "Limitation Vitesse": { measure_type: "speedLimitation" },
  "Stationnement interdit": { measure_type: "parkingProhibited" },
  "Limitation Poids": { measure_type: "noEntry" },
  "Limitation Hauteur": { measure_type: "noEntry" },
  "Limitation Largeur": { measure_type: "noEntry" },
  [ONE_WAY_DESCRIPTION]: { measure_type: "noEntry" },
  "Interdiction Poids Lourds": { measure_type: "noEntry", restricted_types: ["heavyGoodsVehicle"] },
  "Aire piétonne": { measure_type: "noEntry", exempted_types: ["bicycle", "emergencyServices"] }
};
