import { z } from "zod";
import { column } from "../../validation/columns";

export const SarthesRawDataSchema = z.object({
  VITESSE: column.float.nullable(),
  longueur: column.float.nullable(),
  annee: column.float.nullable(),
  loc_txt: column.string.nullable(),
  infobulle: column.string.nullable(),
  date_modif: column.string.nullable(),
  geo_shape: column.string.nullable()
});

export type SarthesRawRow = z.infer<typeof SarthesRawDataSchema>;

export const MAX_SPEED_LIMIT = 130;
export const UNKNOWN_TITLE = "Inconnu";
