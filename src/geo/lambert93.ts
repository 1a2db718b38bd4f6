import proj4 from "proj4";
import type { Geometry, Position } from "geojson";

const LAMBERT93_DEF =
  "+proj=lcc +lat_0=46.5 +lon_0=3 +lat_1=49 +lat_2=44 +x_0=700000 +y_0=6600000 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs";

const WGS84_DEF = "+proj=longlat +datum=WGS84 +no_defs";

const converter = proj4(LAMBERT93_DEF, WGS84_DEF);

export function lambert93ToWgs84(position: Position): Position {
  const [lon, lat] = converter.forward([position[0], position[1]]);
  return [lon, lat];
}

/**
 * Reprojects a GeoJSON geometry from EPSG:2154 (Lambert-93) to EPSG:4326.
 */
export function reprojectGeometry(geometry: Geometry): Geometry {
  switch (geometry.type) {
    case "Point":
      return { type: "Point", coordinates: lambert93ToWgs84(geometry.coordinates) };
    case "MultiPoint":
      return { type: "MultiPoint", coordinates: geometry.coordinates.map(lambert93ToWgs84) };
    case "LineString":
      return { type: "LineString", coordinates: geometry.coordinates.map(lambert93ToWgs84) };
    case "MultiLineString":
      return {
        type: "MultiLineString",
        coordinates: geometry.coordinates.map((line) => line.map(lambert93ToWgs84))
      };
    case "Polygon":
      return {
        type: "Polygon",
        coordinates: geometry.coordinates.map((ring) => ring.map(lambert93ToWgs84))
      };
    case "MultiPolygon":
      return {
        type: "MultiPolygon",
        coordinates: geometry.coordinates.map((polygon) =>
          polygon.map((ring) => ring.map(lambert93ToWgs84))
        )
      };
    case "GeometryCollection":
      return { type: "GeometryCollection", geometries: geometry.geometries.map(reprojectGeometry) };
  }
}
