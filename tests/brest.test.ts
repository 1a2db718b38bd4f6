import { afterEach, describe, expect, it, vi } from "vitest";
import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import {
  BrestIntegration,
  castBooleanText,
  computeMeasureType,
  computeRegulationFields,
  computeSaveLocationFields,
  computeSavePeriodFields,
  computeVehicleFields,
  preprocessBrestRawData
} from "../src/integrations/coBrest/integration";
import { BrestRawRow, DESCRIPTION_CONFIG } from "../src/integrations/coBrest/schema";
import { frameFromRecords, RawFrame } from "../src/io/frame";
import { IntegrationRunner } from "../src/pipeline/runner";
import { FakeRegistry } from "./support";

const fixturesDir = path.join(process.cwd(), "fixtures");

function loadLayer(): RawFrame {
  const content: unknown = JSON.parse(readFileSync(path.join(fixturesDir, "co_brest", "layer.json"), "utf8"));
  return frameFromRecords(z.array(z.record(z.unknown())).parse(content));
}

class FixtureBrestIntegration extends BrestIntegration {
  async fetchRawData(): Promise<RawFrame> {
    return loadLayer();
  }
}

function brestRow(overrides: Partial<BrestRawRow> = {}): BrestRawRow {
  return {
    NOARR: "2023-0001",
    DESCRIPTIF: "Limitation Vitesse",
    LIBRU: "Rue de Siam",
    LIBCO: "Brest",
    geometry: null,
    SENS: null,
    VELO: false,
    CYCLO: false,
    VITEMAX: 30,
    POIDS: null,
    HAUTEUR: null,
    LARGEUR: null,
    DT_MAT: null,
    ...overrides
  };
}

describe("Brest pre-processing", () => {
  it("reads OUI / NON flags", () => {
    expect(castBooleanText("OUI")).toBe(true);
    expect(castBooleanText(" oui ")).toBe(true);
    expect(castBooleanText("NON")).toBe(false);
    expect(castBooleanText(null)).toBe(false);
    expect(castBooleanText(true)).toBe(true);
  });

  it("drops rows without an order number", () => {
    const frame = preprocessBrestRawData(
      frameFromRecords([
        { NOARR: "2023-0001", VELO: "OUI", CYCLO: null },
        { NOARR: "", VELO: "NON", CYCLO: "NON" },
        { NOARR: "   ", VELO: "NON", CYCLO: "NON" },
        { NOARR: null, VELO: "NON", CYCLO: "NON" }
      ])
    );

    expect(frame.rows).toEqual([{ NOARR: "2023-0001", VELO: true, CYCLO: false }]);
  });
});

describe("Brest clean data", () => {
  it("keeps supported descriptions and drops one-way rows with SENS 1", () => {
    const rows = computeMeasureType([
      brestRow({ DESCRIPTIF: "Limitation Vitesse" }),
      brestRow({ DESCRIPTIF: "Sens interdit / Sens unique", SENS: 1 }),
      brestRow({ DESCRIPTIF: "Sens interdit / Sens unique", SENS: 2 }),
      brestRow({ DESCRIPTIF: "Zone de rencontre" }),
      brestRow({ DESCRIPTIF: null })
    ]);

    expect(rows.map((row) => row.measure_type_)).toEqual(["speedLimitation", "noEntry"]);
  });

  it("formats the start date at second precision in UTC", () => {
    const rows = computeSavePeriodFields([
      brestRow({ DT_MAT: new Date("2023-06-15T10:30:45.123Z") }),
      brestRow({ DT_MAT: null })
    ]);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      period_start_date: "2023-06-15T10:30:45Z",
      period_end_date: null,
      period_start_time: null,
      period_end_time: null,
      period_recurrence_type: "everyDay",
      period_is_permanent: true
    });
  });

  it("reprojects geometry and drops rows without a usable one", () => {
    const rows = computeSaveLocationFields([
      brestRow({ geometry: '{"type":"Point","coordinates":[150000,6850000]}' }),
      brestRow({ geometry: null }),
      brestRow({ geometry: "not geojson" })
    ]);

    expect(rows).toHaveLength(1);
    expect(rows[0].location_road_type).toBe("rawGeoJSON");
    expect(rows[0].location_label).toBe("Brest – Rue de Siam");
    const geometry: unknown = JSON.parse(rows[0].location_geometry);
    const point = z.object({ type: z.literal("Point"), coordinates: z.tuple([z.number(), z.number()]) }).parse(geometry);
    expect(point.coordinates[0]).toBeGreaterThan(-5);
    expect(point.coordinates[0]).toBeLessThan(-3.5);
    expect(point.coordinates[1]).toBeGreaterThan(48);
    expect(point.coordinates[1]).toBeLessThan(49.5);
  });

  it("titles every row after the first row of its order", () => {
    const rows = computeRegulationFields(
      [
        brestRow({ NOARR: "X", DESCRIPTIF: "Limitation Vitesse", LIBRU: "Rue A" }),
        brestRow({ NOARR: "X", DESCRIPTIF: "Stationnement interdit", LIBRU: "Rue B" }),
        brestRow({ NOARR: "Y", DESCRIPTIF: "Limitation Hauteur", LIBRU: "Rue C" })
      ],
      "draft"
    );

    expect(rows.map((row) => row.regulation_title)).toEqual([
      "Limitation Vitesse – Rue A",
      "Limitation Vitesse – Rue A",
      "Limitation Hauteur – Rue C"
    ]);
    expect(rows[0]).toMatchObject({
      regulation_identifier: "X",
      regulation_status: "draft",
      regulation_category: "permanentRegulation",
      regulation_subject: "other",
      regulation_other_category_text: "Circulation"
    });
  });

  it("restricts heavy vehicles when a weight limit is set", () => {
    const fields = computeVehicleFields(
      brestRow({ POIDS: 3.5, VELO: true, HAUTEUR: 0 }),
      DESCRIPTION_CONFIG["Limitation Poids"]
    );

    expect(fields).toEqual({
      vehicle_all_vehicles: false,
      vehicle_restricted_types: ["heavyGoodsVehicle"],
      vehicle_exempted_types: ["bicycle"],
      vehicle_other_exempted_type_text: "autres véhicules autorisés",
      vehicle_heavyweight_max_weight: 3.5,
      vehicle_max_height: null,
      vehicle_max_width: null
    });
  });

  it("exempts mopeds and bicycles from the row flags", () => {
    const fields = computeVehicleFields(
      brestRow({ CYCLO: true, VELO: true, HAUTEUR: 4.2 }),
      DESCRIPTION_CONFIG["Limitation Hauteur"]
    );

    expect(fields).toMatchObject({
      vehicle_all_vehicles: true,
      vehicle_restricted_types: null,
      vehicle_exempted_types: ["other", "bicycle"],
      vehicle_other_exempted_type_text: "cyclomoteur",
      vehicle_max_height: 4.2
    });
  });

  it("uses the exemptions of the description when it has some", () => {
    const fields = computeVehicleFields(brestRow({ CYCLO: true }), DESCRIPTION_CONFIG["Aire piétonne"]);

    expect(fields.vehicle_exempted_types).toEqual(["bicycle", "emergencyServices"]);
    expect(fields.vehicle_other_exempted_type_text).toBe("autres véhicules autorisés");
  });
});

describe("Brest integration", () => {
  it("turns the layer into clean records", async () => {
    const integration = new FixtureBrestIntegration({ draft: false });

    const { records, stats } = await integration.loadCleanData({ artifactDir: null });

    expect(stats).toEqual({ input_rows: 7, validated_rows: 6, clean_rows: 3 });
    expect(records.map((record) => [record.regulation_identifier, record.measure_type_])).toEqual([
      ["2021-0001", "speedLimitation"],
      ["2021-0001", "parkingProhibited"],
      ["2021-0002", "noEntry"]
    ]);
    expect(records[1]).toMatchObject({
      regulation_title: "Limitation Vitesse – Rue de Siam",
      regulation_status: "published",
      location_label: "Brest – Rue Jean Jaurès",
      period_start_date: "2021-03-04T00:00:00Z"
    });
  });

  it("submits one regulation per order number", async () => {
    const registry = new FakeRegistry();
    const runner = new IntegrationRunner({ registry, organization: "co_brest" });

    const report = await runner.integrate(new FixtureBrestIntegration(), { artifactDir: null });

    expect(report.submitted_identifiers).toEqual(["2021-0001-0", "2021-0002-0"]);
    const [first, second] = registry.added;
    expect(first.title).toBe("Limitation Vitesse – Rue de Siam");
    expect(first.measures.map((measure) => measure.max_speed)).toEqual([30, undefined]);
    expect(second.measures[0].periods).toEqual([
      { start_date: "2022-11-20T00:00:00Z", recurrence_type: "everyDay", is_permanent: true }
    ]);
    expect(second.measures[0].vehicle_set).toEqual({
      all_vehicles: false,
      restricted_types: ["heavyGoodsVehicle"],
      exempted_types: ["bicycle"],
      other_exempted_type_text: "autres véhicules autorisés",
      heavyweight_max_weight: 3.5
    });
  });

  describe("from the published archive", () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("reads the traffic-order layer of the downloaded shapefile", async () => {
      const archive = readFileSync(path.join(fixturesDir, "co_brest", "layer.zip"));
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response(archive, { status: 200 }))
      );
      const integration = new BrestIntegration({ url: "http://source.test/data.zip" });

      const { records, stats } = await integration.loadCleanData({ artifactDir: null });

      expect(stats).toEqual({ input_rows: 2, validated_rows: 2, clean_rows: 2 });
      expect(
        records.map((record) => [record.regulation_identifier, record.measure_type_, record.period_start_date])
      ).toEqual([
        ["2022-0101", "speedLimitation", "2022-03-15T00:00:00Z"],
        ["2022-0102", "noEntry", "2022-04-01T00:00:00Z"]
      ]);
      expect(records[0]).toMatchObject({ measure_max_speed: 30, location_label: "Brest – Rue de Siam" });
      expect(records[1]).toMatchObject({
        location_label: "Brest – Rue de Lyon",
        vehicle_all_vehicles: true,
        vehicle_exempted_types: ["bicycle"],
        vehicle_max_height: 3.5
      });
    });
  });
});
