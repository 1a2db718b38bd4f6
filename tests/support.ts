import type { RegistryResponse, RegulationRegistry } from "../src/registry/registry";
import type { RegulationDto } from "../src/registry/models";
import type { CleanRecord } from "../src/validation/flatRecordSchema";

export const TEST_GEOMETRY = '{"type":"Point","coordinates":[-4.486,48.39]}';

export function cleanRecord(overrides: Partial<CleanRecord> = {}): CleanRecord {
  return {
    regulation_identifier: "A",
    regulation_status: "draft",
    regulation_category: "permanentRegulation",
    regulation_subject: "other",
    regulation_title: "Title A",
    regulation_other_category_text: "Circulation",
    measure_type_: "noEntry",
    measure_max_speed: null,
    location_road_type: "rawGeoJSON",
    location_label: "Rue A",
    location_geometry: TEST_GEOMETRY,
    period_start_date: "2023-01-01T00:00:00Z",
    period_end_date: null,
    period_start_time: null,
    period_end_time: null,
    period_recurrence_type: "everyDay",
    period_is_permanent: true,
    ...overrides
  };
}

/** In-memory registry: accepted regulations become known identifiers. */
export class FakeRegistry implements RegulationRegistry {
  known: string[];
  added: RegulationDto[] = [];
  publishAttempts: string[] = [];
  listError: Error | null = null;
  rejectAdd = new Map<string, RegistryResponse>();
  throwOnAdd = new Map<string, Error>();
  rejectPublish = new Map<string, RegistryResponse>();
  throwOnPublish = new Map<string, Error>();

  constructor(known: string[] = []) {
    this.known = [...known];
  }

  async listIdentifiers(): Promise<string[]> {
    if (this.listError) throw this.listError;
    return [...this.known];
  }

  async addRegulation(regulation: RegulationDto): Promise<RegistryResponse> {
    const thrown = this.throwOnAdd.get(regulation.identifier);
    if (thrown) throw thrown;
    const rejected = this.rejectAdd.get(regulation.identifier);
    if (rejected) return rejected;
    this.added.push(regulation);
    this.known.push(regulation.identifier);
    return { ok: true, status: 201, body: "" };
  }

  async publishRegulation(identifier: string): Promise<RegistryResponse> {
    this.publishAttempts.push(identifier);
    const thrown = this.throwOnPublish.get(identifier);
    if (thrown) throw thrown;
    return this.rejectPublish.get(identifier) ?? { ok: true, status: 200, body: "" };
  }
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
