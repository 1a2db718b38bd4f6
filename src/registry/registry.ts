import type { RegulationDto } from "./models";

export interface RegistryResponse {
  ok: boolean;
  status: number;
  body: string;
}

export interface RegulationRegistry {
  listIdentifiers(): Promise<string[]>;
  addRegulation(regulation: RegulationDto): Promise<RegistryResponse>;
  publishRegulation(identifier: string): Promise<RegistryResponse>;
}
