import { IdentifierListSchema, RegulationDto } from "./models";
import { RegistryResponse, RegulationRegistry } from "./registry";

export interface HttpRegistryConfig {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
}

export class HttpRegistryClient implements RegulationRegistry {
  private baseUrl: string;
  private headers: Record<string, string>;

  constructor(config: HttpRegistryConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.headers = {
      "X-Client-Id": config.clientId,
      "X-Client-Secret": config.clientSecret,
      Accept: "application/json"
    };
  }

  async listIdentifiers(): Promise<string[]> {
    const response = await fetch(`${this.baseUrl}/api/regulations/identifiers`, {
      method: "GET",
      headers: this.headers
    });

    if (response.status !== 200) {
      const errorText = await response.text();
      throw new Error(`Registry identifiers request failed (${response.status}): ${errorText}`);
    }

    const parsed = IdentifierListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Unexpected registry identifiers response shape");
    }
    return parsed.data.identifiers;
  }

  async addRegulation(regulation: RegulationDto): Promise<RegistryResponse> {
    const response = await fetch(`${this.baseUrl}/api/regulations`, {
      method: "POST",
      headers: { ...this.headers, "Content-Type": "application/json" },
      body: JSON.stringify(regulation)
    });
    return toRegistryResponse(response, 201);
  }

  async publishRegulation(identifier: string): Promise<RegistryResponse> {
    const response = await fetch(
      `${this.baseUrl}/api/regulations/${encodeURIComponent(identifier)}/publish`,
      { method: "PUT", headers: this.headers }
    );
    return toRegistryResponse(response, 200);
  }
}

async function toRegistryResponse(response: Response, expected: number): Promise<RegistryResponse> {
  return {
    ok: response.status === expected,
    status: response.status,
    body: await response.text()
  };
}
