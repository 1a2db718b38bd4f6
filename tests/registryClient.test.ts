import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpRegistryClient } from "../src/registry/client";
import type { RegulationDto } from "../src/registry/models";

const client = new HttpRegistryClient({
  baseUrl: "http://registry.test/",
  clientId: "test-client",
  clientSecret: "test-secret"
});

const regulation: RegulationDto = {
  identifier: "2021-0001-0",
  category: "permanentRegulation",
  status: "published",
  subject: "other",
  title: "Limitation Vitesse – Rue de Siam",
  other_category_text: "Circulation",
  measures: []
};

function stubFetch(status: number, body: string) {
  const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("HTTP registry client", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("lists known identifiers with client credentials", async () => {
    const fetchMock = stubFetch(200, JSON.stringify({ identifiers: ["A-0", "B-0"] }));

    await expect(client.listIdentifiers()).resolves.toEqual(["A-0", "B-0"]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://registry.test/api/regulations/identifiers");
    expect(init).toMatchObject({
      method: "GET",
      headers: {
        "X-Client-Id": "test-client",
        "X-Client-Secret": "test-secret",
        Accept: "application/json"
      }
    });
  });

  it("fails the identifier snapshot on a non-200 status", async () => {
    stubFetch(500, "boom");

    await expect(client.listIdentifiers()).rejects.toThrow("Registry identifiers request failed (500): boom");
  });

  it("fails the identifier snapshot on an unexpected body", async () => {
    stubFetch(200, JSON.stringify({ items: [] }));

    await expect(client.listIdentifiers()).rejects.toThrow("Unexpected registry identifiers response shape");
  });

  it("posts a regulation as JSON", async () => {
    const fetchMock = stubFetch(201, "");

    await expect(client.addRegulation(regulation)).resolves.toEqual({ ok: true, status: 201, body: "" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://registry.test/api/regulations");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ "Content-Type": "application/json" });
    expect(init?.body).toBe(JSON.stringify(regulation));
  });

  it("reports a rejected regulation without throwing", async () => {
    stubFetch(400, '{"detail":"invalid geometry"}');

    await expect(client.addRegulation(regulation)).resolves.toEqual({
      ok: false,
      status: 400,
      body: '{"detail":"invalid geometry"}'
    });
  });

  it("only accepts 201 for a creation", async () => {
    stubFetch(200, "");

    const response = await client.addRegulation(regulation);

    expect(response.ok).toBe(false);
  });

  it("publishes by escaped identifier", async () => {
    const fetchMock = stubFetch(200, "");

    await expect(client.publishRegulation("A/1")).resolves.toEqual({ ok: true, status: 200, body: "" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://registry.test/api/regulations/A%2F1/publish");
    expect(init?.method).toBe("PUT");
  });
});
