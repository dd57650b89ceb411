import { describe, it, expect, vi, afterEach } from "vitest";
import {
  CollaboratorPermanentError,
  CollaboratorTransientError,
  RateLimitedError,
} from "@papertrail/errors";
import { createEmbeddingProvider } from "./factory.js";
import { TeiEmbeddingProvider } from "./tei-provider.js";

function jsonResponse(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

describe("createEmbeddingProvider factory", () => {
  it("creates CohereEmbeddingProvider for type 'cohere'", () => {
    const provider = createEmbeddingProvider({
      provider: "cohere",
      cohere: { apiKey: "test-key" },
    });
    expect(provider.name).toBe("cohere");
    expect(provider.dimensions).toBe(1024);
    expect(provider.embedDocuments).toBeTypeOf("function");
    expect(provider.embedQuery).toBeTypeOf("function");
  });

  it("creates TeiEmbeddingProvider for type 'tei'", () => {
    const provider = createEmbeddingProvider({
      provider: "tei",
      tei: { baseUrl: "http://localhost:8080" },
    });
    expect(provider.name).toBe("tei");
    expect(provider.dimensions).toBe(384);
  });

  it("respects custom dimensions", () => {
    const provider = createEmbeddingProvider({
      provider: "cohere",
      cohere: { apiKey: "test-key", dimensions: 256 },
    });
    expect(provider.dimensions).toBe(256);
  });

  it("throws for missing provider config", () => {
    expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
      "Cohere config is required",
    );
    expect(() => createEmbeddingProvider({ provider: "tei" })).toThrow("TEI config is required");
  });

  it("throws for unknown provider", () => {
    expect(() => createEmbeddingProvider({ provider: "unknown" as "cohere" })).toThrow(
      "Unknown embedding provider",
    );
  });
});

describe("TeiEmbeddingProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts texts to /embed and returns vectors in order", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse([
        [0.1, 0.2],
        [0.3, 0.4],
      ]),
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = new TeiEmbeddingProvider({ baseUrl: "http://tei.local/", dimensions: 2 });
    const result = await provider.embedDocuments(["first", "second"]);

    expect(result).toEqual({
      embeddings: [
        [0.1, 0.2],
        [0.3, 0.4],
      ],
      model: "tei",
      tokensUsed: 0,
      dimensions: 2,
    });
    expect(fetchMock).toHaveBeenCalledWith(
      "http://tei.local/embed",
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify({ inputs: ["first", "second"], normalize: true, truncate: true }),
      }),
    );
  });

  it("maps 429 to RateLimitedError with Retry-After", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response("busy", {
          status: 429,
          statusText: "Too Many Requests",
          headers: { "retry-after": "3" },
        }),
      ),
    );

    const error: unknown = await new TeiEmbeddingProvider({ baseUrl: "http://tei.local" })
      .embedQuery("q")
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError ? error.retryAfter : undefined).toBe(3);
  });

  it("maps 503 to a transient error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("down", { status: 503 })));

    await expect(
      new TeiEmbeddingProvider({ baseUrl: "http://tei.local" }).embedQuery("q"),
    ).rejects.toBeInstanceOf(CollaboratorTransientError);
  });

  it("maps network failures to a transient error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    await expect(
      new TeiEmbeddingProvider({ baseUrl: "http://tei.local" }).embedQuery("q"),
    ).rejects.toThrow("tei: fetch failed");
  });

  it("rejects malformed responses as permanent", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ error: "nope" })));

    await expect(
      new TeiEmbeddingProvider({ baseUrl: "http://tei.local" }).embedQuery("q"),
    ).rejects.toBeInstanceOf(CollaboratorPermanentError);
  });

  it("rejects a non-JSON body as permanent", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("<html>bad gateway</html>", { status: 200 })),
    );

    const result = new TeiEmbeddingProvider({ baseUrl: "http://tei.local" }).embedQuery("q");

    await expect(result).rejects.toBeInstanceOf(CollaboratorPermanentError);
    await expect(result).rejects.toThrow("tei: response is not JSON");
  });

  it("reports health from /health", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("ok", { status: 200 })));
    await expect(
      new TeiEmbeddingProvider({ baseUrl: "http://tei.local" }).healthCheck(),
    ).resolves.toBe(true);

    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("refused")));
    await expect(
      new TeiEmbeddingProvider({ baseUrl: "http://tei.local" }).healthCheck(),
    ).resolves.toBe(false);
  });
});
