import { beforeEach, describe, expect, it, vi } from "vitest";

import { dot, fnv1a32, HashingEmbeddingProvider, l2Normalize, OpenAIEmbeddingProvider, tokenize } from "./embedder.js";
import { ProviderError } from "./errors.js";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", () => {
  class APIError extends Error {
    status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  class OpenAI {
    static APIError = APIError;
    embeddings = { create };
  }
  return { default: OpenAI };
});

describe("vector helpers", () => {
  it("normalizes to unit length", () => {
    const [x, y] = l2Normalize([3, 4]);
    expect(x).toBeCloseTo(0.6, 9);
    expect(y).toBeCloseTo(0.8, 9);
  });

  it("leaves the zero vector at zero", () => {
    expect(l2Normalize([0, 0, 0])).toEqual([0, 0, 0]);
  });

  it("computes dot products", () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
  });

  it("hashes with 32-bit FNV-1a", () => {
    expect(fnv1a32("")).toBe(0x811c9dc5);
    expect(fnv1a32("a")).toBe(0xe40c292c);
  });

  it("tokenizes on letters and digits after NFKC folding", () => {
    expect(tokenize("Hello, World! ２０２４ café")).toEqual(["hello", "world", "2024", "café"]);
  });
});

describe("HashingEmbeddingProvider", () => {
  const embedder = new HashingEmbeddingProvider(64);

  it("is deterministic", async () => {
    expect(await embedder.embedText("Paris is in France")).toEqual(await embedder.embedText("Paris is in France"));
  });

  it("puts one token in one signed bucket", async () => {
    const vec = await embedder.embedText("Paris");
    expect(vec).toHaveLength(64);
    const nonZero = vec.filter((v) => v !== 0);
    expect(nonZero).toHaveLength(1);
    expect(Math.abs(nonZero[0])).toBe(1);
  });

  it("ignores case and punctuation", async () => {
    expect(await embedder.embedText("PARIS!")).toEqual(await embedder.embedText("paris"));
  });

  it("embeds batches in order", async () => {
    const [a, b] = await embedder.embedTexts(["alpha", "beta"]);
    expect(a).toEqual(await embedder.embedText("alpha"));
    expect(b).toEqual(await embedder.embedText("beta"));
  });

  it("rejects an invalid dimension", () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow(/dimension/);
  });
});

describe("OpenAIEmbeddingProvider", () => {
  beforeEach(() => {
    create.mockReset();
  });

  it("batches requests and orders rows by index", async () => {
    create
      .mockResolvedValueOnce({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] }
        ]
      })
      .mockResolvedValueOnce({ data: [{ index: 0, embedding: [1, 1] }] });

    const provider = new OpenAIEmbeddingProvider({ apiKey: "test-secret", model: "embed-test", batchSize: 2 });
    const vectors = await provider.embedTexts(["one", "two", "three"]);

    expect(vectors).toEqual([[1, 0], [0, 1], [1, 1]]);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create).toHaveBeenNthCalledWith(1, { model: "embed-test", input: ["one", "two"] });
    expect(create).toHaveBeenNthCalledWith(2, { model: "embed-test", input: ["three"] });
  });

  it("wraps client failures in ProviderError", async () => {
    create.mockRejectedValueOnce(new Error("connection reset"));
    const provider = new OpenAIEmbeddingProvider({ apiKey: "test-secret", model: "embed-test" });

    const err = await provider.embedText("hello").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ message: "Embedding request failed", providerStatus: 0, detail: "connection reset" });
  });

  it("fails when the provider drops rows", async () => {
    create.mockResolvedValueOnce({ data: [{ index: 0, embedding: [1] }] });
    const provider = new OpenAIEmbeddingProvider({ apiKey: "test-secret", model: "embed-test" });
    await expect(provider.embedTexts(["a", "b"])).rejects.toBeInstanceOf(ProviderError);
  });
});
