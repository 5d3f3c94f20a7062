/**
 * Unit tests for the engine factory
 *
 * Backends are chosen from explicit config; TEI clients are never called.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createEngine } from "@/engine";
import { CapabilityConfigError } from "@/utils/capabilityErrors";
import type { BulletRecord } from "@/types";
import { KeywordEmbedder, TableScorer } from "../helpers/fakeCapabilities";

describe("createEngine", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should use the in-process fallbacks for the local backend", () => {
    const engine = createEngine({ backend: "local" });
    expect(engine.embedder.name).toBe("hashing");
    expect(engine.scorer.name).toBe("lexical");
  });

  it("should fall back per capability when auto has no URLs", () => {
    const engine = createEngine({ config: { timeoutMs: 1000 } });
    expect(engine.embedder.name).toBe("hashing");
    expect(engine.scorer.name).toBe("lexical");
  });

  it("should pick TEI clients when auto has both URLs", () => {
    const engine = createEngine({
      config: {
        embeddingsUrl: "http://tei.test",
        rerankerUrl: "http://rerank.test",
        timeoutMs: 1000,
      },
    });
    expect(engine.embedder.name).toBe("tei-embed");
    expect(engine.scorer.name).toBe("tei-rerank");
  });

  it("should mix TEI and fallback when only one URL is set", () => {
    const engine = createEngine({
      config: { rerankerUrl: "http://rerank.test", timeoutMs: 1000 },
    });
    expect(engine.embedder.name).toBe("hashing");
    expect(engine.scorer.name).toBe("tei-rerank");
  });

  it("should require URLs for the tei backend", () => {
    const build = () => createEngine({ backend: "tei", config: { timeoutMs: 1000 } });
    expect(build).toThrow(CapabilityConfigError);
    expect(build).toThrow("Capability configuration failed: EMBEDDINGS_URL is not set");
  });

  it("should prefer explicit capability overrides", () => {
    const embedder = new KeywordEmbedder(["python"]);
    const scorer = new TableScorer({});
    const engine = createEngine({ backend: "tei", embedder, scorer });

    expect(engine.embedder).toBe(embedder);
    expect(engine.scorer).toBe(scorer);
  });

  it("should rank bullets end to end with the local backend", async () => {
    const engine = createEngine({ backend: "local" });
    const bullets: BulletRecord[] = [
      { bullet: "Built Python services on Kubernetes", lines: 1 },
      { bullet: "Organized team events", lines: 1 },
    ];
    const jobText = "Must have: Python and Kubernetes. Nice to have: Docker.";

    const ranked = await engine.bullets.recommend(bullets, jobText, 2);

    // lexical relevance 2/4 → 50, shifted to 51, plus two must-have boosts
    expect(ranked).toEqual([
      { bullet: bullets[0], score: 91 },
      { bullet: bullets[1], score: 1 },
    ]);
  });

  it("should build a skill recommender for a taxonomy", () => {
    const engine = createEngine({ backend: "local" });
    const skills = engine
      .skillsFor({ Python: ["Languages"], Excel: ["Office"] })
      .recommendSkills("Must have: Python and Kubernetes.");

    expect(skills).toEqual([{ category: "Languages", skills: ["Python"] }]);
  });
});
