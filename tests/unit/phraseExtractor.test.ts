/**
 * Unit tests for job phrase extraction
 *
 * No network, no side effects
 */

import { describe, it, expect } from "vitest";
import { extractJobPhrases, tokenizeForPhrases } from "@/signal/phrases";

describe("tokenizeForPhrases", () => {
  it("should keep lowercase words of three or more characters minus stopwords", () => {
    expect(tokenizeForPhrases("Go and C# with Kubernetes, 5 years")).toEqual(["kubernetes"]);
  });
});

describe("extractJobPhrases", () => {
  const jobText = "Python developer. Python developer with AWS.";

  it("should rank by frequency, then by length", () => {
    expect(extractJobPhrases(jobText)).toEqual([
      "python developer",
      "developer python developer",
      "python developer python",
      "python developer aws",
      "developer python",
      "developer aws",
      "developer",
      "python",
      "aws",
    ]);
  });

  it("should honor topK", () => {
    expect(extractJobPhrases(jobText, 2)).toEqual([
      "python developer",
      "developer python developer",
    ]);
  });

  it("should return empty list for empty text or non-positive topK", () => {
    expect(extractJobPhrases("")).toEqual([]);
    expect(extractJobPhrases(jobText, 0)).toEqual([]);
  });
});
