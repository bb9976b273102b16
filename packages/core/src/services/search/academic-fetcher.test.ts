import { describe, expect, it, vi } from "vitest";
import pLimit from "p-limit";
import { AcademicFetcher } from "./academic-fetcher";
import type {
  PaperResultItem,
  PaperSearchProvider,
} from "../../interfaces/search-provider";
import type { TextFetcher } from "../page-fetcher";
import { RelevanceGate } from "../filters/relevance-gate";
import { HttpStatusError } from "../../utils/errors";

const LONG_ABSTRACT = "Wetland restoration changes nutrient retention. ".repeat(5);

function paper(overrides: Partial<PaperResultItem> = {}): PaperResultItem {
  return {
    title: "Wetland Study",
    abstract: LONG_ABSTRACT,
    url: "https://papers.example/wetland",
    year: 2021,
    venue: "Ecology Letters",
    citationCount: 12,
    authors: ["A. Author", "B. Author"],
    hasOpenAccess: false,
    ...overrides,
  };
}

function providerReturning(papers: PaperResultItem[]): PaperSearchProvider {
  return {
    searchPapers: vi.fn(async () => papers),
    getName: () => "Semantic Scholar",
  };
}

function createFetcher(
  provider: PaperSearchProvider,
  options: { pages?: TextFetcher; judgeAnswer?: string } = {}
) {
  const sleep = vi.fn(async (_ms: number) => {});
  const generateRelevanceJudgment = vi.fn(async () => options.judgeAnswer ?? "YES");
  const pages = options.pages ?? { fetchText: vi.fn(async () => "") };
  const fetcher = new AcademicFetcher({
    provider,
    pages,
    gate: pLimit(1),
    relevanceGate: new RelevanceGate({ generateRelevanceJudgment }),
    resultsPerQuery: 20,
    maxAttempts: 5,
    backoffBaseMs: 1000,
    minCitationCount: 3,
    abstractMinLength: 200,
    sleep,
  });
  return { fetcher, sleep, generateRelevanceJudgment, pages };
}

describe("AcademicFetcher", () => {
  it("builds a record with full metadata", async () => {
    const { fetcher } = createFetcher(providerReturning([paper()]));

    const [record] = await fetcher.fetch("wetlands", "wetland restoration");

    expect(record).toEqual({
      sourceKind: "academic",
      title: "Wetland Study",
      body: LONG_ABSTRACT,
      url: "https://papers.example/wetland",
      abstract: LONG_ABSTRACT,
      metadata: {
        year: 2021,
        venue: "Ecology Letters",
        citations: 12,
        authors: ["A. Author", "B. Author"],
        hasOpenAccess: false,
      },
    });
  });

  it("excludes a paper with 2 citations even when judged relevant", async () => {
    const { fetcher } = createFetcher(
      providerReturning([
        paper({ title: "Cited twice", citationCount: 2 }),
        paper({ title: "Cited often", citationCount: 10 }),
      ]),
      { judgeAnswer: "YES" }
    );

    const records = await fetcher.fetch("wetlands", "wetland restoration");
    expect(records.map((r) => r.title)).toEqual(["Cited often"]);
  });

  it("treats a missing citation count as zero", async () => {
    const { fetcher } = createFetcher(
      providerReturning([paper({ citationCount: undefined })])
    );
    await expect(fetcher.fetch("wetlands")).resolves.toEqual([]);
  });

  it("drops papers judged not relevant", async () => {
    const { fetcher, generateRelevanceJudgment } = createFetcher(
      providerReturning([paper()]),
      { judgeAnswer: "NO" }
    );

    await expect(fetcher.fetch("wetlands", "wetland restoration")).resolves.toEqual([]);
    expect(generateRelevanceJudgment).toHaveBeenCalledTimes(1);
  });

  it("skips the relevance judge when no subject is given", async () => {
    const { fetcher, generateRelevanceJudgment } = createFetcher(
      providerReturning([paper()]),
      { judgeAnswer: "NO" }
    );

    const records = await fetcher.fetch("wetlands");
    expect(records).toHaveLength(1);
    expect(generateRelevanceJudgment).not.toHaveBeenCalled();
  });

  it("uses a long abstract without fetching full text", async () => {
    const { fetcher, pages } = createFetcher(providerReturning([paper()]));

    await fetcher.fetch("wetlands");
    expect(pages.fetchText).not.toHaveBeenCalled();
  });

  it("fetches the open access pdf when the abstract is missing", async () => {
    const fetchText = vi.fn(async () => "Full text recovered from the open access PDF.");
    const { fetcher } = createFetcher(
      providerReturning([
        paper({
          abstract: undefined,
          url: undefined,
          openAccessPdfUrl: "http://example.com/paper.pdf",
          hasOpenAccess: true,
        }),
      ]),
      { pages: { fetchText } }
    );

    const [record] = await fetcher.fetch("wetlands");

    expect(fetchText).toHaveBeenCalledWith("http://example.com/paper.pdf");
    expect(record.body).toBe("Full text recovered from the open access PDF.");
    expect(record.url).toBe("http://example.com/paper.pdf");
    expect(record.abstract).toBeUndefined();
  });

  it("keeps a short abstract when the full text is not longer", async () => {
    const fetchText = vi.fn(async () => "tiny");
    const { fetcher } = createFetcher(
      providerReturning([paper({ abstract: "A short abstract." })]),
      { pages: { fetchText } }
    );

    const [record] = await fetcher.fetch("wetlands");

    expect(fetchText).toHaveBeenCalledWith("https://papers.example/wetland");
    expect(record.body).toBe("A short abstract.");
  });

  it("prefers longer full text over a short abstract", async () => {
    const fullText = "Complete manuscript text. ".repeat(10);
    const { fetcher } = createFetcher(
      providerReturning([paper({ abstract: "A short abstract." })]),
      { pages: { fetchText: vi.fn(async () => fullText) } }
    );

    const [record] = await fetcher.fetch("wetlands");
    expect(record.body).toBe(fullText);
    expect(record.abstract).toBe("A short abstract.");
  });

  it("falls back to the placeholder with no abstract and no url", async () => {
    const { fetcher, pages } = createFetcher(
      providerReturning([paper({ abstract: undefined, url: undefined, title: undefined })])
    );

    const [record] = await fetcher.fetch("wetlands");

    expect(pages.fetchText).not.toHaveBeenCalled();
    expect(record.body).toBe("Abstract not available.");
    expect(record.title).toBe("No Title");
    expect(record.url).toBe("");
  });

  it("retries 429 with exponential backoff", async () => {
    const searchPapers = vi
      .fn<() => Promise<PaperResultItem[]>>()
      .mockRejectedValueOnce(new HttpStatusError(429, "https://api.example"))
      .mockRejectedValueOnce(new HttpStatusError(429, "https://api.example"))
      .mockResolvedValueOnce([paper()]);
    const { fetcher, sleep } = createFetcher({
      searchPapers,
      getName: () => "Semantic Scholar",
    });

    const records = await fetcher.fetch("wetlands");

    expect(records).toHaveLength(1);
    expect(searchPapers).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("stops after five attempts", async () => {
    const searchPapers = vi.fn(async (): Promise<PaperResultItem[]> => {
      throw new HttpStatusError(429, "https://api.example");
    });
    const { fetcher } = createFetcher({
      searchPapers,
      getName: () => "Semantic Scholar",
    });

    await expect(fetcher.fetch("wetlands")).resolves.toEqual([]);
    expect(searchPapers).toHaveBeenCalledTimes(5);
  });

  it("retries server errors and timeouts", async () => {
    const timeout = Object.assign(new Error("The operation was aborted"), {
      name: "AbortError",
    });
    const searchPapers = vi
      .fn<() => Promise<PaperResultItem[]>>()
      .mockRejectedValueOnce(new HttpStatusError(503, "https://api.example"))
      .mockRejectedValueOnce(timeout)
      .mockResolvedValueOnce([paper()]);
    const { fetcher, sleep } = createFetcher({
      searchPapers,
      getName: () => "Semantic Scholar",
    });

    const records = await fetcher.fetch("wetlands");

    expect(records).toHaveLength(1);
    expect(searchPapers).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("does not retry client errors", async () => {
    const searchPapers = vi.fn(async (): Promise<PaperResultItem[]> => {
      throw new HttpStatusError(400, "https://api.example");
    });
    const { fetcher, sleep } = createFetcher({
      searchPapers,
      getName: () => "Semantic Scholar",
    });

    await expect(fetcher.fetch("wetlands")).resolves.toEqual([]);
    expect(searchPapers).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
