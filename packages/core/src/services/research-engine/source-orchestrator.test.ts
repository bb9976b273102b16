import { describe, expect, it, vi } from "vitest";
import {
  SourceOrchestrator,
  createSourceOrchestrator,
  type AcademicSource,
  type WebSource,
} from "./source-orchestrator";
import { DEFAULT_CONFIG, type ResearchConfig } from "./config";
import {
  createAcademicRecord,
  createWebRecord,
  type EvidenceRecord,
} from "../../models/evidence-record";
import type {
  PaperSearchProvider,
  SearchProvider,
} from "../../interfaces/search-provider";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function webRecord(url: string): EvidenceRecord {
  return createWebRecord({ title: url, body: `body of ${url}`, url });
}

function paperRecord(title: string): EvidenceRecord {
  return createAcademicRecord({
    title,
    body: `abstract of ${title}`,
    metadata: { citations: 5, authors: [], hasOpenAccess: false },
  });
}

describe("SourceOrchestrator.searchAll", () => {
  it("puts web results before academic results", async () => {
    const web: WebSource = {
      fetch: vi.fn(async (query: string) => {
        await delay(20);
        return [webRecord(`https://web.example/${query}`)];
      }),
    };
    const academic: AcademicSource = {
      fetch: vi.fn(async (query: string) => [paperRecord(query)]),
    };
    const orchestrator = new SourceOrchestrator(web, academic);

    const records = await orchestrator.searchAll(
      { general: ["w1", "w2"], academic: ["a1"] },
      "subject"
    );

    expect(records.map((r) => r.title)).toEqual([
      "https://web.example/w1",
      "https://web.example/w2",
      "a1",
    ]);
    expect(academic.fetch).toHaveBeenCalledWith("a1", "subject");
  });

  it("isolates a failing query from its siblings", async () => {
    const web: WebSource = {
      fetch: vi.fn(async (query: string) => {
        if (query === "broken") {
          throw new Error("socket hang up");
        }
        return [webRecord(`https://web.example/${query}`)];
      }),
    };
    const academic: AcademicSource = {
      fetch: vi.fn(async (): Promise<EvidenceRecord[]> => {
        throw new Error("academic outage");
      }),
    };
    const orchestrator = new SourceOrchestrator(web, academic);

    const records = await orchestrator.searchAll({
      general: ["ok-1", "broken", "ok-2"],
      academic: ["a1", "a2"],
    });

    expect(records.map((r) => r.url)).toEqual([
      "https://web.example/ok-1",
      "https://web.example/ok-2",
    ]);
  });

  it("returns an empty list when everything fails", async () => {
    const failing = {
      fetch: vi.fn(async (): Promise<EvidenceRecord[]> => {
        throw new Error("down");
      }),
    };
    const orchestrator = new SourceOrchestrator(failing, failing);

    await expect(
      orchestrator.searchAll({ general: ["q"], academic: ["q"] })
    ).resolves.toEqual([]);
  });

  it("starts academic queries without waiting for web queries", async () => {
    const started: string[] = [];
    const web: WebSource = {
      fetch: vi.fn(async (query: string) => {
        started.push(query);
        await delay(10);
        return [];
      }),
    };
    const academic: AcademicSource = {
      fetch: vi.fn(async (query: string) => {
        started.push(query);
        return [];
      }),
    };
    const orchestrator = new SourceOrchestrator(web, academic);

    const pending = orchestrator.searchAll({ general: ["w1"], academic: ["a1"] });
    expect(started).toEqual(["w1", "a1"]);
    await pending;
  });
});

describe("createSourceOrchestrator", () => {
  function trackConcurrency() {
    let inFlight = 0;
    let peak = 0;
    return {
      async run<T>(value: T): Promise<T> {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
        return value;
      },
      peak: () => peak,
    };
  }

  it("gates web searches by concurrency and academic searches to one", async () => {
    const webTracker = trackConcurrency();
    const paperTracker = trackConcurrency();

    const webProvider: SearchProvider = {
      search: (query) =>
        webTracker.run({ query, results: [], totalResults: 0 }),
      getName: () => "fake web",
    };
    const paperProvider: PaperSearchProvider = {
      searchPapers: () => paperTracker.run([]),
      getName: () => "fake papers",
    };

    const config: ResearchConfig = {
      ...DEFAULT_CONFIG,
      search: {
        ...DEFAULT_CONFIG.search,
        web: { ...DEFAULT_CONFIG.search.web, concurrency: 2 },
      },
    };
    const orchestrator = createSourceOrchestrator(config, {
      webProvider,
      paperProvider,
    });

    await orchestrator.searchAll({
      general: ["w1", "w2", "w3", "w4", "w5"],
      academic: ["a1", "a2", "a3"],
    });

    expect(webTracker.peak()).toBe(2);
    expect(paperTracker.peak()).toBe(1);
  });

  it("passes result count and locale filters to the web provider", async () => {
    const search = vi.fn(async (query: string) => ({
      query,
      results: [],
      totalResults: 0,
    }));
    const config: ResearchConfig = {
      ...DEFAULT_CONFIG,
      search: {
        ...DEFAULT_CONFIG.search,
        web: { ...DEFAULT_CONFIG.search.web, country: "GB", language: "en" },
      },
    };
    const orchestrator = createSourceOrchestrator(config, {
      webProvider: { search, getName: () => "fake web" },
      paperProvider: { searchPapers: async () => [], getName: () => "fake papers" },
    });

    await orchestrator.searchAll({ general: ["tidal energy"], academic: [] });

    expect(search).toHaveBeenCalledWith("tidal energy", {
      count: 10,
      country: "GB",
      language: "en",
      safesearch: "moderate",
    });
  });
});
