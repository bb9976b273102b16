import { describe, expect, it, vi } from "vitest";
import pLimit from "p-limit";
import { WebFetcher } from "./web-fetcher";
import { createBraveSearchProvider } from "./brave-provider";
import type { TextFetcher } from "../page-fetcher";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function rateLimited(): Response {
  return new Response("Too Many Requests", { status: 429 });
}

function braveResults(results: Array<Record<string, string>>): Response {
  return jsonResponse({ web: { results } });
}

function pagesReturning(bodies: Record<string, string>): TextFetcher {
  return { fetchText: vi.fn(async (url: string) => bodies[url] ?? "") };
}

function createFetcher(
  searchFetch: typeof fetch,
  pages: TextFetcher,
  maxRetries = 3
) {
  const sleep = vi.fn(async (_ms: number) => {});
  const fetcher = new WebFetcher({
    provider: createBraveSearchProvider("test-brave-key", searchFetch),
    pages,
    gate: pLimit(5),
    maxRetries,
    backoffBaseMs: 1000,
    sleep,
  });
  return { fetcher, sleep };
}

describe("WebFetcher", () => {
  it("backs off exponentially on 429 and succeeds on the third call", async () => {
    const searchFetch = vi
      .fn<() => Promise<Response>>()
      .mockResolvedValueOnce(rateLimited())
      .mockResolvedValueOnce(rateLimited())
      .mockResolvedValueOnce(
        braveResults([
          { title: "Aquifers", url: "https://a.example/1", description: "About aquifers" },
        ])
      );
    const pages = pagesReturning({ "https://a.example/1": "Aquifer page body" });
    const { fetcher, sleep } = createFetcher(searchFetch, pages);

    const records = await fetcher.fetch("aquifer depletion");

    expect(searchFetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(records).toEqual([
      {
        sourceKind: "web",
        title: "Aquifers",
        body: "Aquifer page body",
        url: "https://a.example/1",
        metadata: { description: "About aquifers" },
      },
    ]);
  });

  it("returns nothing once the retry budget is spent", async () => {
    const searchFetch = vi.fn(async () => rateLimited());
    const { fetcher, sleep } = createFetcher(searchFetch, pagesReturning({}));

    await expect(fetcher.fetch("aquifer depletion")).resolves.toEqual([]);
    expect(searchFetch).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  it("does not retry a client error", async () => {
    const searchFetch = vi.fn(async () => new Response("Forbidden", { status: 403 }));
    const { fetcher, sleep } = createFetcher(searchFetch, pagesReturning({}));

    await expect(fetcher.fetch("aquifer depletion")).resolves.toEqual([]);
    expect(searchFetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("sends the query and the subscription token", async () => {
    const searchFetch = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) => braveResults([])
    );
    const { fetcher } = createFetcher(searchFetch, pagesReturning({}));

    await fetcher.fetch("river deltas");

    const [input, init] = searchFetch.mock.calls[0];
    const url = new URL(String(input));
    expect(url.searchParams.get("q")).toBe("river deltas");
    expect(url.searchParams.get("count")).toBe("10");
    expect(new Headers(init?.headers).get("X-Subscription-Token")).toBe("test-brave-key");
  });

  it("keeps result order, drops empty bodies and defaults the title", async () => {
    const searchFetch = vi.fn(async () =>
      braveResults([
        { title: "First", url: "https://a.example/1" },
        { title: "Empty", url: "https://a.example/2" },
        { title: "No link", url: "" },
        { url: "https://a.example/3" },
      ])
    );
    const fetchText = vi.fn(async (url: string) => {
      if (url.endsWith("/1")) {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return "first body";
      }
      return url.endsWith("/3") ? "third body" : "";
    });
    const { fetcher } = createFetcher(searchFetch, { fetchText });

    const records = await fetcher.fetch("query");

    expect(records.map((r) => [r.title, r.body])).toEqual([
      ["First", "first body"],
      ["No Title", "third body"],
    ]);
    expect(fetchText).toHaveBeenCalledTimes(3);
  });
});
