/**
 * Researcher runner
 *
 * Runs one research pipeline for a subject and prints the report followed
 * by the bibliometrics summary.
 *
 * Usage:
 *   npm run research -- "<subject>" [--general=N] [--academic=N]
 *
 * Environment variables required:
 *   OPENAI_API_KEY
 *   BRAVE_SEARCH_API_KEY
 * Optional:
 *   SEMANTIC_SCHOLAR_API_KEY, LOG_LEVEL, CONCURRENCY, MAX_TOKENS_PER_URL,
 *   MAX_SNIPPETS_TO_KEEP, MIN_CITATION_COUNT, USER_AGENT
 */

// Load environment variables
import * as dotenv from "dotenv";
dotenv.config();

import {
  ConfigurationError,
  type Credentials,
  createChildLogger,
  createProviders,
  createSourceOrchestrator,
  describeError,
  executeResearch,
  generateBibliometrics,
  loadConfig,
  loadCredentials,
} from "harvester-core";
import { CliUsageError, USAGE, parseCliArgs, type CliArgs } from "./cli-args";

const log = createChildLogger({ component: "researcher" });

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`\n✗ Error: ${error.message}\n`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  const config = loadConfig();

  let credentials: Credentials;
  try {
    credentials = loadCredentials();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`\n✗ Error: ${error.message}\n`);
      console.error("Please set these in your .env file.\n");
      return 1;
    }
    throw error;
  }

  const providers = createProviders(config, credentials);
  const sources = createSourceOrchestrator(config, {
    webProvider: providers.search,
    paperProvider: providers.papers,
    relevanceJudge: providers.llm,
  });

  // Ctrl+C stops the run at the next stage boundary
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("\nStopping after the current stage...");
    controller.abort();
  });

  console.log("\n" + "=".repeat(60));
  console.log("  RESEARCH RUN");
  console.log("=".repeat(60) + "\n");
  console.log(`Subject:   ${args.subject}`);
  console.log(`LLM:       ${providers.llm.getName()}`);
  console.log(`Sources:   ${providers.search.getName()} + ${providers.papers.getName()}\n`);

  const result = await executeResearch(args.subject, {
    llmProvider: providers.llm,
    sources,
    config,
    counts: { general: args.general, academic: args.academic },
    signal: controller.signal,
  });

  if (result.status === "failed") {
    console.error(`\n✗ Research failed during ${result.stage}: ${result.error}\n`);
    return 1;
  }

  if (result.status === "cancelled") {
    console.log(`\nResearch stopped before ${result.stage}.\n`);
    return 130;
  }

  console.log(result.report?.markdown || "No evidence survived filtering.");
  console.log("");
  console.log(generateBibliometrics(result.records));
  console.log(`\n✓ Completed in ${(result.durationMs / 1000).toFixed(1)}s\n`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error({ error: describeError(error) }, "Researcher crashed");
    process.exitCode = 1;
  });
