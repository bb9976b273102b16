/**
 * OpenAI Provider Implementation
 *
 * Owns an explicit OpenAI client built from the credential it is given.
 * Rotating the key means constructing a new provider.
 */

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type {
  LLMProvider,
  SynthesizedReport,
} from "../../interfaces/llm-provider";
import type { QueryCounts, QuerySet } from "../../models/query-set";
import type { EvidenceRecord } from "../../models/evidence-record";
import { DEFAULT_CONFIG } from "../research-engine/config";
import {
  getQueryGenerationPrompts,
  getRelevanceJudgmentPrompts,
  getReportSynthesisPrompts,
  renderPrompt,
  type ModelSettings,
  type PromptConfig,
} from "./prompts";
import { normalizeQuerySet } from "./query-set";
import {
  assignReferenceNumbers,
  formatPayload,
  formatSourceList,
} from "./synthesis";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "openai-provider" });

/**
 * OpenAI implementation of LLMProvider
 */
export class OpenAIProvider implements LLMProvider {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly models: ModelSettings = DEFAULT_CONFIG.llm.models
  ) {
    if (!apiKey) {
      throw new Error("OpenAI API key is required");
    }
    this.client = new OpenAI({ apiKey });
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "openai";
  }

  private async complete(
    prompt: PromptConfig,
    variables: Record<string, string | number>
  ): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: prompt.system },
      { role: "user", content: renderPrompt(prompt.user, variables) },
    ];

    const response = await this.client.chat.completions.create({
      model: prompt.model,
      temperature: prompt.temperature,
      max_tokens: prompt.maxOutputTokens,
      messages,
      ...(prompt.responseFormat === "json_object"
        ? { response_format: { type: "json_object" as const } }
        : {}),
    });

    return response.choices[0]?.message?.content ?? "";
  }

  /**
   * Generate the general and academic query lists for a subject
   */
  async generateQuerySet(
    subject: string,
    counts: QueryCounts
  ): Promise<QuerySet> {
    const text = await this.complete(getQueryGenerationPrompts(this.models), {
      subject,
      generalCount: counts.general,
      academicCount: counts.academic,
    });
    return normalizeQuerySet(text, subject, counts);
  }

  async generateRelevanceJudgment(
    subject: string,
    title: string,
    abstract: string
  ): Promise<string> {
    const text = await this.complete(getRelevanceJudgmentPrompts(this.models), {
      subject,
      title,
      abstract,
    });
    return text.trim();
  }

  /**
   * Write the report from the final record list
   */
  async synthesizeReport(
    subject: string,
    records: EvidenceRecord[]
  ): Promise<SynthesizedReport> {
    assignReferenceNumbers(records);

    const markdown = await this.complete(
      getReportSynthesisPrompts(this.models),
      {
        subject,
        sourceCount: records.length,
        sourceList: formatSourceList(records),
        payload: formatPayload(records),
      }
    );

    log.info({ sources: records.length, chars: markdown.length }, "Report synthesized");
    return { markdown, sourceCount: records.length };
  }
}
