/**
 * AI Prompt Configuration
 *
 * Centralized location for all AI prompts used in the research pipeline.
 * Prompts use template placeholders that are filled at runtime.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 *
 * Model and temperature settings come from research-config.yaml.
 */

import type { ModelConfig, ModelStep } from "../research-engine/config";

export interface PromptConfig {
  system: string;
  user: string;
  model: string;
  responseFormat?: "json_object" | "text";
  temperature: number; // 0.0-2.0, lower = more deterministic
  maxOutputTokens?: number;
}

export type ModelSettings = Record<ModelStep, ModelConfig>;

function createPromptConfig(
  modelConfig: ModelConfig,
  system: string,
  user: string,
  responseFormat: PromptConfig["responseFormat"] = "text"
): PromptConfig {
  return {
    system,
    user,
    model: modelConfig.model,
    temperature: modelConfig.temperature,
    maxOutputTokens: modelConfig.maxOutputTokens,
    responseFormat,
  };
}

/**
 * Prompt templates for query set generation
 */
export function getQueryGenerationPrompts(models: ModelSettings): PromptConfig {
  return createPromptConfig(
    models.queryGeneration,
    `You are a research librarian. You write search queries that find substantive sources on a topic: general web queries for articles and reports, and academic queries using the precise terminology found in paper titles and abstracts.`,
    `Generate search queries for the topic: "{{subject}}"

Return ONLY a JSON object with this structure:
{
  "general": ["query1", "query2"],
  "academic": ["query1", "query2"]
}

IMPORTANT:
- You MUST provide exactly {{generalCount}} items in the "general" list.
- You MUST provide exactly {{academicCount}} items in the "academic" list.
- Academic queries go to Semantic Scholar: use precise scientific terminology.
- Every query must be distinct.`,
    "json_object"
  );
}

/**
 * Prompt templates for the yes/no relevance judgment on a paper
 */
export function getRelevanceJudgmentPrompts(
  models: ModelSettings
): PromptConfig {
  return createPromptConfig(
    models.relevanceJudgment,
    `You screen academic papers for a literature review. Answer with a single word: YES or NO.`,
    `Topic: {{subject}}

Paper title: {{title}}

Abstract:
{{abstract}}

Is this paper relevant to the topic? Answer YES or NO.`
  );
}

/**
 * Prompt templates for final report synthesis
 */
export function getReportSynthesisPrompts(models: ModelSettings): PromptConfig {
  return createPromptConfig(
    models.reportSynthesis,
    `You are a research analyst writing evidence-based reports in Markdown. You use only the sources you are given and cite every claim.`,
    `Topic: {{subject}}

Synthesize these {{sourceCount}} sources into a professional research report.

CRITICAL CITATION RULES:
- Cite ONLY by number: (1), (2), etc.
- Reference list must contain EXACTLY entries 1-{{sourceCount}}
- Use APA 7th edition format
- Do NOT add sources outside this list

Sources:
{{sourceList}}

Extracts:
{{payload}}`
  );
}

/**
 * Helper function to replace template placeholders
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    rendered = rendered.split(`{{${key}}}`).join(String(value));
  }
  return rendered;
}
