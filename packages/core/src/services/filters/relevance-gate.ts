/**
 * Relevance gate
 *
 * Yes/no topical relevance for academic papers, delegated to an LLM judge.
 * An empty abstract is rejected before the judge is ever called.
 */

import { createChildLogger } from "../../utils/logger";
import { describeError } from "../../utils/errors";

const log = createChildLogger({ component: "relevance-gate" });

/**
 * Anything that can answer a relevance question with free text
 */
export interface RelevanceJudge {
  generateRelevanceJudgment(
    subject: string,
    title: string,
    abstract: string
  ): Promise<string>;
}

const AFFIRMATIVE = /yes/i;

export class RelevanceGate {
  constructor(private readonly judge: RelevanceJudge) {}

  async isRelevant(
    subject: string,
    title: string,
    abstract?: string
  ): Promise<boolean> {
    if (!abstract || !abstract.trim()) {
      return false;
    }

    try {
      const response = await this.judge.generateRelevanceJudgment(
        subject,
        title,
        abstract
      );
      return AFFIRMATIVE.test(response);
    } catch (error) {
      log.warn(
        { title, error: describeError(error) },
        "Relevance judgment failed, treating paper as not relevant"
      );
      return false;
    }
  }
}
