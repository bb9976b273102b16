/**
 * QuerySet data model
 *
 * The ordered general-web and academic query lists that drive fan-out.
 * Each query becomes one fetch task.
 */

export interface QuerySet {
  general: string[];
  academic: string[];
}

export interface QueryCounts {
  general: number;
  academic: number;
}
