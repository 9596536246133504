import type { ComplexityAnalysis } from './types.js';

/** Raised inside the analyzer; never surfaced to callers, who get an `unknown` analysis instead. */
export class AnalyzerError extends Error {
  readonly code = 'complexity_analyzer_error';
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AnalyzerError';
    this.details = details;
  }
}

export type QueryTooComplexPayload = {
  code: 'QUERY_TOO_COMPLEX';
  message: string;
  score: number;
  cost: number;
  limit: number;
  suggestions: string[];
};

export class QueryTooComplexError extends Error {
  readonly code = 'QUERY_TOO_COMPLEX';
  readonly score: number;
  readonly cost: number;
  readonly limit: number;
  readonly suggestions: readonly string[];

  constructor(analysis: ComplexityAnalysis, limit: number, suggestions: readonly string[]) {
    super(`Query is too complex (score ${analysis.normalizedScore} exceeds limit ${limit})`);
    this.name = 'QueryTooComplexError';
    this.score = analysis.normalizedScore;
    this.cost = analysis.cost;
    this.limit = limit;
    this.suggestions = suggestions;
  }

  toPayload(): QueryTooComplexPayload {
    return {
      code: this.code,
      message: this.message,
      score: this.score,
      cost: this.cost,
      limit: this.limit,
      suggestions: [...this.suggestions],
    };
  }
}
