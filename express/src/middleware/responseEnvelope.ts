import type { NextFunction, Request, Response } from 'express';
import type { AdmittedDecision, AnalysisMethod } from '@querygate/core';

export const COMPLEXITY_WARNING_HEADER = 'X-Query-Complexity-Warning';

export type Pagination = {
  limit: number;
  totalCount: number;
  totalPages: number;
  currentPage: number;
  nextPage: number | null;
  previousPage: number | null;
};

/** What admission control decided for the query behind a response. */
export type ComplexityMeta = {
  outcome: AdmittedDecision['outcome'];
  score: number;
  limit: number;
  method: AnalysisMethod;
  warning?: string;
};

export type OkOptions = {
  code?: number;
  pagination?: Pagination | null;
  /** Search responses only; other routes leave the key out of the body. */
  complexity?: ComplexityMeta;
};

export type FailPayload = {
  code: number;
  message: string;
  errors?: Record<string, unknown>;
};

declare global {
  namespace Express {
    interface Response {
      ok: (data: unknown, opts?: OkOptions) => Response;
      fail: (payload: FailPayload) => Response;
    }
  }
}

/** Pages are 1-based; without a limit or a total there is nothing to page. */
export function buildPagination(limit: number | undefined, totalCount: number | null, currentPage: number): Pagination | null {
  if (!limit || totalCount === null) return null;
  const totalPages = Math.max(1, Math.ceil(totalCount / limit));
  return {
    limit,
    totalCount,
    totalPages,
    currentPage,
    nextPage: currentPage < totalPages ? currentPage + 1 : null,
    previousPage: currentPage > 1 ? currentPage - 1 : null,
  };
}

export function complexityMeta(decision: AdmittedDecision): ComplexityMeta {
  return {
    outcome: decision.outcome,
    score: decision.analysis.normalizedScore,
    limit: decision.effectiveLimit,
    method: decision.analysis.method,
    ...(decision.outcome === 'warn' ? { warning: decision.message } : {}),
  };
}

export function responseEnvelope(_req: Request, res: Response, next: NextFunction) {
  res.ok = (data: unknown, opts?: OkOptions) => {
    const code = opts?.code ?? 200;
    const complexity = opts?.complexity;
    if (complexity?.warning) res.setHeader(COMPLEXITY_WARNING_HEADER, complexity.warning);
    return res.status(code).json({
      success: true,
      code,
      data,
      pagination: opts?.pagination ?? null,
      ...(complexity ? { complexity } : {}),
    });
  };

  res.fail = (payload: FailPayload) =>
    res.status(payload.code).json({
      success: false,
      code: payload.code,
      errors: payload.errors ?? { root: payload.message },
      message: payload.message,
    });

  next();
}
