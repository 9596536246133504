import type { WhereOptions } from 'sequelize';

import { toFindOptions } from '../adapters/relational/base.js';
import { isPlainObject } from '../filter/values.js';
import type { SqlRunner } from '../orm/types.js';
import type { ExplainRequest, ExplainResult, Explainer, PlanNode } from './types.js';

const PG_JOIN_NODES = new Set(['Nested Loop', 'Hash Join', 'Merge Join']);

/** Settles with `promise`, or rejects with the signal's reason once it aborts. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (v) => {
        signal.removeEventListener('abort', onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      },
    );
  });
}

function text(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function num(v: unknown): number {
  const n = typeof v === 'string' ? Number(v) : v;
  return typeof n === 'number' && Number.isFinite(n) ? n : 0;
}

function parseJsonColumn(v: unknown): unknown {
  return typeof v === 'string' ? JSON.parse(v) : v;
}

export function parsePostgresPlan(rows: readonly Record<string, unknown>[]): ExplainResult {
  const doc = parseJsonColumn(rows[0]?.['QUERY PLAN']);
  const top = Array.isArray(doc) ? doc[0] : doc;
  const root = isPlainObject(top) ? top.Plan : undefined;
  if (!isPlainObject(root)) throw new Error('EXPLAIN output has no plan');

  const seqScans: PlanNode[] = [];
  let joins = 0;
  const walk = (node: unknown): void => {
    if (!isPlainObject(node)) return;
    const nodeType = text(node['Node Type']) ?? 'Unknown';
    if (nodeType === 'Seq Scan') {
      const relation = text(node['Relation Name']);
      const filter = text(node.Filter);
      seqScans.push({ nodeType, ...(relation ? { relation } : {}), ...(filter ? { filter } : {}) });
    }
    if (PG_JOIN_NODES.has(nodeType)) joins++;
    const children = node.Plans;
    if (Array.isArray(children)) children.forEach(walk);
  };
  walk(root);

  return { cost: num(root['Total Cost']), rows: num(root['Plan Rows']), seqScans, joins, notes: [], plan: doc };
}

export function parseMysqlPlan(rows: readonly Record<string, unknown>[]): ExplainResult {
  const doc = parseJsonColumn(rows[0]?.EXPLAIN);
  const block = isPlainObject(doc) ? doc.query_block : undefined;
  if (!isPlainObject(block)) throw new Error('EXPLAIN output has no query block');

  const seqScans: PlanNode[] = [];
  const notes = new Set<string>();
  let joins = 0;
  let examined = 0;
  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(walk);
      return;
    }
    if (!isPlainObject(node)) return;
    if (node.using_filesort === true) notes.add('filesort');
    if (node.using_temporary_table === true) notes.add('temporary table');
    if (Array.isArray(node.nested_loop) && node.nested_loop.length > 1) joins += node.nested_loop.length - 1;

    const table = node.table;
    if (isPlainObject(table)) {
      examined += num(table.rows_examined_per_scan);
      if (table.access_type === 'ALL') {
        const relation = text(table.table_name);
        const filter = text(table.attached_condition);
        seqScans.push({ nodeType: 'ALL', ...(relation ? { relation } : {}), ...(filter ? { filter } : {}) });
      }
    }
    Object.values(node).forEach(walk);
  };
  walk(block);

  const costInfo = block.cost_info;
  const cost = isPlainObject(costInfo) ? num(costInfo.query_cost) : 0;
  return { cost, rows: examined, seqScans, joins, notes: [...notes], plan: doc };
}

/** Runs the dialect's JSON EXPLAIN for a compiled where clause. */
export class SqlExplainer implements Explainer<WhereOptions> {
  private readonly sql: SqlRunner;

  constructor(sql: SqlRunner) {
    this.sql = sql;
  }

  async explain(req: ExplainRequest<WhereOptions>): Promise<ExplainResult> {
    const select = this.sql.renderSelect(req.target, toFindOptions(req.compiled, req));
    switch (this.sql.dialect) {
      case 'postgres':
        return parsePostgresPlan(await raceAbort(this.sql.select<Record<string, unknown>>(`EXPLAIN (FORMAT JSON) ${select}`), req.signal));
      case 'mysql':
        return parseMysqlPlan(await raceAbort(this.sql.select<Record<string, unknown>>(`EXPLAIN FORMAT=JSON ${select}`), req.signal));
      default:
        throw new Error(`EXPLAIN costs are not available for ${this.sql.dialect}`);
    }
  }
}
