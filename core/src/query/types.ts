export type SortDir = 'asc' | 'desc';

export type SortSpec = { field: string; dir: SortDir };

export type Paging = {
  page: number;
  /** Undefined means unbounded. */
  limit?: number;
  offset: number;
};
