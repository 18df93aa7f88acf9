// Storage-facing interfaces. Column names only; field-to-column mapping happens in the engine.

export type Row = Record<string, unknown>;
export type PrimaryKey = string | number;

export type FilterOperator =
  | 'exact'
  | 'iexact'
  | 'contains'
  | 'icontains'
  | 'startswith'
  | 'istartswith'
  | 'endswith'
  | 'iendswith'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'in'
  | 'isnull';

export interface ColumnFilter {
  column: string;
  op: FilterOperator;
  value: unknown;
}

export interface ColumnSearch {
  columns: string[];
  term: string;
}

export interface ColumnOrder {
  column: string;
  direction: 'asc' | 'desc';
}

export interface QuerySpec {
  filters: ColumnFilter[];
  search?: ColumnSearch;
  ordering?: ColumnOrder[];
  limit?: number;
  offset?: number;
}

export interface TableGateway {
  findById(id: PrimaryKey): Promise<Row | undefined>;
  findMany(spec: QuerySpec): Promise<Row[]>;
  // Ignores ordering, limit and offset.
  count(spec: QuerySpec): Promise<number>;
  insert(data: Row): Promise<PrimaryKey>;
  update(id: PrimaryKey, data: Row): Promise<number>;
  delete(id: PrimaryKey): Promise<number>;
}

/**
 * A unit of work. `transaction` on a store that is already transactional
 * opens a savepoint, so a nested failure rolls back only its own work.
 */
export interface Store {
  readonly transactional: boolean;
  table(name: string, primaryKey: string): TableGateway;
  transaction<T>(work: (tx: Store) => Promise<T>): Promise<T>;
}
