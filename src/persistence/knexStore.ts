import type { Knex } from 'knex';
import type { ColumnFilter, PrimaryKey, QuerySpec, Row, Store, TableGateway } from './types.js';

function isSqlite(db: Knex): boolean {
  const client = db.client.config.client;
  return typeof client === 'string' && client.includes('sqlite');
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (m) => `\\${m}`);
}

type Scalar = string | number | boolean | Date | Buffer | null;

// better-sqlite3 binds only numbers, strings, bigints, buffers and null.
function encodeValue(value: unknown, sqlite: boolean): Scalar {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return sqlite ? value.toISOString() : value;
  if (typeof value === 'boolean') return sqlite ? Number(value) : value;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return value.toString();
  if (Buffer.isBuffer(value)) return value;
  return JSON.stringify(value);
}

class KnexTable implements TableGateway {
  constructor(
    private readonly db: Knex,
    private readonly name: string,
    private readonly pk: string,
    private readonly sqlite: boolean,
  ) {}

  private encode(value: unknown): Scalar {
    return encodeValue(value, this.sqlite);
  }

  private encodeRow(data: Row): Record<string, Scalar> {
    const out: Record<string, Scalar> = {};
    for (const [key, value] of Object.entries(data)) out[key] = this.encode(value);
    return out;
  }

  private like(qb: Knex.QueryBuilder, column: string, pattern: string, insensitive: boolean, or = false) {
    const sql = insensitive ? "lower(??) like ? escape '\\'" : "?? like ? escape '\\'";
    const binding = insensitive ? pattern.toLowerCase() : pattern;
    return or ? qb.orWhereRaw(sql, [column, binding]) : qb.whereRaw(sql, [column, binding]);
  }

  private applyFilter(qb: Knex.QueryBuilder, f: ColumnFilter): void {
    const text = () => escapeLike(String(f.value));
    switch (f.op) {
      case 'exact':
        if (f.value === null) qb.whereNull(f.column);
        else qb.where(f.column, this.encode(f.value));
        return;
      case 'iexact':
        qb.whereRaw('lower(??) = ?', [f.column, String(f.value).toLowerCase()]);
        return;
      case 'contains':
      case 'icontains':
        this.like(qb, f.column, `%${text()}%`, f.op === 'icontains');
        return;
      case 'startswith':
      case 'istartswith':
        this.like(qb, f.column, `${text()}%`, f.op === 'istartswith');
        return;
      case 'endswith':
      case 'iendswith':
        this.like(qb, f.column, `%${text()}`, f.op === 'iendswith');
        return;
      case 'gt':
        qb.where(f.column, '>', this.encode(f.value));
        return;
      case 'gte':
        qb.where(f.column, '>=', this.encode(f.value));
        return;
      case 'lt':
        qb.where(f.column, '<', this.encode(f.value));
        return;
      case 'lte':
        qb.where(f.column, '<=', this.encode(f.value));
        return;
      case 'in': {
        const values = Array.isArray(f.value) ? f.value : [f.value];
        qb.whereIn(f.column, values.map((v) => this.encode(v)));
        return;
      }
      case 'isnull':
        if (f.value === true || f.value === 'true' || f.value === 1) qb.whereNull(f.column);
        else qb.whereNotNull(f.column);
        return;
    }
  }

  private filtered(spec: QuerySpec): Knex.QueryBuilder {
    const qb = this.db(this.name);
    for (const f of spec.filters) this.applyFilter(qb, f);
    const search = spec.search;
    if (search && search.term && search.columns.length > 0) {
      const pattern = `%${escapeLike(search.term)}%`;
      qb.where((inner) => {
        for (const column of search.columns) this.like(inner, column, pattern, true, true);
      });
    }
    return qb;
  }

  async findById(id: PrimaryKey): Promise<Row | undefined> {
    const row: Row | undefined = await this.db(this.name).where(this.pk, id).first();
    return row;
  }

  async findMany(spec: QuerySpec): Promise<Row[]> {
    const qb = this.filtered(spec);
    for (const o of spec.ordering ?? []) qb.orderBy(o.column, o.direction);
    if (spec.limit !== undefined) qb.limit(spec.limit);
    if (spec.offset) qb.offset(spec.offset);
    const rows: Row[] = await qb.select('*');
    return rows;
  }

  async count(spec: QuerySpec): Promise<number> {
    const rows: Row[] = await this.filtered(spec).count({ total: '*' });
    return Number(rows[0]?.total ?? 0);
  }

  async insert(data: Row): Promise<PrimaryKey> {
    const result: unknown = await this.db(this.name).insert(this.encodeRow(data), [this.pk]);
    const provided = data[this.pk];
    if (typeof provided === 'string' || typeof provided === 'number') return provided;
    const first: unknown = Array.isArray(result) ? result[0] : undefined;
    if (typeof first === 'number' || typeof first === 'string') return first;
    if (first !== null && typeof first === 'object') {
      const value: unknown = Reflect.get(first, this.pk);
      if (typeof value === 'number' || typeof value === 'string') return value;
    }
    throw new Error(`Insert into ${this.name} did not return a primary key`);
  }

  async update(id: PrimaryKey, data: Row): Promise<number> {
    if (Object.keys(data).length === 0) {
      return (await this.findById(id)) ? 1 : 0;
    }
    const updated: number = await this.db(this.name).where(this.pk, id).update(this.encodeRow(data));
    return updated;
  }

  async delete(id: PrimaryKey): Promise<number> {
    const deleted: number = await this.db(this.name).where(this.pk, id).del();
    return deleted;
  }
}

export class KnexStore implements Store {
  private readonly sqlite: boolean;

  constructor(
    private readonly db: Knex,
    readonly transactional = false,
  ) {
    this.sqlite = isSqlite(db);
  }

  table(name: string, primaryKey: string): TableGateway {
    return new KnexTable(this.db, name, primaryKey, this.sqlite);
  }

  async transaction<T>(work: (tx: Store) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => work(new KnexStore(trx, true)));
  }
}
