import { Repository } from "typeorm";
import { Holding, IngestionRun, PricePoint, Ticker, User } from "./entities";

type Direction = "ASC" | "DESC";

export type FindOptions = {
  where?: Record<string, unknown>;
  order?: Record<string, Direction>;
  relations?: Record<string, boolean>;
  select?: Record<string, boolean>;
  skip?: number;
  take?: number;
};

export type InMemoryRepositoryOptions<T> = {
  /** Column groups that must be unique, like a unique index. */
  unique?: string[][];
  /** Date columns stamped on insert. */
  created?: string[];
  /** Date columns stamped on every save. */
  timestamps?: string[];
  /** Loaders for `relations: { name: true }`. */
  relations?: Record<string, (row: T) => unknown>;
  /** Primary key for the n-th inserted row; defaults to n. */
  id?: (sequence: number) => number | string;
};

const matchesWhere = (row: object, where?: Record<string, unknown>) =>
  !where || Object.entries(where).every(([key, value]) => Reflect.get(row, key) === value);

const sameValue = (left: unknown, right: unknown) =>
  left instanceof Date && right instanceof Date ? left.getTime() === right.getTime() : left === right;

const compareBy = (order: Record<string, Direction>) => (a: object, b: object) => {
  for (const [key, direction] of Object.entries(order)) {
    const left = Reflect.get(a, key);
    const right = Reflect.get(b, key);
    if (left < right) {
      return direction === "ASC" ? -1 : 1;
    }
    if (left > right) {
      return direction === "ASC" ? 1 : -1;
    }
  }
  return 0;
};

/**
 * In-process stand-in for the slice of a TypeORM Repository the services
 * use. Rows live in `rows`; reads return copies, like a real query would.
 */
export class InMemoryRepository<T extends object> {
  readonly rows: T[] = [];
  private sequence = 0;

  constructor(
    private readonly factory: () => T,
    private readonly options: InMemoryRepositoryOptions<T> = {},
  ) {}

  asRepository(): Repository<T> {
    return this as unknown as Repository<T>;
  }

  create(entityLike: object = {}): T {
    return Object.assign(this.factory(), entityLike);
  }

  async find(options: FindOptions = {}): Promise<T[]> {
    let matches = this.rows.filter((row) => matchesWhere(row, options.where));
    if (options.order) {
      matches = [...matches].sort(compareBy(options.order));
    }
    const start = options.skip ?? 0;
    const end = options.take === undefined ? undefined : start + options.take;
    return matches.slice(start, end).map((row) => this.hydrate(row, options.relations));
  }

  async findOne(options: FindOptions = {}): Promise<T | null> {
    const [first] = await this.find({ ...options, take: 1 });
    return first ?? null;
  }

  async count(options: FindOptions = {}): Promise<number> {
    return this.rows.filter((row) => matchesWhere(row, options.where)).length;
  }

  async findAndCount(options: FindOptions = {}): Promise<[T[], number]> {
    return [await this.find(options), await this.count({ where: options.where })];
  }

  async save(entity: object): Promise<T> {
    const record = this.create(entity);
    const isNew = Reflect.get(record, "id") === undefined;
    if (isNew) {
      this.sequence += 1;
      Reflect.set(record, "id", this.options.id ? this.options.id(this.sequence) : this.sequence);
    }
    if (this.violatesUnique(record)) {
      throw new Error(`duplicate key value violates unique constraint`);
    }

    const now = new Date();
    for (const column of this.options.created ?? []) {
      if (Reflect.get(record, column) === undefined) {
        Reflect.set(record, column, now);
      }
    }

    const index = this.rows.findIndex((row) => Reflect.get(row, "id") === Reflect.get(record, "id"));
    // Like an UpdateDateColumn: only moves when the row is inserted or a column changed.
    if (index < 0 || this.hasChanges(this.rows[index], record)) {
      for (const column of this.options.timestamps ?? []) {
        Reflect.set(record, column, now);
      }
    }
    if (index >= 0) {
      this.rows[index] = record;
    } else {
      this.rows.push(record);
    }
    return this.create(record);
  }

  /** `createQueryBuilder().insert().into(E).values(rows)[.orIgnore()].execute()` */
  createQueryBuilder() {
    return {
      insert: () => ({
        into: (_target: unknown) => ({
          values: (values: object[]) => ({
            orIgnore: () => ({ execute: () => this.insertMany(values, true) }),
            execute: () => this.insertMany(values, false),
          }),
        }),
      }),
    };
  }

  private async insertMany(values: object[], ignoreConflicts: boolean) {
    const identifiers: Array<{ id: unknown }> = [];
    for (const value of values) {
      const candidate = this.create(value);
      if (ignoreConflicts && this.violatesUnique(candidate)) {
        continue;
      }
      const saved = await this.save(candidate);
      identifiers.push({ id: Reflect.get(saved, "id") });
    }
    return { identifiers, generatedMaps: [], raw: [] };
  }

  private hasChanges(stored: T, next: T) {
    return Object.keys(next).some((key) => !sameValue(Reflect.get(stored, key), Reflect.get(next, key)));
  }

  private violatesUnique(record: T) {
    const id = Reflect.get(record, "id");
    return (this.options.unique ?? []).some((columns) =>
      this.rows.some(
        (row) =>
          Reflect.get(row, "id") !== id &&
          columns.every((column) => Reflect.get(row, column) === Reflect.get(record, column)),
      ),
    );
  }

  private hydrate(row: T, relations?: Record<string, boolean>): T {
    const copy = this.create(row);
    for (const [name, enabled] of Object.entries(relations ?? {})) {
      const load = this.options.relations?.[name];
      if (enabled && load) {
        Reflect.set(copy, name, load(row));
      }
    }
    return copy;
  }
}

export function createTestStores() {
  const tickers = new InMemoryRepository(() => new Ticker(), {
    unique: [["symbol"]],
    timestamps: ["updatedAt"],
  });
  const prices = new InMemoryRepository(() => new PricePoint(), {
    unique: [["tickerId", "date"]],
  });
  const holdings = new InMemoryRepository(() => new Holding(), {
    unique: [["userId", "tickerId"]],
    created: ["createdAt"],
    relations: {
      ticker: (row) => tickers.rows.find((ticker) => ticker.id === row.tickerId),
    },
  });
  const users = new InMemoryRepository(() => Object.assign(new User(), { isActive: true }), {
    unique: [["email"]],
    created: ["createdAt"],
  });
  const runs = new InMemoryRepository(() => new IngestionRun(), {
    created: ["createdAt"],
    id: (sequence) => `run-${sequence}`,
  });
  return { tickers, prices, holdings, users, runs };
}

export type TestStores = ReturnType<typeof createTestStores>;

export async function seedTickers(stores: TestStores, symbols: string[]): Promise<Ticker[]> {
  const saved: Ticker[] = [];
  for (const symbol of symbols) {
    saved.push(await stores.tickers.save({ symbol, name: `${symbol} Corp.`, sector: "Technology" }));
  }
  return saved;
}
