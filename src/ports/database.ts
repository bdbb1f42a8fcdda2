export type DatabaseError = {
  message: string;
  details?: string | null;
  hint?: string | null;
  code?: string | null;
};

export type DatabaseResult<T> = {
  data: T | null;
  error: DatabaseError | null;
  count?: number | null;
};

export type SelectOptions = {
  count?: "exact" | "planned" | "estimated";
  head?: boolean;
};

export type UpsertOptions = {
  onConflict?: string;
  ignoreDuplicates?: boolean;
};

export interface DatabaseQueryBuilder<T = unknown> {
  select<TResult = T>(columns?: string, options?: SelectOptions): DatabaseQueryBuilder<TResult>;
  eq(column: string, value: unknown): DatabaseQueryBuilder<T>;
  is(column: string, value: unknown): DatabaseQueryBuilder<T>;
  in(column: string, values: readonly unknown[]): DatabaseQueryBuilder<T>;
  or(filters: string): DatabaseQueryBuilder<T>;
  order(
    column: string,
    options?: {
      ascending?: boolean;
      nullsFirst?: boolean;
    },
  ): DatabaseQueryBuilder<T>;
  limit(count: number): DatabaseQueryBuilder<T>;
  range(from: number, to: number): DatabaseQueryBuilder<T>;
  fetch(): Promise<DatabaseResult<T[]>>;
  maybeSingle(): Promise<DatabaseResult<T | null>>;
  single(): Promise<DatabaseResult<T>>;
}

export interface DatabaseTableBuilder {
  select<T = unknown>(columns?: string, options?: SelectOptions): DatabaseQueryBuilder<T>;
  insert<T = unknown>(
    values: Record<string, unknown> | Array<Record<string, unknown>>,
  ): DatabaseQueryBuilder<T>;
  update<T = unknown>(values: Record<string, unknown>): DatabaseQueryBuilder<T>;
  upsert<T = unknown>(
    values: Record<string, unknown> | Array<Record<string, unknown>>,
    options?: UpsertOptions,
  ): DatabaseQueryBuilder<T>;
  delete<T = unknown>(): DatabaseQueryBuilder<T>;
}

export interface DatabaseClient {
  from(table: string): DatabaseTableBuilder;
  rpc<T = unknown>(fn: string, params?: Record<string, unknown>): Promise<DatabaseResult<T>>;
}

export interface DatabaseAdapter {
  getAdminClient(): DatabaseClient;
  getVendor(): string;
}
