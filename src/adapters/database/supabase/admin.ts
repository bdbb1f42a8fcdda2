import type { SupabaseClient } from "@supabase/supabase-js";

import { getSupabaseServiceRoleAdapter } from "@/adapters/supabase/server";
import type {
  DatabaseAdapter,
  DatabaseClient,
  DatabaseError,
  DatabaseQueryBuilder,
  DatabaseResult,
  DatabaseTableBuilder,
  SelectOptions,
  UpsertOptions,
} from "@/ports/database";

function readString(source: object, key: string): string | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : null;
}

function mapError(error: unknown): DatabaseError {
  if (!error || typeof error !== "object") {
    return { message: String(error ?? "Unknown database error") };
  }
  return {
    message: readString(error, "message") ?? "Database error",
    details: readString(error, "details"),
    hint: readString(error, "hint"),
    code: readString(error, "code"),
  };
}

type SupabaseQueryResponse<T> = {
  data: T[] | null;
  error: unknown;
  count?: number | null;
};

type SupabaseSingleQueryResponse<T> = {
  data: T | null;
  error: unknown;
};

type SupabaseFilterLike<T> = PromiseLike<SupabaseQueryResponse<T>> & {
  select<TResult = T>(columns?: string, options?: SelectOptions): SupabaseFilterLike<TResult>;
  eq(column: string, value: unknown): SupabaseFilterLike<T>;
  is(column: string, value: unknown): SupabaseFilterLike<T>;
  in(column: string, values: readonly unknown[]): SupabaseFilterLike<T>;
  or(filters: string): SupabaseFilterLike<T>;
  order(column: string, options?: { ascending?: boolean; nullsFirst?: boolean }): SupabaseFilterLike<T>;
  limit(count: number): SupabaseFilterLike<T>;
  range(from: number, to: number): SupabaseFilterLike<T>;
  maybeSingle(): PromiseLike<SupabaseSingleQueryResponse<T>>;
  single(): PromiseLike<SupabaseSingleQueryResponse<T>>;
};

// PostgREST builders are typed against generated schema types we do not ship.
function toSupabaseFilter<T>(builder: unknown): SupabaseFilterLike<T> {
  return builder as SupabaseFilterLike<T>;
}

class SupabaseQueryBuilder<T> implements DatabaseQueryBuilder<T> {
  constructor(private readonly builder: SupabaseFilterLike<T>) {}

  select<TResult = T>(columns?: string, options?: SelectOptions): DatabaseQueryBuilder<TResult> {
    return new SupabaseQueryBuilder<TResult>(this.builder.select<TResult>(columns, options));
  }

  eq(column: string, value: unknown): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.eq(column, value));
  }

  is(column: string, value: unknown): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.is(column, value));
  }

  in(column: string, values: readonly unknown[]): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.in(column, values));
  }

  or(filters: string): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.or(filters));
  }

  order(
    column: string,
    options?: { ascending?: boolean; nullsFirst?: boolean },
  ): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.order(column, options));
  }

  limit(count: number): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.limit(count));
  }

  range(from: number, to: number): DatabaseQueryBuilder<T> {
    return new SupabaseQueryBuilder<T>(this.builder.range(from, to));
  }

  async fetch(): Promise<DatabaseResult<T[]>> {
    const { data, error, count } = await this.builder;
    return {
      data: data ?? null,
      error: error ? mapError(error) : null,
      count: count ?? null,
    };
  }

  async maybeSingle(): Promise<DatabaseResult<T | null>> {
    const { data, error } = await this.builder.maybeSingle();
    return {
      data: data ?? null,
      error: error ? mapError(error) : null,
    };
  }

  async single(): Promise<DatabaseResult<T>> {
    const { data, error } = await this.builder.single();
    return {
      data,
      error: error ? mapError(error) : null,
    };
  }
}

class SupabaseTableBuilder implements DatabaseTableBuilder {
  constructor(private readonly client: SupabaseClient, private readonly table: string) {}

  select<T = unknown>(columns?: string, options?: SelectOptions): DatabaseQueryBuilder<T> {
    const query = this.client.from(this.table).select(columns, options);
    return new SupabaseQueryBuilder<T>(toSupabaseFilter<T>(query));
  }

  insert<T = unknown>(
    values: Record<string, unknown> | Array<Record<string, unknown>>,
  ): DatabaseQueryBuilder<T> {
    const query = this.client.from(this.table).insert(values as never);
    return new SupabaseQueryBuilder<T>(toSupabaseFilter<T>(query));
  }

  update<T = unknown>(values: Record<string, unknown>): DatabaseQueryBuilder<T> {
    const query = this.client.from(this.table).update(values);
    return new SupabaseQueryBuilder<T>(toSupabaseFilter<T>(query));
  }

  upsert<T = unknown>(
    values: Record<string, unknown> | Array<Record<string, unknown>>,
    options?: UpsertOptions,
  ): DatabaseQueryBuilder<T> {
    const query = this.client.from(this.table).upsert(values as never, options);
    return new SupabaseQueryBuilder<T>(toSupabaseFilter<T>(query));
  }

  delete<T = unknown>(): DatabaseQueryBuilder<T> {
    const query = this.client.from(this.table).delete();
    return new SupabaseQueryBuilder<T>(toSupabaseFilter<T>(query));
  }
}

class SupabaseDatabaseClient implements DatabaseClient {
  constructor(private readonly client: SupabaseClient) {}

  from(table: string): DatabaseTableBuilder {
    return new SupabaseTableBuilder(this.client, table);
  }

  async rpc<T = unknown>(fn: string, params?: Record<string, unknown>): Promise<DatabaseResult<T>> {
    const { data, error } = await this.client.rpc(fn, params ?? {});
    return {
      data: data ?? null,
      error: error ? mapError(error) : null,
    };
  }
}

class SupabaseDatabaseAdapter implements DatabaseAdapter {
  private adminClient: DatabaseClient | null = null;

  getAdminClient(): DatabaseClient {
    if (!this.adminClient) {
      this.adminClient = new SupabaseDatabaseClient(
        getSupabaseServiceRoleAdapter().getServiceRoleClient(),
      );
    }
    return this.adminClient;
  }

  getVendor(): string {
    return "supabase";
  }
}

let cachedAdapter: DatabaseAdapter | null = null;

export function getSupabaseDatabaseAdapter(): DatabaseAdapter {
  if (!cachedAdapter) {
    cachedAdapter = new SupabaseDatabaseAdapter();
  }
  return cachedAdapter;
}
