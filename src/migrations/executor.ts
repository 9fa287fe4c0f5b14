/**
 * SQL execution seam for the migration runner. The mssql implementation
 * authenticates with an Entra access token for Azure SQL.
 */

import type { ConnectionPool, config as MssqlConfig } from "mssql";
import { instrumentedCall } from "../diagnostics.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions } from "../types.js";

export type SqlParameter = string | number | boolean | null;

export type SqlRow = Record<string, unknown>;

export interface SqlExecutor {
  /** Run one batch (no `GO` separators). */
  batch(sql: string): Promise<void>;
  query(sql: string, params?: Record<string, SqlParameter>): Promise<SqlRow[]>;
  close(): Promise<void>;
}

export type SqlConnectionOptions = {
  server: string;
  database: string;
  /** Access token for `https://database.windows.net/`. */
  accessToken: string;
  port?: number;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
};

export class MssqlExecutor implements SqlExecutor {
  private options: SqlConnectionOptions;
  private retryOptions?: AzureRetryOptions;
  private pool: ConnectionPool | null = null;

  constructor(options: SqlConnectionOptions, retryOptions?: AzureRetryOptions) {
    this.options = options;
    this.retryOptions = retryOptions;
  }

  // A single pooled connection: the script opens a transaction in one batch
  // and commits it in a later one.
  private async connect(): Promise<ConnectionPool> {
    if (this.pool) return this.pool;
    const { default: sql } = await import("mssql");
    const config: MssqlConfig = {
      server: this.options.server,
      database: this.options.database,
      port: this.options.port ?? 1433,
      connectionTimeout: this.options.connectTimeoutMs ?? 30_000,
      requestTimeout: this.options.requestTimeoutMs ?? 300_000,
      pool: { max: 1, min: 0 },
      options: { encrypt: true, trustServerCertificate: false },
      authentication: {
        type: "azure-active-directory-access-token",
        options: { token: this.options.accessToken },
      },
    };
    const pool = new sql.ConnectionPool(config);
    this.pool = await instrumentedCall("sql", "connect", () => withAzureRetry(() => pool.connect(), this.retryOptions), {
      resourceKind: "sql-database",
      resourceName: `${this.options.server}/${this.options.database}`,
    });
    return this.pool;
  }

  async batch(text: string): Promise<void> {
    const pool = await this.connect();
    await instrumentedCall("sql", "batch", () => pool.request().batch(text), {
      resourceKind: "sql-database",
      resourceName: this.options.database,
    });
  }

  async query(text: string, params?: Record<string, SqlParameter>): Promise<SqlRow[]> {
    const pool = await this.connect();
    return instrumentedCall(
      "sql",
      "query",
      async () => {
        const request = pool.request();
        for (const [name, value] of Object.entries(params ?? {})) {
          request.input(name, value);
        }
        const result = await request.query<SqlRow>(text);
        return [...result.recordset];
      },
      { resourceKind: "sql-database", resourceName: this.options.database },
    );
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    await pool.close();
  }
}

export function createMssqlExecutor(options: SqlConnectionOptions, retryOptions?: AzureRetryOptions): MssqlExecutor {
  return new MssqlExecutor(options, retryOptions);
}
