import { Client } from 'pg';

export const STORE_CONNECTION_FACTORY = Symbol('STORE_CONNECTION_FACTORY');

export type StoreQueryResult = {
  rows: Record<string, unknown>[];
  rowCount: number | null;
};

/**
 * One open connection to the relational store
 */
export interface StoreConnection {
  query(text: string, values?: unknown[]): Promise<StoreQueryResult>;
  close(): Promise<void>;
}

export type StoreConnectionFactory = (
  connectionString: string
) => Promise<StoreConnection>;

class PgStoreConnection implements StoreConnection {
  constructor(private readonly client: Client) {}

  async query(text: string, values?: unknown[]): Promise<StoreQueryResult> {
    const result = await this.client.query(text, values);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export const connectPostgres: StoreConnectionFactory = async (
  connectionString
) => {
  const client = new Client({ connectionString });
  await client.connect();
  return new PgStoreConnection(client);
};
