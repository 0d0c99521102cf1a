import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { StoreConnectionError, StoreError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import type { Cell, TableDescriptor, WideColumnStore } from './types.js';

const TableSchemaResponse = z.object({
  name: z.string(),
  ColumnSchema: z.array(z.object({ name: z.string() }).passthrough()).default([]),
});

const TableListResponse = z.object({
  table: z.array(z.object({ name: z.string() })).default([]),
});

const CellSetResponse = z.object({
  Row: z.array(
    z.object({
      key: z.string(),
      Cell: z.array(
        z.object({
          column: z.string(),
          timestamp: z.number().optional(),
          $: z.string(),
        }),
      ),
    }),
  ),
});

// Constant pause between RPC attempts, the way the native client retries.
export const DEFAULT_RPC_RETRY: RetryPolicy = Object.freeze({
  maxAttempts: 5,
  baseMs: 2000,
  factor: 1,
  maxMs: 2000,
});

export interface HBaseRestStoreOptions {
  rpcRetry?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const encode = (value: string): string => Buffer.from(value, 'utf8').toString('base64');
const decode = (value: string): string => Buffer.from(value, 'base64').toString('utf8');

function describeBody(body: unknown): string {
  if (body === undefined || body === null || body === '') return '';
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.length > 500 ? `${text.slice(0, 500)}...` : text;
}

function toStoreError(err: unknown, operation: string): StoreError {
  if (err instanceof StoreError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = describeBody(err.response?.data) || err.message;
    const suffix = status === undefined ? '' : ` (HTTP ${status})`;
    return new StoreError(`${operation} failed${suffix}: ${detail}`, status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StoreError(`${operation} failed: ${message}`, undefined, { cause: err });
}

function isTransient(err: unknown): boolean {
  return err instanceof StoreError && (err.status === undefined || err.status >= 500);
}

/**
 * WideColumnStore backed by the HBase REST gateway (Stargate). Cells travel
 * as base64 CellSets; everything else is plain JSON.
 */
export class HBaseRestStore implements WideColumnStore {
  private open = true;
  private readonly rpcRetry: RetryPolicy;
  private readonly log: Logger;

  constructor(
    private readonly client: AxiosInstance,
    private readonly options: HBaseRestStoreOptions = {},
  ) {
    this.rpcRetry = options.rpcRetry ?? DEFAULT_RPC_RETRY;
    this.log = options.logger ?? rootLogger.child({ module: 'hbase' });
  }

  public get isOpen(): boolean {
    return this.open;
  }

  public async tableExists(table: string): Promise<boolean> {
    return (await this.describeTable(table)) !== null;
  }

  public async describeTable(table: string): Promise<TableDescriptor | null> {
    try {
      const response = await this.call(`Describe table ${table}`, () =>
        this.client.get(`/${encodeURIComponent(table)}/schema`),
      );
      const schema = TableSchemaResponse.parse(response.data);
      return {
        name: schema.name,
        columnFamilies: schema.ColumnSchema.map(family => family.name),
      };
    } catch (err) {
      if (err instanceof StoreError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }

  public async listTables(): Promise<string[]> {
    const response = await this.call('List tables', () => this.client.get('/'));
    return TableListResponse.parse(response.data).table.map(entry => entry.name);
  }

  public async createTable(descriptor: TableDescriptor): Promise<void> {
    const body = {
      name: descriptor.name,
      ColumnSchema: descriptor.columnFamilies.map(name => ({ name })),
    };
    await this.call(`Create table ${descriptor.name}`, () =>
      this.client.put(`/${encodeURIComponent(descriptor.name)}/schema`, body),
    );
  }

  public async putCell(table: string, cell: Cell): Promise<void> {
    const column = `${cell.family}:${cell.qualifier}`;
    const body = {
      Row: [
        {
          key: encode(cell.row),
          Cell: [{ column: encode(column), $: encode(cell.value) }],
        },
      ],
    };
    await this.call(`Put ${cell.row}/${column}`, () =>
      this.client.put(this.cellPath(table, cell.row, column), body),
    );
  }

  public async getCell(table: string, row: string, family: string, qualifier: string): Promise<string | null> {
    const column = `${family}:${qualifier}`;
    try {
      const response = await this.call(`Get ${row}/${column}`, () =>
        this.client.get(this.cellPath(table, row, column)),
      );
      const cellSet = CellSetResponse.parse(response.data);
      const first = cellSet.Row[0]?.Cell[0];
      return first ? decode(first.$) : null;
    } catch (err) {
      if (err instanceof StoreError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }

  public async close(): Promise<void> {
    if (!this.open) return;
    this.open = false;
    this.log.info('Store connection closed');
  }

  private cellPath(table: string, row: string, column: string): string {
    return `/${encodeURIComponent(table)}/${encodeURIComponent(row)}/${encodeURIComponent(column)}`;
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    if (!this.open) {
      throw new StoreConnectionError();
    }
    return withRetry(
      async () => {
        try {
          return await request();
        } catch (err) {
          throw toStoreError(err, operation);
        }
      },
      {
        policy: this.rpcRetry,
        shouldRetry: isTransient,
        sleep: this.options.sleep,
        onRetry: (err, attempt, delayMs) => {
          this.log.warn({ err, attempt, delayMs }, `${operation}: transient store error, retrying`);
        },
      },
    );
  }
}
