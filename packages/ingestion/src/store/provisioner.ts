import { ProvisioningError, errorMessage, isMasterInitializing } from '../errors.js';
import { ROOMS } from '../ingestion/catalog.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { delay, withRetry, type RetryPolicy } from '../utils/retry.js';
import type { TableDescriptor, WideColumnStore } from './types.js';

export const DEFAULT_PROVISION_RETRY: RetryPolicy = Object.freeze({
  maxAttempts: 21,
  baseMs: 10_000,
  factor: 2,
  maxMs: 5 * 60_000,
});

export interface SchemaProvisionerOptions {
  tableName: string;
  columnFamilies?: readonly string[];
  retryPolicy?: RetryPolicy;
  verifyAttempts?: number;
  verifyIntervalMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Makes sure the destination table exists with one column family per room.
 * The store's master can take minutes to come up, so every attempt is
 * retried with exponential backoff.
 */
export class SchemaProvisioner {
  private readonly descriptor: TableDescriptor;
  private readonly retryPolicy: RetryPolicy;
  private readonly verifyAttempts: number;
  private readonly verifyIntervalMs: number;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly store: WideColumnStore,
    options: SchemaProvisionerOptions,
  ) {
    this.descriptor = {
      name: options.tableName,
      columnFamilies: Object.freeze([...(options.columnFamilies ?? ROOMS)]),
    };
    this.retryPolicy = options.retryPolicy ?? DEFAULT_PROVISION_RETRY;
    this.verifyAttempts = options.verifyAttempts ?? 5;
    this.verifyIntervalMs = options.verifyIntervalMs ?? 2000;
    this.log = options.logger ?? rootLogger.child({ module: 'provisioner' });
    this.sleep = options.sleep ?? delay;
  }

  public get tableDescriptor(): TableDescriptor {
    return this.descriptor;
  }

  /** Idempotent; resolves once the table exists, throws ProvisioningError when attempts run out. */
  public async createTable(): Promise<void> {
    const table = this.descriptor.name;
    this.log.info({ table, families: this.descriptor.columnFamilies }, 'Ensuring table exists');

    try {
      const attempts = await withRetry(attempt => this.attemptCreation(attempt), {
        policy: this.retryPolicy,
        sleep: this.sleep,
        onRetry: (err, attempt, delayMs) => {
          if (isMasterInitializing(err)) {
            this.log.warn({ attempt, delayMs, reason: errorMessage(err) }, 'Store master is still initializing');
          } else {
            this.log.warn({ attempt, delayMs, reason: errorMessage(err) }, 'Table provisioning attempt failed');
          }
        },
      });
      this.log.info({ table, attempts }, 'Table is ready');
    } catch (err) {
      this.log.error({ err, table }, 'Giving up on table provisioning');
      throw new ProvisioningError(table, { cause: err });
    }
  }

  private async attemptCreation(attempt: number): Promise<number> {
    const table = this.descriptor.name;

    if (await this.store.tableExists(table)) {
      this.log.info({ table }, 'Table already exists');
      return attempt;
    }

    await this.logExistingTables();

    await this.store.createTable(this.descriptor);
    this.log.info({ table }, 'Create table call completed, verifying');

    if (!(await this.waitForTable())) {
      throw new Error(`Table ${table} does not exist after create call`);
    }
    return attempt;
  }

  private async logExistingTables(): Promise<void> {
    try {
      const tables = await this.store.listTables();
      this.log.info({ tables }, `Store is answering, ${tables.length} existing tables`);
    } catch (err) {
      if (isMasterInitializing(err)) {
        throw err;
      }
      this.log.warn({ reason: errorMessage(err) }, 'Could not list tables');
    }
  }

  private async waitForTable(): Promise<boolean> {
    for (let check = 1; check <= this.verifyAttempts; check++) {
      try {
        if (await this.store.tableExists(this.descriptor.name)) {
          return true;
        }
        this.log.info({ check }, 'Table not visible yet');
      } catch (err) {
        this.log.warn({ check, reason: errorMessage(err) }, 'Error checking table existence');
      }
      if (check < this.verifyAttempts) {
        await this.sleep(this.verifyIntervalMs);
      }
    }
    return false;
  }
}
