export class StoreError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class StoreConnectionError extends Error {
  constructor(message = 'Store connection is closed') {
    super(message);
    this.name = 'StoreConnectionError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Gave up after ${attempts} attempts: ${reason}`, { cause });
    this.name = 'RetryExhaustedError';
  }
}

export class ProvisioningError extends Error {
  constructor(table: string, options?: { cause?: unknown }) {
    super(`Failed to provision table ${table}`, options);
    this.name = 'ProvisioningError';
  }
}

export class BrokerUnavailableError extends Error {
  constructor(baseUrl: string) {
    super(`Context broker is not reachable at ${baseUrl}`);
    this.name = 'BrokerUnavailableError';
  }
}

// Messages the store returns while its master is still coming up.
const MASTER_INITIALIZING = /PleaseHoldException|Master is initializing|MasterNotRunningException/;

export function isMasterInitializing(err: unknown): boolean {
  return err instanceof Error && MASTER_INITIALIZING.test(err.message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
