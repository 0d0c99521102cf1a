import type { SensorRecord } from '../ingestion/entity.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { StoreConnectionError } from '../errors.js';
import type { Cell, WideColumnStore } from './types.js';

/** Anything shaped like a SensorRecord; required fields may be missing on bad input. */
export type WritableRecord = {
  [K in 'id' | 'room' | 'sensorName' | 'timestamp']?: string | null;
} & Pick<SensorRecord, 'value'>;

export const VALUE_SEPARATOR = '|';

// Written in place of a reading that could not be resolved.
export const UNRESOLVED_VALUE = '';

export function encodeCellValue(value: number | null, timestamp: string): string {
  const reading = value === null ? UNRESOLVED_VALUE : String(value);
  return `${reading}${VALUE_SEPARATOR}${timestamp}`;
}

/** Row = id, family = room, qualifier = sensorName; `null` when a required field is unset. */
export function toCell(record: WritableRecord): Cell | null {
  const { id, room, sensorName, timestamp } = record;
  if (!id || !room || !sensorName || !timestamp) {
    return null;
  }
  return {
    row: id,
    family: room,
    qualifier: sensorName,
    value: encodeCellValue(record.value, timestamp),
  };
}

export class RecordWriter {
  private readonly log: Logger;

  constructor(
    private readonly store: WideColumnStore,
    private readonly tableName: string,
    logger?: Logger,
  ) {
    this.log = logger ?? rootLogger.child({ module: 'writer' });
  }

  /** Resolves `true` when a cell was written, `false` when the record was skipped. */
  public async insert(record: WritableRecord): Promise<boolean> {
    if (!this.store.isOpen) {
      this.log.error('Store connection is closed');
      throw new StoreConnectionError();
    }

    const cell = toCell(record);
    if (!cell) {
      this.log.warn({ record }, 'Skipping insert: record has empty required fields');
      return false;
    }

    try {
      await this.store.putCell(this.tableName, cell);
    } catch (err) {
      this.log.error({ err, id: cell.row }, 'Error inserting record');
      throw err;
    }
    this.log.debug({ row: cell.row, family: cell.family, qualifier: cell.qualifier, value: cell.value }, 'Inserted record');
    return true;
  }

  /** Inserts each record on its own; one bad record never stops the rest. */
  public async batchInsert(records: readonly WritableRecord[]): Promise<number> {
    let written = 0;
    let skipped = 0;
    let failed = 0;

    for (const record of records) {
      try {
        if (await this.insert(record)) {
          written++;
        } else {
          skipped++;
        }
      } catch (err) {
        failed++;
        this.log.warn({ err, id: record.id ?? null }, 'Failed to insert record');
      }
    }

    this.log.info({ written, skipped, failed }, 'Batch insert completed');
    return written;
  }
}
