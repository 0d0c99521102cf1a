import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { DEFAULT_ROOM, sensorNameForType, toRoom } from './catalog.js';
import {
  asFiniteNumber,
  asNonEmptyString,
  attributeValue,
  isRawEntity,
  type RawEntity,
  type SensorRecord,
} from './entity.js';

export type ParseOutcome =
  | { ok: true; record: SensorRecord }
  | { ok: false; reason: string };

export interface FieldContext {
  id: string;
  type: string;
  sensorName: string;
}

export interface Extractor<T> {
  source: string;
  extract: (entity: RawEntity, context: FieldContext) => T | undefined;
}

export interface ParseOptions {
  logger?: Logger;
  now?: () => Date;
}

const defaultLogger = rootLogger.child({ module: 'parser' });

// Never considered when scanning for a fallback reading.
const NON_READING_KEYS: ReadonlySet<string> = new Set(['id', 'type', 'dateObserved', 'timestamp', 'room']);

export function firstResolved<T>(
  extractors: readonly Extractor<T>[],
  entity: RawEntity,
  context: FieldContext,
): { value: T; source: string } | undefined {
  for (const extractor of extractors) {
    const value = extractor.extract(entity, context);
    if (value !== undefined) {
      return { value, source: extractor.source };
    }
  }
  return undefined;
}

export const timestampFromAttribute: Extractor<string> = {
  source: 'timestamp',
  extract: entity => asNonEmptyString(attributeValue(entity, 'timestamp')),
};

export const timestampFromDateObserved: Extractor<string> = {
  source: 'dateObserved',
  extract: entity => asNonEmptyString(attributeValue(entity, 'dateObserved')),
};

export const roomFromAttribute: Extractor<string> = {
  source: 'room',
  extract: entity => asNonEmptyString(attributeValue(entity, 'room'))?.toLowerCase(),
};

/** `urn:ngsi-ld:<Type>:<room>_<metric>_<n>` → `<room>` */
export const roomFromId: Extractor<string> = {
  source: 'id',
  extract: (_entity, { id }) => {
    const segments = id.split(':');
    if (segments.length < 4) return undefined;
    if (segments[0].toLowerCase() !== 'urn' || segments[1].toLowerCase() !== 'ngsi-ld') return undefined;
    const [prefix] = segments[3].split('_');
    return asNonEmptyString(prefix)?.toLowerCase();
  },
};

export const valueFromSensorAttribute: Extractor<number> = {
  source: 'sensorName',
  extract: (entity, { sensorName }) => asFiniteNumber(attributeValue(entity, sensorName)),
};

export const valueFromFirstNumericAttribute: Extractor<number> = {
  source: 'fallback',
  extract: (entity, { sensorName }) => {
    for (const key of Object.keys(entity)) {
      if (NON_READING_KEYS.has(key) || key === sensorName) continue;
      const value = asFiniteNumber(attributeValue(entity, key));
      if (value !== undefined) return value;
    }
    return undefined;
  },
};

export const TIMESTAMP_EXTRACTORS: readonly Extractor<string>[] = Object.freeze([
  timestampFromAttribute,
  timestampFromDateObserved,
]);

export const ROOM_EXTRACTORS: readonly Extractor<string>[] = Object.freeze([roomFromAttribute, roomFromId]);

export const VALUE_EXTRACTORS: readonly Extractor<number>[] = Object.freeze([
  valueFromSensorAttribute,
  valueFromFirstNumericAttribute,
]);

function buildRecord(raw: unknown, log: Logger, now: () => Date): ParseOutcome {
  if (!isRawEntity(raw)) {
    log.error({ entity: raw }, 'Entity is not a JSON object');
    return { ok: false, reason: 'not an object' };
  }

  const id = asNonEmptyString(raw.id);
  const type = asNonEmptyString(raw.type);
  if (!id || !type) {
    log.error({ entity: raw }, 'Entity is missing required id or type');
    return { ok: false, reason: 'missing id or type' };
  }

  const context: FieldContext = { id, type, sensorName: sensorNameForType(type) };

  let timestamp = firstResolved(TIMESTAMP_EXTRACTORS, raw, context)?.value;
  if (timestamp === undefined) {
    timestamp = now().toISOString();
    log.warn({ id, timestamp }, 'No timestamp on entity, using current time');
  }

  const roomMatch = firstResolved(ROOM_EXTRACTORS, raw, context);
  const room = roomMatch ? toRoom(roomMatch.value) : DEFAULT_ROOM;
  if (roomMatch && room !== roomMatch.value) {
    log.warn({ id, room: roomMatch.value, source: roomMatch.source }, `Unknown room, defaulting to ${DEFAULT_ROOM}`);
  }

  const valueMatch = firstResolved(VALUE_EXTRACTORS, raw, context);
  if (!valueMatch) {
    log.error({ id, type, sensorName: context.sensorName }, 'No numeric value found on entity');
  } else if (valueMatch.source !== valueFromSensorAttribute.source) {
    log.warn({ id, sensorName: context.sensorName }, 'Value resolved from fallback attribute');
  }

  const record: SensorRecord = {
    id,
    type,
    room,
    timestamp,
    sensorName: context.sensorName,
    value: valueMatch ? valueMatch.value : null,
  };
  log.debug({ record }, 'Parsed entity');
  return { ok: true, record };
}

/** Never throws: anything unexpected becomes a failed outcome. */
export function parseEntity(raw: unknown, options: ParseOptions = {}): ParseOutcome {
  const log = options.logger ?? defaultLogger;
  try {
    return buildRecord(raw, log, options.now ?? (() => new Date()));
  } catch (err) {
    // The entity itself may be what threw, so it is not serialized here.
    log.error({ err }, 'Error parsing entity');
    return { ok: false, reason: errorMessage(err) };
  }
}

export function parseEntities(
  page: readonly unknown[],
  options: ParseOptions = {},
): { records: SensorRecord[]; failures: number } {
  const records: SensorRecord[] = [];
  let failures = 0;
  for (const raw of page) {
    const outcome = parseEntity(raw, options);
    if (outcome.ok) {
      records.push(outcome.record);
    } else {
      failures++;
    }
  }
  return { records, failures };
}
