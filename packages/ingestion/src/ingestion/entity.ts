import type { Room } from './catalog.js';

/** One entity object as returned by the broker; attribute shapes vary by type. */
export type RawEntity = Record<string, unknown>;

export interface SensorRecord {
  id: string;
  type: string;
  room: Room;
  timestamp: string;
  sensorName: string;
  /** `null` when no numeric reading could be resolved from the entity. */
  value: number | null;
}

export function isRawEntity(value: unknown): value is RawEntity {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Value of an attribute in NGSI-LD normalized form (`{ type, value }`).
 * A bare scalar attribute stands for its own value.
 */
export function attributeValue(entity: RawEntity, name: string): unknown {
  if (!Object.hasOwn(entity, name)) return undefined;
  const attribute = entity[name];
  if (isRawEntity(attribute)) {
    return attribute.value;
  }
  return attribute;
}

export function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

export function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
