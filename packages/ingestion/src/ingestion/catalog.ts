export const ROOMS = ['bathroom', 'kitchen', 'room1', 'room2', 'room3', 'toilet'] as const;

export type Room = (typeof ROOMS)[number];

export const DEFAULT_ROOM: Room = 'room1';

const ROOM_SET: ReadonlySet<string> = new Set(ROOMS);

export function isRoom(value: string): value is Room {
  return ROOM_SET.has(value);
}

/** Lower-cases and maps onto the fixed room set; anything else is `room1`. */
export function toRoom(value: string): Room {
  const normalized = value.trim().toLowerCase();
  return isRoom(normalized) ? normalized : DEFAULT_ROOM;
}

export const SENSOR_NAMES_BY_TYPE: Readonly<Record<string, string>> = Object.freeze({
  BrightnessSensor: 'brightness',
  HumiditySensor: 'humidity',
  TemperatureSensor: 'temperature',
  ThermostatTemperatureSensor: 'thermostatTemperature',
  SetpointHistorySensor: 'setpointHistory',
  VirtualOutdoorTemperatureSensor: 'virtualOutdoorTemperature',
  OutdoorTemperatureSensor: 'outdoorTemperature',
});

export function sensorNameForType(type: string): string {
  return Object.hasOwn(SENSOR_NAMES_BY_TYPE, type)
    ? SENSOR_NAMES_BY_TYPE[type]
    : type.toLowerCase();
}

export const KNOWN_ENTITY_TYPES: readonly string[] = Object.freeze([
  'BrightnessSensor',
  'HumiditySensor',
  'TemperatureSensor',
  'ThermostatTemperatureSensor',
  'SetpointHistorySensor',
  'VirtualOutdoorTemperatureSensor',
  'OutdoorTemperatureSensor',
  'Sensor',
]);

// Types queried one by one when the bare entities endpoint does not answer.
export const CONNECTIVITY_PROBE_TYPES: readonly string[] = Object.freeze([
  'BrightnessSensor',
  'HumiditySensor',
  'Sensor',
  'TemperatureSensor',
]);
