import pino, { type BaseLogger } from 'pino';
import { isPlainObject } from '@thermobridge/shared';
import { UpstreamError, type PropertyReader, type RequestOptions } from '@thermobridge/gateway-client';
import type { PointMap, PointName } from '../config/serviceConfig';
import { coerceNumber } from '../trends/logDatum';

export type SystemMode = 'Heating' | 'Cooling' | 'Deadband' | 'Unknown';

export type SnapshotField = PointName | 'device_name';

type NumericField = 'temperature' | 'zone_setpoint' | 'heating_setpoint' | 'cooling_setpoint';

export type ReadOutcome = 'ok' | 'error';

export interface ThermostatSnapshot {
  temperature?: number;
  zone_setpoint?: number;
  heating_setpoint?: number;
  cooling_setpoint?: number;
  system_mode?: SystemMode;
  peak_savings?: boolean;
  fan_status?: boolean;
  device_name: string;
  timestamp: string;
  errors?: Partial<Record<SnapshotField, string>>;
}

export interface SnapshotReaderOptions {
  client: PropertyReader;
  points: PointMap;
  device: string;
  useDualSetpoints: boolean;
  timeoutMs?: number;
  logger?: BaseLogger;
  clock?: () => Date;
  onRead?: (point: SnapshotField, outcome: ReadOutcome) => void;
}

export interface SnapshotReadOptions {
  signal?: AbortSignal;
  logger?: BaseLogger;
}

const ACTIVE_VALUES = ['active', 'on', 'true', '1'];

const MODE_NAMES: Readonly<Record<number, SystemMode>> = {
  1: 'Heating',
  2: 'Cooling'
};

const DEFAULT_MODE_VALUE = '3';

function modeValue(document: Record<string, unknown>): unknown {
  const value = document.value ?? DEFAULT_MODE_VALUE;
  if (!isPlainObject(value) || !('enumerated' in value)) {
    return value;
  }
  const { enumerated } = value;
  return isPlainObject(enumerated) ? enumerated.value ?? DEFAULT_MODE_VALUE : null;
}

export function decodeSystemMode(document: Record<string, unknown>): SystemMode {
  const raw = modeValue(document);
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return 'Unknown';
  }
  const text = String(raw).trim();
  if (!/^[+-]?\d+$/.test(text)) {
    return 'Unknown';
  }
  return MODE_NAMES[Number.parseInt(text, 10)] ?? 'Deadband';
}

export function decodeBinary(value: unknown): boolean {
  return ACTIVE_VALUES.includes(String(value).trim().toLowerCase());
}

export function describeReadError(error: unknown): string {
  if (error instanceof UpstreamError) {
    return `HTTP ${error.statusCode}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

class PointValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PointValueError';
  }
}

function presentValue(document: Record<string, unknown>): unknown {
  const { value } = document;
  if (value === undefined || value === null) {
    throw new PointValueError('present-value document has no value');
  }
  return value;
}

function numericValue(document: Record<string, unknown>): number {
  const value = coerceNumber(presentValue(document));
  if (value === null) {
    throw new PointValueError('present value is not numeric');
  }
  return value;
}

/**
 * Reads the configured thermostat points once. A failing point is logged and listed under
 * `errors`; the snapshot itself only fails if something other than a point read throws.
 */
export class SnapshotReader {
  private readonly client: PropertyReader;
  private readonly points: PointMap;
  private readonly device: string;
  private readonly useDualSetpoints: boolean;
  private readonly timeoutMs?: number;
  private readonly logger: BaseLogger;
  private readonly clock: () => Date;
  private readonly onRead?: (point: SnapshotField, outcome: ReadOutcome) => void;

  constructor(options: SnapshotReaderOptions) {
    this.client = options.client;
    this.points = options.points;
    this.device = options.device;
    this.useDualSetpoints = options.useDualSetpoints;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.clock = options.clock ?? (() => new Date());
    this.onRead = options.onRead;
  }

  get deviceObjectId(): string {
    return `device,${this.device}`;
  }

  async read(options: SnapshotReadOptions = {}): Promise<ThermostatSnapshot> {
    const logger = options.logger ?? this.logger;
    const request: RequestOptions = { signal: options.signal, timeoutMs: this.timeoutMs };
    const errors: Partial<Record<SnapshotField, string>> = {};

    const attempt = async <T>(field: SnapshotField, load: () => Promise<T>): Promise<T | undefined> => {
      try {
        const value = await load();
        this.onRead?.(field, 'ok');
        return value;
      } catch (error) {
        this.onRead?.(field, 'error');
        errors[field] = error instanceof PointValueError ? error.message : describeReadError(error);
        logger.warn({ point: field, err: error }, 'thermostat point read failed');
        return undefined;
      }
    };

    const readPoint = (point: PointName) =>
      this.client.readProperty(this.points[point], 'present-value', request);

    const numericFields: NumericField[] = this.useDualSetpoints
      ? ['temperature', 'heating_setpoint', 'cooling_setpoint']
      : ['temperature', 'zone_setpoint'];

    const [numericValues, systemMode, peakSavings, fanStatus, deviceName] = await Promise.all([
      Promise.all(
        numericFields.map((field) => attempt(field, async () => numericValue(await readPoint(field))))
      ),
      attempt('system_mode', async () => decodeSystemMode(await readPoint('system_mode'))),
      attempt('peak_savings', async () => decodeBinary(presentValue(await readPoint('peak_savings')))),
      attempt('fan_status', async () => decodeBinary(presentValue(await readPoint('fan_status')))),
      attempt('device_name', async () => {
        const document = await this.client.readProperty(this.deviceObjectId, 'object-name', request);
        return typeof document.value === 'string' ? document.value : undefined;
      })
    ]);

    const snapshot: ThermostatSnapshot = {
      device_name: deviceName ?? `Device ${this.device}`,
      timestamp: this.clock().toISOString()
    };
    numericFields.forEach((field, index) => {
      const value = numericValues[index];
      if (value !== undefined) {
        snapshot[field] = value;
      }
    });
    if (systemMode !== undefined) {
      snapshot.system_mode = systemMode;
    }
    if (peakSavings !== undefined) {
      snapshot.peak_savings = peakSavings;
    }
    if (fanStatus !== undefined) {
      snapshot.fan_status = fanStatus;
    }
    if (Object.keys(errors).length > 0) {
      snapshot.errors = errors;
    }
    return snapshot;
  }

  /** Raw present-value documents for every configured point, or a short error description. */
  async readRaw(options: SnapshotReadOptions = {}): Promise<Record<string, unknown>> {
    const logger = options.logger ?? this.logger;
    const request: RequestOptions = { signal: options.signal, timeoutMs: this.timeoutMs };
    const entries = await Promise.all(
      Object.entries(this.points).map(async ([point, objectId]): Promise<[string, unknown]> => {
        try {
          return [point, await this.client.readProperty(objectId, 'present-value', request)];
        } catch (error) {
          logger.debug({ point, objectId, err: error }, 'raw point read failed');
          return [point, describeReadError(error)];
        }
      })
    );
    return Object.fromEntries(entries);
  }
}
