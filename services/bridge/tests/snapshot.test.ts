import assert from 'node:assert/strict';
import { test } from 'node:test';

import { UpstreamError } from '@thermobridge/gateway-client';

import { DEFAULT_POINTS } from '../src/config/serviceConfig';
import { decodeBinary, decodeSystemMode, SnapshotReader, type ReadOutcome } from '../src/points/snapshot';
import { FakeProperties } from './fixtures';

const NOW = new Date(Date.UTC(2025, 6, 1, 12, 0, 0));

const upstream = (statusCode: number) =>
  new UpstreamError(`Gateway responded with ${statusCode}`, { url: 'http://gateway.test', statusCode });

test('decodes system modes from plain and enumerated values', () => {
  assert.equal(decodeSystemMode({ value: '1' }), 'Heating');
  assert.equal(decodeSystemMode({ value: 2 }), 'Cooling');
  assert.equal(decodeSystemMode({ value: { enumerated: { value: '2' } } }), 'Cooling');
  assert.equal(decodeSystemMode({ value: '7' }), 'Deadband');
  assert.equal(decodeSystemMode({}), 'Deadband');
  assert.equal(decodeSystemMode({ value: { enumerated: {} } }), 'Deadband');
  assert.equal(decodeSystemMode({ value: 'auto' }), 'Unknown');
  assert.equal(decodeSystemMode({ value: '2.5' }), 'Unknown');
  assert.equal(decodeSystemMode({ value: { enumerated: 'x' } }), 'Unknown');
});

test('treats active, on, true and 1 as set', () => {
  assert.deepEqual(
    ['Active', 'ON', 'true', 1, 'inactive', 'off', 0].map(decodeBinary),
    [true, true, true, true, false, false, false]
  );
});

test('reads a single-setpoint snapshot', async () => {
  const outcomes: Array<[string, ReadOutcome]> = [];
  const client = new FakeProperties({
    'analog-input,201001/present-value': { $base: 'Real', value: '72.4' },
    'analog-value,1/present-value': { $base: 'Real', value: 70 },
    'multi-state-value,2/present-value': { value: { enumerated: { value: '1' } } },
    'binary-value,16/present-value': { value: 'Active' },
    'binary-output,1105/present-value': { value: 'inactive' },
    'device,100/object-name': { value: 'RTU-1' }
  });
  const reader = new SnapshotReader({
    client,
    points: DEFAULT_POINTS,
    device: '100',
    useDualSetpoints: false,
    timeoutMs: 2_000,
    clock: () => NOW,
    onRead: (point, outcome) => outcomes.push([point, outcome])
  });

  assert.deepEqual(await reader.read(), {
    temperature: 72.4,
    zone_setpoint: 70,
    system_mode: 'Heating',
    peak_savings: true,
    fan_status: false,
    device_name: 'RTU-1',
    timestamp: '2025-07-01T12:00:00.000Z'
  });
  assert.equal(client.requests.length, 6);
  assert.ok(client.requests.every((request) => request.options?.timeoutMs === 2_000));
  assert.equal(outcomes.length, 6);
  assert.ok(outcomes.every(([, outcome]) => outcome === 'ok'));
});

test('reports failing points without failing the snapshot', async () => {
  const client = new FakeProperties({
    'analog-input,201001/present-value': { value: 'n/a' },
    'analog-value,3/present-value': upstream(404),
    'analog-value,2/present-value': { value: '76' },
    'multi-state-value,2/present-value': { value: 'auto' },
    'binary-value,16/present-value': {},
    'binary-output,1105/present-value': { value: 1 },
    'device,100/object-name': upstream(503)
  });
  const reader = new SnapshotReader({
    client,
    points: DEFAULT_POINTS,
    device: '100',
    useDualSetpoints: true,
    clock: () => NOW
  });

  assert.deepEqual(await reader.read(), {
    cooling_setpoint: 76,
    system_mode: 'Unknown',
    fan_status: true,
    device_name: 'Device 100',
    timestamp: '2025-07-01T12:00:00.000Z',
    errors: {
      temperature: 'present value is not numeric',
      heating_setpoint: 'HTTP 404',
      peak_savings: 'present-value document has no value',
      device_name: 'HTTP 503'
    }
  });
});

test('collects raw documents and read errors for every point', async () => {
  const client = new FakeProperties({
    'analog-input,201001/present-value': { value: '72.4' },
    'analog-value,1/present-value': upstream(503),
    'analog-value,3/present-value': { value: 68 },
    'analog-value,2/present-value': { value: 76 },
    'multi-state-value,2/present-value': { value: '3' },
    'binary-value,16/present-value': { value: 'inactive' },
    'binary-output,1105/present-value': new Error('socket hang up')
  });
  const reader = new SnapshotReader({ client, points: DEFAULT_POINTS, device: '100', useDualSetpoints: false });

  assert.deepEqual(await reader.readRaw(), {
    temperature: { value: '72.4' },
    zone_setpoint: 'HTTP 503',
    heating_setpoint: { value: 68 },
    cooling_setpoint: { value: 76 },
    system_mode: { value: '3' },
    peak_savings: { value: 'inactive' },
    fan_status: 'Error: socket hang up'
  });
});
