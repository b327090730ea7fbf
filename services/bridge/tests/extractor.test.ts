import assert from 'node:assert/strict';
import { test } from 'node:test';

import { extractRecords } from '../src/trends/extractor';
import { coerceNumber, readLogDatum } from '../src/trends/logDatum';
import { logPage, logRecord } from './fixtures';

test('prefers real-value over other numeric containers', () => {
  const reading = readLogDatum({ 'unsigned-value': { value: 3 }, 'real-value': { value: '70.25' } });
  assert.equal(reading.value, 70.25);
  assert.equal(reading.tag, 'real-value');
  assert.equal(reading.statusOnly, false);
});

test('falls back to the first numeric container and decodes booleans', () => {
  assert.equal(readLogDatum({ 'signed-value': { value: '-4' } }).value, -4);
  assert.equal(readLogDatum({ 'boolean-value': { value: 'active' } }).value, 1);
  assert.equal(readLogDatum({ 'integer-value': { value: '2.5' } }).value, null);
});

test('flags status-only entries and keeps status entries that carry a value', () => {
  assert.deepEqual(readLogDatum({ 'log-status': { value: { 'log-disabled': true } } }), {
    value: null,
    tag: null,
    statusOnly: true,
    unknownTags: []
  });
  const mixed = readLogDatum({ 'log-status': { value: {} }, 'real-value': { value: 71 } });
  assert.equal(mixed.value, 71);
  assert.equal(mixed.statusOnly, false);
});

test('reads numeric leaves under unrecognised tags and reports the tag', () => {
  const reading = readLogDatum({ 'vendor-value': { value: '12.5' } });
  assert.equal(reading.value, 12.5);
  assert.deepEqual(reading.unknownTags, ['vendor-value']);
});

test('coerces only finite decimal numbers', () => {
  assert.equal(coerceNumber(' 1e3 '), 1000);
  assert.equal(coerceNumber('72.'), 72);
  assert.equal(coerceNumber('NaN'), null);
  assert.equal(coerceNumber(Number.POSITIVE_INFINITY), null);
  assert.equal(coerceNumber('12 degrees'), null);
  assert.equal(coerceNumber(true), null);
});

test('extracts samples and reports why other entries were skipped', () => {
  const body = logPage([
    logRecord('2025-07-01T10:00:00Z', 70),
    { timestamp: '2025-07-01T10:05:00Z', logDatum: { 'real-value': { value: '71' } } },
    'garbage',
    { logDatum: { 'real-value': { value: 72 } } },
    { timestamp: { value: '2025-07-01T10:15:00Z' }, logDatum: { 'log-status': { value: {} } } },
    { timestamp: { value: '2025-07-01T10:20:00Z' }, logDatum: {} }
  ]);
  body.$next = 'http://gateway.test/next';

  const result = extractRecords(body);
  assert.deepEqual(result.samples, [
    { key: '1', timestamp: '2025-07-01T10:00:00Z', value: 70 },
    { key: '2', timestamp: '2025-07-01T10:05:00Z', value: 71 }
  ]);
  assert.deepEqual(
    result.skipped.map((skip) => [skip.key, skip.reason]),
    [
      ['3', 'not-an-object'],
      ['4', 'missing-timestamp'],
      ['5', 'status-row'],
      ['6', 'no-numeric-value']
    ]
  );
  assert.deepEqual(result.unknownTags, []);
});

test('yields exactly the well-formed records regardless of malformed ones', () => {
  const good = [0, 1, 2, 3].map((index) => logRecord(`2025-07-01T10:0${index}:00Z`, 70 + index));
  for (const malformedCount of [0, 1, 5]) {
    const malformed = Array.from({ length: malformedCount }, (_, index) =>
      index % 2 === 0 ? null : { timestamp: 42, logDatum: { 'real-value': { value: 1 } } }
    );
    const result = extractRecords(logPage([...malformed, ...good]));
    assert.equal(result.samples.length, 4, `with ${malformedCount} malformed records`);
    assert.equal(result.skipped.length, malformedCount);
  }
});
