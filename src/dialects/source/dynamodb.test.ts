import { resolveCursorType } from '../../engine/cursor-type';
import { inferProperties } from '../../engine/schema-inference';
import { buildScanInput, toJsonValue, toSourceRecord } from './dynamodb';

describe('buildScanInput', () => {
  it('scans the whole table when nothing is projected or filtered', () => {
    expect(buildScanInput('orders')).toEqual({ TableName: 'orders' });
    expect(buildScanInput('orders', { attributes: [] })).toEqual({ TableName: 'orders' });
  });

  it('projects attributes and filters strictly after a string cursor', () => {
    const input = buildScanInput(
      'orders',
      {
        attributes: ['id', 'name'],
        filter: { attribute: 'updated', value: '2023-01-01', type: 'string' },
        limit: 5,
      },
      { id: { N: '2' } }
    );

    expect(input).toEqual({
      TableName: 'orders',
      ProjectionExpression: '#a0, #a1',
      FilterExpression: '#cursor > :cursor',
      ExpressionAttributeNames: { '#a0': 'id', '#a1': 'name', '#cursor': 'updated' },
      ExpressionAttributeValues: { ':cursor': { S: '2023-01-01' } },
      Limit: 5,
      ExclusiveStartKey: { id: { N: '2' } },
    });
  });

  it('sends numeric cursors as numbers', () => {
    const input = buildScanInput('orders', { filter: { attribute: 'version', value: '10', type: 'numeric' } });

    expect(input.ExpressionAttributeValues).toEqual({ ':cursor': { N: '10' } });
    expect(input.ExpressionAttributeNames).toEqual({ '#cursor': 'version' });
  });
});

describe('toJsonValue', () => {
  it('passes bigints through', () => {
    expect(toJsonValue(12345678901234567890n)).toBe(12345678901234567890n);
  });

  it('turns sets into arrays and binary into base64', () => {
    expect(toJsonValue(new Set(['a', 'b']))).toEqual(['a', 'b']);
    expect(toJsonValue(new Uint8Array([1, 2, 3]))).toBe('AQID');
  });
});

describe('toSourceRecord', () => {
  it('unmarshalls every attribute type into plain JSON', () => {
    const record = toSourceRecord({
      id: { N: '1' },
      price: { N: '2.5' },
      name: { S: 'Lamp' },
      tags: { SS: ['home', 'light'] },
      thumbnail: { B: new Uint8Array([1, 2, 3]) },
      meta: { M: { active: { BOOL: true }, deleted: { NULL: true } } },
      sizes: { L: [{ S: 'S' }, { N: '42' }] },
    });

    expect(record).toEqual({
      id: 1,
      price: 2.5,
      name: 'Lamp',
      tags: ['home', 'light'],
      thumbnail: 'AQID',
      meta: { active: true, deleted: null },
      sizes: ['S', 42],
    });
  });
});

describe('large numbers', () => {
  it('keeps integers beyond double precision exact', () => {
    expect(toSourceRecord({ ts: { N: '1700000000000000001' } })).toEqual({ ts: 1700000000000000001n });
  });

  it('reads a fraction too large for a double as the nearest double', () => {
    expect(toSourceRecord({ amt: { N: '12345678901234567.5' } })).toEqual({ amt: 12345678901234568 });
  });

  it('resumes a nanosecond timestamp cursor with a numeric filter', () => {
    const rows = [
      toSourceRecord({ id: { S: 'a' }, ts: { N: '1700000000000000000' } }),
      toSourceRecord({ id: { S: 'b' }, ts: { N: '1700000000000000001' } }),
    ];

    const properties = inferProperties(rows);
    expect(properties.ts).toEqual({ type: 'integer' });

    const cursorType = resolveCursorType('events', 'ts', properties.ts);
    const input = buildScanInput('events', {
      filter: { attribute: 'ts', value: '1700000000000000001', type: cursorType },
    });

    expect(input.ExpressionAttributeValues).toEqual({ ':cursor': { N: '1700000000000000001' } });
  });
});
