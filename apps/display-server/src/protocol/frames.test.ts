import { describe, expect, it } from 'vitest';
import { errorFrame, parseFrame, readNumber, readObject, readString } from './frames.js';

describe('parseFrame', () => {
  it('accepts an object with a string type and keeps other fields', () => {
    expect(parseFrame('{"type":"PING","timestamp":"t"}')).toEqual({
      ok: true,
      frame: { type: 'PING', timestamp: 't' },
    });
  });

  it('rejects non-JSON, non-objects and missing types', () => {
    expect(parseFrame('{not json')).toEqual({ ok: false, reason: 'Invalid JSON format' });
    expect(parseFrame('[1,2]')).toEqual({ ok: false, reason: 'Frame must be a JSON object' });
    expect(parseFrame('null')).toEqual({ ok: false, reason: 'Frame must be a JSON object' });
    expect(parseFrame('{"type":5}')).toEqual({ ok: false, reason: 'Missing message type' });
    expect(parseFrame('{}')).toEqual({ ok: false, reason: 'Missing message type' });
  });
});

describe('field readers', () => {
  const frame = { s: 'x', n: 3, inf: Number.POSITIVE_INFINITY, o: { a: 1 }, arr: [1] };

  it('read fields of the expected type only', () => {
    expect(readString(frame, 's')).toBe('x');
    expect(readString(frame, 'n')).toBeNull();
    expect(readNumber(frame, 'n')).toBe(3);
    expect(readNumber(frame, 'inf')).toBeNull();
    expect(readNumber(frame, 's')).toBeNull();
    expect(readObject(frame, 'o')).toEqual({ a: 1 });
    expect(readObject(frame, 'arr')).toBeNull();
    expect(readObject(frame, 'missing')).toBeNull();
  });
});

describe('errorFrame', () => {
  it('carries the code and message', () => {
    expect(errorFrame('ERR_003', 'Invalid JSON format')).toMatchObject({
      type: 'ERROR',
      code: 'ERR_003',
      message: 'Invalid JSON format',
    });
  });
});
