import { describe, it, expect } from '@jest/globals';
import { parseSseLines, parseSsePayload } from './sse-parser';

describe('sse-parser', () => {
  it('collects data lines and keeps the partial tail', () => {
    const result = parseSseLines('data: {"a":1}\r\nevent: status\n: keepalive\ndata:\nid: 4\ndata: {"b"');

    expect(result).toEqual({ payloads: ['{"a":1}'], remaining: 'data: {"b"' });
  });

  it('joins a payload split across chunks', () => {
    const first = parseSseLines('data: {"status":');
    const second = parseSseLines(`${first.remaining}"Idle"}\n`);

    expect(first.payloads).toEqual([]);
    expect(second).toEqual({ payloads: ['{"status":"Idle"}'], remaining: '' });
  });

  it('accepts only JSON objects as payloads', () => {
    expect(parseSsePayload('{"status":"Idle"}')).toEqual({ status: 'Idle' });
    expect(parseSsePayload('[1,2]')).toBeNull();
    expect(parseSsePayload('{bad')).toBeNull();
  });
});
