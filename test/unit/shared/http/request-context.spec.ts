import { describe, it, expect } from 'vitest';
import { parseHost, resolveRequestId } from '../../../../src/shared/http/request-context';

describe('parseHost', () => {
  it('strips the port and lowercases', () => {
    expect(parseHost('API.Test:3000')).toBe('api.test');
  });

  it('returns null for missing or blank hosts', () => {
    expect(parseHost(undefined)).toBeNull();
    expect(parseHost('   ')).toBeNull();
  });
});

describe('resolveRequestId', () => {
  it('reuses a well-formed client id', () => {
    expect(resolveRequestId('req-123_abc.def')).toBe('req-123_abc.def');
  });

  it('mints a uuid for missing or unsafe ids', () => {
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

    expect(resolveRequestId(undefined)).toMatch(uuid);
    expect(resolveRequestId('has spaces\nand newlines')).toMatch(uuid);
    expect(resolveRequestId(['a', 'b'])).toMatch(uuid);
  });
});
