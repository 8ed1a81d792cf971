import { validate, version } from 'uuid';
import { describe, expect, it } from 'vitest';
import { UuidTraceIdGenerator } from './traceIdGenerator';

describe('UuidTraceIdGenerator', () => {
  it('mints a fresh v4 uuid per call', () => {
    const generator = new UuidTraceIdGenerator();

    const first = generator.generate();
    const second = generator.generate();

    expect(validate(first)).toBe(true);
    expect(version(first)).toBe(4);
    expect(second).not.toBe(first);
  });
});
