import { describe, it, expect } from 'vitest';
import { SnowflakeGenerator } from '../id';

describe('SnowflakeGenerator', () => {
  it('generates unique IDs', () => {
    const gen = new SnowflakeGenerator(1);
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(gen.generate());
    }
    expect(ids.size).toBe(1000);
  });

  it('generates monotonically increasing IDs', () => {
    const gen = new SnowflakeGenerator(0);
    let prev = BigInt(gen.generate());
    for (let i = 0; i < 100; i++) {
      const current = BigInt(gen.generate());
      expect(current).toBeGreaterThan(prev);
      prev = current;
    }
  });

  it('decodes the issue time, node and sequence', () => {
    const at = Date.parse('2026-03-02T10:00:00.000Z');
    const gen = new SnowflakeGenerator(42, () => at);

    gen.generate();
    const second = SnowflakeGenerator.decode(gen.generate());

    expect(second).toEqual({ issuedAt: new Date(at), nodeId: 42, sequence: 1 });
  });

  it('restarts the sequence on a new millisecond', () => {
    let at = Date.parse('2026-03-02T10:00:00.000Z');
    const gen = new SnowflakeGenerator(3, () => at);

    gen.generate();
    gen.generate();
    at += 1;

    expect(SnowflakeGenerator.decode(gen.generate()).sequence).toBe(0);
  });

  it('refuses to run when the clock goes backwards', () => {
    let at = Date.parse('2026-03-02T10:00:00.000Z');
    const gen = new SnowflakeGenerator(0, () => at);
    gen.generate();
    at -= 5;

    expect(() => gen.generate()).toThrow('Clock moved backwards by 5ms');
  });

  it('rejects invalid nodeId', () => {
    expect(() => new SnowflakeGenerator(-1)).toThrow();
    expect(() => new SnowflakeGenerator(1024)).toThrow();
    expect(() => new SnowflakeGenerator(1023)).not.toThrow();
  });
});
