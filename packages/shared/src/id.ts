// 41 bits of milliseconds since EPOCH, 10 bits of node id, 12 bits of sequence.
// Ids are decimal strings so they survive JSON and map onto BIGINT columns.
const EPOCH = 1735689600000n; // 2025-01-01T00:00:00Z
const NODE_BITS = 10n;
const SEQUENCE_BITS = 12n;
const MAX_NODE = (1n << NODE_BITS) - 1n;
const MAX_SEQUENCE = (1n << SEQUENCE_BITS) - 1n;
const TIMESTAMP_SHIFT = NODE_BITS + SEQUENCE_BITS;

export interface DecodedId {
  issuedAt: Date;
  nodeId: number;
  sequence: number;
}

export class SnowflakeGenerator {
  private readonly nodeId: bigint;
  private sequence = 0n;
  private lastTick = -1n;

  constructor(
    nodeId: number,
    private readonly clock: () => number = Date.now,
  ) {
    const id = BigInt(nodeId);
    if (id < 0n || id > MAX_NODE) {
      throw new Error(`nodeId must be between 0 and ${MAX_NODE}`);
    }
    this.nodeId = id;
  }

  private tick(): bigint {
    return BigInt(this.clock()) - EPOCH;
  }

  generate(): string {
    let tick = this.tick();
    if (tick < this.lastTick) {
      throw new Error(`Clock moved backwards by ${this.lastTick - tick}ms`);
    }

    if (tick === this.lastTick) {
      this.sequence = (this.sequence + 1n) & MAX_SEQUENCE;
      // Sequence exhausted for this millisecond: spin until the next one.
      while (this.sequence === 0n && tick <= this.lastTick) {
        tick = this.tick();
      }
    } else {
      this.sequence = 0n;
    }
    this.lastTick = tick;

    return ((tick << TIMESTAMP_SHIFT) | (this.nodeId << SEQUENCE_BITS) | this.sequence).toString();
  }

  /** Bound generator in the shape the domain services take. */
  asFunction(): () => string {
    return () => this.generate();
  }

  static decode(id: string): DecodedId {
    const value = BigInt(id);
    return {
      issuedAt: new Date(Number((value >> TIMESTAMP_SHIFT) + EPOCH)),
      nodeId: Number((value >> SEQUENCE_BITS) & MAX_NODE),
      sequence: Number(value & MAX_SEQUENCE),
    };
  }
}
