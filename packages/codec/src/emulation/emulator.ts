import type { ClockPort, EmulationRule, Frame, RandomSourcePort, Schema } from '@trackside/domain';
import { encodeFrame } from '../codec/frame-codec.js';

/** Anything that hands out the active schema, e.g. a SchemaRegistry. */
export interface SchemaProvider {
  readonly current: Schema;
}

/**
 * Evaluate one emulation rule at `tick`. Waveform rules are pure functions of
 * the tick; `uniform` draws from `rng`.
 */
export function evaluateRule(rule: EmulationRule, tick: number, rng: RandomSourcePort): number {
  switch (rule.kind) {
    case 'sine':
      return rule.offset + rule.amplitude * Math.sin((2 * Math.PI * (tick + (rule.phase ?? 0))) / rule.period);
    case 'cosine':
      return rule.offset + rule.amplitude * Math.cos((2 * Math.PI * (tick + (rule.phase ?? 0))) / rule.period);
    case 'uniform':
      return rule.low + rng.next() * (rule.high - rule.low);
    case 'constant':
      return rule.value;
    case 'linear':
      return rule.intercept + rule.slope * (rule.period === undefined ? tick : tick % rule.period);
  }
}

/**
 * Synthetic vehicle. Every tick produces one frame through the same encoder a
 * real producer would use, so emulated data exercises the full decode path.
 */
export class Emulator {
  private tickCount = 0;

  constructor(
    private readonly schemas: SchemaProvider,
    private readonly rng: RandomSourcePort,
    private readonly clock: ClockPort,
  ) {}

  /** Number of ticks produced so far; the next tick evaluates at this index. */
  get ticks(): number {
    return this.tickCount;
  }

  /** Values for every enabled sensor at the next tick, advancing the counter. */
  sample(schema: Schema = this.schemas.current): Record<string, number> {
    const tick = this.tickCount++;
    const values: Record<string, number> = {};
    for (const sensor of schema.enabled()) {
      values[sensor.id] = evaluateRule(sensor.emulation, tick, this.rng);
    }
    return values;
  }

  /** Throws EncodeError when a rule yields a value its field cannot hold. */
  tick(): Frame {
    const schema = this.schemas.current;
    const values = this.sample(schema);
    return encodeFrame(values, schema, { timestamp: this.clock.now().getTime() });
  }
}
