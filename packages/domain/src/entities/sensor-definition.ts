export type SensorFieldType = 'u8' | 'i8' | 'u16' | 'i16' | 'u32' | 'i32' | 'f32' | 'f64';

// ---------------------------------------------------------------------------
// Emulation rules: declarative generators evaluated by the emulator
// ---------------------------------------------------------------------------

export interface SineRule {
  readonly kind: 'sine';
  readonly amplitude: number;
  readonly offset: number;
  readonly period: number; // ticks per cycle
  readonly phase?: number; // ticks
}

export interface CosineRule {
  readonly kind: 'cosine';
  readonly amplitude: number;
  readonly offset: number;
  readonly period: number;
  readonly phase?: number;
}

export interface UniformRandomRule {
  readonly kind: 'uniform';
  readonly low: number;
  readonly high: number;
}

export interface ConstantRule {
  readonly kind: 'constant';
  readonly value: number;
}

export interface LinearRule {
  readonly kind: 'linear';
  readonly slope: number;
  readonly intercept: number;
  readonly period?: number; // restart the ramp every `period` ticks
}

export type EmulationRule = SineRule | CosineRule | UniformRandomRule | ConstantRule | LinearRule;

export type EmulationRuleKind = EmulationRule['kind'];

export interface SensorDefinition {
  readonly id: string;
  readonly name: string;
  readonly units: string;
  readonly group: string;
  readonly enable: boolean;
  readonly min: number;
  readonly max: number;
  readonly onDash: boolean;
  readonly type: SensorFieldType;
  readonly scale: number;
  readonly emulation: EmulationRule;
}

/** Display metadata served to clients; wire details stay server-side. */
export type SensorMeta = Pick<SensorDefinition, 'name' | 'units' | 'min' | 'max' | 'onDash'>;
