export interface ClockPort {
  now(): Date;
}

export interface RandomSourcePort {
  /** Returns a float in [0, 1). */
  next(): number;
}
