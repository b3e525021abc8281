/**
 * Bounded domain quantities recognized in generated tests.
 *
 * The normalizer clamps literals to these bounds and the validator flags
 * literals outside them; both read the same table.
 */

export interface BoundedQuantity {
  /** Identifier used in logs */
  id: string;
  /** Human label used in issue messages */
  label: string;
  min: number;
  max: number;
  unit: string;
}

export const TEMPERATURE: BoundedQuantity = {
  id: "temperature",
  label: "Temperature",
  min: -40,
  max: 125,
  unit: "°C",
};

/** 10-bit raw ADC counter, e.g. `rand() % 1024` */
export const RAW_COUNTER: BoundedQuantity = {
  id: "raw-counter",
  label: "Raw counter",
  min: 0,
  max: 1023,
  unit: "",
};

/** Absolute zero in °C; any literal near it is impossible for a sensor */
export const ABSOLUTE_ZERO_C = -273.15;

/** Tolerance used when rewriting exact float equality */
export const DEFAULT_FLOAT_TOLERANCE = "0.01f";

/**
 * Names marking a stub as returning a raw counter/index rather than a
 * physical value
 */
export const COUNTER_CONTEXT = /(?:rand|raw|adc|count|index|idx|tick)/i;

/**
 * `<stub>.return_value = <literal>`; group 1 is the stub expression before
 * `return_value`, group 2 the literal
 */
export const STUB_RETURN_SITE = /([\w.>-]*?)\breturn_value\s*=\s*(-?\d+(?:\.\d+)?)f?(?![\w.])/g;

export function isCounterTarget(target: string): boolean {
  return COUNTER_CONTEXT.test(target);
}

export function isWithin(value: number, quantity: BoundedQuantity): boolean {
  return value >= quantity.min && value <= quantity.max;
}

export function clampTo(value: number, quantity: BoundedQuantity): number {
  return Math.min(quantity.max, Math.max(quantity.min, value));
}

export function describeRange(quantity: BoundedQuantity): string {
  return `${quantity.min}${quantity.unit} to ${quantity.max}${quantity.unit}`;
}
