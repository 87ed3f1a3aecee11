/**
 * Measurements with units, conversion between units of one dimension, and
 * locale-aware formatting.
 *
 * A unit converts to its dimension's base unit with a linear function:
 * `base = value × coefficient + constant`. Units of different dimensions
 * cannot be mixed; the dimension is part of the unit's type.
 */

/** A unit of measure within dimension `D`. */
export interface Unit<D extends string = string> {
  readonly dimension: D;
  readonly symbol: string;
  readonly coefficient: number;
  readonly constant: number;
  /**
   * Sanctioned `Intl.NumberFormat` unit identifier, when there is one.
   * Units without it are formatted as `number + " " + symbol`.
   */
  readonly intlUnit?: string | undefined;
}

/** A value paired with its unit. */
export interface Measurement<D extends string = string> {
  readonly value: number;
  readonly unit: Unit<D>;
}

/** Input for {@link defineUnit}. */
export interface UnitConfig<D extends string> {
  readonly dimension: D;
  readonly symbol: string;
  readonly coefficient: number;
  readonly constant?: number | undefined;
  readonly intlUnit?: string | undefined;
}

/**
 * Defines a unit. Custom units are as capable as the built-in ones.
 *
 * @example
 * ```ts
 * const beardSecond = defineUnit({ dimension: "length", symbol: "BS", coefficient: 1e-8 });
 * ```
 */
export const defineUnit = <D extends string>(config: UnitConfig<D>): Unit<D> =>
  Object.freeze({
    dimension: config.dimension,
    symbol: config.symbol,
    coefficient: config.coefficient,
    constant: config.constant ?? 0,
    ...(config.intlUnit !== undefined ? { intlUnit: config.intlUnit } : {}),
  });

/** Creates a measurement. */
export const measurement = <D extends string>(
  value: number,
  unit: Unit<D>,
): Measurement<D> => Object.freeze({ value, unit });

/** Built-in length units (base: meters). */
export const UnitLength = Object.freeze({
  meters: defineUnit({ dimension: "length", symbol: "m", coefficient: 1, intlUnit: "meter" }),
  kilometers: defineUnit({ dimension: "length", symbol: "km", coefficient: 1000, intlUnit: "kilometer" }),
  centimeters: defineUnit({ dimension: "length", symbol: "cm", coefficient: 0.01, intlUnit: "centimeter" }),
  millimeters: defineUnit({ dimension: "length", symbol: "mm", coefficient: 0.001, intlUnit: "millimeter" }),
  feet: defineUnit({ dimension: "length", symbol: "ft", coefficient: 0.3048, intlUnit: "foot" }),
  miles: defineUnit({ dimension: "length", symbol: "mi", coefficient: 1609.344, intlUnit: "mile" }),
  /** One beard-second: the length a beard grows in one second. */
  beardSecond: defineUnit({ dimension: "length", symbol: "BS", coefficient: 1e-8 }),
});

/** Built-in temperature units (base: kelvin). */
export const UnitTemperature = Object.freeze({
  kelvin: defineUnit({ dimension: "temperature", symbol: "K", coefficient: 1 }),
  celsius: defineUnit({
    dimension: "temperature",
    symbol: "°C",
    coefficient: 1,
    constant: 273.15,
    intlUnit: "celsius",
  }),
  fahrenheit: defineUnit({
    dimension: "temperature",
    symbol: "°F",
    coefficient: 5 / 9,
    constant: 255.37222222222,
    intlUnit: "fahrenheit",
  }),
});

/** Built-in mass units (base: kilograms). */
export const UnitMass = Object.freeze({
  kilograms: defineUnit({ dimension: "mass", symbol: "kg", coefficient: 1, intlUnit: "kilogram" }),
  grams: defineUnit({ dimension: "mass", symbol: "g", coefficient: 0.001, intlUnit: "gram" }),
  pounds: defineUnit({ dimension: "mass", symbol: "lb", coefficient: 0.45359237, intlUnit: "pound" }),
});

/** A dimension of its own: the helen, the beauty that launches a thousand ships. */
export const UnitBeauty = Object.freeze({
  helen: defineUnit({ dimension: "beauty", symbol: "👸", coefficient: 1 }),
  millihelen: defineUnit({ dimension: "beauty", symbol: "m👸", coefficient: 0.001 }),
});

/** Converts a measurement into another unit of the same dimension. */
export const convertMeasurement = <D extends string>(
  source: Measurement<D>,
  target: Unit<D>,
): Measurement<D> => {
  if (source.unit === target) return source;
  const base = source.value * source.unit.coefficient + source.unit.constant;
  return measurement((base - target.constant) / target.coefficient, target);
};

/** Options for {@link formatMeasurement}. */
export interface MeasurementFormatOptions {
  readonly unitDisplay?: "long" | "short" | "narrow" | undefined;
  readonly maximumFractionDigits?: number | undefined;
}

/**
 * Formats a measurement in the unit it was given in.
 *
 * @example
 * ```ts
 * formatMeasurement(measurement(52000, UnitLength.meters), "en-US"); // "52,000 m"
 * ```
 */
export const formatMeasurement = (
  value: Measurement,
  locale: string,
  options?: MeasurementFormatOptions,
): string => {
  const maximumFractionDigits = options?.maximumFractionDigits ?? 3;
  const { unit } = value;

  if (unit.intlUnit !== undefined) {
    return new Intl.NumberFormat(locale, {
      style: "unit",
      unit: unit.intlUnit,
      unitDisplay: options?.unitDisplay ?? "short",
      maximumFractionDigits,
    }).format(value.value);
  }

  const number = new Intl.NumberFormat(locale, { maximumFractionDigits }).format(value.value);
  return `${number} ${unit.symbol}`;
};
