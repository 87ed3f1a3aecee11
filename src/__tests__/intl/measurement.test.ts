import { describe, it, expect } from "vitest";
import {
  UnitBeauty,
  UnitLength,
  UnitMass,
  UnitTemperature,
  convertMeasurement,
  defineUnit,
  formatMeasurement,
  measurement,
} from "../../intl/measurement.js";

describe("convertMeasurement()", () => {
  it("converts fahrenheit to celsius", () => {
    const converted = convertMeasurement(measurement(72, UnitTemperature.fahrenheit), UnitTemperature.celsius);
    expect(converted.value).toBeCloseTo(22.2222, 4);
    expect(converted.unit).toBe(UnitTemperature.celsius);
  });

  it("converts millimeters to beard-seconds", () => {
    const converted = convertMeasurement(measurement(5, UnitLength.millimeters), UnitLength.beardSecond);
    expect(converted.value).toBeCloseTo(500_000, 3);
  });

  it("converts through the base unit", () => {
    expect(convertMeasurement(measurement(1, UnitMass.kilograms), UnitMass.grams).value).toBeCloseTo(1000, 9);
  });

  it("returns the same measurement for the same unit", () => {
    const source = measurement(3, UnitLength.miles);
    expect(convertMeasurement(source, UnitLength.miles)).toBe(source);
  });

  it("supports custom units", () => {
    const furlong = defineUnit({ dimension: "length", symbol: "fur", coefficient: 201.168 });
    expect(convertMeasurement(measurement(1, furlong), UnitLength.meters).value).toBeCloseTo(201.168, 9);
  });
});

describe("formatMeasurement()", () => {
  it("formats sanctioned units through Intl", () => {
    expect(formatMeasurement(measurement(52000, UnitLength.meters), "en-US")).toBe("52,000 m");
  });

  it("formats custom units with their symbol", () => {
    expect(formatMeasurement(measurement(1, UnitBeauty.helen), "en-US")).toBe("1 👸");
    expect(formatMeasurement(measurement(1234.5, UnitLength.beardSecond), "de-DE")).toBe("1.234,5 BS");
  });

  it("limits fraction digits", () => {
    expect(formatMeasurement(measurement(1.23456, UnitLength.meters), "en-US", { maximumFractionDigits: 1 })).toBe("1.2 m");
  });
});
