import { EXPONENT_LIMIT, LOG_EPSILON } from "../config/constants";

export const logistic = (value: number): number => {
  if (value < -EXPONENT_LIMIT) {
    return 0;
  }
  if (value > EXPONENT_LIMIT) {
    return 1;
  }
  return 1 / (1 + Math.exp(-value));
};

export const clamp = (value: number, min = 0, max = 1): number =>
  Math.min(max, Math.max(min, value));

export const safeLog = (value: number, epsilon = LOG_EPSILON): number =>
  Math.log(Math.max(value, epsilon));

export const normalPdf = (x: number, mean = 0, std = 1): number => {
  const variance = std * std;
  return Math.exp(-((x - mean) ** 2) / (2 * variance)) / Math.sqrt(2 * Math.PI * variance);
};

/** Evenly spaced points from min to max inclusive. */
export const linspace = (min: number, max: number, count: number): number[] => {
  if (count <= 1) {
    return [min];
  }
  const step = (max - min) / (count - 1);
  return Array.from({ length: count }, (_, index) =>
    index === count - 1 ? max : min + index * step
  );
};

export const round = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
