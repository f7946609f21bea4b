import { ConfigurationError, EngineConfigKeySchema } from "@practice/core";
import type { EngineConfigKey, EngineConfigUpdate } from "@practice/core";
import { cell, parseCsvRecords } from "./csv";

const squash = (key: string): string => key.toLowerCase().replace(/[\s_-]+/g, "");

const KEY_LOOKUP = new Map<string, EngineConfigKey>(
  EngineConfigKeySchema.options.map(key => [squash(key), key])
);

/**
 * Reads `key,value` overrides. Keys match config field names in any case,
 * with or without underscores or spaces (`mastery_threshold`, `Mastery Threshold`).
 */
export const parseEngineConstantsCsv = (text: string): EngineConfigUpdate => {
  const updates: EngineConfigUpdate = {};
  const issues: string[] = [];

  parseCsvRecords(text, ["key", "value"], "constants").forEach((record, index) => {
    const rawKey = cell(record, "key");
    const rawValue = cell(record, "value");
    const key = KEY_LOOKUP.get(squash(rawKey));
    if (!key) {
      issues.push(`row ${index + 1}: unknown key "${rawKey}"`);
      return;
    }
    const value = Number(rawValue);
    if (rawValue === "" || !Number.isFinite(value)) {
      issues.push(`row ${index + 1}: "${rawValue}" is not a number`);
      return;
    }
    updates[key] = value;
  });

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid engine constants", issues);
  }
  return updates;
};
