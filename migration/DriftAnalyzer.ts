/**
 * Drift Analyzer
 *
 * Compares a user's config against the bundled default and reports, as dotted
 * paths, which keys the default adds, which ones the user overrides and which
 * ones only the user has.
 */

import { deepEqual, isJsonObject } from "../core/json.js";
import { findKey, isVersionKey } from "../core/keys.js";
import type { JsonObject } from "../core/types.js";

export interface DriftReport {
  /** Present only in the default */
  addedKeys: string[];
  /** Present in both with a different value */
  overriddenKeys: string[];
  /** Present only in the user's file */
  userKeys: string[];
  identical: boolean;
}

export class DriftAnalyzer {
  analyze(defaults: JsonObject, current: JsonObject): DriftReport {
    const report: DriftReport = {
      addedKeys: [],
      overriddenKeys: [],
      userKeys: [],
      identical: true,
    };

    this.walk(defaults, current, "", report);

    report.identical =
      report.addedKeys.length === 0 &&
      report.overriddenKeys.length === 0 &&
      report.userKeys.length === 0;
    return report;
  }

  private walk(
    defaults: JsonObject,
    current: JsonObject,
    prefix: string,
    report: DriftReport,
  ): void {
    const topLevel = prefix === "";
    const currentKeys = Object.keys(current);
    const defaultKeys = Object.keys(defaults);

    for (const key of defaultKeys) {
      if (topLevel && isVersionKey(key)) continue;
      const keyPath = prefix ? `${prefix}.${key}` : key;

      const match = findKey(currentKeys, key);
      if (match === undefined) {
        report.addedKeys.push(keyPath);
        continue;
      }

      const defaultValue = defaults[key];
      const currentValue = current[match];
      if (isJsonObject(defaultValue) && isJsonObject(currentValue)) {
        this.walk(defaultValue, currentValue, keyPath, report);
      } else if (!deepEqual(defaultValue, currentValue)) {
        report.overriddenKeys.push(keyPath);
      }
    }

    for (const key of currentKeys) {
      if (topLevel && isVersionKey(key)) continue;
      if (findKey(defaultKeys, key) === undefined) {
        report.userKeys.push(prefix ? `${prefix}.${key}` : key);
      }
    }
  }
}
