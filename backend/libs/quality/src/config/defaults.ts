// config/defaults.ts
// Default analysis configuration.

import type { QualityConfig } from "./schema.js";

export const DEFAULT_MISSING_MARKERS: readonly string[] = [
  "", "NA", "N/A", "n/a", "NaN", "nan", "-NaN", "-nan", "NULL", "null", "None",
  "<NA>", "#N/A", "#N/A N/A", "#NA", "-1.#IND", "-1.#QNAN", "1.#IND", "1.#QNAN",
];

export const defaults: QualityConfig = {
  inference: {
    categoricalMaxFraction: 0.2,   // distinct / non-null
    categoricalMaxDistinct: 50,
    missingMarkers: DEFAULT_MISSING_MARKERS,
  },

  profile: {
    topN: 10,
    sampleSize: 5,
    outlierIqrMultiplier: 1.5,
  },

  drift: {
    nullRate: { critical: 0.2, warning: 0.05, info: 0.01 },
    meanShift: { critical: 3, warning: 1, epsilon: 1e-9 },
    psi: { bins: 10, critical: 0.25, warning: 0.1, epsilon: 1e-4 },
    category: {
      missingMinShare: 0.05,
      newSeverity: "warning",
      missingSeverity: "critical",
    },
  },

  scoring: {
    penalties: { critical: 15, warning: 5, info: 1 },
    schemaSeverity: {
      columnAdded: "info",
      columnRemoved: "critical",
      typeChanged: "critical",
    },
  },

  runtime: {
    concurrency: 0,                // 0 = available parallelism
  },
};
