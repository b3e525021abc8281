/**
 * Domain-feature coverage checks, one per embedded feature
 */

import { EMBEDDED_FEATURES } from "../embedded.js";

import type { EmbeddedFeature } from "../embedded.js";
import type { ValidationCheck } from "./types.js";

export function featureCheck(feature: EmbeddedFeature): ValidationCheck {
  return {
    id: `feature-${feature.id}`,
    concern: "domain-feature",
    description: `${feature.label} in the source is exercised by the tests`,
    run({ testCode, analysis }) {
      if (!feature.detect.test(analysis.source) || feature.evidence.test(testCode)) {
        return { issues: [] };
      }
      return feature.breaksCompilation
        ? { issues: [feature.issue], compiles: false }
        : { issues: [feature.issue] };
    },
  };
}

export const FEATURE_CHECKS: readonly ValidationCheck[] = EMBEDDED_FEATURES.map(featureCheck);
