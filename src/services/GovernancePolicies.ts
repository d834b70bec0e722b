/**
 * Governance policy presets and validation.
 * Presets are plain frozen data; a GovernanceService is
 * constructed with exactly one policy and never mutates it.
 */

import type { GovernancePolicy } from '../types/index.js';
import { InvalidConfigError } from '../errors.js';

export type PolicyPresetName = 'permissive' | 'default' | 'strict';

export const POLICY_PRESET_NAMES: readonly PolicyPresetName[] = ['permissive', 'default', 'strict'];

const PRESETS: Record<PolicyPresetName, GovernancePolicy> = {
  permissive: Object.freeze({
    blockUnsafeMerge: false,
    requireProvenance: false,
    blockJailbreakTraces: false,
    blockAnomalyTraces: false,
    maxAnomalySeverity: 10,
    autoQuarantine: false,
    quarantineSeverity: 10,
    blockMaliciousTraces: false,
    requireHumanReview: false,
  }),
  default: Object.freeze({
    blockUnsafeMerge: true,
    requireProvenance: true,
    blockJailbreakTraces: true,
    blockAnomalyTraces: true,
    maxAnomalySeverity: 7,
    autoQuarantine: true,
    quarantineSeverity: 8,
    blockMaliciousTraces: true,
    requireHumanReview: false,
  }),
  strict: Object.freeze({
    blockUnsafeMerge: true,
    requireProvenance: true,
    blockJailbreakTraces: true,
    blockAnomalyTraces: true,
    maxAnomalySeverity: 5,
    autoQuarantine: true,
    quarantineSeverity: 6,
    blockMaliciousTraces: true,
    requireHumanReview: true,
  }),
};

export const GovernancePolicies = {
  permissive: (): GovernancePolicy => PRESETS.permissive,
  default: (): GovernancePolicy => PRESETS.default,
  strict: (): GovernancePolicy => PRESETS.strict,
};

function isPresetName(name: string): name is PolicyPresetName {
  return (POLICY_PRESET_NAMES as readonly string[]).includes(name);
}

/** Look up a preset by name, e.g. from the GOVERNANCE_POLICY environment variable. */
export function resolvePolicy(name: string): GovernancePolicy {
  const key = name.trim().toLowerCase();
  if (!isPresetName(key)) {
    throw new InvalidConfigError(
      `Unknown governance policy "${name}". Must be one of: ${POLICY_PRESET_NAMES.join(', ')}`
    );
  }
  return PRESETS[key];
}

/** Check thresholds and return a frozen copy. */
export function validatePolicy(policy: GovernancePolicy): GovernancePolicy {
  const { maxAnomalySeverity, quarantineSeverity } = policy;

  if (!Number.isInteger(maxAnomalySeverity) || maxAnomalySeverity < 0 || maxAnomalySeverity > 10) {
    throw new InvalidConfigError(
      `maxAnomalySeverity must be an integer in [0, 10], got ${maxAnomalySeverity}`
    );
  }
  if (!Number.isInteger(quarantineSeverity) || quarantineSeverity < 1 || quarantineSeverity > 10) {
    throw new InvalidConfigError(
      `quarantineSeverity must be an integer in [1, 10], got ${quarantineSeverity}`
    );
  }

  return Object.isFrozen(policy) ? policy : Object.freeze({ ...policy });
}
