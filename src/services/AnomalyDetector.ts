/**
 * Anomaly detection for trace payloads.
 *
 * Pattern-matches the string content of a payload against risk signatures
 * (prompt-injection phrasing, destructive commands, obfuscation, degenerate
 * repetition) and, when an RD series is supplied, looks for distortion
 * spikes. Every finding becomes an auto-detected TraceFlagInfo.
 *
 * Heuristic, not a classifier: GovernanceService takes any AnomalyDetector,
 * so a stronger detector can replace this one without touching the gate.
 */

import { InvalidConfigError } from '../errors.js';
import type { JsonValue, RDSeries, TraceFlagInfo, TraceFlagKind } from '../types/index.js';

export interface DetectionContext {
  /** RD series produced alongside the payload, if any. */
  rdSeries?: RDSeries;
}

export interface AnomalyDetector {
  /** Must be deterministic for the same payload and context. */
  detect(payload: JsonValue, context?: DetectionContext): TraceFlagInfo[];
}

export interface RiskSignature {
  /** Stateless: the `g` and `y` flags are rejected. */
  pattern: RegExp;
  label: string;
  flag: TraceFlagKind;
  severity: number;
}

export interface SignatureDetectorOptions {
  signatures?: RiskSignature[];
  /** More zero-width characters than this in one string is obfuscation. Default: 5. */
  maxZeroWidthChars?: number;
  /** Repetition is only judged on at least this many words. Default: 20. */
  repetitionMinWords?: number;
  /** Share of all words one word may take before it counts as repetition. Default: 0.5. */
  repetitionMaxShare?: number;
  /** A step whose distortion exceeds the previous one by this factor is a spike. Default: 2. */
  distortionSpikeFactor?: number;
  /** Clock for flag timestamps. */
  now?: () => Date;
}

export const DEFAULT_SIGNATURES: RiskSignature[] = [
  // Direct instruction override
  {
    pattern: /ignore\s+(your\s+)?(previous|prior|all|above)\s+(instructions|directives|rules|prompts)/i,
    label: 'injection: instruction override',
    flag: 'jailbreak',
    severity: 10,
  },
  {
    pattern: /disregard\s+(your\s+)?(previous|prior|all|above)/i,
    label: 'injection: instruction override',
    flag: 'jailbreak',
    severity: 10,
  },

  // System prompt markers
  {
    pattern: /\[SYSTEM\]|\[\[SYSTEM\]\]|<<SYS>>|<\|im_start\|>system/i,
    label: 'injection: system prompt marker',
    flag: 'jailbreak',
    severity: 10,
  },

  // Role reassignment
  {
    pattern: /from\s+now\s+on,?\s+you\s+(are|will|should|must)/i,
    label: 'injection: role reassignment',
    flag: 'jailbreak',
    severity: 10,
  },
  {
    pattern: /\bjailbreak(ing|s)?\b|\bDAN\s+mode\b/i,
    label: 'injection: jailbreak phrasing',
    flag: 'jailbreak',
    severity: 10,
  },

  // Secret extraction
  {
    pattern: /(output|print|reveal|show|send|leak)\s+(your|the)\s+(api\s*key|secret|token|password|system\s*prompt|credentials)/i,
    label: 'injection: secret extraction attempt',
    flag: 'jailbreak',
    severity: 10,
  },

  // Destructive commands
  {
    pattern: /\brm\s+-(rf|fr)\b/i,
    label: 'command: recursive delete',
    flag: 'malicious',
    severity: 9,
  },
  {
    pattern: /\bdrop\s+(table|database)\b/i,
    label: 'command: drop table',
    flag: 'malicious',
    severity: 9,
  },
  {
    pattern: /\bmkfs(\.\w+)?\s/i,
    label: 'command: filesystem format',
    flag: 'malicious',
    severity: 9,
  },
  {
    pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,
    label: 'command: fork bomb',
    flag: 'malicious',
    severity: 9,
  },
  {
    pattern: /\b(curl|wget)\b[^|\n]*\|\s*(ba|z)?sh\b/i,
    label: 'command: remote script piped to shell',
    flag: 'malicious',
    severity: 9,
  },
];

const ZERO_WIDTH = /[\u200b\u200c\u200d\u2060\ufeff]/g;

/** Longest field path quoted in a finding's reason. */
export const MAX_REASON_PATH_LENGTH = 200;

export class SignatureAnomalyDetector implements AnomalyDetector {
  private readonly signatures: RiskSignature[];
  private readonly maxZeroWidthChars: number;
  private readonly repetitionMinWords: number;
  private readonly repetitionMaxShare: number;
  private readonly distortionSpikeFactor: number;
  private readonly now: () => Date;

  constructor(options: SignatureDetectorOptions = {}) {
    this.signatures = options.signatures ?? DEFAULT_SIGNATURES;
    for (const { pattern, label } of this.signatures) {
      if (pattern.global || pattern.sticky) {
        throw new InvalidConfigError(
          `signature "${label}" must not use the g or y flag: test() would carry lastIndex between payloads`
        );
      }
    }
    this.maxZeroWidthChars = options.maxZeroWidthChars ?? 5;
    this.repetitionMinWords = options.repetitionMinWords ?? 20;
    this.repetitionMaxShare = options.repetitionMaxShare ?? 0.5;
    this.distortionSpikeFactor = options.distortionSpikeFactor ?? 2;
    this.now = options.now ?? (() => new Date());
  }

  detect(payload: JsonValue, context: DetectionContext = {}): TraceFlagInfo[] {
    const flags: TraceFlagInfo[] = [];
    const seenLabels = new Set<string>();
    const texts = collectStrings(payload, '$');

    // One flag per signature label, attributed to the first field it appears in
    for (const { pattern, label, flag, severity } of this.signatures) {
      if (seenLabels.has(label)) continue;
      const hit = texts.find(({ text }) => pattern.test(text));
      if (hit) {
        seenLabels.add(label);
        flags.push(this.flag(flag, severity, `${label} (in ${shortenPath(hit.path)})`));
      }
    }

    // Zero-width character obfuscation
    for (const { path, text } of texts) {
      const count = (text.match(ZERO_WIDTH) ?? []).length;
      if (count > this.maxZeroWidthChars) {
        flags.push(
          this.flag(
            'unsafe',
            6,
            `obfuscation: excessive zero-width characters in ${shortenPath(path)} (${count})`
          )
        );
        break;
      }
    }

    const repetition = this.findRepetition(texts.map(({ text }) => text));
    if (repetition) {
      flags.push(this.flag('anomaly', 4, repetition));
    }

    if (context.rdSeries) {
      const spike = this.findDistortionSpike(context.rdSeries);
      if (spike) {
        flags.push(this.flag('anomaly', 6, spike));
      }
    }

    return flags;
  }

  private findRepetition(texts: string[]): string | null {
    const words = texts
      .flatMap((text) => text.toLowerCase().split(/\s+/))
      .filter((word) => word.length > 0);
    if (words.length < this.repetitionMinWords) return null;

    const counts = new Map<string, number>();
    let topWord = '';
    let topCount = 0;
    for (const word of words) {
      const count = (counts.get(word) ?? 0) + 1;
      counts.set(word, count);
      if (count > topCount) {
        topWord = word;
        topCount = count;
      }
    }

    if (topCount / words.length <= this.repetitionMaxShare) return null;
    return `repetition: "${topWord}" makes up ${topCount} of ${words.length} words`;
  }

  private findDistortionSpike(series: RDSeries): string | null {
    const { points } = series;
    for (let i = 1; i < points.length; i++) {
      const prev = points[i - 1].difficulty;
      const curr = points[i].difficulty;
      if (prev > 0 && curr > prev * this.distortionSpikeFactor) {
        return `rd: distortion spike at step ${points[i].step} (${prev} -> ${curr})`;
      }
    }
    return null;
  }

  private flag(flag: TraceFlagKind, severity: number, reason: string): TraceFlagInfo {
    return { flag, reason, severity, autoDetected: true, timestamp: this.now() };
  }
}

function shortenPath(path: string): string {
  if (path.length <= MAX_REASON_PATH_LENGTH) return path;
  return `${path.slice(0, MAX_REASON_PATH_LENGTH - 3)}...`;
}

/** String leaves of a JSON value with their JSONPath-ish location, in document order. */
function collectStrings(value: JsonValue, path: string): Array<{ path: string; text: string }> {
  if (typeof value === 'string') return [{ path, text: value }];
  if (Array.isArray(value)) {
    return value.flatMap((item, i) => collectStrings(item, `${path}[${i}]`));
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).flatMap(([key, item]) => collectStrings(item, `${path}.${key}`));
  }
  return [];
}
