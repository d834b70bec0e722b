/**
 * Rate-distortion computation.
 *
 * Distortion between two structured objects is the Fused Gromov-Wasserstein
 * style cost of an entropic optimal-transport coupling over a fused cost
 * matrix. Rate follows the Shannon bound for a Gaussian source. A refinement
 * run appends one (rate, distortion) point per step; the knee of that curve
 * is the point of maximum Menger curvature.
 */

import type { RDPoint, RDSeries, SessionId, TraceId } from '../types/index.js';
import { InvalidConfigError } from '../errors.js';

/** Stands in for an infinite rate (zero distortion). */
export const UNBOUNDED_RATE = Number.MAX_VALUE;

export function isUnboundedRate(rate: number): boolean {
  return rate === UNBOUNDED_RATE;
}

export interface FgwOptions {
  /** Entropic regularization. Default: 0.01. */
  epsilon?: number;
  /** Sinkhorn iterations. Default: 100. */
  maxIterations?: number;
  /** Stop once the row-marginal error drops below this. Default: 1e-6. */
  tolerance?: number;
}

const DEFAULT_EPSILON = 0.01;
const DEFAULT_MAX_ITERATIONS = 100;
const DEFAULT_TOLERANCE = 1e-6;

type Matrix = readonly (readonly number[])[];

/**
 * Combine a feature-space and a structure-space distance matrix into one
 * scalar distortion: alpha * feature_term + (1 - alpha) * structure_term, both
 * terms measured under the coupling that is optimal for the fused cost.
 *
 * Both matrices are source x target and must have the same shape.
 */
export function computeFgwDistortion(
  featureDistance: Matrix,
  structureDistance: Matrix,
  alpha: number,
  options: FgwOptions = {}
): number {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new InvalidConfigError(`alpha must be within [0, 1], got ${alpha}`);
  }
  const [rows, cols] = checkMatrix('featureDistance', featureDistance);
  const [sRows, sCols] = checkMatrix('structureDistance', structureDistance);
  if (rows !== sRows || cols !== sCols) {
    throw new InvalidConfigError(
      `Matrix shapes differ: featureDistance is ${rows}x${cols}, structureDistance is ${sRows}x${sCols}`
    );
  }

  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  if (!(epsilon > 0) || !Number.isInteger(maxIterations) || maxIterations < 1 || !(tolerance > 0)) {
    throw new InvalidConfigError('epsilon and tolerance must be positive, maxIterations a positive integer');
  }

  const fused = featureDistance.map((row, i) =>
    row.map((m, j) => alpha * m + (1 - alpha) * structureDistance[i][j])
  );
  const plan = sinkhorn(fused, epsilon, maxIterations, tolerance);

  const featureTerm = couplingCost(plan, featureDistance);
  const structureTerm = couplingCost(plan, structureDistance);
  return alpha * featureTerm + (1 - alpha) * structureTerm;
}

/**
 * Shannon rate-distortion bound for a Gaussian source:
 * max(0, 0.5 * log2(variance / distortion)), unbounded at zero distortion.
 */
export function computeRate(distortion: number, variance: number): number {
  if (!Number.isFinite(variance) || variance <= 0) {
    throw new InvalidConfigError(`variance must be positive, got ${variance}`);
  }
  if (!Number.isFinite(distortion) || distortion < 0) {
    throw new InvalidConfigError(`distortion must be non-negative, got ${distortion}`);
  }
  if (distortion === 0) return UNBOUNDED_RATE;
  return Math.max(0, 0.5 * Math.log2(variance / distortion));
}

/** Population variance. Zero for an empty sample. */
export function estimateVariance(data: readonly number[]): number {
  if (data.length === 0) return 0;
  const mean = data.reduce((sum, x) => sum + x, 0) / data.length;
  return data.reduce((sum, x) => sum + (x - mean) ** 2, 0) / data.length;
}

export interface DistortionInput {
  featureDistance: Matrix;
  structureDistance: Matrix;
}

/** How much a refinement lowered distortion relative to a baseline. Never negative. */
export function computeDistortionReduction(
  baseline: DistortionInput,
  refined: DistortionInput,
  alpha: number,
  options?: FgwOptions
): number {
  const before = computeFgwDistortion(baseline.featureDistance, baseline.structureDistance, alpha, options);
  const after = computeFgwDistortion(refined.featureDistance, refined.structureDistance, alpha, options);
  return Math.max(0, before - after);
}

/** Menger curvature of the triangle abc: 4 * area / (|ab| * |bc| * |ca|). */
export function mengerCurvature(
  a: readonly [number, number],
  b: readonly [number, number],
  c: readonly [number, number]
): number {
  const area = 0.5 * Math.abs((b[0] - a[0]) * (c[1] - a[1]) - (c[0] - a[0]) * (b[1] - a[1]));
  const ab = Math.hypot(b[0] - a[0], b[1] - a[1]);
  const bc = Math.hypot(c[0] - b[0], c[1] - b[1]);
  const ca = Math.hypot(a[0] - c[0], a[1] - c[1]);
  const denominator = ab * bc * ca;
  if (denominator === 0 || !Number.isFinite(denominator)) return 0;
  return (4 * area) / denominator;
}

/**
 * One refinement run's RD curve.
 * Append-only; step indices are the insertion order. Not safe for
 * interleaved writers: callers serialize appends to the same run.
 */
export class RDComputation {
  private readonly points: RDPoint[] = [];

  constructor(
    private readonly ref: { sessionId?: SessionId; traceId?: TraceId } = {}
  ) {}

  get length(): number {
    return this.points.length;
  }

  addRefinementPoint(distortion: number, variance: number): RDPoint {
    const reward = computeRate(distortion, variance);
    const point: RDPoint = Object.freeze({
      step: this.points.length,
      reward,
      difficulty: distortion,
    });
    this.points.push(point);
    return point;
  }

  /** Append one point per (distortion, variance) step. */
  computeRdCurve(steps: readonly (readonly [number, number])[]): RDSeries {
    for (const [distortion, variance] of steps) {
      this.addRefinementPoint(distortion, variance);
    }
    return this.getSeries();
  }

  /**
   * The interior point with the largest Menger curvature in
   * (reward, difficulty) space. Earliest step wins ties. Null below 3 points.
   */
  findKneePoint(): RDPoint | null {
    if (this.points.length < 3) return null;

    let kneeIndex = 1;
    let maxCurvature = -1;

    for (let i = 1; i < this.points.length - 1; i++) {
      const prev = this.points[i - 1];
      const curr = this.points[i];
      const next = this.points[i + 1];

      const curvature =
        isUnboundedRate(prev.reward) || isUnboundedRate(curr.reward) || isUnboundedRate(next.reward)
          ? 0
          : mengerCurvature(
              [prev.reward, prev.difficulty],
              [curr.reward, curr.difficulty],
              [next.reward, next.difficulty]
            );

      if (curvature > maxCurvature) {
        maxCurvature = curvature;
        kneeIndex = i;
      }
    }

    return this.points[kneeIndex];
  }

  getSeries(): RDSeries {
    return Object.freeze({
      sessionId: this.ref.sessionId ?? null,
      traceId: this.ref.traceId ?? null,
      points: Object.freeze([...this.points]),
    });
  }
}

// ── Private ──

function checkMatrix(name: string, matrix: Matrix): [number, number] {
  if (matrix.length === 0 || matrix[0].length === 0) {
    throw new InvalidConfigError(`${name} must be a non-empty matrix`);
  }
  const cols = matrix[0].length;
  for (const row of matrix) {
    if (row.length !== cols) {
      throw new InvalidConfigError(`${name} rows must all have length ${cols}`);
    }
    for (const value of row) {
      if (!Number.isFinite(value) || value < 0) {
        throw new InvalidConfigError(`${name} entries must be finite and non-negative`);
      }
    }
  }
  return [matrix.length, cols];
}

/**
 * Log-domain Sinkhorn with uniform marginals.
 * Returns the transport plan; rows sum to 1/n and columns to 1/m.
 */
function sinkhorn(cost: Matrix, epsilon: number, maxIterations: number, tolerance: number): number[][] {
  const n = cost.length;
  const m = cost[0].length;
  const logA = Math.log(1 / n);
  const logB = Math.log(1 / m);
  const f = new Array<number>(n).fill(0);
  const g = new Array<number>(m).fill(0);

  for (let iter = 0; iter < maxIterations; iter++) {
    for (let i = 0; i < n; i++) {
      const terms = g.map((gj, j) => (gj - cost[i][j]) / epsilon);
      f[i] = epsilon * (logA - logSumExp(terms));
    }
    for (let j = 0; j < m; j++) {
      const terms = f.map((fi, i) => (fi - cost[i][j]) / epsilon);
      g[j] = epsilon * (logB - logSumExp(terms));
    }

    // Columns are exact after the g update; converge on the rows.
    let error = 0;
    for (let i = 0; i < n; i++) {
      let rowSum = 0;
      for (let j = 0; j < m; j++) {
        rowSum += Math.exp((f[i] + g[j] - cost[i][j]) / epsilon);
      }
      error += Math.abs(rowSum - 1 / n);
    }
    if (error < tolerance) break;
  }

  return cost.map((row, i) => row.map((c, j) => Math.exp((f[i] + g[j] - c) / epsilon)));
}

function logSumExp(values: readonly number[]): number {
  const max = Math.max(...values);
  if (!Number.isFinite(max)) return max;
  let sum = 0;
  for (const v of values) sum += Math.exp(v - max);
  return max + Math.log(sum);
}

function couplingCost(plan: Matrix, cost: Matrix): number {
  let total = 0;
  for (let i = 0; i < plan.length; i++) {
    for (let j = 0; j < plan[i].length; j++) {
      total += plan[i][j] * cost[i][j];
    }
  }
  return total;
}
