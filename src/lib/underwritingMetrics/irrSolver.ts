/**
 * IRR root-finder.
 *
 * Solves NPV(r) = Σ cf[t] / (1+r)^t = 0 for r > -1.
 *
 * Strategy:
 *   1. No sign change in the vector → no real root, absent.
 *   2. Sample NPV over a coarse grid just above the pole and bisect every
 *      sign-change bracket.
 *   3. Newton–Raphson from the guess (default 10%).
 *   4. The root nearest the guess wins; Newton's root is kept unless a
 *      bracketed root lies strictly nearer.
 *   5. Neither Newton nor a bracket → absent. Never returns an unconverged
 *      estimate.
 */

import { absent, type Absent } from "./optional";
import type { CashflowVector } from "./types";

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_GUESS = 0.1;
const DEFAULT_TOLERANCE = 1e-7;
const DEFAULT_MAX_ITERATIONS = 100;

const POLE_MARGIN = 1e-6;
const GRID_MIN = -1 + POLE_MARGIN;
const GRID_MAX = 10.0;
const GRID_STEP = 0.01;
const BISECTION_MAX_ITERATIONS = 200;
const BISECTION_MIN_WIDTH = 1e-12;
// Newton and bisection landing on the same root differ by far less than this
const SAME_ROOT_MARGIN = 1e-6;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface IrrOptions {
  guess?: number;
  /** Convergence threshold on |NPV|. */
  tolerance?: number;
  /** Newton iteration budget. */
  maxIterations?: number;
}

export type IrrMethod = "newton" | "bisection";

export type IrrSolution =
  | { kind: "present"; value: number; method: IrrMethod; iterations: number }
  | Absent<"no_sign_change" | "not_converged">;

type Converged = { rate: number; iterations: number };

// ─── NPV ─────────────────────────────────────────────────────────────────────

export function npv(cashflows: CashflowVector, rate: number): number {
  let total = 0;
  for (let t = 0; t < cashflows.length; t++) {
    total += cashflows[t] / Math.pow(1 + rate, t);
  }
  return total;
}

function npvDerivative(cashflows: CashflowVector, rate: number): number {
  let total = 0;
  for (let t = 1; t < cashflows.length; t++) {
    total -= (t * cashflows[t]) / Math.pow(1 + rate, t + 1);
  }
  return total;
}

/**
 * Descartes bound on the number of positive roots in (1+r).
 * Zero entries do not count as a sign.
 */
export function countSignChanges(cashflows: CashflowVector): number {
  let changes = 0;
  let lastSign = 0;
  for (const cf of cashflows) {
    const sign = Math.sign(cf);
    if (sign === 0 || Number.isNaN(sign)) continue;
    if (lastSign !== 0 && sign !== lastSign) changes++;
    lastSign = sign;
  }
  return changes;
}

// ─── Newton–Raphson ──────────────────────────────────────────────────────────

function newton(
  cashflows: CashflowVector,
  guess: number,
  tolerance: number,
  maxIterations: number,
): Converged | undefined {
  let rate = guess;

  for (let i = 0; i < maxIterations; i++) {
    const value = npv(cashflows, rate);
    if (!Number.isFinite(value)) return undefined;
    if (Math.abs(value) < tolerance) return { rate, iterations: i };

    const slope = npvDerivative(cashflows, rate);
    if (slope === 0 || !Number.isFinite(slope)) return undefined;

    const next = rate - value / slope;
    // Stepping onto or past the pole at r = -1
    if (!Number.isFinite(next) || next <= -1 + POLE_MARGIN) return undefined;
    rate = next;
  }

  // One last check so a root landed on the final step is not discarded
  if (Math.abs(npv(cashflows, rate)) < tolerance) {
    return { rate, iterations: maxIterations };
  }
  return undefined;
}

// ─── Bracketing fallback ─────────────────────────────────────────────────────

function findBrackets(cashflows: CashflowVector): Array<[number, number]> {
  const brackets: Array<[number, number]> = [];
  const steps = Math.round((GRID_MAX - GRID_MIN) / GRID_STEP);

  let prevRate = GRID_MIN;
  let prevValue = npv(cashflows, prevRate);

  for (let k = 1; k <= steps; k++) {
    const rate = GRID_MIN + k * GRID_STEP;
    const value = npv(cashflows, rate);
    if (Number.isFinite(prevValue) && Number.isFinite(value) && prevValue * value <= 0) {
      brackets.push([prevRate, rate]);
    }
    prevRate = rate;
    prevValue = value;
  }

  return brackets;
}

function bisect(
  cashflows: CashflowVector,
  lo: number,
  hi: number,
  tolerance: number,
): Converged | undefined {
  let fLo = npv(cashflows, lo);
  if (Math.abs(fLo) < tolerance) return { rate: lo, iterations: 0 };

  for (let i = 0; i < BISECTION_MAX_ITERATIONS; i++) {
    const mid = (lo + hi) / 2;
    const fMid = npv(cashflows, mid);
    if (Math.abs(fMid) < tolerance || hi - lo < BISECTION_MIN_WIDTH) {
      return { rate: mid, iterations: i + 1 };
    }
    if ((fLo < 0) === (fMid < 0)) {
      lo = mid;
      fLo = fMid;
    } else {
      hi = mid;
    }
  }
  return undefined;
}

function nearestBracketedRoot(
  cashflows: CashflowVector,
  brackets: Array<[number, number]>,
  guess: number,
  tolerance: number,
): Converged | undefined {
  // Several real roots are possible; the one nearest the guess is the
  // economically meaningful one.
  let best: Converged | undefined;
  for (const [lo, hi] of brackets) {
    const root = bisect(cashflows, lo, hi, tolerance);
    if (root && (!best || Math.abs(root.rate - guess) < Math.abs(best.rate - guess))) {
      best = root;
    }
  }
  return best;
}

// ─── Main entry ──────────────────────────────────────────────────────────────

/**
 * Per-period IRR as a decimal rate (0.1 = 10%).
 *
 * Pure and deterministic: the same vector always yields the same solution.
 */
export function solveIrr(cashflows: CashflowVector, opts?: IrrOptions): IrrSolution {
  const guess = opts?.guess ?? DEFAULT_GUESS;
  const tolerance = opts?.tolerance ?? DEFAULT_TOLERANCE;
  const maxIterations = opts?.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  if (cashflows.length < 2 || countSignChanges(cashflows) === 0) {
    return absent("no_sign_change");
  }

  const bracketed = nearestBracketedRoot(cashflows, findBrackets(cashflows), guess, tolerance);
  const viaNewton = newton(cashflows, guess, tolerance, maxIterations);

  if (
    viaNewton &&
    (!bracketed ||
      Math.abs(viaNewton.rate - guess) <= Math.abs(bracketed.rate - guess) + SAME_ROOT_MARGIN)
  ) {
    return { kind: "present", value: viaNewton.rate, method: "newton", iterations: viaNewton.iterations };
  }

  if (bracketed) {
    return {
      kind: "present",
      value: bracketed.rate,
      method: "bisection",
      iterations: bracketed.iterations,
    };
  }

  return absent("not_converged");
}
