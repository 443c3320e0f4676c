/**
 * IRR solver tests — analytic roots, degenerate vectors, and the bracketing
 * fallback when Newton cannot finish.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { countSignChanges, npv, solveIrr, type IrrSolution } from "../irrSolver";

function expectRate(solution: IrrSolution, expected: number, tol = 1e-6): number {
  assert.equal(solution.kind, "present", `expected a rate, got ${JSON.stringify(solution)}`);
  if (solution.kind !== "present") return NaN;
  assert.ok(
    Math.abs(solution.value - expected) < tol,
    `expected ${expected}, got ${solution.value}`,
  );
  return solution.value;
}

// ──────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────
describe("npv / countSignChanges", () => {
  it("discounts each period", () => {
    assert.ok(Math.abs(npv([-100, 110], 0.1)) < 1e-9);
    assert.equal(npv([-100, 50, 50], 0), 0);
  });

  it("counts sign changes, skipping zeros", () => {
    assert.equal(countSignChanges([-100, 10, 10]), 1);
    assert.equal(countSignChanges([-1, 0, 2, -3]), 2);
    assert.equal(countSignChanges([0, 0, 0]), 0);
    assert.equal(countSignChanges([100, 10, 10]), 0);
  });
});

// ──────────────────────────────────────────────────────────────
// Newton path
// ──────────────────────────────────────────────────────────────
describe("solveIrr — Newton", () => {
  it("one period: [-100, 110] → 10%", () => {
    const solution = solveIrr([-100, 110]);
    expectRate(solution, 0.1);
    assert.equal(solution.kind === "present" && solution.method, "newton");
  });

  it("par bond: [-100, 10, 10, 10, 10, 110] → 10%", () => {
    expectRate(solveIrr([-100, 10, 10, 10, 10, 110]), 0.1);
  });

  it("negative IRR: [-100, 50, 40]", () => {
    // -100x² + 50x + 40 = 0 with x = 1 + r
    const x = (50 + Math.sqrt(50 * 50 + 4 * 100 * 40)) / 200;
    expectRate(solveIrr([-100, 50, 40]), x - 1);
  });

  it("converged 0% is a present zero, not absent", () => {
    const solution = solveIrr([-100, 0, 0, 0, 0, 100]);
    expectRate(solution, 0);
  });

  it("re-solving the same vector is idempotent", () => {
    const vector = [-250_000, 20_000, 21_000, 22_000, 23_000, 324_000];
    const first = solveIrr(vector);
    const second = solveIrr(vector);
    assert.deepEqual(first, second);
  });
});

// ──────────────────────────────────────────────────────────────
// No root
// ──────────────────────────────────────────────────────────────
describe("solveIrr — absent", () => {
  it("all-positive vector has no sign change", () => {
    assert.deepEqual(solveIrr([100, 10, 10]), { kind: "absent", reason: "no_sign_change" });
  });

  it("zero equity (no outflow) has no sign change", () => {
    assert.deepEqual(solveIrr([0, 10, 10, 10, 10, 10]), { kind: "absent", reason: "no_sign_change" });
  });

  it("all-zero and single-entry vectors are absent", () => {
    assert.equal(solveIrr([0, 0, 0, 0, 0, 0]).kind, "absent");
    assert.equal(solveIrr([-100]).kind, "absent");
    assert.equal(solveIrr([]).kind, "absent");
  });

  it("outflows only is absent", () => {
    assert.deepEqual(solveIrr([-100, 0, 0, 0, 0, 0]), { kind: "absent", reason: "no_sign_change" });
  });
});

// ──────────────────────────────────────────────────────────────
// Bracketing fallback
// ──────────────────────────────────────────────────────────────
describe("solveIrr — bisection fallback", () => {
  it("Newton stepping past r = -1 falls back to bisection", () => {
    // Root: (1+r)^5 = 0.01
    const solution = solveIrr([-100, 0, 0, 0, 0, 1]);
    expectRate(solution, Math.pow(0.01, 1 / 5) - 1);
    assert.equal(solution.kind === "present" && solution.method, "bisection");
  });

  it("exhausted Newton budget falls back to bisection", () => {
    // Root: (1+r)^5 = 2
    const solution = solveIrr([-100, 0, 0, 0, 0, 200], { maxIterations: 1 });
    expectRate(solution, Math.pow(2, 1 / 5) - 1);
    assert.equal(solution.kind === "present" && solution.method, "bisection");
  });

  it("with two real roots, picks the one nearest the guess", () => {
    // -100 + 230/(1+r) - 132/(1+r)² has roots at 10% and 20%
    const vector = [-100, 230, -132];
    expectRate(solveIrr(vector, { guess: 0.12, maxIterations: 0 }), 0.1);
    expectRate(solveIrr(vector, { guess: 0.19, maxIterations: 0 }), 0.2);
  });

  it("no bracket on the grid and no Newton root → not_converged", () => {
    // -100 + 10/(1+r) - 10/(1+r)² peaks at -97.5: two sign changes, no real root
    assert.deepEqual(solveIrr([-100, 10, -10]), { kind: "absent", reason: "not_converged" });
  });
});

// ──────────────────────────────────────────────────────────────
// Root choice with several real roots
// ──────────────────────────────────────────────────────────────
describe("solveIrr — nearest root to the guess", () => {
  it("prefers the nearer bracketed root over a far Newton root", () => {
    // Real roots near -63.7% and -23.2%; Newton from 10% lands on the far one
    const vector = [-100, -140, -106, 105, 166, -66];
    const solution = solveIrr(vector);
    const rate = expectRate(solution, -0.232, 1e-3);
    assert.equal(solution.kind === "present" && solution.method, "bisection");
    assert.ok(Math.abs(npv(vector, rate)) < 1e-6);
  });

  it("prefers a negative root over a far positive one", () => {
    // Real roots near -24.8% and 155.6%
    const vector = [-100, 199, 190, -88, -62, -24];
    const rate = expectRate(solveIrr(vector), -0.248, 1e-3);
    assert.ok(Math.abs(npv(vector, rate)) < 1e-6);
  });

  it("keeps the Newton root when it is the nearest one", () => {
    // -100 + 230/(1+r) - 132/(1+r)² has roots at 10% and 20%
    const solution = solveIrr([-100, 230, -132]);
    expectRate(solution, 0.1);
    assert.equal(solution.kind === "present" && solution.method, "newton");
  });
});

// ──────────────────────────────────────────────────────────────
// Roots just above the pole at r = -1
// ──────────────────────────────────────────────────────────────
describe("solveIrr — near the pole", () => {
  it("finds a root below -99%", () => {
    // (1+r)^5 = 1e-12
    const solution = solveIrr([-100, 0, 0, 0, 0, 1e-10]);
    expectRate(solution, Math.pow(1e-12, 1 / 5) - 1);
    assert.equal(solution.kind === "present" && solution.method, "bisection");
  });

  it("finds a root a hair above -100%", () => {
    // 1 + r = 0.001 / 100
    expectRate(solveIrr([-100, 0.001, 0, 0, 0, 0]), 1e-5 - 1, 1e-9);
  });
});
