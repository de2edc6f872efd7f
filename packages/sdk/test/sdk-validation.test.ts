import { strict as assert } from "node:assert";
import test from "node:test";

import {
  BacktestRequestSchema,
  DataRequestSchema,
  ValidationError,
  assertValid,
  isRefusalStatus,
  isTerminalStatus,
  type BacktestRequest,
  type DataRequest,
} from "../src/index.js";

const validRequest = (): BacktestRequest => ({
  runName: "decline_trial",
  data: { source: "csv", symbol: "TEST", start: "2000-01-01", end: "2001-01-01" },
  strategy: { name: "consecutive_decline", params: {} },
  initialCash: 100_000,
});

// ============================================================================
// DataRequest validation tests
// ============================================================================

test("DataRequestSchema validates a csv request with an explicit path", () => {
  const valid: DataRequest = {
    source: "csv",
    symbol: "TEST",
    path: "storage/datasets/test.csv",
  };

  assert.ok(DataRequestSchema.safeParse(valid).success);
});

test("DataRequestSchema rejects other sources and empty symbols", () => {
  assert.equal(DataRequestSchema.safeParse({ source: "http", symbol: "TEST" }).success, false);
  assert.equal(DataRequestSchema.safeParse({ source: "csv", symbol: "" }).success, false);
});

// ============================================================================
// BacktestRequest validation tests
// ============================================================================

test("BacktestRequestSchema accepts a minimal request", () => {
  assert.ok(BacktestRequestSchema.safeParse(validRequest()).success);
});

test("BacktestRequestSchema accepts inline bars and sizing options", () => {
  const request: BacktestRequest = {
    ...validRequest(),
    commission: 0.001,
    stake: 10,
    orderLifetimeBars: 3,
    bars: [
      {
        timestamp: "2000-01-03T00:00:00.000Z",
        open: 10,
        high: 11,
        low: 9,
        close: 10.5,
        volume: 1_000,
      },
    ],
  };

  assert.ok(BacktestRequestSchema.safeParse(request).success);
});

test("BacktestRequestSchema rejects non-positive cash", () => {
  assert.equal(BacktestRequestSchema.safeParse({ ...validRequest(), initialCash: 0 }).success, false);
});

test("BacktestRequestSchema rejects fractional or zero stake", () => {
  assert.equal(BacktestRequestSchema.safeParse({ ...validRequest(), stake: 0 }).success, false);
  assert.equal(BacktestRequestSchema.safeParse({ ...validRequest(), stake: 1.5 }).success, false);
});

test("BacktestRequestSchema rejects negative commission", () => {
  assert.equal(BacktestRequestSchema.safeParse({ ...validRequest(), commission: -0.01 }).success, false);
});

test("BacktestRequestSchema rejects bars with negative volume", () => {
  const request = {
    ...validRequest(),
    bars: [{ timestamp: "2000-01-03", open: 1, high: 1, low: 1, close: 1, volume: -5 }],
  };
  assert.equal(BacktestRequestSchema.safeParse(request).success, false);
});

// ============================================================================
// assertValid tests
// ============================================================================

test("assertValid returns the parsed payload", () => {
  const parsed = assertValid(BacktestRequestSchema, validRequest(), "BacktestRequest");
  assert.equal(parsed.runName, "decline_trial");
  assert.equal(parsed.data.symbol, "TEST");
});

test("assertValid throws ValidationError naming each failing path", () => {
  const invalid = { ...validRequest(), initialCash: -1, runName: "" };

  assert.throws(
    () => assertValid(BacktestRequestSchema, invalid, "BacktestRequest"),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.name, "ValidationError");
      assert.equal(error.issues.length, 2);
      assert.ok(error.message.startsWith("Invalid BacktestRequest: "));
      assert.ok(error.issues.some((issue) => issue.startsWith("runName: ")));
      assert.ok(error.issues.some((issue) => issue.startsWith("initialCash: ")));
      return true;
    },
  );
});

test("assertValid labels root-level failures", () => {
  assert.throws(() => assertValid(DataRequestSchema, null), /Invalid payload: \(root\): /);
});

// ============================================================================
// Order status helpers
// ============================================================================

test("order status helpers separate progress, completion and refusal", () => {
  assert.equal(isTerminalStatus("submitted"), false);
  assert.equal(isTerminalStatus("accepted"), false);
  assert.equal(isTerminalStatus("completed"), true);
  assert.equal(isTerminalStatus("margin"), true);
  assert.equal(isRefusalStatus("completed"), false);
  assert.equal(isRefusalStatus("canceled"), true);
  assert.equal(isRefusalStatus("rejected"), true);
});
