import assert from "node:assert/strict";
import test from "node:test";

import type { IDataSource } from "@downtick/data";
import { createLogger } from "@downtick/logger";
import type { BacktestRequest, Bar, DataRequest, OrderRequest, Strategy } from "@downtick/sdk";
import { ValidationError } from "@downtick/sdk";

import { SimulatedBroker } from "../src/broker.js";
import { EngineProtocolError, listStrategies, runBacktest, simulateStrategy } from "../src/engine.js";
import type { EngineEvent } from "../src/types.js";

const quietLogger = createLogger("test:engine", { minLevel: "error" });

const buildBars = (closes: ReadonlyArray<number>, volumes: ReadonlyArray<number> = []): Bar[] => {
  return closes.map((close, index) => ({
    timestamp: new Date(Date.UTC(2000, 0, 3 + index)).toISOString(),
    open: close,
    high: close + 0.5,
    low: close - 0.5,
    close,
    volume: volumes[index] ?? 1_000,
  }));
};

const SCENARIO_CLOSES = [10, 9, 8, 8.5, 9, 9.5, 10, 10.5, 11, 11.5, 12];

const buildRequest = (overrides: Partial<BacktestRequest> = {}): BacktestRequest => ({
  runName: "Consecutive Decline ORCL",
  data: { source: "csv", symbol: "ORCL" },
  strategy: { name: "consecutive_decline", params: {} },
  initialCash: 1_000,
  bars: buildBars(SCENARIO_CLOSES),
  ...overrides,
});

const describeEvent = (event: EngineEvent): string => {
  switch (event.kind) {
    case "market":
      return `market:${event.barIndex}`;
    case "order":
      return `order:${event.order.id}`;
    case "status":
      return `${event.event.status}:${event.event.orderId}@${event.event.barIndex}`;
  }
};

const statusTrail = (events: ReadonlyArray<EngineEvent>): string[] =>
  events.filter((event) => event.kind === "status").map(describeEvent);

test("runBacktest buys after two lower closes and sells after the hold period", async () => {
  const result = await runBacktest(buildRequest(), { runId: "scenario", logger: quietLogger });

  assert.equal(result.runId, "scenario");
  assert.equal(result.symbol, "ORCL");
  assert.deepEqual(result.fills, [
    {
      orderId: "ORCL-1",
      symbol: "ORCL",
      side: "buy",
      quantity: 1,
      price: 8.5,
      fees: 0,
      timestamp: "2000-01-06T00:00:00.000Z",
      barIndex: 3,
    },
    {
      orderId: "ORCL-2",
      symbol: "ORCL",
      side: "sell",
      quantity: 1,
      price: 11.5,
      fees: 0,
      timestamp: "2000-01-12T00:00:00.000Z",
      barIndex: 9,
    },
  ]);
  assert.deepEqual(result.summary, {
    startingValue: 1000,
    finalValue: 1003,
    pnl: 3,
    pnlRatio: 0.003,
    cash: 1003,
    processedBars: 11,
    numOrders: 2,
    numFills: 2,
    numRefused: 0,
  });
  assert.equal(result.equityCurve.length, 11);
  assert.equal(result.equityCurve[3]?.equity, 1000);
  assert.equal(result.equityCurve[8]?.equity, 1002.5);
  assert.equal(result.portfolio.positions[0]?.transactions.length, 2);
  assert.equal(result.portfolio.pnl, 3);
});

test("runBacktest delivers order progress before the next bar and notifies the hook", async () => {
  const hooked: string[] = [];
  const result = await runBacktest(buildRequest(), {
    runId: "ordering",
    logger: quietLogger,
    onEvent: (symbol, event) => {
      hooked.push(`${symbol} ${describeEvent(event)}`);
    },
  });

  const trail = result.events.map(describeEvent);
  assert.deepEqual(trail.slice(0, 8), [
    "market:0",
    "market:1",
    "market:2",
    "order:ORCL-1",
    "submitted:ORCL-1@2",
    "accepted:ORCL-1@2",
    "market:3",
    "completed:ORCL-1@3",
  ]);
  assert.deepEqual(statusTrail(result.events).slice(3), [
    "submitted:ORCL-2@8",
    "accepted:ORCL-2@8",
    "completed:ORCL-2@9",
  ]);
  assert.deepEqual(
    hooked,
    trail.map((entry) => `ORCL ${entry}`),
  );
});

test("runBacktest passes strategy params through", async () => {
  const result = await runBacktest(
    buildRequest({ strategy: { name: "consecutive_decline", params: { holdBars: 2 } } }),
    { runId: "short-hold", logger: quietLogger },
  );

  assert.deepEqual(
    result.fills.map((fill) => [fill.side, fill.barIndex, fill.price]),
    [
      ["buy", 3, 8.5],
      ["sell", 6, 10],
    ],
  );
  assert.equal(result.summary.pnl, 1.5);
});

test("runBacktest reports margin and lets the strategy enter again", async () => {
  const result = await runBacktest(
    buildRequest({ initialCash: 5, bars: buildBars([10, 9, 8, 7]) }),
    { runId: "margin", logger: quietLogger },
  );

  assert.deepEqual(statusTrail(result.events), [
    "submitted:ORCL-1@2",
    "accepted:ORCL-1@2",
    "margin:ORCL-1@3",
    "submitted:ORCL-2@3",
    "accepted:ORCL-2@3",
  ]);
  assert.equal(result.summary.numOrders, 2);
  assert.equal(result.summary.numFills, 0);
  assert.equal(result.summary.numRefused, 1);
  assert.equal(result.summary.finalValue, 5);
});

test("runBacktest cancels an order that outlives its lifetime on untradable bars", async () => {
  const result = await runBacktest(
    buildRequest({ orderLifetimeBars: 1, bars: buildBars([10, 9, 8, 7.5, 7.6], [1000, 1000, 1000, 0, 1000]) }),
    { runId: "expiry", logger: quietLogger },
  );

  assert.deepEqual(statusTrail(result.events), [
    "submitted:ORCL-1@2",
    "accepted:ORCL-1@2",
    "canceled:ORCL-1@4",
  ]);
  const canceled = result.events.find(
    (event) => event.kind === "status" && event.event.status === "canceled",
  );
  assert.ok(canceled?.kind === "status" && canceled.event.status === "canceled");
  assert.equal(canceled.event.reason, "order expired after 1 bar(s)");
  assert.equal(result.summary.numRefused, 1);
});

test("runBacktest charges commission on both legs", async () => {
  const result = await runBacktest(buildRequest({ commission: 0.01, stake: 10 }), {
    runId: "commission",
    logger: quietLogger,
  });

  assert.deepEqual(
    result.fills.map((fill) => [fill.side, fill.quantity, fill.fees]),
    [
      ["buy", 10, 10 * 8.5 * 0.01],
      ["sell", 10, 10 * 11.5 * 0.01],
    ],
  );
  const expectedCash = 1000 - (85 + 10 * 8.5 * 0.01) - (-115 + 10 * 11.5 * 0.01);
  assert.ok(Math.abs(result.summary.cash - expectedCash) < 1e-9);
});

test("runBacktest filters inline bars to the requested range", async () => {
  const result = await runBacktest(
    buildRequest({ data: { source: "csv", symbol: "ORCL", start: "2000-01-05", end: "2000-01-10" } }),
    { runId: "range", logger: quietLogger },
  );

  assert.equal(result.summary.processedBars, 6);
  assert.equal(result.equityCurve[0]?.timestamp, "2000-01-05T00:00:00.000Z");
});

test("runBacktest loads bars from the data source when none are inline", async () => {
  const requests: DataRequest[] = [];
  const dataSource: IDataSource = {
    id: "fake",
    loadBars: async (request) => {
      requests.push(request);
      return buildBars(SCENARIO_CLOSES);
    },
  };
  const { bars: _inline, ...withoutBars } = buildRequest();

  const result = await runBacktest(
    { ...withoutBars, data: { source: "csv", symbol: "ORCL", path: "datasets/orcl.csv" } },
    { runId: "from-source", logger: quietLogger, dataSource },
  );

  assert.deepEqual(requests, [{ source: "csv", symbol: "ORCL", path: "datasets/orcl.csv" }]);
  assert.equal(result.summary.numFills, 2);
});

test("runBacktest derives the run id from the run name and clock", async () => {
  const result = await runBacktest(buildRequest(), {
    logger: quietLogger,
    now: () => new Date("2000-01-01T12:34:56.000Z"),
  });

  assert.equal(result.runId, "consecutive-decline-orcl-20000101123456");
});

test("runBacktest rejects invalid requests", async () => {
  await assert.rejects(
    () => runBacktest(buildRequest({ initialCash: 0 }), { logger: quietLogger }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.ok(error.issues[0]?.startsWith("initialCash: "));
      return true;
    },
  );
});

test("runBacktest rejects unknown strategies and invalid params", async () => {
  assert.deepEqual(listStrategies(), ["consecutive_decline"]);
  await assert.rejects(
    () =>
      runBacktest(buildRequest({ strategy: { name: "nope", params: {} } }), { logger: quietLogger }),
    { message: 'Unknown strategy "nope". Available: consecutive_decline' },
  );
  await assert.rejects(
    () =>
      runBacktest(buildRequest({ strategy: { name: "consecutive_decline", params: { holdBars: 0 } } }), {
        logger: quietLogger,
      }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.ok(error.issues[0]?.startsWith("holdBars: "));
      return true;
    },
  );
});

test("runBacktest fails when no bars fall in the range", async () => {
  await assert.rejects(
    () =>
      runBacktest(buildRequest({ data: { source: "csv", symbol: "ORCL", start: "2001-01-01" } }), {
        logger: quietLogger,
      }),
    { message: "No bars loaded for ORCL between 2001-01-01 and the last bar" },
  );
});

test("simulateStrategy refuses a second order while one is pending", () => {
  let issued = 0;
  const eager: Strategy = {
    name: "eager",
    params: {},
    onInit: () => {},
    onBar: (): OrderRequest => {
      issued += 1;
      return { id: `eager-${issued}`, side: "buy", type: "market", reason: "always" };
    },
    onOrderUpdate: () => {},
    onStop: () => {},
  };

  assert.throws(
    () =>
      simulateStrategy({
        symbol: "ORCL",
        bars: buildBars([10, 9, 8], [0, 0, 0]),
        strategy: eager,
        initialCash: 1_000,
        stake: 1,
        broker: new SimulatedBroker(),
        logger: quietLogger,
        strategyLogger: quietLogger,
      }),
    (error: unknown) => {
      assert.ok(error instanceof EngineProtocolError);
      assert.equal(
        error.message,
        "strategy requested order eager-2 while order eager-1 is still pending",
      );
      return true;
    },
  );
});
