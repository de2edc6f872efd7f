import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import test from "node:test";

import { createCsvSource } from "@downtick/data";
import { ValidationError } from "@downtick/sdk";
import { parse as parseEnv } from "dotenv";

import { DEFAULT_DATASET, REPO_ROOT, loadBacktestCliConfig } from "../src/config.js";

test("loadBacktestCliConfig falls back to defaults", () => {
  assert.deepEqual(loadBacktestCliConfig({}, []), {
    datasetPath: DEFAULT_DATASET,
    symbol: "ORCL",
    start: "2000-01-01",
    end: "2001-01-01",
    initialCash: 100_000,
    commission: 0,
    stake: 1,
    holdBars: 5,
  });
  assert.ok(DEFAULT_DATASET.endsWith(join("storage", "datasets", "sample_daily.csv")));
});

test("loadBacktestCliConfig reads and coerces environment values", () => {
  const config = loadBacktestCliConfig(
    {
      DOWNTICK_DATASET: "/data/msft.csv",
      DOWNTICK_SYMBOL: "MSFT",
      DOWNTICK_START: "2001-01-01",
      DOWNTICK_END: "2001-06-30",
      DOWNTICK_CASH: "5000",
      DOWNTICK_COMMISSION: "0.001",
      DOWNTICK_STAKE: "10",
      DOWNTICK_HOLD_BARS: "3",
    },
    [],
  );

  assert.deepEqual(config, {
    datasetPath: "/data/msft.csv",
    symbol: "MSFT",
    start: "2001-01-01",
    end: "2001-06-30",
    initialCash: 5000,
    commission: 0.001,
    stake: 10,
    holdBars: 3,
  });
});

test("loadBacktestCliConfig treats blank values as unset", () => {
  const config = loadBacktestCliConfig({ DOWNTICK_CASH: "", DOWNTICK_SYMBOL: "  " }, []);
  assert.equal(config.initialCash, 100_000);
  assert.equal(config.symbol, "ORCL");
});

test("the settings in .env.example load the shipped sample dataset", async () => {
  const env = parseEnv(await readFile(join(REPO_ROOT, ".env.example"), { encoding: "utf-8" }));
  const config = loadBacktestCliConfig(env, []);

  assert.equal(config.datasetPath, DEFAULT_DATASET);
  assert.equal(config.symbol, "ORCL");

  const bars = await createCsvSource().loadBars({
    source: "csv",
    symbol: config.symbol,
    path: config.datasetPath,
    start: config.start,
    end: config.end,
  });
  assert.equal(bars.length, 260);
  assert.equal(bars[0]?.timestamp, "2000-01-03T00:00:00.000Z");
  assert.equal(bars[bars.length - 1]?.timestamp, "2000-12-29T00:00:00.000Z");
});

test("a relative DOWNTICK_DATASET is taken from the repository root", () => {
  const config = loadBacktestCliConfig({ DOWNTICK_DATASET: "storage/datasets/other.csv" }, []);
  assert.equal(config.datasetPath, join(REPO_ROOT, "storage", "datasets", "other.csv"));
});

test("the first positional argument overrides the dataset", () => {
  const env = { DOWNTICK_DATASET: "/data/from-env.csv" };
  assert.equal(loadBacktestCliConfig(env, ["--quiet", "/data/from-argv.csv"]).datasetPath, "/data/from-argv.csv");
  assert.equal(loadBacktestCliConfig(env, ["data/relative.csv"]).datasetPath, resolve("data/relative.csv"));
});

test("loadBacktestCliConfig rejects invalid numbers", () => {
  assert.throws(() => loadBacktestCliConfig({ DOWNTICK_CASH: "-5" }, []), ValidationError);
  assert.throws(() => loadBacktestCliConfig({ DOWNTICK_STAKE: "1.5" }, []), ValidationError);
  assert.throws(
    () => loadBacktestCliConfig({ DOWNTICK_HOLD_BARS: "soon" }, []),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.issues.length, 1);
      assert.ok(error.issues[0]?.startsWith("DOWNTICK_HOLD_BARS: "));
      return true;
    },
  );
});
