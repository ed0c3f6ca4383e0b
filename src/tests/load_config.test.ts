import { describe, it } from "node:test";
import assert from "node:assert";
import { readFileSync } from "fs";
import { join } from "path";
import { parseConfig } from "../config/load_config";

function minimal(): Record<string, unknown> {
  return {
    detector: { min_spread_threshold: 0.02, min_profit_threshold: 0 },
    simulation: { starting_balance_usd: 1000, order_size: 10 },
    snapshot: { path: "snap.json" },
  };
}

describe("parseConfig", () => {
  it("fills defaults for optional sections", () => {
    const config = parseConfig(minimal());
    assert.strictEqual(config.detector.fee_legs, 2);
    assert.strictEqual(config.simulation.use_market_fees, true);
    assert.strictEqual(config.simulation.fallback_maker_fee_bps, 0);
    assert.strictEqual(config.simulation.fallback_taker_fee_bps, 200);
    assert.strictEqual(config.simulation.settle_at_mark, false);
    assert.deepStrictEqual(config.journal, { dir: "data" });
    assert.deepStrictEqual(config.reporting, { report_dir: "reports", print_top_n: 10 });
  });

  it("rejects a spread threshold above 1 with the field path", () => {
    const data = minimal();
    data.detector = { min_spread_threshold: 2, min_profit_threshold: 0 };
    assert.throws(() => parseConfig(data), /Config validation failed: detector\.min_spread_threshold/);
  });

  it("rejects zero fee legs", () => {
    const data = minimal();
    data.detector = { min_spread_threshold: 0.02, min_profit_threshold: 0, fee_legs: 0 };
    assert.throws(() => parseConfig(data), /detector\.fee_legs/);
  });

  it("rejects a missing snapshot section", () => {
    const data = minimal();
    delete data.snapshot;
    assert.throws(() => parseConfig(data), /snapshot: Required/);
  });

  it("accepts the shipped example config", () => {
    const raw = readFileSync(join(__dirname, "..", "config", "config.example.json"), "utf-8");
    const config = parseConfig(JSON.parse(raw));
    assert.strictEqual(config.detector.min_spread_threshold, 0.02);
    assert.strictEqual(config.simulation.order_size, 100);
    assert.strictEqual(config.snapshot.path, "fixtures/snapshot.example.json");
  });
});
