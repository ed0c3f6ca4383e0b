import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";

const ConfigSchema = z.object({
  detector: z.object({
    min_spread_threshold: z.number().min(0).max(1),
    min_profit_threshold: z.number().min(0),
    /** Fee legs charged at the yes price in expected-profit math. */
    fee_legs: z.number().int().min(1).optional().default(2),
  }),
  simulation: z.object({
    starting_balance_usd: z.number().positive(),
    order_size: z.number().positive(),
    use_market_fees: z.boolean().optional().default(true),
    fallback_maker_fee_bps: z.number().min(0).max(10000).optional().default(0),
    fallback_taker_fee_bps: z.number().min(0).max(10000).optional().default(200),
    /** Close every open position at the book midpoint after the cycle. */
    settle_at_mark: z.boolean().optional().default(false),
  }),
  snapshot: z.object({
    path: z.string(),
  }),
  journal: z
    .object({
      dir: z.string(),
    })
    .optional()
    .default({ dir: "data" }),
  reporting: z
    .object({
      report_dir: z.string(),
      print_top_n: z.number().int().min(0),
    })
    .optional()
    .default({ report_dir: "reports", print_top_n: 10 }),
});

export type Config = z.infer<typeof ConfigSchema>;

function findConfigPath(): string {
  const cwd = process.cwd();
  const candidates = [
    join(cwd, "config.json"),
    join(cwd, "src", "config", "config.json"),
    join(cwd, "src", "config", "config.example.json"),
    join(__dirname, "config.json"),
    join(__dirname, "config.example.json"),
  ];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw new Error(
    `Config file not found. Copy src/config/config.example.json to config.json (in project root or src/config). Tried: ${candidates.join(", ")}`
  );
}

/** Returns the path to the config file that would be loaded (first existing from project root or src/config). */
export function getConfigPath(): string {
  return findConfigPath();
}

/** Validate an already-parsed config object. */
export function parseConfig(data: unknown): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues;
    const msg = issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Config validation failed: ${msg}`);
  }
  return result.data;
}

export function loadConfig(): Config {
  const configPath = findConfigPath();
  const raw = readFileSync(configPath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in config at ${configPath}: ${String(e)}`);
  }
  return parseConfig(data);
}
