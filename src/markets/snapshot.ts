/**
 * Market/book snapshot ingestion. Accepts the Gamma market shape (outcomes,
 * outcomePrices and clobTokenIds as arrays or JSON-encoded strings) and CLOB
 * book shape (string prices/sizes). Levels keep the order they arrive in.
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import type { Market, OrderBook } from "../types";

export interface MarketSnapshot {
  markets: Market[];
  books: OrderBook[];
}

/** Gamma encodes list fields as JSON strings, e.g. outcomePrices: "[\"0.48\", \"0.47\"]". */
function decodeJsonList(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value) as unknown;
  } catch {
    // comma-separated fallback, as some dumps carry clobTokenIds
    return value.split(",").map((s) => s.trim()).filter(Boolean);
  }
}

const Numeric = z.coerce.number().finite();

const PriceLevelSchema = z.object({
  price: Numeric,
  size: Numeric,
});

const GammaMarketSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    question: z.string().optional().default(""),
    slug: z.string().optional().default(""),
    outcomes: z.preprocess(decodeJsonList, z.array(z.string())),
    outcomePrices: z.preprocess(decodeJsonList, z.array(Numeric)),
    clobTokenIds: z.preprocess(decodeJsonList, z.array(z.string())).optional().default([]),
    bestBid: Numeric.nullable().optional(),
    bestAsk: Numeric.nullable().optional(),
    makerBaseFee: Numeric.optional().default(0),
    takerBaseFee: Numeric.optional().default(0),
    liquidity: Numeric.optional().default(0),
    volume24hr: Numeric.optional().default(0),
    active: z.boolean().optional().default(true),
    acceptingOrders: z.boolean().optional().default(true),
  })
  .superRefine((m, ctx) => {
    if (m.outcomePrices.length < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["outcomePrices"],
        message: "binary market needs at least 2 outcome prices",
      });
    }
    if (m.outcomes.length !== m.outcomePrices.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["outcomes"],
        message: `outcomes (${m.outcomes.length}) and outcomePrices (${m.outcomePrices.length}) differ in length`,
      });
    }
  })
  .transform(
    (m): Market => ({
      id: m.id,
      question: m.question,
      slug: m.slug,
      outcomes: m.outcomes,
      outcomePrices: m.outcomePrices,
      clobTokenIds: m.clobTokenIds,
      bestBid: m.bestBid ?? null,
      bestAsk: m.bestAsk ?? null,
      makerBaseFee: m.makerBaseFee,
      takerBaseFee: m.takerBaseFee,
      liquidity: m.liquidity,
      volume24hr: m.volume24hr,
      active: m.active,
      acceptingOrders: m.acceptingOrders,
    })
  );

const ClobBookSchema = z
  .object({
    asset_id: z.string().optional(),
    tokenId: z.string().optional(),
    bids: z.array(PriceLevelSchema).optional().default([]),
    asks: z.array(PriceLevelSchema).optional().default([]),
    timestamp: Numeric.optional().default(0),
  })
  .transform((b, ctx): OrderBook => {
    const tokenId = b.tokenId ?? b.asset_id;
    if (!tokenId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "book needs asset_id or tokenId" });
      return z.NEVER;
    }
    return { tokenId, bids: b.bids, asks: b.asks, timestamp: b.timestamp };
  });

const SnapshotSchema = z.object({
  markets: z.array(GammaMarketSchema),
  books: z.array(ClobBookSchema).optional().default([]),
});

export function parseSnapshot(data: unknown): MarketSnapshot {
  const result = SnapshotSchema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Snapshot validation failed: ${msg}`);
  }
  return result.data;
}

export function loadSnapshot(path: string): MarketSnapshot {
  if (!existsSync(path)) {
    throw new Error(`Snapshot file not found: ${path}`);
  }
  const raw = readFileSync(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in snapshot at ${path}: ${String(e)}`);
  }
  const snapshot = parseSnapshot(data);
  console.log(`[snapshot] Loaded ${snapshot.markets.length} markets, ${snapshot.books.length} books from ${path}`);
  return snapshot;
}

/** Books by token id. A later book for the same token replaces an earlier one. */
export function indexBooks(books: OrderBook[]): Map<string, OrderBook> {
  const byToken = new Map<string, OrderBook>();
  for (const book of books) byToken.set(book.tokenId, book);
  return byToken;
}
