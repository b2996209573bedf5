/**
 * Deterministic synthetic substitutes a data fetcher can hand to the engines
 * when live prices or fundamentals are unavailable. Same ticker and seed
 * always produce the same data.
 */
import type { PriceSeries } from "./returns";

export interface SyntheticPriceOptions {
  endDate: string; // YYYY-MM-DD
  periods?: number; // business days
  startPrice?: number;
  endPrice?: number;
  /** Daily noise amplitude as a fraction of price */
  noise?: number;
  seed?: number;
}

/**
 * Linear drift plus a half-sine swing plus seeded noise, on business days
 * ending at `endDate` (inclusive when it is a weekday).
 */
export function synthesizePriceSeries(
  ticker: string,
  options: SyntheticPriceOptions
): PriceSeries {
  const periods = options.periods ?? 252;
  const startPrice = options.startPrice ?? 100;
  const endPrice = options.endPrice ?? 120;
  const noise = options.noise ?? 0.005;
  const random = mulberry32(options.seed ?? hashSeed(ticker));

  const dates = businessDaysEndingAt(options.endDate, periods);
  const points = dates.map((date, i) => {
    const t = periods > 1 ? i / (periods - 1) : 0;
    const base = startPrice + (endPrice - startPrice) * t;
    const seasonal = 2 * Math.sin(3.14 * t);
    const jitter = 1 + noise * (random() * 2 - 1);
    return { date, close: roundTo((base + seasonal) * jitter, 4) };
  });
  return { ticker, points };
}

export interface SyntheticFundamentals {
  ticker: string;
  freeCashFlow: number;
  netDebt: number;
  sharesOutstanding: number;
  marketCap: number;
  netIncome: number;
  ebitda: number;
  revenue: number;
}

/**
 * Fundamentals derived from fixed operating assumptions: 35% EBITDA margin,
 * 15% tax, 25% of revenue reinvested.
 */
export function synthesizeFundamentals(
  ticker: string,
  lastPrice: number,
  revenue = 30_000_000_000,
  sharesOutstanding = 2_470_000_000
): SyntheticFundamentals {
  const ebitMargin = 0.35;
  const taxRate = 0.15;
  const reinvestmentRate = 0.25;
  const ebitda = revenue * ebitMargin;
  const nopat = ebitda * (1 - taxRate);
  return {
    ticker,
    freeCashFlow: nopat - revenue * reinvestmentRate,
    netDebt: 0,
    sharesOutstanding,
    marketCap: lastPrice * sharesOutstanding,
    netIncome: nopat,
    ebitda,
    revenue,
  };
}

export function businessDaysEndingAt(endDate: string, count: number): string[] {
  const cursor = new Date(`${endDate}T00:00:00Z`);
  if (Number.isNaN(cursor.getTime())) {
    throw new Error(`Invalid end date: ${endDate}`);
  }
  const out: string[] = [];
  while (out.length < count) {
    const day = cursor.getUTCDay();
    if (day !== 0 && day !== 6) out.push(formatDate(cursor));
    cursor.setUTCDate(cursor.getUTCDate() - 1);
  }
  return out.reverse();
}

function formatDate(d: Date): string {
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

function hashSeed(value: string): number {
  let h = 2166136261;
  for (let i = 0; i < value.length; i++) {
    h ^= value.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
