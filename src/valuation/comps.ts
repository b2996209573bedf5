/**
 * Relative valuation: trailing multiples and the target's percentile rank
 * within its peer set.
 */
import type {
  CompsRow,
  CompsTable,
  FinancialSnapshot,
  MultipleKey,
  Multiples,
} from "./types";

export const MULTIPLE_KEYS: readonly MultipleKey[] = ["pe", "evEbitda", "ps"];

export function computeMultiples(snapshot: FinancialSnapshot): Multiples {
  const { marketCap, netDebt, netIncome, ebitda, revenue } = snapshot;
  const enterpriseValue = marketCap + netDebt;
  return {
    pe: ratio(marketCap, netIncome),
    evEbitda: ratio(enterpriseValue, ebitda),
    ps: ratio(marketCap, revenue),
  };
}

/**
 * Share of peers whose metric is <= the target's, × 100. Null when the target
 * metric is missing or no peer has one.
 */
export function percentileRank(
  target: number | null,
  peers: ReadonlyArray<number | null>
): number | null {
  if (target == null) return null;
  const values = peers.filter((v): v is number => v != null);
  if (values.length === 0) return null;
  const atOrBelow = values.filter(v => v <= target).length;
  return (atOrBelow / values.length) * 100;
}

export function buildCompsTable(
  target: FinancialSnapshot,
  peers: readonly FinancialSnapshot[]
): CompsTable {
  const seen = new Set<string>([normalizeTicker(target.ticker)]);
  const peerRows: CompsRow[] = [];
  for (const peer of peers) {
    const key = normalizeTicker(peer.ticker);
    if (seen.has(key)) continue;
    seen.add(key);
    peerRows.push({
      ticker: peer.ticker,
      isTarget: false,
      ...computeMultiples(peer),
    });
  }

  const targetRow: CompsRow = {
    ticker: target.ticker,
    isTarget: true,
    ...computeMultiples(target),
  };

  const percentiles: Record<MultipleKey, number | null> = {
    pe: null,
    evEbitda: null,
    ps: null,
  };
  for (const key of MULTIPLE_KEYS) {
    percentiles[key] = percentileRank(
      targetRow[key],
      peerRows.map(row => row[key])
    );
  }

  return { target: target.ticker, rows: [targetRow, ...peerRows], percentiles };
}

function ratio(numerator: number, denominator: number | undefined): number | null {
  if (denominator == null || !(denominator > 0)) return null;
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : null;
}

function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}
