/**
 * Multi-asset helpers: align several price series on common dates and blend
 * their returns into one portfolio return series.
 */
import { ValidationError } from "@src/util/errors";
import {
  computeReturns,
  PriceSeries,
  ReturnMethod,
  validatePriceSeries,
} from "@src/timeseries/returns";
import { WEIGHT_TOLERANCE } from "./schema";

/**
 * 0.6 on the target, the remaining 0.4 split evenly across peers. Without
 * peers the target carries the whole portfolio.
 */
export function targetPeerWeights(
  target: string,
  peers: readonly string[]
): Record<string, number> {
  const others = Array.from(new Set(peers.filter(p => p !== target)));
  if (others.length === 0) return { [target]: 1 };
  const weights: Record<string, number> = { [target]: 0.6 };
  for (const peer of others) weights[peer] = 0.4 / others.length;
  return weights;
}

export function portfolioReturns(
  series: readonly PriceSeries[],
  weights: Readonly<Record<string, number>>,
  method: ReturnMethod = "simple"
): number[] {
  const total = Object.values(weights).reduce((s, w) => s + w, 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ValidationError(`portfolio weights must sum to 1, got ${total}`);
  }
  const byTicker = new Map(
    series.map(validatePriceSeries).map(s => [s.ticker, s])
  );
  const missing = Object.keys(weights).filter(t => !byTicker.has(t));
  if (missing.length > 0) {
    throw new ValidationError(`no price series for: ${missing.join(", ")}`);
  }

  const tickers = Object.keys(weights);
  const dates = commonDates(tickers.map(t => byTicker.get(t)));
  const blended = new Array<number>(Math.max(dates.length - 1, 0)).fill(0);
  for (const ticker of tickers) {
    const closeByDate = new Map(
      (byTicker.get(ticker)?.points ?? []).map(p => [p.date, p.close])
    );
    const closes = dates.map(d => closeByDate.get(d) ?? Number.NaN);
    const returns = computeReturns(closes, method);
    returns.forEach((r, i) => {
      blended[i] += weights[ticker] * r;
    });
  }
  return blended;
}

function commonDates(series: ReadonlyArray<PriceSeries | undefined>): string[] {
  let shared: Set<string> | undefined;
  for (const s of series) {
    const dates = new Set((s?.points ?? []).map(p => p.date));
    shared = shared
      ? new Set(Array.from(shared).filter(d => dates.has(d)))
      : dates;
  }
  return Array.from(shared ?? []).sort();
}
