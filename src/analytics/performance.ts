import { ExitReason, Trade } from "../types.js";

export interface PerformanceMetrics {
  date: string;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  breakevenTrades: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  grossPnl: number;
  grossProfit: number;
  grossLoss: number;
  totalBrokerage: number;
  netPnl: number;
  /** Gross profit over gross loss on net PnL; null when there were no losing trades. */
  profitFactor: number | null;
  maxDrawdown: number;
  avgHoldMinutes: number;
  ceTrades: number;
  peTrades: number;
  exitReasons: Partial<Record<ExitReason, number>>;
  /** Stays null until there is a returns series to compute it from. */
  sharpeRatio: null;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function avg(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/** Largest peak-to-trough fall of the cumulative net PnL curve, starting from zero. */
export function maxDrawdown(pnls: readonly number[]): number {
  let equity = 0;
  let peak = 0;
  let worst = 0;
  for (const pnl of pnls) {
    equity += pnl;
    peak = Math.max(peak, equity);
    worst = Math.max(worst, peak - equity);
  }
  return worst;
}

export function computePerformance(date: string, trades: readonly Trade[]): PerformanceMetrics {
  const ordered = [...trades].sort((a, b) => Date.parse(a.exitTime) - Date.parse(b.exitTime));
  const net = ordered.map((t) => t.netPnl);
  const wins = net.filter((p) => p > 0);
  const losses = net.filter((p) => p < 0);
  const grossProfit = sum(wins);
  const grossLoss = sum(losses);

  const exitReasons: Partial<Record<ExitReason, number>> = {};
  for (const trade of ordered) {
    exitReasons[trade.exitReason] = (exitReasons[trade.exitReason] ?? 0) + 1;
  }

  return {
    date,
    totalTrades: ordered.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    breakevenTrades: ordered.length - wins.length - losses.length,
    winRate: ordered.length === 0 ? 0 : (wins.length / ordered.length) * 100,
    avgWin: avg(wins),
    avgLoss: avg(losses),
    largestWin: wins.length > 0 ? Math.max(...wins) : 0,
    largestLoss: losses.length > 0 ? Math.min(...losses) : 0,
    grossPnl: sum(ordered.map((t) => t.grossPnl)),
    grossProfit,
    grossLoss,
    totalBrokerage: sum(ordered.map((t) => t.brokerage)),
    netPnl: sum(net),
    profitFactor: grossLoss < 0 ? grossProfit / Math.abs(grossLoss) : null,
    maxDrawdown: maxDrawdown(net),
    avgHoldMinutes: avg(ordered.map((t) => t.durationSec / 60)),
    ceTrades: ordered.filter((t) => t.optionType === "CE").length,
    peTrades: ordered.filter((t) => t.optionType === "PE").length,
    exitReasons,
    sharpeRatio: null
  };
}

export function logPerformance(m: PerformanceMetrics): void {
  console.log(
    "DAILY_PERFORMANCE",
    m.date,
    `trades=${m.totalTrades}`,
    `wins=${m.winningTrades}`,
    `losses=${m.losingTrades}`,
    `win_rate=${m.winRate.toFixed(1)}%`,
    `net=${m.netPnl.toFixed(2)}`,
    `pf=${m.profitFactor === null ? "n/a" : m.profitFactor.toFixed(2)}`,
    `max_dd=${m.maxDrawdown.toFixed(2)}`
  );
}
