import { AnalyticsConfig, isHigherBetter } from "../config/analyticsConfig";
import { KpiEntry, KpiTrend, TrendDirection, TrendResult } from "../models/_types";
import { achievementRate, groupKpiSeries, isOnTarget, latestKpiEntries } from "../utils/kpi";
import { compareKeys, roundTo } from "../utils/math";

export type TrendOptions = {
  tolerance: number;
  higherIsBetter: boolean;
};

export type RatedKpi = {
  entry: KpiEntry;
  achievementRate: number;
  onTarget: boolean;
};

const DEFAULT_TOP_PERFORMERS = 5;

/**
 * Classifies a time-ordered series by comparing its first and last values.
 * A relative change within the tolerance band is stable.
 */
export function classifyTrend(values: readonly number[], options: TrendOptions): TrendResult {
  if (values.length < 2) {
    return {
      direction: "INSUFFICIENT_DATA",
      points: values.length,
      first: values.length ? values[0] : null,
      last: values.length ? values[values.length - 1] : null,
      delta: null,
      relativeChange: null,
      slope: null
    };
  }

  const first = values[0];
  const last = values[values.length - 1];
  const delta = last - first;
  const relativeChange = first === 0 ? null : delta / Math.abs(first);

  let direction: TrendDirection;
  if (delta === 0 || (relativeChange !== null && Math.abs(relativeChange) <= options.tolerance)) {
    direction = "STABLE";
  } else {
    direction = delta > 0 === options.higherIsBetter ? "IMPROVING" : "DECLINING";
  }

  return {
    direction,
    points: values.length,
    first,
    last,
    delta: roundTo(delta, 4),
    relativeChange: relativeChange === null ? null : roundTo(relativeChange, 4),
    slope: roundTo(leastSquaresSlope(values), 4)
  };
}

export function analyzeKpiTrends(kpis: readonly KpiEntry[], config: AnalyticsConfig): KpiTrend[] {
  return groupKpiSeries(kpis).map((series) => {
    const { projectId, metricName, unit } = series[series.length - 1];
    const higherIsBetter = isHigherBetter(config, metricName);
    return {
      projectId,
      metricName,
      unit,
      higherIsBetter,
      ...classifyTrend(
        series.map((entry) => entry.actualValue),
        { tolerance: config.trendTolerance, higherIsBetter }
      )
    };
  });
}

export function summarizeTrends(trends: readonly KpiTrend[]): Record<TrendDirection, number> {
  const counts: Record<TrendDirection, number> = {
    IMPROVING: 0,
    DECLINING: 0,
    STABLE: 0,
    INSUFFICIENT_DATA: 0
  };
  for (const trend of trends) {
    counts[trend.direction] += 1;
  }
  return counts;
}

function rateCurrentKpis(kpis: readonly KpiEntry[], config: AnalyticsConfig): RatedKpi[] {
  return latestKpiEntries(kpis).flatMap((entry) => {
    const rate = achievementRate(entry, config);
    return rate === null ? [] : [{ entry, achievementRate: roundTo(rate, 4), onTarget: isOnTarget(entry, config) }];
  });
}

/** Current KPIs below the underperforming threshold, worst first. */
export function findUnderperformingKpis(kpis: readonly KpiEntry[], config: AnalyticsConfig): RatedKpi[] {
  return rateCurrentKpis(kpis, config)
    .filter((rated) => rated.achievementRate < config.underperformingThreshold)
    .sort((a, b) => a.achievementRate - b.achievementRate || compareKeys(a.entry.id, b.entry.id));
}

export function findTopPerformers(
  kpis: readonly KpiEntry[],
  config: AnalyticsConfig,
  limit = DEFAULT_TOP_PERFORMERS
): RatedKpi[] {
  return rateCurrentKpis(kpis, config)
    .sort((a, b) => b.achievementRate - a.achievementRate || compareKeys(a.entry.id, b.entry.id))
    .slice(0, limit);
}

function leastSquaresSlope(values: readonly number[]): number {
  const n = values.length;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((acc, value) => acc + value, 0) / n;
  let numerator = 0;
  let denominator = 0;
  values.forEach((value, index) => {
    numerator += (index - meanX) * (value - meanY);
    denominator += (index - meanX) ** 2;
  });
  return denominator === 0 ? 0 : numerator / denominator;
}
