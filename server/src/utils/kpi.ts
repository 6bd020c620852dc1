import { AnalyticsConfig, isHigherBetter } from "../config/analyticsConfig";
import { KpiEntry } from "../models/_types";
import { clamp, compareKeys } from "./math";

const seriesKey = (entry: KpiEntry) => `${entry.projectId}\u0000${entry.metricName}`;

export function sortSeries(entries: readonly KpiEntry[]): KpiEntry[] {
  return [...entries].sort(
    (a, b) => compareKeys(a.recordedDate, b.recordedDate) || compareKeys(a.id, b.id)
  );
}

/**
 * Groups entries into one time series per project and metric, ordered by
 * project id then metric name, each series ascending by recorded date.
 */
export function groupKpiSeries(kpis: readonly KpiEntry[]): KpiEntry[][] {
  const series = new Map<string, KpiEntry[]>();
  for (const entry of kpis) {
    const key = seriesKey(entry);
    const bucket = series.get(key);
    if (bucket) {
      bucket.push(entry);
    } else {
      series.set(key, [entry]);
    }
  }
  return Array.from(series.entries())
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([, entries]) => sortSeries(entries));
}

/** The most recent entry of every series: the metric's current value. */
export function latestKpiEntries(kpis: readonly KpiEntry[]): KpiEntry[] {
  return groupKpiSeries(kpis).map((series) => series[series.length - 1]);
}

/**
 * `actual / target`, or `target / actual` for lower-is-better metrics. Null
 * when the ratio has no denominator.
 */
export function achievementRate(entry: KpiEntry, config: AnalyticsConfig): number | null {
  if (isHigherBetter(config, entry.metricName)) {
    return entry.targetValue === 0 ? null : entry.actualValue / entry.targetValue;
  }
  if (entry.actualValue === 0) {
    return entry.targetValue === 0 ? null : config.kpiAchievementCap;
  }
  return entry.targetValue / entry.actualValue;
}

export function cappedAchievement(rate: number, config: AnalyticsConfig): number {
  return clamp(rate, 0, config.kpiAchievementCap);
}

export function isOnTarget(entry: KpiEntry, config: AnalyticsConfig): boolean {
  return isHigherBetter(config, entry.metricName)
    ? entry.actualValue >= entry.targetValue
    : entry.actualValue <= entry.targetValue;
}
