/**
 * @fileoverview NanoDLP analytics metric ids (`T` field) and their names.
 */

import { z } from 'zod';
import metricsJson from './analytics-metrics.json';

const MetricTableSchema = z.array(z.object({ key: z.string().min(1), id: z.number().int().nonnegative() }));

export type AnalyticsMetric = z.infer<typeof MetricTableSchema>[number];

export const ANALYTICS_METRICS: readonly AnalyticsMetric[] = MetricTableSchema.parse(metricsJson);

const byId = new Map(ANALYTICS_METRICS.map((metric) => [metric.id, metric.key]));
const byKey = new Map(ANALYTICS_METRICS.map((metric) => [metric.key, metric.id]));

export function metricKeyForId(id: number): string | null {
  return byId.get(id) ?? null;
}

export function metricIdForKey(key: string): number | null {
  return byKey.get(key) ?? null;
}
