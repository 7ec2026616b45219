/**
 * Analytics Types
 */

import type { ClassifiedError } from '../lib/errors';
import type { JsonObject } from '../lib/json';

/** Reports fetched together by the dashboard */
export const AGGREGATE_REPORTS = [
  'dailyTrends',
  'departmentPerformance',
  'workerPerformance',
  'issueTypesDistribution',
  'heatMap',
] as const;

/** Reports fetched on demand only */
export const ON_DEMAND_REPORTS = ['weeklyTrends', 'monthlyTrends'] as const;

export type AggregateReportName = (typeof AGGREGATE_REPORTS)[number];
export type AnalyticsReportName = AggregateReportName | (typeof ON_DEMAND_REPORTS)[number];

export type AnalyticsReports = Record<AnalyticsReportName, JsonObject>;

export interface DateRange {
  start: Date;
  end: Date;
}

export type ExportReportType = 'trends' | 'departments' | 'workers' | 'issues';

export interface AnalyticsExport {
  filename: string;
  content: string;
  contentType: string;
  period: {
    startDate: string;
    endDate: string;
    district: string | null;
  };
}

export interface AnalyticsState {
  reports: AnalyticsReports;
  range: DateRange;
  loading: boolean;
  error: ClassifiedError | null;
}
