/**
 * Analytics Service
 * Loads the dashboard reports concurrently and commits them together. A
 * failed report falls back to its empty default; the others still land.
 */

import { authenticationRequired, type ClassifiedError, classifyError } from '../lib/errors';
import { isJsonObject, type JsonObject } from '../lib/json';
import { Store } from '../lib/store';
import {
  AGGREGATE_REPORTS,
  type AnalyticsExport,
  type AnalyticsReportName,
  type AnalyticsReports,
  type AnalyticsState,
  type DateRange,
  type ExportReportType,
} from '../types';

import type { CivicApiService, ReportQuery } from './civicApi';
import type { SessionService, SignOutReason } from './sessionService';

export const DEFAULT_ANALYTICS_WINDOW_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AnalyticsServiceOptions {
  windowDays?: number;
  now?: () => Date;
}

/**
 * Empty payload for a report; the heat map keeps its shape so charts can render
 */
export function defaultReport(name: AnalyticsReportName): JsonObject {
  return name === 'heatMap' ? { heat_points: [], total_clusters: 0 } : {};
}

export function emptyReports(): AnalyticsReports {
  return {
    dailyTrends: defaultReport('dailyTrends'),
    weeklyTrends: defaultReport('weeklyTrends'),
    monthlyTrends: defaultReport('monthlyTrends'),
    departmentPerformance: defaultReport('departmentPerformance'),
    workerPerformance: defaultReport('workerPerformance'),
    issueTypesDistribution: defaultReport('issueTypesDistribution'),
    heatMap: defaultReport('heatMap'),
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYY-MM-DD of the local calendar day, as picked on the device
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

const ROW_KEYS = {
  dailyTrends: 'daily_trends',
  departmentPerformance: 'departments',
  workerPerformance: 'workers',
  issueTypesDistribution: 'issue_types',
} as const satisfies Partial<Record<AnalyticsReportName, string>>;

export type TabularReportName = keyof typeof ROW_KEYS;

/**
 * The row list inside a report, or [] when the report has none
 */
export function reportRows(reports: AnalyticsReports, name: TabularReportName): JsonObject[] {
  const rows = reports[name][ROW_KEYS[name]];
  return Array.isArray(rows) ? rows.filter(isJsonObject) : [];
}

interface SliceResult {
  name: AnalyticsReportName;
  payload: JsonObject;
  error: ClassifiedError | null;
}

export class AnalyticsService {
  readonly store: Store<AnalyticsState>;
  private generation = 0;
  private resets = 0;
  private now: () => Date;

  constructor(
    private api: CivicApiService,
    private session: SessionService,
    { windowDays = DEFAULT_ANALYTICS_WINDOW_DAYS, now = () => new Date() }: AnalyticsServiceOptions = {}
  ) {
    this.now = now;
    const end = now();
    this.store = new Store<AnalyticsState>({
      reports: emptyReports(),
      range: { start: new Date(end.getTime() - windowDays * DAY_MS), end },
      loading: false,
      error: null,
    });
    session.onSignOut((reason) => this.handleSignOut(reason));
  }

  getState(): AnalyticsState {
    return this.store.getState();
  }

  subscribe(listener: (state: AnalyticsState) => void): () => void {
    return this.store.subscribe(listener);
  }

  /**
   * Fetch every dashboard report in parallel and commit once all have settled
   */
  async loadAll(district?: string | null): Promise<void> {
    const generation = ++this.generation;
    const { token, epoch } = this.session.snapshot();

    if (!token) {
      this.store.update((s) => ({ ...s, loading: false, error: authenticationRequired() }));
      return;
    }

    this.store.update((s) => ({ ...s, loading: true, error: null }));
    const query = this.query(district);

    const slices = await Promise.all(AGGREGATE_REPORTS.map((name) => this.fetchSlice(token, name, query)));

    if (!this.isCurrent(generation, epoch)) {
      console.warn('[analytics] Discarding stale dashboard results');
      if (generation === this.generation) {
        this.store.update((s) => ({ ...s, loading: false }));
      }
      return;
    }

    this.store.update((s) => {
      const reports = { ...s.reports };
      for (const slice of slices) {
        reports[slice.name] = slice.payload;
      }
      return { ...s, reports, loading: false };
    });

    if (slices.some((slice) => slice.error?.category === 'AuthenticationRequired')) {
      await this.session.expire();
    }
  }

  /**
   * Fetch one report on its own, including the on-demand trend reports
   */
  async loadReport(name: AnalyticsReportName, district?: string | null): Promise<void> {
    const resets = this.resets;
    const { token, epoch } = this.session.snapshot();

    if (!token) {
      this.store.update((s) => ({ ...s, error: authenticationRequired() }));
      return;
    }

    const slice = await this.fetchSlice(token, name, this.query(district));

    if (resets !== this.resets || !this.session.isCurrent(epoch)) {
      console.warn(`[analytics] Discarding stale ${name} result`);
      return;
    }

    this.store.update((s) => ({ ...s, reports: { ...s.reports, [name]: slice.payload } }));

    if (slice.error?.category === 'AuthenticationRequired') {
      await this.session.expire();
    }
  }

  /**
   * Change the reporting window. Does not refetch.
   * Rejects invalid, inverted or future ranges and leaves state unchanged.
   */
  setDateRange(start: Date, end: Date): boolean {
    if (
      !isValidDate(start) ||
      !isValidDate(end) ||
      start.getTime() > end.getTime() ||
      end.getTime() > this.now().getTime()
    ) {
      console.warn('[analytics] Rejected date range:', start, end);
      return false;
    }
    const range: DateRange = { start, end };
    this.store.update((s) => ({ ...s, range }));
    return true;
  }

  /**
   * Download a CSV export for the current window. Throws a ClassifiedError on failure.
   */
  async exportReport(reportType: ExportReportType, district?: string | null): Promise<AnalyticsExport> {
    const { token } = this.session.snapshot();
    if (!token) {
      throw authenticationRequired();
    }

    try {
      return await this.api.exportAnalytics(token, reportType, this.query(district));
    } catch (err) {
      const error = classifyError(err);
      console.error(`[analytics] Export of ${reportType} failed:`, error.detail);
      if (error.category === 'AuthenticationRequired') {
        await this.session.expire();
      }
      throw error;
    }
  }

  clearData(): void {
    this.reset(null);
  }

  private async fetchSlice(token: string, name: AnalyticsReportName, query: ReportQuery): Promise<SliceResult> {
    try {
      const payload = await this.api.getReport(token, name, query);
      return { name, payload, error: null };
    } catch (err) {
      const error = classifyError(err);
      console.error(`[analytics] Failed to load ${name}:`, error.detail);
      return { name, payload: defaultReport(name), error };
    }
  }

  private query(district?: string | null): ReportQuery {
    const { range } = this.store.getState();
    return {
      startDate: formatDate(range.start),
      endDate: formatDate(range.end),
      district: district ?? null,
    };
  }

  private isCurrent(generation: number, epoch: number): boolean {
    return generation === this.generation && this.session.isCurrent(epoch);
  }

  private reset(error: ClassifiedError | null): void {
    this.generation += 1;
    this.resets += 1;
    this.store.update((s) => ({ ...s, reports: emptyReports(), loading: false, error }));
  }

  private handleSignOut(reason: SignOutReason): void {
    this.reset(reason === 'expired' ? authenticationRequired('Session expired') : null);
  }
}
