/**
 * Civic API Service
 * Endpoint wrappers over the transport. Every method that takes a token is an
 * authenticated call; payloads are converted to client models here.
 */

import type { Transport } from '../lib/api';
import { type JsonObject, toJsonObject } from '../lib/json';
import type {
  AnalyticsExport,
  AnalyticsReportName,
  ExportReportType,
  Issue,
  IssueDraft,
  RegistrationProfile,
  TaskCompletion,
  User,
} from '../types';

import { parseExport, parseIssue, parseIssueList, parseTokenResponse, parseUser } from './transforms';

export interface ReportQuery {
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
  district?: string | null;
}

export interface LoginResult {
  token: string;
  user: User;
}

const REPORT_PATHS: Record<AnalyticsReportName, string> = {
  dailyTrends: '/analytics/trends/daily',
  weeklyTrends: '/analytics/trends/weekly',
  monthlyTrends: '/analytics/trends/monthly',
  departmentPerformance: '/analytics/department-performance',
  workerPerformance: '/analytics/worker-performance',
  issueTypesDistribution: '/analytics/issue-types-distribution',
  heatMap: '/analytics/heat-map-data',
};

function photoName(prefix: string): string {
  return `${prefix}_${Date.now()}.jpg`;
}

export class CivicApiService {
  constructor(private transport: Transport) {}

  /**
   * Exchange credentials for a token, then fetch the owner's profile
   * POST /auth/login (form-encoded, OAuth2 password flow)
   */
  async login(email: string, password: string): Promise<LoginResult> {
    const payload = await this.transport.request({
      method: 'POST',
      path: '/auth/login',
      form: { username: email, password },
    });
    const { access_token: token } = parseTokenResponse(payload);
    const user = await this.getProfile(token);
    return { token, user };
  }

  /**
   * POST /auth/register
   */
  async register(profile: RegistrationProfile): Promise<User> {
    const payload = await this.transport.request({
      method: 'POST',
      path: '/auth/register',
      json: {
        full_name: profile.fullName,
        email: profile.email,
        password: profile.password,
        district: profile.district,
        pincode: profile.pincode ?? null,
      },
    });
    return parseUser(payload);
  }

  /**
   * GET /users/me
   */
  async getProfile(token: string): Promise<User> {
    const payload = await this.transport.request({ method: 'GET', path: '/users/me', token });
    return parseUser(payload);
  }

  async listMyIssues(token: string): Promise<Issue[]> {
    const payload = await this.transport.request({ method: 'GET', path: '/users/issues', token });
    return parseIssueList(payload);
  }

  async getIssue(token: string, issueId: number): Promise<Issue> {
    const payload = await this.transport.request({
      method: 'GET',
      path: `/users/issues/${issueId}`,
      token,
    });
    return parseIssue(payload);
  }

  /**
   * Submit a new issue with its photo
   * POST /users/issues (multipart)
   */
  async createIssue(token: string, draft: IssueDraft): Promise<Issue> {
    const payload = await this.transport.upload({
      path: '/users/issues',
      token,
      fields: {
        title: draft.title,
        description: draft.description,
        problem_type: draft.category,
        district: draft.district,
        latitude: String(draft.latitude),
        longitude: String(draft.longitude),
      },
      file: { field: 'file', data: draft.photo, filename: draft.photoName ?? photoName('image') },
    });
    return parseIssue(payload);
  }

  async listAssignedTasks(token: string): Promise<Issue[]> {
    const payload = await this.transport.request({ method: 'GET', path: '/worker/tasks', token });
    return parseIssueList(payload);
  }

  /**
   * Complete a task with a proof photo taken on site
   * POST /worker/tasks/{id}/complete (multipart)
   */
  async completeTask(token: string, completion: TaskCompletion): Promise<Issue> {
    const payload = await this.transport.upload({
      path: `/worker/tasks/${completion.taskId}/complete`,
      token,
      fields: {
        latitude: String(completion.latitude),
        longitude: String(completion.longitude),
      },
      file: {
        field: 'proof_file',
        data: completion.proofPhoto,
        filename: completion.proofPhotoName ?? photoName('proof'),
      },
    });
    return parseIssue(payload);
  }

  /**
   * Moderation-wide issue list
   * GET /admin/problems
   */
  async listAllProblems(token: string): Promise<Issue[]> {
    const payload = await this.transport.request({ method: 'GET', path: '/admin/problems', token });
    return parseIssueList(payload);
  }

  async getReport(token: string, name: AnalyticsReportName, query: ReportQuery): Promise<JsonObject> {
    // The heat map ignores the date window
    const dateQuery =
      name === 'heatMap' ? {} : { start_date: query.startDate, end_date: query.endDate };
    const payload = await this.transport.request({
      method: 'GET',
      path: REPORT_PATHS[name],
      token,
      query: { ...dateQuery, district: query.district },
    });
    return toJsonObject(payload);
  }

  /**
   * GET /analytics/export/csv
   */
  async exportAnalytics(
    token: string,
    reportType: ExportReportType,
    query: ReportQuery
  ): Promise<AnalyticsExport> {
    const payload = await this.transport.request({
      method: 'GET',
      path: '/analytics/export/csv',
      token,
      query: {
        report_type: reportType,
        start_date: query.startDate,
        end_date: query.endDate,
        district: query.district,
      },
    });
    return parseExport(payload);
  }

  /**
   * Bind this device's push token to the signed-in account
   * POST /auth/fcm-token
   */
  async registerDeviceToken(token: string, deviceToken: string): Promise<void> {
    await this.transport.request({
      method: 'POST',
      path: '/auth/fcm-token',
      token,
      json: { fcm_token: deviceToken },
    });
  }
}
