/**
 * Payload transforms
 * Turn decoded backend payloads (snake_case, loosely typed) into the
 * immutable client models. Malformed payloads throw.
 */

import { isRecord } from '../lib/json';
import type {
  AnalyticsExport,
  Assignee,
  Issue,
  IssueFeedback,
  MediaReference,
  PersonSummary,
  TokenResponse,
  User,
} from '../types';

function str(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function num(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function bool(record: Record<string, unknown>, key: string): boolean | undefined {
  const value = record[key];
  return typeof value === 'boolean' ? value : undefined;
}

function requireRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`Malformed ${what} payload`);
  }
  return value;
}

function requireNumber(record: Record<string, unknown>, key: string, what: string): number {
  const value = num(record, key);
  if (value === undefined) {
    throw new Error(`Malformed ${what} payload: missing ${key}`);
  }
  return value;
}

function requireString(record: Record<string, unknown>, key: string, what: string): string {
  const value = str(record, key);
  if (value === undefined) {
    throw new Error(`Malformed ${what} payload: missing ${key}`);
  }
  return value;
}

function listOf<T>(value: unknown, parse: (item: unknown) => T): T[] {
  return Array.isArray(value) ? value.map(parse) : [];
}

export function parseUser(payload: unknown): User {
  const json = requireRecord(payload, 'user');
  return {
    id: num(json, 'id') ?? 0,
    fullName: str(json, 'full_name') ?? str(json, 'fullName') ?? '',
    email: str(json, 'email') ?? '',
    role: str(json, 'role') ?? 'client',
    district: str(json, 'district') ?? null,
    pincode: str(json, 'pincode') ?? null,
    isActive: bool(json, 'is_active') ?? bool(json, 'isActive') ?? true,
    createdAt: str(json, 'created_at') ?? new Date().toISOString(),
  };
}

function parsePerson(payload: unknown): PersonSummary {
  const json = requireRecord(payload, 'person');
  return {
    id: requireNumber(json, 'id', 'person'),
    fullName: str(json, 'full_name') ?? '',
  };
}

function parseAssignee(payload: unknown): Assignee {
  const json = requireRecord(payload, 'assignee');
  const department = requireRecord(json.department, 'department');
  return {
    user: parsePerson(json.user),
    department: {
      id: requireNumber(department, 'id', 'department'),
      name: str(department, 'name') ?? '',
    },
  };
}

function parseMedia(payload: unknown): MediaReference {
  const json = requireRecord(payload, 'media');
  return {
    id: requireNumber(json, 'id', 'media'),
    issueId: num(json, 'problem_id') ?? 0,
    url: requireString(json, 'file_url', 'media'),
    mediaType: str(json, 'media_type') ?? 'photo_initial',
  };
}

function parseFeedback(payload: unknown): IssueFeedback {
  const json = requireRecord(payload, 'feedback');
  return {
    id: requireNumber(json, 'id', 'feedback'),
    userId: num(json, 'user_id') ?? 0,
    comment: str(json, 'comment') ?? '',
    rating: num(json, 'rating') ?? 0,
    sentiment: str(json, 'sentiment') ?? null,
  };
}

export function parseIssue(payload: unknown): Issue {
  const json = requireRecord(payload, 'issue');
  const latitude = num(json, 'latitude');
  const longitude = num(json, 'longitude');

  return {
    id: requireNumber(json, 'id', 'issue'),
    title: requireString(json, 'title', 'issue'),
    description: str(json, 'description') ?? '',
    category: str(json, 'problem_type') ?? '',
    district: str(json, 'district') ?? '',
    location: str(json, 'location') ?? 'Location not available',
    coordinates: latitude !== undefined && longitude !== undefined ? { lat: latitude, lng: longitude } : null,
    photos: listOf(json.media_files, parseMedia),
    feedback: listOf(json.feedback, parseFeedback),
    status: (str(json, 'status') ?? 'pending').toLowerCase(),
    priority: num(json, 'priority') ?? 0,
    submittedBy: isRecord(json.submitted_by) ? parsePerson(json.submitted_by) : null,
    assignee: isRecord(json.assigned_to) ? parseAssignee(json.assigned_to) : null,
    createdAt: requireString(json, 'created_at', 'issue'),
    updatedAt: str(json, 'updated_at') ?? null,
  };
}

export function parseIssueList(payload: unknown): Issue[] {
  if (!Array.isArray(payload)) {
    throw new Error('Malformed issue list payload');
  }
  return payload.map(parseIssue);
}

export function parseTokenResponse(payload: unknown): TokenResponse {
  const json = requireRecord(payload, 'token');
  return {
    access_token: requireString(json, 'access_token', 'token'),
    token_type: str(json, 'token_type') ?? 'bearer',
  };
}

export function parseExport(payload: unknown): AnalyticsExport {
  const json = requireRecord(payload, 'export');
  const period = isRecord(json.period) ? json.period : {};
  return {
    filename: requireString(json, 'filename', 'export'),
    content: str(json, 'content') ?? '',
    contentType: str(json, 'content_type') ?? 'text/csv',
    period: {
      startDate: str(period, 'start_date') ?? '',
      endDate: str(period, 'end_date') ?? '',
      district: str(period, 'district') ?? null,
    },
  };
}
