import { describe, it, expect } from 'vitest';

import { issuePayload, userPayload } from '../../test/fakes';
import { parseExport, parseIssue, parseIssueList, parseTokenResponse, parseUser } from '../transforms';

describe('parseUser', () => {
  it('maps the profile payload to camelCase fields', () => {
    expect(parseUser(userPayload())).toEqual({
      id: 7,
      fullName: 'Asha Verma',
      email: 'asha@example.com',
      role: 'client',
      district: 'Ranchi',
      pincode: '834001',
      isActive: true,
      createdAt: '2025-01-10T08:00:00',
    });
  });

  it('fills defaults for missing optional fields', () => {
    const user = parseUser({ email: 'w@example.com', created_at: '2025-02-01T00:00:00' });

    expect(user.id).toBe(0);
    expect(user.fullName).toBe('');
    expect(user.role).toBe('client');
    expect(user.district).toBeNull();
    expect(user.isActive).toBe(true);
  });

  it('rejects non-object payloads', () => {
    expect(() => parseUser([])).toThrow('Malformed user payload');
  });
});

describe('parseIssue', () => {
  it('maps the issue payload', () => {
    const issue = parseIssue(
      issuePayload(3, {
        status: 'ASSIGNED',
        media_files: [{ id: 11, problem_id: 3, file_url: '/uploads/a.jpg', media_type: 'photo_initial' }],
        feedback: [{ id: 4, user_id: 7, comment: 'Fixed quickly', rating: 5, sentiment: 'positive' }],
        submitted_by: { id: 7, full_name: 'Asha Verma' },
        assigned_to: { user: { id: 9, full_name: 'Ravi Kumar' }, department: { id: 2, name: 'Roads' } },
        updated_at: '2025-01-13T10:00:00',
      })
    );

    expect(issue).toEqual({
      id: 3,
      title: 'Issue 3',
      description: 'Pothole near the bus stop',
      category: 'Road Damage',
      district: 'Ranchi',
      location: 'Main Road',
      coordinates: { lat: 23.34, lng: 85.31 },
      photos: [{ id: 11, issueId: 3, url: '/uploads/a.jpg', mediaType: 'photo_initial' }],
      feedback: [{ id: 4, userId: 7, comment: 'Fixed quickly', rating: 5, sentiment: 'positive' }],
      status: 'assigned',
      priority: 2,
      submittedBy: { id: 7, fullName: 'Asha Verma' },
      assignee: { user: { id: 9, fullName: 'Ravi Kumar' }, department: { id: 2, name: 'Roads' } },
      createdAt: '2025-01-12T09:30:00',
      updatedAt: '2025-01-13T10:00:00',
    });
  });

  it('defaults missing descriptive fields', () => {
    const issue = parseIssue({ id: 5, title: 'Streetlight', created_at: '2025-01-01T00:00:00' });

    expect(issue.description).toBe('');
    expect(issue.category).toBe('');
    expect(issue.district).toBe('');
    expect(issue.location).toBe('Location not available');
    expect(issue.status).toBe('pending');
    expect(issue.coordinates).toBeNull();
    expect(issue.photos).toEqual([]);
    expect(issue.assignee).toBeNull();
  });

  it('requires id, title and created_at', () => {
    expect(() => parseIssue({ title: 'x', created_at: 'y' })).toThrow('Malformed issue payload: missing id');
    expect(() => parseIssue({ id: 1, created_at: 'y' })).toThrow('Malformed issue payload: missing title');
    expect(() => parseIssue({ id: 1, title: 'x' })).toThrow('Malformed issue payload: missing created_at');
  });

  it('keeps coordinates only when both are present', () => {
    expect(parseIssue(issuePayload(1, { longitude: null })).coordinates).toBeNull();
  });
});

describe('parseIssueList', () => {
  it('parses each item', () => {
    expect(parseIssueList([issuePayload(1), issuePayload(2)]).map((i) => i.id)).toEqual([1, 2]);
  });

  it('rejects non-array payloads', () => {
    expect(() => parseIssueList({ items: [] })).toThrow('Malformed issue list payload');
  });
});

describe('parseTokenResponse', () => {
  it('requires access_token', () => {
    expect(parseTokenResponse({ access_token: 'test-token' })).toEqual({
      access_token: 'test-token',
      token_type: 'bearer',
    });
    expect(() => parseTokenResponse({})).toThrow('Malformed token payload: missing access_token');
  });
});

describe('parseExport', () => {
  it('maps the export envelope', () => {
    expect(
      parseExport({
        filename: 'trends.csv',
        content: 'date,count\n',
        content_type: 'text/csv',
        period: { start_date: '2025-01-01', end_date: '2025-01-31', district: null },
      })
    ).toEqual({
      filename: 'trends.csv',
      content: 'date,count\n',
      contentType: 'text/csv',
      period: { startDate: '2025-01-01', endDate: '2025-01-31', district: null },
    });
  });
});
