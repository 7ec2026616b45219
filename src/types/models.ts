/**
 * Core Data Models
 * Client-side shapes of the records the backend returns. Records are
 * immutable: an update replaces the whole object.
 */

export type UserRole = 'client' | 'worker' | 'admin' | 'super_admin';

/** Backend status values are lowercase */
export type IssueStatus = 'pending' | 'assigned' | 'completed' | 'verified';

export interface User {
  readonly id: number;
  readonly fullName: string;
  readonly email: string;
  readonly role: UserRole | string;
  readonly district: string | null;
  readonly pincode: string | null;
  readonly isActive: boolean;
  readonly createdAt: string;
}

export interface Coordinates {
  readonly lat: number;
  readonly lng: number;
}

export type MediaType = 'photo_initial' | 'photo_proof' | 'audio' | 'signature';

export interface MediaReference {
  readonly id: number;
  readonly issueId: number;
  readonly url: string;
  readonly mediaType: MediaType | string;
}

export interface IssueFeedback {
  readonly id: number;
  readonly userId: number;
  readonly comment: string;
  readonly rating: number;
  readonly sentiment: string | null;
}

export interface PersonSummary {
  readonly id: number;
  readonly fullName: string;
}

export interface Department {
  readonly id: number;
  readonly name: string;
}

export interface Assignee {
  readonly user: PersonSummary;
  readonly department: Department;
}

export interface Issue {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  /** Problem type, e.g. "Road Damage" */
  readonly category: string;
  readonly district: string;
  readonly location: string;
  readonly coordinates: Coordinates | null;
  readonly photos: readonly MediaReference[];
  readonly feedback: readonly IssueFeedback[];
  readonly status: IssueStatus | string;
  readonly priority: number;
  readonly submittedBy: PersonSummary | null;
  readonly assignee: Assignee | null;
  readonly createdAt: string;
  readonly updatedAt: string | null;
}
