/**
 * Issue Service
 * Groups the issue containers: the citizen's own reports, a worker's task
 * list, the moderation list, a single issue, and the two writes.
 */

import type { ClassifyOptions } from '../lib/errors';
import type { Issue, IssueDraft, TaskCompletion } from '../types';

import type { CivicApiService } from './civicApi';
import { ActionService, ResourceService } from './resourceService';
import type { SessionService } from './sessionService';

const SUBMISSION_MESSAGES: ClassifyOptions['messages'] = {
  ServerRejected: 'Failed to submit your report. Please try again or contact support if the problem persists.',
  Unknown: 'Unable to submit your report. Please try again later.',
};

const COMPLETION_MESSAGES: ClassifyOptions['messages'] = {
  ServerRejected: 'Failed to complete the task. Please try again or contact support if the problem persists.',
  Unknown: 'Unable to complete the task. Please try again later.',
};

export class IssueService {
  readonly myIssues: ResourceService<Issue[]>;
  readonly assignedTasks: ResourceService<Issue[]>;
  readonly allProblems: ResourceService<Issue[]>;
  readonly issueDetail: ResourceService<Issue | null, number>;
  readonly submission: ActionService<IssueDraft, Issue>;
  readonly taskCompletion: ActionService<TaskCompletion, Issue>;

  constructor(api: CivicApiService, session: SessionService) {
    this.myIssues = new ResourceService(session, (token) => api.listMyIssues(token), [], {
      name: 'issues',
    });
    this.assignedTasks = new ResourceService(session, (token) => api.listAssignedTasks(token), [], {
      name: 'tasks',
    });
    this.allProblems = new ResourceService(session, (token) => api.listAllProblems(token), [], {
      name: 'problems',
    });
    this.issueDetail = new ResourceService<Issue | null, number>(
      session,
      (token, issueId) => api.getIssue(token, issueId),
      null,
      { name: 'issue-detail' }
    );
    this.submission = new ActionService(session, (token, draft: IssueDraft) => api.createIssue(token, draft), {
      name: 'submit-issue',
      messages: SUBMISSION_MESSAGES,
      onSuccess: () => this.myIssues.load(),
    });
    this.taskCompletion = new ActionService(
      session,
      (token, completion: TaskCompletion) => api.completeTask(token, completion),
      {
        name: 'complete-task',
        messages: COMPLETION_MESSAGES,
        onSuccess: () => this.assignedTasks.load(),
      }
    );
  }

  loadUserIssues(): Promise<void> {
    return this.myIssues.load();
  }

  loadAssignedTasks(): Promise<void> {
    return this.assignedTasks.load();
  }

  loadAllProblems(): Promise<void> {
    return this.allProblems.load();
  }

  async loadIssueDetails(issueId: number): Promise<Issue | null> {
    await this.issueDetail.load(issueId);
    return this.issueDetail.getState().data;
  }

  /**
   * Submit a report, then refresh the user's issue list. Null on failure.
   */
  submitIssue(draft: IssueDraft): Promise<Issue | null> {
    return this.submission.run(draft);
  }

  /**
   * Complete a task with its proof photo, then refresh the task list. Null on failure.
   */
  completeTask(completion: TaskCompletion): Promise<Issue | null> {
    return this.taskCompletion.run(completion);
  }

  clearError(): void {
    this.myIssues.clearError();
    this.assignedTasks.clearError();
    this.allProblems.clearError();
    this.issueDetail.clearError();
    this.submission.clearError();
    this.taskCompletion.clearError();
  }
}
