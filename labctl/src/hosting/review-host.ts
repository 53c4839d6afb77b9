/** Code-hosting collaborator: review requests, labels, releases and issues. */

export type ReviewRequestInput = {
  branch: string;
  base: string;
  title: string;
  body: string;
};

export type Issue = {
  number: number;
  title: string;
  url: string;
  labels: string[];
};

export type IssueFilter = {
  label?: string;
  state?: "open" | "closed" | "all";
  limit?: number;
};

/**
 * Implementations report a merge conflict as ConflictError, distinct from
 * AuthError, NotFoundError and TransientServiceError.
 */
export interface ReviewHost {
  createReviewRequest(input: ReviewRequestInput): Promise<string>;
  comment(id: string, body: string): Promise<void>;
  close(id: string, comment?: string): Promise<void>;
  merge(id: string): Promise<void>;
  addLabels(id: string, labels: string[]): Promise<void>;
  removeLabels(id: string, labels: string[]): Promise<void>;
  createRelease(tag: string, title: string, notes: string): Promise<void>;
  listIssues(filter?: IssueFilter): Promise<Issue[]>;
  createIssue(title: string, body: string, labels?: string[]): Promise<Issue>;
}

export const LABELS = {
  winner: "labctl:winner",
  loser: "labctl:loser",
  held: "labctl:review-blocked",
  idea: "idea",
} as const;
