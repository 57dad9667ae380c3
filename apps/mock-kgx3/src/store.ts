/**
 * In-memory record of submissions the mock endpoint has answered
 */

export interface StoredSubmission {
  /** Present only for accepted submissions */
  submissionId?: string;
  status: number;
  apiKey?: string;
  title?: string;
  pdfUrl?: string;
  email?: string;
  receivedAt: number;
}

export interface StoreStats {
  received: number;
  accepted: number;
  rejected: number;
  byStatus: Record<string, number>;
}

export class SubmissionStore {
  private submissions: StoredSubmission[] = [];
  private counter = 0;

  generateSubmissionId(): string {
    this.counter++;
    const timestamp = Date.now().toString(36);
    const counter = this.counter.toString().padStart(6, "0");
    return `kgx3-${timestamp}-${counter}`;
  }

  add(submission: Omit<StoredSubmission, "receivedAt">): StoredSubmission {
    const stored: StoredSubmission = { ...submission, receivedAt: Date.now() };
    this.submissions.push(stored);
    return stored;
  }

  /** Oldest first */
  getAll(): StoredSubmission[] {
    return [...this.submissions];
  }

  getStats(): StoreStats {
    const byStatus: Record<string, number> = {};
    for (const s of this.submissions) {
      byStatus[s.status] = (byStatus[s.status] ?? 0) + 1;
    }
    const accepted = this.submissions.filter((s) => s.status >= 200 && s.status < 300).length;
    return {
      received: this.submissions.length,
      accepted,
      rejected: this.submissions.length - accepted,
      byStatus,
    };
  }

  reset(): void {
    this.submissions = [];
    this.counter = 0;
  }
}
