export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface Job {
  id: string; // UUID v4
  skillId: string;
  requestedBy: string;
  inputText: string;
  status: JobStatus;
  outputText: string; // set only with 'completed'
  errorText: string; // set only with 'failed'
  createdAt: Date;
  updatedAt: Date;
}

/** What a worker holds after a successful claim. */
export interface ClaimedJob {
  id: string;
  skillId: string;
  inputText: string;
}

export interface CreateJobData {
  skillId: string;
  requestedBy: string;
  inputText?: string;
}

export interface JobQuery {
  requestedBy?: string;
  skillId?: string;
  status?: JobStatus;
  cursor?: string;
  limit?: number;
}

export interface JobPage {
  jobs: Job[];
  nextCursor?: string;
}

export interface JobStats {
  pending: number;
  running: number;
  completed: number;
  failed: number;
}
