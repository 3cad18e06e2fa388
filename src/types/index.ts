export interface SolutionStep {
  step_number: number;
  description: string;
  calculation: string | null;
}

export interface MathAnswer {
  question: string;
  answer_label: string | null;
  answer_value: string;
  explanation: string;
  steps: SolutionStep[];
  confidence: number;
}

export interface MathProblem {
  id: string | null;
  userId: string;
  question: string;
  answer: MathAnswer;
  fileName: string;
  contentType: string;
  createdAt: Date;
}

/**
 * A problem as read back from the history store. Unlike a freshly solved
 * `MathProblem`, it always carries the id it was stored under.
 */
export interface HistoryRecord extends MathProblem {
  id: string;
}

/**
 * Identity extracted from a verified ID token. Never persisted.
 */
export interface AuthUser {
  uid: string;
  email: string | null;
  displayName: string | null;
  emailVerified: boolean;
}

export interface UploadedImage {
  buffer: Buffer;
  fileName: string;
  contentType: string;
  size: number;
}

export interface SolveResponseBody {
  question: string;
  answer: MathAnswer;
  problem_id: string | null;
}

export interface HistoryItemBody {
  id: string;
  question: string;
  answer: MathAnswer;
  file_name: string;
  created_at: string;
}

export interface HistoryResponseBody {
  history: HistoryItemBody[];
  user_id: string;
  total_problems: number;
}

export interface DeleteResponseBody {
  message: string;
  problem_id: string;
  user_id: string;
}

export interface ErrorResponseBody {
  detail: string;
}
