import type { HistoryItemBody, HistoryRecord, MathAnswer, MathProblem, SolveResponseBody } from '../types';

const UNKNOWN_FILE_NAME = 'unknown';

/**
 * Keeps letters, digits, dash, underscore and dot. Path separators and
 * anything else a client might smuggle into a multipart filename are dropped.
 */
export function sanitizeFileName(fileName: string | undefined): string {
  const base = (fileName ?? '').split(/[\\/]/).pop() ?? '';
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '').replace(/^\.+/, '');
  return cleaned.slice(0, 255) || UNKNOWN_FILE_NAME;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

function copyAnswer(answer: MathAnswer): MathAnswer {
  return {
    question: answer.question,
    answer_label: answer.answer_label,
    answer_value: answer.answer_value,
    explanation: answer.explanation,
    steps: answer.steps.map((step) => ({
      step_number: step.step_number,
      description: step.description,
      calculation: step.calculation,
    })),
    confidence: answer.confidence,
  };
}

export function toSolveResponse(problem: MathProblem): SolveResponseBody {
  return {
    question: problem.question,
    answer: copyAnswer(problem.answer),
    problem_id: problem.id,
  };
}

export function toHistoryItem(record: HistoryRecord): HistoryItemBody {
  return {
    id: record.id,
    question: record.question,
    answer: copyAnswer(record.answer),
    file_name: record.fileName,
    created_at: formatTimestamp(record.createdAt),
  };
}
