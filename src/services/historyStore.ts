import { randomUUID } from 'node:crypto';
import type { HistoryRecord, MathProblem } from '../types';

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 100;

/**
 * Per-user history of solved problems. Every operation is scoped by the
 * owner's uid: a record stored for one user is invisible to all others.
 */
export interface HistoryStore {
  save(problem: MathProblem): Promise<string>;
  /** Most recent first. */
  list(userId: string, limit: number): Promise<HistoryRecord[]>;
  get(userId: string, problemId: string): Promise<HistoryRecord | null>;
  /** Resolves false when the record does not exist under `userId`. */
  delete(userId: string, problemId: string): Promise<boolean>;
}

function cloneRecord(record: HistoryRecord): HistoryRecord {
  return {
    ...record,
    answer: { ...record.answer, steps: record.answer.steps.map((step) => ({ ...step })) },
    createdAt: new Date(record.createdAt.getTime()),
  };
}

/**
 * Process-local store used for development without a Firebase project.
 * Contents are lost on restart.
 */
export class InMemoryHistoryStore implements HistoryStore {
  private readonly records = new Map<string, Map<string, HistoryRecord>>();

  async save(problem: MathProblem): Promise<string> {
    const id = problem.id ?? randomUUID();
    let userRecords = this.records.get(problem.userId);
    if (!userRecords) {
      userRecords = new Map();
      this.records.set(problem.userId, userRecords);
    }
    userRecords.set(id, cloneRecord({ ...problem, id }));
    return id;
  }

  async list(userId: string, limit: number): Promise<HistoryRecord[]> {
    const userRecords = this.records.get(userId);
    if (!userRecords) {
      return [];
    }
    // Map keeps insertion order, so reversing first makes ties resolve newest-saved first.
    return [...userRecords.values()]
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(cloneRecord);
  }

  async get(userId: string, problemId: string): Promise<HistoryRecord | null> {
    const record = this.records.get(userId)?.get(problemId);
    return record ? cloneRecord(record) : null;
  }

  async delete(userId: string, problemId: string): Promise<boolean> {
    return this.records.get(userId)?.delete(problemId) ?? false;
  }
}
