import { Timestamp, type DocumentData } from 'firebase-admin/firestore';
import type { HistoryStore } from '../src/services/historyStore';
import type { HistoryRecord, MathAnswer, MathProblem, SolutionStep } from '../src/types';

const USERS_COLLECTION = 'users';
const SOLUTIONS_COLLECTION = 'solutions';

// A type alias rather than an interface so it is assignable to `DocumentData`.
export type SolutionDocument = {
  question: string;
  answer: MathAnswer;
  user_id: string;
  file_name: string;
  content_type: string;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export function toSolutionDocument(problem: MathProblem, updatedAt: Date = new Date()): SolutionDocument {
  return {
    question: problem.question,
    answer: {
      question: problem.answer.question,
      answer_label: problem.answer.answer_label,
      answer_value: problem.answer.answer_value,
      explanation: problem.answer.explanation,
      steps: problem.answer.steps.map((step) => ({
        step_number: step.step_number,
        description: step.description,
        calculation: step.calculation,
      })),
      confidence: problem.answer.confidence,
    },
    user_id: problem.userId,
    file_name: problem.fileName,
    content_type: problem.contentType,
    created_at: Timestamp.fromDate(problem.createdAt),
    updated_at: Timestamp.fromDate(updatedAt),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStep(value: unknown, index: number): SolutionStep | null {
  if (!isRecord(value) || typeof value.description !== 'string') {
    return null;
  }
  return {
    step_number: typeof value.step_number === 'number' ? value.step_number : index + 1,
    description: value.description,
    calculation: typeof value.calculation === 'string' ? value.calculation : null,
  };
}

function readAnswer(value: unknown): MathAnswer | null {
  if (!isRecord(value) || typeof value.answer_value !== 'string' || !Array.isArray(value.steps)) {
    return null;
  }
  const steps = value.steps.map(readStep);
  if (steps.some((step) => step === null)) {
    return null;
  }
  return {
    question: typeof value.question === 'string' ? value.question : '',
    answer_label: typeof value.answer_label === 'string' ? value.answer_label : null,
    answer_value: value.answer_value,
    explanation: typeof value.explanation === 'string' ? value.explanation : '',
    steps: steps.filter((step): step is SolutionStep => step !== null),
    confidence: typeof value.confidence === 'number' ? value.confidence : 0,
  };
}

/**
 * Maps a stored document back to a record. Returns null for documents
 * missing the answer or a usable `created_at`.
 */
export function fromSolutionDocument(id: string, userId: string, data: DocumentData | undefined): HistoryRecord | null {
  if (!data) {
    return null;
  }
  const answer = readAnswer(data.answer);
  const createdAt = data.created_at instanceof Timestamp ? data.created_at.toDate() : null;
  if (!answer || !createdAt) {
    return null;
  }
  return {
    id,
    userId,
    question: typeof data.question === 'string' ? data.question : answer.question,
    answer,
    fileName: typeof data.file_name === 'string' ? data.file_name : 'unknown',
    contentType: typeof data.content_type === 'string' ? data.content_type : 'unknown',
    createdAt,
  };
}

/**
 * The part of `Firestore` the store calls. A `Firestore` instance satisfies
 * it, and tests pass an in-process fake.
 */
export interface SolutionSnapshot {
  id: string;
  exists: boolean;
  data(): DocumentData | undefined;
}

export interface SolutionDocRef {
  id: string;
  get(): Promise<SolutionSnapshot>;
  set(data: SolutionDocument): Promise<unknown>;
  delete(): Promise<unknown>;
}

export interface SolutionQuery {
  orderBy(field: string, direction: 'asc' | 'desc'): SolutionQuery;
  limit(limit: number): SolutionQuery;
  get(): Promise<{ docs: SolutionSnapshot[] }>;
}

export interface SolutionCollection extends SolutionQuery {
  doc(): SolutionDocRef;
  doc(documentId: string): SolutionDocRef;
}

export interface HistoryDatabase {
  collection(path: string): {
    doc(documentId: string): {
      collection(path: string): SolutionCollection;
    };
  };
}

/**
 * Keeps each user's records under `users/{uid}/solutions`, so a lookup
 * through another user's path can never reach them.
 */
export class FirestoreHistoryStore implements HistoryStore {
  constructor(private readonly db: HistoryDatabase) {}

  private solutions(userId: string): SolutionCollection {
    return this.db.collection(USERS_COLLECTION).doc(userId).collection(SOLUTIONS_COLLECTION);
  }

  async save(problem: MathProblem): Promise<string> {
    const collection = this.solutions(problem.userId);
    const docRef = problem.id ? collection.doc(problem.id) : collection.doc();
    await docRef.set(toSolutionDocument(problem));
    console.log(`💾 Solution saved for user ${problem.userId}`);
    return docRef.id;
  }

  async list(userId: string, limit: number): Promise<HistoryRecord[]> {
    const snapshot = await this.solutions(userId).orderBy('created_at', 'desc').limit(limit).get();

    const records: HistoryRecord[] = [];
    for (const doc of snapshot.docs) {
      const record = fromSolutionDocument(doc.id, userId, doc.data());
      if (record) {
        records.push(record);
      } else {
        console.warn(`⚠️ Skipping malformed history document ${doc.id} for user ${userId}`);
      }
    }
    return records;
  }

  async get(userId: string, problemId: string): Promise<HistoryRecord | null> {
    const snapshot = await this.solutions(userId).doc(problemId).get();
    if (!snapshot.exists) {
      return null;
    }
    return fromSolutionDocument(snapshot.id, userId, snapshot.data());
  }

  async delete(userId: string, problemId: string): Promise<boolean> {
    const docRef = this.solutions(userId).doc(problemId);
    const snapshot = await docRef.get();
    if (!snapshot.exists) {
      return false;
    }
    await docRef.delete();
    return true;
  }
}
