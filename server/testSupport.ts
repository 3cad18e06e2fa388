import type { Express } from 'express';
import { z } from 'zod';
import type { HistoryStore } from '../src/services/historyStore';
import type { MathSolver } from '../src/services/openai';
import type { HistoryRecord, MathAnswer } from '../src/types';
import type { TokenVerifier, VerifiedToken } from './auth';

/** Accepts a fixed set of tokens, like an identity provider would. */
export class FakeTokenVerifier implements TokenVerifier {
  calls = 0;

  constructor(private readonly tokens: Record<string, VerifiedToken>) {}

  async verifyIdToken(idToken: string): Promise<VerifiedToken> {
    this.calls += 1;
    const decoded = this.tokens[idToken];
    if (!decoded) {
      throw new Error('Firebase ID token has expired.');
    }
    return decoded;
  }
}

export class FakeMathSolver implements MathSolver {
  calls = 0;

  constructor(private result: MathAnswer | Error) {}

  respondWith(result: MathAnswer | Error): void {
    this.result = result;
  }

  async solve(): Promise<MathAnswer> {
    this.calls += 1;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

/** Wraps a store and counts calls so tests can prove it was never touched. */
export class CountingHistoryStore implements HistoryStore {
  calls = 0;
  failWrites = false;

  constructor(private readonly inner: HistoryStore) {}

  async save(...args: Parameters<HistoryStore['save']>): Promise<string> {
    this.calls += 1;
    if (this.failWrites) {
      throw new Error('firestore unavailable');
    }
    return this.inner.save(...args);
  }

  async list(...args: Parameters<HistoryStore['list']>): Promise<HistoryRecord[]> {
    this.calls += 1;
    return this.inner.list(...args);
  }

  async get(...args: Parameters<HistoryStore['get']>): Promise<HistoryRecord | null> {
    this.calls += 1;
    return this.inner.get(...args);
  }

  async delete(...args: Parameters<HistoryStore['delete']>): Promise<boolean> {
    this.calls += 1;
    return this.inner.delete(...args);
  }
}

export const TWO_PLUS_TWO: MathAnswer = {
  question: 'What is 2 + 2?',
  answer_label: null,
  answer_value: '4',
  explanation: 'Adding two and two gives four.',
  steps: [{ step_number: 1, description: 'Add 2 and 2', calculation: '2 + 2 = 4' }],
  confidence: 0.95,
};

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listens on an ephemeral local port. */
export function listen(app: Express): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Test server is not listening on a TCP port'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
    server.on('error', reject);
  });
}

const stepSchema = z.object({
  step_number: z.number(),
  description: z.string(),
  calculation: z.string().nullable(),
});

export const answerSchema = z.object({
  question: z.string(),
  answer_label: z.string().nullable(),
  answer_value: z.string(),
  explanation: z.string(),
  steps: z.array(stepSchema),
  confidence: z.number(),
});

export const solveResponseSchema = z.object({
  question: z.string(),
  answer: answerSchema,
  problem_id: z.string().nullable(),
});

export const historyItemSchema = z.object({
  id: z.string(),
  question: z.string(),
  answer: answerSchema,
  file_name: z.string(),
  created_at: z.string(),
});

export const historyResponseSchema = z.object({
  history: z.array(historyItemSchema),
  user_id: z.string(),
  total_problems: z.number(),
});

export const deleteResponseSchema = z.object({
  message: z.string(),
  problem_id: z.string(),
  user_id: z.string(),
});
