import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { Timestamp, type DocumentData } from 'firebase-admin/firestore';
import type { MathProblem } from '../src/types';
import {
  FirestoreHistoryStore,
  fromSolutionDocument,
  toSolutionDocument,
  type HistoryDatabase,
  type SolutionCollection,
  type SolutionDocRef,
  type SolutionDocument,
  type SolutionQuery,
  type SolutionSnapshot,
} from './firestoreHistoryStore';
import { TWO_PLUS_TWO } from './testSupport';

const problem: MathProblem = {
  id: null,
  userId: 'user-a',
  question: 'What is 2 + 2?',
  answer: TWO_PLUS_TWO,
  fileName: 'sum.png',
  contentType: 'image/png',
  createdAt: new Date('2026-02-10T08:30:00.000Z'),
};

describe('toSolutionDocument', () => {
  it('stores snake_case fields with Firestore timestamps', () => {
    const document = toSolutionDocument(problem, new Date('2026-02-10T08:30:05.000Z'));

    assert.equal(document.question, 'What is 2 + 2?');
    assert.equal(document.user_id, 'user-a');
    assert.equal(document.file_name, 'sum.png');
    assert.equal(document.content_type, 'image/png');
    assert.deepEqual(document.answer, TWO_PLUS_TWO);
    assert.equal(document.created_at.toDate().toISOString(), '2026-02-10T08:30:00.000Z');
    assert.equal(document.updated_at.toDate().toISOString(), '2026-02-10T08:30:05.000Z');
  });
});

describe('fromSolutionDocument', () => {
  it('reads back what toSolutionDocument wrote', () => {
    const record = fromSolutionDocument('doc-1', 'user-a', { ...toSolutionDocument(problem) });

    assert.deepEqual(record, { ...problem, id: 'doc-1' });
  });

  it('defaults optional answer fields', () => {
    const record = fromSolutionDocument('doc-2', 'user-a', {
      question: 'Solve x + 1 = 3',
      answer: {
        answer_value: 'x = 2',
        steps: [{ description: 'Subtract 1' }],
      },
      created_at: Timestamp.fromDate(new Date('2026-02-11T00:00:00.000Z')),
    });

    assert.deepEqual(record, {
      id: 'doc-2',
      userId: 'user-a',
      question: 'Solve x + 1 = 3',
      answer: {
        question: '',
        answer_label: null,
        answer_value: 'x = 2',
        explanation: '',
        steps: [{ step_number: 1, description: 'Subtract 1', calculation: null }],
        confidence: 0,
      },
      fileName: 'unknown',
      contentType: 'unknown',
      createdAt: new Date('2026-02-11T00:00:00.000Z'),
    });
  });

  it('skips documents without an answer or timestamp', () => {
    const createdAt = Timestamp.fromDate(new Date('2026-02-11T00:00:00.000Z'));

    assert.equal(fromSolutionDocument('doc-3', 'user-a', undefined), null);
    assert.equal(fromSolutionDocument('doc-3', 'user-a', { question: 'q', created_at: createdAt }), null);
    assert.equal(
      fromSolutionDocument('doc-3', 'user-a', { question: 'q', answer: TWO_PLUS_TWO, created_at: '2026-02-11' }),
      null,
    );
    assert.equal(
      fromSolutionDocument('doc-3', 'user-a', {
        answer: { answer_value: '4', steps: [{ calculation: '2 + 2' }] },
        created_at: createdAt,
      }),
      null,
    );
  });
});

interface RecordedQuery {
  path: string;
  orderBy: Array<[string, 'asc' | 'desc']>;
  limit: number | null;
}

/** Documents keyed by full path, with every query and delete recorded. */
class FakeFirestore implements HistoryDatabase {
  readonly documents = new Map<string, DocumentData>();
  readonly queries: RecordedQuery[] = [];
  readonly deleted: string[] = [];
  private nextId = 1;

  collection(path: string) {
    return {
      doc: (documentId: string) => ({
        collection: (subPath: string): SolutionCollection =>
          new FakeCollection(this, `${path}/${documentId}/${subPath}`),
      }),
    };
  }

  generateId(): string {
    const id = `generated-${this.nextId}`;
    this.nextId += 1;
    return id;
  }
}

function snapshotOf(id: string, data: DocumentData | undefined): SolutionSnapshot {
  return { id, exists: data !== undefined, data: () => data };
}

function createdAtMillis(data: DocumentData): number {
  return data.created_at instanceof Timestamp ? data.created_at.toMillis() : 0;
}

class FakeQuery implements SolutionQuery {
  constructor(
    protected readonly db: FakeFirestore,
    protected readonly path: string,
    private readonly orders: Array<[string, 'asc' | 'desc']> = [],
    private readonly limitCount: number | null = null,
  ) {}

  orderBy(field: string, direction: 'asc' | 'desc'): SolutionQuery {
    return new FakeQuery(this.db, this.path, [...this.orders, [field, direction]], this.limitCount);
  }

  limit(limit: number): SolutionQuery {
    return new FakeQuery(this.db, this.path, this.orders, limit);
  }

  async get(): Promise<{ docs: SolutionSnapshot[] }> {
    this.db.queries.push({ path: this.path, orderBy: this.orders, limit: this.limitCount });

    const prefix = `${this.path}/`;
    let entries = [...this.db.documents.entries()].filter(
      ([key]) => key.startsWith(prefix) && !key.slice(prefix.length).includes('/'),
    );
    for (const [field, direction] of this.orders) {
      if (field === 'created_at') {
        const sign = direction === 'desc' ? -1 : 1;
        entries = entries.sort(([, a], [, b]) => sign * (createdAtMillis(a) - createdAtMillis(b)));
      }
    }
    if (this.limitCount !== null) {
      entries = entries.slice(0, this.limitCount);
    }
    return { docs: entries.map(([key, data]) => snapshotOf(key.slice(prefix.length), data)) };
  }
}

class FakeCollection extends FakeQuery implements SolutionCollection {
  doc(documentId?: string): SolutionDocRef {
    const id = documentId ?? this.db.generateId();
    const key = `${this.path}/${id}`;
    const db = this.db;
    return {
      id,
      get: async () => snapshotOf(id, db.documents.get(key)),
      set: async (data: SolutionDocument) => {
        db.documents.set(key, { ...data });
      },
      delete: async () => {
        db.deleted.push(key);
        db.documents.delete(key);
      },
    };
  }
}

function storedProblem(userId: string, createdAt: string): DocumentData {
  return { ...toSolutionDocument({ ...problem, userId, createdAt: new Date(createdAt) }) };
}

describe('FirestoreHistoryStore', () => {
  it('saves under the owner\'s solutions collection', async () => {
    const db = new FakeFirestore();
    const store = new FirestoreHistoryStore(db);

    const id = await store.save(problem);

    assert.equal(id, 'generated-1');
    assert.deepEqual([...db.documents.keys()], ['users/user-a/solutions/generated-1']);
    assert.equal(db.documents.get('users/user-a/solutions/generated-1')?.user_id, 'user-a');
  });

  it('keeps an id the problem already has', async () => {
    const db = new FakeFirestore();
    const store = new FirestoreHistoryStore(db);

    const id = await store.save({ ...problem, id: 'chosen-id' });

    assert.equal(id, 'chosen-id');
    assert.deepEqual([...db.documents.keys()], ['users/user-a/solutions/chosen-id']);
  });

  it('lists newest first with the requested limit', async () => {
    const db = new FakeFirestore();
    db.documents.set('users/user-a/solutions/old', storedProblem('user-a', '2026-02-01T00:00:00.000Z'));
    db.documents.set('users/user-a/solutions/new', storedProblem('user-a', '2026-02-03T00:00:00.000Z'));
    db.documents.set('users/user-a/solutions/mid', storedProblem('user-a', '2026-02-02T00:00:00.000Z'));
    db.documents.set('users/user-b/solutions/other', storedProblem('user-b', '2026-02-04T00:00:00.000Z'));
    const store = new FirestoreHistoryStore(db);

    const records = await store.list('user-a', 2);

    assert.deepEqual(records.map((record) => record.id), ['new', 'mid']);
    assert.deepEqual(db.queries, [
      { path: 'users/user-a/solutions', orderBy: [['created_at', 'desc']], limit: 2 },
    ]);
  });

  it('skips malformed documents in a listing', async () => {
    const db = new FakeFirestore();
    db.documents.set('users/user-a/solutions/good', storedProblem('user-a', '2026-02-01T00:00:00.000Z'));
    db.documents.set('users/user-a/solutions/broken', {
      question: 'no answer here',
      created_at: Timestamp.fromDate(new Date('2026-02-02T00:00:00.000Z')),
    });
    const store = new FirestoreHistoryStore(db);

    const records = await store.list('user-a', 50);

    assert.deepEqual(records.map((record) => record.id), ['good']);
  });

  it('does not find another user\'s record', async () => {
    const db = new FakeFirestore();
    db.documents.set('users/user-b/solutions/theirs', storedProblem('user-b', '2026-02-01T00:00:00.000Z'));
    const store = new FirestoreHistoryStore(db);

    assert.equal(await store.get('user-a', 'theirs'), null);
    assert.equal((await store.get('user-b', 'theirs'))?.userId, 'user-b');
  });

  it('reports a missing record on delete without deleting anything', async () => {
    const db = new FakeFirestore();
    db.documents.set('users/user-b/solutions/theirs', storedProblem('user-b', '2026-02-01T00:00:00.000Z'));
    const store = new FirestoreHistoryStore(db);

    assert.equal(await store.delete('user-a', 'theirs'), false);
    assert.deepEqual(db.deleted, []);
    assert.equal(db.documents.has('users/user-b/solutions/theirs'), true);
  });

  it('deletes a record the user owns', async () => {
    const db = new FakeFirestore();
    db.documents.set('users/user-a/solutions/mine', storedProblem('user-a', '2026-02-01T00:00:00.000Z'));
    const store = new FirestoreHistoryStore(db);

    assert.equal(await store.delete('user-a', 'mine'), true);
    assert.deepEqual(db.deleted, ['users/user-a/solutions/mine']);
    assert.equal(db.documents.size, 0);
  });
});
