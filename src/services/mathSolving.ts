import type { AuthUser, HistoryRecord, MathAnswer, MathProblem, UploadedImage } from '../types';
import { errorMessage, NotFoundError, UpstreamFailureError } from '../utils/errorHandler';
import { sanitizeFileName } from '../utils/formatters';
import { validateImageUpload } from '../utils/imageValidation';
import type { HistoryStore } from './historyStore';
import type { MathSolver } from './openai';

/**
 * Solve, list, fetch and delete operations behind the HTTP routes. Callers
 * are already authenticated; every history access is scoped to `user.uid`.
 */
export class MathSolvingService {
  constructor(
    private readonly solver: MathSolver,
    private readonly history: HistoryStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async solveProblem(user: AuthUser, upload: UploadedImage | undefined): Promise<MathProblem> {
    const image = validateImageUpload(upload);
    console.log(`🎯 Solving problem for user ${user.uid} (${image.contentType}, ${image.size} bytes)`);

    const startedAt = Date.now();
    let answer: MathAnswer;
    try {
      answer = await this.solver.solve(image);
    } catch (error) {
      console.error(`❌ Solving failed for user ${user.uid}:`, errorMessage(error));
      throw new UpstreamFailureError(`Solving failed: ${errorMessage(error)}`, { cause: error });
    }
    console.log(`⏱️ Solved in ${Date.now() - startedAt}ms (confidence ${answer.confidence})`);

    const problem: MathProblem = {
      id: null,
      userId: user.uid,
      question: answer.question,
      answer,
      fileName: sanitizeFileName(image.fileName),
      contentType: image.contentType,
      createdAt: this.now(),
    };

    // The answer is already computed; a failed write only costs the history entry.
    try {
      problem.id = await this.history.save(problem);
      console.log(`✅ Problem saved to history with ID: ${problem.id}`);
    } catch (error) {
      console.warn(`⚠️ Failed to save problem to history: ${errorMessage(error)}`);
    }

    return problem;
  }

  async listHistory(user: AuthUser, limit: number): Promise<HistoryRecord[]> {
    try {
      return await this.history.list(user.uid, limit);
    } catch (error) {
      console.error(`❌ Failed to retrieve history for user ${user.uid}:`, errorMessage(error));
      throw new UpstreamFailureError(`Failed to retrieve history: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getProblem(user: AuthUser, problemId: string): Promise<HistoryRecord> {
    let record: HistoryRecord | null;
    try {
      record = await this.history.get(user.uid, problemId);
    } catch (error) {
      console.error(`❌ Failed to fetch problem ${problemId}:`, errorMessage(error));
      throw new UpstreamFailureError(`Failed to retrieve problem: ${errorMessage(error)}`, { cause: error });
    }
    if (!record) {
      throw new NotFoundError();
    }
    return record;
  }

  async deleteProblem(user: AuthUser, problemId: string): Promise<void> {
    let deleted: boolean;
    try {
      deleted = await this.history.delete(user.uid, problemId);
    } catch (error) {
      console.error(`❌ Failed to delete problem ${problemId}:`, errorMessage(error));
      throw new UpstreamFailureError(`Failed to delete problem: ${errorMessage(error)}`, { cause: error });
    }
    if (!deleted) {
      throw new NotFoundError();
    }
    console.log(`🗑️ Problem ${problemId} deleted for user ${user.uid}`);
  }
}
