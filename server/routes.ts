import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import multer from 'multer';
import { DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT } from '../src/services/historyStore';
import type { MathSolvingService } from '../src/services/mathSolving';
import type { DeleteResponseBody, HistoryResponseBody, UploadedImage } from '../src/types';
import { errorMessage, InvalidInputError, NotFoundError } from '../src/utils/errorHandler';
import { toHistoryItem, toSolveResponse } from '../src/utils/formatters';
import { MAX_UPLOAD_BYTES } from '../src/utils/imageValidation';
import { currentUser, requireAuth, type AuthGateway } from './auth';

export const UPLOAD_FIELD = 'file';

/**
 * Express 4 does not forward rejected promises from handlers, so every
 * async route goes through this.
 */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function parseHistoryLimit(raw: unknown): number {
  if (raw === undefined || raw === '') {
    return DEFAULT_HISTORY_LIMIT;
  }
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    throw new InvalidInputError(`limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`);
  }
  const limit = Number(raw);
  if (limit < 1 || limit > MAX_HISTORY_LIMIT) {
    throw new InvalidInputError(`limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`);
  }
  return limit;
}

/** Ids that could not name a document under the caller's path are simply not found. */
function requireProblemId(raw: string): string {
  if (!/^[A-Za-z0-9_-]{1,128}$/.test(raw)) {
    throw new NotFoundError();
  }
  return raw;
}

/**
 * Limit errors keep their own messages in the app's error handler. Anything
 * else the multipart parser reports (no boundary, truncated body) is a bad
 * upload rather than a server fault.
 */
function parseUpload(upload: RequestHandler): RequestHandler {
  return (req, res, next) => {
    upload(req, res, (error?: unknown) => {
      if (!error) {
        next();
        return;
      }
      if (error instanceof multer.MulterError) {
        next(error);
        return;
      }
      next(new InvalidInputError(`Invalid upload: ${errorMessage(error)}`, { cause: error }));
    });
  };
}

function toUploadedImage(file: Express.Multer.File | undefined): UploadedImage | undefined {
  if (!file) {
    return undefined;
  }
  return {
    buffer: file.buffer,
    fileName: file.originalname,
    contentType: file.mimetype,
    size: file.size,
  };
}

export interface ApiRouterDeps {
  service: MathSolvingService;
  authGateway: AuthGateway;
}

export function createApiRouter({ service, authGateway }: ApiRouterDeps): Router {
  const router = Router();
  const authenticate = requireAuth(authGateway);
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 },
  });

  // Authentication runs before the body is parsed so anonymous uploads are never read.
  router.post(
    '/solve',
    authenticate,
    parseUpload(upload.single(UPLOAD_FIELD)),
    route(async (req, res) => {
      const problem = await service.solveProblem(currentUser(res), toUploadedImage(req.file));
      res.json(toSolveResponse(problem));
    }),
  );

  router.get(
    '/history',
    authenticate,
    route(async (req, res) => {
      const user = currentUser(res);
      const limit = parseHistoryLimit(req.query.limit);
      const records = await service.listHistory(user, limit);
      const body: HistoryResponseBody = {
        history: records.map(toHistoryItem),
        user_id: user.uid,
        total_problems: records.length,
      };
      res.json(body);
    }),
  );

  router.get(
    '/history/:problemId',
    authenticate,
    route(async (req, res) => {
      const record = await service.getProblem(currentUser(res), requireProblemId(req.params.problemId));
      res.json(toHistoryItem(record));
    }),
  );

  router.delete(
    '/history/:problemId',
    authenticate,
    route(async (req, res) => {
      const user = currentUser(res);
      const problemId = requireProblemId(req.params.problemId);
      await service.deleteProblem(user, problemId);
      const body: DeleteResponseBody = {
        message: 'Problem deleted successfully',
        problem_id: problemId,
        user_id: user.uid,
      };
      res.json(body);
    }),
  );

  return router;
}
