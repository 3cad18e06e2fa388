import type OpenAI from 'openai';
import pRetry, { AbortError } from 'p-retry';
import type { MathAnswer, UploadedImage } from '../types';
import { errorMessage, isRateLimitError, UpstreamFailureError } from '../utils/errorHandler';
import { toImageDataUri } from '../utils/imageValidation';
import { parseModelContent, shapeMathAnswer } from '../utils/responseShaper';

export interface MathSolver {
  solve(image: UploadedImage): Promise<MathAnswer>;
}

/**
 * The slice of the OpenAI client the solver calls. An `OpenAI` instance
 * satisfies it; tests pass a plain object.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export interface OpenAIMathSolverOptions {
  model: string;
  maxTokens: number;
  /** Extra attempts after a rate-limited call. 0 disables retrying. */
  maxRetries: number;
  retryMinTimeoutMs?: number;
}

export const SOLVER_SYSTEM_PROMPT = `You are a mathematics tutor helping students solve homework problems.
Read the math problem in the image and solve it.

RESPONSE FORMAT (JSON):
{
  "question": "The problem exactly as written in the image",
  "answer_label": "The option label for multiple-choice problems (A, B, C, 1, 2, ...), otherwise null",
  "answer_value": "The final answer",
  "explanation": "A short explanation of the concepts used",
  "steps": [
    {
      "step_number": 1,
      "description": "What is done in this step",
      "calculation": "The calculation for this step, or null"
    }
  ],
  "confidence": 0.95
}

RULES:
- Steps are in the order they should be performed
- confidence is a number between 0 and 1
- Be thorough but concise. Show all work clearly.`;

export const SOLVER_USER_PROMPT = 'Solve this math problem';

export function buildSolveRequest(
  imageUri: string,
  options: Pick<OpenAIMathSolverOptions, 'model' | 'maxTokens'>,
): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
  return {
    model: options.model,
    messages: [
      {
        role: 'system',
        content: SOLVER_SYSTEM_PROMPT,
      },
      {
        role: 'user',
        content: [
          { type: 'text', text: SOLVER_USER_PROMPT },
          {
            type: 'image_url',
            image_url: {
              url: imageUri,
              detail: 'high',
            },
          },
        ],
      },
    ],
    response_format: { type: 'json_object' },
    max_tokens: options.maxTokens,
  };
}

export class OpenAIMathSolver implements MathSolver {
  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAIMathSolverOptions,
  ) {}

  async solve(image: UploadedImage): Promise<MathAnswer> {
    const request = buildSolveRequest(toImageDataUri(image), this.options);

    let content: string | null;
    try {
      content = await pRetry(
        async () => {
          try {
            const response = await this.client.chat.completions.create(request);
            return response.choices[0]?.message?.content ?? null;
          } catch (error) {
            if (isRateLimitError(error)) {
              console.warn('⚠️ OpenAI rate limit hit');
              throw error;
            }
            throw new AbortError(error instanceof Error ? error : errorMessage(error));
          }
        },
        {
          retries: this.options.maxRetries,
          minTimeout: this.options.retryMinTimeoutMs ?? 2000,
          maxTimeout: 128000,
          factor: 2,
        },
      );
    } catch (error) {
      throw new UpstreamFailureError(`AI service request failed: ${errorMessage(error)}`, { cause: error });
    }

    return shapeMathAnswer(parseModelContent(content));
  }
}

/**
 * Stands in for the OpenAI solver when no API key is configured, so the
 * rest of the API keeps serving.
 */
export class UnconfiguredMathSolver implements MathSolver {
  async solve(): Promise<MathAnswer> {
    throw new UpstreamFailureError('AI service is not configured. Set OPENAI_API_KEY.');
  }
}
