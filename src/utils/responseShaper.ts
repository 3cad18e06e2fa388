import { z } from 'zod';
import type { MathAnswer, SolutionStep } from '../types';
import { UpstreamFailureError } from './errorHandler';

export const DEFAULT_QUESTION = 'Math problem from uploaded image';

const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => {
    if (value === undefined || value === null) {
      return null;
    }
    const text = String(value).trim();
    return text.length > 0 ? text : null;
  });

const requiredText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'must not be empty'));

const stepSchema = z.object({
  step_number: z.union([z.number(), z.string()]).nullish(),
  description: requiredText,
  calculation: optionalText,
});

const answerSchema = z.object({
  question: optionalText,
  answer_label: optionalText,
  answer_value: requiredText,
  explanation: optionalText,
  steps: z.array(stepSchema).min(1, 'at least one step is required'),
  confidence: z.union([z.number(), z.string()]).nullish(),
});

function toStepNumber(value: number | string | null | undefined, index: number): number {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0) {
    return parsed;
  }
  return index + 1;
}

/**
 * Models occasionally report confidence as a percentage, so values in
 * (1, 100] are scaled down before clamping.
 */
export function normalizeConfidence(value: number | string | null | undefined): number {
  const parsed = typeof value === 'string' ? Number.parseFloat(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    return 0;
  }
  const scaled = parsed > 1 && parsed <= 100 ? parsed / 100 : parsed;
  return Math.min(1, Math.max(0, scaled));
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'response';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Parses the text content of a model reply. Tolerates a JSON object wrapped
 * in a markdown code fence.
 */
export function parseModelContent(content: string | null | undefined): unknown {
  const trimmed = content?.trim() ?? '';
  if (!trimmed) {
    throw new UpstreamFailureError('AI service returned an empty response');
  }

  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const jsonText = fenced ? fenced[1] : trimmed;

  try {
    return JSON.parse(jsonText);
  } catch (error) {
    throw new UpstreamFailureError('AI service returned invalid JSON', { cause: error });
  }
}

/**
 * Maps a parsed model reply onto `MathAnswer`. Optional fields fall back to
 * defaults; a missing answer value or step list rejects the whole reply.
 * Steps keep the order the model returned them in.
 */
export function shapeMathAnswer(raw: unknown): MathAnswer {
  const result = answerSchema.safeParse(raw);
  if (!result.success) {
    throw new UpstreamFailureError(`AI response did not match the answer schema (${formatIssues(result.error.issues)})`);
  }

  const data = result.data;
  const steps: SolutionStep[] = data.steps.map((step, index) => ({
    step_number: toStepNumber(step.step_number, index),
    description: step.description,
    calculation: step.calculation,
  }));

  return {
    question: data.question ?? DEFAULT_QUESTION,
    answer_label: data.answer_label,
    answer_value: data.answer_value,
    explanation: data.explanation ?? '',
    steps,
    confidence: normalizeConfidence(data.confidence),
  };
}
