import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { CONTRACT_VERSIONS } from '../services/analysisContract';
import type { AnalysisService } from '../services/analysisService';
import type { AnalysisEnvelope } from '../types/index';
import errorHandler, { ErrorCode } from '../utils/errorHandler';

const analysisRequestSchema = z.object({
  userInput: z.string().optional(),
  userQuery: z.string().optional(),
});

/**
 * Resolve the caller's text; `userInput` takes precedence over its `userQuery` alias.
 * Returns undefined for anything that is not a non-empty string.
 */
export function resolveUserInput(body: unknown): string | undefined {
  const parsed = analysisRequestSchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }
  const text = parsed.data.userInput ?? parsed.data.userQuery;
  return text !== undefined && text.length > 0 ? text : undefined;
}

/**
 * Mounted in place of the analysis pipeline when no API key is configured.
 * Answers before any body parsing, so every request gets the same 500.
 */
export const rejectUnconfiguredRequest = (_req: Request, _res: Response, next: NextFunction) => {
  next(errorHandler.createError(ErrorCode.CONFIGURATION_ERROR, 'GEMINI_API_KEY is not configured'));
};

export function createAnalysisHandler(deps: { service: AnalysisService }) {
  return async function generateAnalysis(req: Request, res: Response, next: NextFunction) {
    try {
      const userInput = resolveUserInput(req.body);
      if (userInput === undefined) {
        throw errorHandler.createError(ErrorCode.MISSING_PARAMETER, 'Request carried no userInput or userQuery text');
      }

      const outcome = await deps.service.analyze(userInput, req.log);

      const body: AnalysisEnvelope =
        outcome.mode === 'markdown'
          ? { success: true, analysisText: outcome.analysisText }
          : { success: true, analysisData: outcome.analysisData };

      res.setHeader('X-Analysis-Contract', CONTRACT_VERSIONS[outcome.mode]);
      res.status(200).json(body);
    } catch (error) {
      next(error);
    }
  };
}
