import { Type, type Schema } from '@google/genai';
import { z } from 'zod';
import type { AnalysisMode, FrameworkAnalysisReport } from '../types/index';

export const CONTRACT_VERSIONS: Record<AnalysisMode, string> = {
    markdown: 'markdown/v1',
    json: 'framework-analysis/v1',
};

const insightSectionSchema = z.object({
    title: z.string(),
    points: z.array(z.string()),
});

export const frameworkAnalysisReportSchema: z.ZodType<FrameworkAnalysisReport> = z.object({
    title: z.string(),
    summary: z.string(),
    frameworks: z
        .array(
            z.object({
                name: z.string(),
                rationale: z.string(),
                decision: z.string(),
                insights: z.array(insightSectionSchema),
            })
        )
        .min(1),
});

// Sent with JSON-mode requests so the model emits the same shape the zod schema accepts
export const frameworkAnalysisResponseSchema: Schema = {
    type: Type.OBJECT,
    properties: {
        title: {
            type: Type.STRING,
            description: 'A short headline naming the decision being analysed.',
        },
        summary: {
            type: Type.STRING,
            description: 'Two or three sentences summarising the recommended course of action.',
        },
        frameworks: {
            type: Type.ARRAY,
            minItems: '1',
            items: {
                type: Type.OBJECT,
                properties: {
                    name: { type: Type.STRING },
                    rationale: {
                        type: Type.STRING,
                        description: 'Why this framework fits the problem.',
                    },
                    decision: {
                        type: Type.STRING,
                        description: 'The decision or action this framework points to.',
                    },
                    insights: {
                        type: Type.ARRAY,
                        items: {
                            type: Type.OBJECT,
                            properties: {
                                title: { type: Type.STRING },
                                points: {
                                    type: Type.ARRAY,
                                    items: { type: Type.STRING },
                                },
                            },
                            required: ['title', 'points'],
                        },
                    },
                },
                required: ['name', 'rationale', 'decision', 'insights'],
            },
        },
    },
    required: ['title', 'summary', 'frameworks'],
};

export type ReportParseResult =
    | { ok: true; report: FrameworkAnalysisReport }
    | { ok: false; reason: string };

/**
 * Parse provider text into a report. Syntax errors and shape mismatches are
 * both contract violations.
 */
export function parseFrameworkReport(text: string): ReportParseResult {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    const result = frameworkAnalysisReportSchema.safeParse(raw);
    if (!result.success) {
        return { ok: false, reason: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') };
    }
    return { ok: true, report: result.data };
}
