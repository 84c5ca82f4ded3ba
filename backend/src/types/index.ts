// Shared types between the analysis API and the browser client

export type AnalysisMode = 'markdown' | 'json';

export interface AnalysisRequestBody {
    userInput?: string;
    /** Accepted alias for `userInput`. */
    userQuery?: string;
}

export interface InsightSection {
    title: string;
    points: string[];
}

export interface FrameworkAnalysis {
    name: string;
    rationale: string;
    decision: string;
    insights: InsightSection[];
}

export interface FrameworkAnalysisReport {
    title: string;
    summary: string;
    frameworks: FrameworkAnalysis[];
}

export type AnalysisOutcome =
    | { mode: 'markdown'; analysisText: string }
    | { mode: 'json'; analysisData: FrameworkAnalysisReport };

export interface MarkdownSuccessEnvelope {
    success: true;
    analysisText: string;
}

export interface StructuredSuccessEnvelope {
    success: true;
    analysisData: FrameworkAnalysisReport;
}

export interface ErrorEnvelope {
    success: false;
    error: string;
}

export type AnalysisEnvelope = MarkdownSuccessEnvelope | StructuredSuccessEnvelope | ErrorEnvelope;
