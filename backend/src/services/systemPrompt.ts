import type { AnalysisMode } from '../types/index';

const PERSONA =
    'You are a Decision Intelligence and Action Designer. ' +
    'Your goal is to provide a concise, structured, and professional analysis of problems using structured problem solving and decision making frameworks ' +
    'based on the provided user input and collected data.';

const MARKDOWN_FORMAT =
    'Structure your response with clear headings (e.g., Summary, Key Findings, Recommendations). ' +
    'The entire output must be formatted using Markdown for clean rendering.';

const JSON_FORMAT =
    'Select the decision making frameworks that best fit the problem (for example SWOT, Cynefin, Eisenhower Matrix, Pareto Analysis, Decision Matrix). ' +
    'For each framework give its name, why it applies (rationale), the decision it points to, and titled insight sections made of short bullet points. ' +
    'Return ONLY a valid JSON object with the keys "title", "summary" and "frameworks". No markdown. No extra text.';

const CLOSING_DIRECTIVE: Record<AnalysisMode, string> = {
    markdown: 'Provide a professional report formatted strictly in Markdown.',
    json: 'Respond with a single JSON object that matches the required schema.',
};

export function createSystemInstruction(mode: AnalysisMode): string {
    return `${PERSONA} ${mode === 'json' ? JSON_FORMAT : MARKDOWN_FORMAT}`;
}

/**
 * Wrap the caller's text in the delimited report template sent as the user turn.
 */
export function buildAnalysisPrompt(userInput: string, mode: AnalysisMode): string {
    return (
        'Please generate a logical report based on the following consolidated data:\n\n' +
        '--- CONSOLIDATED USER DATA ---\n' +
        `${userInput}\n` +
        '--- END OF DATA ---\n' +
        CLOSING_DIRECTIVE[mode]
    );
}
