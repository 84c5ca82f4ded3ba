import type { AnalysisMode, AnalysisOutcome } from '../types/index';
import errorHandler, { ErrorCode } from '../utils/errorHandler';
import type { ScopedLogger } from '../utils/logger';
import { parseFrameworkReport } from './analysisContract';
import type { AnalysisProvider } from './geminiService';
import { buildAnalysisPrompt, createSystemInstruction } from './systemPrompt';

export class AnalysisService {
    private readonly provider: AnalysisProvider;
    private readonly mode: AnalysisMode;
    private readonly systemInstruction: string;

    constructor(deps: { provider: AnalysisProvider; mode: AnalysisMode }) {
        this.provider = deps.provider;
        this.mode = deps.mode;
        this.systemInstruction = createSystemInstruction(deps.mode);
    }

    /**
     * Run one generation for `userInput` and shape the result for the current mode.
     * No retries: provider failures propagate as `ProviderError`, contract
     * violations as a `MALFORMED_OUTPUT` AppError.
     */
    async analyze(userInput: string, log?: ScopedLogger): Promise<AnalysisOutcome> {
        const prompt = buildAnalysisPrompt(userInput, this.mode);
        log?.info('Requesting analysis', { mode: this.mode, inputChars: userInput.length });

        const text = await this.provider.generate({
            prompt,
            systemInstruction: this.systemInstruction,
            json: this.mode === 'json',
        });

        if (this.mode === 'markdown') {
            return { mode: 'markdown', analysisText: text };
        }

        const parsed = parseFrameworkReport(text);
        if (!parsed.ok) {
            log?.warn('Provider output violated the report contract', { reason: parsed.reason });
            throw errorHandler.createError(
                ErrorCode.MALFORMED_OUTPUT,
                `Malformed analysis output: ${parsed.reason}`,
                { outputPreview: text.slice(0, 200) }
            );
        }
        return { mode: 'json', analysisData: parsed.report };
    }
}
