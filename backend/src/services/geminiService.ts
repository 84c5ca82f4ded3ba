import { ApiError, GoogleGenAI } from '@google/genai';
import { ProviderError } from '../utils/errorHandler';
import logger from '../utils/logger';
import { frameworkAnalysisResponseSchema } from './analysisContract';

export interface GenerationRequest {
    prompt: string;
    systemInstruction: string;
    /** Ask the model for `application/json` output matching the report schema. */
    json: boolean;
}

/**
 * The one egress point of the service: prompt in, text out.
 * Implementations throw `ProviderError` for failures the provider reports.
 */
export interface AnalysisProvider {
    generate(request: GenerationRequest): Promise<string>;
}

export class GeminiAnalysisProvider implements AnalysisProvider {
    private readonly ai: GoogleGenAI;
    private readonly model: string;

    constructor(options: { apiKey: string; model: string }) {
        this.ai = new GoogleGenAI({ apiKey: options.apiKey });
        this.model = options.model;
    }

    async generate({ prompt, systemInstruction, json }: GenerationRequest): Promise<string> {
        const startedAt = Date.now();

        let responseText: string | undefined;
        try {
            const response = await this.ai.models.generateContent({
                model: this.model,
                contents: prompt,
                config: {
                    systemInstruction,
                    ...(json && {
                        responseMimeType: 'application/json',
                        responseSchema: frameworkAnalysisResponseSchema,
                    }),
                },
            });
            responseText = response.text;
        } catch (error) {
            if (error instanceof ApiError) {
                throw new ProviderError(error.message, error.status);
            }
            throw error;
        }

        logger.debug('Gemini generation finished', {
            model: this.model,
            json,
            durationMs: Date.now() - startedAt,
            outputChars: responseText?.length ?? 0,
        });

        if (!responseText) {
            throw new ProviderError('Received an empty response from the AI.');
        }
        return responseText;
    }
}
