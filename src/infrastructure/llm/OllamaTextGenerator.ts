import axios from 'axios';
import { GenerationError, errorMessage } from '../../domain/errors/PipelineErrors';
import { ITextGenerator, TextGenerationOptions } from '../../domain/ports/ITextGenerator';
import { ILogger } from '../../domain/ports/ILogger';

interface OllamaGenerateResponse {
    response?: string;
    done?: boolean;
}

/**
 * Text generator backed by a local Ollama-compatible server.
 */
export class OllamaTextGenerator implements ITextGenerator {
    private readonly serverUrl: string;

    constructor(
        serverUrl: string,
        private readonly model: string = 'llama3.2',
        private readonly timeoutMs: number = 120000,
        private readonly logger: ILogger = console
    ) {
        if (!serverUrl) {
            throw new Error('Local LLM server URL is required');
        }
        this.serverUrl = serverUrl.replace(/\/$/, '');
    }

    async generate(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
        const sampling: Record<string, number> = {};
        if (options.temperature !== undefined) sampling.temperature = options.temperature;
        if (options.seed !== undefined) sampling.seed = options.seed;
        if (options.maxTokens !== undefined) sampling.num_predict = options.maxTokens;

        try {
            const response = await axios.post<OllamaGenerateResponse>(
                `${this.serverUrl}/api/generate`,
                {
                    model: this.model,
                    prompt,
                    stream: false,
                    options: sampling,
                },
                {
                    headers: { 'Content-Type': 'application/json' },
                    timeout: this.timeoutMs,
                }
            );

            return response.data.response ?? '';
        } catch (error) {
            if (axios.isAxiosError(error)) {
                if (error.response?.status === 404) {
                    throw new GenerationError(`Model "${this.model}" is not available on ${this.serverUrl}`, error);
                }
                if (!error.response) {
                    this.logger.error(`[LocalLLM] Cannot reach ${this.serverUrl}: ${error.message}`);
                    throw new GenerationError(`Local text model unreachable at ${this.serverUrl}: ${error.message}`, error);
                }
                throw new GenerationError(`Local text model request failed (HTTP ${error.response.status})`, error);
            }
            throw new GenerationError(`Local text model request failed: ${errorMessage(error)}`, error);
        }
    }
}
