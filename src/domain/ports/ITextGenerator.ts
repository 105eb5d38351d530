/**
 * Sampling options passed through to the text model.
 */
export interface TextGenerationOptions {
    temperature?: number;
    /** Fixed seed for reproducible output */
    seed?: number;
    /** Upper bound on generated tokens */
    maxTokens?: number;
}

/**
 * ITextGenerator - Port for a text-generation model.
 * The model is a black box: prompt in, completion out.
 * Implementations: OllamaTextGenerator
 */
export interface ITextGenerator {
    generate(prompt: string, options?: TextGenerationOptions): Promise<string>;
}
