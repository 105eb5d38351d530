import { Description, RoomSpec } from '../domain/entities/Room';
import { GenerationError, errorMessage } from '../domain/errors/PipelineErrors';
import { IDescriptionGenerator } from '../domain/ports/IDescriptionGenerator';
import { ILogger } from '../domain/ports/ILogger';
import { ITextGenerator, TextGenerationOptions } from '../domain/ports/ITextGenerator';

export interface DescriptionGeneratorOptions {
    /** Sampling passed to the model; set `seed` for reproducible copy */
    sampling?: TextGenerationOptions;
    /** Cleaned copy is cut back to this many characters (default: 600) */
    maxChars?: number;
    /** Shorter, non-empty copy is replaced with the template (default: 20) */
    minChars?: number;
}

/** Upgrades applied to feature words in the template copy. */
const FEATURE_UPGRADES: Record<string, string> = {
    spacious: 'expansive',
    modern: 'contemporary',
    bright: 'sun-filled',
    private: 'secluded',
    peaceful: 'tranquil',
    landscaped: 'meticulously maintained',
};

export function buildDescriptionPrompt(room: RoomSpec): string {
    return `Write a luxurious real estate description for a ${room.type} with these features: ${room.features.join(', ')}. The description should be engaging and highlight the best aspects.\n\nDescription:`;
}

/**
 * Cuts text to at most `maxChars`, preferring the last full sentence,
 * then the last whole word.
 */
export function truncateAtSentence(text: string, maxChars: number): string {
    if (text.length <= maxChars) {
        return text;
    }

    const cut = text.slice(0, maxChars);
    let sentenceEnd = -1;
    for (const match of cut.matchAll(/[.!?](?=\s|$)/g)) {
        sentenceEnd = match.index ?? sentenceEnd;
    }
    if (sentenceEnd >= 0) {
        return cut.slice(0, sentenceEnd + 1);
    }

    const lastSpace = cut.lastIndexOf(' ');
    return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim();
}

/**
 * Turns raw model output into narration-ready copy: drops the echoed prompt,
 * the "Description:" label, markdown and wrapping quotes, and collapses whitespace.
 */
export function cleanDescription(raw: string, prompt: string, maxChars: number): string {
    const withoutPrompt = prompt ? raw.split(prompt).join(' ') : raw;

    const text = withoutPrompt
        .replace(/[*`#]+/g, '')
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/^(description\s*:\s*)+/i, '')
        .replace(/^["'“”]+|["'“”]+$/g, '')
        .trim();

    return truncateAtSentence(text, maxChars);
}

/**
 * Template copy used when the model returns something too short to narrate.
 */
export function fallbackDescription(room: RoomSpec): string {
    const features = room.features.map(feature => FEATURE_UPGRADES[feature.toLowerCase()] ?? feature);
    return `Welcome to this exceptional ${room.type}, where ${features.join(', ')} features create an unforgettable living space. This carefully designed area exemplifies luxury living at its finest.`;
}

/**
 * Writes a short marketing description for a room with a text model.
 */
export class DescriptionGenerator implements IDescriptionGenerator {
    private readonly sampling: TextGenerationOptions;
    private readonly maxChars: number;
    private readonly minChars: number;

    constructor(
        private readonly textGenerator: ITextGenerator,
        options: DescriptionGeneratorOptions = {},
        private readonly logger: ILogger = console
    ) {
        this.sampling = options.sampling ?? {};
        this.maxChars = options.maxChars ?? 600;
        this.minChars = options.minChars ?? 20;
    }

    async generate(room: RoomSpec): Promise<Description> {
        if (!room.type.trim()) {
            throw new GenerationError('Room type is required to generate a description');
        }

        const prompt = buildDescriptionPrompt(room);

        let raw: string;
        try {
            raw = await this.textGenerator.generate(prompt, this.sampling);
        } catch (error) {
            if (error instanceof GenerationError) {
                throw error;
            }
            throw new GenerationError(`Text generation failed for ${room.type}: ${errorMessage(error)}`, error);
        }

        const description = cleanDescription(raw, prompt, this.maxChars);
        if (!description) {
            throw new GenerationError(`Model returned an empty description for ${room.type}`);
        }

        if (description.length < this.minChars) {
            this.logger.warn(`[Description] Output for ${room.type} too short (${description.length} chars), using template copy`);
            return fallbackDescription(room);
        }

        this.logger.log(`[Description] Generated description for ${room.type} (${description.length} chars)`);
        return description;
    }
}
