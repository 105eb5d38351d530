import {
    DescriptionGenerator,
    buildDescriptionPrompt,
    cleanDescription,
    fallbackDescription,
    truncateAtSentence,
} from '../../../src/application/DescriptionGenerator';
import { GenerationError } from '../../../src/domain/errors/PipelineErrors';
import { ITextGenerator } from '../../../src/domain/ports/ITextGenerator';

describe('DescriptionGenerator', () => {
    const room = { type: 'living room', features: ['spacious', 'modern'] };
    const prompt = buildDescriptionPrompt(room);
    const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
    let textGenerator: jest.Mocked<ITextGenerator>;

    beforeEach(() => {
        textGenerator = { generate: jest.fn() };
    });

    describe('buildDescriptionPrompt', () => {
        it('should list the features in order', () => {
            expect(prompt).toBe(
                'Write a luxurious real estate description for a living room with these features: spacious, modern. ' +
                'The description should be engaging and highlight the best aspects.\n\nDescription:'
            );
        });
    });

    describe('generate()', () => {
        it('should pass the prompt and sampling options to the model', async () => {
            textGenerator.generate.mockResolvedValue('A bright, modern living space with generous proportions.');
            const generator = new DescriptionGenerator(textGenerator, { sampling: { temperature: 0.3, seed: 11 } }, logger);

            const description = await generator.generate(room);

            expect(description).toBe('A bright, modern living space with generous proportions.');
            expect(textGenerator.generate).toHaveBeenCalledWith(prompt, { temperature: 0.3, seed: 11 });
        });

        it('should strip an echoed prompt from the output', async () => {
            textGenerator.generate.mockResolvedValue(`${prompt} A bright, modern living space...`);
            const generator = new DescriptionGenerator(textGenerator, {}, logger);

            await expect(generator.generate(room)).resolves.toBe('A bright, modern living space...');
        });

        it('should throw GenerationError when the cleaned output is empty', async () => {
            textGenerator.generate.mockResolvedValue(`${prompt}\n\n  **  `);
            const generator = new DescriptionGenerator(textGenerator, {}, logger);

            await expect(generator.generate(room)).rejects.toThrow(
                new GenerationError('Model returned an empty description for living room')
            );
        });

        it('should use the template copy when the output is too short', async () => {
            textGenerator.generate.mockResolvedValue('Nice room.');
            const generator = new DescriptionGenerator(textGenerator, { minChars: 20 }, logger);

            await expect(generator.generate(room)).resolves.toBe(fallbackDescription(room));
            expect(logger.warn).toHaveBeenCalledWith(
                '[Description] Output for living room too short (10 chars), using template copy'
            );
        });

        it('should wrap model failures in GenerationError', async () => {
            textGenerator.generate.mockRejectedValue(new Error('CUDA out of memory'));
            const generator = new DescriptionGenerator(textGenerator, {}, logger);

            await expect(generator.generate(room)).rejects.toThrow(
                new GenerationError('Text generation failed for living room: CUDA out of memory')
            );
        });

        it('should pass GenerationError through unchanged', async () => {
            const original = new GenerationError('Model "llama3.2" is not available');
            textGenerator.generate.mockRejectedValue(original);
            const generator = new DescriptionGenerator(textGenerator, {}, logger);

            await expect(generator.generate(room)).rejects.toBe(original);
        });

        it('should reject a room without a type', async () => {
            const generator = new DescriptionGenerator(textGenerator, {}, logger);

            await expect(generator.generate({ type: ' ', features: [] })).rejects.toBeInstanceOf(GenerationError);
            expect(textGenerator.generate).not.toHaveBeenCalled();
        });

        it('should cut long output back to the last full sentence', async () => {
            textGenerator.generate.mockResolvedValue('The lounge glows at dusk. Oak floors run throughout the space. Tall windows frame the view.');
            const generator = new DescriptionGenerator(textGenerator, { maxChars: 70, minChars: 5 }, logger);

            await expect(generator.generate(room)).resolves.toBe('The lounge glows at dusk. Oak floors run throughout the space.');
        });
    });

    describe('cleanDescription', () => {
        it('should drop labels, markdown and wrapping quotes', () => {
            const raw = 'Description: "**Sunlit** and\n\n   airy, with `oak` floors."';

            expect(cleanDescription(raw, '', 600)).toBe('Sunlit and airy, with oak floors.');
        });
    });

    describe('truncateAtSentence', () => {
        it('should leave short text alone', () => {
            expect(truncateAtSentence('Short.', 10)).toBe('Short.');
        });

        it('should fall back to a word boundary without a sentence end', () => {
            expect(truncateAtSentence('one two three four', 10)).toBe('one two');
        });
    });

    describe('fallbackDescription', () => {
        it('should upgrade known feature words', () => {
            expect(fallbackDescription({ type: 'garden', features: ['private', 'landscaped', 'koi pond'] })).toBe(
                'Welcome to this exceptional garden, where secluded, meticulously maintained, koi pond features create an unforgettable living space. ' +
                'This carefully designed area exemplifies luxury living at its finest.'
            );
        });
    });
});
