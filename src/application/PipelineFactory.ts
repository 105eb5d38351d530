/**
 * Pipeline Factory
 *
 * Wires the production clients from a loaded Config. Each client receives
 * only the credential and settings it needs.
 */

import { Config } from '../config';
import { ILogger } from '../domain/ports/ILogger';
import { PexelsFootageClient } from '../infrastructure/footage/PexelsFootageClient';
import { OllamaTextGenerator } from '../infrastructure/llm/OllamaTextGenerator';
import { HeyGenVideoClient } from '../infrastructure/video/HeyGenVideoClient';
import { DescriptionGenerator } from './DescriptionGenerator';
import { PipelineOptions, RealEstatePipeline } from './RealEstatePipeline';

export function createPipeline(
    config: Config,
    logger: ILogger = console,
    hooks: Pick<PipelineOptions, 'onProgress' | 'onStageChange'> = {}
): RealEstatePipeline {
    const footageClient = new PexelsFootageClient(
        config.pexelsApiKey,
        {
            baseUrl: config.footage.baseUrl,
            downloadsDir: config.footage.downloadsDir,
            perPage: config.footage.perPage,
            orientation: config.footage.orientation,
            selection: config.footage.selection,
            maxAttempts: config.footage.maxAttempts,
            retryBackoffMs: config.footage.retryBackoffMs,
            requestTimeoutMs: config.footage.requestTimeoutMs,
        },
        logger
    );

    const textGenerator = new OllamaTextGenerator(
        config.llm.serverUrl,
        config.llm.model,
        config.llm.requestTimeoutMs,
        logger
    );

    const descriptionGenerator = new DescriptionGenerator(
        textGenerator,
        {
            sampling: {
                temperature: config.llm.temperature,
                seed: config.llm.seed,
                maxTokens: config.llm.maxTokens,
            },
            maxChars: config.description.maxChars,
            minChars: config.description.minChars,
        },
        logger
    );

    const videoClient = new HeyGenVideoClient(
        config.heygenApiKey,
        {
            baseUrl: config.video.baseUrl,
            avatarId: config.video.avatarId,
            voiceId: config.video.voiceId,
            width: config.video.width,
            height: config.video.height,
            pollIntervalMs: config.video.pollIntervalMs,
            pollBackoff: config.video.pollBackoff,
            maxPollIntervalMs: config.video.maxPollIntervalMs,
            timeoutMs: config.video.timeoutMs,
            downloadRendered: config.video.downloadRendered,
            outputDir: config.video.outputDir,
            requestTimeoutMs: config.video.requestTimeoutMs,
        },
        logger
    );

    return new RealEstatePipeline(
        { footageClient, descriptionGenerator, videoClient },
        {
            searchPrefix: config.footage.searchPrefix,
            parallelism: config.pipeline.parallelism,
            logger,
            ...hooks,
        }
    );
}
