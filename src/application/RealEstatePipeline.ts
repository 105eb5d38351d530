/**
 * Real Estate Pipeline
 *
 * Turns a list of rooms into one narrated walkthrough video per room:
 * stock footage -> marketing description -> avatar video.
 * A failure in one room is recorded on that room's result and never stops the run.
 */

import { v4 as uuidv4 } from 'uuid';
import {
    Description,
    GeneratedVideo,
    PipelineStage,
    RoomSpec,
    RoomStage,
    buildSearchQuery,
    failedVideo,
    freezeRoom,
    roomFileStem,
} from '../domain/entities/Room';
import { errorMessage, toFailureReason } from '../domain/errors/PipelineErrors';
import { IDescriptionGenerator } from '../domain/ports/IDescriptionGenerator';
import { ILogger } from '../domain/ports/ILogger';
import { IStockFootageClient } from '../domain/ports/IStockFootageClient';
import { IVideoGenerationClient } from '../domain/ports/IVideoGenerationClient';

export interface PipelineDependencies {
    footageClient: IStockFootageClient;
    descriptionGenerator: IDescriptionGenerator;
    videoClient: IVideoGenerationClient;
}

export interface PipelineOptions {
    /** Prefix for footage search queries (default: 'luxury') */
    searchPrefix?: string;
    /** Rooms processed at once (default: 1) */
    parallelism?: number;
    /** Called once per room as soon as its result is known */
    onProgress?: (completed: number, total: number, result: GeneratedVideo) => void;
    /** Called on every per-room state transition */
    onStageChange?: (room: RoomSpec, stage: RoomStage) => void;
    logger?: ILogger;
}

/**
 * Caps how many rooms are between their footage fetch and their final
 * result at once. Waiting rooms are let in first come, first served.
 */
class Semaphore {
    private free: number;
    private readonly queue: Array<() => void> = [];

    constructor(size: number) {
        this.free = size;
    }

    async use<T>(task: () => Promise<T>): Promise<T> {
        if (this.free > 0) {
            this.free--;
        } else {
            await new Promise<void>(resolve => this.queue.push(resolve));
        }
        try {
            return await task();
        } finally {
            const next = this.queue.shift();
            if (next) next();
            else this.free++;
        }
    }
}

export class RealEstatePipeline {
    private readonly searchPrefix: string;
    private readonly parallelism: number;
    private readonly logger: ILogger;

    constructor(
        private readonly deps: PipelineDependencies,
        private readonly options: PipelineOptions = {}
    ) {
        this.searchPrefix = options.searchPrefix ?? 'luxury';
        this.parallelism = Math.max(1, Math.floor(options.parallelism ?? 1));
        this.logger = options.logger ?? console;
    }

    /**
     * Processes every room and returns one result per room, in input order.
     */
    async run(rooms: readonly RoomSpec[]): Promise<GeneratedVideo[]> {
        const runId = uuidv4();
        const total = rooms.length;
        let completed = 0;

        this.logger.log(`[Pipeline ${runId}] Processing ${total} room(s) with parallelism ${this.parallelism}`);

        const finish = (result: GeneratedVideo): GeneratedVideo => {
            completed++;
            this.notify('onProgress', () => this.options.onProgress?.(completed, total, result));
            return result;
        };

        let results: GeneratedVideo[];
        if (this.parallelism === 1) {
            results = [];
            for (const [index, room] of rooms.entries()) {
                results.push(finish(await this.processRoom(room, index)));
            }
        } else {
            const semaphore = new Semaphore(this.parallelism);
            results = await Promise.all(rooms.map((room, index) =>
                semaphore.use(async () => finish(await this.processRoom(room, index)))
            ));
        }

        const successCount = results.filter(result => result.status === 'success').length;
        this.logger.log(`[Pipeline ${runId}] Done: ${successCount}/${total} room(s) succeeded`);
        return results;
    }

    /**
     * Runs one room through footage, description and video.
     * `index` is the room's position in the run; its files are named after it
     * so rooms sharing a type never overwrite each other.
     * Never throws: any stage error becomes a failed result for this room.
     */
    async processRoom(input: RoomSpec, index: number = 0): Promise<GeneratedVideo> {
        const room = freezeRoom(input);
        const fileStem = roomFileStem(room, index);
        let stage: PipelineStage = 'footage';
        let description: Description | undefined;

        this.transition(room, 'pending');

        try {
            this.logger.log(`[Pipeline] Searching footage for ${room.type}...`);
            const query = buildSearchQuery(room, this.searchPrefix);
            const asset = await this.deps.footageClient.fetch(query, { fileStem });
            this.transition(room, 'footage_fetched');

            stage = 'description';
            this.logger.log(`[Pipeline] Generating description for ${room.type}...`);
            description = await this.deps.descriptionGenerator.generate(room);
            this.transition(room, 'description_ready');

            stage = 'video';
            this.logger.log(`[Pipeline] Creating video for ${room.type}...`);
            const result = await this.deps.videoClient.submitAndWait(asset, description, room, {
                fileStem,
                onSubmitted: () => this.transition(room, 'submitted'),
            });

            if (result.status === 'success') {
                this.transition(room, 'completed');
                this.logger.log(`[Pipeline] ${room.type} done: ${result.outputPath ?? result.videoUrl}`);
                return { ...result, room, stage: 'completed' };
            }

            this.transition(room, 'failed');
            this.logger.error(`[Pipeline] ${room.type} failed at ${stage} stage: ${result.reason?.kind ?? 'Failed'}: ${result.reason?.message ?? 'video service reported failure'}`);
            return { ...result, room, stage: 'failed', failedAt: 'video' };
        } catch (error) {
            const reason = toFailureReason(error);
            this.logger.error(`[Pipeline] ${room.type} failed at ${stage} stage: ${reason.kind}: ${reason.message}`);
            this.transition(room, 'failed');
            return { ...failedVideo(room, stage, reason), description };
        }
    }

    private transition(room: RoomSpec, stage: RoomStage): void {
        this.notify('onStageChange', () => this.options.onStageChange?.(room, stage));
    }

    /**
     * Runs a caller hook; a throwing hook is logged and does not affect the run.
     */
    private notify(hook: 'onProgress' | 'onStageChange', call: () => void): void {
        try {
            call();
        } catch (error) {
            this.logger.warn(`[Pipeline] ${hook} hook failed: ${errorMessage(error)}`);
        }
    }
}
