/**
 * HeyGen Video Client
 *
 * Implements IVideoGenerationClient using the HeyGen API: the room's stock
 * footage is uploaded and used as the background of a talking-avatar video
 * that narrates the room description.
 */

import axios from 'axios';
import FormData from 'form-data';
import fs from 'fs';
import path from 'path';
import { Description, FootageAsset, GeneratedVideo, RoomSpec, failedVideo, roomSlug } from '../../domain/entities/Room';
import { SubmissionError, VideoTimeoutError, errorMessage } from '../../domain/errors/PipelineErrors';
import { ILogger } from '../../domain/ports/ILogger';
import { IVideoGenerationClient, VideoSubmitOptions } from '../../domain/ports/IVideoGenerationClient';
import { downloadToFile } from '../http/downloadToFile';
import { httpStatusOf, isRetryableHttpError, sleep } from '../http/RetryUtils';

export interface HeyGenVideoOptions {
    baseUrl?: string;
    /** Fixed avatar; otherwise the first one the account lists */
    avatarId?: string;
    /** Fixed voice; otherwise the first one the account lists */
    voiceId?: string;
    width?: number;
    height?: number;
    /** Delay before the first status re-check (default: 5000) */
    pollIntervalMs?: number;
    /** Multiplier applied to the delay after each check; 1 keeps it fixed */
    pollBackoff?: number;
    maxPollIntervalMs?: number;
    /** Polling deadline measured from submission (default: 300000) */
    timeoutMs?: number;
    /** Download the finished render into outputDir */
    downloadRendered?: boolean;
    outputDir?: string;
    /** Per-request timeout for API calls and the footage upload (default: 120000) */
    requestTimeoutMs?: number;
}

export interface HeyGenAvatar {
    avatar_id: string;
    avatar_name?: string;
    gender?: string;
    preview_image_url?: string;
}

export interface HeyGenVoice {
    voice_id: string;
    name?: string;
    language?: string;
    gender?: string;
}

interface HeyGenListResponse<T> {
    data?: {
        avatars?: T[];
        voices?: T[];
        list?: T[];
    };
    avatars?: T[];
    voices?: T[];
}

interface HeyGenStatusResponse {
    data?: {
        status?: string;
        video_url?: string;
        thumbnail_url?: string;
        duration?: number;
        error?: { message?: string; detail?: string } | string | null;
    };
}

/**
 * Terminal outcome of a render job.
 */
export type RenderOutcome =
    | { status: 'completed'; videoUrl: string; durationSeconds?: number }
    | { status: 'failed'; message: string };

export class HeyGenVideoClient implements IVideoGenerationClient {
    private readonly baseUrl: string;
    private readonly apiKey: string;
    private readonly width: number;
    private readonly height: number;
    private readonly pollIntervalMs: number;
    private readonly pollBackoff: number;
    private readonly maxPollIntervalMs: number;
    private readonly timeoutMs: number;
    private readonly downloadRendered: boolean;
    private readonly outputDir: string;
    private readonly requestTimeoutMs: number;
    private avatarId?: string;
    private voiceId?: string;

    constructor(
        apiKey: string,
        options: HeyGenVideoOptions = {},
        private readonly logger: ILogger = console
    ) {
        if (!apiKey) {
            throw new Error('HeyGen API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://api.heygen.com').replace(/\/$/, '');
        this.avatarId = options.avatarId;
        this.voiceId = options.voiceId;
        this.width = options.width ?? 1920;
        this.height = options.height ?? 1080;
        this.pollIntervalMs = options.pollIntervalMs ?? 5000;
        this.pollBackoff = options.pollBackoff ?? 1;
        this.maxPollIntervalMs = options.maxPollIntervalMs ?? 30000;
        this.timeoutMs = options.timeoutMs ?? 300000;
        this.downloadRendered = options.downloadRendered ?? true;
        this.outputDir = options.outputDir ?? 'output';
        this.requestTimeoutMs = options.requestTimeoutMs ?? 120000;
    }

    private get headers() {
        return {
            'Accept': 'application/json',
            'X-Api-Key': this.apiKey,
        };
    }

    async submitAndWait(
        asset: FootageAsset,
        description: Description,
        room: RoomSpec,
        options: VideoSubmitOptions = {}
    ): Promise<GeneratedVideo> {
        if (!description.trim()) {
            throw new SubmissionError('Description is required for video generation');
        }
        try {
            await fs.promises.access(asset.localPath, fs.constants.R_OK);
        } catch (error) {
            throw new SubmissionError(`Footage file not found: ${asset.localPath}`, error);
        }

        const videoId = await this.submit(asset, description);
        this.logger.log(`[HeyGen] Job submitted for ${room.type}. Video ID: ${videoId}. Polling for completion...`);
        options.onSubmitted?.(videoId);

        const outcome = await this.waitForCompletion(videoId);

        if (outcome.status === 'failed') {
            this.logger.error(`[HeyGen] Video ${videoId} failed: ${outcome.message}`);
            return {
                ...failedVideo(room, 'video', { kind: 'Failed', message: outcome.message }),
                videoId,
                description,
            };
        }

        const outputPath = await this.saveRender(outcome.videoUrl, room, options.fileStem ?? roomSlug(room));
        return {
            room,
            status: 'success',
            stage: 'completed',
            outputPath,
            videoUrl: outcome.videoUrl,
            videoId,
            description,
            durationSeconds: outcome.durationSeconds,
        };
    }

    /**
     * Uploads the footage and creates the render job.
     * @returns the HeyGen video id
     */
    async submit(asset: FootageAsset, description: Description): Promise<string> {
        try {
            const { avatarId, voiceId } = await this.resolvePresenter();
            this.logger.log(`[HeyGen] Using avatar ID: ${avatarId} and voice ID: ${voiceId}`);

            const backgroundUrl = await this.uploadFootage(asset.localPath);
            this.logger.log(`[HeyGen] Background video uploaded: ${backgroundUrl}`);

            const response = await axios.post<{ data?: { video_id?: string } }>(
                `${this.baseUrl}/v2/video/generate`,
                {
                    video_inputs: [
                        {
                            character: {
                                type: 'avatar',
                                avatar_id: avatarId,
                                avatar_style: 'normal',
                            },
                            voice: {
                                type: 'text',
                                input_text: description,
                                voice_id: voiceId,
                                speed: 1.0,
                            },
                            background: {
                                type: 'video',
                                url: backgroundUrl,
                            },
                        },
                    ],
                    dimension: { width: this.width, height: this.height },
                },
                { headers: { ...this.headers, 'Content-Type': 'application/json' }, timeout: this.requestTimeoutMs }
            );

            const videoId = response.data.data?.video_id;
            if (!videoId) {
                throw new SubmissionError(`HeyGen did not return a video_id: ${JSON.stringify(response.data)}`);
            }
            return videoId;
        } catch (error) {
            throw this.toSubmissionError(error);
        }
    }

    /**
     * Polls the job status until it is terminal or the deadline passes.
     * Each status request is cut off at the deadline, so a stalled request
     * cannot hold the loop past `timeoutMs`.
     * @throws VideoTimeoutError once `timeoutMs` has elapsed without a terminal state
     */
    async waitForCompletion(videoId: string): Promise<RenderOutcome> {
        const startedAt = Date.now();
        const deadline = startedAt + this.timeoutMs;
        let intervalMs = this.pollIntervalMs;

        for (let attempt = 1; ; attempt++) {
            try {
                const response = await axios.get<HeyGenStatusResponse>(`${this.baseUrl}/v1/video_status.get`, {
                    headers: this.headers,
                    params: { video_id: videoId },
                    timeout: Math.max(1, Math.min(this.requestTimeoutMs, deadline - Date.now())),
                });

                const data = response.data.data ?? {};
                const status = (data.status ?? 'pending').toLowerCase();

                if (status === 'completed') {
                    if (!data.video_url) {
                        return { status: 'failed', message: 'Status completed but video_url is missing' };
                    }
                    this.logger.log(`[HeyGen] Video ${videoId} completed: ${data.video_url}`);
                    return { status: 'completed', videoUrl: data.video_url, durationSeconds: data.duration };
                }

                if (status === 'failed') {
                    return { status: 'failed', message: this.describeError(data.error) };
                }

                this.logger.log(`[HeyGen] Polling attempt ${attempt}: Status = ${status}`);
            } catch (error) {
                if (!isRetryableHttpError(error)) {
                    throw this.toSubmissionError(error);
                }
                this.logger.warn(`[HeyGen] Warning during status check: ${errorMessage(error)}`);
            }

            const remainingMs = deadline - Date.now();
            if (remainingMs <= 0) {
                const elapsedMs = Date.now() - startedAt;
                throw new VideoTimeoutError(
                    `HeyGen video ${videoId} did not finish within ${this.timeoutMs / 1000}s`,
                    videoId,
                    elapsedMs
                );
            }

            await sleep(Math.min(intervalMs, remainingMs));
            intervalMs = Math.min(intervalMs * this.pollBackoff, this.maxPollIntervalMs);
        }
    }

    async listAvatars(): Promise<HeyGenAvatar[]> {
        const response = await axios.get<HeyGenListResponse<HeyGenAvatar>>(`${this.baseUrl}/v2/avatars`, {
            headers: this.headers,
            timeout: this.requestTimeoutMs,
        });
        const body = response.data;
        return firstNonEmpty(body.data?.avatars, body.data?.list, body.avatars);
    }

    async listVoices(): Promise<HeyGenVoice[]> {
        const response = await axios.get<HeyGenListResponse<HeyGenVoice>>(`${this.baseUrl}/v2/voices`, {
            headers: this.headers,
            timeout: this.requestTimeoutMs,
        });
        const body = response.data;
        return firstNonEmpty(body.data?.voices, body.data?.list, body.voices);
    }

    /**
     * Configured avatar and voice, or the first ones available. Cached for later rooms.
     */
    private async resolvePresenter(): Promise<{ avatarId: string; voiceId: string }> {
        if (!this.avatarId) {
            const avatars = await this.listAvatars();
            if (avatars.length === 0) {
                throw new SubmissionError('No HeyGen avatars available for this account');
            }
            this.avatarId = avatars[0].avatar_id;
        }
        if (!this.voiceId) {
            const voices = await this.listVoices();
            if (voices.length === 0) {
                throw new SubmissionError('No HeyGen voices available for this account');
            }
            this.voiceId = voices[0].voice_id;
        }
        return { avatarId: this.avatarId, voiceId: this.voiceId };
    }

    private async uploadFootage(localPath: string): Promise<string> {
        const formData = new FormData();
        formData.append('file', fs.createReadStream(localPath));

        const response = await axios.post<{ data?: { url?: string } }>(`${this.baseUrl}/v2/upload/video`, formData, {
            headers: {
                ...formData.getHeaders(),
                ...this.headers,
            },
            maxContentLength: Infinity,
            maxBodyLength: Infinity,
            timeout: this.requestTimeoutMs,
        });

        const url = response.data.data?.url;
        if (!url) {
            throw new SubmissionError(`HeyGen upload returned no URL for ${localPath}`);
        }
        return url;
    }

    /**
     * Where the finished render ends up: a local file when downloading is on
     * and succeeds, the render URL otherwise.
     */
    private async saveRender(videoUrl: string, room: RoomSpec, fileStem: string): Promise<string> {
        if (!this.downloadRendered) {
            return videoUrl;
        }

        const localPath = path.join(this.outputDir, `${fileStem}.mp4`);
        try {
            await downloadToFile(videoUrl, localPath);
            this.logger.log(`[HeyGen] Render saved to ${localPath}`);
            return localPath;
        } catch (error) {
            this.logger.warn(`[HeyGen] Could not download render for ${room.type}, keeping URL: ${errorMessage(error)}`);
            return videoUrl;
        }
    }

    private describeError(error: { message?: string; detail?: string } | string | null | undefined): string {
        if (!error) return 'Unknown error';
        if (typeof error === 'string') return error;
        return error.message || error.detail || 'Unknown error';
    }

    private toSubmissionError(error: unknown): SubmissionError {
        if (error instanceof SubmissionError) {
            return error;
        }
        if (axios.isAxiosError<{ error?: { message?: string }; message?: string }>(error)) {
            const status = httpStatusOf(error);
            const detail = error.response?.data?.error?.message || error.response?.data?.message || error.message;
            return new SubmissionError(`HeyGen rejected the request${status ? ` (HTTP ${status})` : ''}: ${detail}`, error);
        }
        return new SubmissionError(`HeyGen request failed: ${errorMessage(error)}`, error);
    }
}

function firstNonEmpty<T>(...lists: Array<T[] | undefined>): T[] {
    return lists.find((list): list is T[] => Array.isArray(list) && list.length > 0) ?? [];
}
