import axios from 'axios';
import path from 'path';
import { FootageAsset } from '../../domain/entities/Room';
import { DownloadError, errorMessage } from '../../domain/errors/PipelineErrors';
import { FootageFetchOptions, IStockFootageClient } from '../../domain/ports/IStockFootageClient';
import { ILogger } from '../../domain/ports/ILogger';
import { FootageSelection } from '../../config';
import { downloadToFile } from '../http/downloadToFile';
import { httpStatusOf, isRetryableHttpError, withRetry } from '../http/RetryUtils';

export interface PexelsVideoFile {
    id: number;
    quality?: string | null;
    file_type?: string;
    width: number | null;
    height: number | null;
    link: string;
}

export interface PexelsVideo {
    id: number;
    url: string;
    duration: number;
    width: number;
    height: number;
    video_files: PexelsVideoFile[];
}

interface PexelsSearchResponse {
    videos?: PexelsVideo[];
    total_results?: number;
}

export interface PexelsFootageOptions {
    downloadsDir: string;
    baseUrl?: string;
    perPage?: number;
    orientation?: string;
    selection?: FootageSelection;
    /** Attempts per fetch; 1 disables the retry */
    maxAttempts?: number;
    retryBackoffMs?: number;
    /** Timeout for the search request (default: 30000) */
    requestTimeoutMs?: number;
    /** Source of randomness for the 'random' selection policy */
    random?: () => number;
}

/**
 * Pexels Footage Client
 * Searches Pexels Videos for a keyword and downloads the best-quality file of
 * the selected clip into the downloads directory.
 */
export class PexelsFootageClient implements IStockFootageClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly downloadsDir: string;
    private readonly perPage: number;
    private readonly orientation: string;
    private readonly selection: FootageSelection;
    private readonly maxAttempts: number;
    private readonly retryBackoffMs: number;
    private readonly requestTimeoutMs: number;
    private readonly random: () => number;

    constructor(
        apiKey: string,
        options: PexelsFootageOptions,
        private readonly logger: ILogger = console
    ) {
        if (!apiKey) {
            throw new Error('Pexels API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://api.pexels.com/videos').replace(/\/$/, '');
        this.downloadsDir = options.downloadsDir;
        this.perPage = options.perPage ?? 1;
        this.orientation = options.orientation ?? 'landscape';
        this.selection = options.selection ?? 'first';
        this.maxAttempts = options.maxAttempts ?? 2;
        this.retryBackoffMs = options.retryBackoffMs ?? 1000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
        this.random = options.random ?? Math.random;
    }

    async fetch(query: string, options: FootageFetchOptions = {}): Promise<FootageAsset> {
        const trimmedQuery = query.trim();
        if (!trimmedQuery) {
            throw new DownloadError('Footage search query must not be empty');
        }

        const fileStem = options.fileStem ?? this.slugify(trimmedQuery);
        const localPath = path.join(this.downloadsDir, `${fileStem}.mp4`);

        return withRetry(
            () => this.searchAndDownload(trimmedQuery, localPath),
            {
                maxAttempts: this.maxAttempts,
                initialBackoffMs: this.retryBackoffMs,
                isRetryable: isRetryableHttpError,
                onRetry: (attempt, error, delay) => {
                    this.logger.warn(`[Pexels] Attempt ${attempt} for "${trimmedQuery}" failed (${errorMessage(error)}), retrying in ${Math.round(delay)}ms`);
                },
            }
        ).catch((error: unknown) => {
            if (error instanceof DownloadError) {
                throw error;
            }
            const status = httpStatusOf(error);
            const detail = status ? `HTTP ${status}` : errorMessage(error);
            this.logger.error(`[Pexels] Fetch failed for "${trimmedQuery}": ${detail}`);
            throw new DownloadError(`Footage fetch failed for "${trimmedQuery}": ${detail}`, error);
        });
    }

    /**
     * Searches for clips matching the query.
     */
    async search(query: string): Promise<PexelsVideo[]> {
        this.logger.log(`[Pexels] Searching for: "${query}"`);

        const response = await axios.get<PexelsSearchResponse>(`${this.baseUrl}/search`, {
            headers: { Authorization: this.apiKey },
            params: {
                query,
                per_page: this.perPage,
                orientation: this.orientation,
            },
            timeout: this.requestTimeoutMs,
        });

        return response.data.videos ?? [];
    }

    private async searchAndDownload(query: string, localPath: string): Promise<FootageAsset> {
        const videos = await this.search(query);
        if (videos.length === 0) {
            this.logger.warn(`[Pexels] No videos found for query: ${query}`);
            throw new DownloadError(`No videos found for query: ${query}`);
        }

        const video = this.selectVideo(videos);
        const file = this.bestFile(video);
        if (!file) {
            throw new DownloadError(`Video ${video.id} has no downloadable files`);
        }

        this.logger.log(`[Pexels] Selected video ${video.id} (${video.duration}s, ${file.width}x${file.height})`);
        await this.download(file.link, localPath);

        return {
            sourceQuery: query,
            localPath,
            sourceUrl: video.url,
            downloadUrl: file.link,
            durationSeconds: video.duration,
            width: file.width ?? video.width,
            height: file.height ?? video.height,
            providerId: String(video.id),
        };
    }

    /**
     * Applies the configured selection policy to the search results.
     */
    selectVideo(videos: PexelsVideo[]): PexelsVideo {
        switch (this.selection) {
            case 'longest':
                return videos.reduce((best, video) => (video.duration > best.duration ? video : best));
            case 'random': {
                const index = Math.min(Math.floor(this.random() * videos.length), videos.length - 1);
                return videos[index];
            }
            default:
                return videos[0];
        }
    }

    /**
     * Highest resolution file of a clip.
     */
    bestFile(video: PexelsVideo): PexelsVideoFile | undefined {
        const files = video.video_files.filter(file => Boolean(file.link));
        if (files.length === 0) {
            return undefined;
        }
        const pixels = (file: PexelsVideoFile) => (file.width ?? 0) * (file.height ?? 0);
        return files.reduce((best, file) => (pixels(file) > pixels(best) ? file : best));
    }

    private async download(url: string, localPath: string): Promise<void> {
        const bytes = await downloadToFile(url, localPath);
        this.logger.log(`[Pexels] Video downloaded to ${localPath} (${(bytes / 1024 / 1024).toFixed(1)}MB)`);
    }

    private slugify(query: string): string {
        return query.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'footage';
    }
}
