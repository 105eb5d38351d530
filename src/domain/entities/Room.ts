/**
 * A room of the listing: the unit of work for one pipeline pass.
 */
export interface RoomSpec {
    /** Room name, e.g. "living room" */
    readonly type: string;
    /** Selling points, in the order they should be mentioned */
    readonly features: readonly string[];
}

/**
 * A stock clip downloaded to local scratch storage.
 */
export interface FootageAsset {
    /** Query the clip was found with */
    sourceQuery: string;
    /** Where the clip was written */
    localPath: string;
    /** Provider page for the clip */
    sourceUrl: string;
    /** File link the clip was downloaded from */
    downloadUrl: string;
    durationSeconds: number;
    width: number;
    height: number;
    providerId: string;
}

/**
 * Marketing copy for one room, narrated over its footage.
 */
export type Description = string;

/**
 * Per-room progress through the pipeline.
 */
export type RoomStage =
    | 'pending'
    | 'footage_fetched'
    | 'description_ready'
    | 'submitted'
    | 'completed'
    | 'failed';

/**
 * The three pipeline stages a room passes through.
 */
export type PipelineStage = 'footage' | 'description' | 'video';

export type FailureKind =
    | 'DownloadError'
    | 'GenerationError'
    | 'SubmissionError'
    | 'TimeoutError'
    | 'Failed'
    | 'UnexpectedError';

export interface FailureReason {
    kind: FailureKind;
    message: string;
}

export type GeneratedVideoStatus = 'success' | 'failed';

/**
 * Terminal artifact of one room's run.
 */
export interface GeneratedVideo {
    room: RoomSpec;
    status: GeneratedVideoStatus;
    /** Local file when the render was downloaded, otherwise the render URL */
    outputPath?: string;
    /** Render URL reported by the video service */
    videoUrl?: string;
    /** Video service job id */
    videoId?: string;
    description?: Description;
    /** Terminal state of the room */
    stage: Extract<RoomStage, 'completed' | 'failed'>;
    /** Stage that failed, when status is 'failed' */
    failedAt?: PipelineStage;
    reason?: FailureReason;
    durationSeconds?: number;
}

/**
 * Returns a frozen copy so no stage can mutate the caller's room.
 */
export function freezeRoom(room: RoomSpec): RoomSpec {
    return Object.freeze({
        type: room.type,
        features: Object.freeze([...room.features]),
    });
}

/**
 * Search keyword for a room's footage, e.g. "luxury living room".
 */
export function buildSearchQuery(room: RoomSpec, prefix: string = 'luxury'): string {
    return [prefix, room.type]
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .join(' ');
}

/**
 * File stem for a room's assets: "living room" -> "living_room".
 */
export function roomSlug(room: RoomSpec): string {
    const slug = room.type
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '');
    return slug || 'room';
}

/**
 * File stem unique to a room's position in the run: the second
 * "bedroom" in a list becomes "02_bedroom".
 */
export function roomFileStem(room: RoomSpec, index: number): string {
    return `${String(index + 1).padStart(2, '0')}_${roomSlug(room)}`;
}

export function failedVideo(room: RoomSpec, failedAt: PipelineStage, reason: FailureReason): GeneratedVideo {
    return { room, status: 'failed', stage: 'failed', failedAt, reason };
}
