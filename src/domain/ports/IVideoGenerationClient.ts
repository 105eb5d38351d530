import { Description, FootageAsset, GeneratedVideo, RoomSpec } from '../entities/Room';

export interface VideoSubmitOptions {
    /** File stem for the downloaded render (defaults to a slug of the room type) */
    fileStem?: string;
    /** Called once the service has accepted the job */
    onSubmitted?: (videoId: string) => void;
}

/**
 * IVideoGenerationClient - Port for narrated video synthesis services.
 * Implementations: HeyGenVideoClient
 */
export interface IVideoGenerationClient {
    /**
     * Submits a render job using the footage as background and the description
     * as voiceover script, then waits until the job is terminal.
     *
     * A failure reported by the service resolves with status 'failed'.
     * @throws SubmissionError when the job is rejected
     * @throws VideoTimeoutError when polling passes its deadline
     */
    submitAndWait(
        asset: FootageAsset,
        description: Description,
        room: RoomSpec,
        options?: VideoSubmitOptions
    ): Promise<GeneratedVideo>;
}
