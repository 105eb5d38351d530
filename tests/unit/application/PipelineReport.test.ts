import { formatReport, summarizeResults } from '../../../src/application/PipelineReport';
import { GeneratedVideo, failedVideo } from '../../../src/domain/entities/Room';

describe('PipelineReport', () => {
    const success: GeneratedVideo = {
        room: { type: 'living room', features: ['modern'] },
        status: 'success',
        stage: 'completed',
        outputPath: 'output/living_room.mp4',
    };
    const urlOnly: GeneratedVideo = {
        room: { type: 'kitchen', features: [] },
        status: 'success',
        stage: 'completed',
        videoUrl: 'https://files.example.com/kitchen.mp4',
    };
    const failure = failedVideo(
        { type: 'garden', features: ['private'] },
        'footage',
        { kind: 'DownloadError', message: 'No videos found for query: luxury garden private' }
    );

    it('should count successes and failures', () => {
        expect(summarizeResults([success, failure, urlOnly])).toEqual({
            total: 3,
            successCount: 2,
            failureCount: 1,
        });
    });

    it('should format one line per room followed by totals', () => {
        expect(formatReport([success, failure, urlOnly])).toEqual([
            '✅ living room → output/living_room.mp4',
            '❌ garden [footage] DownloadError: No videos found for query: luxury garden private',
            '✅ kitchen → https://files.example.com/kitchen.mp4',
            '2/3 room(s) succeeded, 1 failed',
        ]);
    });

    it('should report an empty run', () => {
        expect(formatReport([])).toEqual(['0/0 room(s) succeeded, 0 failed']);
    });
});
