import axios from 'axios';
import { main } from '../../src/index';
import { createPipeline } from '../../src/application/PipelineFactory';
import { RealEstatePipeline } from '../../src/application/RealEstatePipeline';
import { DownloadError } from '../../src/domain/errors/PipelineErrors';
import { FootageAsset, RoomSpec } from '../../src/domain/entities/Room';

jest.mock('axios');
jest.mock('../../src/application/PipelineFactory');

const mockedAxios = jest.mocked(axios);
const mockedCreatePipeline = jest.mocked(createPipeline);

describe('main', () => {
    const originalEnv = process.env;
    const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };

    const asset: FootageAsset = {
        sourceQuery: 'luxury living room',
        localPath: 'downloads/living_room.mp4',
        sourceUrl: 'https://www.pexels.com/video/1/',
        downloadUrl: 'https://videos.example.com/1.mp4',
        durationSeconds: 10,
        width: 1920,
        height: 1080,
        providerId: '1',
    };

    const stubPipeline = (failingRoom?: string) => new RealEstatePipeline({
        footageClient: {
            fetch: jest.fn(async (query: string) => {
                if (failingRoom === undefined || query.includes(failingRoom)) {
                    throw new DownloadError(`No videos found for query: ${query}`);
                }
                return asset;
            }),
        },
        descriptionGenerator: { generate: jest.fn(async (room: RoomSpec) => `A lovely ${room.type}.`) },
        videoClient: {
            submitAndWait: jest.fn(async (_asset: FootageAsset, description: string, room: RoomSpec) => ({
                room,
                status: 'success' as const,
                stage: 'completed' as const,
                outputPath: 'output/room.mp4',
                description,
            })),
        },
    }, { logger });

    beforeEach(() => {
        process.env = { ...originalEnv };
        Object.keys(process.env)
            .filter(key => /^(PEXELS|HEYGEN|FOOTAGE|LLM|LOCAL_LLM|DESCRIPTION|VIDEO|PIPELINE|DOWNLOAD)/.test(key))
            .forEach(key => delete process.env[key]);
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should exit with 1 and make no API calls when credentials are missing', async () => {
        const code = await main([], logger);

        expect(code).toBe(1);
        expect(logger.error).toHaveBeenCalledWith('❌ Missing required environment variables: PEXELS_API_KEY, HEYGEN_API_KEY');
        expect(mockedCreatePipeline).not.toHaveBeenCalled();
        expect(mockedAxios.get).not.toHaveBeenCalled();
        expect(mockedAxios.post).not.toHaveBeenCalled();
    });

    describe('with credentials', () => {
        beforeEach(() => {
            process.env.PEXELS_API_KEY = 'test-pexels-key';
            process.env.HEYGEN_API_KEY = 'test-heygen-key';
        });

        it('should exit with 1 when configuration values are out of range', async () => {
            process.env.PIPELINE_PARALLELISM = '0';

            const code = await main([], logger);

            expect(code).toBe(1);
            expect(logger.error).toHaveBeenCalledWith('  - PIPELINE_PARALLELISM must be a positive integer');
            expect(mockedCreatePipeline).not.toHaveBeenCalled();
        });

        it('should exit with 1 when the rooms file is unreadable', async () => {
            const code = await main(['does-not-exist.json'], logger);

            expect(code).toBe(1);
            expect(mockedCreatePipeline).not.toHaveBeenCalled();
        });

        it('should run the default rooms and exit with 0 when any room succeeds', async () => {
            mockedCreatePipeline.mockReturnValue(stubPipeline('garden'));

            const code = await main([], logger);

            expect(code).toBe(0);
            expect(logger.log).toHaveBeenCalledWith('🏠 2 room(s): living room, garden');
            expect(logger.log).toHaveBeenCalledWith('  1/2 room(s) succeeded, 1 failed');
        });

        it('should exit with 1 when every room fails', async () => {
            mockedCreatePipeline.mockReturnValue(stubPipeline());

            const code = await main([], logger);

            expect(code).toBe(1);
            expect(logger.log).toHaveBeenCalledWith('  0/2 room(s) succeeded, 2 failed');
        });
    });
});
