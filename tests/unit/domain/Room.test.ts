import { buildSearchQuery, failedVideo, freezeRoom, roomFileStem, roomSlug } from '../../../src/domain/entities/Room';
import {
    DownloadError,
    GenerationError,
    SubmissionError,
    VideoTimeoutError,
    toFailureReason,
} from '../../../src/domain/errors/PipelineErrors';

describe('Room', () => {
    const livingRoom = { type: 'living room', features: ['spacious', 'modern'] };

    describe('buildSearchQuery', () => {
        it('should prefix the room type', () => {
            expect(buildSearchQuery(livingRoom)).toBe('luxury living room');
        });

        it('should skip an empty prefix', () => {
            expect(buildSearchQuery(livingRoom, '')).toBe('living room');
        });
    });

    describe('roomSlug', () => {
        it('should replace spaces and punctuation with underscores', () => {
            expect(roomSlug(livingRoom)).toBe('living_room');
            expect(roomSlug({ type: "Master Bedroom (2nd floor)", features: [] })).toBe('master_bedroom_2nd_floor');
        });

        it('should never return an empty slug', () => {
            expect(roomSlug({ type: '!!!', features: [] })).toBe('room');
        });
    });

    describe('roomFileStem', () => {
        it('should prefix the slug with the one-based position', () => {
            expect(roomFileStem(livingRoom, 0)).toBe('01_living_room');
            expect(roomFileStem(livingRoom, 11)).toBe('12_living_room');
        });

        it('should keep rooms with the same type apart', () => {
            const bedroom = { type: 'bedroom', features: [] };
            expect(roomFileStem(bedroom, 0)).not.toBe(roomFileStem(bedroom, 1));
            expect(roomFileStem({ type: 'салон', features: [] }, 2)).toBe('03_room');
        });
    });

    describe('freezeRoom', () => {
        it('should copy and freeze the room', () => {
            const features = ['bright'];
            const frozen = freezeRoom({ type: 'den', features });
            features.push('noisy');

            expect(frozen.features).toEqual(['bright']);
            expect(Object.isFrozen(frozen)).toBe(true);
            expect(Object.isFrozen(frozen.features)).toBe(true);
        });
    });

    describe('failedVideo', () => {
        it('should record the failing stage and reason', () => {
            expect(failedVideo(livingRoom, 'footage', { kind: 'DownloadError', message: 'nothing found' })).toEqual({
                room: livingRoom,
                status: 'failed',
                stage: 'failed',
                failedAt: 'footage',
                reason: { kind: 'DownloadError', message: 'nothing found' },
            });
        });
    });
});

describe('toFailureReason', () => {
    it('should keep the kind of pipeline errors', () => {
        expect(toFailureReason(new DownloadError('no clip'))).toEqual({ kind: 'DownloadError', message: 'no clip' });
        expect(toFailureReason(new GenerationError('empty'))).toEqual({ kind: 'GenerationError', message: 'empty' });
        expect(toFailureReason(new SubmissionError('401'))).toEqual({ kind: 'SubmissionError', message: '401' });
        expect(toFailureReason(new VideoTimeoutError('too slow', 'vid-1', 1000))).toEqual({ kind: 'TimeoutError', message: 'too slow' });
    });

    it('should label foreign errors as unexpected', () => {
        expect(toFailureReason(new TypeError('boom'))).toEqual({ kind: 'UnexpectedError', message: 'boom' });
        expect(toFailureReason('plain string')).toEqual({ kind: 'UnexpectedError', message: 'plain string' });
    });
});
