import { GeneratedVideo } from '../domain/entities/Room';

export interface PipelineSummary {
    total: number;
    successCount: number;
    failureCount: number;
}

export function summarizeResults(results: readonly GeneratedVideo[]): PipelineSummary {
    const successCount = results.filter(result => result.status === 'success').length;
    return {
        total: results.length,
        successCount,
        failureCount: results.length - successCount,
    };
}

/**
 * One line per room, then a totals line.
 */
export function formatReport(results: readonly GeneratedVideo[]): string[] {
    const lines = results.map(result => {
        if (result.status === 'success') {
            return `✅ ${result.room.type} → ${result.outputPath ?? result.videoUrl ?? 'no output path'}`;
        }
        const kind = result.reason?.kind ?? 'Failed';
        const message = result.reason?.message ?? 'Unknown error';
        const stage = result.failedAt ? ` [${result.failedAt}]` : '';
        return `❌ ${result.room.type}${stage} ${kind}: ${message}`;
    });

    const summary = summarizeResults(results);
    lines.push(`${summary.successCount}/${summary.total} room(s) succeeded, ${summary.failureCount} failed`);
    return lines;
}
