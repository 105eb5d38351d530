import { loadConfig, validateConfig } from './config';
import { DEFAULT_ROOMS, loadRooms } from './config/rooms';
import { createPipeline } from './application/PipelineFactory';
import { formatReport, summarizeResults } from './application/PipelineReport';
import { ConfigError } from './domain/errors/PipelineErrors';
import { ILogger } from './domain/ports/ILogger';

/**
 * Runs the pipeline once. `argv[0]` may name a JSON rooms file.
 * @returns process exit code
 */
export async function main(argv: string[] = process.argv.slice(2), logger: ILogger = console): Promise<number> {
    logger.log('🏡 Real Estate Walkthrough Pipeline');

    try {
        // 1. Load and validate configuration
        logger.log('📋 Loading configuration...');
        const config = loadConfig();

        const configErrors = validateConfig(config);
        if (configErrors.length > 0) {
            logger.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => logger.error(`  - ${error}`));
            return 1;
        }

        // 2. Rooms
        const roomsFile = argv[0];
        const rooms = roomsFile ? loadRooms(roomsFile) : [...DEFAULT_ROOMS];
        logger.log(`🏠 ${rooms.length} room(s): ${rooms.map(room => room.type).join(', ')}`);

        // 3. Run
        const pipeline = createPipeline(config, logger, {
            onProgress: (completed, total, result) => {
                logger.log(`📈 ${completed}/${total} ${result.room.type}: ${result.status}`);
            },
        });
        const results = await pipeline.run(rooms);

        // 4. Report
        logger.log('📊 Results:');
        formatReport(results).forEach(line => logger.log(`  ${line}`));

        const summary = summarizeResults(results);
        return summary.total > 0 && summary.successCount === 0 ? 1 : 0;
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.error(`❌ ${error.message}`);
            return 1;
        }
        logger.error('💥 Fatal error:', error);
        return 1;
    }
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error) => {
            console.error('Fatal error:', error);
            process.exit(1);
        });
}
