import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

/**
 * Streams a remote file to `localPath`, creating its directory.
 * A failure on either side tears down both streams, and a partially
 * written file is removed.
 * @returns bytes written
 */
export async function downloadToFile(url: string, localPath: string, timeoutMs: number = 300000): Promise<number> {
    await fs.promises.mkdir(path.dirname(localPath), { recursive: true });

    const response = await axios.get<Readable>(url, {
        responseType: 'stream',
        timeout: timeoutMs,
    });

    try {
        await pipeline(response.data, fs.createWriteStream(localPath));
    } catch (error) {
        await removePartialFile(localPath);
        throw error;
    }

    const stats = await fs.promises.stat(localPath);
    return stats.size;
}

async function removePartialFile(localPath: string): Promise<void> {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.lstat(localPath);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
        throw error;
    }
    // A directory in the way is left alone.
    if (stats.isFile()) {
        await fs.promises.unlink(localPath);
    }
}
