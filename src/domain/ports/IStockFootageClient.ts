import { FootageAsset } from '../entities/Room';

/**
 * Options for a single footage fetch.
 */
export interface FootageFetchOptions {
    /** File stem to save the clip under (defaults to a slug of the query) */
    fileStem?: string;
}

/**
 * IStockFootageClient - Port for stock footage providers.
 * Implementations: PexelsFootageClient
 */
export interface IStockFootageClient {
    /**
     * Searches the provider, picks a clip and downloads it to local storage.
     * @throws DownloadError when nothing is found or the download/write fails
     */
    fetch(query: string, options?: FootageFetchOptions): Promise<FootageAsset>;
}
