/**
 * IMediaDownloader - Port for fetching remote media into memory.
 * Implementations: MediaDownloader
 */
export interface IMediaDownloader {
    download(url: string): Promise<Buffer>;
}
