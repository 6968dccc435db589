import { StoredArtifact } from '../entities/Artifacts';

/**
 * IArtifactStore - Port for object storage with public retrieval URLs.
 * Implementations: SupabaseArtifactStore, CloudinaryArtifactStore
 */
export interface IArtifactStore {
    /**
     * Uploads bytes to `logicalPath`. Callers pass a path that is unique per attempt;
     * stores never overwrite an existing object.
     */
    upload(bytes: Buffer, logicalPath: string, contentType: string): Promise<StoredArtifact>;

    /**
     * The storage path an upload to `logicalPath` lands on, known before the upload runs.
     */
    storagePathFor(logicalPath: string): string;

    /**
     * Removes the object behind `storagePath`. An object that does not exist counts as removed.
     */
    delete(storagePath: string): Promise<void>;
}
