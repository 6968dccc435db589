import { GenerationResult, RecordDetails } from '../entities/Artifacts';

/**
 * IMetadataRecorder - Port for the durable record of completed workflows.
 * Implementations: SupabaseMetadataRecorder
 */
export interface IMetadataRecorder {
    /**
     * Writes the record that makes a result exist. Fails with PersistenceFailedError.
     */
    record(result: GenerationResult, modelId: string, details: RecordDetails): Promise<void>;
}
