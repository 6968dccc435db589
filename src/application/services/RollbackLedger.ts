import { IArtifactStore } from '../../domain/ports/IArtifactStore';
import { describeError } from '../../domain/errors/GenerationErrors';

export interface RollbackReport {
    deleted: string[];
    failed: Array<{ storagePath: string; error: string }>;
}

/**
 * Records the storage path of every upload a request starts so a failed request can delete them again.
 * Paths are tracked before their upload runs; deleting one that never landed is harmless.
 * Rollback is best-effort: delete failures are logged and never thrown.
 */
export class RollbackLedger {
    private readonly entries: string[] = [];
    private rolledBack = false;

    constructor(
        private readonly store: IArtifactStore,
        private readonly logPrefix: string = ''
    ) { }

    track(storagePath: string): void {
        if (this.rolledBack) {
            throw new Error('Cannot track artifacts after rollback');
        }
        this.entries.push(storagePath);
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Deletes every tracked artifact once, newest first. Later calls are no-ops.
     */
    async rollback(): Promise<RollbackReport> {
        const report: RollbackReport = { deleted: [], failed: [] };
        if (this.rolledBack) {
            return report;
        }
        this.rolledBack = true;

        const pending = this.entries.splice(0).reverse();
        for (const storagePath of pending) {
            try {
                await this.store.delete(storagePath);
                report.deleted.push(storagePath);
                console.log(`[Rollback]${this.logPrefix} Deleted ${storagePath}`);
            } catch (error) {
                const message = describeError(error);
                report.failed.push({ storagePath, error: message });
                console.error(`[Rollback]${this.logPrefix} Failed to delete ${storagePath}: ${message}`);
            }
        }

        return report;
    }
}
