// src/services/interfaces/sourceAdapter.interface.ts
import { Logger } from 'pino';
import { ConferenceRecord, SourceId } from '../../types/deadline.types';

/** Multi-registration token; registration order is source priority for deduplication. */
export const SOURCE_ADAPTER = 'ISourceAdapter';

export interface ISourceAdapter {
    readonly sourceId: SourceId;
    /**
     * Fetches and maps every tracked conference the source lists.
     * Resolves to an empty list when the source is unreachable or its payload is unusable; never rejects.
     */
    fetchRecords(parentLogger?: Logger): Promise<ConferenceRecord[]>;
}
