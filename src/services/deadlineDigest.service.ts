// src/services/deadlineDigest.service.ts
import 'reflect-metadata';
import { singleton, inject, injectAll } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { DeadlineAggregatorService } from './deadlineAggregator.service';
import { DigestRendererService } from './digestRenderer.service';
import { ISourceAdapter, SOURCE_ADAPTER } from './interfaces/sourceAdapter.interface';
import { INotifier, NOTIFIER } from './interfaces/notifier.interface';
import { ConferenceRecord, DigestRunSummary, SourceId } from '../types/deadline.types';
import { classifyConferences } from '../utils/urgency';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Runs one digest cycle: fetch → aggregate → classify → render → deliver.
 * Adapters are fetched concurrently; their results are merged in registration order.
 */
@singleton()
export class DeadlineDigestService {
    private readonly serviceBaseLogger: Logger;

    constructor(
        @injectAll(SOURCE_ADAPTER) private adapters: ISourceAdapter[],
        @inject(DeadlineAggregatorService) private aggregator: DeadlineAggregatorService,
        @inject(DigestRendererService) private renderer: DigestRendererService,
        @inject(NOTIFIER) private notifier: INotifier,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'DeadlineDigestService' });
    }

    async run(now: Date = new Date(), parentLogger?: Logger): Promise<DigestRunSummary> {
        const logger = (parentLogger ?? this.serviceBaseLogger).child({ serviceMethod: 'DeadlineDigestService.run' });
        const operationStartTime = Date.now();
        const sourceIds: SourceId[] = this.adapters.map(adapter => adapter.sourceId);

        logger.info({ sources: sourceIds, now: now.toISOString(), event: 'digest_run_start' }, 'Starting deadline digest run.');

        const perSource = await Promise.all(this.adapters.map(adapter => this.fetchFromAdapter(adapter, logger)));

        const fetchedBySource: Partial<Record<SourceId, number>> = {};
        const merged: ConferenceRecord[] = [];
        perSource.forEach((records, index) => {
            const sourceId = sourceIds[index];
            fetchedBySource[sourceId] = (fetchedBySource[sourceId] ?? 0) + records.length;
            merged.push(...records);
        });

        const aggregated = this.aggregator.aggregate(merged, now, logger);
        const classified = classifyConferences(aggregated, now);
        const message = this.renderer.render(classified, { generatedAt: now, sources: sourceIds });
        const delivered = await this.notifier.notify(message, logger);

        const summary: DigestRunSummary = {
            startedAt: new Date(operationStartTime).toISOString(),
            fetchedBySource,
            totalFetched: merged.length,
            aggregated: aggregated.length,
            delivered,
            durationMs: Date.now() - operationStartTime,
            message,
        };

        logger.info({
            fetchedBySource: summary.fetchedBySource,
            totalFetched: summary.totalFetched,
            aggregated: summary.aggregated,
            delivered: summary.delivered,
            durationMs: summary.durationMs,
            event: 'digest_run_end',
        }, `Digest run finished (${delivered ? 'delivered' : 'not delivered'}).`);

        return summary;
    }

    private async fetchFromAdapter(adapter: ISourceAdapter, logger: Logger): Promise<ConferenceRecord[]> {
        try {
            return await adapter.fetchRecords(logger);
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ sourceId: adapter.sourceId, err: message, stack, event: 'adapter_unexpected_error' }, `Adapter ${adapter.sourceId} failed unexpectedly.`);
            return [];
        }
    }
}

/** Process exit status for a one-shot run: 1 only when delivery failed and FAIL_ON_DELIVERY_ERROR is set. */
export function digestExitCode(summary: Pick<DigestRunSummary, 'delivered'>, failOnDeliveryError: boolean): number {
    return !summary.delivered && failOnDeliveryError ? 1 : 0;
}
