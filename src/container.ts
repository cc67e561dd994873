// src/container.ts
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import axios, { AxiosInstance } from 'axios';

// --- Core Application Services and Configurations ---
import { ConfigService } from './config/config.service';
import { ENVIRONMENT, EnvironmentSource, TARGET_TABLE, TargetTable } from './config/types';
import { loadTargetTable } from './config/targets.loader';
import { LoggingService } from './services/logging.service';
import { HttpFetchService } from './services/httpFetch.service';
import { HTTP_CLIENT } from './services/interfaces/httpClient';

// --- Sources ---
import { ISourceAdapter, SOURCE_ADAPTER } from './services/interfaces/sourceAdapter.interface';
import { CcfddlSourceAdapter } from './services/sources/ccfddl.adapter';
import { SecDeadlinesSourceAdapter } from './services/sources/secDeadlines.adapter';
import { JsonFeedSourceAdapter } from './services/sources/jsonFeed.adapter';

// --- Pipeline ---
import { TargetFilterService } from './services/targetFilter.service';
import { DeadlineAggregatorService } from './services/deadlineAggregator.service';
import { DigestRendererService } from './services/digestRenderer.service';
import { INotifier, NOTIFIER } from './services/interfaces/notifier.interface';
import { WebhookNotifierService } from './services/webhookNotifier.service';
import { DeadlineDigestService } from './services/deadlineDigest.service';

/**
 * Configure the Tsyringe IoC container by registering all application services.
 */

// --- 1. Register Core Application Services (Singletons) ---
container.register<EnvironmentSource>(ENVIRONMENT, { useValue: process.env });
container.register<AxiosInstance>(HTTP_CLIENT, { useValue: axios.create() });
container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);
container.registerSingleton(HttpFetchService);

// --- 2. Target table, loaded once on first use ---
container.register<TargetTable>(TARGET_TABLE, {
    useFactory: instanceCachingFactory<TargetTable>(c => loadTargetTable(c.resolve(ConfigService).targetsFilePath)),
});
container.registerSingleton(TargetFilterService);

// --- 3. Source adapters. Registration order is source priority when editions collide. ---
container.register<ISourceAdapter>(SOURCE_ADAPTER, { useClass: CcfddlSourceAdapter });
container.register<ISourceAdapter>(SOURCE_ADAPTER, { useClass: SecDeadlinesSourceAdapter });
container.register<ISourceAdapter>(SOURCE_ADAPTER, { useClass: JsonFeedSourceAdapter });

// --- 4. Pipeline ---
container.registerSingleton(DeadlineAggregatorService);
container.registerSingleton(DigestRendererService);
container.registerSingleton<INotifier>(NOTIFIER, WebhookNotifierService);
container.registerSingleton(DeadlineDigestService);

/**
 * Exports the configured Tsyringe container instance.
 */
export default container;
