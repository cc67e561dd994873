#!/usr/bin/env node
// src/main.ts
import 'reflect-metadata'; // must be the first import
import './container';
import { container } from 'tsyringe';
import { Logger } from 'pino';
import { ScheduledTask } from 'node-cron';
import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { DeadlineDigestService, digestExitCode } from './services/deadlineDigest.service';
import { scheduleDeadlineDigestJob } from './jobs/deadlineDigest.job';
import { getErrorMessageAndStack } from './utils/errorUtils';

let logger: Logger | undefined;
let loggingService: LoggingService | undefined;
let scheduledTask: ScheduledTask | undefined;
let isShuttingDown = false;

/**
 * One digest run, or a long-running scheduler when DIGEST_CRON_SCHEDULE is set.
 */
async function main(): Promise<void> {
    const configService = container.resolve(ConfigService);
    loggingService = container.resolve(LoggingService);
    loggingService.initialize();
    logger = loggingService.getLogger({ service: 'Main' });
    logger.info({ config: configService.describe(), event: 'app_start' }, 'Conference deadline digest starting.');

    if (configService.digestCronSchedule) {
        scheduledTask = scheduleDeadlineDigestJob();
        return;
    }

    try {
        const summary = await container.resolve(DeadlineDigestService).run(new Date(), logger);
        const exitCode = digestExitCode(summary, configService.failOnDeliveryError);
        if (exitCode !== 0) {
            logger.error({ exitCode, event: 'app_delivery_failed' }, `Digest was not delivered; exiting with status ${exitCode}.`);
        }
        process.exitCode = exitCode;
    } finally {
        await loggingService.flushLogsAndClose();
    }
}

async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        return;
    }
    isShuttingDown = true;
    logger?.info({ signal, event: 'app_shutdown' }, `Received ${signal}; stopping scheduler.`);
    scheduledTask?.stop();
    await loggingService?.flushLogsAndClose();
    process.exit(0);
}

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
shutdownSignals.forEach((signal) => {
    process.on(signal, () => {
        shutdown(signal).catch((error: unknown) => {
            console.error(`[Shutdown] ${getErrorMessageAndStack(error).message}`);
            process.exit(1);
        });
    });
});

main().catch(async (error: unknown) => {
    const { message, stack } = getErrorMessageAndStack(error);
    if (logger) {
        logger.fatal({ err: message, stack, event: 'app_fatal' }, `Fatal error: ${message}`);
    } else {
        console.error(`Fatal error: ${message}`, stack);
    }
    await loggingService?.flushLogsAndClose();
    process.exit(1);
});
