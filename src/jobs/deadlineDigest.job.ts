// src/jobs/deadlineDigest.job.ts
import cron, { ScheduledTask } from 'node-cron';
import { container, DependencyContainer } from 'tsyringe';
import { Logger } from 'pino';

import { LoggingService } from '../services/logging.service';
import { ConfigService } from '../config/config.service';
import { ConfigurationError } from '../config/types';
import { DeadlineDigestService } from '../services/deadlineDigest.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * The work done on every cron tick. A tick that fires while the previous run
 * is still going is skipped.
 */
export const createDeadlineDigestTick = (dependencyContainer: DependencyContainer = container): (() => Promise<void>) => {
    const loggingService = dependencyContainer.resolve(LoggingService);
    let isRunning = false;

    return async () => {
        const jobStartTime = Date.now();
        const jobLogger = loggingService.getLogger({ job: 'DeadlineDigestRun', runId: String(jobStartTime) });

        if (isRunning) {
            jobLogger.warn({ event: 'digest_job_skipped' }, 'Previous digest run still in progress; skipping this tick.');
            return;
        }
        isRunning = true;

        try {
            const digestService = dependencyContainer.resolve(DeadlineDigestService);
            const summary = await digestService.run(new Date(jobStartTime), jobLogger);
            jobLogger.info(
                { durationMs: Date.now() - jobStartTime, delivered: summary.delivered, aggregated: summary.aggregated, event: 'digest_job_complete' },
                'Scheduled digest run completed.',
            );
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            jobLogger.error(
                { durationMs: Date.now() - jobStartTime, err: message, stack, event: 'digest_job_failed' },
                'Scheduled digest run failed.',
            );
        } finally {
            isRunning = false;
        }
    };
};

/**
 * Schedules the recurring digest run from DIGEST_CRON_SCHEDULE / CRON_TIMEZONE.
 *
 * @throws {ConfigurationError} when no schedule is configured or the expression is invalid.
 */
export const scheduleDeadlineDigestJob = (dependencyContainer: DependencyContainer = container): ScheduledTask => {
    const loggingService = dependencyContainer.resolve(LoggingService);
    const configService = dependencyContainer.resolve(ConfigService);
    const parentLogger: Logger = loggingService.getLogger({ job: 'DeadlineDigestScheduler' });

    const cronSchedule = configService.digestCronSchedule;
    const timezone = configService.cronTimezone;
    if (!cronSchedule) {
        throw new ConfigurationError('DIGEST_CRON_SCHEDULE is not set.');
    }
    if (!cron.validate(cronSchedule)) {
        throw new ConfigurationError(`DIGEST_CRON_SCHEDULE "${cronSchedule}" is not a valid cron expression.`, { cronSchedule });
    }

    const task = cron.schedule(cronSchedule, createDeadlineDigestTick(dependencyContainer), { scheduled: true, timezone });

    parentLogger.info({ schedule: cronSchedule, timezone, event: 'digest_job_scheduled' }, `Deadline digest scheduled with '${cronSchedule}' (${timezone}).`);
    return task;
};
