import cron from 'node-cron';
import { container, DependencyContainer } from 'tsyringe';

import { createDeadlineDigestTick, scheduleDeadlineDigestJob } from './deadlineDigest.job';
import { ConfigService } from '../config/config.service';
import { ConfigurationError } from '../config/types';
import { LoggingService } from '../services/logging.service';
import { DeadlineDigestService } from '../services/deadlineDigest.service';
import { DeadlineAggregatorService } from '../services/deadlineAggregator.service';
import { DigestRendererService } from '../services/digestRenderer.service';
import { ISourceAdapter } from '../services/interfaces/sourceAdapter.interface';
import { INotifier } from '../services/interfaces/notifier.interface';
import { ConferenceRecord } from '../types/deadline.types';
import { SlackMessage } from '../types/slack.types';
import { createTestConfig, createTestLogging } from '../testing/testServices';

class RecordingNotifier implements INotifier {
    readonly messages: SlackMessage[] = [];

    async notify(message: SlackMessage): Promise<boolean> {
        this.messages.push(message);
        return true;
    }
}

function createJobContainer(config: ConfigService, adapter: ISourceAdapter, notifier: INotifier): DependencyContainer {
    const logging = createTestLogging(config);
    const digest = new DeadlineDigestService(
        [adapter],
        new DeadlineAggregatorService(logging),
        new DigestRendererService(config),
        notifier,
        logging,
    );
    const jobContainer = container.createChildContainer();
    jobContainer.register(ConfigService, { useValue: config });
    jobContainer.register(LoggingService, { useValue: logging });
    jobContainer.register(DeadlineDigestService, { useValue: digest });
    return jobContainer;
}

function emptyAdapter(): ISourceAdapter {
    return { sourceId: 'ccfddl', fetchRecords: jest.fn(async (): Promise<ConferenceRecord[]> => []) };
}

describe('scheduleDeadlineDigestJob', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('rejects a missing schedule', () => {
        const jobContainer = createJobContainer(createTestConfig(), emptyAdapter(), new RecordingNotifier());

        expect(() => scheduleDeadlineDigestJob(jobContainer)).toThrow(ConfigurationError);
        expect(() => scheduleDeadlineDigestJob(jobContainer)).toThrow('DIGEST_CRON_SCHEDULE is not set.');
    });

    it('rejects an invalid cron expression', () => {
        const config = createTestConfig({ DIGEST_CRON_SCHEDULE: 'not a cron' });
        const jobContainer = createJobContainer(config, emptyAdapter(), new RecordingNotifier());

        expect(() => scheduleDeadlineDigestJob(jobContainer)).toThrow(ConfigurationError);
        expect(() => scheduleDeadlineDigestJob(jobContainer)).toThrow('DIGEST_CRON_SCHEDULE "not a cron" is not a valid cron expression.');
    });

    it('schedules the configured expression in the configured timezone', () => {
        const realSchedule = cron.schedule;
        const scheduleSpy = jest.spyOn(cron, 'schedule').mockImplementation(
            (expression, func, options) => realSchedule(expression, func, { ...options, scheduled: false }),
        );
        const config = createTestConfig({ DIGEST_CRON_SCHEDULE: '0 9 * * 1', CRON_TIMEZONE: 'Asia/Seoul' });
        const jobContainer = createJobContainer(config, emptyAdapter(), new RecordingNotifier());

        const task = scheduleDeadlineDigestJob(jobContainer);
        task.stop();

        expect(scheduleSpy).toHaveBeenCalledTimes(1);
        expect(scheduleSpy).toHaveBeenCalledWith('0 9 * * 1', expect.any(Function), { scheduled: true, timezone: 'Asia/Seoul' });
    });
});

describe('createDeadlineDigestTick', () => {
    it('skips a tick while the previous run is still in progress', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => { release = resolve; });
        const fetchRecords = jest.fn(async (): Promise<ConferenceRecord[]> => {
            await gate;
            return [];
        });
        const notifier = new RecordingNotifier();
        const jobContainer = createJobContainer(createTestConfig(), { sourceId: 'ccfddl', fetchRecords }, notifier);
        const tick = createDeadlineDigestTick(jobContainer);

        const firstRun = tick();
        await tick();
        expect(fetchRecords).toHaveBeenCalledTimes(1);

        release();
        await firstRun;
        expect(notifier.messages).toHaveLength(1);

        await tick();
        expect(fetchRecords).toHaveBeenCalledTimes(2);
        expect(notifier.messages).toHaveLength(2);
    });
});
