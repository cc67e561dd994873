import { WebhookNotifierService } from './webhookNotifier.service';
import { SlackMessage } from '../types/slack.types';
import { StubHandler, createStubHttpClient, createTestConfig, createTestLogging } from '../testing/testServices';

const WEBHOOK_URL = 'https://hooks.example.test/services/test-secret';
const MESSAGE: SlackMessage = {
    text: 'digest',
    blocks: [{ type: 'section', text: { type: 'mrkdwn', text: '*CCS*' } }],
};

function createNotifier(handler: StubHandler, env: Record<string, string> = { SLACK_WEBHOOK_URL: WEBHOOK_URL }) {
    const config = createTestConfig(env);
    const { client, requests } = createStubHttpClient(handler);
    return { notifier: new WebhookNotifierService(client, config, createTestLogging(config)), requests };
}

describe('WebhookNotifierService', () => {
    let consoleLog: jest.SpyInstance;

    beforeEach(() => {
        consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('prints the payload and reports failure when no webhook is configured', async () => {
        const { notifier, requests } = createNotifier(() => ({ status: 200 }), {});

        await expect(notifier.notify(MESSAGE)).resolves.toBe(false);
        expect(requests).toHaveLength(0);
        expect(consoleLog).toHaveBeenCalledWith(JSON.stringify(MESSAGE, null, 2));
    });

    it('posts the message as JSON', async () => {
        const { notifier, requests } = createNotifier(() => ({ status: 200, data: 'ok' }));

        await expect(notifier.notify(MESSAGE)).resolves.toBe(true);
        expect(requests).toHaveLength(1);
        expect(requests[0].method).toBe('post');
        expect(requests[0].url).toBe(WEBHOOK_URL);
        expect(requests[0].timeout).toBe(10000);
        expect(requests[0].headers['Content-Type']).toBe('application/json');
        expect(JSON.parse(String(requests[0].data))).toEqual(MESSAGE);
        expect(consoleLog).not.toHaveBeenCalled();
    });

    it('dumps the payload when the webhook rejects it', async () => {
        const { notifier } = createNotifier(() => ({ status: 400, data: 'invalid_blocks' }));

        await expect(notifier.notify(MESSAGE)).resolves.toBe(false);
        expect(consoleLog).toHaveBeenCalledWith(JSON.stringify(MESSAGE, null, 2));
    });

    it('dumps the payload when the request fails', async () => {
        const { notifier } = createNotifier(() => {
            throw new Error('getaddrinfo ENOTFOUND hooks.example.test');
        });

        await expect(notifier.notify(MESSAGE)).resolves.toBe(false);
        expect(consoleLog).toHaveBeenCalledTimes(1);
    });
});
