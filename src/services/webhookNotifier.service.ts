// src/services/webhookNotifier.service.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import axios, { AxiosInstance } from 'axios';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { HTTP_CLIENT } from './interfaces/httpClient';
import { INotifier } from './interfaces/notifier.interface';
import { SlackMessage } from '../types/slack.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Posts the digest to a Slack-compatible incoming webhook. Never throws; on any
 * failure the payload is printed to stdout so the digest is not lost.
 */
@injectable()
export class WebhookNotifierService implements INotifier {
    private readonly serviceBaseLogger: Logger;

    constructor(
        @inject(HTTP_CLIENT) private httpClient: AxiosInstance,
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'WebhookNotifierService' });
    }

    async notify(message: SlackMessage, parentLogger?: Logger): Promise<boolean> {
        const logger = (parentLogger ?? this.serviceBaseLogger).child({ serviceMethod: 'WebhookNotifierService.notify' });
        const webhookUrl = this.configService.webhookUrl;

        if (!webhookUrl) {
            logger.warn({ event: 'webhook_not_configured' }, 'SLACK_WEBHOOK_URL is not set; printing the digest instead.');
            this.dumpPayload(message);
            return false;
        }

        try {
            const response = await this.httpClient.post<unknown>(webhookUrl, message, {
                timeout: this.configService.webhookTimeoutMs,
                headers: { 'Content-Type': 'application/json' },
                validateStatus: () => true,
            });

            if (response.status === 200) {
                logger.info({ blocks: message.blocks?.length ?? 0, event: 'webhook_delivered' }, 'Digest delivered.');
                return true;
            }

            logger.error(
                { status: response.status, responseBody: response.data, event: 'webhook_rejected' },
                `Webhook responded with HTTP ${response.status}.`,
            );
        } catch (error) {
            const { message: errorMessage, stack } = getErrorMessageAndStack(error);
            logger.error(
                { err: errorMessage, stack, code: axios.isAxiosError(error) ? error.code : undefined, event: 'webhook_transport_error' },
                `Webhook delivery failed: ${errorMessage}`,
            );
        }

        this.dumpPayload(message);
        return false;
    }

    private dumpPayload(message: SlackMessage): void {
        console.log(JSON.stringify(message, null, 2));
    }
}
