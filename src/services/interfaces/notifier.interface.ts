// src/services/interfaces/notifier.interface.ts
import { Logger } from 'pino';
import { SlackMessage } from '../../types/slack.types';

export const NOTIFIER = 'INotifier';

export interface INotifier {
    /** Resolves to `true` only when the message was accepted by the endpoint. */
    notify(message: SlackMessage, parentLogger?: Logger): Promise<boolean>;
}
