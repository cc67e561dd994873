// src/services/httpFetch.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { HTTP_CLIENT } from './interfaces/httpClient';
import { SourceFetchError } from '../types/source.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Fetches source documents as text. One attempt per call, bounded by SOURCE_FETCH_TIMEOUT_MS.
 */
@singleton()
export class HttpFetchService {
    private readonly serviceBaseLogger: Logger;
    private readonly timeoutMs: number;

    constructor(
        @inject(HTTP_CLIENT) private httpClient: AxiosInstance,
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'HttpFetchService' });
        this.timeoutMs = this.configService.sourceFetchTimeoutMs;
    }

    /**
     * @throws {SourceFetchError} on timeout, connection failure or any status other than 200.
     */
    async fetchText(url: string, parentLogger?: Logger): Promise<string> {
        const logger = (parentLogger ?? this.serviceBaseLogger).child({ serviceMethod: 'HttpFetchService.fetchText', url });
        const startTime = Date.now();

        let response: AxiosResponse<unknown>;
        try {
            response = await this.httpClient.get<unknown>(url, {
                timeout: this.timeoutMs,
                responseType: 'text',
                validateStatus: () => true, // status is checked below
                headers: { 'User-Agent': 'conference-deadline-digest', Accept: 'application/json, application/yaml, text/plain, */*' },
            });
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            const details = {
                url,
                code: axios.isAxiosError(error) ? error.code : undefined,
                timeoutMs: this.timeoutMs,
            };
            logger.warn({ ...details, err: message, event: 'fetch_transport_error' }, `Request failed: ${message}`);
            throw new SourceFetchError(`Request to ${url} failed: ${message}`, details);
        }

        const durationMs = Date.now() - startTime;
        if (response.status !== 200) {
            logger.warn({ status: response.status, durationMs, event: 'fetch_bad_status' }, `Unexpected HTTP status ${response.status}.`);
            throw new SourceFetchError(`Request to ${url} returned HTTP ${response.status}`, { url, status: response.status });
        }

        const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
        logger.debug({ durationMs, bytes: body.length, event: 'fetch_success' }, 'Fetched source document.');
        return body;
    }
}
