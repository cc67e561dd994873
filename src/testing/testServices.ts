// src/testing/testServices.ts
import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { ConfigService } from '../config/config.service';
import { EnvironmentSource, TargetTable } from '../config/types';
import { LoggingService } from '../services/logging.service';

/** Silent, file-less configuration with every remote source switched off unless overridden. */
export function createTestConfig(overrides: EnvironmentSource = {}): ConfigService {
    return new ConfigService({
        NODE_ENV: 'test',
        LOG_LEVEL: 'silent',
        LOG_TO_CONSOLE: 'false',
        LOG_TO_FILE: 'false',
        CCFDDL_URL: '',
        SEC_DEADLINES_URL: '',
        ...overrides,
    });
}

export function createTestLogging(configService: ConfigService = createTestConfig()): LoggingService {
    return new LoggingService(configService);
}

export interface StubResponse {
    status: number;
    data?: unknown;
}

export type StubHandler = (request: InternalAxiosRequestConfig) => StubResponse | Promise<StubResponse>;

/**
 * An axios instance whose adapter answers in-process. Throwing from the handler
 * behaves like a transport failure.
 */
export function createStubHttpClient(handler: StubHandler): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
    const requests: InternalAxiosRequestConfig[] = [];
    const client = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            requests.push(config);
            const { status, data } = await handler(config);
            return { data, status, statusText: String(status), headers: {}, config };
        },
    });
    return { client, requests };
}

/** Serves each URL from a fixed map of bodies; unknown URLs get a 404. */
export function createUrlMapHttpClient(bodies: Record<string, string>): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
    return createStubHttpClient((request) => {
        const url = request.url ?? '';
        return url in bodies ? { status: 200, data: bodies[url] } : { status: 404, data: 'Not Found' };
    });
}

export const TEST_TARGET_TABLE: TargetTable = [
    { category: 'AI/Vision', aliases: ['cvpr', 'neurips', 'icml'] },
    { category: 'Security', aliases: ['ccs', 'ndss', 'usenix security', 'ieee s&p'] },
    { category: 'Network', aliases: ['sigcomm', 'nsdi'] },
    { category: 'System', aliases: ['osdi', 'sosp'] },
];
