// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, stdTimeFunctions, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import fs from 'fs';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; runId?: string; [key: string]: unknown };

type FileDestination = ReturnType<typeof pino.destination>;

@singleton()
export class LoggingService {
    private appLoggerInternal?: Logger;
    private fileStream?: FileDestination;
    private readonly preInitLogger: Logger;

    private isShuttingDown = false;
    private isInitialized = false;

    constructor(@inject(ConfigService) private configService: ConfigService) {
        // Used until initialize() runs (and in unit tests, which never call it).
        this.preInitLogger = pino({ level: this.configService.logLevel, base: undefined });
    }

    public initialize(): void {
        if (this.isInitialized) {
            return;
        }

        const pinoBaseOptions: LoggerOptions = {
            level: this.configService.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: undefined, // no pid/hostname
        };

        this.appLoggerInternal = this.createAppLogger(pinoBaseOptions);
        this.isInitialized = true;
        this.appLoggerInternal.debug({ service: 'LoggingService' }, 'App logger initialized.');
    }

    private ensureDirectory(dirPath: string): void {
        try {
            if (!fs.existsSync(dirPath)) {
                fs.mkdirSync(dirPath, { recursive: true });
            }
            fs.accessSync(dirPath, fs.constants.W_OK);
        } catch (err: unknown) {
            const { message } = getErrorMessageAndStack(err);
            throw new Error(`Error ensuring log directory "${dirPath}" exists or is writable: "${message}".`);
        }
    }

    private createAppLogger(basePinoOptions: LoggerOptions): Logger {
        const level = this.configService.logLevel;
        if (level === 'silent') {
            return pino({ ...basePinoOptions, level });
        }

        const streams: StreamEntry[] = [];

        if (this.configService.logToConsole) {
            if (!this.configService.isProduction) {
                streams.push({
                    level,
                    stream: pinoPretty({
                        colorize: true, levelFirst: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service',
                    }),
                });
            } else {
                streams.push({ level, stream: process.stdout });
            }
        }

        if (this.configService.logToFile) {
            const logFilePath = this.configService.appLogFilePath;
            try {
                this.ensureDirectory(this.configService.logsDirectory);
                this.fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
                streams.push({ level, stream: this.fileStream });
            } catch (err) {
                const { message } = getErrorMessageAndStack(err);
                console.error(`[LoggingService:CreateAppLogger] Failed to open log file "${logFilePath}": "${message}". Continuing without file logging.`);
            }
        }

        if (streams.length === 0) {
            return pino({ ...basePinoOptions, level: 'silent' });
        }
        return pino(basePinoOptions, pino.multistream(streams));
    }

    public getLogger(context?: LoggerContext): Logger {
        const targetLogger = this.isInitialized && this.appLoggerInternal ? this.appLoggerInternal : this.preInitLogger;
        return context ? targetLogger.child(context) : targetLogger;
    }

    /**
     * Flushes and closes the log file so nothing is lost when the process exits.
     */
    public async flushLogsAndClose(): Promise<void> {
        if (!this.isInitialized || this.isShuttingDown) {
            return;
        }
        this.isShuttingDown = true;

        const stream = this.fileStream;
        if (!stream) {
            return;
        }

        await new Promise<void>((resolve) => {
            const timeoutId = setTimeout(() => {
                console.warn('[LoggingService:Flush] Timeout closing the log file stream.');
                resolve();
            }, 5000);

            stream.once('close', () => {
                clearTimeout(timeoutId);
                resolve();
            });
            stream.once('error', (err: unknown) => {
                clearTimeout(timeoutId);
                console.error(`[LoggingService:Flush] Error closing the log file stream: "${getErrorMessageAndStack(err).message}".`);
                resolve();
            });
            stream.end();
        });
        this.fileStream = undefined;
    }
}
