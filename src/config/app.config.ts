// src/config/app.config.ts
import path from 'path';
import { LevelWithSilent } from 'pino';
import { AppConfig } from './types';

/** Project root, both from src/config and from dist/config. */
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';
    public readonly logLevel: LevelWithSilent;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;
    public readonly logToConsole: boolean;
    public readonly logToFile: boolean;
    public readonly targetsFilePath: string;

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;
        this.logLevel = appConfig.LOG_LEVEL;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME;
        this.logToConsole = appConfig.LOG_TO_CONSOLE;
        this.logToFile = appConfig.LOG_TO_FILE;
        this.targetsFilePath = path.isAbsolute(appConfig.TARGETS_FILE)
            ? appConfig.TARGETS_FILE
            : path.resolve(PROJECT_ROOT, appConfig.TARGETS_FILE);
    }

    get appLogFilePath(): string {
        return path.join(this.logsDirectoryPath, this.appLogFileName);
    }
}
