// src/config/targets.loader.ts
import fs from 'fs';
import { z } from 'zod';
import { targetTableFileSchema } from './schemas';
import { ConfigurationError, TargetTable } from './types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Reads and validates the tracked-conference table.
 * @throws {ConfigurationError} when the file is missing, is not JSON, or does not match the schema.
 */
export function loadTargetTable(filePath: string): TargetTable {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read target table file "${filePath}": ${getErrorMessageAndStack(error).message}`, { filePath });
    }

    try {
        return targetTableFileSchema.parse(JSON.parse(content)).categories;
    } catch (error) {
        if (error instanceof z.ZodError) {
            throw new ConfigurationError(`Target table file "${filePath}" is invalid.`, { filePath, issues: error.issues });
        }
        throw new ConfigurationError(`Target table file "${filePath}" is not valid JSON: ${getErrorMessageAndStack(error).message}`, { filePath });
    }
}
