// src/utils/errorUtils.ts

/**
 * Normalizes anything thrown into a message and an optional stack for structured logs.
 */
export function getErrorMessageAndStack(error: unknown): { message: string; stack?: string } {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    try {
        return { message: JSON.stringify(error) ?? String(error) };
    } catch {
        return { message: String(error) };
    }
}
