import {
    type Logger,
    type LogLevel,
    configure,
    getConsoleSink,
    getLogger as getLogTapeLogger,
} from '@logtape/logtape';

const ROOT_CATEGORY = 'inventory-sync';

let isConfigured = false;

/**
 * Install a console sink for the engine's log categories
 * Library code only obtains loggers; hosts decide whether anything is printed
 */
export async function configureLogger(options: { level?: LogLevel } = {}): Promise<void> {
    if (isConfigured) return;

    await configure({
        sinks: {
            console: getConsoleSink(),
        },
        loggers: [
            {
                category: [ROOT_CATEGORY],
                lowestLevel: options.level ?? 'warning',
                sinks: ['console'],
            },
        ],
    });

    isConfigured = true;
}

export function getLogger(category: string[]): Logger {
    return getLogTapeLogger([ROOT_CATEGORY, ...category]);
}
