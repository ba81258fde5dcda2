/**
 * Logger option schemas and validation.
 *
 * Options are validated once, at construction. Hooks and the sink are
 * checked by the type system only; everything else goes through zod.
 */
import { z } from 'zod';

import { getEnvLevel, LEVEL_ENV_VAR } from '../environment.js';
import { LoggerConfigError } from './errors.js';
import { LEVEL_FILTERS, type LevelFilter, type LoggerOptions } from './types.js';

/**
 * Minimum level, including `off`.
 */
export const LevelFilterSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']);

/**
 * Plain-data part of LoggerOptions.
 */
export const LoggerSettingsSchema = z.object({
    level: LevelFilterSchema.optional(),
    targets: z.record(
        z.string().min(1, 'Target prefix must not be empty'),
        LevelFilterSchema,
    ).optional(),
    color: z.union([z.boolean(), z.literal('auto')]).optional(),
    timestamps: z.boolean().optional(),
    timeZone: z.enum(['local', 'utc']).optional(),
    maxRecordBytes: z
        .number()
        .int()
        .min(64, 'maxRecordBytes must be at least 64')
        .optional(),
});

export type LoggerSettings = z.infer<typeof LoggerSettingsSchema>;

/**
 * Validate the data fields of LoggerOptions.
 *
 * @throws LoggerConfigError listing every issue found
 */
export function parseLoggerSettings(options: LoggerOptions): LoggerSettings {

    const result = LoggerSettingsSchema.safeParse({
        level: options.level,
        targets: options.targets,
        color: options.color,
        timestamps: options.timestamps,
        timeZone: options.timeZone,
        maxRecordBytes: options.maxRecordBytes,
    });

    if (!result.success) {

        throw new LoggerConfigError(
            result.error.issues.map((issue) => {

                const path = issue.path.map(String).join('.');

                return path ? `${path}: ${issue.message}` : issue.message;

            }),
        );

    }

    return result.data;

}

/**
 * Read LOG_LEVEL as a LevelFilter.
 *
 * @returns undefined when the variable is unset
 * @throws LoggerConfigError when it holds an unknown level
 */
export function parseEnvLevel(): LevelFilter | undefined {

    const raw = getEnvLevel();

    if (raw === undefined) {

        return undefined;

    }

    const result = LevelFilterSchema.safeParse(raw);

    if (!result.success) {

        throw new LoggerConfigError([
            `${LEVEL_ENV_VAR}: must be one of ${LEVEL_FILTERS.join(', ')} (got "${raw}")`,
        ]);

    }

    return result.data;

}
