/**
 * Logger Configuration Schemas
 */

import { z } from 'zod';

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('silent') }).strict().describe('Discard everything'),
    z
        .object({
            type: z.literal('console'),
            colorize: z.boolean().default(true).describe('Colour the level label'),
        })
        .strict()
        .describe('Single-line entries on stderr'),
    z
        .object({
            type: z.literal('file'),
            path: z.string().min(1).describe('Log file, appended to as JSON lines'),
        })
        .strict(),
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silly']);

export const LoggerConfigSchema = z
    .object({
        level: LogLevelSchema.default('info'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true }]),
    })
    .strict();

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
