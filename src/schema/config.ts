// src/schema/config.ts

import type {ErrorObject} from 'ajv';
import {ajv, errorProperty} from './validation';

/**
 * Root configuration object for reflow.
 *
 * This is what you export from `reflow.config.ts` in a consuming project,
 * or pass to the programmatic API.
 */
export interface ReflowConfig {
    /**
     * Maximum line width the renderer aims for.
     *
     * Default: 80
     */
    maxLineWidth?: number;

    /**
     * One level of indentation: a run of spaces or a single tab.
     *
     * Default: four spaces
     */
    indentUnit?: string;

    /**
     * Glob patterns (relative to the working directory) of files picked up
     * when a directory is formatted.
     *
     * Default: ['**\/*.cdc']
     */
    include?: string[];

    /**
     * Glob patterns excluded from directory walks and watching.
     *
     * Default: ['**\/node_modules/**', '**\/.git/**', '**\/dist/**',
     * '**\/build/**', '**\/coverage/**']
     */
    ignore?: string[];

    /**
     * End formatted files with a line break.
     *
     * Default: true
     */
    insertFinalNewline?: boolean;
}

/** A config with every default filled in. */
export type ResolvedReflowConfig = Required<ReflowConfig>;

export const DEFAULT_CONFIG: ResolvedReflowConfig = {
    maxLineWidth: 80,
    indentUnit: '    ',
    include: ['**/*.cdc'],
    ignore: [
        '**/node_modules/**',
        '**/.git/**',
        '**/dist/**',
        '**/build/**',
        '**/coverage/**',
    ],
    insertFinalNewline: true,
};

export class ConfigError extends Error {
    constructor(
        message: string,
        readonly key?: string,
    ) {
        super(key ? `Invalid config "${key}": ${message}` : message);
        this.name = 'ConfigError';
    }
}

/**
 * Identity helper that gives config files type checking.
 */
export function defineConfig(config: ReflowConfig): ReflowConfig {
    return config;
}

/**
 * JSON Schema of a config file's default export.
 */
export const REFLOW_CONFIG_SCHEMA = {
    type: 'object',
    additionalProperties: false,
    properties: {
        maxLineWidth: {type: 'integer', minimum: 1},
        indentUnit: {type: 'string', pattern: '^( +|\\t)$'},
        include: {type: 'array', items: {type: 'string'}},
        ignore: {type: 'array', items: {type: 'string'}},
        insertFinalNewline: {type: 'boolean'},
    },
} as const;

const validateReflowConfig = ajv.compile<ReflowConfig>(REFLOW_CONFIG_SCHEMA);

const EXPECTED: Record<keyof ReflowConfig, string> = {
    maxLineWidth: 'expected a positive integer',
    indentUnit: 'expected one or more spaces, or a single tab',
    include: 'expected an array of strings',
    ignore: 'expected an array of strings',
    insertFinalNewline: 'expected a boolean',
};

/**
 * Check an untyped value (e.g. a config module's default export) against
 * {@link REFLOW_CONFIG_SCHEMA}. The first error becomes a {@link ConfigError}
 * naming its key.
 */
export function validateConfig(raw: unknown): ReflowConfig {
    if (validateReflowConfig(raw)) {
        return {...raw};
    }
    throw toConfigError(validateReflowConfig.errors ?? []);
}

/**
 * Merge layers left to right over the defaults; later layers win, and
 * `undefined` values do not override.
 */
export function resolveConfig(...layers: ReflowConfig[]): ResolvedReflowConfig {
    const resolved: ResolvedReflowConfig = {...DEFAULT_CONFIG};
    for (const layer of layers) {
        if (layer.maxLineWidth !== undefined) resolved.maxLineWidth = layer.maxLineWidth;
        if (layer.indentUnit !== undefined) resolved.indentUnit = layer.indentUnit;
        if (layer.include !== undefined) resolved.include = layer.include;
        if (layer.ignore !== undefined) resolved.ignore = layer.ignore;
        if (layer.insertFinalNewline !== undefined) resolved.insertFinalNewline = layer.insertFinalNewline;
    }
    return resolved;
}

function toConfigError(errors: ErrorObject[]): ConfigError {
    const error = errors[0];
    if (error === undefined) {
        return new ConfigError('config must export an object');
    }

    const key = errorProperty(error);
    if (error.keyword === 'additionalProperties') {
        return new ConfigError('unknown option', key);
    }
    if (key === undefined || !isConfigKey(key)) {
        return new ConfigError('config must export an object');
    }
    return new ConfigError(EXPECTED[key], key);
}

function isConfigKey(key: string): key is keyof ReflowConfig {
    return Object.prototype.hasOwnProperty.call(EXPECTED, key);
}
