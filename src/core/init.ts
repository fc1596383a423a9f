// src/core/init.ts

import fs from 'fs';
import path from 'path';
import {writeFileSafeSync} from '../util/fs-utils';
import {defaultLogger} from '../util/logger';

const logger = defaultLogger.child('[init]');

export interface InitOptions {
    /**
     * Overwrite an existing config file.
     */
    force?: boolean;

    /**
     * Name of the config file, relative to cwd.
     * Default: "reflow.config.ts"
     */
    configFileName?: string;
}

export interface InitResult {
    configPath: string;
    /** False when the file already existed and `force` was not set. */
    written: boolean;
}

export const DEFAULT_CONFIG_TS = `import type { ReflowConfig } from 'reflow';

const config: ReflowConfig = {
  // Maximum line width the layout aims for (default: 80).
  // maxLineWidth: 80,

  // One level of indentation: spaces or a single tab (default: 4 spaces).
  // indentUnit: '    ',

  // Files picked up when a directory is formatted.
  // include: ['**/*.cdc'],

  // Files and directories skipped when walking or watching.
  // ignore: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**', '**/coverage/**'],

  // End formatted files with a line break (default: true).
  // insertFinalNewline: true,
};

export default config;
`;

/**
 * Write a commented starter config into cwd.
 */
export function initConfig(cwd: string, options: InitOptions = {}): InitResult {
    const configPath = path.resolve(cwd, options.configFileName ?? 'reflow.config.ts');

    if (fs.existsSync(configPath) && !options.force) {
        logger.warn(`Config already exists at ${configPath} (use --force to overwrite)`);
        return {configPath, written: false};
    }

    writeFileSafeSync(configPath, DEFAULT_CONFIG_TS);
    logger.info(`Wrote ${configPath}`);
    return {configPath, written: true};
}
