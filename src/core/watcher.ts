// src/core/watcher.ts

import path from 'path';
import chokidar, { type FSWatcher } from 'chokidar';
import { minimatch } from 'minimatch';
import { formatFile } from './format';
import type { ResolvedReflowConfig } from '../schema';
import { toPosixPath } from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';

export interface WatchOptions {
    config: ResolvedReflowConfig;

    /**
     * Files or directories to watch, relative to cwd.
     *
     * Default: ['.']
     */
    paths?: string[];

    /**
     * Log desynchronizations of each re-format.
     */
    report?: boolean;

    /**
     * Debounce delay in milliseconds between detected changes
     * and a re-format.
     *
     * Default: 150 ms
     */
    debounceMs?: number;

    /**
     * Optional logger; falls back to defaultLogger.child('[watch]').
     */
    logger?: Logger;
}

export interface SourceWatcher {
    watcher: FSWatcher;
    /** Cancel pending re-formats and stop watching. */
    close(): Promise<void>;
}

/**
 * Watch source files and write them back formatted whenever they change.
 *
 * Directories are filtered in-process with the config's include/ignore
 * globs; files named explicitly are always formatted.
 */
export function watchSources(cwd: string, options: WatchOptions): SourceWatcher {
    const logger = options.logger ?? defaultLogger.child('[watch]');
    const absCwd = path.resolve(cwd);
    const targets = (options.paths ?? ['.']).map((p) => path.resolve(absCwd, p));
    const debounceMs = options.debounceMs ?? 150;

    const timers = new Map<string, NodeJS.Timeout>();

    function isInteresting(filePath: string): boolean {
        if (targets.includes(filePath)) return true;
        const rel = toPosixPath(path.relative(absCwd, filePath));
        if (rel.startsWith('..')) return false;
        const matches = (patterns: string[]) =>
            patterns.some((pattern) => minimatch(rel, pattern, { dot: true }));
        return matches(options.config.include) && !matches(options.config.ignore);
    }

    function run(filePath: string) {
        timers.delete(filePath);
        try {
            const outcome = formatFile(filePath, {
                config: options.config,
                write: true,
                report: options.report,
                cwd: absCwd,
                logger,
            });
            if (outcome.status === 'changed') {
                logger.info(`Formatted ${toPosixPath(path.relative(absCwd, filePath))}`);
            }
        } catch (err) {
            logger.error(`Formatting ${filePath} failed:`, err);
        }
    }

    function scheduleRun(filePath: string) {
        const existing = timers.get(filePath);
        if (existing) clearTimeout(existing);
        timers.set(filePath, setTimeout(() => run(filePath), debounceMs));
    }

    logger.info(`Watching ${targets.map((t) => toPosixPath(path.relative(absCwd, t)) || '.').join(', ')}`);

    const watcher = chokidar.watch(targets, {
        ignoreInitial: true,
        persistent: true,
    });

    watcher
        .on('all', (event, filePath) => {
            if (event !== 'add' && event !== 'change') return;
            const absPath = path.resolve(absCwd, filePath);
            if (!isInteresting(absPath)) return;
            logger.debug(`Event ${event} on ${filePath}`);
            scheduleRun(absPath);
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    return {
        watcher,
        async close() {
            for (const timer of timers.values()) clearTimeout(timer);
            timers.clear();
            await watcher.close();
        },
    };
}
