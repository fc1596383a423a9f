// src/core/format.ts
import fs from 'fs';
import path from 'path';
import {minimatch} from 'minimatch';
import pluralize from 'pluralize';
import {formatParseFailure, parseProgram, renderProgram, type Diagnostic} from '../ast';
import {defineDialect, reconcileWithReport, type ReconcileReport} from '../reconcile';
import {resolveConfig, type ReflowConfig, type ResolvedReflowConfig} from '../schema';
import {toPosixPath} from '../util/fs-utils';
import {defaultLogger, type Logger} from '../util/logger';

const moduleLogger = defaultLogger.child('[format]');

export type FormatSourceOptions = Pick<ReflowConfig, 'maxLineWidth' | 'indentUnit' | 'insertFinalNewline'>;

export type FormatSourceResult =
    | {ok: true; text: string; report: ReconcileReport}
    | {ok: false; message: string; diagnostics: Diagnostic[]};

/**
 * Parse, render and reconcile one source text.
 */
export function formatSource(code: string, options: FormatSourceOptions = {}): FormatSourceResult {
    const {maxLineWidth, indentUnit, insertFinalNewline} = resolveConfig(options);

    const {program, diagnostics} = parseProgram(code);
    if (!program) {
        return {ok: false, message: formatParseFailure(diagnostics), diagnostics};
    }

    let rendered: string;
    try {
        rendered = renderProgram(program, {maxLineWidth, indentUnit});
    } catch (err) {
        // Left-leaning chains (`a.b.c...`) are not bounded by the parser's nesting limit.
        if (!(err instanceof RangeError)) throw err;
        const diagnostic: Diagnostic = {
            line: 1,
            message: 'expression nested too deeply',
            severity: 'error',
            code: 'nesting-depth',
        };
        return {ok: false, message: formatParseFailure([diagnostic]), diagnostics: [diagnostic]};
    }

    const {text, report} = reconcileWithReport(code, rendered, {
        dialect: defineDialect({indentUnit}),
    });

    return {
        ok: true,
        text: insertFinalNewline && text !== '' && !text.endsWith('\n') ? `${text}\n` : text,
        report,
    };
}

/**
 * Formatted code, or the parse failure message in its place.
 */
export function prettyCode(code: string, maxLineWidth = 80): string {
    const result = formatSource(code, {maxLineWidth, insertFinalNewline: false});
    return result.ok ? result.text : result.message;
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

/**
 * Expand CLI inputs into source files.
 *
 * - A file is taken as given.
 * - A directory is walked; files are kept when their path relative to `cwd`
 *   matches `include` and no `ignore` pattern.
 */
export function resolveSourceFiles(
    cwd: string,
    inputs: string[],
    config: Pick<ResolvedReflowConfig, 'include' | 'ignore'>,
): string[] {
    const absCwd = path.resolve(cwd);
    const found = new Set<string>();

    const relative = (absPath: string) => toPosixPath(path.relative(absCwd, absPath));
    const matchesAny = (rel: string, patterns: string[]) =>
        patterns.some((pattern) => minimatch(rel, pattern, {dot: true}));

    function walk(dir: string) {
        const dirents = fs.readdirSync(dir, {withFileTypes: true});
        dirents.sort((a, b) => a.name.localeCompare(b.name));

        for (const dirent of dirents) {
            const absPath = path.join(dir, dirent.name);
            const rel = relative(absPath);
            if (matchesAny(rel, config.ignore)) continue;

            if (dirent.isDirectory()) {
                walk(absPath);
            } else if (dirent.isFile() && matchesAny(rel, config.include)) {
                found.add(absPath);
            }
        }
    }

    for (const input of inputs) {
        const absPath = path.resolve(absCwd, input);
        const stat = fs.statSync(absPath, {throwIfNoEntry: false});
        if (!stat) {
            throw new Error(`No such file or directory: ${input}`);
        }
        if (stat.isDirectory()) {
            walk(absPath);
        } else {
            found.add(absPath);
        }
    }

    return [...found].sort();
}

export type FileStatus = 'unchanged' | 'changed' | 'failed';

export interface FileFormatOutcome {
    filePath: string;
    status: FileStatus;
    /** Formatted text; absent when the file failed to parse. */
    formatted?: string;
    /** Parse failure message. */
    message?: string;
    report?: ReconcileReport;
}

export interface FormatFilesOptions {
    config: ResolvedReflowConfig;
    /** Write changed files back to disk. */
    write?: boolean;
    /** Log each desynchronization as a warning. */
    report?: boolean;
    /** Paths in log lines are shown relative to this directory. */
    cwd?: string;
    logger?: Logger;
}

export interface FormatFilesSummary {
    files: FileFormatOutcome[];
    changed: number;
    unchanged: number;
    failed: number;
}

export function formatFile(filePath: string, options: FormatFilesOptions): FileFormatOutcome {
    const logger = options.logger ?? moduleLogger;
    const display = options.cwd ? toPosixPath(path.relative(options.cwd, filePath)) : filePath;

    const original = fs.readFileSync(filePath, 'utf8');
    const result = formatSource(original, options.config);

    if (!result.ok) {
        logger.error(`${display}: ${result.message}`);
        return {filePath, status: 'failed', message: result.message};
    }

    if (options.report) {
        for (const event of result.report.desyncs) {
            logger.warn(
                `${display}:${event.line}:${event.column}: comments may be misplaced ` +
                `(expected ${event.expected}, skipped ${event.skipped.join(' ') || 'nothing'})`,
            );
        }
    }

    const status: FileStatus = result.text === original ? 'unchanged' : 'changed';
    if (status === 'changed' && options.write) {
        fs.writeFileSync(filePath, result.text, 'utf8');
        logger.debug(`Wrote ${display}`);
    }

    return {filePath, status, formatted: result.text, report: result.report};
}

/**
 * Format each file in turn and log a one-line summary.
 */
export function formatFiles(files: string[], options: FormatFilesOptions): FormatFilesSummary {
    const logger = options.logger ?? moduleLogger;
    const outcomes = files.map((filePath) => formatFile(filePath, options));

    const count = (status: FileStatus) => outcomes.filter((o) => o.status === status).length;
    const summary: FormatFilesSummary = {
        files: outcomes,
        changed: count('changed'),
        unchanged: count('unchanged'),
        failed: count('failed'),
    };

    const verb = options.write ? 'reformatted' : 'would be reformatted';
    const parts = [
        `${pluralize('file', summary.changed, true)} ${verb}`,
        `${summary.unchanged} unchanged`,
    ];
    if (summary.failed > 0) {
        parts.push(`${summary.failed} failed`);
    }
    logger.info(parts.join(', '));

    return summary;
}
