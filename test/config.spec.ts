// test/config.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadReflowConfig } from '../src/core/config-loader';
import { initConfig } from '../src/core/init';
import { ConfigError, DEFAULT_CONFIG, resolveConfig, validateConfig } from '../src/schema';
import { defaultLogger } from '../src/util/logger';

describe('validateConfig', () => {
    it('accepts every known option', () => {
        const config = {
            maxLineWidth: 100,
            indentUnit: '\t',
            include: ['src/**/*.cdc'],
            ignore: [],
            insertFinalNewline: false,
        };
        expect(validateConfig(config)).toEqual(config);
    });

    it('drops undefined values', () => {
        expect(validateConfig({ maxLineWidth: undefined })).toEqual({});
    });

    it('rejects values of the wrong shape', () => {
        expect(() => validateConfig('nope')).toThrow('config must export an object');
        expect(() => validateConfig({ maxLineWidth: 0 })).toThrow(
            'Invalid config "maxLineWidth": expected a positive integer',
        );
        expect(() => validateConfig({ indentUnit: '\t\t' })).toThrow(
            'Invalid config "indentUnit": expected one or more spaces, or a single tab',
        );
        expect(() => validateConfig({ include: ['a', 1] })).toThrow(
            'Invalid config "include": expected an array of strings',
        );
        expect(() => validateConfig({ insertFinalNewline: 'yes' })).toThrow(
            'Invalid config "insertFinalNewline": expected a boolean',
        );
    });

    it('names the key for a value of the wrong type', () => {
        expect(() => validateConfig({ indentUnit: 2 })).toThrow(
            'Invalid config "indentUnit": expected one or more spaces, or a single tab',
        );
        expect(() => validateConfig({ ignore: 'dist' })).toThrow('Invalid config "ignore": expected an array of strings');
        expect(() => validateConfig(null)).toThrow('config must export an object');
        expect(() => validateConfig([])).toThrow('config must export an object');
    });

    it('names an unknown option', () => {
        try {
            validateConfig({ lineWidth: 80 });
            throw new Error('expected a ConfigError');
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            if (!(err instanceof ConfigError)) return;
            expect(err.key).toBe('lineWidth');
            expect(err.message).toBe('Invalid config "lineWidth": unknown option');
        }
    });
});

describe('resolveConfig', () => {
    it('fills in defaults', () => {
        expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('lets later layers win but not with undefined', () => {
        const resolved = resolveConfig({ maxLineWidth: 100, indentUnit: '  ' }, { maxLineWidth: 120, indentUnit: undefined });
        expect(resolved.maxLineWidth).toBe(120);
        expect(resolved.indentUnit).toBe('  ');
        expect(resolved.include).toEqual(['**/*.cdc']);
    });
});

describe('loadReflowConfig', () => {
    let tmpDir: string;
    const level = defaultLogger.getLevel();

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reflow-config-test-'));
        defaultLogger.setLevel('silent');
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
        defaultLogger.setLevel(level);
    });

    it('returns an empty config when there is no file', async () => {
        await expect(loadReflowConfig(tmpDir)).resolves.toEqual({ config: {}, configPath: null });
    });

    it('loads an ES module config', async () => {
        const file = path.join(tmpDir, 'reflow.config.mjs');
        fs.writeFileSync(file, 'export default { maxLineWidth: 100 };\n', 'utf8');

        await expect(loadReflowConfig(tmpDir)).resolves.toEqual({
            config: { maxLineWidth: 100 },
            configPath: file,
        });
    });

    it('transpiles a TypeScript config', async () => {
        const file = path.join(tmpDir, 'reflow.config.ts');
        fs.writeFileSync(
            file,
            "const width: number = 60;\nexport default { maxLineWidth: width, indentUnit: '  ' };\n",
            'utf8',
        );

        const { config } = await loadReflowConfig(tmpDir);
        expect(config).toEqual({ maxLineWidth: 60, indentUnit: '  ' });
    });

    it('rejects a missing explicit path', async () => {
        await expect(loadReflowConfig(tmpDir, { configPath: 'custom.config.mjs' })).rejects.toThrow(
            `Config file not found: ${path.join(tmpDir, 'custom.config.mjs')}`,
        );
    });

    it('rejects an invalid value', async () => {
        fs.writeFileSync(path.join(tmpDir, 'reflow.config.mjs'), 'export default { indentUnit: 2 };\n', 'utf8');
        await expect(loadReflowConfig(tmpDir)).rejects.toBeInstanceOf(ConfigError);
    });

    it('writes a starter config that loads as empty', async () => {
        const first = initConfig(tmpDir);
        expect(first).toEqual({ configPath: path.join(tmpDir, 'reflow.config.ts'), written: true });

        fs.writeFileSync(first.configPath, 'export default {};\n', 'utf8');
        expect(initConfig(tmpDir).written).toBe(false);
        expect(fs.readFileSync(first.configPath, 'utf8')).toBe('export default {};\n');

        expect(initConfig(tmpDir, { force: true }).written).toBe(true);
        const { config } = await loadReflowConfig(tmpDir);
        expect(config).toEqual({});
    });
});
