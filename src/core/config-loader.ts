// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import { ConfigError, validateConfig, type ReflowConfig } from '../schema';
import { defaultLogger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

export const CONFIG_FILE_CANDIDATES = [
   'reflow.config.ts',
   'reflow.config.mts',
   'reflow.config.mjs',
   'reflow.config.js',
   'reflow.config.cjs',
];

export interface LoadReflowConfigOptions {
   /**
    * Optional explicit config file path (absolute or relative to cwd).
    * If not provided, we look for reflow.config.* in cwd.
    */
   configPath?: string;
}

export interface LoadReflowConfigResult {
   /**
    * Parsed configuration; empty when no config file exists.
    */
   config: ReflowConfig;

   /**
    * Absolute path of the file the config came from, or null.
    */
   configPath: string | null;
}

/**
 * Load reflow configuration for a working directory.
 *
 * - An explicit `configPath` must exist.
 * - Otherwise the first reflow.config.* found in cwd is used; having none is
 *   fine and yields an empty config.
 */
export async function loadReflowConfig(
   cwd: string,
   options: LoadReflowConfigOptions = {},
): Promise<LoadReflowConfigResult> {
   const absCwd = path.resolve(cwd);

   let configPath: string | null;
   if (options.configPath) {
      configPath = path.resolve(absCwd, options.configPath);
      if (!fs.existsSync(configPath)) {
         throw new ConfigError(`Config file not found: ${configPath}`);
      }
   } else {
      configPath = resolveConfigPath(absCwd);
   }

   if (!configPath) {
      logger.debug(`No config file in ${absCwd}, using defaults`);
      return { config: {}, configPath: null };
   }

   const config = validateConfig(await importConfig(configPath));
   logger.debug(`Loaded config from ${configPath}`);
   return { config, configPath };
}

export function resolveConfigPath(dir: string): string | null {
   for (const file of CONFIG_FILE_CANDIDATES) {
      const full = path.join(dir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return null;
}

/**
 * Import a config module from the given path and return its default export
 * (or the module namespace when there is none).
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   const url =
      ext === '.ts' || ext === '.mts'
         ? pathToFileURL(await transpileTsConfig(configPath)).href
         : pathToFileURL(configPath).href;

   const mod: unknown = await import(url);
   if (typeof mod === 'object' && mod !== null && 'default' in mod) {
      return mod.default;
   }
   return mod;
}

/**
 * Transpile a TS config file to ESM with esbuild and return the compiled
 * file's path. Cached by (path + mtime) so edits invalidate the temp file.
 */
async function transpileTsConfig(configPath: string): Promise<string> {
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'reflow-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const source = fs.readFileSync(configPath, 'utf8');
      const result = await transform(source, {
         loader: 'ts',
         format: 'esm',
         sourcemap: 'inline',
         sourcefile: configPath,
         target: 'node20',
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return tmpFile;
}
