// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return path.resolve(dirPath);
}

/**
 * Write a UTF-8 file, creating parent directories if needed.
 */
export function writeFileSafeSync(filePath: string, contents: string): void {
   ensureDirSync(path.dirname(filePath));
   fs.writeFileSync(filePath, contents, 'utf8');
}
