import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Write a UTF-8 file, creating missing parent directories. Existing files
 * are overwritten.
 */
export function writeFileSafe(filePath: string, content: string): void {
  ensureDirSync(dirname(filePath));
  writeFileSync(filePath, content, 'utf-8');
}
