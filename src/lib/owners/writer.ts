/**
 * Output file writer
 *
 * Writes go to a temp file beside the target and are renamed into place, so
 * an interrupted run never leaves a half-written owners.yaml or sigs.yaml.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { OwnersErrorCode, OwnersReportError, errorMessage } from './errors.js';

/**
 * Write a text file atomically, creating parent directories
 */
export function writeTextAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.tmp`);

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tempPath, content);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    throw new OwnersReportError(
      OwnersErrorCode.OWNERS_WRITE_ERROR,
      `Failed to write ${filePath}: ${errorMessage(error)}`,
      filePath
    );
  }
}

/**
 * Write to stdout for '-', otherwise to a file
 */
export function writeOutput(target: string, content: string): void {
  if (target === '-') {
    process.stdout.write(content);
    return;
  }
  writeTextAtomic(target, content);
}
