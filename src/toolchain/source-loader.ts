/**
 * @fileoverview File access for the driver, reporting failures as
 * FileResolutionError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileResolutionError } from '../bbcx/errors';

export function readSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw FileResolutionError.unreadable(filePath, err);
  }
}

/** Raw bytes for PIN and READ */
export function readInput(filePath: string): Uint8Array {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    throw FileResolutionError.unreadable(filePath, err);
  }
}

/** Writes text, creating the parent directory when needed */
export function writeArtifact(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw FileResolutionError.unwritable(filePath, err);
  }
}
