/**
 * @fileoverview Output file naming for listings and traces.
 */

import * as path from 'path';

/** Extension of listing files */
export const LISTING_EXTENSION = '.lst';
/** Extension of trace files */
export const TRACE_EXTENSION = '.out';

/**
 * Path of an artifact derived from a source file: the source's stem with a
 * new extension, beside the source or inside outputDir.
 *
 * @example artifactPath('progs/sum.bbx', '.lst') === 'progs/sum.lst'
 */
export function artifactPath(sourcePath: string, extension: string, outputDir?: string): string {
  const parsed = path.parse(sourcePath);
  const dir = outputDir !== undefined && outputDir !== '' ? outputDir : parsed.dir;
  return path.join(dir, `${parsed.name}${extension}`);
}
