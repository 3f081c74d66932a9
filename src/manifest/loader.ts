import * as path from 'path';
import fs from 'fs-extra';
import type { LogLevel } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { manifestLogger } from '../utils/logger.js';
import { parseSemanticManifest } from './parser.js';
import type { SemanticManifest } from './schema.js';

export const STDIN_SOURCE = '-';

export interface LoadManifestOptions {
  readStdin?: () => Promise<string>;
  proxyMetricLogLevel?: LogLevel;
}

export function readProcessStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data));
    process.stdin.on('error', reject);
  });
}

/**
 * Reads a semantic manifest from a file path, or from stdin when the source
 * is `-`, and parses it.
 */
export async function loadSemanticManifestFromSource(
  manifestSource: string,
  options: LoadManifestOptions = {},
): Promise<SemanticManifest> {
  const source = manifestSource.trim();
  let rawContents: string;

  if (source === STDIN_SOURCE) {
    rawContents = await (options.readStdin ?? readProcessStdin)();
    if (!rawContents.trim()) {
      throw new InvalidArgumentError(
        'stdin is empty; pass a semantic manifest JSON string or file.',
        'semantic-manifest',
      );
    }
    manifestLogger.debug('Read semantic manifest from stdin', { bytes: rawContents.length });
  } else {
    const manifestPath = path.resolve(source);
    if (!(await fs.pathExists(manifestPath))) {
      throw new InvalidArgumentError(`Semantic manifest not found: ${manifestPath}`, 'semantic-manifest');
    }
    rawContents = await fs.readFile(manifestPath, 'utf-8');
    manifestLogger.debug('Read semantic manifest file', { path: manifestPath, bytes: rawContents.length });
  }

  const manifest = parseSemanticManifest(rawContents, {
    proxyMetricLogLevel: options.proxyMetricLogLevel ?? 'error',
  });
  manifestLogger.info('Parsed semantic manifest', {
    semanticModels: manifest.semantic_models.length,
    metrics: manifest.metrics.length,
  });
  return manifest;
}
