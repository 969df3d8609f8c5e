import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { Resource, normalizeResource } from './resource';
import { ScanError, errorMessage, isScanError } from './errors';
import { findManifestFiles, readFileContent } from './utils/file-utils';
import { WarningHandler, logWarning } from './utils/logger';

export interface LoadOptions {
  /** Receives per-file problems found while walking a directory. Defaults to logWarning. */
  onWarning?: WarningHandler;
}

function isEmptyDocument(document: unknown): boolean {
  if (document === null || document === undefined) return true;
  return typeof document === 'object' && !Array.isArray(document) && Object.keys(document).length === 0;
}

/**
 * Decode a multi-document YAML string. Empty documents are skipped; a document that
 * is not a mapping fails the whole string, like a syntax error does.
 */
export function parseManifest(content: string): Resource[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content);
  } catch (err) {
    throw new ScanError('DECODE_FAILED', `failed to decode YAML: ${errorMessage(err)}`, { cause: err });
  }

  const resources: Resource[] = [];
  documents.forEach((document, index) => {
    if (isEmptyDocument(document)) return;

    let resource: Resource | undefined;
    try {
      resource = normalizeResource(document);
    } catch (err) {
      if (isScanError(err)) throw err.withContext(`failed to decode YAML: document ${index + 1}`);
      throw err;
    }
    if (!resource) {
      throw new ScanError('DECODE_FAILED', `failed to decode YAML: document ${index + 1} is not a mapping`);
    }
    resources.push(resource);
  });
  return resources;
}

function readManifestFile(filePath: string): Resource[] {
  let content: string;
  try {
    content = readFileContent(filePath);
  } catch (err) {
    throw new ScanError('READ_FAILED', `failed to read file: ${errorMessage(err)}`, { cause: err });
  }
  return parseManifest(content);
}

/** Explicitly named file: any failure aborts the run. */
export function loadManifestFile(filePath: string): Resource[] {
  try {
    return readManifestFile(filePath);
  } catch (err) {
    if (isScanError(err)) throw err.withContext(filePath);
    throw err;
  }
}

/** Walked directory: a file that fails to load is reported and skipped. */
export function loadManifestDirectory(dir: string, options: LoadOptions = {}): Resource[] {
  const onWarning = options.onWarning ?? logWarning;
  const resources: Resource[] = [];

  for (const file of findManifestFiles(dir)) {
    try {
      resources.push(...readManifestFile(file));
    } catch (err) {
      if (!isScanError(err)) throw err;
      onWarning(`failed to parse ${file}: ${err.message}`);
    }
  }
  return resources;
}

/**
 * Load every resource from a list of files and directories, in argument order.
 * Unsupported kinds are kept; the scanner skips them.
 */
export function loadManifests(paths: readonly string[], options: LoadOptions = {}): Resource[] {
  const resources: Resource[] = [];

  for (const target of paths) {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(target);
    } catch (err) {
      throw new ScanError('PATH_NOT_FOUND', `failed to stat ${target}: ${errorMessage(err)}`, { cause: err });
    }

    if (stat.isDirectory()) {
      resources.push(...loadManifestDirectory(target, options));
    } else {
      resources.push(...loadManifestFile(target));
    }
  }
  return resources;
}
