import fs from 'node:fs';
import path from 'node:path';
import type { EditorTarget } from '@shared/types';
import { logger } from '@shared/logger';
import languageTable from './data/languages.json';
import { FALLBACK_LANGUAGE } from './defaults';

const EXTENSION_LANGUAGES: Record<string, string> = languageTable;
const URI_SCHEME = /^([a-z][a-z0-9+.-]+):\/\//i;

export type ResolvedTarget = {
  projectPath: string;
  projectName: string;
  language: string;
};

/** Strips a `file://` prefix; null for any other scheme (remote or virtual files). */
export function toLocalPath(filePath: string): string | null {
  const scheme = URI_SCHEME.exec(filePath);
  if (!scheme) return filePath;
  if (scheme[1].toLowerCase() !== 'file') return null;
  try {
    return decodeURIComponent(new URL(filePath).pathname);
  } catch {
    return null;
  }
}

/**
 * Whether an editor event on `target` counts as coding activity: the file must be on
 * the local file system and writable. Never throws.
 */
export function isCountableActivity(target: EditorTarget | null | undefined): boolean {
  if (!target?.filePath || !target.projectPath) return false;
  const localPath = toLocalPath(target.filePath);
  if (!localPath) return false;
  try {
    if (!fs.statSync(localPath).isFile()) return false;
    fs.accessSync(localPath, fs.constants.W_OK);
    return true;
  } catch (error) {
    logger.debug('Ignoring activity on unavailable or read-only file', localPath, error);
    return false;
  }
}

export function resolveLanguage(filePath: string): string {
  const base = path.basename(filePath).toLowerCase();
  if (base === 'dockerfile') return EXTENSION_LANGUAGES.dockerfile ?? FALLBACK_LANGUAGE;
  const extension = path.extname(base).slice(1);
  return (extension && EXTENSION_LANGUAGES[extension]) || FALLBACK_LANGUAGE;
}

/** Normalised project key; trailing separators are dropped so `/a/b/` and `/a/b` match. */
export function normalizeProjectPath(projectPath: string): string {
  const normalized = path.normalize(projectPath);
  const root = path.parse(normalized).root;
  return normalized.length > root.length ? normalized.replace(/[\\/]+$/, '') : normalized;
}

export function resolveTarget(target: EditorTarget): ResolvedTarget {
  const projectPath = normalizeProjectPath(target.projectPath);
  const projectName = target.projectName?.trim() || path.basename(projectPath) || projectPath;
  const language = target.language?.trim() || resolveLanguage(target.filePath);
  return { projectPath, projectName, language };
}
