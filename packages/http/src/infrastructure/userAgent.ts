import { VERSION } from '../version.js';

const SDK_NAME = 'geobatch-node';

/**
 * `geobatch-node/<version> Node/<node version>`, followed by the caller's
 * comment with any parentheses removed.
 */
export function buildUserAgent(comment?: string, nodeVersion: string = process.versions.node): string {
  const base = `${SDK_NAME}/${VERSION} Node/${nodeVersion}`;
  const trimmed = comment?.trim() ?? '';
  if (trimmed === '') return base;
  return `${base} ${trimmed.replace(/[()]/g, '')}`;
}
