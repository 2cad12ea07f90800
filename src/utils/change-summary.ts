import type { ChangeSet } from '../types/common.js';
import { SUMMARY_FILES_PER_SECTION } from '../constants/ui.js';

export const CHANGE_SUMMARY_HEADER = 'Project changes:';

const section = (title: string, files: string[]): string => {
  const shown = files.slice(0, SUMMARY_FILES_PER_SECTION).map((file) => `- ${file}\n`);
  const hidden = files.length - SUMMARY_FILES_PER_SECTION;
  const overflow = hidden > 0 ? `... and ${hidden} more files\n` : '';
  return `${title}\n${shown.join('')}${overflow}`;
};

/**
 * Commit body listing what changed, five paths per section at most.
 * Renames count as additions of their new path. Returns null for a clean tree.
 */
export const buildChangeSummary = (changes: ChangeSet): string | null => {
  const added = [...changes.added, ...changes.renamed.map((r) => r.to)];

  if (added.length + changes.modified.length + changes.deleted.length === 0) {
    return null;
  }

  const sections: string[] = [];
  if (added.length > 0) sections.push(section('Added files:', added));
  if (changes.modified.length > 0) sections.push(section('Modified files:', changes.modified));
  if (changes.deleted.length > 0) sections.push(section('Deleted files:', changes.deleted));

  return `${CHANGE_SUMMARY_HEADER}\n\n${sections.join('\n')}`.trim();
};
