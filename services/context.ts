import { FileEntry } from '../types';
import { fileExtensionOf } from './github';

export const fileExtension = (path: string): string => fileExtensionOf(path) || 'plaintext';

const byPath = (a: FileEntry, b: FileEntry) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

export const formatFileBlock = (file: FileEntry): string => {
  const ext = fileExtension(file.path);
  return `--- FILE: ${file.path} (${ext}) ---\n\`\`\`${ext}\n${file.content}\n\`\`\``;
};

/**
 * Builds the text handed to the model: the selected file's content alone, or
 * every file as a fenced block in path order when nothing (or an unknown
 * path) is selected.
 */
export const aggregate = (files: FileEntry[], selectedPath?: string | null): string => {
  if (selectedPath) {
    const selected = files.find(f => f.path === selectedPath);
    if (selected) return selected.content;
  }
  return [...files].sort(byPath).map(formatFileBlock).join('\n\n');
};
