import { aggregate, fileExtension, formatFileBlock } from './context';
import { FileEntry } from '../types';

const files: FileEntry[] = [
  { path: 'b.py', content: 'print(2)' },
  { path: 'a.py', content: 'print(1)' },
];

describe('aggregate', () => {
  it('concatenates every file in lexicographic path order', () => {
    expect(aggregate(files)).toBe(
      '--- FILE: a.py (py) ---\n```py\nprint(1)\n```\n\n--- FILE: b.py (py) ---\n```py\nprint(2)\n```'
    );
  });

  it('returns exactly the selected file content', () => {
    expect(aggregate(files, 'b.py')).toBe('print(2)');
    expect(aggregate(files, 'b.py')).toBe(aggregate(files, 'b.py'));
  });

  it('falls back to the whole repository for a path that is not loaded', () => {
    expect(aggregate(files, 'missing.py')).toBe(aggregate(files));
    expect(aggregate(files, null)).toBe(aggregate(files));
  });

  it('returns an empty string for no files', () => {
    expect(aggregate([])).toBe('');
    expect(aggregate([], 'a.py')).toBe('');
  });

  it('does not reorder the caller\'s array', () => {
    aggregate(files);
    expect(files.map(f => f.path)).toEqual(['b.py', 'a.py']);
  });
});

describe('fileExtension', () => {
  it('uses the lower-cased extension of the file name', () => {
    expect(fileExtension('src/App.TSX')).toBe('tsx');
    expect(fileExtension('lib/v1.2/index.js')).toBe('js');
  });

  it('falls back to plaintext', () => {
    expect(fileExtension('Makefile')).toBe('plaintext');
    expect(fileExtension('.gitignore')).toBe('plaintext');
  });
});

describe('formatFileBlock', () => {
  it('fences the content with the file extension', () => {
    expect(formatFileBlock({ path: 'docs/notes', content: 'hello' })).toBe('--- FILE: docs/notes (plaintext) ---\n```plaintext\nhello\n```');
  });
});
