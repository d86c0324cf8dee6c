/**
 * @jest-environment jsdom
 */
import { fireEvent, render, screen } from '@testing-library/react';
import FileTree from './FileTree';
import { buildFileTree } from '../services/fileTree';

const nodes = buildFileTree(['README.md', 'src/app.py', 'src/util/io.py']);

describe('FileTree', () => {
  it('shows top-level entries with folders collapsed', () => {
    render(<FileTree nodes={nodes} onSelectFile={jest.fn()} selectedPath={null} />);

    expect(screen.getAllByRole('button').map(b => b.textContent)).toEqual(['src', 'README.md']);
    expect(screen.getByRole('button', { name: 'src' }).getAttribute('aria-expanded')).toBe('false');
  });

  it('expands a folder and selects a file by path', () => {
    const onSelectFile = jest.fn();
    render(<FileTree nodes={nodes} onSelectFile={onSelectFile} selectedPath={null} />);

    fireEvent.click(screen.getByRole('button', { name: 'src' }));
    fireEvent.click(screen.getByRole('button', { name: 'app.py' }));

    expect(onSelectFile).toHaveBeenCalledWith('src/app.py');
    expect(screen.getByRole('button', { name: 'util' })).toBeTruthy();
  });

  it('opens the folders around the selected file and marks it', () => {
    render(<FileTree nodes={nodes} onSelectFile={jest.fn()} selectedPath="src/util/io.py" />);

    expect(screen.getByRole('button', { name: 'io.py' }).getAttribute('aria-current')).toBe('true');
    expect(screen.getByRole('button', { name: 'app.py' }).getAttribute('aria-current')).toBeNull();
  });

  it('does not select files while disabled but still browses folders', () => {
    const onSelectFile = jest.fn();
    render(<FileTree nodes={nodes} onSelectFile={onSelectFile} selectedPath={null} disabled />);

    fireEvent.click(screen.getByRole('button', { name: 'src' }));
    fireEvent.click(screen.getByRole('button', { name: 'app.py' }));

    expect(onSelectFile).not.toHaveBeenCalled();
    expect(screen.getByRole('button', { name: 'app.py' })).toHaveProperty('disabled', true);
  });
});
