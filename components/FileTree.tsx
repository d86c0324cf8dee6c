import React, { useState } from 'react';
import { FileNode } from '../types';
import { fileExtension } from '../services/context';
import { ChevronDown, ChevronRight, File, FileCode, FileJson, FileText, Folder, FolderOpen, LucideIcon } from 'lucide-react';

interface FileTreeProps {
  nodes: FileNode[];
  onSelectFile: (path: string) => void;
  selectedPath: string | null;
  disabled?: boolean;
}

interface RowProps {
  node: FileNode;
  depth: number;
  selectedPath: string | null;
  disabled: boolean;
  onSelectFile: (path: string) => void;
}

const ICONS: Record<string, [LucideIcon, string]> = {
  json: [FileJson, 'text-yellow-400'],
  md: [FileText, 'text-gray-300'],
  txt: [FileText, 'text-gray-300'],
  rst: [FileText, 'text-gray-300'],
};
['ts', 'tsx', 'js', 'jsx', 'py', 'go', 'rs', 'java', 'rb', 'c', 'cpp', 'h', 'cs', 'php', 'kt', 'swift'].forEach(ext => {
  ICONS[ext] = [FileCode, 'text-blue-400'];
});

const FileIcon = ({ path }: { path: string }) => {
  const [Icon, color] = ICONS[fileExtension(path)] ?? [File, 'text-gray-400'];
  return <Icon size={16} className={`shrink-0 ${color}`} />;
};

const rowClass = (selected: boolean) =>
  `w-full flex items-center gap-1.5 py-1 pr-2 text-sm text-left rounded transition-colors disabled:opacity-60 ${
    selected ? 'bg-blue-900/40 text-blue-200' : 'hover:bg-gray-800 text-gray-300'
  }`;

const indent = (depth: number) => ({ paddingLeft: `${depth * 12 + 8}px` });

const FolderRow: React.FC<RowProps> = (props) => {
  const { node, depth, selectedPath } = props;
  // Folders holding the selected file start expanded.
  const [isOpen, setIsOpen] = useState(() => selectedPath?.startsWith(`${node.path}/`) ?? false);
  const Icon = isOpen ? FolderOpen : Folder;
  const Chevron = isOpen ? ChevronDown : ChevronRight;

  return (
    <>
      <button type="button" aria-expanded={isOpen} onClick={() => setIsOpen(open => !open)} className={rowClass(false)} style={indent(depth)}>
        <Chevron size={14} className="shrink-0 text-gray-500" />
        <Icon size={16} className="shrink-0 text-yellow-500" />
        <span className="truncate">{node.name}</span>
      </button>
      {isOpen && node.children?.map(child => <TreeRow key={child.path} {...props} node={child} depth={depth + 1} />)}
    </>
  );
};

const TreeRow: React.FC<RowProps> = (props) => {
  const { node, depth, selectedPath, disabled, onSelectFile } = props;
  if (node.type === 'tree') return <FolderRow {...props} />;

  const selected = node.path === selectedPath;
  return (
    <button
      type="button"
      title={node.path}
      aria-current={selected ? 'true' : undefined}
      disabled={disabled}
      onClick={() => onSelectFile(node.path)}
      className={rowClass(selected)}
      style={indent(depth)}
    >
      <FileIcon path={node.path} />
      <span className="truncate">{node.name}</span>
    </button>
  );
};

const FileTree: React.FC<FileTreeProps> = ({ nodes, onSelectFile, selectedPath, disabled = false }) => (
  <div className="flex flex-col select-none pb-4">
    {nodes.map(node => (
      <TreeRow key={node.path} node={node} depth={0} selectedPath={selectedPath} disabled={disabled} onSelectFile={onSelectFile} />
    ))}
  </div>
);

export default FileTree;
