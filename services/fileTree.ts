import { FileNode } from '../types';

const sortNodes = (nodes: FileNode[]) => {
  nodes.sort((a, b) => {
    if (a.type === b.type) return a.name.localeCompare(b.name);
    return a.type === 'tree' ? -1 : 1;
  });
  nodes.forEach(node => {
    if (node.children) sortNodes(node.children);
  });
};

/** Turns flat file paths into a folder hierarchy, folders first. */
export const buildFileTree = (paths: string[]): FileNode[] => {
  const tree: FileNode[] = [];
  const folders: Record<string, FileNode> = {};

  const folderFor = (folderPath: string): FileNode[] => {
    if (!folderPath) return tree;
    const existing = folders[folderPath];
    if (existing?.children) return existing.children;

    const parts = folderPath.split('/');
    const node: FileNode = { path: folderPath, name: parts[parts.length - 1], type: 'tree', children: [] };
    folders[folderPath] = node;
    folderFor(parts.slice(0, -1).join('/')).push(node);
    return node.children ?? [];
  };

  paths.forEach(path => {
    const parts = path.split('/');
    folderFor(parts.slice(0, -1).join('/')).push({
      path,
      name: parts[parts.length - 1],
      type: 'blob',
    });
  });

  sortNodes(tree);
  return tree;
};
