export interface RepositorySource {
  url: string;
  accessToken?: string;
}

export interface RepoDetails {
  owner: string;
  name: string;
  description: string | null;
  defaultBranch: string;
  stars: number;
  htmlUrl: string;
}

export interface FileEntry {
  path: string;
  content: string;
}

export interface RepositorySnapshot {
  details: RepoDetails;
  files: FileEntry[];
  skipped: string[]; // binary, undecodable or unreadable paths
  truncated: boolean;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  text: string;
}

export interface Notice {
  kind: 'info' | 'success' | 'error';
  text: string;
}

export interface Session {
  source: RepositorySource | null;
  repo: RepoDetails | null;
  files: FileEntry[];
  skipped: string[];
  selectedPath: string | null;
  context: string;
  turns: ChatTurn[];
  notice: Notice | null;
}

export interface FileNode {
  path: string;
  name: string;
  type: 'blob' | 'tree';
  children?: FileNode[];
}
