import { z } from 'zod';
import { FileEntry, RepoDetails, RepositorySnapshot, RepositorySource } from '../types';
import { InvalidUrlError, NetworkError, NotFoundError, RateLimitError, ResponseShapeError } from './errors';

const GITHUB_API_BASE = 'https://api.github.com';
// Not metered by the REST API quota
const GITHUB_RAW_BASE = 'https://raw.githubusercontent.com';

// Extensions that are never worth downloading as text.
const BINARY_EXTENSIONS = new Set([
  'png', 'jpg', 'jpeg', 'gif', 'bmp', 'ico', 'webp', 'pdf', 'zip', 'gz', 'tgz',
  'jar', 'exe', 'dll', 'so', 'dylib', 'woff', 'woff2', 'ttf', 'otf', 'eot',
  'mp3', 'mp4', 'mov', 'wav', 'class', 'pyc', 'wasm',
]);

const RepoResponseSchema = z.object({
  name: z.string(),
  owner: z.object({ login: z.string() }),
  description: z.string().nullable(),
  default_branch: z.string(),
  stargazers_count: z.number(),
  html_url: z.string(),
});

const TreeResponseSchema = z.object({
  tree: z.array(z.object({
    path: z.string(),
    type: z.string(),
    sha: z.string(),
    url: z.string().optional(),
  })),
  truncated: z.boolean().default(false),
});

const BlobResponseSchema = z.object({
  content: z.string(),
  encoding: z.string(),
});

export const parseRepoUrl = (url: string): { owner: string; repo: string } | null => {
  let urlObj: URL;
  try {
    urlObj = new URL(url.trim());
  } catch {
    return null;
  }
  if (urlObj.hostname !== 'github.com' && urlObj.hostname !== 'www.github.com') return null;
  const parts = urlObj.pathname.split('/').filter(Boolean);
  if (parts.length < 2) return null;
  const repo = parts[1].replace(/\.git$/, '');
  if (!repo) return null;
  return { owner: parts[0], repo };
};

const authHeaders = (token?: string): Record<string, string> => ({
  Accept: 'application/vnd.github.v3+json',
  ...(token ? { Authorization: `Bearer ${token}` } : {}),
});

// 403 with retry-after is GitHub's secondary rate limit
const isRateLimited = (response: Response): boolean =>
  response.status === 429 ||
  (response.status === 403 &&
    (response.headers.get('x-ratelimit-remaining') === '0' || response.headers.get('retry-after') !== null));

const rateLimitReset = (response: Response): Date | null => {
  const reset = Number(response.headers.get('x-ratelimit-reset'));
  if (Number.isFinite(reset) && reset > 0) return new Date(reset * 1000);
  const retryAfter = Number(response.headers.get('retry-after'));
  return Number.isFinite(retryAfter) && retryAfter > 0 ? new Date(Date.now() + retryAfter * 1000) : null;
};

const githubGet = async <S extends z.ZodTypeAny>(url: string, schema: S, token: string | undefined, what: string): Promise<z.infer<S>> => {
  let response: Response;
  try {
    response = await fetch(url, { headers: authHeaders(token) });
  } catch (e) {
    throw new NetworkError('GitHub', { cause: e });
  }

  if (isRateLimited(response)) throw new RateLimitError(rateLimitReset(response));
  if (response.status === 404 || response.status === 401 || response.status === 403) {
    throw new NotFoundError(what);
  }
  if (!response.ok) throw new NetworkError('GitHub', { status: response.status });

  let body: unknown;
  try {
    body = await response.json();
  } catch (e) {
    throw new ResponseShapeError(url, { cause: e });
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new ResponseShapeError(url, { cause: parsed.error });
  return parsed.data;
};

export const fetchRepoDetails = async (owner: string, repo: string, token?: string): Promise<RepoDetails> => {
  const data = await githubGet(`${GITHUB_API_BASE}/repos/${owner}/${repo}`, RepoResponseSchema, token, `Repository ${owner}/${repo}`);
  return {
    owner: data.owner.login,
    name: data.name,
    description: data.description,
    defaultBranch: data.default_branch,
    stars: data.stargazers_count,
    htmlUrl: data.html_url,
  };
};

export interface BlobRef {
  path: string;
  url: string;
}

export const fetchRepoTree = async (
  owner: string,
  repo: string,
  branch: string,
  token?: string
): Promise<{ blobs: BlobRef[]; truncated: boolean }> => {
  const data = await githubGet(
    `${GITHUB_API_BASE}/repos/${owner}/${repo}/git/trees/${encodeURIComponent(branch)}?recursive=1`,
    TreeResponseSchema,
    token,
    `Branch ${branch} of ${owner}/${repo}`
  );

  const blobs: BlobRef[] = [];
  data.tree.forEach(item => {
    if (item.type !== 'blob') return;
    blobs.push({
      path: item.path,
      url: item.url ?? `${GITHUB_API_BASE}/repos/${owner}/${repo}/git/blobs/${item.sha}`,
    });
  });
  blobs.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { blobs, truncated: data.truncated };
};

export const fileExtensionOf = (path: string): string => {
  const name = path.split('/').pop() ?? '';
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
};

export const looksBinary = (path: string): boolean => BINARY_EXTENSIONS.has(fileExtensionOf(path));

/** Strict UTF-8; null for invalid UTF-8 or anything containing a NUL byte. */
export const decodeTextBytes = (bytes: Uint8Array): string | null => {
  if (bytes.includes(0)) return null;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
};

export const decodeBlobContent = (content: string, encoding: string): string | null => {
  if (encoding !== 'base64') return encoding === 'utf-8' ? content : null;

  let binaryString: string;
  try {
    binaryString = atob(content.replace(/\s/g, ''));
  } catch {
    return null;
  }
  const bytes = new Uint8Array(binaryString.length);
  for (let i = 0; i < binaryString.length; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }
  return decodeTextBytes(bytes);
};

const encodePath = (path: string) => path.split('/').map(encodeURIComponent).join('/');

export const rawFileUrl = (details: RepoDetails, path: string): string =>
  `${GITHUB_RAW_BASE}/${details.owner}/${details.name}/${encodePath(details.defaultBranch)}/${encodePath(path)}`;

/** Authenticated loads go through the blob API, anonymous ones through raw.githubusercontent.com. */
export const fetchFileContent = async (blob: BlobRef, token?: string): Promise<string | null> => {
  const data = await githubGet(blob.url, BlobResponseSchema, token, `File ${blob.path}`);
  return decodeBlobContent(data.content, data.encoding);
};

export const fetchRawFileContent = async (details: RepoDetails, path: string): Promise<string | null> => {
  let response: Response;
  try {
    response = await fetch(rawFileUrl(details, path));
  } catch (e) {
    throw new NetworkError('GitHub', { cause: e });
  }
  if (isRateLimited(response)) throw new RateLimitError(rateLimitReset(response));
  if (!response.ok) throw new NetworkError('GitHub', { status: response.status });

  return decodeTextBytes(new Uint8Array(await response.arrayBuffer()));
};

/**
 * Loads every text file on the default branch. Files are fetched one at a
 * time; a file that fails to load is skipped, except on rate limiting or a
 * lost connection, which abort the whole load.
 */
export const fetchRepository = async (source: RepositorySource): Promise<RepositorySnapshot> => {
  const parsed = parseRepoUrl(source.url);
  if (!parsed) throw new InvalidUrlError(source.url);

  const token = source.accessToken || undefined;
  const details = await fetchRepoDetails(parsed.owner, parsed.repo, token);
  const { blobs, truncated } = await fetchRepoTree(parsed.owner, parsed.repo, details.defaultBranch, token);
  if (truncated) {
    console.warn(`Tree of ${parsed.owner}/${parsed.repo} was truncated by GitHub; some files are missing.`);
  }

  const files: FileEntry[] = [];
  const skipped: string[] = [];

  for (const blob of blobs) {
    if (looksBinary(blob.path)) {
      skipped.push(blob.path);
      continue;
    }

    let content: string | null;
    try {
      content = token ? await fetchFileContent(blob, token) : await fetchRawFileContent(details, blob.path);
    } catch (e) {
      if (e instanceof RateLimitError || (e instanceof NetworkError && e.status === null)) throw e;
      console.warn(`Skipping ${blob.path}`, e);
      content = null;
    }

    if (content === null) {
      skipped.push(blob.path);
    } else {
      files.push({ path: blob.path, content });
    }
  }

  return { details, files, skipped, truncated };
};

export const fetchRepositoryFiles = async (url: string, token?: string): Promise<FileEntry[]> => {
  const snapshot = await fetchRepository({ url, accessToken: token });
  return snapshot.files;
};

export const blobPageUrl = (details: RepoDetails, path: string): string =>
  `${details.htmlUrl}/blob/${details.defaultBranch}/${encodePath(path)}`;
