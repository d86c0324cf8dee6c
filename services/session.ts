import { RepositorySnapshot, RepositorySource, Session } from '../types';
import { AnswerScope, CodeAssistant } from './assistant';
import { ChatHistory } from './chatHistory';
import { aggregate } from './context';
import { describeError } from './errors';
import { blobPageUrl } from './github';

export type RepositoryLoader = (source: RepositorySource) => Promise<RepositorySnapshot>;

export const createSession = (): Session => ({
  source: null,
  repo: null,
  files: [],
  skipped: [],
  selectedPath: null,
  context: '',
  turns: [],
  notice: null,
});

export const clearSession = (): Session => createSession();

export const isRepositoryLoaded = (session: Session): boolean => session.repo !== null;

export const loadRepository = async (
  source: RepositorySource,
  loadRepo: RepositoryLoader
): Promise<Session> => {
  const frozenSource: RepositorySource = Object.freeze({ ...source });
  try {
    const snapshot = await loadRepo(frozenSource);
    const { details, files, skipped } = snapshot;

    let text = `${files.length} files loaded from branch '${details.defaultBranch}'`;
    if (skipped.length > 0) text += ` (${skipped.length} binary or unreadable skipped)`;
    if (snapshot.truncated) text += '. GitHub truncated the file list, so some files are missing';

    return {
      source: frozenSource,
      repo: details,
      files,
      skipped,
      selectedPath: null,
      context: aggregate(files),
      turns: [],
      notice: { kind: files.length > 0 ? 'success' : 'info', text },
    };
  } catch (err) {
    console.error('Failed to load repository', err);
    return { ...createSession(), notice: { kind: 'error', text: describeError(err) } };
  }
};

/**
 * Switches between a single file and the whole repository. A different
 * selection starts a fresh conversation, since earlier answers refer to
 * other code.
 */
export const selectFile = (session: Session, path: string | null): Session => {
  const selectedPath = path && session.files.some(f => f.path === path) ? path : null;
  if (selectedPath === session.selectedPath) return session;

  return {
    ...session,
    selectedPath,
    context: aggregate(session.files, selectedPath),
    turns: [],
    notice: selectedPath ? { kind: 'success', text: `Loaded ${selectedPath}` } : null,
  };
};

export const resetChat = (session: Session): Session => {
  const history = new ChatHistory(session.turns);
  history.reset();
  return { ...session, turns: history.history(), notice: null };
};

export const answerScope = (session: Session): AnswerScope | null => {
  if (!session.repo) return null;
  if (session.selectedPath) {
    return { kind: 'file', path: session.selectedPath, url: blobPageUrl(session.repo, session.selectedPath) };
  }
  return { kind: 'repository', url: session.repo.htmlUrl };
};

export const askQuestion = async (
  session: Session,
  question: string,
  assistant: CodeAssistant,
  onChunk?: (textSoFar: string) => void
): Promise<Session> => {
  const scope = answerScope(session);
  const text = question.trim();
  if (!scope || !text) return session;

  const history = new ChatHistory(session.turns);
  const previous = history.history();
  history.append({ role: 'user', text });

  try {
    const answer = await assistant.ask({ context: session.context, history: previous, question: text, scope }, onChunk);
    history.append({ role: 'assistant', text: answer });
    return { ...session, turns: history.history(), notice: null };
  } catch (err) {
    console.error('Failed to answer question', err);
    // the failure is answered in the transcript so user and assistant turns keep alternating
    const message = describeError(err);
    history.append({ role: 'assistant', text: message });
    return { ...session, turns: history.history(), notice: { kind: 'error', text: message } };
  }
};
