import React, { useMemo, useState } from 'react';
import { AlertCircle, AlertTriangle, CheckCircle2, Github, Info, KeyRound, Layers, Loader2, Trash2 } from 'lucide-react';
import { ChatTurn, Notice, Session } from './types';
import { CodeAssistant } from './services/assistant';
import { buildFileTree } from './services/fileTree';
import { blobPageUrl } from './services/github';
import {
  RepositoryLoader,
  askQuestion,
  clearSession,
  createSession,
  isRepositoryLoaded,
  loadRepository,
  resetChat,
  selectFile,
} from './services/session';
import FileTree from './components/FileTree';
import CodeViewer from './components/CodeViewer';
import ChatPanel from './components/ChatPanel';

interface AppProps {
  loadRepo: RepositoryLoader;
  // null when no Gemini API key is configured; browsing still works
  assistant: CodeAssistant | null;
}

const NoticeBanner: React.FC<{ notice: Notice }> = ({ notice }) => {
  const styles = {
    error: 'bg-red-900/30 border-red-700/50 text-red-200',
    success: 'bg-emerald-900/30 border-emerald-700/50 text-emerald-200',
    info: 'bg-blue-900/30 border-blue-700/50 text-blue-200',
  };
  return (
    <div
      role={notice.kind === 'error' ? 'alert' : 'status'}
      className={`flex items-start gap-2 text-sm border rounded-lg px-3 py-2 ${styles[notice.kind]}`}
    >
      {notice.kind === 'error' ? <AlertCircle size={16} className="shrink-0 mt-0.5" /> : notice.kind === 'success' ? <CheckCircle2 size={16} className="shrink-0 mt-0.5" /> : <Info size={16} className="shrink-0 mt-0.5" />}
      <span>{notice.text}</span>
    </div>
  );
};

function App({ loadRepo, assistant }: AppProps) {
  const [session, setSession] = useState<Session>(createSession);
  const [repoUrl, setRepoUrl] = useState('');
  const [accessToken, setAccessToken] = useState('');
  const [loading, setLoading] = useState(false);
  const [isStreaming, setIsStreaming] = useState(false);
  const [streamingText, setStreamingText] = useState('');
  const [pendingQuestion, setPendingQuestion] = useState<string | null>(null);

  const fileTree = useMemo(() => buildFileTree(session.files.map(f => f.path)), [session.files]);
  const repoLoaded = isRepositoryLoaded(session);
  const selectedFile = session.selectedPath
    ? session.files.find(f => f.path === session.selectedPath) ?? null
    : null;

  const handleLoad = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!repoUrl.trim() || loading) return;

    setLoading(true);
    try {
      const next = await loadRepository({ url: repoUrl.trim(), accessToken: accessToken || undefined }, loadRepo);
      setSession(next);
    } finally {
      setLoading(false);
    }
  };

  const handleSendMessage = async (text: string) => {
    if (!assistant) return;

    setPendingQuestion(text.trim());
    setStreamingText('');
    setIsStreaming(true);
    try {
      const next = await askQuestion(session, text, assistant, setStreamingText);
      setSession(next);
    } finally {
      setPendingQuestion(null);
      setStreamingText('');
      setIsStreaming(false);
    }
  };

  const handleClearAll = () => {
    setSession(clearSession());
    setRepoUrl('');
  };

  const visibleTurns: ChatTurn[] = pendingQuestion
    ? [...session.turns, { role: 'user', text: pendingQuestion }]
    : session.turns;

  const scopeLabel = !repoLoaded
    ? undefined
    : selectedFile
      ? `Analyzing ${selectedFile.path}`
      : `Analyzing entire repository (${session.files.length} files)`;

  const busy = loading || isStreaming;

  return (
    <div className="flex flex-col h-screen bg-gray-950 text-gray-100 font-sans selection:bg-blue-500/30">
      {/* Header */}
      <header className="h-14 border-b border-gray-800 flex items-center px-4 gap-2 bg-gray-950 shrink-0">
        <Github className="text-white" />
        <h1 className="font-bold text-xl tracking-tight bg-gradient-to-r from-blue-400 to-purple-400 bg-clip-text text-transparent">
          Codebase Chat
        </h1>
      </header>

      <div className="flex-1 flex overflow-hidden">
        {/* Sidebar */}
        <aside className="w-72 bg-gray-900 border-r border-gray-800 flex flex-col shrink-0">
          <form onSubmit={handleLoad} className="p-3 border-b border-gray-800 space-y-2">
            <span className="text-xs font-semibold text-gray-400 uppercase tracking-wider">Configuration</span>
            <label className="block text-xs text-gray-400">
              GitHub PAT (optional)
              <div className="relative mt-1">
                <KeyRound size={14} className="absolute left-2 top-2.5 text-gray-500" />
                <input
                  type="password"
                  value={accessToken}
                  onChange={(e) => setAccessToken(e.target.value)}
                  className="w-full bg-gray-950 border border-gray-700 rounded-md py-1.5 pl-7 pr-2 text-sm focus:outline-none focus:border-blue-500"
                />
              </div>
            </label>
            <label className="block text-xs text-gray-400">
              GitHub Repo URL
              <input
                type="text"
                value={repoUrl}
                onChange={(e) => setRepoUrl(e.target.value)}
                placeholder="https://github.com/user/repo"
                className="mt-1 w-full bg-gray-950 border border-gray-700 rounded-md py-1.5 px-2 text-sm focus:outline-none focus:border-blue-500 placeholder-gray-600"
              />
            </label>
            <button
              type="submit"
              disabled={!repoUrl.trim() || busy}
              className="w-full flex items-center justify-center gap-2 bg-blue-600 hover:bg-blue-500 disabled:opacity-50 rounded-md py-1.5 text-sm font-medium"
            >
              {loading && <Loader2 size={14} className="animate-spin" />}
              Load Repository Contents
            </button>
          </form>

          <div className="flex-1 overflow-y-auto custom-scrollbar p-2">
            {loading ? (
              <div className="text-center py-8 text-gray-500 text-sm animate-pulse">Fetching all files...</div>
            ) : repoLoaded ? (
              <>
                <button
                  type="button"
                  onClick={() => setSession(prev => selectFile(prev, null))}
                  disabled={busy}
                  className={`w-full flex items-center gap-1.5 py-1 px-2 text-sm rounded transition-colors
                    ${session.selectedPath === null ? 'bg-blue-900/40 text-blue-200' : 'hover:bg-gray-800 text-gray-300'}
                  `}
                >
                  <Layers size={16} className="text-purple-400" />
                  Entire repository
                </button>
                <FileTree
                  nodes={fileTree}
                  onSelectFile={(path) => setSession(prev => selectFile(prev, path))}
                  selectedPath={session.selectedPath}
                  disabled={busy}
                />
              </>
            ) : (
              <div className="text-center py-8 text-gray-600 text-sm">
                Enter a GitHub URL to start
              </div>
            )}
          </div>

          {session.repo && (
            <div className="p-3 border-t border-gray-800 bg-gray-900/50">
              <div className="flex items-center gap-2 text-sm text-gray-300 font-medium truncate">
                <div className="w-2 h-2 rounded-full bg-green-500 shrink-0"></div>
                {session.repo.owner}/{session.repo.name}
              </div>
              <div className="flex items-center gap-4 mt-2 text-xs text-gray-500">
                <span>⭐ {session.repo.stars}</span>
                <span>{session.repo.defaultBranch}</span>
                <span>{session.files.length} files</span>
                {session.skipped.length > 0 && <span title={session.skipped.join('\n')}>{session.skipped.length} skipped</span>}
              </div>
            </div>
          )}

          <div className="p-3 border-t border-gray-800">
            <button
              type="button"
              onClick={handleClearAll}
              disabled={busy}
              className="w-full flex items-center justify-center gap-2 text-sm text-gray-400 hover:text-red-300 disabled:opacity-50"
            >
              <Trash2 size={14} /> Clear All
            </button>
          </div>
        </aside>

        {/* Main */}
        <main className="flex-1 flex flex-col overflow-hidden">
          <div className="p-3 space-y-2 shrink-0">
            {!assistant && (
              <div role="status" className="flex items-center gap-2 text-sm border rounded-lg px-3 py-2 bg-yellow-900/30 border-yellow-700/50 text-yellow-200">
                <AlertTriangle size={16} />
                No Gemini API key configured. Set GEMINI_API_KEY to enable chat; browsing still works.
              </div>
            )}
            {session.notice && <NoticeBanner notice={session.notice} />}
            {!repoLoaded && !session.notice && (
              <NoticeBanner notice={{ kind: 'info', text: 'Enter a GitHub URL in the sidebar and load repository contents.' }} />
            )}
            {selectedFile && session.repo && (
              <CodeViewer
                path={selectedFile.path}
                content={selectedFile.content}
                url={blobPageUrl(session.repo, selectedFile.path)}
              />
            )}
          </div>

          <div className="flex-1 min-h-0 border-t border-gray-800">
            <ChatPanel
              turns={visibleTurns}
              onSendMessage={handleSendMessage}
              onResetChat={() => setSession(prev => resetChat(prev))}
              isStreaming={isStreaming}
              streamingText={streamingText}
              disabled={!assistant || !repoLoaded || loading}
              modelName={assistant?.model}
              scopeLabel={scopeLabel}
            />
          </div>
        </main>
      </div>
    </div>
  );
}

export default App;
