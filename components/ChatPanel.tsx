import React, { useState, useRef, useEffect } from 'react';
import { ChatTurn } from '../types';
import { Send, Bot, User, Sparkles, RotateCcw } from 'lucide-react';
import ReactMarkdown from 'react-markdown';

interface ChatPanelProps {
  turns: ChatTurn[];
  onSendMessage: (text: string) => void;
  onResetChat: () => void;
  isStreaming: boolean;
  streamingText: string;
  disabled: boolean;
  modelName?: string;
  scopeLabel?: string;
}

const ChatPanel: React.FC<ChatPanelProps> = ({
  turns,
  onSendMessage,
  onResetChat,
  isStreaming,
  streamingText,
  disabled,
  modelName,
  scopeLabel,
}) => {
  const [input, setInput] = useState('');
  const messagesEndRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    messagesEndRef.current?.scrollIntoView?.({ behavior: 'smooth' });
  }, [turns, streamingText]);

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    if (!input.trim() || isStreaming || disabled) return;

    onSendMessage(input);
    setInput('');
  };

  return (
    <div className="flex flex-col h-full bg-gray-900">
      <div className="p-4 border-b border-gray-800 bg-gray-900 flex items-start justify-between">
        <div>
          <div className="flex items-center gap-2 text-blue-400 mb-1">
            <Sparkles size={18} />
            <h2 className="font-semibold">AI Assistant</h2>
          </div>
          <p className="text-xs text-gray-500">
            {modelName ? `Powered by ${modelName}. ` : ''}
            {scopeLabel ?? 'No code loaded'}
          </p>
        </div>
        {turns.length > 0 && (
          <button
            type="button"
            onClick={onResetChat}
            disabled={isStreaming}
            className="p-2 text-gray-400 hover:text-blue-400 disabled:opacity-50"
            title="Start a new conversation"
          >
            <RotateCcw size={16} />
          </button>
        )}
      </div>

      <div className="flex-1 overflow-y-auto p-4 space-y-4 custom-scrollbar">
        {turns.length === 0 && !isStreaming && (
          <div className="text-center text-gray-600 mt-10 text-sm">
            <p className="mb-2">Ask me anything about the code.</p>
            <p>"Explain this file"</p>
            <p>"Where is the entry point?"</p>
            <p>"Find bugs in this function"</p>
          </div>
        )}
        {turns.map((turn, index) => (
          <div
            key={index}
            data-role={turn.role}
            className={`flex gap-3 ${turn.role === 'user' ? 'flex-row-reverse' : ''}`}
          >
            <div className={`
              w-8 h-8 rounded-full flex items-center justify-center shrink-0
              ${turn.role === 'user' ? 'bg-blue-600' : 'bg-emerald-600'}
            `}>
              {turn.role === 'user' ? <User size={16} /> : <Bot size={16} />}
            </div>
            <div className={`
              max-w-[85%] rounded-lg px-4 py-2 text-sm leading-relaxed overflow-hidden
              ${turn.role === 'user'
                ? 'bg-blue-600/20 text-blue-100 border border-blue-600/30'
                : 'bg-gray-800 text-gray-200 border border-gray-700'}
            `}>
              <div className="prose prose-invert prose-sm max-w-none">
                <ReactMarkdown>{turn.text}</ReactMarkdown>
              </div>
            </div>
          </div>
        ))}
        {isStreaming && (
          <div className="flex gap-3">
            <div className="w-8 h-8 rounded-full bg-emerald-600 flex items-center justify-center shrink-0 animate-pulse">
              <Bot size={16} />
            </div>
            {streamingText ? (
              <div className="max-w-[85%] rounded-lg px-4 py-2 text-sm bg-gray-800 text-gray-200 border border-gray-700 prose prose-invert prose-sm">
                <ReactMarkdown>{`${streamingText}▌`}</ReactMarkdown>
              </div>
            ) : (
              <div className="text-gray-500 text-sm flex items-center">Thinking...</div>
            )}
          </div>
        )}
        <div ref={messagesEndRef} />
      </div>

      <div className="p-4 bg-gray-900 border-t border-gray-800">
        <form onSubmit={handleSubmit} className="relative">
          <div className="flex items-center gap-2 w-full bg-gray-800 border border-gray-700 rounded-lg px-2 focus-within:border-blue-500 focus-within:ring-1 focus-within:ring-blue-500 transition-all">
            <input
              type="text"
              value={input}
              onChange={(e) => setInput(e.target.value)}
              placeholder="Ask your question about the codebase..."
              className="flex-1 bg-transparent border-none text-gray-100 py-3 focus:outline-none placeholder-gray-500 text-sm"
              disabled={isStreaming || disabled}
            />
            <button
              type="submit"
              aria-label="Send"
              disabled={!input.trim() || isStreaming || disabled}
              className="text-gray-400 hover:text-blue-400 disabled:opacity-50 disabled:hover:text-gray-400 p-2"
            >
              <Send size={18} />
            </button>
          </div>
        </form>
      </div>
    </div>
  );
};

export default ChatPanel;
