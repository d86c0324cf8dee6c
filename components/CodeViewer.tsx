import React, { useState, useEffect } from 'react';
import { ChevronDown, ChevronRight, ExternalLink, FileText } from 'lucide-react';
import { fileExtension } from '../services/context';

interface CodeViewerProps {
  path: string;
  content: string;
  url?: string;
}

const CodeViewer: React.FC<CodeViewerProps> = ({ path, content, url }) => {
  const [isOpen, setIsOpen] = useState(false);

  // Collapse again when another file is picked
  useEffect(() => {
    setIsOpen(false);
  }, [path]);

  const lines = content.split('\n');

  return (
    <div className="border border-gray-800 rounded-lg bg-gray-900 overflow-hidden">
      <div className="flex items-center justify-between px-3 py-2 bg-gray-900/80 border-b border-gray-800">
        <button
          type="button"
          onClick={() => setIsOpen(!isOpen)}
          className="flex items-center gap-2 text-sm text-gray-300 hover:text-white"
        >
          {isOpen ? <ChevronDown size={14} /> : <ChevronRight size={14} />}
          <FileText size={14} className="text-blue-400" />
          <span>View Code</span>
          <span className="text-gray-500 font-mono">{path}</span>
          <span className="text-xs text-gray-600">({fileExtension(path)}, {lines.length} lines)</span>
        </button>
        {url && (
          <a href={url} target="_blank" rel="noopener noreferrer" className="text-gray-500 hover:text-blue-400" title="Open on GitHub">
            <ExternalLink size={14} />
          </a>
        )}
      </div>
      {isOpen && (
        <pre className="max-h-96 overflow-auto custom-scrollbar text-xs font-mono p-3 text-gray-200">
          {lines.map((line, i) => (
            <div key={i} className="flex">
              <span className="w-10 shrink-0 pr-3 text-right text-gray-600 select-none">{i + 1}</span>
              <code>{line}</code>
            </div>
          ))}
        </pre>
      )}
    </div>
  );
};

export default CodeViewer;
