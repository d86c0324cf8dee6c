import { ApiError, Content, GoogleGenAI } from '@google/genai';
import { AppConfig, ConfigEnv, loadConfig } from '../config';
import { ChatTurn } from '../types';
import { fileExtension } from './context';
import { AppError, AuthError, ContextTooLargeError, NetworkError, QuotaError } from './errors';

export type AnswerScope =
  | { kind: 'repository'; url: string }
  | { kind: 'file'; url: string; path: string };

export interface AskRequest {
  context: string;
  history: ChatTurn[];
  question: string;
  scope: AnswerScope;
}

export interface CodeAssistant {
  readonly model: string;
  ask(request: AskRequest, onChunk?: (textSoFar: string) => void): Promise<string>;
}

export const buildSystemInstruction = (context: string, scope: AnswerScope): string => {
  const header = scope.kind === 'repository'
    ? `Here is the full codebase from ${scope.url}:`
    : `Here is the file: ${scope.url}`;
  const body = scope.kind === 'repository'
    ? context
    : `\`\`\`${fileExtension(scope.path)}\n${context}\n\`\`\``;

  return `You are an expert AI programming assistant.

${header}

${body}

Answer only based on the above code. Be concise, helpful, and provide code samples in markdown if needed.`;
};

export const toGeminiHistory = (history: ChatTurn[]): Content[] =>
  history.map(turn => ({
    role: turn.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: turn.text }],
  }));

export const promptSize = (systemInstruction: string, history: ChatTurn[], question: string): number =>
  history.reduce((total, turn) => total + turn.text.length, systemInstruction.length + question.length);

const CONTEXT_LIMIT_PATTERN = /input token count|exceeds the maximum number of tokens|context (window|length)/;

export const toAssistantError = (err: unknown, size: number): AppError => {
  if (err instanceof AppError) return err;
  if (err instanceof ApiError) {
    const message = err.message.toLowerCase();
    if (err.status === 401 || err.status === 403 || (err.status === 400 && message.includes('api key'))) {
      return new AuthError({ cause: err });
    }
    if (err.status === 400 && CONTEXT_LIMIT_PATTERN.test(message)) {
      return new ContextTooLargeError(size, { cause: err });
    }
    if (err.status === 429) return new QuotaError({ cause: err });
    return new NetworkError('Gemini', { cause: err, status: err.status });
  }
  return new NetworkError('Gemini', { cause: err });
};

export const createCodeAssistant = (config: Pick<AppConfig, 'apiKey' | 'model' | 'maxContextChars'>): CodeAssistant => {
  if (!config.apiKey) throw new AuthError();
  const ai = new GoogleGenAI({ apiKey: config.apiKey });

  return {
    model: config.model,

    async ask({ context, history, question, scope }, onChunk) {
      const systemInstruction = buildSystemInstruction(context, scope);
      const size = promptSize(systemInstruction, history, question);
      if (size > config.maxContextChars) {
        throw new ContextTooLargeError(size);
      }

      const contents: Content[] = [
        ...toGeminiHistory(history),
        { role: 'user', parts: [{ text: question }] },
      ];

      let answer = '';
      try {
        const stream = await ai.models.generateContentStream({
          model: config.model,
          contents,
          config: { systemInstruction },
        });
        for await (const chunk of stream) {
          if (chunk.text) {
            answer += chunk.text;
            onChunk?.(answer);
          }
        }
      } catch (e) {
        throw toAssistantError(e, size);
      }
      return answer;
    },
  };
};

/**
 * The assistant the app starts with, or null when chat has to stay off:
 * a configuration that does not validate or a missing API key. Repository
 * browsing works either way.
 */
export const assistantFromEnvironment = (env?: ConfigEnv): CodeAssistant | null => {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    console.error('Chat is disabled', err);
    return null;
  }
  if (!config.apiKey) {
    console.warn('GEMINI_API_KEY is not set; chat is disabled.');
    return null;
  }
  return createCodeAssistant(config);
};
