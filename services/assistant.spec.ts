import { ApiError, GoogleGenAI } from '@google/genai';
import {
  AskRequest,
  assistantFromEnvironment,
  buildSystemInstruction,
  createCodeAssistant,
  promptSize,
  toAssistantError,
  toGeminiHistory,
} from './assistant';
import { AuthError, ContextTooLargeError, NetworkError, QuotaError, describeError } from './errors';

const mockGenerateContentStream = jest.fn();

jest.mock('@google/genai', () => {
  class ApiError extends Error {
    status: number;

    constructor({ message, status }: { message: string; status: number }) {
      super(message);
      this.status = status;
    }
  }
  return {
    ApiError,
    GoogleGenAI: jest.fn().mockImplementation(() => ({
      models: { generateContentStream: mockGenerateContentStream },
    })),
  };
});

const streamOf = (...texts: string[]) =>
  (async function* () {
    for (const text of texts) yield { text };
  })();

const config = { apiKey: 'test-key', model: 'gemini-2.0-flash', maxContextChars: 1_000_000 };

const request: AskRequest = {
  context: 'print(2)',
  history: [
    { role: 'user', text: 'What language is this?' },
    { role: 'assistant', text: 'Python.' },
  ],
  question: 'What does b.py print?',
  scope: { kind: 'file', path: 'b.py', url: 'https://github.com/acme/widgets/blob/main/b.py' },
};

describe('buildSystemInstruction', () => {
  it('fences a single file and names its URL', () => {
    expect(buildSystemInstruction('print(2)', request.scope)).toBe(`You are an expert AI programming assistant.

Here is the file: https://github.com/acme/widgets/blob/main/b.py

\`\`\`py
print(2)
\`\`\`

Answer only based on the above code. Be concise, helpful, and provide code samples in markdown if needed.`);
  });

  it('embeds the whole codebase as is', () => {
    const instruction = buildSystemInstruction('--- FILE: a.py (py) ---', { kind: 'repository', url: 'https://github.com/acme/widgets' });
    expect(instruction).toContain('Here is the full codebase from https://github.com/acme/widgets:\n\n--- FILE: a.py (py) ---\n\n');
  });
});

describe('toGeminiHistory', () => {
  it('maps assistant turns to the model role', () => {
    expect(toGeminiHistory(request.history)).toEqual([
      { role: 'user', parts: [{ text: 'What language is this?' }] },
      { role: 'model', parts: [{ text: 'Python.' }] },
    ]);
  });
});

describe('promptSize', () => {
  it('counts instruction, history and question characters', () => {
    expect(promptSize('abc', [{ role: 'user', text: 'de' }], 'f')).toBe(6);
  });
});

describe('toAssistantError', () => {
  it('maps Gemini API failures onto the error taxonomy', () => {
    expect(toAssistantError(new ApiError({ message: 'API key not valid. Please pass a valid API key.', status: 400 }), 10)).toBeInstanceOf(AuthError);
    expect(toAssistantError(new ApiError({ message: 'Permission denied', status: 403 }), 10)).toBeInstanceOf(AuthError);
    expect(toAssistantError(new ApiError({ message: 'Resource has been exhausted', status: 429 }), 10)).toBeInstanceOf(QuotaError);
    expect(
      toAssistantError(new ApiError({ message: 'The input token count (1200000) exceeds the maximum number of tokens allowed (1048576).', status: 400 }), 10)
    ).toBeInstanceOf(ContextTooLargeError);
  });

  it('treats everything else as a network failure', () => {
    const serverError = toAssistantError(new ApiError({ message: 'Internal error', status: 500 }), 10);
    expect(serverError).toBeInstanceOf(NetworkError);
    expect(serverError instanceof NetworkError && serverError.status).toBe(500);

    const transport = toAssistantError(new TypeError('fetch failed'), 10);
    expect(transport).toBeInstanceOf(NetworkError);
    expect(transport instanceof NetworkError && transport.status).toBeNull();
  });

  it('does not mistake other token errors for an oversized context', () => {
    const outputLimit = toAssistantError(new ApiError({ message: 'max_output_tokens must be positive', status: 400 }), 10);
    expect(outputLimit).toBeInstanceOf(NetworkError);
    expect(outputLimit instanceof NetworkError && outputLimit.status).toBe(400);

    expect(
      toAssistantError(new ApiError({ message: 'Request exceeds the context window of the model', status: 400 }), 10)
    ).toBeInstanceOf(ContextTooLargeError);
  });
});

describe('assistantFromEnvironment', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keeps chat off when the configuration does not validate', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(assistantFromEnvironment({ API_KEY: 'test-key', MAX_CONTEXT_CHARS: 'lots' })).toBeNull();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe('Chat is disabled');
  });

  it('keeps chat off without an API key', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(assistantFromEnvironment({})).toBeNull();
    expect(warn).toHaveBeenCalledWith('GEMINI_API_KEY is not set; chat is disabled.');
  });

  it('builds an assistant for the configured model', () => {
    expect(assistantFromEnvironment({ API_KEY: 'test-key', GEMINI_MODEL: 'gemini-2.5-pro' })?.model).toBe('gemini-2.5-pro');
  });
});

describe('createCodeAssistant', () => {
  beforeEach(() => {
    mockGenerateContentStream.mockReset();
  });

  it('requires an API key', () => {
    expect(() => createCodeAssistant({ ...config, apiKey: undefined })).toThrow(AuthError);
  });

  it('configures the client with the API key', () => {
    createCodeAssistant(config);
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
  });

  it('streams the answer and returns it verbatim', async () => {
    mockGenerateContentStream.mockResolvedValue(streamOf('It prints ', '', '`2`.'));
    const onChunk = jest.fn();

    const answer = await createCodeAssistant(config).ask(request, onChunk);

    expect(answer).toBe('It prints `2`.');
    expect(onChunk.mock.calls).toEqual([['It prints '], ['It prints `2`.']]);
    expect(mockGenerateContentStream).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      contents: [
        { role: 'user', parts: [{ text: 'What language is this?' }] },
        { role: 'model', parts: [{ text: 'Python.' }] },
        { role: 'user', parts: [{ text: 'What does b.py print?' }] },
      ],
      config: { systemInstruction: buildSystemInstruction('print(2)', request.scope) },
    });
  });

  it('re-queries the model for a repeated question', async () => {
    mockGenerateContentStream.mockImplementation(async () => streamOf('2'));
    const assistant = createCodeAssistant(config);

    await assistant.ask(request);
    await assistant.ask(request);

    expect(mockGenerateContentStream).toHaveBeenCalledTimes(2);
  });

  it('rejects an oversized context before calling the model', async () => {
    const assistant = createCodeAssistant(config);
    const error = await assistant
      .ask({ ...request, context: 'x'.repeat(2_000_000), scope: { kind: 'repository', url: 'https://github.com/acme/widgets' } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ContextTooLargeError);
    expect(describeError(error)).toContain('Select a single file');
    expect(mockGenerateContentStream).not.toHaveBeenCalled();
  });

  it('maps a failed request', async () => {
    mockGenerateContentStream.mockRejectedValue(new ApiError({ message: 'Resource has been exhausted', status: 429 }));

    await expect(createCodeAssistant(config).ask(request)).rejects.toBeInstanceOf(QuotaError);
  });
});
