import { z } from 'zod';

// Gemini 2.0 Flash takes about a million tokens; a character budget of the
// same size stays well inside it for source code.
export const DEFAULT_MAX_CONTEXT_CHARS = 1_000_000;
export const DEFAULT_MODEL = 'gemini-2.0-flash';

const emptyToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const ConfigSchema = z.object({
  apiKey: z.preprocess(emptyToUndefined, z.string().optional()),
  model: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_MODEL)),
  maxContextChars: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(DEFAULT_MAX_CONTEXT_CHARS)),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface ConfigEnv {
  API_KEY?: string;
  GEMINI_MODEL?: string;
  MAX_CONTEXT_CHARS?: string;
}

// Vite replaces these process.env reads at build time (see vite.config.ts).
const processEnv = (): ConfigEnv => ({
  API_KEY: process.env.API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
  MAX_CONTEXT_CHARS: process.env.MAX_CONTEXT_CHARS,
});

export const loadConfig = (env: ConfigEnv = processEnv()): AppConfig => {
  const parsed = ConfigSchema.safeParse({
    apiKey: env.API_KEY,
    model: env.GEMINI_MODEL,
    maxContextChars: env.MAX_CONTEXT_CHARS,
  });
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
};
