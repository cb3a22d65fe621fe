import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';
import { ORACLE_NONE, type MatchOracle } from '@tracklift/contracts';

import { withTimeout } from '../http/timeout';

/** The slice of the GenAI client the oracle calls. */
export interface OracleModelClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
  };
}

export interface GeminiOracleOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: OracleModelClient;
}

export const DEFAULT_ORACLE_MODEL = 'gemini-2.0-flash';
const DEFAULT_ORACLE_TIMEOUT_MS = 10000;

export function buildSelectionPrompt(query: string, candidates: string[]): string {
  const listing = candidates.map((candidate, index) => `${index + 1}. ${candidate}`).join('\n');
  return [
    'You match songs across music streaming platforms.',
    `Original track: "${query}"`,
    'Candidates:',
    listing,
    'Pick the candidate that is the same song by the same artist and reply with that',
    `candidate's text exactly as listed, without the number. If none fit, reply ${ORACLE_NONE}.`,
  ].join('\n');
}

/**
 * Oracle backed by a Gemini text model at temperature 0. Errors and timeouts
 * propagate; the match resolver treats them as a `NONE` answer.
 */
export function createGeminiOracle(options: GeminiOracleOptions): MatchOracle {
  const client: OracleModelClient = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });
  const model = options.model ?? DEFAULT_ORACLE_MODEL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;

  return async (query, candidates) => {
    if (candidates.length === 0) {
      return ORACLE_NONE;
    }

    const response = await withTimeout(
      client.models.generateContent({
        model,
        contents: buildSelectionPrompt(query, candidates),
        config: { temperature: 0 },
      }),
      timeoutMs,
      'oracle selection',
    );

    return response.text?.trim() || ORACLE_NONE;
  };
}
