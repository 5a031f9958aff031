import OpenAI from 'openai';
import { displayText } from '../gmail/normalize.js';
import type { EmailRecord } from '../gmail/record.js';
import { GenerationError, errorMessage } from '../util/errors.js';

export type CompletionFn = (input: { system: string; user: string }) => Promise<string>;

export type ReplyDraftResult = {
  text: string;
  /** true when `text` is a placeholder rather than model output */
  degraded: boolean;
};

export type ReplyDrafter = (record: Pick<EmailRecord, 'plainText' | 'htmlText' | 'snippet'>) => Promise<ReplyDraftResult>;

const MODEL = process.env.OPENAI_MODEL?.trim() || 'gpt-4o-mini';
const MAX_EMAIL_CHARS = 9000;

export const SYSTEM_PROMPT = `You are a professional email assistant.
Read the email below and write a polite, clear, and concise reply.
Return only the reply body as plain text (no markdown, no subject line).`;

export const MISSING_KEY_PLACEHOLDER = '(OpenAI API key missing. Set OPENAI_API_KEY in .env)';
export const NO_CONTENT_PLACEHOLDER = '(No content to generate reply from.)';

export function buildPrompt(emailText: string) {
  const trimmed = emailText.length > MAX_EMAIL_CHARS ? emailText.slice(0, MAX_EMAIL_CHARS) : emailText;
  return `Email content:\n${trimmed}`;
}

export function openAiCompletion(client: OpenAI, model = MODEL): CompletionFn {
  return async ({ system, user }) => {
    const completion = await client.chat.completions.create({
      model,
      temperature: 0.3,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user }
      ]
    });
    return completion.choices[0]?.message?.content || '';
  };
}

export function createReplyDrafter(complete: CompletionFn | null): ReplyDrafter {
  return async record => {
    if (!complete) return { text: MISSING_KEY_PLACEHOLDER, degraded: true };
    const emailText = displayText(record);
    if (!emailText.trim()) return { text: NO_CONTENT_PLACEHOLDER, degraded: true };
    try {
      const reply = (await complete({ system: SYSTEM_PROMPT, user: buildPrompt(emailText) })).trim();
      if (!reply) throw new GenerationError('empty response');
      return { text: reply, degraded: false };
    } catch (err) {
      const failure = err instanceof GenerationError ? err : new GenerationError(errorMessage(err), err);
      console.warn('reply draft generation failed', failure);
      return { text: `(Draft error: ${failure.message})`, degraded: true };
    }
  };
}

const openai = process.env.OPENAI_API_KEY
  ? new OpenAI({ apiKey: process.env.OPENAI_API_KEY })
  : null;

export const generateReplyDraft: ReplyDrafter = createReplyDrafter(openai ? openAiCompletion(openai) : null);
