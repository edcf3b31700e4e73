// OpenAI-backed transcription and note generation

import fs from 'fs';
import OpenAI from 'openai';
import { getSystemPrompt, buildNotePrompt } from '../llm/prompts.js';
import type { NoteGenerator, Transcriber } from './types.js';

export function createOpenAIClient(options: { apiKey: string; baseUrl: string | null }): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    // A failed call fails the stage; nothing is retried behind the pipeline's back
    maxRetries: 0,
  });
}

export class OpenAITranscriber implements Transcriber {
  constructor(private readonly client: OpenAI, private readonly model: string) {}

  async transcribe(audioPath: string, languageHint: string, signal: AbortSignal): Promise<string> {
    const transcription = await this.client.audio.transcriptions.create(
      {
        model: this.model,
        file: fs.createReadStream(audioPath),
        language: languageHint,
      },
      { signal }
    );
    return transcription.text.trim();
  }
}

export class OpenAINoteGenerator implements NoteGenerator {
  constructor(private readonly client: OpenAI, private readonly model: string) {}

  async generate(transcript: string, signal: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0.2,
        messages: [
          { role: 'system', content: getSystemPrompt() },
          { role: 'user', content: buildNotePrompt(transcript) },
        ],
      },
      { signal }
    );
    return completion.choices[0]?.message.content?.trim() ?? '';
  }
}
