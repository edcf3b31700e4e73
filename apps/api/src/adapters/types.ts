// Narrow contracts for the external services the pipeline depends on

export type TranscodeResult =
  | { ok: true; path: string }
  | { ok: false; reason: 'no_audio_stream' | 'failed'; error: string };

export interface Transcoder {
  /** Normalize `inputPath` into a mono speech encoding written to `outputPath` */
  transcode(inputPath: string, outputPath: string, signal: AbortSignal): Promise<TranscodeResult>;
}

export interface Transcriber {
  transcribe(audioPath: string, languageHint: string, signal: AbortSignal): Promise<string>;
}

export interface NoteGenerator {
  generate(transcript: string, signal: AbortSignal): Promise<string>;
}

export interface MailMessage {
  to: string;
  subject: string;
  body: string;
}

export interface MailTransport {
  send(message: MailMessage, signal: AbortSignal): Promise<void>;
}
