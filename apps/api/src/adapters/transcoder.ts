// ffprobe/ffmpeg transcoder - mono, low-bitrate MP3 for speech

import type { Transcoder, TranscodeResult } from './types.js';
import { spawnCommand, type CommandRunner } from './command.js';

export interface FfmpegTranscoderOptions {
  ffmpegPath: string;
  ffprobePath: string;
  bitrate: string;
  sampleRate: number;
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

export class FfmpegTranscoder implements Transcoder {
  constructor(
    private readonly options: FfmpegTranscoderOptions,
    private readonly run: CommandRunner = spawnCommand
  ) {}

  /**
   * Whether the file holds at least one audio stream.
   */
  async hasAudioStream(inputPath: string, signal: AbortSignal): Promise<{ ok: true; hasAudio: boolean } | { ok: false; error: string }> {
    const probe = await this.run(this.options.ffprobePath, [
      '-v', 'error',
      '-select_streams', 'a',
      '-show_entries', 'stream=index',
      '-of', 'csv=p=0',
      inputPath,
    ], signal);

    if (probe.code !== 0) {
      return { ok: false, error: `ffprobe exited with code ${probe.code}: ${lastLine(probe.stderr)}` };
    }
    return { ok: true, hasAudio: probe.stdout.trim().length > 0 };
  }

  async transcode(inputPath: string, outputPath: string, signal: AbortSignal): Promise<TranscodeResult> {
    const probe = await this.hasAudioStream(inputPath, signal);

    if (!probe.ok) {
      return { ok: false, reason: 'failed', error: probe.error };
    }
    if (!probe.hasAudio) {
      return { ok: false, reason: 'no_audio_stream', error: `No audio stream in ${inputPath}` };
    }

    const result = await this.run(this.options.ffmpegPath, [
      '-y',
      '-i', inputPath,
      '-vn',                                   // Drop any video or cover art
      '-ac', '1',                              // Mono
      '-ar', String(this.options.sampleRate),
      '-c:a', 'libmp3lame',
      '-b:a', this.options.bitrate,
      outputPath,
    ], signal);

    if (result.code !== 0) {
      return { ok: false, reason: 'failed', error: `ffmpeg exited with code ${result.code}: ${lastLine(result.stderr)}` };
    }
    return { ok: true, path: outputPath };
  }
}
