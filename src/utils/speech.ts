// src/utils/speech.ts

import { OpenAI } from 'openai';
import type { AppConfig } from '../config/env.js';

const SPEECH_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

type SpeechVoice = (typeof SPEECH_VOICES)[number];

// OpenAI rejects longer input
export const MAX_SPEECH_CHARS = 4096;

function isSpeechVoice(value: string): value is SpeechVoice {
  return SPEECH_VOICES.some((voice) => voice === value);
}

/**
 * Text-to-speech through the OpenAI speech endpoint
 */
export class SpeechSynthesizer {
  private openai: OpenAI;
  private voice: SpeechVoice;

  constructor(
    apiKey: string,
    private readonly model: string = 'tts-1',
    voice: string = 'alloy'
  ) {
    this.openai = new OpenAI({ apiKey });
    this.voice = isSpeechVoice(voice) ? voice : 'alloy';
  }

  /**
   * @returns MP3 bytes
   */
  async synthesize(text: string): Promise<Buffer> {
    const response = await this.openai.audio.speech.create({
      model: this.model,
      voice: this.voice,
      input: text.slice(0, MAX_SPEECH_CHARS),
      response_format: 'mp3',
    });

    return Buffer.from(await response.arrayBuffer());
  }
}

/**
 * Speech needs the OpenAI API itself; other providers and
 * OpenAI-compatible gateways leave it disabled.
 *
 * @returns null when speech isn't available
 */
export function createSpeechSynthesizer(config: AppConfig): SpeechSynthesizer | null {
  if (config.ai.provider !== 'openai' || !config.ai.apiKey || config.ai.baseUrl) {
    return null;
  }
  return new SpeechSynthesizer(config.ai.apiKey, config.tts.model, config.tts.voice);
}
