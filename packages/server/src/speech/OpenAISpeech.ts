import type { SpeechSettings } from '../config/settings.js';
import { CollaboratorFailure, describeError, isAbortError } from '../errors.js';
import type { SpeechToText, TextToSpeech } from './SpeechCollaborators.js';

interface TranscriptionResponse {
  text?: unknown;
}

function isTranscriptionResponse(value: unknown): value is TranscriptionResponse {
  return typeof value === 'object' && value !== null;
}

/**
 * Speech collaborators backed by an OpenAI-compatible audio API.
 *
 * POST {baseUrl}/audio/transcriptions  multipart: file, model, language
 * POST {baseUrl}/audio/speech          json: model, input, voice, speed, response_format
 */
export class OpenAISpeech implements SpeechToText, TextToSpeech {
  constructor(
    private readonly settings: SpeechSettings,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async transcribe(audio: Buffer, options: { language: string; signal: AbortSignal }): Promise<string> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)], { type: 'audio/ogg' }), 'transmission.ogg');
    form.append('model', this.settings.transcriptionModel);
    form.append('language', options.language);

    let resp: Response;
    try {
      resp = await this.fetchImpl(`${this.settings.baseUrl}/audio/transcriptions`, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.settings.apiKey}` },
        body: form,
        signal: options.signal,
      });
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw new CollaboratorFailure('speechToText', `request failed: ${describeError(err)}`, { cause: err });
    }

    const body = await resp.text();
    if (!resp.ok) {
      throw new CollaboratorFailure('speechToText', `HTTP ${resp.status}: ${body.slice(0, 200)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new CollaboratorFailure('speechToText', `invalid response: ${body.slice(0, 200)}`, { cause: err });
    }
    if (!isTranscriptionResponse(parsed) || typeof parsed.text !== 'string') {
      throw new CollaboratorFailure('speechToText', `response has no text: ${body.slice(0, 200)}`);
    }
    return parsed.text;
  }

  async synthesize(text: string, options: { signal: AbortSignal }): Promise<Buffer> {
    let resp: Response;
    try {
      resp = await this.fetchImpl(`${this.settings.baseUrl}/audio/speech`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.settings.speechModel,
          input: text,
          voice: this.settings.voice,
          speed: this.settings.speed,
          response_format: 'opus',
        }),
        signal: options.signal,
      });
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw new CollaboratorFailure('textToSpeech', `request failed: ${describeError(err)}`, { cause: err });
    }

    if (!resp.ok) {
      const body = await resp.text();
      throw new CollaboratorFailure('textToSpeech', `HTTP ${resp.status}: ${body.slice(0, 200)}`);
    }
    return Buffer.from(await resp.arrayBuffer());
  }
}
