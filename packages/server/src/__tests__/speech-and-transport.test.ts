/**
 * OpenAISpeech and radio message tests
 *
 * OpenAISpeech runs against a fake fetch; the radio transport is covered at
 * its message validation and its behavior while disconnected.
 */
import { describe, it, expect, vi } from 'vitest';
import type { SpeechSettings } from '../config/settings.js';
import { CollaboratorFailure, TransportDisconnected } from '../errors.js';
import { OpenAISpeech } from '../speech/OpenAISpeech.js';
import { WebSocketRadioTransport, parseRadioMessage } from '../radio/RadioTransport.js';

// ─── Test Fixtures ───────────────────────────────────────────────────────────

const SETTINGS: SpeechSettings = {
  apiKey: 'test-key',
  baseUrl: 'http://speech.test/v1',
  transcriptionModel: 'whisper-1',
  speechModel: 'tts-1',
  voice: 'onyx',
  speed: 1.1,
  language: 'en',
};

type FetchArgs = Parameters<typeof fetch>;

function fakeFetch(respond: (url: string, init: RequestInit | undefined) => Response | Promise<Response>) {
  const calls: { url: string; init: RequestInit | undefined }[] = [];
  const impl = vi.fn((...args: FetchArgs): Promise<Response> => {
    const [input, init] = args;
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    return Promise.resolve(respond(url, init));
  });
  return { impl, calls };
}

function signal(): AbortSignal {
  return new AbortController().signal;
}

// ─── Speech to text ──────────────────────────────────────────────────────────

describe('OpenAISpeech.transcribe', () => {
  it('uploads the audio and returns the text', async () => {
    const { impl, calls } = fakeFetch(() => Response.json({ text: 'Overlord, Viper 1-1, bogey dope' }));
    const speech = new OpenAISpeech(SETTINGS, impl);

    const text = await speech.transcribe(Buffer.from('audio'), { language: 'en', signal: signal() });

    expect(text).toBe('Overlord, Viper 1-1, bogey dope');
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://speech.test/v1/audio/transcriptions');
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.headers).toEqual({ Authorization: 'Bearer test-key' });

    const body = calls[0].init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('model')).toBe('whisper-1');
      expect(body.get('language')).toBe('en');
      expect(body.get('file')).toBeInstanceOf(Blob);
    }
  });

  it('wraps HTTP errors', async () => {
    const { impl } = fakeFetch(() => new Response('bad gateway', { status: 502 }));
    const speech = new OpenAISpeech(SETTINGS, impl);
    await expect(speech.transcribe(Buffer.from('audio'), { language: 'en', signal: signal() })).rejects.toThrow(
      'speechToText: HTTP 502: bad gateway'
    );
  });

  it('rejects a response without text', async () => {
    const { impl } = fakeFetch(() => Response.json({ result: 'nope' }));
    const speech = new OpenAISpeech(SETTINGS, impl);
    await expect(speech.transcribe(Buffer.from('audio'), { language: 'en', signal: signal() })).rejects.toBeInstanceOf(
      CollaboratorFailure
    );
  });

  it('wraps network failures', async () => {
    const impl = vi.fn((..._args: FetchArgs): Promise<Response> => Promise.reject(new TypeError('fetch failed')));
    const speech = new OpenAISpeech(SETTINGS, impl);
    await expect(speech.transcribe(Buffer.from('audio'), { language: 'en', signal: signal() })).rejects.toThrow(
      'speechToText: request failed: fetch failed'
    );
  });

  it('passes cancellation through unchanged', async () => {
    const abortError = new DOMException('This operation was aborted', 'AbortError');
    const impl = vi.fn((..._args: FetchArgs): Promise<Response> => Promise.reject(abortError));
    const speech = new OpenAISpeech(SETTINGS, impl);
    await expect(speech.transcribe(Buffer.from('audio'), { language: 'en', signal: signal() })).rejects.toBe(abortError);
  });
});

// ─── Text to speech ──────────────────────────────────────────────────────────

describe('OpenAISpeech.synthesize', () => {
  it('posts the script and returns the audio bytes', async () => {
    const { impl, calls } = fakeFetch(() => new Response(new Uint8Array([1, 2, 3])));
    const speech = new OpenAISpeech(SETTINGS, impl);

    const audio = await speech.synthesize('Viper 1-1, Overlord, picture clean.', { signal: signal() });

    expect([...audio]).toEqual([1, 2, 3]);
    expect(calls[0].url).toBe('http://speech.test/v1/audio/speech');
    const body = calls[0].init?.body;
    expect(typeof body === 'string' && JSON.parse(body)).toEqual({
      model: 'tts-1',
      input: 'Viper 1-1, Overlord, picture clean.',
      voice: 'onyx',
      speed: 1.1,
      response_format: 'opus',
    });
  });

  it('wraps HTTP errors', async () => {
    const { impl } = fakeFetch(() => new Response('unauthorized', { status: 401 }));
    const speech = new OpenAISpeech(SETTINGS, impl);
    await expect(speech.synthesize('hello', { signal: signal() })).rejects.toThrow('textToSpeech: HTTP 401: unauthorized');
  });
});

// ─── Radio messages ──────────────────────────────────────────────────────────

describe('parseRadioMessage', () => {
  it('accepts each inbound message type', () => {
    expect(parseRadioMessage('{"type":"transmissionStart","pilotId":"Viper 1-1","frequency":251000000}')).toEqual({
      type: 'transmissionStart',
      pilotId: 'Viper 1-1',
      frequency: 251_000_000,
    });
    expect(parseRadioMessage('{"type":"audioFrame","pilotId":"Viper 1-1","frequency":251000000,"data":"AAAA"}')).toEqual({
      type: 'audioFrame',
      pilotId: 'Viper 1-1',
      frequency: 251_000_000,
      data: 'AAAA',
    });
    expect(parseRadioMessage('{"type":"pilotDisconnected","pilotId":"Viper 1-1","frequency":251000000}')?.type).toBe(
      'pilotDisconnected'
    );
  });

  it.each([
    'not json',
    'null',
    '[]',
    '{"type":"transmissionStart","frequency":251000000}',
    '{"type":"transmissionStart","pilotId":"","frequency":251000000}',
    '{"type":"transmissionStart","pilotId":"Viper 1-1","frequency":"251"}',
    '{"type":"audioFrame","pilotId":"Viper 1-1","frequency":251000000}',
    '{"type":"chat","pilotId":"Viper 1-1","frequency":251000000}',
  ])('rejects %s', (raw) => {
    expect(parseRadioMessage(raw)).toBeNull();
  });
});

describe('WebSocketRadioTransport', () => {
  it('refuses to transmit before it is connected', async () => {
    const transport = new WebSocketRadioTransport({
      url: 'ws://127.0.0.1:5002',
      callsign: 'Overlord',
      frameBytes: 4,
      initialBackoffMs: 1_000,
      maxBackoffMs: 30_000,
    });
    expect(transport.isOpen).toBe(false);
    await expect(transport.transmit(251_000_000, Buffer.from('audio'), signal())).rejects.toBeInstanceOf(
      TransportDisconnected
    );
  });
});
