/** Speech-to-text boundary. Rejects with CollaboratorFailure (or an AbortError when cancelled). */
export interface SpeechToText {
  transcribe(audio: Buffer, options: { language: string; signal: AbortSignal }): Promise<string>;
}

/** Text-to-speech boundary. Rejects with CollaboratorFailure (or an AbortError when cancelled). */
export interface TextToSpeech {
  synthesize(text: string, options: { signal: AbortSignal }): Promise<Buffer>;
}
