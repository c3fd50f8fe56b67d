import type { RequestKind } from '@gci-controller/shared';
import { NotAddressed, UnrecognizedRequest } from '../errors.js';

export type ClassifyResult =
  | { success: true; request: RequestKind }
  | { success: false; error: UnrecognizedRequest | NotAddressed };

/** Phrases per request, matched against normalized text */
const PATTERNS: { request: RequestKind; phrases: RegExp[] }[] = [
  {
    request: { kind: 'bogeyDope' },
    phrases: [/\b(bogey|bogie|boogie|bogy)\s*dope\b/],
  },
  {
    request: { kind: 'radioCheck' },
    phrases: [/\b(radio|comm|comms|mic)\s+check\b/],
  },
];

/** Lowercase, strip punctuation (keeping digits and hyphens), collapse whitespace */
export function normalizeTranscript(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Leading callsign of a transmission: the text before the first comma, else its first word */
export function leadingCallsign(text: string): string {
  const comma = text.indexOf(',');
  return comma === -1 ? normalizeTranscript(text).split(' ')[0] : normalizeTranscript(text.slice(0, comma));
}

/**
 * RequestClassifier: map a transcribed transmission to a request.
 *
 *   "Overlord, Viper 1-1, bogey dope"  → bogeyDope
 *   "Overlord, Viper 1-1, radio check" → radioCheck
 *   "Magic, Viper 1-1, bogey dope"     → NotAddressed (controller is Overlord)
 *   anything else                       → UnrecognizedRequest
 *
 * Without a controller callsign every transmission counts as addressed.
 */
export class RequestClassifier {
  private readonly callsign: string | null;

  constructor(controllerCallsign?: string) {
    this.callsign = controllerCallsign ? normalizeTranscript(controllerCallsign) : null;
  }

  classify(text: string): ClassifyResult {
    const normalized = normalizeTranscript(text);
    if (!normalized) {
      return { success: false, error: new UnrecognizedRequest(text) };
    }

    if (this.callsign && normalized !== this.callsign && !normalized.startsWith(`${this.callsign} `)) {
      return { success: false, error: new NotAddressed(leadingCallsign(text)) };
    }

    for (const { request, phrases } of PATTERNS) {
      if (phrases.some(p => p.test(normalized))) {
        return { success: true, request };
      }
    }

    return { success: false, error: new UnrecognizedRequest(text) };
  }
}
