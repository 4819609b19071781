import { Injectable } from '@nestjs/common';

export type TranscriptSummary = 'confirmed' | 'cancelled' | 'rescheduled' | 'busy_voicemail';

// Checked in this order; the first list with a hit wins.
const INTENTS: ReadonlyArray<[TranscriptSummary, readonly string[]]> = [
  ['confirmed', ['yes', 'confirm', 'will be there', 'see you', 'attend']],
  ['cancelled', ['cancel', 'cannot make', "can't make", "won't be there"]],
  ['rescheduled', ['reschedule', 'different time', 'another day', 'change appointment']],
];

@Injectable()
export class TranscriptClassifier {
  classify(transcript: string | undefined | null): TranscriptSummary {
    const text = (transcript ?? '').toLowerCase();
    if (!text.trim()) return 'busy_voicemail';

    for (const [summary, phrases] of INTENTS) {
      if (phrases.some((p) => text.includes(p))) return summary;
    }
    return 'busy_voicemail';
  }
}
