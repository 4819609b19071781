import { TranscriptClassifier } from './transcript-classifier';

describe('TranscriptClassifier', () => {
  const classifier = new TranscriptClassifier();

  it.each([
    ['Yes, I will be there on Tuesday.', 'confirmed'],
    ['I need to CANCEL that one.', 'cancelled'],
    ["Sorry, I can't make it.", 'cancelled'],
    ['Could we do another day instead?', 'rescheduled'],
    ['Hello? Hello?', 'busy_voicemail'],
    ['', 'busy_voicemail'],
    [undefined, 'busy_voicemail'],
  ])('classifies %p as %s', (transcript, expected) => {
    expect(classifier.classify(transcript)).toBe(expected);
  });

  it('prefers confirmation when several intents appear', () => {
    expect(classifier.classify('I wanted to reschedule but yes, keep it')).toBe('confirmed');
  });
});
