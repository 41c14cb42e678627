// A sentence ends at . ! or ? followed by whitespace, so "3.5x" and "v2.0"
// stay inside their sentence.
const SENTENCE_BREAK = /(?<=[.!?])\s+/;
// Pieces ending like this continue into the next one ("e.g. SQL", "the U.S. team").
const ABBREVIATION_END = /(?:\b(?:e\.g|i\.e|etc|vs|approx|incl|dept|mr|ms|mrs|dr|jr|sr|st)\.|\b(?:[a-z]\.){2,})$/i;

/** Splits text into whole sentences; every non-space character is kept. */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let pending = '';
  for (const piece of text.split(SENTENCE_BREAK)) {
    const part = piece.trim();
    if (!part) continue;
    pending = pending ? `${pending} ${part}` : part;
    if (!ABBREVIATION_END.test(pending)) {
      sentences.push(pending);
      pending = '';
    }
  }
  if (pending) sentences.push(pending);
  return sentences;
}
