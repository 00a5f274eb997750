import { tokenizeWords } from './text-similarity';

export type SignalFamily = 'disagreement' | 'agreement' | 'meta' | 'urgency';

export interface MessageSignals {
  counts: Record<SignalFamily, number>;
  keywords: string[];
  hasQuestion: boolean;
  hasExclamation: boolean;
}

const STOP_WORDS = new Set([
  'the',
  'and',
  'you',
  'for',
  'but',
  'that',
  'with',
  'this',
  'have',
  'what',
  'your',
  'from',
  'they',
  'there',
  'will',
  'were',
  'just',
  'about',
  'like',
  'into',
  'when',
  'them',
  'then',
  'than',
  'over'
]);

const SIGNAL_RULES: Array<{ family: SignalFamily; patterns: RegExp[] }> = [
  {
    family: 'disagreement',
    patterns: [/\bno\b/, /\bwrong\b/, /\bnonsense\b/, /\bdoubt\b/, /\bprove\b/, /\bdisagree\b/, /\bimpossible\b/]
  },
  {
    family: 'agreement',
    patterns: [/\byes\b/, /\bagree\b/, /\bexactly\b/, /\bright\b/, /\btrue\b/, /\bsame\b/]
  },
  {
    family: 'meta',
    patterns: [/\bsimulation\b/, /\bwatching\b/, /\breal\b/, /\bwatched\b/, /\bcode\b/, /\bloop\b/]
  },
  {
    family: 'urgency',
    patterns: [/\bnow\b/, /\bhurry\b/, /\brun\b/, /\bhide\b/, /\bquick\b/, /\bdanger\b/]
  }
];

function collectKeywords(tokens: string[]) {
  const counts = new Map<string, number>();
  tokens
    .filter((word) => word.length > 3 && !STOP_WORDS.has(word))
    .forEach((word) => {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    });

  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, 5)
    .map(([word]) => word);
}

export function analyzeMessage(text: string): MessageSignals {
  const lower = text.toLowerCase();
  const counts: Record<SignalFamily, number> = { disagreement: 0, agreement: 0, meta: 0, urgency: 0 };

  SIGNAL_RULES.forEach((rule) => {
    rule.patterns.forEach((pattern) => {
      if (pattern.test(lower)) {
        counts[rule.family] += 1;
      }
    });
  });

  const exclamationCount = text.match(/!/g)?.length ?? 0;
  counts.urgency += exclamationCount;

  return {
    counts,
    keywords: collectKeywords(tokenizeWords(text)),
    hasQuestion: /\?/.test(text),
    hasExclamation: exclamationCount > 0
  };
}
