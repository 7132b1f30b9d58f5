export type ManipulationSignal =
  | 'emotional_manipulation'
  | 'excessive_emphasis'
  | 'excessive_capitalization'
  | 'conspiracy_indicators'
  | 'clickbait';

export interface ManipulationReport {
  readonly signals: readonly ManipulationSignal[];
  /** Share of the five signal kinds present, in [0, 1]. */
  readonly score: number;
}

const SIGNAL_KIND_COUNT = 5;

const EMOTIONAL_PHRASES = [
  'shocking',
  'unbelievable',
  "they don't want you to know",
  'mind-blowing',
  'insane',
];

const CONSPIRACY_PHRASES = ['mainstream media', 'wake up', 'open your eyes', 'cover-up', 'cover up'];

const CLICKBAIT_PHRASES = ["you won't believe", 'this one trick', 'doctors hate', 'what happens next'];

function isShouted(word: string): boolean {
  return word.length > 2 && word === word.toUpperCase() && word !== word.toLowerCase();
}

function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => text.includes(phrase));
}

export function detectManipulationSignals(text: string): ManipulationReport {
  const lower = text.toLowerCase();
  const signals: ManipulationSignal[] = [];

  if (containsAny(lower, EMOTIONAL_PHRASES)) {
    signals.push('emotional_manipulation');
  }

  const exclamations = text.split('!').length - 1;
  if (text.includes('!!!') || exclamations > 3) {
    signals.push('excessive_emphasis');
  }

  const shoutedWords = text.split(/\s+/).filter(isShouted).length;
  if (shoutedWords > 2) {
    signals.push('excessive_capitalization');
  }

  if (containsAny(lower, CONSPIRACY_PHRASES)) {
    signals.push('conspiracy_indicators');
  }

  if (containsAny(lower, CLICKBAIT_PHRASES)) {
    signals.push('clickbait');
  }

  return {
    signals,
    score: Math.min(signals.length / SIGNAL_KIND_COUNT, 1),
  };
}

/**
 * Renders the report as a paragraph for the agent's first user turn, or
 * undefined when nothing was detected.
 */
export function describeManipulationSignals(report: ManipulationReport): string | undefined {
  if (report.signals.length === 0) {
    return undefined;
  }
  const names = report.signals.map((signal) => signal.replace(/_/g, ' ')).join(', ');
  return `Pre-screen hint: the text shows common manipulation patterns (${names}), risk score ${report.score.toFixed(2)} of 1. Treat this as a hint only and base your verdict on the evidence you find.`;
}
