import { UpstreamUnavailableError } from './errors.js';

export type EscalationVerdict = 'answerable' | 'escalate';

/**
 * Map the classifier's one-word reply to a verdict. Only YES and NO are
 * accepted (first word, ignoring case and punctuation).
 *
 * @throws UpstreamUnavailableError for anything else
 */
export function parseVerdict(raw: string): EscalationVerdict {
  const firstWord = raw.trim().split(/\s+/)[0] ?? '';
  const token = firstWord.replace(/[^a-z]/gi, '').toUpperCase();

  switch (token) {
    case 'YES':
      return 'answerable';
    case 'NO':
      return 'escalate';
    default:
      throw new UpstreamUnavailableError(`Unrecognised escalation verdict: "${raw.trim()}"`);
  }
}
