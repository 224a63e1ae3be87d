// Intent signals
// Detect completion vs discovery phrasing and option references in a task description, without external calls

import type { FlightDirection } from '../flights/types.js';

const COMPLETION_REGEX =
  /\b(book|booking|confirm|reserve|select|choose|pick|go with|i'?ll take|take (?:the|that|this|option)|add (?:it|this|that|the|option)|save (?:it|this|that|the)|finali[sz]e)\b/i;
const DISCOVERY_REGEX = /\b(find|search|show me|look for|looking for|list|what are|are there|available)\b/i;

const RETURN_REGEX = /\b(return|returning|back|inbound)\b/i;
const OUTBOUND_REGEX = /\b(outbound|departure|departing|going|outgoing)\b/i;

const OPTION_KEY_REGEX = /\b(outbound|return)[_\s-]*option[_\s-]*(\d+)\b/i;
const OPTION_NUMBER_REGEX = /\b(?:option|flight|choice)\s*(?:#|no\.?|number)?\s*(\d+)\b/i;
const NUMERIC_ORDINAL_REGEX = /\b(\d+)(?:st|nd|rd|th)\s+(?:option|flight|one|choice)\b/i;
const WORD_ORDINAL_REGEX = /\b(first|second|third|fourth|fifth)\s+(?:option|flight|one|choice)\b/i;

const WORD_ORDINALS: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
};

export interface IntentSignals {
  completion: boolean;
  discovery: boolean;
  wantsReturn: boolean;
  wantsOutbound: boolean;
}

export interface OptionReference {
  direction: FlightDirection | null;
  option: number;
}

export function detectIntent(text: string): IntentSignals {
  const withoutKeys = text.replace(new RegExp(OPTION_KEY_REGEX, 'gi'), ' ');
  return {
    completion: COMPLETION_REGEX.test(text),
    discovery: DISCOVERY_REGEX.test(text),
    wantsReturn: RETURN_REGEX.test(withoutKeys),
    wantsOutbound: OUTBOUND_REGEX.test(withoutKeys),
  };
}

// Completion phrasing without discovery phrasing: the user is deciding, not searching
export function hasCompletionIntent(signals: IntentSignals): boolean {
  return signals.completion && !signals.discovery;
}

// Direction the user asked for; null when the text names neither or both
export function requestedDirection(signals: IntentSignals): FlightDirection | null {
  if (signals.wantsReturn && !signals.wantsOutbound) return 'return';
  if (signals.wantsOutbound && !signals.wantsReturn) return 'outbound';
  return null;
}

/**
 * Pull an option reference ("return_option_2", "option 3", "the 2nd flight", "first one") out of text.
 * Option numbers are 1-based.
 */
export function extractOptionReference(text: string): OptionReference | null {
  const keyed = OPTION_KEY_REGEX.exec(text);
  if (keyed) {
    const direction: FlightDirection = keyed[1].toLowerCase() === 'return' ? 'return' : 'outbound';
    return { direction, option: parseInt(keyed[2], 10) };
  }

  const numbered = OPTION_NUMBER_REGEX.exec(text) ?? NUMERIC_ORDINAL_REGEX.exec(text);
  if (numbered) {
    return { direction: null, option: parseInt(numbered[1], 10) };
  }

  const ordinal = WORD_ORDINAL_REGEX.exec(text);
  if (ordinal) {
    return { direction: null, option: WORD_ORDINALS[ordinal[1].toLowerCase()] };
  }

  return null;
}

export function optionKey(direction: FlightDirection, option: number): string {
  return `${direction}_option_${option}`;
}
