import {
  type SenderInfo,
  UNKNOWN_SENDER_EMAIL,
  UNKNOWN_SENDER_NAME,
} from '../shared/types/index.js';
import { roundTo } from '../shared/utils/money.js';

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;

// "From: Jane Doe <jane@example.com>"
const FROM_WITH_ADDRESS = /From:\s*([^<]+?)\s*<[^>]+>/i;

// "From: Jane Doe" with no bracketed address
const FROM_NAME_ONLY = /From:\s*([^<\n]+)/i;

const BASE_CONFIDENCE = 0.5;
const NAME_BONUS = 0.3;
const EMAIL_BONUS = 0.2;

function matchSenderName(content: string): string | null {
  const match = FROM_WITH_ADDRESS.exec(content) ?? FROM_NAME_ONLY.exec(content);
  if (!match) return null;

  const name = match[1].trim();
  return name.length > 0 ? name : null;
}

export function extractSender(content: string): SenderInfo {
  const name = matchSenderName(content);
  const email = EMAIL_PATTERN.exec(content)?.[0] ?? null;

  let confidence = BASE_CONFIDENCE;
  if (name !== null) confidence += NAME_BONUS;
  if (email !== null) confidence += EMAIL_BONUS;

  return {
    name: name ?? UNKNOWN_SENDER_NAME,
    email: email ?? UNKNOWN_SENDER_EMAIL,
    confidence: roundTo(Math.min(confidence, 1), 2),
  };
}
