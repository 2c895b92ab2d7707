import type { Severity } from '../db/queries.js';

export const UNPARSED_REASONS = 'Unable to parse reasons';

export interface Classification {
  severity: Severity;
  reasons: string;
}

export function buildSeverityPrompt(text: string): string {
  return `You are an expert at analyzing content for toxic positivity. Analyze this LinkedIn post and rate it for toxic positivity.

Rate the severity on a scale from 0-3 where:
0 = non-toxic positive
1 = mildly toxic
2 = moderately toxic
3 = highly toxic

Provide a maximum of 5 bullet points explaining your rating. Focus on specific phrases, tone, and content that justify your severity rating.

Format your answer exactly like this:
Severity: [number]
Reasons:
- [First reason]
- [Second reason]
- [etc. up to 5 bullet points maximum]

Post:
${text}`;
}

// Checked in order; "not"/"non" must win over "high" in e.g. "not highly toxic"
const SEVERITY_KEYWORDS: ReadonlyArray<[RegExp, Severity]> = [
  [/\bnon|\bnot\b/, '0'],
  [/mild/, '1'],
  [/moderate/, '2'],
  [/high/, '3'],
];

const BULLET = /^[-*•]/;

function clampSeverity(value: number): Severity {
  const level = Math.floor(value);
  if (level <= 0) return '0';
  if (level === 1) return '1';
  if (level === 2) return '2';
  return '3';
}

/**
 * Reads the first `Severity:` line. Tiers: a leading number (clamped to 0-3),
 * then a keyword, then "Unknown".
 */
export function parseSeverity(response: string): Severity {
  const line = response
    .split('\n')
    .map(l => l.trim())
    .find(l => l.toLowerCase().startsWith('severity:'));
  if (!line) return 'Unknown';

  const value = line.slice('severity:'.length).replace(/[*_`]/g, '').trim();

  const numeric = /^\d+(?:\.\d+)?/.exec(value);
  if (numeric) {
    return clampSeverity(Number(numeric[0]));
  }

  const lowered = value.toLowerCase();
  for (const [pattern, severity] of SEVERITY_KEYWORDS) {
    if (pattern.test(lowered)) return severity;
  }
  return 'Unknown';
}

/**
 * Tiers: bullet lines after `Reasons:`, else the whole section, else the rest
 * of a `reasons:` line in any case, else the unparsed marker.
 */
export function parseReasons(response: string): string {
  const marker = response.indexOf('Reasons:');
  if (marker !== -1) {
    const section = response.slice(marker + 'Reasons:'.length).trim();
    if (section) {
      const bullets = section
        .split('\n')
        .map(l => l.trim())
        .filter(l => BULLET.test(l));
      return bullets.length > 0 ? bullets.join('\n') : section;
    }
  }

  const line = response
    .split('\n')
    .map(l => l.trim())
    .find(l => l.toLowerCase().startsWith('reasons:'));
  const rest = line?.slice('reasons:'.length).trim();
  return rest || UNPARSED_REASONS;
}

export function parseClassification(response: string): Classification {
  return {
    severity: parseSeverity(response),
    reasons: parseReasons(response),
  };
}
