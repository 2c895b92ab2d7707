// Pure text helpers for turning rendered LinkedIn markup text into post fields.

const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;
const ACTIVITY_URN_PATTERN = /urn:li:(?:activity|share|ugcPost):(\d+)/;
const RELATIVE_DATE_PATTERN = /^(\d+)([dhmsw])/;

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export function extractHashtags(text: string | null | undefined): string | null {
  if (!text) return null;
  const tags = text.match(HASHTAG_PATTERN);
  if (!tags || tags.length === 0) return null;
  return tags.join(', ');
}

/**
 * LinkedIn renders some labels twice back to back (once visible, once for
 * screen readers). Collapses "NameName" and "Name\nName" to "Name".
 */
export function removeDuplicatedText(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null;
  const trimmed = text.trim();

  if (trimmed.length % 2 === 0) {
    const half = trimmed.length / 2;
    const first = trimmed.slice(0, half);
    if (first === trimmed.slice(half)) {
      return first;
    }
  }

  const lines = trimmed.split('\n');
  if (lines.length >= 2 && lines[0].trim() === lines[1].trim()) {
    return lines[0].trim();
  }

  return trimmed;
}

export function cleanAuthorName(text: string | null | undefined): string | null {
  const deduped = removeDuplicatedText(text);
  if (deduped === null) return null;

  const cleaned = deduped
    .replace(/\s•\s[\s\S]*$/, '')
    .replace(/\s+(?:1st|2nd|3rd)\+?(?:\s[\s\S]*)?$/, '')
    .trim();

  return cleaned || null;
}

function formatDate(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

/**
 * "3d" -> the local calendar date three days ago, as YYYY-MM-DD.
 * Units: s, m (minutes), h, d, w. Only the first unit letter is read, so "3mo"
 * means three minutes.
 */
export function convertRelativeDate(token: string | null | undefined): string | null {
  if (!token) return null;
  const match = token.trim().match(RELATIVE_DATE_PATTERN);
  if (!match) return null;

  const amount = parseInt(match[1], 10);
  const unit = match[2];
  const date = new Date();

  switch (unit) {
    case 's':
      date.setTime(date.getTime() - amount * SECOND);
      break;
    case 'm':
      date.setTime(date.getTime() - amount * MINUTE);
      break;
    case 'h':
      date.setTime(date.getTime() - amount * HOUR);
      break;
    case 'd':
      date.setTime(date.getTime() - amount * DAY);
      break;
    case 'w':
      date.setTime(date.getTime() - amount * 7 * DAY);
      break;
  }

  return formatDate(date);
}

export function firstToken(text: string | null | undefined): string | null {
  if (!text) return null;
  const token = text.trim().split(/\s+/)[0];
  return token || null;
}

export function parseActivityId(urn: string | null | undefined): string | null {
  if (!urn) return null;
  const match = urn.match(ACTIVITY_URN_PATTERN);
  return match ? match[1] : null;
}

export function buildPostUrl(activityId: string | null): string | null {
  if (!activityId) return null;
  return `https://www.linkedin.com/feed/update/urn:li:activity:${activityId}/`;
}
