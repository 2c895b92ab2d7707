import { randomUUID } from 'crypto';
import type { FeedDriver, PostElement } from './driver.js';
import {
  ACTOR_SELECTORS,
  LINKEDIN_URLS,
  LOGIN_SELECTORS,
  URN_ATTRIBUTES,
  URN_DESCENDANT_SELECTOR,
  type ExtractionStrategy,
} from './selectors.js';
import {
  buildPostUrl,
  cleanAuthorName,
  convertRelativeDate,
  extractHashtags,
  firstToken,
  parseActivityId,
  removeDuplicatedText,
} from '../core/normalize.js';
import type { PostRecord } from '../db/queries.js';
import { logger, describeError } from '../core/logger.js';

export interface Credentials {
  email: string;
  password: string;
}

export type LoginOutcome = 'CheckpointChallenge' | 'LoginFailed' | 'LoginOk';

export interface ExtractedPost {
  record: PostRecord;
  /** false when the identity is a generated UUID rather than an activity URN */
  hasStableId: boolean;
}

export function buildSearchUrl(query: string): string {
  const keywords = encodeURIComponent(query);
  return `${LINKEDIN_URLS.SEARCH_CONTENT}?keywords=${keywords}&origin=CLUSTER_EXPANSION&sid=Pfc`;
}

/** Where the browser ends up after submitting credentials decides what happens next. */
export function classifyLoginLocation(url: string, errorMessages: string[]): LoginOutcome {
  if (url.includes('checkpoint')) return 'CheckpointChallenge';
  if (url.includes('login') && errorMessages.length > 0) return 'LoginFailed';
  return 'LoginOk';
}

export async function submitCredentials(driver: FeedDriver, credentials: Credentials): Promise<void> {
  await driver.goto(LINKEDIN_URLS.LOGIN);
  await driver.waitForSelector(LOGIN_SELECTORS.USERNAME);
  await driver.fill(LOGIN_SELECTORS.USERNAME, credentials.email);
  await driver.fill(LOGIN_SELECTORS.PASSWORD, credentials.password);
  await driver.click(LOGIN_SELECTORS.SUBMIT);
}

export async function readLoginErrors(driver: FeedDriver): Promise<string[]> {
  const elements = await driver.queryAll(LOGIN_SELECTORS.ERROR);
  const messages: string[] = [];
  for (const element of elements) {
    const text = (await element.innerText()).trim();
    if (text) messages.push(text);
  }
  return messages;
}

async function childText(element: PostElement, selector: string): Promise<string | null> {
  const child = await element.query(selector);
  if (!child) return null;
  const text = (await child.innerText()).trim();
  return text || null;
}

async function findActivityId(container: PostElement): Promise<string | null> {
  for (const attribute of URN_ATTRIBUTES) {
    const id = parseActivityId(await container.getAttribute(attribute));
    if (id) return id;
  }

  const descendant = await container.query(URN_DESCENDANT_SELECTOR);
  if (!descendant) return null;
  for (const attribute of URN_ATTRIBUTES) {
    const id = parseActivityId(await descendant.getAttribute(attribute));
    if (id) return id;
  }
  return null;
}

/**
 * Builds a post record from one matched container, or null when it holds no
 * text. Actor fields are best effort: a missing node leaves the field null.
 */
export async function extractPost(
  container: PostElement,
  strategy: ExtractionStrategy,
  searchQuery: string | null
): Promise<ExtractedPost | null> {
  const rawText = strategy.text
    ? await childText(container, strategy.text)
    : (await container.innerText()).trim();
  if (!rawText) return null;

  const activityId = await findActivityId(container);

  const [author, headline, subDescription] = await Promise.all([
    childText(container, ACTOR_SELECTORS.NAME),
    childText(container, ACTOR_SELECTORS.HEADLINE),
    childText(container, ACTOR_SELECTORS.SUB_DESCRIPTION),
  ]);

  return {
    record: {
      post_id: activityId ?? randomUUID(),
      text: rawText,
      post_date: convertRelativeDate(firstToken(subDescription)),
      post_author: cleanAuthorName(author),
      profile_headline: removeDuplicatedText(headline) || null,
      post_url: buildPostUrl(activityId),
      hashtags: extractHashtags(rawText),
      search_query: searchQuery,
    },
    hasStableId: activityId !== null,
  };
}

/** Clicks every visible "…more" toggle; returns how many were clicked. */
export async function expandTruncatedPosts(
  buttons: PostElement[],
  pause: () => Promise<void>,
  shouldStop: () => boolean
): Promise<number> {
  let clicked = 0;
  for (const button of buttons) {
    if (shouldStop()) break;
    try {
      if (await button.isVisible()) {
        await button.click();
        clicked++;
        await pause();
      }
    } catch (error) {
      logger.debug(`Could not expand post: ${describeError(error)}`);
    }
  }
  return clicked;
}
