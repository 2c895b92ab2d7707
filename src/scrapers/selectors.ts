export const LINKEDIN_URLS = {
  LOGIN: 'https://www.linkedin.com/login',
  FEED: 'https://www.linkedin.com/feed/',
  SEARCH_CONTENT: 'https://www.linkedin.com/search/results/content/',
} as const;

export const LOGIN_SELECTORS = {
  USERNAME: 'input[id="username"]',
  PASSWORD: 'input[id="password"]',
  SUBMIT: 'button[type="submit"]',
  ERROR: '.alert, .form__alert--error',
} as const;

export const SEE_MORE_SELECTOR = 'button.feed-shared-inline-show-more-text__see-more-less-toggle.see-more';

/** Where the identity of a post lives, relative to its container. */
export const URN_ATTRIBUTES = ['data-urn', 'data-id'] as const;
export const URN_DESCENDANT_SELECTOR = '[data-urn], [data-id^="urn:li:"]';

export const ACTOR_SELECTORS = {
  NAME: '.update-components-actor__title, .update-components-actor__name',
  HEADLINE: '.update-components-actor__description',
  SUB_DESCRIPTION: '.update-components-actor__sub-description',
} as const;

export interface ExtractionStrategy {
  name: string;
  /** Matches one element per post. */
  container: string;
  /** Text node inside the container; the container's own text when absent. */
  text?: string;
}

/**
 * Tried in order on every extraction pass; the first strategy that matches at
 * least one element is used for the whole pass. Append new layouts at the end.
 */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  {
    name: 'feed-update-with-urn',
    container: 'div.feed-shared-update-v2[data-urn]',
    text: '.feed-shared-update-v2__description .update-components-text span.break-words',
  },
  {
    name: 'activity-urn-container',
    container: 'div[data-urn^="urn:li:activity"]',
    text: '.update-components-text span.break-words',
  },
  {
    name: 'feed-update',
    container: '.feed-shared-update-v2',
    text: '.feed-shared-inline-show-more-text',
  },
  {
    name: 'search-result-cluster',
    container: '.search-results__cluster-content',
    text: '.feed-shared-inline-show-more-text',
  },
  {
    name: 'update-text-only',
    container: '.update-components-text',
  },
];
