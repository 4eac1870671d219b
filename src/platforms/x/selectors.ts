export const X_SELECTORS = {
  HOME_URL: "https://x.com",
  LOGIN_PATH: "/i/flow/login",

  POSTS: {
    POST_ITEM: 'article[data-testid="tweet"]',
    POST_TEXT: '[data-testid="tweetText"]',
    POST_USER_NAME: '[data-testid="User-Name"]',
    POST_PERMALINK: 'a[href*="/status/"]:has(time)',
    POST_TIMESTAMP: "time",
    POST_LIKE_BUTTON: '[data-testid="like"], [data-testid="unlike"]',
    POST_LIKE_COUNT: '[data-testid="app-text-transition-container"]',
  },

  FEED: {
    READY: 'article[data-testid="tweet"], [data-testid="cellInnerDiv"] article, article[role="article"]',
    POST_NODES: 'article, [data-testid="cellInnerDiv"]',
  },
};

export const X_SELECTORS_FALLBACK = {
  POSTS: {
    POST_ITEM: '[data-testid="cellInnerDiv"] article, article[role="article"]',
    POST_ACTION_GROUP: '[role="group"][aria-label]',
    POST_TEXT: 'div[lang], [data-testid="tweetText"]',
  },
  LINKS: {
    STATUS_LINK: 'a[href*="/status/"]',
  },
};

export const X_BLOCK_URL_PATTERNS: readonly RegExp[] = [
  /\/i\/flow\/login/i,
  /\/login(?:[/?#]|$)/i,
  /\/account\/access/i,
  /\/account\/suspended/i,
  /\/account\/locked/i,
  /challenge/i,
  /\/consent/i,
];

export const X_RATE_LIMIT_NOTICES: readonly RegExp[] = [
  /rate limit exceeded/i,
  /you are rate limited/i,
  /too many requests/i,
];
