export type RetryPolicyConfig = {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
};

export type PriceProviderConfig = RetryPolicyConfig & {
  baseUrl?: string;
  userAgent?: string;
};

export type NewsProviderConfig = RetryPolicyConfig & {
  baseUrl?: string;
  userAgent?: string;
  maxItems?: number;
  maxBytes?: number;
  rateLimitPerHostPerMinute?: number;
  /** Query suffix for the news search, e.g. "hl=ja&gl=JP&ceid=JP:ja". */
  locale?: string;
};

export type AiProviderConfig = RetryPolicyConfig & {
  model?: string;
  baseUrl?: string;
  /** Environment variable holding the API key. */
  apiKeyEnv?: string;
  temperature?: number;
};

export type MailProviderConfig = {
  enabled?: boolean;
  host?: string;
  port?: number;
  secure?: boolean;
  user?: string;
  from?: string;
  to?: string[];
  /** Environment variable holding the SMTP password. */
  passwordEnv?: string;
};

export type ProvidersConfig = {
  prices?: PriceProviderConfig;
  news?: NewsProviderConfig;
  ai?: AiProviderConfig;
  mail?: MailProviderConfig;
};

export type NotificationsConfig = {
  /** Mail a summary to operators after each job. */
  runSummary?: boolean;
};
