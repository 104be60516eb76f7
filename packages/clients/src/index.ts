export { CachedMetadataLookup } from "./cached-lookup.js";
export { PlatformError, RemoteError, RetryableError } from "./errors.js";
export { fetchJson, type FetchJsonOptions, type HttpRetryConfig } from "./http.js";
export { OsuApiClient, type OsuApiClientConfig } from "./osu-client.js";
export { RedditClient, type RedditClientConfig } from "./reddit-client.js";
export { sleep, withRetry, type RetryOptions } from "./retry.js";
