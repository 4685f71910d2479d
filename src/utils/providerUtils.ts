import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

const LIMIT_KEYS = ["batchSize", "concurrency", "maxRequestsPerMinute", "maxTokensPerMinute", "retries"] as const;

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    // Unset environment values must not erase the provider defaults.
    const merged: ProviderRateLimits = { ...defaults };
    for (const key of LIMIT_KEYS) {
        const value = override[key];
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return merged;
}
