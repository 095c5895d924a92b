import { createHash } from "crypto";

const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;

export const CACHE_KEY_PATTERN = /^[0-9a-f]{64}$/;

/**
 * SHA-256 over the method followed by host + target, as lowercase hex.
 */
export function computeKey(method: string, host: string, target: string): string {
    return createHash("sha256").update(method, "utf8").update(host + target, "utf8").digest("hex");
}

/**
 * Host component of the key. In fixed-origin mode the Host header holds the
 * configured origin (`http://dummyjson.com`), so the scheme and any trailing
 * slash are dropped to key it the same as a plain `Host: dummyjson.com`.
 */
export function cacheHost(host: string): string {
    return host.replace(SCHEME_PREFIX, "").replace(/\/+$/, "");
}

/** Absolute-form targets reduce to path plus query; origin-form is kept verbatim. */
export function cachePath(target: string): string {
    const url = absoluteUrl(target);
    return url ? url.pathname + url.search : target;
}

/**
 * Key for a request as it will be forwarded. An absolute-form target is
 * fetched from the host it names, so that host keys it, not the Host header.
 */
export function requestKey(method: string, host: string, target: string): string {
    const url = absoluteUrl(target);
    if (url) {
        return computeKey(method, url.host, url.pathname + url.search);
    }
    return computeKey(method, cacheHost(host), target);
}

/** True for `http://…`-style values, false for bare hosts and origin-form paths. */
export function hasScheme(value: string): boolean {
    return SCHEME_PREFIX.test(value);
}

function absoluteUrl(target: string): URL | undefined {
    if (!hasScheme(target)) return undefined;
    try {
        return new URL(target);
    } catch {
        return undefined;
    }
}
