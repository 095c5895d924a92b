import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { StoreError, errorMessage } from "../errors";
import { decodeEntry, encodeEntry, type CacheEntry } from "./codec";
import { CACHE_KEY_PATTERN } from "./key";

/** `<key>.<pid>.<random>.tmp`, as written by put(). */
const TEMP_FILE_PATTERN = /^[0-9a-f]{64}\.\d+\.[0-9a-f]{12}\.tmp$/;

export interface CacheStore {
    get(key: string): Promise<CacheEntry | undefined>;
    has(key: string): Promise<boolean>;
    put(key: string, entry: CacheEntry): Promise<void>;
    clear(): Promise<number>;
}

export interface FileCacheStoreOptions {
    cacheDir: string;
}

/**
 * One file per key under `cacheDir`. Records are written to a temporary file
 * and renamed into place, so a reader sees either no entry or a whole one.
 *
 * Two misses on the same key both write; whichever rename lands last wins.
 */
export class FileCacheStore implements CacheStore {
    readonly cacheDir: string;

    constructor(options: FileCacheStoreOptions) {
        this.cacheDir = options.cacheDir;
    }

    async init(): Promise<void> {
        try {
            await fs.mkdir(this.cacheDir, { recursive: true });
        } catch (error) {
            throw new StoreError(`Cannot create cache directory ${this.cacheDir}: ${errorMessage(error)}`, {
                cause: error,
            });
        }
    }

    async get(key: string): Promise<CacheEntry | undefined> {
        let data: Buffer;
        try {
            data = await fs.readFile(this.pathFor(key));
        } catch (error) {
            if (isMissing(error)) return undefined;
            throw new StoreError(`Cannot read cache entry ${key}: ${errorMessage(error)}`, { cause: error });
        }

        try {
            return decodeEntry(data);
        } catch (error) {
            throw new StoreError(`Corrupt cache entry ${key}: ${errorMessage(error)}`, { cause: error });
        }
    }

    async has(key: string): Promise<boolean> {
        try {
            await fs.access(this.pathFor(key));
            return true;
        } catch (error) {
            if (isMissing(error)) return false;
            throw new StoreError(`Cannot stat cache entry ${key}: ${errorMessage(error)}`, { cause: error });
        }
    }

    async put(key: string, entry: CacheEntry): Promise<void> {
        const finalPath = this.pathFor(key);
        const tempPath = `${finalPath}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;
        const record = encodeEntry(entry);

        try {
            await fs.mkdir(this.cacheDir, { recursive: true });
            await fs.writeFile(tempPath, record);
            await fs.rename(tempPath, finalPath);
        } catch (error) {
            await fs.rm(tempPath, { force: true });
            throw new StoreError(`Cannot write cache entry ${key}: ${errorMessage(error)}`, { cause: error });
        }
    }

    /** Removes this store's records and leftover temp files; anything else in the directory stays. */
    async clear(): Promise<number> {
        let names: string[];
        try {
            names = await fs.readdir(this.cacheDir);
        } catch (error) {
            if (isMissing(error)) return 0;
            throw new StoreError(`Cannot list cache directory ${this.cacheDir}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        const owned = names.filter((name) => CACHE_KEY_PATTERN.test(name) || TEMP_FILE_PATTERN.test(name));
        try {
            await Promise.all(owned.map((name) => fs.rm(path.join(this.cacheDir, name), { force: true })));
        } catch (error) {
            throw new StoreError(`Cannot clear cache directory ${this.cacheDir}: ${errorMessage(error)}`, {
                cause: error,
            });
        }
        return owned.length;
    }

    private pathFor(key: string): string {
        if (!CACHE_KEY_PATTERN.test(key)) {
            throw new StoreError(`Invalid cache key: ${JSON.stringify(key)}`);
        }
        return path.join(this.cacheDir, key);
    }
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
