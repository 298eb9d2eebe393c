import type { Db } from "../db/connection";

export type CoreConfig = {
  gemini: {
    apiKey: string | null;
    model: string;
    baseUrl: string;
  };
  fatSecret: {
    /** Absent token is a valid setup: lookups stop at the estimate table / fallback. */
    accessToken: string | null;
    baseUrl: string;
  };
  cache: {
    imageTtlHours: number;
    apiTtlHours: number;
    /** How many leading characters of the base64 image feed the cache key. */
    imageKeyChars: number;
  };
  defaultTargetCalories: number;
};

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type Clock = () => Date;

/** Everything a core component needs from the outside world. */
export type CoreDeps = {
  db: Db;
  config: CoreConfig;
  fetch?: FetchFn;
  now?: Clock;
};

export const systemClock: Clock = () => new Date();
