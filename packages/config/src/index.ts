export { envSchema, parseEnv } from "./env.js";
export { defaultCacheDir } from "./cache-dir.js";
export type { CacheDirContext } from "./cache-dir.js";
