import os from "node:os";
import path from "node:path";

const APP_DIR_NAME = "docseek";

export interface CacheDirContext {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
  homeDir: string;
}

/**
 * Well-known per-user cache location:
 * `%LOCALAPPDATA%\docseek` on Windows, `~/Library/Caches/docseek` on macOS,
 * `$XDG_CACHE_HOME/docseek` or `~/.cache/docseek` elsewhere.
 */
export function defaultCacheDir(context?: Partial<CacheDirContext>): string {
  const platform = context?.platform ?? process.platform;
  const env = context?.env ?? process.env;
  const homeDir = context?.homeDir ?? os.homedir();

  if (platform === "win32") {
    const localAppData = env["LOCALAPPDATA"];
    return localAppData
      ? path.win32.join(localAppData, APP_DIR_NAME)
      : path.win32.join(homeDir, "AppData", "Local", APP_DIR_NAME);
  }

  if (platform === "darwin") {
    return path.posix.join(homeDir, "Library", "Caches", APP_DIR_NAME);
  }

  const xdgCacheHome = env["XDG_CACHE_HOME"];
  if (xdgCacheHome && path.posix.isAbsolute(xdgCacheHome)) {
    return path.posix.join(xdgCacheHome, APP_DIR_NAME);
  }
  return path.posix.join(homeDir, ".cache", APP_DIR_NAME);
}
