import { createHash } from "node:crypto";
import type { RawPage } from "@docseek/types";
import { normalizeForHash } from "./text-cleaner.js";

/** SHA-256 of the lowercased, whitespace-collapsed text. */
export function hashContent(text: string): string {
  return createHash("sha256").update(normalizeForHash(text)).digest("hex");
}

/**
 * Content fingerprint of a document: SHA-256 over its page texts in page
 * order, each framed as `<pageIndex>:<utf-8 byte length>:` so no text can
 * imitate a page boundary. Malformed entries are ignored.
 */
export function fingerprintPages(pages: readonly unknown[]): string {
  const hash = createHash("sha256");
  for (const page of sortPages(pages)) {
    hash.update(`${page.pageIndex}:${Buffer.byteLength(page.text, "utf8")}:`);
    hash.update(page.text, "utf8");
  }
  return hash.digest("hex");
}

export function isValidPage(value: unknown): value is RawPage {
  if (typeof value !== "object" || value === null) return false;
  if (!("pageIndex" in value) || !("text" in value)) return false;
  return Number.isInteger(value.pageIndex) && typeof value.text === "string";
}

/** Valid pages only, stably sorted by page index. */
export function sortPages(pages: readonly unknown[]): RawPage[] {
  return pages.filter(isValidPage).sort((a, b) => a.pageIndex - b.pageIndex);
}
