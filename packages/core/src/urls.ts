import { createHash } from "node:crypto";

export function resolveUrl(base: string, link: string) {
  try {
    return new URL(link, base).toString();
  } catch {
    return link;
  }
}

/** Identity form of an article URL: lowercased, trimmed, query and fragment removed. */
export function normalizeUrl(input: string) {
  const trimmed = input.trim().toLowerCase();
  const cut = trimmed.search(/[?#]/);
  return cut === -1 ? trimmed : trimmed.slice(0, cut);
}

export function contentHash(url: string) {
  return createHash("sha1").update(normalizeUrl(url)).digest("hex");
}

export function getHost(url: string) {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return "";
  }
}
