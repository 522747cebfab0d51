import { FeedSpec } from "../core/types.js";

const OUTLINE_RE = /<outline\b((?:[^>"']|"[^"]*"|'[^']*')*)>/gi;
const ATTR_RE = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

function isCodePoint(code: number): boolean {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff;
}

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
    if (ref.startsWith("#")) {
      const hex = ref[1] === "x" || ref[1] === "X";
      const code = parseInt(ref.slice(hex ? 2 : 1), hex ? 16 : 10);
      return isCodePoint(code) ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  });
}

function parseAttributes(tagBody: string): Map<string, string> {
  const attrs = new Map<string, string>();
  for (const m of tagBody.matchAll(ATTR_RE)) {
    const name = m[1].toLowerCase();
    if (!attrs.has(name)) attrs.set(name, decodeEntities(m[2] ?? m[3] ?? "").trim());
  }
  return attrs;
}

function usableUrl(candidate: string | undefined): string | null {
  if (!candidate) return null;
  try {
    const url = new URL(candidate);
    return url.protocol === "http:" || url.protocol === "https:" ? candidate : null;
  } catch {
    return null;
  }
}

/**
 * Reads every `<outline>` carrying a feed URL. Entries without an absolute
 * http(s) URL are skipped. Never touches the persisted feed list.
 */
export function importFromOpml(document: Buffer | string): FeedSpec[] {
  const xml = typeof document === "string" ? document : document.toString("utf-8");
  // comments may contain commented-out outlines
  const body = xml.replace(/<!--[\s\S]*?-->/g, "");

  const specs: FeedSpec[] = [];
  for (const match of body.matchAll(OUTLINE_RE)) {
    const attrs = parseAttributes(match[1]);
    const url = usableUrl(attrs.get("xmlurl") ?? attrs.get("url"));
    if (!url) continue;
    const name = attrs.get("title") || attrs.get("text") || url;
    specs.push({ name, url });
  }
  return specs;
}
