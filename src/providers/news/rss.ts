import { DOMParser } from "linkedom";

export type RssItem = {
  title: string;
  url: string;
  publishedAt?: string;
  summary: string;
};

function textContent(node: Element | null | undefined): string {
  if (!node) {
    return "";
  }
  return (node.textContent ?? "").trim();
}

function toIsoDate(raw: string): string | undefined {
  const ts = new Date(raw).getTime();
  return Number.isFinite(ts) ? new Date(ts).toISOString() : undefined;
}

function resolveItemLink(item: Element): string {
  const link = textContent(item.querySelector("link"));
  if (link) {
    return link;
  }
  return item.querySelector("link[href]")?.getAttribute("href")?.trim() ?? "";
}

function resolvePublishedAt(item: Element): string | undefined {
  for (const tag of ["pubDate", "updated", "published"]) {
    const value = textContent(item.querySelector(tag));
    if (value) {
      return toIsoDate(value);
    }
  }
  return undefined;
}

/** Feed descriptions often carry escaped HTML; keep only the text. */
function stripMarkup(raw: string): string {
  if (!raw.includes("<")) {
    return raw.replace(/\s+/g, " ").trim();
  }
  const doc = new DOMParser().parseFromString(`<html><body>${raw}</body></html>`, "text/html");
  return (doc.body?.textContent ?? "").replace(/\s+/g, " ").trim();
}

function resolveSummary(item: Element): string {
  const raw =
    textContent(item.querySelector("description")) ||
    textContent(item.querySelector("summary")) ||
    textContent(item.querySelector("content"));
  return stripMarkup(raw);
}

function extractItems(doc: ReturnType<DOMParser["parseFromString"]>): Element[] {
  const rssItems = Array.from(doc.querySelectorAll("item"));
  if (rssItems.length > 0) {
    return rssItems as Element[];
  }
  return Array.from(doc.querySelectorAll("entry")) as Element[];
}

export function parseRss(xml: string): RssItem[] {
  const doc = new DOMParser().parseFromString(xml, "text/xml");
  if (!doc) {
    return [];
  }
  const results: RssItem[] = [];
  for (const item of extractItems(doc)) {
    const title = textContent(item.querySelector("title"));
    const url = resolveItemLink(item);
    if (!title || !url) {
      continue;
    }
    results.push({
      title,
      url,
      publishedAt: resolvePublishedAt(item),
      summary: resolveSummary(item),
    });
  }
  return results;
}
