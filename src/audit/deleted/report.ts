/**
 * Listing, report and JSONL renderers for deletion results.
 * Results are rendered in the order given.
 */

import type { CaptureReference, DownloadResult } from "../core/types.js";
import { viewCaptureUrl } from "../wayback/client.js";
import type { PostDeletionResult, Resolution } from "./types.js";
import { countResolutions } from "./workflow.js";

const SECTION_TITLES: [Resolution, string][] = [
  ["deleted", "Deleted"],
  ["archived", "Archived (live status not checked)"],
  ["extant", "Still live"],
  ["no-evidence", "No evidence"],
  ["unresolved", "Unresolved"],
];

function latestCapture(
  result: PostDeletionResult,
): CaptureReference | undefined {
  return result.captures[result.captures.length - 1];
}

/** `20200102030405` → `2020-01-02 03:04:05`. */
export function formatTimestamp(timestamp: string): string {
  const m = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(timestamp);
  if (!m) return timestamp;
  return `${m[1]}-${m[2]}-${m[3]} ${m[4]}:${m[5]}:${m[6]}`;
}

// ─── Listing ───

/**
 * One archive URL per deleted (or unchecked) post and one marker line per
 * unresolved post.
 */
export function formatListing(results: readonly PostDeletionResult[]): string {
  const lines: string[] = [];
  for (const result of results) {
    if (result.resolution === "unresolved") {
      const reason = result.error ?? "unknown error";
      lines.push(`! ${result.postId} unresolved: ${reason}`);
      continue;
    }
    const listed =
      result.resolution === "deleted" || result.resolution === "archived";
    if (!listed) continue;
    const capture = latestCapture(result);
    if (capture) {
      lines.push(viewCaptureUrl(capture.timestamp, capture.originalUrl));
    }
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

// ─── Markdown Report ───

export interface RenderedReport {
  frontmatter: Record<string, unknown>;
  body: string;
}

function formatDownload(download: DownloadResult): string {
  const when = formatTimestamp(download.capture.timestamp);
  if (download.status === "failed") {
    return `  - ${when}: download failed (${download.error ?? "unknown error"})`;
  }
  return `  - ${when}: ${download.status} \`${download.digest ?? ""}\``;
}

function formatEntry(result: PostDeletionResult): string[] {
  if (result.resolution === "unresolved") {
    return [`- **${result.postId}**: ${result.error ?? "unknown error"}`];
  }
  const capture = latestCapture(result);
  if (!capture) return [`- **${result.postId}**`];

  const count = result.captures.length;
  const url = viewCaptureUrl(capture.timestamp, capture.originalUrl);
  const lines = [
    `- **${result.postId}**: ${count} ${count === 1 ? "capture" : "captures"}, latest [${formatTimestamp(capture.timestamp)}](${url})`,
  ];
  for (const download of result.downloads) {
    lines.push(formatDownload(download));
  }
  return lines;
}

export function renderReport(
  results: readonly PostDeletionResult[],
  opts: { screenName: string; generatedAt: Date },
): RenderedReport {
  const counts = countResolutions(results);
  const frontmatter = {
    account: opts.screenName,
    generated: opts.generatedAt.toISOString(),
    posts: results.length,
    deleted: counts.deleted,
    archived: counts.archived,
    extant: counts.extant,
    no_evidence: counts["no-evidence"],
    unresolved: counts.unresolved,
  };

  const sections: string[] = [`# Archived posts of @${opts.screenName}`];
  for (const [resolution, title] of SECTION_TITLES) {
    const group = results.filter((r) => r.resolution === resolution);
    if (group.length === 0) continue;
    sections.push(
      [
        `## ${title} (${group.length})`,
        "",
        ...group.flatMap(formatEntry),
      ].join("\n"),
    );
  }
  return { frontmatter, body: `${sections.join("\n\n")}\n` };
}

// ─── JSONL ───

export function toJsonlRecords(
  results: readonly PostDeletionResult[],
): Record<string, unknown>[] {
  return results.map((r) => ({
    post_id: r.postId,
    resolution: r.resolution,
    exists: r.exists ?? null,
    error: r.error ?? null,
    captures: r.captures.map((c) => ({
      timestamp: c.timestamp,
      url: c.originalUrl,
      digest: c.digest ?? null,
    })),
    downloads: r.downloads.map((d) => ({
      timestamp: d.capture.timestamp,
      status: d.status,
      digest: d.digest ?? null,
      path: d.path ?? null,
      error: d.error ?? null,
    })),
  }));
}
