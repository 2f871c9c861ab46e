import * as fs from "node:fs";
import * as path from "node:path";
import { stringify as yamlStringify } from "yaml";
import type { OutputWriter } from "./types.js";

/** Renders a Markdown document with YAML front matter. */
export function formatDocument(
  frontmatter: Record<string, unknown>,
  body: string,
): string {
  const fm = yamlStringify(frontmatter).trim();
  return `---\n${fm}\n---\n\n${body}`;
}

export function formatJsonl(records: Record<string, unknown>[]): string {
  if (records.length === 0) return "";
  return `${records.map((r) => JSON.stringify(r)).join("\n")}\n`;
}

export class FileOutputWriter implements OutputWriter {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private resolve(relativePath: string): string {
    return path.resolve(this.baseDir, relativePath);
  }

  private atomicWrite(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, filePath);
  }

  async writeDocument(
    relativePath: string,
    frontmatter: Record<string, unknown>,
    body: string,
  ): Promise<void> {
    this.atomicWrite(
      this.resolve(relativePath),
      formatDocument(frontmatter, body),
    );
  }

  async writeJsonl(
    relativePath: string,
    records: Record<string, unknown>[],
  ): Promise<void> {
    this.atomicWrite(this.resolve(relativePath), formatJsonl(records));
  }
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
