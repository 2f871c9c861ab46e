import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  FileOutputWriter,
  formatDocument,
  formatJsonl,
} from "../../../src/audit/core/output.js";

describe("formatDocument", () => {
  it("puts YAML front matter before the body", () => {
    expect(formatDocument({ account: "example", posts: 3 }, "# Title\n")).toBe(
      "---\naccount: example\nposts: 3\n---\n\n# Title\n",
    );
  });
});

describe("formatJsonl", () => {
  it("writes one record per line with a trailing newline", () => {
    expect(formatJsonl([{ a: 1 }, { b: null }])).toBe('{"a":1}\n{"b":null}\n');
  });

  it("is empty for no records", () => {
    expect(formatJsonl([])).toBe("");
  });
});

describe("FileOutputWriter", () => {
  let tmpDir: string;
  let writer: FileOutputWriter;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "post-audit-out-"));
    writer = new FileOutputWriter(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a document and creates parent directories", async () => {
    await writer.writeDocument("reports/example.md", { account: "example" }, "body\n");

    const content = fs.readFileSync(path.join(tmpDir, "reports/example.md"), "utf-8");
    expect(content).toBe("---\naccount: example\n---\n\nbody\n");
    expect(fs.readdirSync(path.join(tmpDir, "reports"))).toEqual(["example.md"]);
  });

  it("replaces an existing file", async () => {
    await writer.writeJsonl("results.jsonl", [{ a: 1 }]);
    await writer.writeJsonl("results.jsonl", [{ b: 2 }]);

    expect(fs.readFileSync(path.join(tmpDir, "results.jsonl"), "utf-8")).toBe('{"b":2}\n');
  });

  it("accepts absolute paths", async () => {
    const target = path.join(tmpDir, "abs.jsonl");
    await writer.writeJsonl(target, [{ a: 1 }]);
    expect(fs.readFileSync(target, "utf-8")).toBe('{"a":1}\n');
  });
});
