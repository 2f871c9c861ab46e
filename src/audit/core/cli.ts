#!/usr/bin/env node
import { Command, Option } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  type CommandDeps,
  type DeletedCommandOptions,
  exitCodeForError,
  runDeleted,
  runPacing,
  runStoreCat,
  runStoreLookup,
  runStoreStats,
  runStoreVerify,
} from "./commands.js";
import { errorMessage } from "./errors.js";
import { PACING_PROFILES } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function deps(signal?: AbortSignal): CommandDeps {
  return {
    env: process.env,
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
      readStdin,
    },
    signal,
  };
}

async function run(command: () => Promise<number> | number): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (err) {
    console.error(`✗ ${errorMessage(err)}`);
    process.exitCode = exitCodeForError(err);
  }
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

const program = new Command()
  .name("post-audit")
  .description(
    "Find deleted posts in the web archive and keep local evidence copies",
  )
  .version("0.1.0");

program
  .command("deleted")
  .description("Resolve an account's archived posts against their live status")
  .argument("<screenName>", "Account screen name")
  .argument(
    "[ids...]",
    "Post identifiers or URLs (default: discover from the archive)",
  )
  .option("--stdin", "Read identifiers or URLs from standard input")
  .option("--limit <n>", "Resolve at most this many posts")
  .option("--report", "Render a Markdown report and download evidence")
  .option("--output <file>", "Write the report to a file instead of stdout")
  .option("--jsonl <file>", "Also write one JSON record per post")
  .option("--store <dir>", "Content store directory (downloads evidence)")
  .addOption(
    new Option("--pacing <profile>", "Pacing profile")
      .choices([...PACING_PROFILES])
      .default("default"),
  )
  .option("--index-concurrency <n>", "Index queries in flight", "1")
  .option("--content-concurrency <n>", "Downloads in flight", "2")
  .option("--no-check", "Skip the live-existence check")
  .option("--all-captures", "Download every capture, not only the most recent")
  .option("-v, --verbose", "More log output (repeatable)", increaseVerbosity, 0)
  .action(
    async (screenName: string, ids: string[], opts: DeletedCommandOptions) => {
      const controller = new AbortController();
      const onInterrupt = () => {
        if (controller.signal.aborted) process.exit(130);
        console.error(
          "\n[deleted] Interrupt received, cancelling (again to force)...",
        );
        controller.abort();
      };
      process.on("SIGINT", onInterrupt);
      try {
        await run(() =>
          runDeleted(screenName, ids, opts, deps(controller.signal)),
        );
      } finally {
        process.off("SIGINT", onInterrupt);
      }
    },
  );

const store = program
  .command("store")
  .description("Inspect the local content store");

store
  .command("stats")
  .description("Count stored files, posts and links")
  .option("--store <dir>", "Content store directory")
  .action(async (opts: { store?: string }) => {
    await run(() => runStoreStats(opts, deps()));
  });

store
  .command("lookup")
  .description("List stored captures of a post, or of every post")
  .argument("[postId]", "Post identifier")
  .option("--store <dir>", "Content store directory")
  .action(async (postId: string | undefined, opts: { store?: string }) => {
    await run(() => runStoreLookup(postId, opts, deps()));
  });

store
  .command("cat")
  .description("Print the content stored under a digest")
  .argument("<digest>", "Content digest")
  .option("--store <dir>", "Content store directory")
  .action(async (digest: string, opts: { store?: string }) => {
    await run(() => runStoreCat(digest, opts, deps()));
  });

store
  .command("verify")
  .description("Recompute stored digests and report mismatches")
  .option("--store <dir>", "Content store directory")
  .action(async (opts: { store?: string }) => {
    await run(() => runStoreVerify(opts, deps()));
  });

program
  .command("pacing")
  .description("Print the parameters of each pacing profile")
  .action(async () => {
    await run(() => runPacing(deps()));
  });

await program.parseAsync();
