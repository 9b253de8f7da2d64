import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { DEFAULT_PUBLISHER, DEFAULT_SCORING } from "../src/config/defaults.js";
import { isBridgeError } from "../src/core/errors.js";
import { LOCK_FILE } from "../src/publisher/lock.js";
import { sha256Hex } from "../src/publisher/manifest.js";
import { type PublishOutcome, Publisher, STAGING_DIR } from "../src/publisher/publisher.js";
import { scoreCandidate } from "../src/scorer/scorer.js";
import { categorize } from "../src/scanner/category.js";
import type { ScoredCandidate } from "../src/types/candidate.js";
import type { PublisherConfig } from "../src/types/config.js";
import { NOW, daysAgo, tmpDir, writeFile } from "./helpers.js";

/** A scored candidate for a file written into the workspace. */
function candidate(ws: string, rel: string, content: string, opts: { docs?: boolean; tests?: boolean } = {}): ScoredCandidate {
  const abs = writeFile(ws, rel, content);
  return scoreCandidate(
    {
      path: rel,
      absolutePath: abs,
      sizeBytes: Buffer.byteLength(content),
      modifiedAt: daysAgo(1),
      hasDocumentation: opts.docs ?? true,
      hasTests: opts.tests ?? true,
      category: categorize(rel),
    },
    DEFAULT_SCORING,
    NOW,
  );
}

/** Large enough that tests plus recency clear the default threshold without docs. */
const SYNC_SCRIPT = "echo sync\n".repeat(20);

function statuses(outcomes: PublishOutcome[]): Array<[string, string]> {
  return outcomes.map((o) => [o.sourcePath, o.status]);
}

describe("Publisher", () => {
  let root: string;
  let ws: string;
  let dest: string;

  const publisher = (settings: PublisherConfig = DEFAULT_PUBLISHER) =>
    new Publisher({ destRoot: dest, projectId: "demo", settings, now: () => NOW });

  beforeEach(() => {
    root = tmpDir("publish");
    ws = path.join(root, "ws");
    dest = path.join(root, "public");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe("dry run", () => {
    it("plans without creating the destination", async () => {
      const c = candidate(ws, "tools/my_tool.py", "print('hi')\n");
      const outcomes = await publisher().publish([c], "dryRun");

      expect(outcomes).toEqual([
        {
          status: "would_publish",
          sourcePath: "tools/my_tool.py",
          publicName: "my-tool.py",
          score: c.score,
          notes: ["replace-separators: my_tool.py -> my-tool.py"],
          trace: ["discovered", "scored", "eligible", "name_derived"],
        },
      ]);
      expect(fs.existsSync(dest)).toBe(false);
    });

    it("leaves an existing destination untouched and is repeatable", async () => {
      const c = candidate(ws, "a.py", "a = 1\n");
      fs.mkdirSync(dest);
      const p = publisher();
      const first = await p.publish([c], "dryRun");
      const second = await p.publish([c], "dryRun");
      expect(second).toEqual(first);
      expect(fs.readdirSync(dest)).toEqual([]);
    });

    it("skips ineligible candidates", async () => {
      const weak = candidate(ws, "weak.py", "x\n", { docs: false, tests: false });
      expect(weak.eligible).toBe(false);
      expect(await publisher().publish([weak], "dryRun")).toEqual([]);
    });

    it("predicts collisions inside one batch", async () => {
      const a = candidate(ws, "a/my_tool.py", "a\n");
      const b = candidate(ws, "b/my-tool.py", "b\n");
      const outcomes = await publisher().publish([a, b], "dryRun");
      expect(statuses(outcomes)).toEqual([
        ["a/my_tool.py", "would_publish"],
        ["b/my-tool.py", "collision"],
      ]);
      const second = outcomes[1];
      expect(second.status === "collision" && second.existingSource).toBe("a/my_tool.py");
    });
  });

  describe("apply", () => {
    it("publishes the artifact with a manifest and a log entry", async () => {
      const c = candidate(ws, "tools/my_tool.py", "print('hi')\n");
      const [outcome] = await publisher().publish([c], "apply");

      expect(outcome.status).toBe("published");
      expect(outcome.trace).toEqual(["discovered", "scored", "eligible", "name_derived", "published"]);

      const dir = path.join(dest, "my-tool.py");
      expect(fs.readdirSync(dir).sort()).toEqual(["manifest.json", "my-tool.py"]);
      expect(fs.readFileSync(path.join(dir, "my-tool.py"), "utf8")).toBe("print('hi')\n");

      const manifest: unknown = JSON.parse(fs.readFileSync(path.join(dir, "manifest.json"), "utf8"));
      expect(manifest).toEqual({
        schema_version: "1.0.0",
        source_path: "tools/my_tool.py",
        public_name: "my-tool.py",
        extracted_at: NOW.toISOString(),
        transformation_notes: ["replace-separators: my_tool.py -> my-tool.py"],
        score_at_extraction: c.score,
        category: "tool",
        project_id: "demo",
        sha256: sha256Hex("print('hi')\n"),
        bytes: 12,
      });

      const lines = fs.readFileSync(path.join(dest, ".evolution.jsonl"), "utf8").trim().split("\n");
      expect(lines.map((l) => JSON.parse(l))).toEqual([
        {
          source_path: "tools/my_tool.py",
          output_name: "my-tool.py",
          timestamp: NOW.toISOString(),
          notes: ["replace-separators: my_tool.py -> my-tool.py"],
          score: c.score,
          sha256: sha256Hex("print('hi')\n"),
        },
      ]);
    });

    it("leaves no lock or staging area behind", async () => {
      const c = candidate(ws, "a.py", "a = 1\n");
      await publisher().publish([c], "apply");
      expect(fs.existsSync(path.join(dest, LOCK_FILE))).toBe(false);
      expect(fs.existsSync(path.join(dest, STAGING_DIR))).toBe(false);
    });

    it("writes a description for undocumented artifacts", async () => {
      const c = candidate(ws, "sync.sh", SYNC_SCRIPT, { docs: false });
      expect(c.eligible).toBe(true);
      const [outcome] = await publisher().publish([c], "apply");

      expect(outcome.notes).toEqual(["generate-description: README.md"]);
      const readme = fs.readFileSync(path.join(dest, "sync.sh", "README.md"), "utf8");
      expect(readme.split("\n")[0]).toBe("# sync.sh");
      expect(readme).toContain("- generate-description: README.md");
    });

    it("does not write a description when disabled", async () => {
      const c = candidate(ws, "sync.sh", SYNC_SCRIPT, { docs: false });
      await publisher({ ...DEFAULT_PUBLISHER, generate_description: false }).publish([c], "apply");
      expect(fs.readdirSync(path.join(dest, "sync.sh")).sort()).toEqual(["manifest.json", "sync.sh"]);
    });

    it("redacts inline secrets and checksums the published bytes", async () => {
      const c = candidate(ws, "client.py", 'api_key = "test-secret"\n');
      const [outcome] = await publisher().publish([c], "apply");

      const published = fs.readFileSync(path.join(dest, "client.py", "client.py"), "utf8");
      expect(published).toBe('api_key = "REDACTED"\n');
      expect(outcome.notes).toEqual(["redact-secrets: 1 value(s)"]);
      expect(outcome.status === "published" && outcome.manifest.sha256).toBe(sha256Hex('api_key = "REDACTED"\n'));
      // the workspace copy is never modified
      expect(fs.readFileSync(c.absolutePath, "utf8")).toBe('api_key = "test-secret"\n');
    });

    it("keeps secrets when redaction is off", async () => {
      const c = candidate(ws, "client.py", 'api_key = "test-secret"\n');
      await publisher({ ...DEFAULT_PUBLISHER, redact_secrets: false }).publish([c], "apply");
      expect(fs.readFileSync(path.join(dest, "client.py", "client.py"), "utf8")).toBe('api_key = "test-secret"\n');
    });

    it("keeps public names clear of the manifest file", async () => {
      const c = candidate(ws, "meta/manifest.json", '{"a": 1}\n');
      const [outcome] = await publisher().publish([c], "apply");
      expect(outcome.publicName).toBe("demo-manifest.json");
      expect(outcome.notes[0]).toBe("prefix-reserved: manifest.json -> demo-manifest.json");
      expect(fs.existsSync(path.join(dest, "demo-manifest.json", "demo-manifest.json"))).toBe(true);
    });

    it("refuses to overwrite an earlier publication", async () => {
      const c = candidate(ws, "tools/my_tool.py", "v1\n");
      await publisher().publish([c], "apply");
      writeFile(ws, "tools/my_tool.py", "v2\n");

      const [outcome] = await publisher().publish([c], "apply");
      expect(outcome.status).toBe("collision");
      expect(outcome.status === "collision" && outcome.message).toBe(
        "Name collision on my-tool.py: already published from tools/my_tool.py, incoming tools/my_tool.py",
      );
      expect(fs.readFileSync(path.join(dest, "my-tool.py", "my-tool.py"), "utf8")).toBe("v1\n");
      expect(fs.readFileSync(path.join(dest, ".evolution.jsonl"), "utf8").trim().split("\n")).toHaveLength(1);
    });

    it("collides with unmanaged entries regardless of case", async () => {
      fs.mkdirSync(path.join(dest, "My-Tool.py"), { recursive: true });
      const c = candidate(ws, "my_tool.py", "x = 1\n");
      const [outcome] = await publisher().publish([c], "apply");
      expect(outcome.status === "collision" && [outcome.existingName, outcome.existingSource]).toEqual(["My-Tool.py", null]);
      expect(outcome.status === "collision" && outcome.message).toBe(
        "Name collision on my-tool.py: already published from (unmanaged entry), incoming my_tool.py",
      );
    });

    it("keeps earlier publications when a later candidate fails", async () => {
      const a = candidate(ws, "a.py", "a = 1\n");
      const b = candidate(ws, "b.py", "b = 1\n");
      fs.rmSync(b.absolutePath);

      const outcomes = await publisher().publish([a, b], "apply");
      expect(statuses(outcomes)).toEqual([
        ["a.py", "published"],
        ["b.py", "failed"],
      ]);
      const failed = outcomes[1];
      expect(failed.status === "failed" && failed.code).toBe("WRITE_FAILURE");
      expect(failed.trace.at(-1)).toBe("failed");

      expect(fs.readdirSync(dest).sort()).toEqual([".evolution.jsonl", "a.py"]);
      expect(fs.readFileSync(path.join(dest, ".evolution.jsonl"), "utf8").trim().split("\n")).toHaveLength(1);
    });

    it("rolls back a publication whose log entry cannot be written", async () => {
      const c = candidate(ws, "a.py", "a = 1\n");
      const append = vi.spyOn(fs, "appendFileSync").mockImplementation(() => {
        throw Object.assign(new Error("ENOSPC: no space left on device, write"), { code: "ENOSPC" });
      });

      try {
        const [outcome] = await publisher().publish([c], "apply");
        expect(outcome.status).toBe("failed");
        expect(outcome.status === "failed" && outcome.code).toBe("WRITE_FAILURE");
      } finally {
        append.mockRestore();
      }
      expect(fs.readdirSync(dest)).toEqual([".evolution.jsonl"]);
      expect(fs.readFileSync(path.join(dest, ".evolution.jsonl"), "utf8")).toBe("");
    });

    it("creates the evolution log even when nothing is published", async () => {
      const weak = candidate(ws, "weak.py", "x\n", { docs: false, tests: false });
      expect(await publisher().publish([weak], "apply")).toEqual([]);
      expect(fs.readdirSync(dest)).toEqual([".evolution.jsonl"]);
      expect(fs.readFileSync(path.join(dest, ".evolution.jsonl"), "utf8")).toBe("");
    });

    it("fails the run when the evolution log cannot be opened", async () => {
      const logDir = path.join(root, "log-is-a-directory");
      fs.mkdirSync(logDir);
      const c = candidate(ws, "a.py", "a = 1\n");

      let caught: unknown;
      try {
        await publisher({ ...DEFAULT_PUBLISHER, evolution_log: logDir }).publish([c], "apply");
      } catch (e) {
        caught = e;
      }
      expect(isBridgeError(caught, "WRITE_FAILURE")).toBe(true);
      expect(fs.readdirSync(dest)).toEqual([]);
    });

    it("fails the run while another run holds the lock", async () => {
      fs.mkdirSync(dest, { recursive: true });
      fs.writeFileSync(path.join(dest, LOCK_FILE), "{}\n");
      const c = candidate(ws, "a.py", "a = 1\n");

      let caught: unknown;
      try {
        await publisher().publish([c], "apply");
      } catch (e) {
        caught = e;
      }
      expect(isBridgeError(caught, "LOCK_HELD")).toBe(true);
      expect(fs.readdirSync(dest)).toEqual([LOCK_FILE]);
    });
  });
});
