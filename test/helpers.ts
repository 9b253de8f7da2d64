import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DAY_MS } from "../src/scorer/signals.js";

/** Fixed clock for recency scoring; whole seconds so mtimes round-trip exactly. */
export const NOW = new Date("2026-03-01T12:00:00.000Z");

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `bridge-${prefix}-`));
}

/** Write a file (creating parents) with an explicit modification time. */
export function writeFile(root: string, rel: string, content: string | Buffer, modifiedAt: Date = daysAgo(1)): string {
  const abs = path.join(root, rel);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content);
  fs.utimesSync(abs, modifiedAt, modifiedAt);
  return abs;
}

/**
 * A small workspace:
 *   scratch.py              50 bytes, 200 days old, no docs or tests
 *   tools/my_tool.py        2048 bytes, 1 day old, mentioned in README, has a test
 *   tools/my_tool_test.py
 *   tools/README.md
 */
export function makeSampleWorkspace(root: string): void {
  writeFile(root, "scratch.py", "#".repeat(50), daysAgo(200));
  writeFile(root, "tools/my_tool.py", "print('hi')\n".padEnd(2048, "#"));
  writeFile(root, "tools/my_tool_test.py", "from my_tool import *\n");
  writeFile(root, "tools/README.md", "my_tool.py prints a greeting.\n");
}
