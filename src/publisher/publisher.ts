import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { DEFAULT_NAMING, DEFAULT_PUBLISHER } from "../config/defaults.js";
import { BridgeError, errorMessage } from "../core/errors.js";
import type { ScoredCandidate } from "../types/candidate.js";
import type { NamingConfig, PublisherConfig } from "../types/config.js";
import type { EvolutionLogEntry, ExtractionManifest } from "../types/manifest.js";
import { DESCRIPTION_FILE, renderDescription } from "./description.js";
import { DestinationIndex } from "./destination-index.js";
import { EvolutionLog, defaultEvolutionLogPath } from "./evolution-log.js";
import { type CandidateEvent, type CandidateState, traceCandidate } from "./lifecycle.js";
import { withDestinationLock } from "./lock.js";
import { MANIFEST_FILE, buildManifest, serializeManifest } from "./manifest.js";
import { type NamingResult, derivePublicName } from "./naming.js";
import { redactSecrets } from "./sanitize.js";

export const STAGING_DIR = ".staging";

export type PublishMode = "dryRun" | "apply";

type OutcomeBase = {
  sourcePath: string;
  publicName: string;
  score: number;
  notes: string[];
  /** Lifecycle states visited, from "discovered" to the last one reached. */
  trace: CandidateState[];
};

export type PublishOutcome =
  | (OutcomeBase & { status: "published"; targetDir: string; manifest: ExtractionManifest })
  | (OutcomeBase & { status: "would_publish" })
  | (OutcomeBase & { status: "collision"; existingName: string; existingSource: string | null; message: string })
  | (OutcomeBase & { status: "failed"; code: "WRITE_FAILURE"; message: string });

export type PublisherOptions = {
  destRoot: string;
  projectId: string;
  naming?: NamingConfig;
  settings?: PublisherConfig;
  now?: () => Date;
};

const DERIVED: CandidateEvent[] = ["score", "accept", "derive_name"];

/**
 * Publisher: turns eligible candidates into publications under a
 * destination root.
 *
 * Layout per publication:
 *   <dest>/<public_name>/<public_name>
 *   <dest>/<public_name>/manifest.json
 *   <dest>/<public_name>/README.md      (generated, only when the source had no docs)
 *
 * Each publication is staged under <dest>/.staging and moved into place with
 * one directory rename, so the destination never holds a partial one.
 */
export class Publisher {
  readonly destRoot: string;
  readonly log: EvolutionLog;
  private readonly projectId: string;
  private readonly naming: NamingConfig;
  private readonly settings: PublisherConfig;
  private readonly now: () => Date;

  constructor(opts: PublisherOptions) {
    this.destRoot = path.resolve(opts.destRoot);
    this.projectId = opts.projectId;
    this.naming = opts.naming ?? DEFAULT_NAMING;
    this.settings = opts.settings ?? DEFAULT_PUBLISHER;
    this.now = opts.now ?? (() => new Date());
    this.log = new EvolutionLog(
      this.settings.evolution_log ? path.resolve(this.settings.evolution_log) : defaultEvolutionLogPath(this.destRoot),
    );
  }

  /** Ineligible candidates are ignored. */
  async publish(candidates: readonly ScoredCandidate[], mode: PublishMode): Promise<PublishOutcome[]> {
    return mode === "apply" ? this.apply(candidates) : this.plan(candidates);
  }

  /** Derive names and detect collisions without touching the filesystem. */
  plan(candidates: readonly ScoredCandidate[]): PublishOutcome[] {
    const index = DestinationIndex.load(this.destRoot);
    return candidates.filter((c) => c.eligible).map((candidate): PublishOutcome => {
      const derived = this.derive(candidate);
      const collision = this.checkCollision(index, candidate, derived);
      if (collision) return collision;

      index.add(derived.publicName, candidate.path);
      return { status: "would_publish", ...this.base(candidate, derived, DERIVED) };
    });
  }

  /**
   * Publish under the destination lock. A failing candidate is cleaned up
   * and reported; candidates published before it stay published.
   */
  async apply(candidates: readonly ScoredCandidate[]): Promise<PublishOutcome[]> {
    try {
      fs.mkdirSync(this.destRoot, { recursive: true });
    } catch (e) {
      throw new BridgeError("DESTINATION_UNREADABLE", `Cannot create destination ${this.destRoot}: ${errorMessage(e)}`, { path: this.destRoot }, { cause: e });
    }

    return withDestinationLock(this.destRoot, { staleSeconds: this.settings.lock_stale_seconds, now: this.now }, () => {
      const index = DestinationIndex.load(this.destRoot);
      try {
        this.log.init();
      } catch (e) {
        throw new BridgeError("WRITE_FAILURE", `Cannot prepare evolution log ${this.log.filePath}: ${errorMessage(e)}`, { path: this.log.filePath }, { cause: e });
      }

      const outcomes: PublishOutcome[] = [];
      for (const candidate of candidates) {
        if (!candidate.eligible) continue;
        const derived = this.derive(candidate);
        outcomes.push(this.checkCollision(index, candidate, derived) ?? this.commit(candidate, derived, index));
      }
      return outcomes;
    });
  }

  /** Public name, kept clear of the manifest file that shares its directory. */
  private derive(candidate: ScoredCandidate): NamingResult {
    const derived = derivePublicName(candidate.path, this.naming, this.projectId);
    if (derived.publicName.toLowerCase() !== MANIFEST_FILE) return derived;
    const publicName = `${this.projectId}${this.naming.public_separator}${derived.publicName}`;
    return { publicName, notes: [...derived.notes, `prefix-reserved: ${derived.publicName} -> ${publicName}`] };
  }

  private base(candidate: ScoredCandidate, derived: NamingResult, events: CandidateEvent[]): OutcomeBase {
    return {
      sourcePath: candidate.path,
      publicName: derived.publicName,
      score: candidate.score,
      notes: derived.notes,
      trace: traceCandidate(events),
    };
  }

  private checkCollision(index: DestinationIndex, candidate: ScoredCandidate, derived: NamingResult): PublishOutcome | null {
    const existing = index.find(derived.publicName);
    if (!existing) return null;
    return {
      status: "collision",
      ...this.base(candidate, derived, [...DERIVED, "collide"]),
      existingName: existing.name,
      existingSource: existing.sourcePath,
      message:
        `Name collision on ${derived.publicName}: already published from ${existing.sourcePath ?? "(unmanaged entry)"}, ` +
        `incoming ${candidate.path}`,
    };
  }

  private commit(candidate: ScoredCandidate, derived: NamingResult, index: DestinationIndex): PublishOutcome {
    const stagingRoot = path.join(this.destRoot, STAGING_DIR);
    const stageDir = path.join(stagingRoot, `${derived.publicName}.${crypto.randomBytes(4).toString("hex")}`);
    const targetDir = path.join(this.destRoot, derived.publicName);
    const notes = [...derived.notes];
    let committed = false;

    try {
      fs.mkdirSync(stageDir, { recursive: true });

      let content: Buffer = fs.readFileSync(candidate.absolutePath);
      if (this.settings.redact_secrets) {
        const redacted = redactSecrets(content);
        if (redacted.redactions > 0) {
          content = redacted.content;
          notes.push(`redact-secrets: ${redacted.redactions} value(s)`);
        }
      }
      const describe =
        this.settings.generate_description &&
        !candidate.hasDocumentation &&
        derived.publicName.toLowerCase() !== DESCRIPTION_FILE.toLowerCase();
      if (describe) notes.push(`generate-description: ${DESCRIPTION_FILE}`);

      const manifest = buildManifest({
        sourcePath: candidate.path,
        publicName: derived.publicName,
        notes,
        score: candidate.score,
        category: candidate.category,
        projectId: this.projectId,
        content,
        extractedAt: this.now(),
      });

      fs.writeFileSync(path.join(stageDir, derived.publicName), content);
      if (describe) fs.writeFileSync(path.join(stageDir, DESCRIPTION_FILE), renderDescription(manifest), "utf8");
      fs.writeFileSync(path.join(stageDir, MANIFEST_FILE), serializeManifest(manifest), "utf8");

      const entry: EvolutionLogEntry = {
        source_path: manifest.source_path,
        output_name: manifest.public_name,
        timestamp: manifest.extracted_at,
        notes: manifest.transformation_notes,
        score: manifest.score_at_extraction,
        sha256: manifest.sha256,
      };
      const line = this.log.serialize(entry);

      fs.renameSync(stageDir, targetDir);
      committed = true;
      this.log.appendLine(line);

      index.add(derived.publicName, candidate.path, manifest);
      return {
        status: "published",
        ...this.base(candidate, { publicName: derived.publicName, notes }, [...DERIVED, "commit"]),
        targetDir,
        manifest,
      };
    } catch (e) {
      if (committed) fs.rmSync(targetDir, { recursive: true, force: true });
      return {
        status: "failed",
        ...this.base(candidate, { publicName: derived.publicName, notes }, [...DERIVED, "fail"]),
        code: "WRITE_FAILURE",
        message: `Failed to publish ${candidate.path}: ${errorMessage(e)}`,
      };
    } finally {
      fs.rmSync(stageDir, { recursive: true, force: true });
      removeIfEmpty(stagingRoot);
    }
  }
}

function removeIfEmpty(dir: string): void {
  if (fs.existsSync(dir) && fs.readdirSync(dir).length === 0) fs.rmdirSync(dir);
}
