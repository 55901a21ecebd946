import { existsSync } from "fs";
import { join } from "path";
import { emitCSV, ensureDir, promoteFile } from "./emitter.js";
import type { CollectOutcome, DatasetMap, Logger, Producer, RunError } from "../adapter.types.js";

export type DatasetSpec = {
  name: string;              // key in the producer's DatasetMap
  mainFile: string;          // e.g. "professors_data.csv"
  trackingPrefix: string;    // tracking file is <prefix>_<stamp>.csv
  columns: readonly string[];
  minRows?: number;
};

/** Cross-dataset check; returns one message per problem found. */
export type DatasetCheck = (datasets: DatasetMap) => string[];

export type PublisherConfig = {
  mainDir: string;
  trackingDir: string;
  datasets: readonly DatasetSpec[];
  checks?: readonly DatasetCheck[];
  now?: () => Date;
  log?: Logger;
};

export type PublishState = "idle" | "publishing" | "published" | "failed";

type RunFiles = { stamp: string; trackingFiles: string[]; mainFiles: string[] };

export type PublishResult =
  | ({ status: "published" } & RunFiles)
  | ({ status: "failed"; error: RunError } & RunFiles);

const pad = (n: number) => String(n).padStart(2, "0");

/** Sortable local-time tag, e.g. 20261018_064500. */
export function runStamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_`
    + `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

export function trackingName(spec: DatasetSpec, stamp: string) {
  return `${spec.trackingPrefix}_${stamp}.csv`;
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function validateDatasets(specs: readonly DatasetSpec[], checks: readonly DatasetCheck[], datasets: DatasetMap): string[] {
  const problems: string[] = [];
  for (const spec of specs) {
    const rows = datasets[spec.name];
    if (!rows) {
      problems.push(`dataset "${spec.name}" was not produced`);
      continue;
    }
    const min = spec.minRows ?? 0;
    if (rows.length < min) {
      problems.push(`dataset "${spec.name}" has ${rows.length} rows, expected at least ${min}`);
    }
    const idx = rows.findIndex(r => spec.columns.some(c => !(c in r)));
    if (idx >= 0) {
      const missing = spec.columns.filter(c => !(c in rows[idx]));
      problems.push(`dataset "${spec.name}" row ${idx} lacks ${missing.join(", ")}`);
    }
  }
  if (problems.length) return problems;
  return checks.flatMap(check => check(datasets));
}

/**
 * Runs a producer, keeps its output as a timestamped tracking snapshot, and
 * promotes the snapshot to the main files only when the run completed and
 * validated. Promotion is atomic per file; a crash between two files can leave
 * the later ones one run behind.
 */
export class SafePublisher {
  private state: PublishState = "idle";
  private readonly log: Logger;

  constructor(private readonly cfg: PublisherConfig) {
    this.log = cfg.log ?? console;
  }

  get current(): PublishState {
    return this.state;
  }

  private freeStamp(): string {
    const base = runStamp((this.cfg.now ?? (() => new Date()))());
    const taken = (stamp: string) =>
      this.cfg.datasets.some(s => existsSync(join(this.cfg.trackingDir, trackingName(s, stamp))));
    let stamp = base;
    // _002, _003, ... sort after the bare stamp and in run order
    for (let n = 2; taken(stamp); n++) stamp = `${base}_${String(n).padStart(3, "0")}`;
    return stamp;
  }

  private async collect(producer: Producer): Promise<CollectOutcome> {
    try {
      return await producer();
    } catch (e) {
      return { ok: false, error: { kind: "unexpected", message: errorMessage(e) }, partial: {} };
    }
  }

  async publish(producer: Producer): Promise<PublishResult> {
    if (this.state === "publishing") throw new Error("publish already in progress");
    this.state = "publishing";

    const { mainDir, trackingDir, datasets: specs } = this.cfg;
    const stamp = this.freeStamp();
    const files: RunFiles = { stamp, trackingFiles: [], mainFiles: [] };
    const fail = (error: RunError): PublishResult => {
      this.state = "failed";
      this.log.error(`Run ${stamp} failed (${error.kind}): ${error.message}`);
      return { status: "failed", error, ...files };
    };

    const outcome = await this.collect(producer);
    const produced = outcome.ok ? outcome.datasets : outcome.partial;

    // Tracking snapshot first, whatever the outcome
    try {
      for (const spec of specs) {
        const rows = produced[spec.name];
        if (!rows) continue;
        files.trackingFiles.push(await emitCSV(trackingDir, trackingName(spec, stamp), spec.columns, rows));
        this.log.log(`Tracking ${spec.name}: ${rows.length} rows -> ${trackingName(spec, stamp)}`);
      }
    } catch (e) {
      if (outcome.ok) return fail({ kind: "write", message: `tracking write failed: ${errorMessage(e)}` });
      this.log.warn(`WARN tracking write failed: ${errorMessage(e)}`);
    }

    if (!outcome.ok) return fail(outcome.error);

    const problems = validateDatasets(specs, this.cfg.checks ?? [], produced);
    if (problems.length) return fail({ kind: "validation", message: problems.join("; ") });

    try {
      ensureDir(mainDir);
      for (const spec of specs) {
        const dest = join(mainDir, spec.mainFile);
        await promoteFile(join(trackingDir, trackingName(spec, stamp)), dest);
        files.mainFiles.push(dest);
      }
    } catch (e) {
      const done = files.mainFiles.length ? ` (already promoted: ${files.mainFiles.join(", ")})` : "";
      return fail({ kind: "write", message: `promotion failed: ${errorMessage(e)}${done}` });
    }

    this.state = "published";
    this.log.log(`Run ${stamp} published ${files.mainFiles.length} files to ${mainDir}`);
    return { status: "published", ...files };
  }
}
