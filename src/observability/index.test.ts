import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { LexiconObserver, percentile } from "./index.js";

test("percentile picks the floor index over the sorted window", () => {
  assert.equal(percentile([], 95), 0);
  assert.equal(percentile([40, 10, 30, 20], 50), 20);
  assert.equal(percentile([40, 10, 30, 20], 95), 30);
  assert.equal(percentile([40, 10, 30, 20], 100), 40);
});

test("snapshot counts outcomes, tiers and reasons", () => {
  const observer = new LexiconObserver({ console: false });
  observer.recordOutcome({ kind: "found", tier: "direct", latencyMs: 4 });
  observer.recordOutcome({ kind: "found", tier: "inflected", latencyMs: 8 });
  observer.recordOutcome({ kind: "not_found", reason: "no_match", latencyMs: 12 });
  const snapshot = observer.snapshot();
  assert.equal(snapshot.total, 3);
  assert.deepEqual(snapshot.outcomes, { found: 2, not_found: 1 });
  assert.deepEqual(snapshot.tiers, { direct: 1, inflected: 1 });
  assert.deepEqual(snapshot.reasons, { no_match: 1 });
  assert.deepEqual(snapshot.latency, { samples: 3, p50Ms: 8, p95Ms: 8 });
});

test("log appends one JSON line per event to the structured log", () => {
  const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "lexeme-observer-"));
  try {
    const logPath = path.join(workspace, "logs", "lexicon.jsonl");
    const observer = new LexiconObserver({ console: false, structuredLogPath: logPath, now: () => 0 });
    observer.log("enrichment.echo_mismatch", { query: "nim", echoed: "nehmen" }, "warn");
    observer.log("enrichment.persisted", { lemma: "gehen" });
    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    assert.equal(lines.length, 2);
    assert.deepEqual(JSON.parse(lines[0] ?? ""), {
      ts: "1970-01-01T00:00:00.000Z",
      event: "enrichment.echo_mismatch",
      level: "warn",
      details: { query: "nim", echoed: "nehmen" },
    });
  } finally {
    fs.rmSync(workspace, { recursive: true, force: true });
  }
});
