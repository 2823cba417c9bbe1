import assert from "node:assert/strict";
import test from "node:test";
import { Chalk } from "chalk";
import { run_cli, type CliDeps } from "../src/cli/program.js";
import type { HeartbeatRecord } from "../src/heartbeat/types.js";
import { MemoryHeartbeatStore } from "./helpers/memory-store.js";

const NOW = 1_700_000_000;

const backup: HeartbeatRecord = {
  code: "backup",
  last_message_template: "Backups ran %s ago",
  never_message: "Backups have never run",
  leniency_seconds: 3_600,
  last_ping: NOW - 3_724,
};

const gym: HeartbeatRecord = {
  code: "gym",
  last_message_template: "Gym was %s ago",
  never_message: "Never been to the gym",
  leniency_seconds: 0,
  last_ping: null,
};

type Harness = {
  deps: CliDeps;
  store: MemoryHeartbeatStore;
  out: string[];
  err: string[];
  asked: string[];
};

function harness(records: HeartbeatRecord[] = [], options?: { answers?: string[]; is_tty?: boolean }): Harness {
  const store = new MemoryHeartbeatStore(records);
  const out: string[] = [];
  const err: string[] = [];
  const asked: string[] = [];
  const answers = [...(options?.answers ?? [])];
  const deps: CliDeps = {
    store,
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    prompt: async (question) => {
      asked.push(question);
      return answers.shift() ?? "";
    },
    now_s: () => NOW,
    is_tty: options?.is_tty ?? true,
    paint: new Chalk({ level: 0 }),
    motd_title: "Heartbeats",
  };
  return { deps, store, out, err, asked };
}

test("no flags prints usage and exits 0", async () => {
  const h = harness();
  assert.equal(await run_cli([], h.deps), 0);
  assert.equal(h.out.length, 1);
  assert.match(h.out[0], /^Usage: heartbeat \[options\]/);
  assert.equal(h.store.loads, 0);
});

test("--help exits 0 without touching the store", async () => {
  const h = harness();
  assert.equal(await run_cli(["--help"], h.deps), 0);
  assert.match(h.out[0], /--ping <code>/);
  assert.equal(h.store.loads, 0);
});

test("unknown flags are a usage error", async () => {
  const h = harness();
  assert.equal(await run_cli(["--bogus"], h.deps), 1);
  assert.match(h.err[0], /unknown option '--bogus'/);
});

test("--add prompts for each field and saves the new heartbeat", async () => {
  const h = harness([gym], { answers: [" backup ", "Backups ran %s ago", "Backups have never run", "3600"] });

  assert.equal(await run_cli(["--add"], h.deps), 0);

  assert.deepEqual(h.asked, ["Code: ", "Last line: ", "Never line: ", "Leniency (seconds): "]);
  assert.deepEqual(h.out, ["added backup"]);
  assert.deepEqual(h.store.records, [gym, { ...backup, last_ping: null }]);
  assert.equal(h.store.saves, 1);
});

test("--add with a blank leniency stores zero", async () => {
  const h = harness([], { answers: ["gym", "Gym was %s ago", "Never been to the gym", ""] });
  assert.equal(await run_cli(["--add"], h.deps), 0);
  assert.deepEqual(h.store.records, [gym]);
});

test("--add of an existing code fails with exit 1 and saves nothing", async () => {
  const h = harness([backup], { answers: ["backup", "Again %s", "Never", "10"] });

  assert.equal(await run_cli(["--add"], h.deps), 1);

  assert.deepEqual(h.err, ["heartbeat: heartbeat 'backup' already exists"]);
  assert.deepEqual(h.store.records, [backup]);
  assert.equal(h.store.saves, 0);
});

test("--add rejects a leniency that is not a whole number before loading the store", async () => {
  const h = harness([], { answers: ["gym", "Gym was %s ago", "Never been to the gym", "soon"] });

  assert.equal(await run_cli(["--add"], h.deps), 1);

  assert.deepEqual(h.err, [
    "heartbeat: invalid heartbeat: leniency_seconds: expected a whole number of seconds, got 'soon'",
  ]);
  assert.equal(h.store.loads, 0);
});

test("--add rejects a template without a placeholder", async () => {
  const h = harness([], { answers: ["gym", "Went to the gym", "Never been to the gym", "0"] });

  assert.equal(await run_cli(["--add"], h.deps), 1);

  assert.deepEqual(h.err, [
    "heartbeat: invalid heartbeat: last_message_template: must contain exactly one %s placeholder",
  ]);
  assert.deepEqual(h.store.records, []);
});

test("--ping records the current time", async () => {
  const h = harness([gym]);

  assert.equal(await run_cli(["--ping", "gym"], h.deps), 0);

  assert.deepEqual(h.out, ["pinged gym"]);
  assert.deepEqual(h.store.records, [{ ...gym, last_ping: NOW }]);
});

test("--ping of an unknown code exits 1 with a one-line message", async () => {
  const h = harness([gym]);

  assert.equal(await run_cli(["--ping", "dentist"], h.deps), 1);

  assert.deepEqual(h.err, ["heartbeat: heartbeat 'dentist' not found"]);
  assert.deepEqual(h.store.records, [gym]);
  assert.equal(h.store.saves, 0);
});

test("--remove deletes the heartbeat", async () => {
  const h = harness([backup, gym]);

  assert.equal(await run_cli(["--remove", "backup"], h.deps), 0);

  assert.deepEqual(h.out, ["removed backup"]);
  assert.deepEqual(h.store.records, [gym]);
});

test("--remove of an unknown code exits 1", async () => {
  const h = harness([gym]);
  assert.equal(await run_cli(["--remove", "backup"], h.deps), 1);
  assert.deepEqual(h.err, ["heartbeat: heartbeat 'backup' not found"]);
});

test("--list prints each code with its status line", async () => {
  const h = harness([backup, gym]);

  assert.equal(await run_cli(["--list"], h.deps), 0);

  assert.deepEqual(h.out, [
    "backup: Backups ran 1 hour, 2 minutes and 4 seconds ago",
    "gym: Never been to the gym",
  ]);
  assert.equal(h.store.saves, 0);
});

test("--motd prints the summary when stdout is a terminal", async () => {
  const h = harness([backup, gym]);

  assert.equal(await run_cli(["--motd"], h.deps), 0);

  assert.deepEqual(h.out, [
    "Heartbeats",
    "==========",
    "",
    "* Backups ran 1 hour, 2 minutes and 4 seconds ago",
    "* Never been to the gym",
  ]);
});

test("--motd stays silent when stdout is not a terminal", async () => {
  const h = harness([backup, gym], { is_tty: false });
  assert.equal(await run_cli(["--motd"], h.deps), 0);
  assert.deepEqual(h.out, []);
  assert.equal(h.store.loads, 0);
});

test("--motd takes precedence over --ping", async () => {
  const h = harness([gym]);
  assert.equal(await run_cli(["--ping", "gym", "--motd"], h.deps), 0);
  assert.deepEqual(h.out, ["Heartbeats", "==========", "", "* Never been to the gym"]);
  assert.deepEqual(h.store.records, [gym]);
});

test("a failed save is reported and exits 1", async () => {
  const h = harness([gym]);
  h.store.fail_save = true;

  assert.equal(await run_cli(["--ping", "gym"], h.deps), 1);

  assert.deepEqual(h.err, ["heartbeat: could not save heartbeats: memory"]);
  assert.deepEqual(h.out, []);
  assert.deepEqual(h.store.records, [gym]);
});
