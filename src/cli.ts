#!/usr/bin/env node

import { Command } from "commander";
import { getConfig, type SwitchyardConfigOverrides } from "./config.js";
import { errorMessage, isSwitchyardError } from "./errors.js";
import { createRuntime, type Runtime } from "./runtime.js";
import { TaskStatusSchema } from "./schemas.js";
import { ApiClient } from "./server/client.js";
import { ApiServer } from "./server/server.js";
import type { TaskSnapshot } from "./tasks/types.js";
import { setLogLevel } from "./utils/logger.js";
import { sleep } from "./utils/timeout.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("switchyard")
  .description("Run capability pipelines as trackable background tasks")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("-u, --url <url>", "API server URL", `http://${getConfig().server.host}:${getConfig().server.port}`);

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function client(cmd: Command): ApiClient {
  const opts = cmd.optsWithGlobals();
  return new ApiClient(typeof opts.url === "string" ? opts.url : `http://127.0.0.1:${getConfig().server.port}`);
}

function parsePayload(raw: string | undefined): unknown {
  if (raw === undefined) return {};
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    throw new Error(`Payload is not valid JSON: ${raw}`);
  }
}

function fail(err: unknown): void {
  const label = isSwitchyardError(err) ? err.kind : "Error";
  console.error(`${label}: ${errorMessage(err)}`);
  process.exitCode = 1;
}

function printTask(task: TaskSnapshot): void {
  const duration = task.finishedAt !== undefined && task.startedAt !== undefined
    ? ` ${task.finishedAt - task.startedAt}ms`
    : "";
  console.log(`${task.id}  ${task.status.padEnd(9)} ${task.kind}${duration}`);
  if (task.error) console.log(`  ${task.error.kind}: ${task.error.message}`);
}

// --- serve ---
program
  .command("serve")
  .description("Start the task API server")
  .option("-c, --config <path>", "JSON config file")
  .option("-p, --port <port>", "Port to listen on")
  .option("--host <host>", "Host to bind")
  .option("-w, --workers <n>", "Max concurrent task executions")
  .option("--store <path>", "SQLite file for task history")
  .action(async (opts: { config?: string; port?: string; host?: string; workers?: string; store?: string }) => {
    const overrides: SwitchyardConfigOverrides = {};
    if (opts.port) overrides.server = { port: Number(opts.port) };
    if (opts.host) overrides.server = { ...overrides.server, host: opts.host };
    if (opts.workers) overrides.workers = { maxWorkers: Number(opts.workers) };
    if (opts.store) overrides.store = { path: opts.store };

    let runtime: Runtime;
    try {
      runtime = createRuntime({ configPath: opts.config, overrides });
    } catch (err) {
      // Registration errors are fatal at startup.
      fail(err);
      return;
    }

    const server = new ApiServer({
      tasks: runtime.tasks,
      registry: runtime.registry,
      port: runtime.config.server.port,
      host: runtime.config.server.host,
    });
    const addr = await server.start();
    console.log(`API:     http://${addr.host}:${addr.port}`);
    console.log(`Workers: ${runtime.tasks.maxWorkers}`);
    console.log(`Kinds:   ${runtime.registry.catalog().kinds().join(", ")}`);
    console.log("Press Ctrl+C to stop.\n");

    const active = runtime;
    process.on("SIGINT", () => {
      server.stop().then(
        () => {
          active.close();
          process.exit(0);
        },
        (err: unknown) => {
          console.error("Shutdown failed:", errorMessage(err));
          process.exit(1);
        },
      );
    });
  });

// --- submit ---
program
  .command("submit")
  .description("Submit a task and print its id")
  .argument("<kind>", "Graph name, component:<name> or capability:<name>")
  .argument("[payload]", "JSON payload")
  .action(async function (this: Command, kind: string, payload: string | undefined) {
    try {
      console.log(await client(this).submit(kind, parsePayload(payload)));
    } catch (err) {
      fail(err);
    }
  });

// --- status ---
program
  .command("status")
  .description("Show a task")
  .argument("<taskId>")
  .option("--json", "Print the full snapshot as JSON")
  .action(async function (this: Command, taskId: string, opts: { json?: boolean }) {
    try {
      const task = await client(this).status(taskId);
      if (opts.json) {
        console.log(JSON.stringify(task, null, 2));
      } else {
        printTask(task);
        if (task.status === "succeeded") console.log(JSON.stringify(task.result, null, 2));
      }
    } catch (err) {
      fail(err);
    }
  });

// --- cancel ---
program
  .command("cancel")
  .description("Cancel a pending or running task")
  .argument("<taskId>")
  .action(async function (this: Command, taskId: string) {
    try {
      const outcome = await client(this).cancel(taskId);
      console.log(outcome.cancelled ? `Cancellation requested (${outcome.status})` : `Task already ${outcome.status}`);
    } catch (err) {
      fail(err);
    }
  });

// --- run ---
program
  .command("run")
  .description("Run a task and wait for its result")
  .argument("<kind>", "Graph name, component:<name> or capability:<name>")
  .argument("[payload]", "JSON payload")
  .option("-t, --timeout <ms>", "Deadline in milliseconds")
  .option("-c, --config <path>", "Config file for running in-process")
  .option("--local", "Run in-process instead of through the server")
  .action(async function (
    this: Command,
    kind: string,
    payload: string | undefined,
    opts: { timeout?: string; config?: string; local?: boolean },
  ) {
    const timeoutMs = opts.timeout ? Number(opts.timeout) : undefined;
    try {
      const input = parsePayload(payload);
      const api = client(this);
      if (!opts.local && (await api.isUp())) {
        console.log(JSON.stringify(await api.run(kind, input, timeoutMs), null, 2));
        return;
      }
      if (!opts.local) console.error("Server not reachable, running in-process...");

      const runtime = createRuntime({ configPath: opts.config, reaper: false });
      try {
        const result = await runtime.tasks.runSync(kind, input, timeoutMs);
        console.log(JSON.stringify(result, null, 2));
      } finally {
        runtime.close();
      }
    } catch (err) {
      fail(err);
    }
  });

// --- tasks ---
program
  .command("tasks")
  .description("List recent tasks")
  .option("-s, --status <status>", "Only tasks with this status")
  .option("-n, --limit <n>", "Maximum number of tasks")
  .option("-w, --watch", "Poll until every listed task is terminal")
  .action(async function (this: Command, opts: { status?: string; limit?: string; watch?: boolean }) {
    try {
      const status = opts.status === undefined ? undefined : TaskStatusSchema.parse(opts.status);
      const limit = opts.limit ? Number(opts.limit) : undefined;
      const api = client(this);
      for (;;) {
        const tasks = await api.list({ status, limit });
        if (tasks.length === 0) console.log("No tasks.");
        for (const task of tasks) printTask(task);
        const busy = tasks.some((t) => t.status === "pending" || t.status === "running");
        if (!opts.watch || !busy) return;
        await sleep(getConfig().cli.pollIntervalMs);
        console.log("");
      }
    } catch (err) {
      fail(err);
    }
  });

// --- health ---
program
  .command("health")
  .description("Show backend health")
  .option("--probe", "Probe every backend instead of reporting cached results")
  .action(async function (this: Command, opts: { probe?: boolean }) {
    try {
      console.log(JSON.stringify(await client(this).health(opts.probe === true), null, 2));
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
