import yargs from "yargs";
import { loadSettings, resolveLogLevel, type CliOverrides } from "../config/env.js";
import { ConfigError, PveToolError } from "../errors.js";
import type { SnapshotOperationHooks } from "../services/snapshotService.js";
import { createLogger, type Logger } from "../telemetry/logger.js";
import type { SnapshotTaskResult } from "../types/snapshot.js";
import { openContext as defaultOpenContext, type CommandContext, type OpenContext } from "./context.js";
import {
  renderNodes,
  renderSnapshotList,
  renderSubmitted,
  renderVersion,
  renderVmCheck,
  renderVmInfo,
  renderVmTable,
  TASK_COMPLETED
} from "./render.js";

export const PROGRAM_NAME = "pve-tool";
export const PROGRAM_VERSION = "0.3.0";

export interface Writer {
  write(chunk: string): unknown;
}

export interface RunOptions {
  env?: Record<string, string | undefined>;
  stdout?: Writer;
  stderr?: Writer;
  openContext?: OpenContext;
  /** Otherwise built from the resolved log level. */
  logger?: Logger;
  /** Cancels API requests and task waits (wired to SIGINT by the entry point). */
  signal?: AbortSignal;
}

export class UsageError extends PveToolError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class ConnectionTestError extends PveToolError {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "ConnectionTestError";
  }
}

interface GlobalArgs extends CliOverrides {
  raw: boolean;
}

const VM_ARG = { type: "string", demandOption: true, describe: "VM id or name" } as const;
const SNAPNAME_ARG = { type: "string", demandOption: true, describe: "Snapshot name" } as const;

function baseProgram(args: string[]) {
  return yargs(args)
    .scriptName(PROGRAM_NAME)
    .usage("$0 <command> [options]\n\nProxmox VE snapshot management tool")
    .option("config", { alias: "c", type: "string", describe: "Path to configuration file (TOML) [env: PROXMOX_CONFIG]" })
    .option("cluster", { type: "string", describe: "Named cluster from the configuration file" })
    .option("host", { alias: "H", type: "string", describe: "API host, optionally host:port [env: PROXMOX_HOST]" })
    .option("port", { alias: "p", type: "number", describe: "API port, default 8006 [env: PROXMOX_PORT]" })
    .option("token", { alias: "t", type: "string", describe: "API token USER@REALM!ID=SECRET [env: PROXMOX_API_TOKEN]" })
    .option("verify-ssl", {
      alias: "k",
      type: "boolean",
      default: undefined,
      describe: "Verify the server TLS certificate [env: PROXMOX_VERIFY_SSL]"
    })
    .option("raw", { alias: "R", type: "boolean", default: false, describe: "Print results as JSON" })
    .option("poll-interval", { type: "number", describe: "Task poll interval in ms, default 2000" })
    .option("timeout", { type: "number", describe: "Stop waiting for a task after this many ms" })
    .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Debug logging on stderr" });
}

export function buildProgram(args: string[], options: RunOptions = {}) {
  const env = options.env ?? process.env;
  const stdout: Writer = options.stdout ?? process.stdout;
  const open = options.openContext ?? defaultOpenContext;

  const print = (lines: string | string[]) => {
    for (const line of Array.isArray(lines) ? lines : [lines]) stdout.write(`${line}\n`);
  };
  const printJson = (value: unknown) => print(JSON.stringify(value, null, 2));

  async function withContext(
    argv: GlobalArgs,
    fn: (ctx: CommandContext) => Promise<void>,
    hooks?: { onConnecting?: () => void }
  ): Promise<void> {
    const logger = options.logger ?? createLogger({ level: resolveLogLevel(argv, env) });
    const settings = await loadSettings(argv, env, logger);
    hooks?.onConnecting?.();
    const ctx = await open(settings, logger, options.signal);
    try {
      await fn(ctx);
    } finally {
      await ctx.close();
    }
  }

  function taskHooks(argv: GlobalArgs): SnapshotOperationHooks {
    if (argv.raw) return { signal: options.signal };
    return {
      signal: options.signal,
      onSubmitted: (result) => print(renderSubmitted(result)),
      onProgress: () => stdout.write(".")
    };
  }

  function report<T>(argv: GlobalArgs, value: T, render: (value: T) => string | string[]) {
    if (argv.raw) {
      printJson(value);
    } else {
      print(render(value));
    }
  }

  const reportTask = (argv: GlobalArgs, result: SnapshotTaskResult) =>
    report(argv, { ...result, exitStatus: "OK" }, () => `\n${TASK_COMPLETED}`);

  return baseProgram(args)
    .command(
      "create <vm>",
      "Create a snapshot",
      (y) =>
        y
          .positional("vm", VM_ARG)
          .option("snapname", { alias: "s", type: "string", describe: "Snapshot name, default snapshot-YYYYMMDD-HHMMSS" })
          .option("description", { alias: "d", type: "string", describe: "Snapshot description" })
          .option("vmstate", { alias: "m", type: "boolean", default: false, describe: "Include RAM and device state" }),
      (argv) =>
        withContext(argv, async (ctx) => {
          const request = { snapname: argv.snapname, description: argv.description, vmstate: argv.vmstate };
          reportTask(argv, await ctx.snapshots.create(argv.vm, request, taskHooks(argv)));
        })
    )
    .command(
      "delete <vm> <snapname>",
      "Delete a snapshot",
      (y) => y.positional("vm", VM_ARG).positional("snapname", SNAPNAME_ARG),
      (argv) =>
        withContext(argv, async (ctx) => {
          reportTask(argv, await ctx.snapshots.delete(argv.vm, argv.snapname, taskHooks(argv)));
        })
    )
    .command(
      "list <vm>",
      "List snapshots of a VM",
      (y) => y.positional("vm", VM_ARG),
      (argv) =>
        withContext(argv, async (ctx) => {
          report(argv, await ctx.snapshots.list(argv.vm), renderSnapshotList);
        })
    )
    .command(
      "rollback <vm> <snapname>",
      "Roll a VM back to a snapshot",
      (y) => y.positional("vm", VM_ARG).positional("snapname", SNAPNAME_ARG),
      (argv) =>
        withContext(argv, async (ctx) => {
          reportTask(argv, await ctx.snapshots.rollback(argv.vm, argv.snapname, taskHooks(argv)));
        })
    )
    .command(
      "info <vm>",
      "Show VM information",
      (y) => y.positional("vm", VM_ARG),
      (argv) =>
        withContext(argv, async (ctx) => {
          report(argv, await ctx.vms.info(argv.vm), renderVmInfo);
        })
    )
    .command(
      "check <vm>",
      "Check VM status and uptime",
      (y) => y.positional("vm", VM_ARG),
      (argv) =>
        withContext(argv, async (ctx) => {
          report(argv, await ctx.vms.check(argv.vm), renderVmCheck);
        })
    )
    .command(
      "test",
      "Test the API connection",
      (y) => y,
      async (argv) => {
        try {
          await withContext(
            argv,
            async (ctx) => {
              report(argv, ctx.version, renderVersion);
            },
            { onConnecting: argv.raw ? undefined : () => print("Testing connection to Proxmox server...") }
          );
        } catch (err) {
          if (err instanceof ConfigError) throw err;
          throw new ConnectionTestError(err);
        }
      }
    )
    .command(
      "list-vms",
      "List VMs in the cluster",
      (y) => y.option("node", { alias: "N", type: "string", describe: "Only VMs on this node" }),
      (argv) =>
        withContext(argv, async (ctx) => {
          report(argv, await ctx.vms.listVms(argv.node), renderVmTable);
        })
    )
    .command(
      "list-nodes",
      "List cluster nodes",
      (y) => y,
      (argv) =>
        withContext(argv, async (ctx) => {
          report(argv, await ctx.cluster.listNodes(), renderNodes);
        })
    )
    .demandCommand(1, "A command is required")
    .strict()
    .help()
    .alias("help", "h")
    .version(PROGRAM_VERSION)
    .showHelpOnFail(false)
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new UsageError(msg || "Invalid arguments");
    });
}

/** Runs one command and resolves to the process exit code. */
export async function run(args: string[], options: RunOptions = {}): Promise<number> {
  const stderr: Writer = options.stderr ?? process.stderr;
  try {
    await buildProgram(args, options).parseAsync();
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      stderr.write(`${err.message}\nRun '${PROGRAM_NAME} --help' for usage.\n`);
      return 2;
    }
    if (err instanceof ConnectionTestError) {
      stderr.write(`✗ Connection failed: ${err.message}\n`);
      return 1;
    }
    stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
