#!/usr/bin/env node
/**
 * CLI entrypoint for file-courier.
 *
 * Usage:
 *   file-courier watch --config config/config.json
 *   file-courier join report.pdf.zip.001 report.pdf.zip.002 --out report.pdf.zip
 */
import { parseArgs } from "node:util";
import { FileCourier, joinParts, loadConfig, unsealFile } from "./index.js";
import { DEFAULT_CONFIG_PATH } from "./config.js";

const USAGE = `
file-courier: deliver new and changed files to a Telegram chat

Usage:
  file-courier [watch]                       Run scan cycles until interrupted
  file-courier once                          Run a single scan cycle
  file-courier history                       Print the delivery ledger as JSON
  file-courier reset [--logs] [--state]      Truncate logs and/or clear state
  file-courier join <part...> --out <file>   Concatenate downloaded parts
  file-courier unseal <file> --out <file>    Decrypt a sealed container

Options:
  -c, --config <path>    Config file          (default: ${DEFAULT_CONFIG_PATH})
  -o, --out <path>       Output file for join / unseal
  --password <p>         Password for unseal  (default: configured zipPassword)
  --logs                 reset: truncate log files
  --state                reset: clear ledger, size cache and pending notices
  -h, --help             Show this help
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    config: { type: "string", short: "c", default: DEFAULT_CONFIG_PATH },
    out: { type: "string", short: "o" },
    password: { type: "string" },
    logs: { type: "boolean", default: false },
    state: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const [command = "watch", ...rest] = positionals;

async function courier(): Promise<FileCourier> {
  return FileCourier.fromConfig(await loadConfig(values.config));
}

function requireOut(): string {
  if (!values.out) {
    console.error(`${command} needs --out <file>\n\n${USAGE}`);
    process.exit(1);
  }
  return values.out;
}

try {
  switch (command) {
    case "watch": {
      const ctx = await courier();
      const stop = () => ctx.stop();
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
      await ctx.start();
      await ctx.close();
      break;
    }
    case "once": {
      const ctx = await courier();
      const report = await ctx.runOnce();
      await ctx.close();
      console.log(
        `${report.candidates} candidates: ${report.delivered} delivered, ${report.skipped} skipped, ${report.failed} failed`,
      );
      for (const r of report.results.filter((x) => x.outcome === "failed")) {
        console.log(`  failed ${r.path}: ${r.reason ?? "unknown"}`);
      }
      if (report.failed > 0) process.exitCode = 2;
      break;
    }
    case "history": {
      const ctx = await courier();
      console.log(JSON.stringify(await ctx.history(), null, 2));
      await ctx.close();
      break;
    }
    case "reset": {
      if (!values.logs && !values.state) {
        console.error(`reset needs --logs and/or --state\n\n${USAGE}`);
        process.exit(1);
      }
      const ctx = await courier();
      if (values.logs) {
        const files = await ctx.clearLogs();
        console.log(`Truncated ${files.length} log file(s)`);
      }
      if (values.state) {
        await ctx.clearState();
        console.log("State cleared");
      }
      await ctx.close();
      break;
    }
    case "join": {
      const out = requireOut();
      if (rest.length === 0) {
        console.error(`join needs at least one part\n\n${USAGE}`);
        process.exit(1);
      }
      const bytes = await joinParts(rest, out);
      console.log(`Wrote ${bytes} bytes to ${out}`);
      break;
    }
    case "unseal": {
      const out = requireOut();
      const [source] = rest;
      if (!source) {
        console.error(`unseal needs a file\n\n${USAGE}`);
        process.exit(1);
      }
      const password = values.password ?? (await loadConfig(values.config)).general.zipPassword;
      await unsealFile(source, out, password);
      console.log(`Decrypted ${source} to ${out}`);
      break;
    }
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      process.exit(1);
  }
} catch (err) {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
  process.exit(1);
}
