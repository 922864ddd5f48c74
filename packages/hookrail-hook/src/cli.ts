#!/usr/bin/env node
import { initProject } from "./resolver.js";
import { runHook } from "./runner.js";

/**
 * hookrail hook entry point
 *
 * The host runs this once per lifecycle event: one JSON object on stdin, one JSON response
 * on stdout, and an exit code the host also inspects (0 proceed, 2 deny/block, 1 error).
 *
 *   hookrail-hook [--config <path>]    handle one event from stdin
 *   hookrail-hook init [dir]           create the project marker
 *
 * stdout carries only the protocol response. Logs go to stderr.
 */

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8").trim();
}

function getArgValue(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return null;
  const next = process.argv[idx + 1];
  if (!next || next.startsWith("--")) return null;
  return next;
}

async function main(): Promise<void> {
  if (process.argv[2] === "init") {
    const { root, created } = await initProject(process.argv[3] ?? process.cwd());
    process.stderr.write(created ? `hookrail: initialized ${root}\n` : `hookrail: ${root} is already initialized\n`);
    return;
  }

  const response = await runHook(await readAllStdin(), { configPath: getArgValue("--config") });
  if (response.stdout) process.stdout.write(response.stdout + "\n");
  if (response.stderr) process.stderr.write(response.stderr + "\n");
  process.exitCode = response.exitCode;
}

main().catch((err) => {
  console.error("hookrail hook fatal:", err);
  process.exitCode = 1;
});
